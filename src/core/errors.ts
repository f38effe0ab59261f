/**
 * 에러 타입 정의
 */

/**
 * 핸들러가 의도적으로 해석을 중단할 때 사용하는 에러
 * (필수 qualifier 누락, fallback 명령 실패 등)
 */
export class HandlerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'HandlerError';
  }
}

/**
 * PURL 문자열 파싱 실패
 */
export class PurlParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PurlParseError';
  }
}

/**
 * 다운로드한 내용의 체크섬 불일치
 */
export class ChecksumMismatchError extends Error {
  readonly expected: string;
  readonly actual: string;

  constructor(expected: string, actual: string) {
    super(`Checksum mismatch: expected ${expected}, got ${actual}`);
    this.name = 'ChecksumMismatchError';
    this.expected = expected;
    this.actual = actual;
  }
}

/**
 * 외부 명령 타임아웃
 */
export class CommandTimeoutError extends Error {
  readonly command: string;
  readonly timeoutMs: number;

  constructor(command: string, timeoutMs: number) {
    super(`Command timed out after ${timeoutMs / 1000}s: ${command}`);
    this.name = 'CommandTimeoutError';
    this.command = command;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * 외부 명령이 0이 아닌 종료 코드로 끝남
 */
export class CommandFailedError extends Error {
  readonly command: string;
  readonly exitCode: number | null;
  readonly stderr: string;

  constructor(command: string, exitCode: number | null, stderr: string) {
    super(stderr.trim() || `Command exited with code ${exitCode}: ${command}`);
    this.name = 'CommandFailedError';
    this.command = command;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

/**
 * unknown 에러에서 메시지 추출
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
