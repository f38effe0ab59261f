/**
 * 패키지 매니저 명령 실행기
 * PATH 탐색과 서브프로세스 실행을 담당
 */

import { execFile, ExecFileException } from 'child_process';
import * as fs from 'fs-extra';
import * as path from 'path';
import logger from '../../utils/logger';
import { CommandFailedError, CommandTimeoutError } from '../errors';

/** fallback 명령 실행 제한 시간 (ms) */
export const FALLBACK_TIMEOUT_MS = 30000;

/**
 * 쉘을 거치지 않고 실행되는 명령 한 단계
 */
export interface CommandStep {
  program: string;
  args: readonly string[];
  /** 작업 디렉토리 (현재 디렉토리 기준) */
  cwd?: string;
}

/** 순서대로 실행되는 단계 목록 (앞 단계가 실패하면 중단) */
export type FallbackCommand = readonly CommandStep[];

export interface ICommandRunner {
  /** 실행 파일이 PATH 에 존재하는지 확인 */
  isAvailable(executable: string): boolean;
  /**
   * 각 단계를 순서대로 실행하고 stdout 을 이어붙여 반환
   * @throws CommandTimeoutError, CommandFailedError
   */
  run(command: FallbackCommand, timeoutMs: number): Promise<string>;
}

// 따옴표 없이 표시해도 되는 인자
const PLAIN_ARG_PATTERN = /^[A-Za-z0-9_@%+=:,./-]+$/;

/**
 * 표시용 POSIX 쉘 인용
 */
export function quoteArg(arg: string): string {
  if (PLAIN_ARG_PATTERN.test(arg)) {
    return arg;
  }
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}

/**
 * 단계 목록을 사람이 읽는 명령 문자열로 변환
 * 예: git clone <url> && cd <repo> && git checkout <ref>
 */
export function formatCommand(command: FallbackCommand): string {
  return command
    .map((step) => {
      const line = [step.program, ...step.args].map(quoteArg).join(' ');
      return step.cwd ? `cd ${quoteArg(step.cwd)} && ${line}` : line;
    })
    .join(' && ');
}

export class ProcessCommandRunner implements ICommandRunner {
  private readonly availability = new Map<string, boolean>();

  isAvailable(executable: string): boolean {
    const cached = this.availability.get(executable);
    if (cached !== undefined) {
      return cached;
    }

    const found = findExecutable(executable) !== null;
    this.availability.set(executable, found);
    logger.debug('패키지 매니저 탐색', { executable, found });
    return found;
  }

  async run(command: FallbackCommand, timeoutMs: number): Promise<string> {
    const display = formatCommand(command);
    const deadline = Date.now() + timeoutMs;
    logger.debug('fallback 명령 실행', { command: display, timeoutMs });

    let output = '';
    for (const step of command) {
      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        throw new CommandTimeoutError(display, timeoutMs);
      }
      output += await this.runStep(step, remaining, display, timeoutMs);
    }
    return output;
  }

  private runStep(step: CommandStep, timeout: number, display: string, timeoutMs: number): Promise<string> {
    return new Promise((resolve, reject) => {
      execFile(
        step.program,
        [...step.args],
        { cwd: step.cwd, timeout, maxBuffer: 10 * 1024 * 1024, windowsHide: true },
        (error: ExecFileException | null, stdout: string, stderr: string) => {
          if (!error) {
            resolve(stdout);
            return;
          }

          // timeout 초과 시 SIGTERM 으로 종료됨
          if (error.killed && error.signal === 'SIGTERM') {
            reject(new CommandTimeoutError(display, timeoutMs));
            return;
          }

          const exitCode = typeof error.code === 'number' ? error.code : null;
          reject(new CommandFailedError(display, exitCode, stderr || error.message));
        }
      );
    });
  }
}

/**
 * PATH 에서 실행 파일 경로 탐색 (Windows 는 PATHEXT 확장자 포함)
 */
export function findExecutable(
  executable: string,
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform
): string | null {
  const dirs = (env.PATH ?? env.Path ?? '').split(path.delimiter).filter(Boolean);
  const extensions =
    platform === 'win32'
      ? ['', ...(env.PATHEXT ?? '.EXE;.CMD;.BAT;.COM').split(';').filter(Boolean)]
      : [''];

  for (const dir of dirs) {
    for (const ext of extensions) {
      const candidate = path.join(dir, executable + ext);
      if (isExecutableFile(candidate, platform)) {
        return candidate;
      }
    }
  }

  return null;
}

function isExecutableFile(filePath: string, platform: NodeJS.Platform): boolean {
  try {
    const stats = fs.statSync(filePath);
    if (!stats.isFile()) return false;
    if (platform === 'win32') return true;
    fs.accessSync(filePath, fs.constants.X_OK);
    return true;
  } catch {
    return false;
  }
}
