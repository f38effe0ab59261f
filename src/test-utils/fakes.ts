/**
 * 핸들러 테스트용 협력 객체 가짜 구현
 */

import { vi } from 'vitest';
import type { IHttpClient } from '../core/http-client';
import type { ICommandRunner } from '../core/shared/command-runner';

/**
 * 기본값: URL 검증 성공, 다운로드는 빈 버퍼
 */
export function createMockHttpClient() {
  return {
    get: vi.fn(),
    head: vi.fn(),
    getJson: vi.fn(),
    validateUrl: vi.fn().mockResolvedValue(true),
    downloadAndVerify: vi.fn().mockResolvedValue(Buffer.alloc(0)),
  } satisfies IHttpClient;
}

/**
 * 기본값: 모든 실행 파일 존재, 명령 출력은 빈 문자열
 */
export function createMockRunner() {
  return {
    isAvailable: vi.fn().mockReturnValue(true),
    run: vi.fn().mockResolvedValue(''),
  } satisfies ICommandRunner;
}

export type MockHttpClient = ReturnType<typeof createMockHttpClient>;
export type MockRunner = ReturnType<typeof createMockRunner>;
