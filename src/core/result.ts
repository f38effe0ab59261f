/**
 * HandlerResult 직렬화/역직렬화
 */

import { HandlerResult, HandlerResultRecord, ResolutionMethod, ResolutionStatus } from '../types';

const METHODS: readonly ResolutionMethod[] = ['direct', 'api', 'fallback', 'none'];
const STATUSES: readonly ResolutionStatus[] = ['success', 'failed'];

/**
 * snake_case 레코드로 변환 (값이 없는 필드는 생략)
 */
export function toResultRecord(result: HandlerResult): HandlerResultRecord {
  return {
    purl: result.purl,
    ...(result.downloadUrl !== undefined ? { download_url: result.downloadUrl } : {}),
    validated: result.validated,
    method: result.method,
    ...(result.fallbackCommand !== undefined ? { fallback_command: result.fallbackCommand } : {}),
    fallback_available: result.fallbackAvailable,
    ...(result.error !== undefined ? { error: result.error } : {}),
    status: result.status,
  };
}

export function fromResultRecord(record: HandlerResultRecord): HandlerResult {
  return Object.freeze({
    purl: record.purl,
    ...(record.download_url !== undefined ? { downloadUrl: record.download_url } : {}),
    validated: record.validated,
    method: record.method,
    ...(record.fallback_command !== undefined ? { fallbackCommand: record.fallback_command } : {}),
    fallbackAvailable: record.fallback_available,
    ...(record.error !== undefined ? { error: record.error } : {}),
    status: record.status,
  });
}

function isOptionalString(value: unknown): boolean {
  return value === undefined || typeof value === 'string';
}

/**
 * 캐시 등 외부에서 읽은 값이 결과 레코드 형태인지 확인
 */
export function isResultRecord(value: unknown): value is HandlerResultRecord {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const record: Record<string, unknown> = { ...value };
  return (
    typeof record.purl === 'string' &&
    typeof record.validated === 'boolean' &&
    typeof record.fallback_available === 'boolean' &&
    METHODS.some((method) => method === record.method) &&
    STATUSES.some((status) => status === record.status) &&
    isOptionalString(record.download_url) &&
    isOptionalString(record.fallback_command) &&
    isOptionalString(record.error)
  );
}
