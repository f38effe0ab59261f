/**
 * 해석 결과 출력 포맷 (plain / json / csv)
 */

import { HandlerResultRecord, OutputFormat } from '../types';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['plain', 'json', 'csv'];

const CSV_HEADER = ['purl', 'download_url', 'status', 'method'];

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

/**
 * `purl -> url` 또는 `purl -> ERROR: <error>`
 */
export function formatPlain(records: readonly HandlerResultRecord[]): string {
  return records
    .map((record) =>
      record.status === 'success' && record.download_url
        ? `${record.purl} -> ${record.download_url}`
        : `${record.purl} -> ERROR: ${record.error ?? 'Unknown error'}`
    )
    .join('\n');
}

/**
 * 실패 레코드도 download_url 키를 null 로 유지
 */
export function formatJson(records: readonly HandlerResultRecord[]): string {
  const rows = records.map((record) => ({
    purl: record.purl,
    download_url: record.download_url ?? null,
    validated: record.validated,
    method: record.method,
    ...(record.fallback_command !== undefined ? { fallback_command: record.fallback_command } : {}),
    fallback_available: record.fallback_available,
    ...(record.error !== undefined ? { error: record.error } : {}),
    status: record.status,
  }));
  return JSON.stringify(rows, null, 2);
}

// RFC 4180: 쉼표, 따옴표, 줄바꿈이 있으면 따옴표로 감싸고 내부 따옴표는 두 번
function escapeCsv(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function formatCsv(records: readonly HandlerResultRecord[]): string {
  const lines = [CSV_HEADER.join(',')];
  for (const record of records) {
    lines.push(
      [record.purl, record.download_url ?? '', record.status, record.method].map(escapeCsv).join(',')
    );
  }
  return lines.join('\n');
}

export function formatResults(records: readonly HandlerResultRecord[], format: OutputFormat): string {
  switch (format) {
    case 'json':
      return formatJson(records);
    case 'csv':
      return formatCsv(records);
    case 'plain':
      return formatPlain(records);
  }
}
