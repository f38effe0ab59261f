import * as fs from 'fs-extra';

/**
 * 한 줄에 PURL 하나. 빈 줄과 `#` 주석은 무시
 */
export function parsePurlLines(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== '' && !line.startsWith('#'));
}

/**
 * 배치 파일에서 PURL 목록 읽기
 */
export async function readPurlFile(filePath: string): Promise<string[]> {
  const content = await fs.readFile(filePath, 'utf8');
  return parsePurlLines(content);
}
