import chalk from 'chalk';
import * as readline from 'readline';
import { getConfigManager } from '../../core/config';
import { getErrorMessage } from '../../core/errors';
import { UrlCache } from '../../core/url-cache';

function createCache(): UrlCache {
  const config = getConfigManager().getConfig();
  return new UrlCache({ cacheDir: config.cacheDir, ttlSeconds: config.cacheTtlSeconds });
}

/**
 * 캐시 크기 확인
 */
export async function cacheSize(): Promise<void> {
  const cache = createCache();

  try {
    const stats = await cache.stats();
    console.log(chalk.cyan('\n캐시 정보:'));
    console.log(`  경로: ${cache.cacheDir}`);
    console.log(`  항목: ${stats.diskEntries}개`);
    console.log(`  크기: ${formatBytes(stats.totalBytes)}`);
    console.log(`  유효 시간: ${cache.ttlSeconds}초`);
  } catch (error) {
    console.error(chalk.red(`캐시 크기 확인 실패: ${getErrorMessage(error)}`));
    process.exitCode = 1;
  }
}

/**
 * 캐시 삭제
 */
export async function cacheClear(options: { force?: boolean }): Promise<void> {
  const cache = createCache();

  if (!options.force) {
    const confirm = await askConfirmation('정말로 캐시를 삭제하시겠습니까?');
    if (!confirm) {
      console.log(chalk.yellow('캐시 삭제가 취소되었습니다'));
      return;
    }
  }

  try {
    const { diskEntries, totalBytes } = await cache.stats();
    if (diskEntries === 0) {
      console.log(chalk.yellow('삭제할 캐시가 없습니다'));
      return;
    }
    await cache.clear();
    console.log(chalk.green(`✓ 캐시가 삭제되었습니다 (${diskEntries}개, ${formatBytes(totalBytes)} 확보)`));
  } catch (error) {
    console.error(chalk.red(`캐시 삭제 실패: ${getErrorMessage(error)}`));
    process.exitCode = 1;
  }
}

/**
 * 바이트 포맷
 */
export function formatBytes(bytes: number): string {
  if (bytes === 0) return '0 B';
  const k = 1024;
  const sizes = ['B', 'KB', 'MB', 'GB'];
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), sizes.length - 1);
  return parseFloat((bytes / Math.pow(k, i)).toFixed(2)) + ' ' + sizes[i];
}

/**
 * 확인 프롬프트 (stderr 로 질문)
 */
async function askConfirmation(question: string): Promise<boolean> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stderr,
  });

  return new Promise((resolve) => {
    rl.question(`${question} (y/N) `, (answer) => {
      rl.close();
      resolve(answer.toLowerCase() === 'y' || answer.toLowerCase() === 'yes');
    });
  });
}
