import chalk from 'chalk';
import Table from 'cli-table3';
import { getConfigManager, isSettingKey, SettingKey } from '../../core/config';
import { getErrorMessage } from '../../core/errors';

const DESCRIPTIONS: Record<SettingKey, string> = {
  validate: 'URL HTTP 검증 여부',
  concurrency: '동시 해석 수',
  cacheEnabled: '캐시 사용 여부',
  cacheDir: '캐시 저장 경로',
  cacheTtlSeconds: '캐시 유효 시간 (초)',
  httpTimeoutMs: 'HTTP 타임아웃 (ms)',
  maxRetries: 'HTTP 재시도 횟수',
  logLevel: '로그 레벨',
};

/**
 * 설정값 조회
 */
export async function configGet(key?: string): Promise<void> {
  const configManager = getConfigManager();

  if (key) {
    if (isSettingKey(key)) {
      console.log(chalk.cyan(`${key}: `) + chalk.white(JSON.stringify(configManager.get(key))));
    } else {
      console.log(chalk.yellow(`설정 '${key}'를 찾을 수 없습니다`));
      process.exitCode = 1;
    }
  } else {
    console.log(chalk.cyan('\n현재 설정:'));
    console.log(JSON.stringify(configManager.getConfig(), null, 2));
  }
}

/**
 * 설정값 변경 (키의 타입으로 변환)
 */
export async function configSet(key: string, value: string): Promise<void> {
  const configManager = getConfigManager();

  try {
    const updated = configManager.set(key, value);
    const saved = isSettingKey(key) ? updated[key] : value;
    console.log(chalk.green(`✓ 설정이 저장되었습니다: ${key} = ${JSON.stringify(saved)}`));
  } catch (error) {
    console.error(chalk.red(`설정 저장 실패: ${getErrorMessage(error)}`));
    process.exit(1);
  }
}

/**
 * 모든 설정 표시
 */
export async function configList(): Promise<void> {
  const configManager = getConfigManager();
  const config = configManager.getConfig();

  const table = new Table({
    head: [chalk.cyan('설정'), chalk.cyan('값'), chalk.cyan('설명')],
    colWidths: [20, 45, 25],
  });

  for (const [key, value] of Object.entries(config)) {
    table.push([key, String(value), isSettingKey(key) ? DESCRIPTIONS[key] : '-']);
  }

  console.log(chalk.cyan('\n설정 목록:\n'));
  console.log(table.toString());
  console.log(chalk.gray(`\n설정 파일: ${configManager.getConfigPath()}`));
}

/**
 * 설정 초기화
 */
export async function configReset(): Promise<void> {
  const configManager = getConfigManager();

  try {
    configManager.reset();
    console.log(chalk.green('✓ 설정이 초기화되었습니다'));
  } catch (error) {
    console.error(chalk.red(`설정 초기화 실패: ${getErrorMessage(error)}`));
    process.exit(1);
  }
}
