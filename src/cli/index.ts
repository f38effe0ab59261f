#!/usr/bin/env node

import { Command, Option } from 'commander';
import chalk from 'chalk';
import { OUTPUT_FORMATS } from './formatters';
import type { ResolveCommandOptions } from './commands/resolve';
import logger from '../utils/logger';
import { getErrorMessage } from '../core/errors';

// 버전 정보
const VERSION = '0.1.0';

// 메인 프로그램
const program = new Command();

program
  .name('purlsrc')
  .description(chalk.cyan('Translate Package URLs (PURLs) into download URLs for their source artifacts'))
  .version(VERSION, '-V, --version', '버전 정보 표시')
  .helpOption('-h, --help', '도움말 표시')
  .hook('preAction', async (_program, actionCommand) => {
    await logger.initialize({ verbose: actionCommand.opts().verbose === true });
  });

// resolve 명령어 (기본)
program
  .command('resolve', { isDefault: true })
  .description('PURL 을 다운로드 URL 로 해석')
  .argument('[purls...]', '해석할 PURL 목록')
  .option('-f, --file <path>', 'PURL 목록 파일 (한 줄에 하나, # 주석 허용)')
  .addOption(
    new Option('--format <format>', '출력 형식').choices([...OUTPUT_FORMATS]).default('plain')
  )
  .option('-o, --output <path>', '결과를 파일로 저장')
  .option('--validate', 'HTTP 로 URL 존재 여부 검증 (기본값은 설정을 따름)')
  .option('--no-validate', 'URL 검증 생략')
  .option('--no-cache', '캐시 사용 안 함')
  .option('-c, --concurrency <num>', '동시 해석 수')
  .option('-v, --verbose', '진행률 및 상세 로그 표시')
  .addHelpText(
    'after',
    `
Examples:
  $ purlsrc pkg:npm/express@4.17.1
  $ purlsrc pkg:pypi/requests@2.28.1 --format json
  $ purlsrc --file purls.txt --output results.csv --format csv
  $ purlsrc "pkg:generic/mylib@1.0?download_url=https://example.com/mylib-1.0.tar.gz" --no-validate`
  )
  .action(async (purls: string[], options: ResolveCommandOptions) => {
    const { resolveCommand } = await import('./commands/resolve');
    process.exitCode = await resolveCommand(purls, options);
  });

// config 명령어
program
  .command('config')
  .description('설정 관리')
  .addCommand(
    new Command('get')
      .description('설정값 조회')
      .argument('[key]', '설정 키')
      .action(async (key?: string) => {
        const { configGet } = await import('./commands/config');
        await configGet(key);
      })
  )
  .addCommand(
    new Command('set')
      .description('설정값 변경')
      .argument('<key>', '설정 키')
      .argument('<value>', '설정값')
      .action(async (key: string, value: string) => {
        const { configSet } = await import('./commands/config');
        await configSet(key, value);
      })
  )
  .addCommand(
    new Command('list')
      .description('모든 설정 표시')
      .action(async () => {
        const { configList } = await import('./commands/config');
        await configList();
      })
  )
  .addCommand(
    new Command('reset')
      .description('설정 초기화')
      .action(async () => {
        const { configReset } = await import('./commands/config');
        await configReset();
      })
  );

// cache 명령어
program
  .command('cache')
  .description('캐시 관리')
  .addCommand(
    new Command('size')
      .description('캐시 크기 확인')
      .action(async () => {
        const { cacheSize } = await import('./commands/cache');
        await cacheSize();
      })
  )
  .addCommand(
    new Command('clear')
      .description('캐시 삭제')
      .option('-f, --force', '확인 없이 삭제')
      .action(async (options: { force?: boolean }) => {
        const { cacheClear } = await import('./commands/cache');
        await cacheClear(options);
      })
  );

// 에러 핸들링
program.exitOverride((err) => {
  if (err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
    process.exit(0);
  }
  process.exit(err.exitCode);
});

// 파싱 및 실행
program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(chalk.red(`오류: ${getErrorMessage(error)}`));
  process.exit(1);
});
