import cliProgress from 'cli-progress';
import chalk from 'chalk';
import * as fs from 'fs-extra';
import pLimit from 'p-limit';
import { HandlerResult, HandlerResultRecord, OutputFormat, ResolveOptions } from '../../types';
import { getConfigManager, Settings } from '../../core/config';
import { HttpClient } from '../../core/http-client';
import { PurlResolver } from '../../core/resolver';
import { UrlCache } from '../../core/url-cache';
import { toResultRecord } from '../../core/result';
import { getErrorMessage } from '../../core/errors';
import { readPurlFile } from '../batch';
import { formatResults } from '../formatters';
import logger from '../../utils/logger';

// resolve 옵션
export interface ResolveCommandOptions {
  file?: string;
  format: OutputFormat;
  output?: string;
  /** 미지정 시 설정값 사용 */
  validate?: boolean;
  cache?: boolean;
  concurrency?: string;
  verbose?: boolean;
}

export type ResolveFn = (purl: string, options: ResolveOptions) => Promise<HandlerResult>;

export interface CommandIO {
  stdout(text: string): void;
  stderr(text: string): void;
}

export interface ResolveCommandDeps {
  resolve?: ResolveFn;
  settings?: Settings;
  io?: CommandIO;
}

const defaultIO: CommandIO = {
  stdout: (text) => process.stdout.write(`${text}\n`),
  stderr: (text) => process.stderr.write(`${text}\n`),
};

/**
 * 설정값으로 기본 resolver 구성
 */
function createResolveFn(settings: Settings, useCache: boolean): ResolveFn {
  const resolver = new PurlResolver({
    http: new HttpClient({ timeout: settings.httpTimeoutMs, maxRetries: settings.maxRetries }),
    ...(useCache
      ? { cache: new UrlCache({ cacheDir: settings.cacheDir, ttlSeconds: settings.cacheTtlSeconds }) }
      : {}),
  });
  return (purl, options) => resolver.resolveString(purl, options);
}

function failedRecord(purl: string, error: unknown): HandlerResultRecord {
  return {
    purl,
    validated: false,
    method: 'none',
    fallback_available: false,
    error: getErrorMessage(error),
    status: 'failed',
  };
}

/**
 * resolve 명령어 핸들러
 * @returns 프로세스 종료 코드
 */
export async function resolveCommand(
  purlArgs: string[],
  options: ResolveCommandOptions,
  deps: ResolveCommandDeps = {}
): Promise<number> {
  const io = deps.io ?? defaultIO;
  const settings = deps.settings ?? getConfigManager().getConfig();

  const purls = purlArgs.map((purl) => purl.trim()).filter(Boolean);
  if (options.file) {
    try {
      purls.push(...(await readPurlFile(options.file)));
    } catch (error) {
      io.stderr(chalk.red(`Error: cannot read file ${options.file}: ${getErrorMessage(error)}`));
      return 1;
    }
  }

  if (purls.length === 0) {
    io.stderr(chalk.red('Error: No PURLs provided'));
    return 1;
  }

  const concurrency = options.concurrency !== undefined ? Number(options.concurrency) : settings.concurrency;
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    io.stderr(chalk.red(`Error: invalid concurrency: ${options.concurrency}`));
    return 1;
  }

  const validate = options.validate ?? settings.validate;
  const resolve = deps.resolve ?? createResolveFn(settings, settings.cacheEnabled && options.cache !== false);

  logger.info('PURL 해석 시작', { count: purls.length, validate, concurrency });

  // 진행률 바 (stderr, 여러 개일 때만)
  const progressBar =
    options.verbose && purls.length > 1
      ? new cliProgress.SingleBar(
          {
            stream: process.stderr,
            format: ' {bar} | {value}/{total} | {purl}',
            hideCursor: true,
          },
          cliProgress.Presets.shades_classic
        )
      : null;
  progressBar?.start(purls.length, 0, { purl: '' });

  const limit = pLimit(concurrency);
  const records = await Promise.all(
    purls.map((purl) =>
      limit(async (): Promise<HandlerResultRecord> => {
        let record: HandlerResultRecord;
        try {
          record = toResultRecord(await resolve(purl, { validate }));
        } catch (error) {
          logger.debug('PURL 해석 중 예외', { purl, error: getErrorMessage(error) });
          record = failedRecord(purl, error);
        }
        progressBar?.increment(1, { purl });
        return record;
      })
    )
  );
  progressBar?.stop();

  const text = formatResults(records, options.format);
  if (options.output) {
    await fs.writeFile(options.output, `${text}\n`, 'utf8');
    io.stdout(`Results written to ${options.output}`);
  } else {
    io.stdout(text);
  }

  const errorCount = records.filter((record) => record.status === 'failed').length;
  if (options.verbose) {
    io.stderr(
      errorCount > 0
        ? chalk.yellow(`Completed with ${errorCount} error(s)`)
        : chalk.green(`Completed: ${records.length} PURL(s) resolved`)
    );
  }

  logger.info('PURL 해석 완료', { total: records.length, errors: errorCount });
  return errorCount > 0 ? 1 : 0;
}
