/**
 * PURL → 다운로드 URL 해석 진입점
 */

import { HandlerResult, Purl, ResolveOptions } from '../types';
import { HttpClient, IHttpClient } from './http-client';
import { ICommandRunner, ProcessCommandRunner } from './shared/command-runner';
import { HandlerRegistry, createHandlerRegistry } from './handlers';
import { UrlCache } from './url-cache';
import { parsePurl } from './purl';
import { fromResultRecord, isResultRecord, toResultRecord } from './result';
import logger from '../utils/logger';

export interface PurlResolverOptions {
  http?: IHttpClient;
  runner?: ICommandRunner;
  /** 지정하면 성공 결과를 캐시 */
  cache?: UrlCache;
  registry?: HandlerRegistry;
}

export class PurlResolver {
  private readonly registry: HandlerRegistry;
  private readonly cache?: UrlCache;

  constructor(options: PurlResolverOptions = {}) {
    this.registry =
      options.registry ??
      createHandlerRegistry({
        http: options.http ?? new HttpClient(),
        runner: options.runner ?? new ProcessCommandRunner(),
      });
    this.cache = options.cache;
  }

  /**
   * 파싱된 PURL 해석
   * @throws HandlerError 지원하지 않는 에코시스템, 잘못된 한정자
   */
  async resolve(purl: Purl, options: ResolveOptions = {}): Promise<HandlerResult> {
    const handler = this.registry.get(purl.ecosystem);
    return handler.resolve(purl, options);
  }

  /**
   * PURL 문자열 해석. 결과의 purl 필드는 입력 문자열을 그대로 유지
   * @throws PurlParseError, HandlerError
   */
  async resolveString(input: string, options: ResolveOptions = {}): Promise<HandlerResult> {
    const purlString = input.trim();
    const purl = parsePurl(purlString);
    const validate = options.validate ?? true;
    const cacheKey = `${purlString}|validate=${validate}`;

    if (this.cache) {
      const cached = await this.cache.get(cacheKey);
      if (cached && isResultRecord(cached)) {
        logger.debug('캐시 적중', { purl: purlString });
        return fromResultRecord(cached);
      }
    }

    const resolved = await this.resolve(purl, { validate });
    const result: HandlerResult = Object.freeze({ ...resolved, purl: purlString });

    if (this.cache && result.status === 'success') {
      await this.cache.set(cacheKey, { ...toResultRecord(result) });
    }

    return result;
  }
}

let defaultResolver: PurlResolver | null = null;

/**
 * 기본 resolver 로 PURL 문자열 해석
 */
export async function getDownloadUrl(
  purlString: string,
  options: ResolveOptions = {}
): Promise<HandlerResult> {
  if (!defaultResolver) {
    defaultResolver = new PurlResolver();
  }
  return defaultResolver.resolveString(purlString, options);
}
