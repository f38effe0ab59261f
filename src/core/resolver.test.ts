import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs-extra';
import * as path from 'path';
import * as os from 'os';
import { PurlResolver, getDownloadUrl } from './resolver';
import { createHandlerRegistry } from './handlers';
import { UrlCache } from './url-cache';
import { createPurl } from './purl';
import { HandlerError, PurlParseError } from './errors';
import { createMockHttpClient, createMockRunner, MockHttpClient, MockRunner } from '../test-utils/fakes';
import { HandlerResult } from '../types';

describe('PurlResolver', () => {
  let http: MockHttpClient;
  let runner: MockRunner;
  let resolver: PurlResolver;

  beforeEach(() => {
    http = createMockHttpClient();
    runner = createMockRunner();
    resolver = new PurlResolver({ registry: createHandlerRegistry({ http, runner }) });
  });

  describe('resolveString', () => {
    it('PURL 문자열 해석', async () => {
      const result = await resolver.resolveString('pkg:npm/lodash@4.17.21');

      expect(result).toEqual({
        purl: 'pkg:npm/lodash@4.17.21',
        downloadUrl: 'https://registry.npmjs.org/lodash/-/lodash-4.17.21.tgz',
        validated: true,
        method: 'direct',
        fallbackCommand: 'npm view lodash@4.17.21 dist.tarball',
        fallbackAvailable: true,
        status: 'success',
      });
    });

    it('결과의 purl 은 앞뒤 공백을 제거한 입력 문자열', async () => {
      const result = await resolver.resolveString('  pkg:npm/%40babel/core@7.24.0\n', { validate: false });

      expect(result.purl).toBe('pkg:npm/%40babel/core@7.24.0');
      expect(result.downloadUrl).toBe('https://registry.npmjs.org/@babel/core/-/core-7.24.0.tgz');
      expect(result.validated).toBe(false);
    });

    it('인코딩하지 않은 npm scope 도 해석', async () => {
      const result = await resolver.resolveString('pkg:npm/@angular/core@12.0.0', { validate: false });

      expect(result.purl).toBe('pkg:npm/@angular/core@12.0.0');
      expect(result.downloadUrl).toBe('https://registry.npmjs.org/@angular/core/-/core-12.0.0.tgz');
      expect(result.status).toBe('success');
    });

    it('잘못된 PURL 은 PurlParseError', async () => {
      await expect(resolver.resolveString('lodash@4.17.21')).rejects.toThrow(PurlParseError);
    });

    it('지원하지 않는 에코시스템은 HandlerError', async () => {
      await expect(resolver.resolveString('pkg:hex/phoenix@1.7.0')).rejects.toThrow(
        new HandlerError('Unsupported ecosystem: hex')
      );
    });
  });

  describe('resolve', () => {
    it('Purl 객체 해석 시 purl 은 정규 문자열', async () => {
      const purl = createPurl({ ecosystem: 'cargo', name: 'serde', version: '1.0.193' });

      const result = await resolver.resolve(purl, { validate: false });

      expect(result.purl).toBe('pkg:cargo/serde@1.0.193');
      expect(result.downloadUrl).toBe('https://crates.io/api/v1/crates/serde/1.0.193/download');
    });
  });

  describe('getDownloadUrl', () => {
    afterEach(() => {
      vi.restoreAllMocks();
    });

    it('기본 resolver 의 resolveString 에 위임', async () => {
      const expected: HandlerResult = {
        purl: 'pkg:npm/lodash@4.17.21',
        downloadUrl: 'https://registry.npmjs.org/lodash/-/lodash-4.17.21.tgz',
        validated: false,
        method: 'direct',
        fallbackAvailable: false,
        status: 'success',
      };
      const spy = vi.spyOn(PurlResolver.prototype, 'resolveString').mockResolvedValue(expected);

      await expect(getDownloadUrl('pkg:npm/lodash@4.17.21', { validate: false })).resolves.toBe(expected);
      await expect(getDownloadUrl('pkg:npm/lodash@4.17.21')).resolves.toBe(expected);

      expect(spy).toHaveBeenCalledTimes(2);
      expect(spy).toHaveBeenNthCalledWith(1, 'pkg:npm/lodash@4.17.21', { validate: false });
      expect(spy).toHaveBeenNthCalledWith(2, 'pkg:npm/lodash@4.17.21', {});
    });
  });

  describe('캐시', () => {
    let cacheDir: string;
    let cache: UrlCache;
    let cachedResolver: PurlResolver;

    beforeEach(() => {
      cacheDir = fs.mkdtempSync(path.join(os.tmpdir(), 'resolver-cache-test-'));
      cache = new UrlCache({ cacheDir });
      cachedResolver = new PurlResolver({ registry: createHandlerRegistry({ http, runner }), cache });
    });

    afterEach(async () => {
      await fs.remove(cacheDir);
    });

    it('성공 결과는 캐시에서 재사용', async () => {
      const first = await cachedResolver.resolveString('pkg:npm/lodash@4.17.21');
      const second = await cachedResolver.resolveString('pkg:npm/lodash@4.17.21');

      expect(second).toEqual(first);
      expect(http.validateUrl).toHaveBeenCalledTimes(1);
      await expect(cache.get('pkg:npm/lodash@4.17.21|validate=true')).resolves.toEqual({
        purl: 'pkg:npm/lodash@4.17.21',
        download_url: 'https://registry.npmjs.org/lodash/-/lodash-4.17.21.tgz',
        validated: true,
        method: 'direct',
        fallback_command: 'npm view lodash@4.17.21 dist.tarball',
        fallback_available: true,
        status: 'success',
      });
    });

    it('validate 값이 다르면 별도 캐시 키', async () => {
      await cachedResolver.resolveString('pkg:npm/lodash@4.17.21', { validate: true });
      const unvalidated = await cachedResolver.resolveString('pkg:npm/lodash@4.17.21', { validate: false });

      expect(unvalidated.validated).toBe(false);
      await expect(cache.get('pkg:npm/lodash@4.17.21|validate=false')).resolves.not.toBeNull();
    });

    it('실패 결과는 캐시하지 않음', async () => {
      http.validateUrl.mockResolvedValue(false);
      http.getJson.mockRejectedValue(new Error('Request failed with status code 404'));
      runner.isAvailable.mockReturnValue(false);

      const first = await cachedResolver.resolveString('pkg:npm/missing-package@0.0.1');
      await cachedResolver.resolveString('pkg:npm/missing-package@0.0.1');

      expect(first.status).toBe('failed');
      expect(http.getJson).toHaveBeenCalledTimes(2);
      await expect(cache.get('pkg:npm/missing-package@0.0.1|validate=true')).resolves.toBeNull();
    });

    it('형식이 맞지 않는 캐시 값은 무시', async () => {
      await cache.set('pkg:npm/lodash@4.17.21|validate=true', { unexpected: true });

      const result = await cachedResolver.resolveString('pkg:npm/lodash@4.17.21');

      expect(result.status).toBe('success');
      expect(http.validateUrl).toHaveBeenCalledTimes(1);
    });
  });
});
