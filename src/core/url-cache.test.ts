import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs-extra';
import * as path from 'path';
import * as os from 'os';
import { UrlCache, DEFAULT_CACHE_TTL_SECONDS } from './url-cache';

describe('UrlCache', () => {
  let cacheDir: string;
  let cache: UrlCache;

  const entry = { purl: 'pkg:npm/lodash@4.17.21', download_url: 'https://example.com/lodash.tgz' };

  beforeEach(() => {
    cacheDir = fs.mkdtempSync(path.join(os.tmpdir(), 'url-cache-test-'));
    cache = new UrlCache({ cacheDir, ttlSeconds: 60 });
  });

  afterEach(async () => {
    vi.useRealTimers();
    await fs.remove(cacheDir);
  });

  it('기본 TTL 은 1시간', () => {
    expect(new UrlCache({ cacheDir }).ttlSeconds).toBe(DEFAULT_CACHE_TTL_SECONDS);
    expect(DEFAULT_CACHE_TTL_SECONDS).toBe(3600);
  });

  it('캐시 파일명은 키 해시 16자리', () => {
    const cachePath = cache.getCachePath('pkg:npm/lodash@4.17.21|validate=true');

    expect(path.dirname(cachePath)).toBe(cacheDir);
    expect(path.basename(cachePath)).toMatch(/^[0-9a-f]{16}\.json$/);
    expect(cache.getCachePath('pkg:npm/lodash@4.17.21|validate=true')).toBe(cachePath);
    expect(cache.getCachePath('pkg:npm/lodash@4.17.21|validate=false')).not.toBe(cachePath);
  });

  it('저장 후 조회', async () => {
    await cache.set('key', entry);

    await expect(cache.get('key')).resolves.toEqual(entry);
    await expect(cache.get('other')).resolves.toBeNull();
  });

  it('디스크에 저장되어 새 인스턴스에서도 조회', async () => {
    await cache.set('key', entry);

    const reopened = new UrlCache({ cacheDir, ttlSeconds: 60 });
    await expect(reopened.get('key')).resolves.toEqual(entry);
    expect((await reopened.stats()).memoryEntries).toBe(1);
  });

  it('TTL 경과 시 만료되고 파일 삭제', async () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date('2026-01-01T00:00:00Z'));
    await cache.set('key', entry);

    vi.setSystemTime(new Date('2026-01-01T00:01:00Z'));
    await expect(cache.get('key')).resolves.toEqual(entry);

    vi.setSystemTime(new Date('2026-01-01T00:01:01Z'));
    await expect(cache.get('key')).resolves.toBeNull();
    expect(await fs.pathExists(cache.getCachePath('key'))).toBe(false);
  });

  it('손상된 캐시 파일은 삭제 후 null', async () => {
    const cachePath = cache.getCachePath('key');
    await fs.writeFile(cachePath, 'not json');

    await expect(cache.get('key')).resolves.toBeNull();
    expect(await fs.pathExists(cachePath)).toBe(false);
  });

  it('형식이 맞지 않는 캐시 파일은 삭제 후 null', async () => {
    const cachePath = cache.getCachePath('key');
    await fs.writeJson(cachePath, { data: 'oops' });

    await expect(cache.get('key')).resolves.toBeNull();
    expect(await fs.pathExists(cachePath)).toBe(false);
  });

  it('디스크 저장 실패 시에도 메모리 캐시는 유지', async () => {
    const blocked = path.join(cacheDir, 'blocked');
    await fs.writeFile(blocked, '');
    const fileBacked = new UrlCache({ cacheDir: blocked, ttlSeconds: 60 });

    await expect(fileBacked.set('key', entry)).resolves.toBeUndefined();
    await expect(fileBacked.get('key')).resolves.toEqual(entry);
  });

  it('clear 는 json 파일만 삭제', async () => {
    await cache.set('a', entry);
    await cache.set('b', entry);
    await fs.writeFile(path.join(cacheDir, 'README.txt'), 'keep');

    await cache.clear();

    expect(await fs.readdir(cacheDir)).toEqual(['README.txt']);
    await expect(cache.get('a')).resolves.toBeNull();
  });

  it('stats 는 메모리, 디스크 항목 수와 크기', async () => {
    await cache.set('a', entry);
    await cache.set('b', entry);

    const stats = await cache.stats();
    const expectedBytes =
      (await fs.stat(cache.getCachePath('a'))).size + (await fs.stat(cache.getCachePath('b'))).size;

    expect(stats).toEqual({ memoryEntries: 2, diskEntries: 2, totalBytes: expectedBytes });
  });

  it('캐시 디렉토리가 없으면 비어 있음', async () => {
    const missing = new UrlCache({ cacheDir: path.join(cacheDir, 'missing') });

    await expect(missing.stats()).resolves.toEqual({ memoryEntries: 0, diskEntries: 0, totalBytes: 0 });
    await expect(missing.clear()).resolves.toBeUndefined();
  });
});
