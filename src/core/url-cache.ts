/**
 * PURL 해석 결과 캐시
 * 메모리 + 키별 JSON 파일 (TTL 만료)
 */

import * as fs from 'fs-extra';
import * as path from 'path';
import * as crypto from 'crypto';
import logger from '../utils/logger';
import { defaultCacheDir } from './config';
import { getErrorMessage } from './errors';

export const DEFAULT_CACHE_TTL_SECONDS = 3600;

export type CacheData = Record<string, unknown>;

interface CacheEntry {
  data: CacheData;
  /** 저장 시각 (초) */
  timestamp: number;
}

export interface UrlCacheOptions {
  cacheDir?: string;
  ttlSeconds?: number;
}

export interface UrlCacheStats {
  memoryEntries: number;
  diskEntries: number;
  totalBytes: number;
}

function nowSeconds(): number {
  return Date.now() / 1000;
}

function isCacheEntry(value: unknown): value is CacheEntry {
  if (typeof value !== 'object' || value === null) return false;
  const entry: Record<string, unknown> = { ...value };
  return (
    typeof entry.timestamp === 'number' &&
    typeof entry.data === 'object' &&
    entry.data !== null &&
    !Array.isArray(entry.data)
  );
}

export class UrlCache {
  readonly cacheDir: string;
  readonly ttlSeconds: number;
  private memory = new Map<string, CacheEntry>();

  constructor(options: UrlCacheOptions = {}) {
    this.cacheDir = options.cacheDir ?? defaultCacheDir();
    this.ttlSeconds = options.ttlSeconds ?? DEFAULT_CACHE_TTL_SECONDS;
  }

  /**
   * 키별 캐시 파일 경로 (sha256 앞 16자리)
   */
  getCachePath(key: string): string {
    const hash = crypto.createHash('sha256').update(key).digest('hex').slice(0, 16);
    return path.join(this.cacheDir, `${hash}.json`);
  }

  async get(key: string): Promise<CacheData | null> {
    const cached = this.memory.get(key);
    if (cached) {
      if (!this.isExpired(cached)) {
        return cached.data;
      }
      this.memory.delete(key);
    }

    const cachePath = this.getCachePath(key);
    if (!(await fs.pathExists(cachePath))) {
      return null;
    }

    let entry: unknown;
    try {
      entry = await fs.readJson(cachePath);
    } catch (error) {
      logger.warn('손상된 캐시 파일 삭제', { path: cachePath, error: getErrorMessage(error) });
      await this.removeFile(cachePath);
      return null;
    }

    if (!isCacheEntry(entry) || this.isExpired(entry)) {
      await this.removeFile(cachePath);
      return null;
    }

    // 디스크 적중은 메모리로 승격
    this.memory.set(key, entry);
    return entry.data;
  }

  /**
   * 메모리에는 항상 저장, 디스크 쓰기 실패는 경고만 남김
   */
  async set(key: string, data: CacheData): Promise<void> {
    const entry: CacheEntry = { data, timestamp: nowSeconds() };
    this.memory.set(key, entry);

    const cachePath = this.getCachePath(key);
    try {
      await fs.ensureDir(this.cacheDir);
      await fs.writeJson(cachePath, entry);
    } catch (error) {
      logger.warn('캐시 파일 저장 실패', { path: cachePath, error: getErrorMessage(error) });
    }
  }

  /**
   * 메모리와 디스크 캐시 모두 삭제
   */
  async clear(): Promise<void> {
    this.memory.clear();

    if (!(await fs.pathExists(this.cacheDir))) {
      return;
    }
    for (const file of await fs.readdir(this.cacheDir)) {
      if (file.endsWith('.json')) {
        await this.removeFile(path.join(this.cacheDir, file));
      }
    }
  }

  async stats(): Promise<UrlCacheStats> {
    let diskEntries = 0;
    let totalBytes = 0;

    if (await fs.pathExists(this.cacheDir)) {
      for (const file of await fs.readdir(this.cacheDir)) {
        if (!file.endsWith('.json')) continue;
        const stat = await fs.stat(path.join(this.cacheDir, file));
        diskEntries++;
        totalBytes += stat.size;
      }
    }

    return { memoryEntries: this.memory.size, diskEntries, totalBytes };
  }

  private isExpired(entry: CacheEntry): boolean {
    return nowSeconds() - entry.timestamp > this.ttlSeconds;
  }

  private async removeFile(filePath: string): Promise<void> {
    try {
      await fs.remove(filePath);
    } catch (error) {
      logger.warn('캐시 파일 삭제 실패', { path: filePath, error: getErrorMessage(error) });
    }
  }
}
