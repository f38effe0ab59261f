/**
 * HTTP 클라이언트
 * 레지스트리 API 조회, URL 검증, 체크섬 검증 다운로드 수행
 */

import axios, { AxiosInstance, AxiosResponse } from 'axios';
import * as crypto from 'crypto';
import { Readable } from 'stream';
import logger from '../utils/logger';
import { ChecksumMismatchError } from './errors';

const PACKAGE_VERSION = '0.1.0';

export const DEFAULT_USER_AGENT = `purl-source-resolver/${PACKAGE_VERSION}`;

/**
 * 핸들러가 사용하는 HTTP 인터페이스
 */
export interface IHttpClient {
  get(url: string): Promise<AxiosResponse<unknown>>;
  head(url: string): Promise<AxiosResponse<unknown>>;
  getJson<T = unknown>(url: string): Promise<T>;
  /** HEAD 요청이 2xx 이면 true, 네트워크 에러 포함 그 외 모두 false */
  validateUrl(url: string): Promise<boolean>;
  /** @throws ChecksumMismatchError 체크섬 불일치 */
  downloadAndVerify(url: string, expectedChecksum?: string, algorithm?: string): Promise<Buffer>;
}

export interface HttpClientOptions {
  /** 요청 타임아웃 (ms) */
  timeout?: number;
  maxRetries?: number;
  /** 재시도 간격 기본값 (ms), 시도 횟수만큼 곱해짐 */
  retryDelayMs?: number;
  userAgent?: string;
}

/**
 * axios 기반 HTTP 클라이언트
 */
export class HttpClient implements IHttpClient {
  readonly timeout: number;
  readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private client: AxiosInstance;

  constructor(options: HttpClientOptions = {}) {
    this.timeout = options.timeout ?? 30000;
    this.maxRetries = options.maxRetries ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 1000;
    this.client = axios.create({
      timeout: this.timeout,
      maxRedirects: 5,
      headers: {
        'User-Agent': options.userAgent ?? DEFAULT_USER_AGENT,
      },
    });
  }

  async get(url: string): Promise<AxiosResponse<unknown>> {
    return this.withRetry(url, () => this.client.get<unknown>(url));
  }

  async head(url: string): Promise<AxiosResponse<unknown>> {
    return this.withRetry(url, () => this.client.head<unknown>(url));
  }

  /**
   * JSON 응답 조회
   */
  async getJson<T = unknown>(url: string): Promise<T> {
    const response = await this.withRetry(url, () =>
      this.client.get<T>(url, { headers: { Accept: 'application/json' } })
    );

    if (typeof response.data !== 'object' || response.data === null) {
      throw new Error(`JSON 응답이 아닙니다: ${url}`);
    }

    return response.data;
  }

  /**
   * URL 존재 여부 확인 (HEAD, 리다이렉트 추적)
   */
  async validateUrl(url: string): Promise<boolean> {
    try {
      const response = await this.client.head(url, {
        validateStatus: () => true,
      });
      return response.status >= 200 && response.status < 300;
    } catch (error) {
      logger.debug('URL 검증 실패', { url, error: axios.isAxiosError(error) ? error.message : error });
      return false;
    }
  }

  /**
   * 스트리밍 다운로드 후 체크섬 검증
   * 체크섬이 없으면 검증 없이 내용만 반환
   */
  async downloadAndVerify(
    url: string,
    expectedChecksum?: string,
    algorithm = 'sha256'
  ): Promise<Buffer> {
    // 지원하지 않는 알고리즘은 요청 전에 실패
    const hash = crypto.createHash(algorithm);

    const response = await this.withRetry(url, () =>
      this.client.get<Readable>(url, { responseType: 'stream' })
    );

    const chunks: Buffer[] = [];
    try {
      for await (const chunk of response.data) {
        const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
        hash.update(buffer);
        chunks.push(buffer);
      }
    } catch (error) {
      response.data.destroy();
      throw error;
    }

    const content = Buffer.concat(chunks);

    if (expectedChecksum) {
      const actual = hash.digest('hex');
      if (actual.toLowerCase() !== expectedChecksum.toLowerCase()) {
        throw new ChecksumMismatchError(expectedChecksum, actual);
      }
      logger.debug('체크섬 검증 완료', { url, algorithm });
    }

    return content;
  }

  /**
   * 네트워크 에러, 5xx, 429 응답만 재시도
   */
  private async withRetry<T>(url: string, request: () => Promise<T>): Promise<T> {
    let attempt = 0;

    for (;;) {
      try {
        return await request();
      } catch (error) {
        attempt++;
        if (attempt > this.maxRetries || !isRetryable(error)) {
          throw error;
        }

        logger.debug('HTTP 요청 재시도', { url, attempt, maxRetries: this.maxRetries });
        await new Promise((resolve) => setTimeout(resolve, this.retryDelayMs * attempt));
      }
    }
  }
}

function isRetryable(error: unknown): boolean {
  if (!axios.isAxiosError(error)) {
    return false;
  }

  const status = error.response?.status;
  if (status === undefined) {
    // 응답 없음 = 네트워크 에러 / 타임아웃
    return true;
  }

  return status >= 500 || status === 429;
}
