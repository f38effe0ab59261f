import { describe, it, expect, vi, beforeEach } from 'vitest';
import axios from 'axios';
import { Readable } from 'stream';
import { HttpClient, DEFAULT_USER_AGENT } from './http-client';
import { ChecksumMismatchError } from './errors';

// axios.create 만 모킹 (isAxiosError 는 실제 구현 사용)
vi.mock('axios', async (importOriginal) => {
  const actual = await importOriginal<typeof import('axios')>();
  return { default: { ...actual.default, create: vi.fn() } };
});
const mockedAxios = vi.mocked(axios, true);

// sha256("hello")
const HELLO_SHA256 = '2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824';

function httpError(status?: number): Error {
  return Object.assign(new Error(status ? `Request failed with status code ${status}` : 'socket hang up'), {
    isAxiosError: true,
    ...(status ? { response: { status } } : {}),
  });
}

describe('HttpClient', () => {
  const mockClient = {
    get: vi.fn(),
    head: vi.fn(),
  };

  beforeEach(() => {
    vi.resetAllMocks();
    mockedAxios.create.mockReturnValue(mockClient as never);
  });

  it('타임아웃과 User-Agent 로 axios 인스턴스 생성', () => {
    const client = new HttpClient({ timeout: 5000 });

    expect(client.timeout).toBe(5000);
    expect(client.maxRetries).toBe(3);
    expect(mockedAxios.create).toHaveBeenCalledWith({
      timeout: 5000,
      maxRedirects: 5,
      headers: { 'User-Agent': DEFAULT_USER_AGENT },
    });
    expect(DEFAULT_USER_AGENT).toBe('purl-source-resolver/0.1.0');
  });

  describe('getJson', () => {
    it('JSON 응답 본문 반환', async () => {
      mockClient.get.mockResolvedValue({ status: 200, data: { name: 'lodash' } });

      const data = await new HttpClient().getJson('https://registry.npmjs.org/lodash');

      expect(data).toEqual({ name: 'lodash' });
      expect(mockClient.get).toHaveBeenCalledWith('https://registry.npmjs.org/lodash', {
        headers: { Accept: 'application/json' },
      });
    });

    it('객체가 아닌 응답은 에러', async () => {
      mockClient.get.mockResolvedValue({ status: 200, data: '<html></html>' });

      await expect(new HttpClient().getJson('https://example.com/page')).rejects.toThrow(
        'JSON 응답이 아닙니다: https://example.com/page'
      );
    });
  });

  describe('재시도', () => {
    it('5xx 응답은 재시도', async () => {
      mockClient.get.mockRejectedValueOnce(httpError(503)).mockResolvedValueOnce({ status: 200, data: { ok: true } });

      const client = new HttpClient({ maxRetries: 2, retryDelayMs: 0 });

      await expect(client.getJson('https://example.com/api')).resolves.toEqual({ ok: true });
      expect(mockClient.get).toHaveBeenCalledTimes(2);
    });

    it('네트워크 에러와 429 도 재시도', async () => {
      mockClient.get
        .mockRejectedValueOnce(httpError())
        .mockRejectedValueOnce(httpError(429))
        .mockResolvedValueOnce({ status: 200, data: 'ok' });

      const response = await new HttpClient({ maxRetries: 3, retryDelayMs: 0 }).get('https://example.com/file');

      expect(response.data).toBe('ok');
      expect(mockClient.get).toHaveBeenCalledTimes(3);
    });

    it('4xx 응답은 재시도하지 않음', async () => {
      mockClient.get.mockRejectedValue(httpError(404));

      await expect(new HttpClient({ retryDelayMs: 0 }).get('https://example.com/missing')).rejects.toThrow(
        'Request failed with status code 404'
      );
      expect(mockClient.get).toHaveBeenCalledTimes(1);
    });

    it('최대 재시도 초과 시 마지막 에러', async () => {
      mockClient.head.mockRejectedValue(httpError(500));

      await expect(new HttpClient({ maxRetries: 2, retryDelayMs: 0 }).head('https://example.com/x')).rejects.toThrow(
        'Request failed with status code 500'
      );
      expect(mockClient.head).toHaveBeenCalledTimes(3);
    });
  });

  describe('validateUrl', () => {
    it('2xx 이면 true', async () => {
      mockClient.head.mockResolvedValue({ status: 200 });

      await expect(new HttpClient().validateUrl('https://example.com/a.tgz')).resolves.toBe(true);
      expect(mockClient.head).toHaveBeenCalledWith('https://example.com/a.tgz', {
        validateStatus: expect.any(Function),
      });
    });

    it('그 외 상태 코드는 false', async () => {
      mockClient.head.mockResolvedValue({ status: 404 });

      await expect(new HttpClient().validateUrl('https://example.com/missing.tgz')).resolves.toBe(false);
    });

    it('네트워크 에러는 false', async () => {
      mockClient.head.mockRejectedValue(httpError());

      await expect(new HttpClient().validateUrl('https://example.invalid/a.tgz')).resolves.toBe(false);
      expect(mockClient.head).toHaveBeenCalledTimes(1);
    });
  });

  describe('downloadAndVerify', () => {
    it('체크섬 일치 시 내용 반환', async () => {
      mockClient.get.mockResolvedValue({ status: 200, data: Readable.from([Buffer.from('hel'), Buffer.from('lo')]) });

      const content = await new HttpClient().downloadAndVerify('https://example.com/hello.txt', HELLO_SHA256);

      expect(content.toString()).toBe('hello');
      expect(mockClient.get).toHaveBeenCalledWith('https://example.com/hello.txt', { responseType: 'stream' });
    });

    it('대소문자 구분 없이 비교', async () => {
      mockClient.get.mockResolvedValue({ status: 200, data: Readable.from([Buffer.from('hello')]) });

      await expect(
        new HttpClient().downloadAndVerify('https://example.com/hello.txt', HELLO_SHA256.toUpperCase(), 'sha256')
      ).resolves.toEqual(Buffer.from('hello'));
    });

    it('체크섬 불일치 시 ChecksumMismatchError', async () => {
      mockClient.get.mockResolvedValue({ status: 200, data: Readable.from([Buffer.from('tampered')]) });

      await expect(new HttpClient().downloadAndVerify('https://example.com/hello.txt', HELLO_SHA256)).rejects.toThrow(
        ChecksumMismatchError
      );
    });

    it('지원하지 않는 알고리즘은 요청 전에 실패', async () => {
      await expect(
        new HttpClient().downloadAndVerify('https://example.com/hello.txt', HELLO_SHA256, 'nope')
      ).rejects.toThrow('Digest method not supported');
      expect(mockClient.get).not.toHaveBeenCalled();
    });

    it('스트림 도중 에러가 나면 스트림을 닫고 전파', async () => {
      const data = new Readable({
        read() {
          this.destroy(new Error('socket reset'));
        },
      });
      mockClient.get.mockResolvedValue({ status: 200, data });

      await expect(new HttpClient().downloadAndVerify('https://example.com/hello.txt', HELLO_SHA256)).rejects.toThrow(
        'socket reset'
      );
      expect(data.destroyed).toBe(true);
    });

    it('체크섬이 없으면 검증 없이 반환', async () => {
      mockClient.get.mockResolvedValue({ status: 200, data: Readable.from([Buffer.from('anything')]) });

      await expect(new HttpClient().downloadAndVerify('https://example.com/file')).resolves.toEqual(
        Buffer.from('anything')
      );
    });
  });
});
