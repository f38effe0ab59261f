import { describe, it, expect, beforeEach } from 'vitest';
import { RubyGemsHandler, isGithubUrl } from './rubygems';
import { createPurl } from '../purl';
import { createMockHttpClient, createMockRunner, MockHttpClient } from '../../test-utils/fakes';

describe('RubyGemsHandler', () => {
  let http: MockHttpClient;
  let handler: RubyGemsHandler;

  const rails = createPurl({ ecosystem: 'gem', name: 'rails', version: '7.1.2' });

  beforeEach(() => {
    http = createMockHttpClient();
    handler = new RubyGemsHandler(http, createMockRunner());
  });

  it('rubygems.org 다운로드 URL', () => {
    expect(handler.buildDownloadUrl(rails)).toEqual({
      kind: 'found',
      target: { url: 'https://rubygems.org/downloads/rails-7.1.2.gem' },
    });
  });

  describe('getDownloadUrlFromApi', () => {
    it('gem_uri 우선', async () => {
      http.getJson.mockResolvedValue({
        gem_uri: 'https://rubygems.org/gems/rails-7.1.2.gem',
        source_code_uri: 'https://github.com/rails/rails',
      });

      await expect(handler.getDownloadUrlFromApi(rails)).resolves.toEqual({
        kind: 'found',
        target: { url: 'https://rubygems.org/gems/rails-7.1.2.gem' },
      });
      expect(http.getJson).toHaveBeenCalledWith('https://rubygems.org/api/v2/rubygems/rails/versions/7.1.2.json');
    });

    it('GitHub source_code_uri 는 .git 추가', async () => {
      http.getJson.mockResolvedValue({ source_code_uri: 'https://github.com/rails/rails/' });

      await expect(handler.getDownloadUrlFromApi(rails)).resolves.toEqual({
        kind: 'found',
        target: { url: 'https://github.com/rails/rails.git' },
      });
    });

    it('이미 .git 으로 끝나면 중복 추가하지 않음', async () => {
      http.getJson.mockResolvedValue({ source_code_uri: 'https://github.com/rails/rails.git' });

      const result = await handler.getDownloadUrlFromApi(rails);
      expect(result).toEqual({ kind: 'found', target: { url: 'https://github.com/rails/rails.git' } });
    });

    it('GitHub 가 아닌 source_code_uri 는 그대로', async () => {
      http.getJson.mockResolvedValue({ source_code_uri: 'https://gitlab.com/example/gem' });

      const result = await handler.getDownloadUrlFromApi(rails);
      expect(result).toEqual({ kind: 'found', target: { url: 'https://gitlab.com/example/gem' } });
    });

    it('homepage_uri 는 GitHub 일 때만 사용', async () => {
      http.getJson.mockResolvedValueOnce({ homepage_uri: 'https://github.com/example/gem' });
      expect(await handler.getDownloadUrlFromApi(rails)).toEqual({
        kind: 'found',
        target: { url: 'https://github.com/example/gem.git' },
      });

      http.getJson.mockResolvedValueOnce({ homepage_uri: 'https://example.com/gem' });
      expect((await handler.getDownloadUrlFromApi(rails)).kind).toBe('unavailable');
    });

    it('버전이 없으면 API 를 호출하지 않음', async () => {
      const result = await handler.getDownloadUrlFromApi(createPurl({ ecosystem: 'gem', name: 'rails' }));
      expect(result.kind).toBe('unavailable');
      expect(http.getJson).not.toHaveBeenCalled();
    });
  });

  describe('isGithubUrl', () => {
    it('github.com 호스트만 허용', () => {
      expect(isGithubUrl('https://github.com/rails/rails')).toBe(true);
      expect(isGithubUrl('http://www.github.com/rails/rails')).toBe(true);
    });

    it('경로나 다른 호스트에 포함된 github.com 은 거부', () => {
      expect(isGithubUrl('https://evil.example.com/github.com/rails')).toBe(false);
      expect(isGithubUrl('https://github.com.evil.example.com/rails')).toBe(false);
      expect(isGithubUrl('ftp://github.com/rails/rails')).toBe(false);
      expect(isGithubUrl('not a url')).toBe(false);
    });
  });

  describe('fallback', () => {
    it('gem fetch 명령 생성', () => {
      expect(handler.getFallbackCmd(rails)).toBe('gem fetch rails --version 7.1.2');
      expect(handler.getFallbackCmd(createPurl({ ecosystem: 'gem', name: 'rails' }))).toBeNull();
    });

    it('.gem URL 이 보일 때만 추출', () => {
      expect(handler.parseFallbackOutput('Fetching https://rubygems.org/gems/rails-7.1.2.gem')).toBe(
        'https://rubygems.org/gems/rails-7.1.2.gem'
      );
      expect(handler.parseFallbackOutput('Downloaded rails-7.1.2')).toBeNull();
    });
  });
});
