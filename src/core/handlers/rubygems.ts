/**
 * RubyGems 핸들러
 */

import { Purl, StepResult } from '../../types';
import { BaseHandler, found, unavailable } from './base-handler';
import type { FallbackCommand } from '../shared/command-runner';

const RUBYGEMS_URL = 'https://rubygems.org';

const GITHUB_HOSTS = new Set(['github.com', 'www.github.com']);

const GEM_URL_PATTERN = /https?:\/\/\S+\.gem\b/;

/** 버전 메타데이터 응답 중 사용하는 필드 */
interface GemVersionSubset {
  gem_uri?: string;
  source_code_uri?: string;
  homepage_uri?: string;
}

/**
 * 호스트가 정확히 github.com 인 http(s) URL 인지 확인
 * 경로나 쿼리, 다른 호스트의 일부에 github.com 이 포함된 경우는 거부
 */
export function isGithubUrl(value: string): boolean {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    return false;
  }

  if (parsed.protocol !== 'https:' && parsed.protocol !== 'http:') {
    return false;
  }
  return GITHUB_HOSTS.has(parsed.hostname.toLowerCase());
}

function toGitUrl(url: string): string {
  const trimmed = url.replace(/\/+$/, '');
  return trimmed.endsWith('.git') ? trimmed : `${trimmed}.git`;
}

export class RubyGemsHandler extends BaseHandler {
  readonly ecosystem = 'gem' as const;

  buildDownloadUrl(purl: Purl): StepResult {
    if (!purl.version) {
      return unavailable('version is required');
    }
    return found(`${RUBYGEMS_URL}/downloads/${purl.name}-${purl.version}.gem`);
  }

  async getDownloadUrlFromApi(purl: Purl): Promise<StepResult> {
    if (!purl.version) {
      return unavailable('version is required');
    }

    const meta = await this.http.getJson<GemVersionSubset>(
      `${RUBYGEMS_URL}/api/v2/rubygems/${purl.name}/versions/${purl.version}.json`
    );

    if (meta.gem_uri) {
      return found(meta.gem_uri);
    }

    // source_code_uri 는 GitHub 일 때만 .git 을 붙이고 그 외에는 그대로 사용
    if (meta.source_code_uri) {
      return found(isGithubUrl(meta.source_code_uri) ? toGitUrl(meta.source_code_uri) : meta.source_code_uri);
    }

    // homepage_uri 는 GitHub 저장소만 허용
    if (meta.homepage_uri && isGithubUrl(meta.homepage_uri)) {
      return found(toGitUrl(meta.homepage_uri));
    }

    return unavailable('no usable URI in gem metadata');
  }

  buildFallbackCommand(purl: Purl): FallbackCommand | null {
    if (!purl.version) {
      return null;
    }
    return [{ program: 'gem', args: ['fetch', purl.name, '--version', purl.version] }];
  }

  getPackageManagerCmd(): string[] {
    return ['gem'];
  }

  /**
   * gem fetch 는 보통 "Downloaded <file>" 만 출력하므로 URL 이 보일 때만 사용
   */
  parseFallbackOutput(output: string): string | null {
    const match = GEM_URL_PATTERN.exec(output);
    return match ? match[0] : null;
  }
}
