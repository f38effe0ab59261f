/**
 * GitHub 핸들러
 * 저장소 clone URL, raw 파일 URL, 릴리스 tarball 해석
 */

import { Purl, StepResult } from '../../types';
import { BaseHandler, found, unavailable } from './base-handler';
import type { CommandStep, FallbackCommand } from '../shared/command-runner';

const GITHUB_URL = 'https://github.com';
const GITHUB_RAW_URL = 'https://raw.githubusercontent.com';
const GITHUB_API_URL = 'https://api.github.com';

const BRANCH_VERSIONS = new Set(['main', 'master']);

interface GithubReleaseSubset {
  tarball_url?: string;
}

function archiveUrl(owner: string, repo: string, version: string): string {
  return `${GITHUB_URL}/${owner}/${repo}/archive/refs/tags/${version}.tar.gz`;
}

export class GithubHandler extends BaseHandler {
  readonly ecosystem = 'github' as const;

  /**
   * subpath 가 있으면 raw 파일 URL (버전 없으면 main), 없으면 저장소 clone URL
   */
  buildDownloadUrl(purl: Purl): StepResult {
    if (!purl.namespace) {
      return unavailable('owner (namespace) is required');
    }

    if (purl.subpath) {
      const ref = purl.version ?? 'main';
      return found(`${GITHUB_RAW_URL}/${purl.namespace}/${purl.name}/${ref}/${purl.subpath}`);
    }

    return found(`${GITHUB_URL}/${purl.namespace}/${purl.name}.git`);
  }

  async getDownloadUrlFromApi(purl: Purl): Promise<StepResult> {
    if (!purl.namespace || !purl.version) {
      return unavailable('owner and version are required');
    }

    const fallbackArchive = archiveUrl(purl.namespace, purl.name, purl.version);

    // 브랜치는 릴리스 조회 없이 바로 아카이브
    if (BRANCH_VERSIONS.has(purl.version)) {
      return found(fallbackArchive);
    }

    try {
      const release = await this.http.getJson<GithubReleaseSubset>(
        `${GITHUB_API_URL}/repos/${purl.namespace}/${purl.name}/releases/tags/${purl.version}`
      );
      return found(release.tarball_url || fallbackArchive);
    } catch {
      return found(fallbackArchive);
    }
  }

  buildFallbackCommand(purl: Purl): FallbackCommand | null {
    if (!purl.namespace) {
      return null;
    }

    const clone: CommandStep = { program: 'git', args: ['clone', `${GITHUB_URL}/${purl.namespace}/${purl.name}.git`] };
    if (!purl.version) {
      return [clone];
    }
    return [clone, { program: 'git', args: ['checkout', purl.version], cwd: purl.name }];
  }

  getPackageManagerCmd(): string[] {
    return ['git'];
  }
}
