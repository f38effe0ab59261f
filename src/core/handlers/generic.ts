/**
 * generic 핸들러
 * download_url / vcs_url 한정자로 직접 지정된 소스 사용
 */

import { Purl, ResolvedTarget, StepResult } from '../../types';
import { BaseHandler, found, unavailable } from './base-handler';
import type { CommandStep, FallbackCommand } from '../shared/command-runner';

const DEFAULT_CHECKSUM_ALGORITHM = 'sha256';

/**
 * vcs_url 정규화: `git+` 접두사 제거, 마지막 경로 뒤의 `@commit` 분리
 */
export function parseVcsUrl(vcsUrl: string): ResolvedTarget {
  const url = vcsUrl.startsWith('git+') ? vcsUrl.slice('git+'.length) : vcsUrl;

  const at = url.lastIndexOf('@');
  if (at > url.lastIndexOf('/') && at < url.length - 1) {
    return { url: url.slice(0, at), commit: url.slice(at + 1) };
  }
  return { url };
}

/**
 * checksum 한정자 파싱 (`[algorithm:]hexdigest`)
 */
export function parseChecksum(checksum: string): { algorithm: string; digest: string } {
  const sep = checksum.indexOf(':');
  if (sep === -1) {
    return { algorithm: DEFAULT_CHECKSUM_ALGORITHM, digest: checksum };
  }
  return {
    algorithm: checksum.slice(0, sep).toLowerCase() || DEFAULT_CHECKSUM_ALGORITHM,
    digest: checksum.slice(sep + 1),
  };
}

export class GenericHandler extends BaseHandler {
  readonly ecosystem = 'generic' as const;

  buildDownloadUrl(purl: Purl): StepResult {
    const { download_url: downloadUrl, vcs_url: vcsUrl } = purl.qualifiers;

    if (downloadUrl) {
      return found(downloadUrl);
    }
    if (vcsUrl) {
      const target = parseVcsUrl(vcsUrl);
      return found(target.url, target.commit);
    }
    return unavailable('download_url or vcs_url qualifier is required');
  }

  async getDownloadUrlFromApi(_purl: Purl): Promise<StepResult> {
    return unavailable();
  }

  buildFallbackCommand(purl: Purl): FallbackCommand | null {
    const vcsUrl = purl.qualifiers.vcs_url;
    if (!vcsUrl) {
      return null;
    }

    const { url, commit } = parseVcsUrl(vcsUrl);
    const clone: CommandStep = { program: 'git', args: ['clone', url] };
    return commit ? [clone, { program: 'git', args: ['checkout', commit] }] : [clone];
  }

  getPackageManagerCmd(): string[] {
    return ['git'];
  }

  /**
   * download_url 에 checksum 이 지정되어 있으면 내려받아 비교
   * @throws ChecksumMismatchError
   */
  protected async verifyResolved(purl: Purl, target: ResolvedTarget, validate: boolean): Promise<void> {
    const { checksum, download_url: downloadUrl } = purl.qualifiers;
    if (!validate || !checksum || target.url !== downloadUrl) {
      return;
    }

    const { algorithm, digest } = parseChecksum(checksum);
    await this.http.downloadAndVerify(target.url, digest, algorithm);
  }
}
