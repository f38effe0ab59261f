/**
 * npm 핸들러
 * registry.npmjs.org tarball 규칙 및 packument API 사용
 */

import { Purl, StepResult } from '../../types';
import { BaseHandler, found, unavailable } from './base-handler';
import type { FallbackCommand } from '../shared/command-runner';

const NPM_REGISTRY_URL = 'https://registry.npmjs.org';

/** packument 에서 사용하는 필드만 정의 */
interface NpmPackumentSubset {
  versions?: Record<string, { dist?: { tarball?: string } }>;
}

/** scope 포함 패키지 전체 이름 (@scope/name) */
function fullName(purl: Purl): string {
  return purl.namespace ? `${purl.namespace}/${purl.name}` : purl.name;
}

export class NpmHandler extends BaseHandler {
  readonly ecosystem = 'npm' as const;

  buildDownloadUrl(purl: Purl): StepResult {
    if (!purl.version) {
      return unavailable('version is required');
    }
    return found(`${NPM_REGISTRY_URL}/${fullName(purl)}/-/${purl.name}-${purl.version}.tgz`);
  }

  async getDownloadUrlFromApi(purl: Purl): Promise<StepResult> {
    if (!purl.version) {
      return unavailable('version is required');
    }

    // scoped 패키지는 @scope%2Fname 형태로 조회
    const packumentName = purl.namespace
      ? `${purl.namespace}%2F${purl.name}`
      : purl.name;
    const packument = await this.http.getJson<NpmPackumentSubset>(`${NPM_REGISTRY_URL}/${packumentName}`);
    const tarball = packument.versions?.[purl.version]?.dist?.tarball;

    return tarball ? found(tarball) : unavailable(`version ${purl.version} not in registry`);
  }

  buildFallbackCommand(purl: Purl): FallbackCommand | null {
    if (!purl.version) {
      return null;
    }
    return [{ program: 'npm', args: ['view', `${fullName(purl)}@${purl.version}`, 'dist.tarball'] }];
  }

  getPackageManagerCmd(): string[] {
    return ['npm'];
  }

  /**
   * `npm view ... dist.tarball` 출력의 첫 줄
   */
  parseFallbackOutput(output: string): string | null {
    const firstLine = output.trim().split('\n')[0]?.trim() ?? '';
    return firstLine.startsWith('http') ? firstLine : null;
  }
}
