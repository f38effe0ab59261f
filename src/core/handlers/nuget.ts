/**
 * NuGet 핸들러
 * v3 flat container 는 이름과 버전 모두 소문자 경로 사용
 */

import { Purl, StepResult } from '../../types';
import { BaseHandler, found, unavailable } from './base-handler';
import type { FallbackCommand } from '../shared/command-runner';

const NUGET_FLAT_CONTAINER_URL = 'https://api.nuget.org/v3-flatcontainer';

export class NuGetHandler extends BaseHandler {
  readonly ecosystem = 'nuget' as const;

  buildDownloadUrl(purl: Purl): StepResult {
    if (!purl.version) {
      return unavailable('version is required');
    }

    const name = purl.name.toLowerCase();
    const version = purl.version.toLowerCase();
    return found(`${NUGET_FLAT_CONTAINER_URL}/${name}/${version}/${name}.${version}.nupkg`);
  }

  async getDownloadUrlFromApi(_purl: Purl): Promise<StepResult> {
    return unavailable();
  }

  buildFallbackCommand(purl: Purl): FallbackCommand | null {
    if (!purl.version) {
      return null;
    }
    return [{ program: 'dotnet', args: ['nuget', 'list', 'source'] }];
  }

  getPackageManagerCmd(): string[] {
    return ['nuget', 'dotnet'];
  }
}
