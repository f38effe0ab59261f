/**
 * Cargo 핸들러 (crates.io)
 */

import { Purl, StepResult } from '../../types';
import { BaseHandler, found, unavailable } from './base-handler';
import type { FallbackCommand } from '../shared/command-runner';

const CRATES_API_URL = 'https://crates.io/api/v1/crates';

export class CargoHandler extends BaseHandler {
  readonly ecosystem = 'cargo' as const;

  buildDownloadUrl(purl: Purl): StepResult {
    if (!purl.version) {
      return unavailable('version is required');
    }
    return found(`${CRATES_API_URL}/${purl.name}/${purl.version}/download`);
  }

  async getDownloadUrlFromApi(_purl: Purl): Promise<StepResult> {
    return unavailable();
  }

  // cargo search 출력에는 URL 이 없지만 크레이트 존재 여부 확인 용도로 제공
  buildFallbackCommand(purl: Purl): FallbackCommand | null {
    return [{ program: 'cargo', args: ['search', purl.name, '--limit', '1'] }];
  }

  getPackageManagerCmd(): string[] {
    return ['cargo'];
  }
}
