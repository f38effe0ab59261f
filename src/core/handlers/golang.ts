/**
 * Go 모듈 핸들러 (proxy.golang.org)
 */

import { Purl, StepResult } from '../../types';
import { BaseHandler, found, unavailable } from './base-handler';
import type { FallbackCommand } from '../shared/command-runner';

const GO_PROXY_URL = 'https://proxy.golang.org';

function modulePath(purl: Purl): string {
  return purl.namespace ? `${purl.namespace}/${purl.name}` : purl.name;
}

/**
 * 모듈 경로의 `/` 만 %2F 로 인코딩 (점 등은 유지)
 */
export function encodeModulePath(path: string): string {
  return path.replace(/\//g, '%2F');
}

function zipUrl(module: string, version: string): string {
  return `${GO_PROXY_URL}/${encodeModulePath(module)}/@v/${version}.zip`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class GolangHandler extends BaseHandler {
  readonly ecosystem = 'golang' as const;

  buildDownloadUrl(purl: Purl): StepResult {
    if (!purl.version) {
      return unavailable('version is required');
    }
    return found(zipUrl(modulePath(purl), purl.version));
  }

  /**
   * .info 엔드포인트로 버전 존재를 확인한 뒤 zip URL 반환
   */
  async getDownloadUrlFromApi(purl: Purl): Promise<StepResult> {
    if (!purl.version) {
      return unavailable('version is required');
    }

    const module = modulePath(purl);
    try {
      await this.http.get(`${GO_PROXY_URL}/${encodeModulePath(module)}/@v/${purl.version}.info`);
    } catch {
      return unavailable('module version not found on proxy');
    }
    return found(zipUrl(module, purl.version));
  }

  buildFallbackCommand(purl: Purl): FallbackCommand | null {
    if (!purl.version) {
      return null;
    }
    return [{ program: 'go', args: ['mod', 'download', '-json', `${modulePath(purl)}@${purl.version}`] }];
  }

  getPackageManagerCmd(): string[] {
    return ['go'];
  }

  /**
   * `go mod download -json` 의 Path, Version 으로 zip URL 재구성
   */
  parseFallbackOutput(output: string): string | null {
    let data: unknown;
    try {
      data = JSON.parse(output);
    } catch {
      return null;
    }

    if (!isRecord(data)) {
      return null;
    }
    const { Path, Version } = data;
    if (typeof Path !== 'string' || typeof Version !== 'string' || !Path || !Version) {
      return null;
    }
    return zipUrl(Path, Version);
  }
}
