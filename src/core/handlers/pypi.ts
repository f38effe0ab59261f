/**
 * PyPI 핸들러
 * sdist(.tar.gz) 우선으로 소스 배포본 URL 해석
 */

import { Purl, StepResult } from '../../types';
import { BaseHandler, found, unavailable } from './base-handler';
import type { FallbackCommand } from '../shared/command-runner';

const PYPI_SOURCE_URL = 'https://pypi.python.org/packages/source';
const PYPI_JSON_API_URL = 'https://pypi.org/pypi';

/** PyPI JSON API 배포 파일 항목 */
interface PyPIReleaseFile {
  url?: string;
  packagetype?: string;
}

/** PyPI JSON API 응답 중 사용하는 필드 */
interface PyPIProjectSubset {
  releases?: Record<string, PyPIReleaseFile[]>;
  urls?: PyPIReleaseFile[];
}

// pip download 출력: "Downloading <url>" 또는 "... from <url>"
const PIP_URL_PATTERN = /(?:Downloading|from)\s+(https?:\/\/\S+)/;

/**
 * sdist 우선, 없으면 .tar.gz 로 끝나는 URL
 */
export function selectSourceDistribution(files: readonly PyPIReleaseFile[]): string | null {
  const sdist = files.find((file) => file.packagetype === 'sdist' && file.url);
  if (sdist?.url) {
    return sdist.url;
  }

  const tarball = files.find((file) => file.url?.endsWith('.tar.gz'));
  return tarball?.url ?? null;
}

export class PyPIHandler extends BaseHandler {
  readonly ecosystem = 'pypi' as const;

  buildDownloadUrl(purl: Purl): StepResult {
    if (!purl.version) {
      return unavailable('version is required');
    }

    const letter = (purl.namespace ?? purl.name).charAt(0).toLowerCase();
    return found(`${PYPI_SOURCE_URL}/${letter}/${purl.name}/${purl.name}-${purl.version}.tar.gz`);
  }

  async getDownloadUrlFromApi(purl: Purl): Promise<StepResult> {
    const project = await this.http.getJson<PyPIProjectSubset>(`${PYPI_JSON_API_URL}/${purl.name}/json`);

    let files: PyPIReleaseFile[] | undefined;
    if (purl.version) {
      files = project.releases?.[purl.version];
      if (!files) {
        return unavailable(`release ${purl.version} not found`);
      }
    } else {
      // 버전이 없으면 최신 릴리스
      files = project.urls ?? [];
    }

    const url = selectSourceDistribution(files);
    return url ? found(url) : unavailable('no source distribution');
  }

  buildFallbackCommand(purl: Purl): FallbackCommand | null {
    if (!purl.version) {
      return null;
    }
    const requirement = encodeURIComponent(`${purl.name}==${purl.version}`);
    return [{ program: 'pip', args: ['download', '--no-deps', '--no-binary', ':all:', requirement] }];
  }

  getPackageManagerCmd(): string[] {
    return ['pip', 'pip3'];
  }

  parseFallbackOutput(output: string): string | null {
    for (const line of output.split('\n')) {
      const match = PIP_URL_PATTERN.exec(line);
      if (match) {
        return match[1];
      }
    }
    return null;
  }
}
