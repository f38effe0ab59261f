/**
 * Conda 핸들러
 * build, channel, subdir 한정자로 패키지 파일 URL 조립
 */

import { Purl, StepResult } from '../../types';
import { BaseHandler, found, invalidInput, unavailable } from './base-handler';
import type { FallbackCommand } from '../shared/command-runner';

const ANACONDA_REPO_URL = 'https://repo.anaconda.com/pkgs';
const ANACONDA_ORG_URL = 'https://anaconda.org';

const DEFAULT_SEARCH_CHANNEL = 'conda-forge';

/** repo.anaconda.com/pkgs/main 으로 매핑되는 채널 */
const MAIN_CHANNELS = new Set(['main', 'defaults']);

// 확인 순서대로
const REQUIRED_QUALIFIERS = ['build', 'channel', 'subdir'] as const;

// conda search --info 출력의 "url         : <value>" 줄
const URL_LINE_PATTERN = /^\s*url\s*:\s*(\S+)/m;

export class CondaHandler extends BaseHandler {
  readonly ecosystem = 'conda' as const;

  buildDownloadUrl(purl: Purl): StepResult {
    if (!purl.version) {
      return unavailable('version is required');
    }

    const missing = REQUIRED_QUALIFIERS.find((key) => !purl.qualifiers[key]);
    if (missing) {
      return invalidInput(`Missing required qualifier: ${missing}`);
    }

    const { build, channel, subdir } = purl.qualifiers;
    const fileName = `${purl.name}-${purl.version}-${build}.tar.bz2`;

    if (MAIN_CHANNELS.has(channel)) {
      return found(`${ANACONDA_REPO_URL}/main/${subdir}/${fileName}`);
    }
    return found(`${ANACONDA_ORG_URL}/${channel}/${purl.name}/${purl.version}/download/${subdir}/${fileName}`);
  }

  async getDownloadUrlFromApi(_purl: Purl): Promise<StepResult> {
    return unavailable();
  }

  buildFallbackCommand(purl: Purl): FallbackCommand | null {
    if (!purl.version) {
      return null;
    }
    const channel = purl.qualifiers.channel || DEFAULT_SEARCH_CHANNEL;
    return [{ program: 'conda', args: ['search', '-c', channel, `${purl.name}=${purl.version}`, '--info'] }];
  }

  getPackageManagerCmd(): string[] {
    return ['conda', 'mamba', 'micromamba'];
  }

  parseFallbackOutput(output: string): string | null {
    const match = URL_LINE_PATTERN.exec(output);
    if (!match || !match[1].startsWith('http')) {
      return null;
    }
    return match[1];
  }
}
