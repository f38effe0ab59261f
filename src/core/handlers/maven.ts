/**
 * Maven 핸들러
 * Maven Central (또는 repository_url) 레이아웃으로 아티팩트 URL 조립
 */

import { Purl, StepResult } from '../../types';
import { BaseHandler, found, unavailable } from './base-handler';
import type { FallbackCommand } from '../shared/command-runner';

export const MAVEN_CENTRAL_URL = 'https://repo.maven.apache.org/maven2';

interface MavenCoordinates {
  groupId: string;
  artifactId: string;
  version: string;
  type: string;
  classifier?: string;
  repositoryUrl?: string;
}

/**
 * PURL 에서 Maven 좌표 추출. groupId, version 이 없으면 null
 */
function toCoordinates(purl: Purl): MavenCoordinates | null {
  if (!purl.namespace || !purl.version) {
    return null;
  }

  const { qualifiers } = purl;
  // packaging=sources 는 classifier 가 없을 때만 sources 로 취급
  const classifier =
    qualifiers.classifier || (qualifiers.packaging === 'sources' ? 'sources' : undefined);

  return {
    groupId: purl.namespace,
    artifactId: purl.name,
    version: purl.version,
    type: qualifiers.type || 'jar',
    ...(classifier ? { classifier } : {}),
    ...(qualifiers.repository_url ? { repositoryUrl: qualifiers.repository_url } : {}),
  };
}

export class MavenHandler extends BaseHandler {
  readonly ecosystem = 'maven' as const;

  buildDownloadUrl(purl: Purl): StepResult {
    const coords = toCoordinates(purl);
    if (!coords) {
      return unavailable('groupId and version are required');
    }

    const base = (coords.repositoryUrl ?? MAVEN_CENTRAL_URL).replace(/\/+$/, '');
    const groupPath = coords.groupId.replace(/\./g, '/');
    const suffix = coords.classifier ? `-${coords.classifier}` : '';
    const fileName = `${coords.artifactId}-${coords.version}${suffix}.${coords.type}`;

    return found(`${base}/${groupPath}/${coords.artifactId}/${coords.version}/${fileName}`);
  }

  async getDownloadUrlFromApi(_purl: Purl): Promise<StepResult> {
    // Maven Central 검색 API는 아티팩트 URL을 제공하지 않음
    return unavailable();
  }

  buildFallbackCommand(purl: Purl): FallbackCommand | null {
    const coords = toCoordinates(purl);
    if (!coords) {
      return null;
    }

    const artifact = [coords.groupId, coords.artifactId, coords.version, coords.type];
    if (coords.classifier) {
      artifact.push(coords.classifier);
    }

    const args = ['dependency:get', `-Dartifact=${artifact.join(':')}`, '-Dtransitive=false'];
    if (coords.repositoryUrl) {
      args.push(`-DremoteRepositories=${coords.repositoryUrl}`);
    }
    return [{ program: 'mvn', args }];
  }

  getPackageManagerCmd(): string[] {
    return ['mvn'];
  }
}
