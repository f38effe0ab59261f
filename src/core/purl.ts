/**
 * PURL 파싱/직렬화
 * packageurl-js 를 감싸서 불변 Purl 모델로 변환
 */

import { PackageURL } from 'packageurl-js';
import { Purl, PurlQualifiers } from '../types';
import { PurlParseError, getErrorMessage } from './errors';

const PURL_SCHEME = 'pkg:';

/** createPurl 입력 */
export interface PurlFields {
  ecosystem: string;
  namespace?: string | null;
  name: string;
  version?: string | null;
  qualifiers?: Record<string, string> | null;
  subpath?: string | null;
}

/**
 * 필드로부터 불변 Purl 생성
 */
export function createPurl(fields: PurlFields): Purl {
  const purl: Purl = {
    ecosystem: fields.ecosystem,
    name: fields.name,
    qualifiers: Object.freeze({ ...(fields.qualifiers ?? {}) }),
    ...(fields.namespace ? { namespace: fields.namespace } : {}),
    ...(fields.version ? { version: fields.version } : {}),
    ...(fields.subpath ? { subpath: fields.subpath } : {}),
  };
  return Object.freeze(purl);
}

/**
 * PURL 문자열 파싱
 * @throws PurlParseError 스킴 누락, 이름 누락 등
 */
export function parsePurl(input: string): Purl {
  const value = input.trim();

  if (!value.startsWith(PURL_SCHEME)) {
    throw new PurlParseError(`Invalid PURL: must start with '${PURL_SCHEME}': ${input}`);
  }

  let parsed: PackageURL;
  try {
    parsed = PackageURL.fromString(normalizePurlString(value));
  } catch (error) {
    throw new PurlParseError(`Invalid PURL: ${getErrorMessage(error)}`);
  }

  if (!parsed.name) {
    throw new PurlParseError(`Invalid PURL: name is required: ${input}`);
  }

  return createPurl({
    ecosystem: parsed.type,
    namespace: parsed.namespace,
    name: parsed.name,
    version: parsed.version,
    qualifiers: parsed.qualifiers ?? undefined,
    subpath: parsed.subpath,
  });
}

/**
 * 파서가 거부하거나 잘못 디코딩하는 표기를 인코딩된 형태로 정리
 * - namespace 세그먼트 맨 앞의 `@` (npm scope) → `%40`
 * - qualifier 값의 `+` → `%2B` (공백으로 디코딩되지 않도록)
 */
function normalizePurlString(value: string): string {
  const hashIndex = value.lastIndexOf('#');
  const beforeSubpath = hashIndex === -1 ? value : value.slice(0, hashIndex);
  const subpath = hashIndex === -1 ? '' : value.slice(hashIndex);

  const queryIndex = beforeSubpath.lastIndexOf('?');
  const pathPart = queryIndex === -1 ? beforeSubpath : beforeSubpath.slice(0, queryIndex);
  const query = queryIndex === -1 ? '' : beforeSubpath.slice(queryIndex);

  // 첫 세그먼트는 pkg:type, 마지막 세그먼트는 name@version
  const segments = pathPart.split('/');
  const encodedPath = segments
    .map((segment, i) =>
      i > 0 && i < segments.length - 1 && segment.startsWith('@') ? `%40${segment.slice(1)}` : segment
    )
    .join('/');

  return encodedPath + query.replace(/\+/g, '%2B') + subpath;
}

/**
 * 정규 문자열 형태로 변환
 * pkg:ecosystem/[namespace/]name@[version][?qualifiers][#subpath]
 */
export function purlToString(purl: Purl): string {
  const qualifiers = Object.keys(purl.qualifiers).length > 0 ? { ...purl.qualifiers } : undefined;

  return new PackageURL(
    purl.ecosystem,
    purl.namespace,
    purl.name,
    purl.version,
    qualifiers,
    purl.subpath
  ).toString();
}

/**
 * 값 동등성 비교
 */
export function purlEquals(a: Purl, b: Purl): boolean {
  return (
    a.ecosystem === b.ecosystem &&
    a.namespace === b.namespace &&
    a.name === b.name &&
    a.version === b.version &&
    a.subpath === b.subpath &&
    qualifiersEqual(a.qualifiers, b.qualifiers)
  );
}

function qualifiersEqual(a: PurlQualifiers, b: PurlQualifiers): boolean {
  const keysA = Object.keys(a);
  const keysB = Object.keys(b);
  if (keysA.length !== keysB.length) return false;
  return keysA.every((key) => b[key] === a[key]);
}
