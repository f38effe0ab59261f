// ============================================
// PURL 관련 타입
// ============================================

/** 지원하는 에코시스템 (PURL type) */
export type Ecosystem =
  | 'npm'
  | 'pypi'
  | 'maven'
  | 'cargo'
  | 'nuget'
  | 'gem'
  | 'golang'
  | 'github'
  | 'conda'
  | 'generic';

/** PURL 한정자 (qualifier) */
export type PurlQualifiers = Readonly<Record<string, string>>;

/**
 * 파싱된 Package URL
 * 생성 후 변경 불가 (freeze 됨)
 */
export interface Purl {
  readonly ecosystem: string;
  readonly namespace?: string;
  readonly name: string;
  readonly version?: string;
  readonly qualifiers: PurlQualifiers;
  readonly subpath?: string;
}

// ============================================
// 해석 결과 관련 타입
// ============================================

/** 다운로드 URL을 얻어낸 단계 */
export type ResolutionMethod = 'direct' | 'api' | 'fallback' | 'none';

/** 해석 상태 */
export type ResolutionStatus = 'success' | 'failed';

/** PURL 해석 결과 */
export interface HandlerResult {
  /** 입력으로 받은 PURL 문자열 */
  readonly purl: string;
  readonly downloadUrl?: string;
  readonly validated: boolean;
  readonly method: ResolutionMethod;
  readonly fallbackCommand?: string;
  readonly fallbackAvailable: boolean;
  readonly error?: string;
  readonly status: ResolutionStatus;
}

/** 직렬화용 레코드 (JSON/CSV 출력, 캐시 저장) */
export interface HandlerResultRecord {
  purl: string;
  download_url?: string;
  validated: boolean;
  method: ResolutionMethod;
  fallback_command?: string;
  fallback_available: boolean;
  error?: string;
  status: ResolutionStatus;
}

/** 해석 대상 (URL + 선택적 VCS 커밋) */
export interface ResolvedTarget {
  url: string;
  /** generic vcs_url 의 `@commit` 부분 */
  commit?: string;
}

/**
 * 각 해석 단계의 결과
 * - found: URL 확보
 * - unavailable: 이 단계로는 URL을 얻을 수 없음 (다음 단계로 진행)
 * - invalid-input: 입력 PURL 자체가 잘못됨 (호출자에게 전파)
 */
export type StepResult =
  | { kind: 'found'; target: ResolvedTarget }
  | { kind: 'unavailable'; reason?: string }
  | { kind: 'invalid-input'; message: string };

/** resolve 옵션 */
export interface ResolveOptions {
  /** HTTP 검증 여부 (기본값 true) */
  validate?: boolean;
}

// ============================================
// 출력 관련 타입
// ============================================

/** CLI 출력 형식 */
export type OutputFormat = 'plain' | 'json' | 'csv';
