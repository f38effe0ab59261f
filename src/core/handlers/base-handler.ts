/**
 * 에코시스템 핸들러 공통 로직
 * direct → api → fallback 순서로 다운로드 URL을 해석
 */

import {
  Ecosystem,
  HandlerResult,
  Purl,
  ResolutionMethod,
  ResolveOptions,
  ResolvedTarget,
  StepResult,
} from '../../types';
import { IHttpClient } from '../http-client';
import {
  FALLBACK_TIMEOUT_MS,
  FallbackCommand,
  ICommandRunner,
  formatCommand,
} from '../shared/command-runner';
import {
  CommandFailedError,
  CommandTimeoutError,
  HandlerError,
  getErrorMessage,
} from '../errors';
import { purlToString } from '../purl';
import logger from '../../utils/logger';

export const RESOLVE_FAILED_MESSAGE = 'Failed to resolve download URL';

/** URL 확보 */
export function found(url: string, commit?: string): StepResult {
  return { kind: 'found', target: commit ? { url, commit } : { url } };
}

/** 이 단계로는 URL을 얻을 수 없음 */
export function unavailable(reason?: string): StepResult {
  return reason ? { kind: 'unavailable', reason } : { kind: 'unavailable' };
}

/** 입력 PURL 자체가 잘못됨 */
export function invalidInput(message: string): StepResult {
  return { kind: 'invalid-input', message };
}

/**
 * 에코시스템 핸들러 인터페이스
 */
export interface EcosystemHandler {
  readonly ecosystem: Ecosystem;

  /** 레지스트리 규칙으로 URL 조립 (네트워크 사용 안 함) */
  buildDownloadUrl(purl: Purl): StepResult;
  /** 레지스트리 메타데이터 API 조회 */
  getDownloadUrlFromApi(purl: Purl): Promise<StepResult>;
  /** fallback 명령 (실행 파일과 인자 배열, 쉘을 거치지 않음) */
  buildFallbackCommand(purl: Purl): FallbackCommand | null;
  /** 표시용 fallback 명령 문자열 */
  getFallbackCmd(purl: Purl): string | null;
  /** 후보 실행 파일 이름 (하나라도 있으면 fallback 가능) */
  getPackageManagerCmd(): string[];
  parseFallbackOutput(output: string): string | null;

  resolve(purl: Purl, options?: ResolveOptions): Promise<HandlerResult>;
  isPackageManagerAvailable(): boolean;
  executeFallbackCommand(purl: Purl, command?: FallbackCommand | null): Promise<string | null>;
}

type Step = {
  method: Exclude<ResolutionMethod, 'none'>;
  run: () => StepResult | Promise<StepResult>;
};

/**
 * 핸들러 기본 클래스
 */
export abstract class BaseHandler implements EcosystemHandler {
  abstract readonly ecosystem: Ecosystem;

  constructor(
    protected readonly http: IHttpClient,
    protected readonly runner: ICommandRunner
  ) {}

  abstract buildDownloadUrl(purl: Purl): StepResult;
  abstract getDownloadUrlFromApi(purl: Purl): Promise<StepResult>;
  abstract buildFallbackCommand(purl: Purl): FallbackCommand | null;
  abstract getPackageManagerCmd(): string[];

  getFallbackCmd(purl: Purl): string | null {
    const command = this.buildFallbackCommand(purl);
    return command && command.length > 0 ? formatCommand(command) : null;
  }

  parseFallbackOutput(_output: string): string | null {
    return null;
  }

  /**
   * URL 확정 후 추가 검증 (체크섬 등)
   * 에러를 던지면 해당 URL을 유지한 채 실패 결과가 됨
   */
  protected async verifyResolved(
    _purl: Purl,
    _target: ResolvedTarget,
    _validate: boolean
  ): Promise<void> {
    // 기본 구현은 추가 검증 없음
  }

  /**
   * 다운로드 URL 해석
   * @throws HandlerError 입력 PURL이 잘못된 경우
   */
  async resolve(purl: Purl, options: ResolveOptions = {}): Promise<HandlerResult> {
    const validate = options.validate ?? true;
    const purlString = purlToString(purl);

    // fallback 명령은 가장 먼저 한 번만 계산
    const fallbackSteps = this.buildFallbackCommand(purl);
    const fallbackCommand = fallbackSteps && fallbackSteps.length > 0 ? formatCommand(fallbackSteps) : null;
    const fallbackAvailable = fallbackCommand !== null && this.isPackageManagerAvailable();

    const base = {
      purl: purlString,
      fallbackAvailable,
      ...(fallbackCommand !== null ? { fallbackCommand } : {}),
    };

    const steps: Step[] = [
      { method: 'direct', run: () => this.buildDownloadUrl(purl) },
      { method: 'api', run: () => this.getDownloadUrlFromApi(purl) },
    ];
    if (fallbackAvailable) {
      steps.push({
        method: 'fallback',
        run: async () => {
          const url = await this.executeFallbackCommand(purl, fallbackSteps);
          return url ? found(url) : unavailable('fallback output had no URL');
        },
      });
    }

    for (const step of steps) {
      const target = await this.runStep(purlString, step, validate);
      if (!target) continue;

      try {
        await this.verifyResolved(purl, target, validate);
      } catch (error) {
        logger.warn('다운로드 URL 검증 실패', { purl: purlString, url: target.url, error: getErrorMessage(error) });
        return Object.freeze({
          ...base,
          downloadUrl: target.url,
          validated: false,
          method: step.method,
          error: getErrorMessage(error),
          status: 'failed' as const,
        });
      }

      logger.debug('다운로드 URL 해석 완료', { purl: purlString, method: step.method, url: target.url });
      return Object.freeze({
        ...base,
        downloadUrl: target.url,
        validated: validate,
        method: step.method,
        status: 'success' as const,
      });
    }

    return Object.freeze({
      ...base,
      validated: false,
      method: 'none' as const,
      error: RESOLVE_FAILED_MESSAGE,
      status: 'failed' as const,
    });
  }

  /**
   * 단계 실행. 확보한 URL이 검증을 통과하면 대상 반환, 아니면 null
   */
  private async runStep(
    purlString: string,
    step: Step,
    validate: boolean
  ): Promise<ResolvedTarget | null> {
    let outcome: StepResult;
    try {
      outcome = await step.run();
    } catch (error) {
      logger.debug('해석 단계 실패', { purl: purlString, method: step.method, error: getErrorMessage(error) });
      return null;
    }

    if (outcome.kind === 'invalid-input') {
      throw new HandlerError(outcome.message);
    }
    if (outcome.kind === 'unavailable') {
      logger.debug('해석 단계 결과 없음', { purl: purlString, method: step.method, reason: outcome.reason });
      return null;
    }

    if (validate) {
      const valid = await this.http.validateUrl(outcome.target.url).catch((error: unknown) => {
        logger.debug('URL 검증 중 오류', { url: outcome.target.url, error: getErrorMessage(error) });
        return false;
      });
      if (!valid) {
        logger.debug('URL 검증 실패, 다음 단계로 진행', { purl: purlString, method: step.method, url: outcome.target.url });
        return null;
      }
    }

    return outcome.target;
  }

  /**
   * 후보 패키지 매니저 중 하나라도 PATH 에 있으면 true
   */
  isPackageManagerAvailable(): boolean {
    return this.getPackageManagerCmd().some((cmd) => this.runner.isAvailable(cmd));
  }

  /**
   * fallback 명령 실행 후 출력에서 URL 추출
   * @throws HandlerError 타임아웃, 명령 실패
   */
  async executeFallbackCommand(
    purl: Purl,
    command: FallbackCommand | null = this.buildFallbackCommand(purl)
  ): Promise<string | null> {
    if (!command || command.length === 0) {
      return null;
    }

    let output: string;
    try {
      output = await this.runner.run(command, FALLBACK_TIMEOUT_MS);
    } catch (error) {
      if (error instanceof CommandTimeoutError) {
        throw new HandlerError(error.message);
      }
      if (error instanceof CommandFailedError) {
        throw new HandlerError(`Command failed: ${error.message}`);
      }
      throw new HandlerError(`Command failed: ${getErrorMessage(error)}`);
    }

    return this.parseFallbackOutput(output);
  }
}
