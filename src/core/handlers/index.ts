/**
 * 에코시스템 → 핸들러 레지스트리
 */

import { Ecosystem } from '../../types';
import { HandlerError } from '../errors';
import { IHttpClient } from '../http-client';
import { ICommandRunner } from '../shared/command-runner';
import { EcosystemHandler } from './base-handler';
import { CargoHandler } from './cargo';
import { CondaHandler } from './conda';
import { GenericHandler } from './generic';
import { GithubHandler } from './github';
import { GolangHandler } from './golang';
import { MavenHandler } from './maven';
import { NpmHandler } from './npm';
import { NuGetHandler } from './nuget';
import { PyPIHandler } from './pypi';
import { RubyGemsHandler } from './rubygems';

export { BaseHandler, found, unavailable, invalidInput, RESOLVE_FAILED_MESSAGE } from './base-handler';
export type { EcosystemHandler } from './base-handler';
export {
  CargoHandler,
  CondaHandler,
  GenericHandler,
  GithubHandler,
  GolangHandler,
  MavenHandler,
  NpmHandler,
  NuGetHandler,
  PyPIHandler,
  RubyGemsHandler,
};

/** 같은 핸들러를 가리키는 별칭 */
const ECOSYSTEM_ALIASES: Record<string, Ecosystem> = {
  rubygems: 'gem',
};

export interface HandlerDependencies {
  http: IHttpClient;
  runner: ICommandRunner;
}

export class HandlerRegistry {
  private readonly handlers = new Map<string, EcosystemHandler>();

  constructor(handlers: readonly EcosystemHandler[]) {
    for (const handler of handlers) {
      this.handlers.set(handler.ecosystem, handler);
    }
  }

  /**
   * 에코시스템 이름으로 핸들러 조회 (대소문자 무시)
   * @throws HandlerError 지원하지 않는 에코시스템
   */
  get(ecosystem: string): EcosystemHandler {
    const handler = this.handlers.get(this.normalize(ecosystem));
    if (!handler) {
      throw new HandlerError(`Unsupported ecosystem: ${ecosystem}`);
    }
    return handler;
  }

  has(ecosystem: string): boolean {
    return this.handlers.has(this.normalize(ecosystem));
  }

  ecosystems(): string[] {
    return [...this.handlers.keys()];
  }

  private normalize(ecosystem: string): string {
    const key = ecosystem.toLowerCase();
    return ECOSYSTEM_ALIASES[key] ?? key;
  }
}

export function createHandlerRegistry({ http, runner }: HandlerDependencies): HandlerRegistry {
  return new HandlerRegistry([
    new NpmHandler(http, runner),
    new PyPIHandler(http, runner),
    new MavenHandler(http, runner),
    new CargoHandler(http, runner),
    new NuGetHandler(http, runner),
    new RubyGemsHandler(http, runner),
    new GolangHandler(http, runner),
    new GithubHandler(http, runner),
    new CondaHandler(http, runner),
    new GenericHandler(http, runner),
  ]);
}
