import * as fs from 'fs-extra';
import * as path from 'path';
import * as os from 'os';
import logger from '../utils/logger';
import { getErrorMessage } from './errors';

export const APP_NAME = 'purl-source-resolver';

export const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

// 설정 인터페이스 정의
export interface Settings {
  // 해석 설정
  validate: boolean;
  concurrency: number;

  // 캐시 설정
  cacheEnabled: boolean;
  cacheDir: string;
  cacheTtlSeconds: number;

  // HTTP 설정
  httpTimeoutMs: number;
  maxRetries: number;

  logLevel: LogLevel;
}

export type SettingKey = keyof Settings;

/**
 * 기본 캐시 경로 (~/.cache/purl-source-resolver)
 */
export function defaultCacheDir(): string {
  return path.join(os.homedir(), '.cache', APP_NAME);
}

// 기본 설정값
function createDefaults(): Settings {
  return {
    validate: true,
    concurrency: 4,
    cacheEnabled: true,
    cacheDir: defaultCacheDir(),
    cacheTtlSeconds: 3600,
    httpTimeoutMs: 30000,
    maxRetries: 3,
    logLevel: 'info',
  };
}

function toBoolean(value: unknown): boolean | undefined {
  if (typeof value === 'boolean') return value;
  if (value === 'true') return true;
  if (value === 'false') return false;
  return undefined;
}

// 음수가 아닌 정수만 허용
function toCount(value: unknown): number | undefined {
  const num = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
  if (typeof num === 'number' && Number.isInteger(num) && num >= 0) {
    return num;
  }
  return undefined;
}

function toPositiveCount(value: unknown): number | undefined {
  const num = toCount(value);
  return num !== undefined && num > 0 ? num : undefined;
}

function toNonEmptyString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() !== '' ? value : undefined;
}

function toLogLevel(value: unknown): LogLevel | undefined {
  return LOG_LEVELS.find((level) => level === value);
}

const SETTING_PARSERS: Record<SettingKey, (value: unknown) => unknown> = {
  validate: toBoolean,
  concurrency: toPositiveCount,
  cacheEnabled: toBoolean,
  cacheDir: toNonEmptyString,
  cacheTtlSeconds: toCount,
  httpTimeoutMs: toPositiveCount,
  maxRetries: toCount,
  logLevel: toLogLevel,
};

export function isSettingKey(key: string): key is SettingKey {
  return Object.prototype.hasOwnProperty.call(SETTING_PARSERS, key);
}

/**
 * 저장된 값과 기본값을 병합합니다. 형식이 맞지 않는 값은 기본값으로 대체됩니다.
 */
function normalizeSettings(raw: Record<string, unknown>): Settings {
  const defaults = createDefaults();
  return {
    validate: toBoolean(raw.validate) ?? defaults.validate,
    concurrency: toPositiveCount(raw.concurrency) ?? defaults.concurrency,
    cacheEnabled: toBoolean(raw.cacheEnabled) ?? defaults.cacheEnabled,
    cacheDir: toNonEmptyString(raw.cacheDir) ?? defaults.cacheDir,
    cacheTtlSeconds: toCount(raw.cacheTtlSeconds) ?? defaults.cacheTtlSeconds,
    httpTimeoutMs: toPositiveCount(raw.httpTimeoutMs) ?? defaults.httpTimeoutMs,
    maxRetries: toCount(raw.maxRetries) ?? defaults.maxRetries,
    logLevel: toLogLevel(raw.logLevel) ?? defaults.logLevel,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export interface ConfigManagerOptions {
  /** 설정 디렉토리 (기본값 ~/.purl-source-resolver) */
  configDir?: string;
}

export class ConfigManager {
  private configDir: string;
  private configPath: string;
  private logsDir: string;

  constructor(options: ConfigManagerOptions = {}) {
    this.configDir = options.configDir ?? path.join(os.homedir(), `.${APP_NAME}`);
    this.configPath = path.join(this.configDir, 'settings.json');
    this.logsDir = path.join(this.configDir, 'logs');
  }

  /**
   * 필요한 디렉토리들을 생성합니다.
   */
  async ensureDirectories(): Promise<void> {
    await fs.ensureDir(this.configDir);
    await fs.ensureDir(this.logsDir);
  }

  /**
   * 설정 디렉토리 경로를 반환합니다.
   */
  getConfigDir(): string {
    return this.configDir;
  }

  getConfigPath(): string {
    return this.configPath;
  }

  /**
   * 로그 디렉토리 경로를 반환합니다.
   */
  getLogsDir(): string {
    return this.logsDir;
  }

  /**
   * 설정을 동기적으로 로드합니다.
   * 파일이 없으면 기본값, 파일이 손상되었으면 경고 후 기본값
   */
  getConfig(): Settings {
    return normalizeSettings(this.readRaw());
  }

  /**
   * 단일 설정값 조회
   */
  get<K extends SettingKey>(key: K): Settings[K] {
    return this.getConfig()[key];
  }

  /**
   * 설정값을 저장합니다. 문자열 입력은 키의 타입으로 변환됩니다.
   * @throws 알 수 없는 키, 변환할 수 없는 값
   */
  set(key: string, value: unknown): Settings {
    if (!isSettingKey(key)) {
      throw new Error(`알 수 없는 설정 키입니다: ${key}`);
    }

    const parsed = SETTING_PARSERS[key](value);
    if (parsed === undefined) {
      throw new Error(`'${key}'에 사용할 수 없는 값입니다: ${String(value)}`);
    }

    const raw = { ...this.readRaw(), [key]: parsed };
    fs.ensureDirSync(this.configDir);
    fs.writeJsonSync(this.configPath, raw, { spaces: 2 });
    return normalizeSettings(raw);
  }

  /**
   * 설정을 기본값으로 초기화합니다.
   */
  reset(): Settings {
    const defaults = createDefaults();
    fs.ensureDirSync(this.configDir);
    fs.writeJsonSync(this.configPath, defaults, { spaces: 2 });
    return defaults;
  }

  private readRaw(): Record<string, unknown> {
    if (!fs.pathExistsSync(this.configPath)) {
      return {};
    }

    try {
      const raw: unknown = fs.readJsonSync(this.configPath);
      if (isRecord(raw)) {
        return raw;
      }
      logger.warn('설정 파일 형식이 올바르지 않아 기본값 사용', { path: this.configPath });
    } catch (error) {
      logger.warn('설정 파일 로드 실패, 기본값 사용', {
        path: this.configPath,
        error: getErrorMessage(error),
      });
    }
    return {};
  }
}

// 싱글톤 인스턴스
let configManagerInstance: ConfigManager | null = null;

export function getConfigManager(): ConfigManager {
  if (!configManagerInstance) {
    configManagerInstance = new ConfigManager();
  }
  return configManagerInstance;
}
