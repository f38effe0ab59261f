// Core module exports

// Resolver
export { PurlResolver, getDownloadUrl } from './resolver';
export type { PurlResolverOptions } from './resolver';

// Handlers
export * from './handlers';

// PURL
export { parsePurl, purlToString, purlEquals, createPurl } from './purl';
export type { PurlFields } from './purl';

// Result serialization
export { toResultRecord, fromResultRecord, isResultRecord } from './result';

// Errors
export {
  HandlerError,
  PurlParseError,
  ChecksumMismatchError,
  CommandTimeoutError,
  CommandFailedError,
  getErrorMessage,
} from './errors';

// HTTP
export { HttpClient, DEFAULT_USER_AGENT } from './http-client';
export type { IHttpClient, HttpClientOptions } from './http-client';

// Command runner
export {
  ProcessCommandRunner,
  FALLBACK_TIMEOUT_MS,
  findExecutable,
  formatCommand,
  quoteArg,
} from './shared/command-runner';
export type { ICommandRunner, CommandStep, FallbackCommand } from './shared/command-runner';

// Cache
export { UrlCache, DEFAULT_CACHE_TTL_SECONDS } from './url-cache';
export type { UrlCacheOptions, UrlCacheStats, CacheData } from './url-cache';

// Config
export { ConfigManager, getConfigManager } from './config';
export type { Settings, SettingKey, LogLevel } from './config';
