/**
 * magio-connect: Library Barrel Export
 */

// Client
export { MagioClient, type MagioClientOptions, type CacheReport } from './client/MagioClient.js';

// Auth
export * from './auth/index.js';

// APIs
export * from './api/index.js';

// Utils
export { HttpClient, type HttpClientConfig, type AuthHeaderSource, type RedirectTarget } from './client/HttpClient.js';
export { Cache, type CacheOptions, type CacheStats, type CacheInfo } from './client/Cache.js';
export { systemClock, type Clock } from './utils/clock.js';
export { ok, err, type Result } from './utils/result.js';
export { NotAuthenticatedError, UpstreamError } from './utils/errors.js';
export { getConfig, resolveConfig, baseUrlForLanguage, type Config, type StreamQuality } from './utils/config.js';
export { createLogger, type Logger, type LogLevel } from './utils/logger.js';
