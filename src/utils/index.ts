/**
 * @fileoverview Barrel export for shared utilities.
 * @module src/utils/index
 */

export { TtlCache, type TtlCacheOptions } from './cache/ttlCache.js';
export { ErrorHandler } from './internal/errorHandler.js';
export { Logger, logger, type LogContext } from './internal/logger.js';
export {
  requestContextService,
  type RequestContext,
} from './internal/requestContext.js';
export {
  fetchWithTimeout,
  type FetchWithTimeoutOptions,
} from './network/fetchWithTimeout.js';
