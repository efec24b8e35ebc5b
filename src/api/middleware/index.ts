/**
 * Middleware exports
 */

export { createApiKeyGuard } from './auth';
export { createRateLimiters, type RateLimiters, type RateLimitSettings } from './rate-limit';
export { requestLogger } from './request-log';
export { errorHandler, notFoundHandler } from './error-handler';
