/**
 * Rate Limiting Middleware
 */

import rateLimit from 'express-rate-limit';
import type { RequestHandler } from 'express';

export interface RateLimitSettings {
  /** Max requests per 15 min per IP */
  apiMax: number;
  /** Max optimeringar per minut per IP */
  optimizeMax: number;
}

export interface RateLimiters {
  apiLimiter: RequestHandler;
  optimizeLimiter: RequestHandler;
}

export function createRateLimiters(settings: RateLimitSettings): RateLimiters {
  /**
   * General API rate limiter (more permissive)
   */
  const apiLimiter = rateLimit({
    windowMs: 15 * 60 * 1000, // 15 minuter
    limit: settings.apiMax,
    message: {
      success: false,
      error: 'För många förfrågningar. Försök igen om 15 minuter.',
      code: 'RATE_LIMIT_EXCEEDED'
    },
    standardHeaders: true,
    legacyHeaders: false,
  });

  /**
   * Stricter rate limiter for plan calculations
   */
  const optimizeLimiter = rateLimit({
    windowMs: 1 * 60 * 1000, // 1 minut
    limit: settings.optimizeMax,
    message: {
      success: false,
      error: 'För många optimeringsförfrågningar. Försök igen om en minut.',
      code: 'OPTIMIZE_RATE_LIMIT_EXCEEDED'
    },
    standardHeaders: true,
    legacyHeaders: false,
  });

  return { apiLimiter, optimizeLimiter };
}
