/**
 * API Key Middleware
 * 
 * Checks X-API-Key header against configured keys.
 * If no keys are configured, access is open (for development).
 * Every other request needs a valid key; client-set headers such as
 * Origin, Referer or X-Requested-With do not count.
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import log from '../../utils/logger';

function header(req: Request, name: string): string | undefined {
  const value = req.headers[name];
  return Array.isArray(value) ? value[0] : value;
}

export function createApiKeyGuard(apiKeys: readonly string[]): RequestHandler {
  const keys = new Set(apiKeys);

  return (req: Request, res: Response, next: NextFunction) => {
    // No API keys configured - development mode
    if (keys.size === 0) {
      return next();
    }

    const apiKey = header(req, 'x-api-key');
    if (!apiKey) {
      return res.status(401).json({
        success: false,
        error: 'API-nyckel saknas. Lägg till header: X-API-Key',
        code: 'MISSING_API_KEY'
      });
    }

    if (!keys.has(apiKey)) {
      log.security('Ogiltig API-nyckel', { path: req.path, ip: req.ip });
      return res.status(403).json({
        success: false,
        error: 'Ogiltig API-nyckel',
        code: 'INVALID_API_KEY'
      });
    }

    next();
  };
}
