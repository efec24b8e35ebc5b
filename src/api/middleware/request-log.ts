import type { Request, Response, NextFunction } from 'express';
import log from '../../utils/logger';

/**
 * Loggar status och svarstid när svaret är skickat
 */
export function requestLogger(req: Request, res: Response, next: NextFunction) {
  const started = Date.now();
  res.on('finish', () => {
    log.response(req.method, req.originalUrl, res.statusCode, Date.now() - started);
  });
  next();
}
