import type { Request, Response, NextFunction } from 'express';
import { AppError } from '../../utils/errors';
import { ValidationError } from '../validation';
import log from '../../utils/logger';

function isBodyParseError(error: unknown): boolean {
  return error instanceof SyntaxError && 'type' in error && error.type === 'entity.parse.failed';
}

/**
 * 404 för okända API-routes
 */
export function notFoundHandler(req: Request, res: Response) {
  res.status(404).json({
    success: false,
    error: `Okänd endpoint: ${req.method} ${req.path}`,
    code: 'NOT_FOUND',
  });
}

/**
 * Sista felhanteraren: AppError -> dess status, allt annat -> 500
 */
// Express känner igen felhanterare på fyra parametrar
// eslint-disable-next-line @typescript-eslint/no-unused-vars
export function errorHandler(error: unknown, req: Request, res: Response, next: NextFunction) {
  if (error instanceof ValidationError) {
    log.warn('Valideringsfel', { path: req.path, errors: error.details });
    return res.status(error.status).json({
      success: false,
      error: error.message,
      code: error.code,
      details: error.details,
    });
  }

  if (error instanceof AppError) {
    if (error.status >= 500) {
      log.error(`Fel i ${req.method} ${req.path}`, error, { code: error.code });
    } else {
      log.warn(error.message, { path: req.path, code: error.code });
    }
    return res.status(error.status).json({
      success: false,
      error: error.message,
      code: error.code,
    });
  }

  if (isBodyParseError(error)) {
    return res.status(400).json({
      success: false,
      error: 'Ogiltig JSON i request body',
      code: 'INVALID_JSON',
    });
  }

  log.error(`Oväntat fel i ${req.method} ${req.path}`, error);
  res.status(500).json({
    success: false,
    error: 'Internt serverfel',
    code: 'INTERNAL_ERROR',
  });
}
