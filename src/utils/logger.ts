/**
 * FEST - Fertilizer Decision Support System
 * Copyright (c) 2025 Johan Wågstam <wagis79@gmail.com>
 * All rights reserved.
 */

/**
 * Centraliserad logger med Winston
 * 
 * - JSON-format i produktion, färgade rader i utveckling
 * - Nivå styrs av LOG_LEVEL (error, warn, info, debug)
 * - Domänspecifika genvägar för optimering, lagring och säkerhet
 */

import winston from 'winston';

const { combine, timestamp, printf, colorize, json } = winston.format;

export type LogMeta = Record<string, unknown>;

export const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const;
export type LogLevel = typeof LOG_LEVELS[number];

const isProduction = process.env.NODE_ENV === 'production';

// Läsbart format för utveckling
const devFormat = printf(({ level, message, timestamp, ...metadata }) => {
  let msg = `${timestamp} [${level}]: ${message}`;
  
  if (Object.keys(metadata).length > 0) {
    msg += ` ${JSON.stringify(metadata)}`;
  }
  
  return msg;
});

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || (isProduction ? 'info' : 'debug'),
  format: combine(
    timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    isProduction ? json() : combine(colorize(), devFormat)
  ),
  defaultMeta: { service: 'sales-planner' },
  // Tyst under vitest så att testutskriften blir läsbar
  silent: process.env.VITEST === 'true' && !process.env.LOG_LEVEL,
  transports: [
    new winston.transports.Console(),
  ],
});

export const log = {
  info: (message: string, meta?: LogMeta) => {
    logger.info(message, meta);
  },

  warn: (message: string, meta?: LogMeta) => {
    logger.warn(message, meta);
  },

  /**
   * Fel. Error-objekt packas upp till message + stack.
   */
  error: (message: string, error?: unknown, meta?: LogMeta) => {
    const errorMeta = error instanceof Error 
      ? { error: error.message, stack: error.stack, ...meta }
      : error === undefined
        ? { ...meta }
        : { error: String(error), ...meta };
    logger.error(message, errorMeta);
  },

  /**
   * Debug (visas bara om LOG_LEVEL=debug)
   */
  debug: (message: string, meta?: LogMeta) => {
    logger.debug(message, meta);
  },

  /**
   * Startup-meddelanden (alltid synliga)
   */
  startup: (message: string) => {
    logger.info(`🚀 ${message}`);
  },

  request: (method: string, path: string, meta?: LogMeta) => {
    logger.info(`📥 ${method} ${path}`, { type: 'request', ...meta });
  },

  response: (method: string, path: string, statusCode: number, durationMs: number) => {
    const level = statusCode >= 500 ? 'error' : statusCode >= 400 ? 'warn' : 'info';
    logger[level](`📤 ${method} ${path} ${statusCode}`, { 
      type: 'response', 
      statusCode, 
      durationMs 
    });
  },

  /**
   * Säljplan-beräkningar
   */
  optimize: (message: string, meta?: LogMeta) => {
    logger.info(`⚙️ ${message}`, { type: 'optimization', ...meta });
  },

  /**
   * Lagringsoperationer (fil / Supabase)
   */
  db: (message: string, meta?: LogMeta) => {
    logger.debug(`🗄️ ${message}`, { type: 'database', ...meta });
  },

  security: (message: string, meta?: LogMeta) => {
    logger.warn(`🔐 ${message}`, { type: 'security', ...meta });
  },
};

/**
 * Byt nivå efter att konfigurationen validerats
 */
export function setLogLevel(level: LogLevel): void {
  logger.level = level;
}

export { logger };

export default log;
