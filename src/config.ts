/**
 * Konfiguration från miljövariabler (.env laddas med dotenv)
 */

import dotenv from 'dotenv';
import { z } from 'zod';
import { LOG_LEVELS, type LogLevel } from './utils/logger';

dotenv.config();

const commaList = z
  .string()
  .optional()
  .transform(value =>
    (value ?? '')
      .split(',')
      .map(item => item.trim())
      .filter(item => item.length > 0)
  );

// Tomma variabler i .env räknas som ej satta
const emptyAsUndefined = (value: unknown) => (value === '' ? undefined : value);

const ConfigSchema = z.object({
  PORT: z.preprocess(emptyAsUndefined, z.coerce.number().int().min(1).max(65535).default(3000)),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.preprocess(emptyAsUndefined, z.enum(LOG_LEVELS).optional()),
  STORAGE_DRIVER: z.enum(['memory', 'file', 'supabase']).default('file'),
  DATA_DIR: z.preprocess(emptyAsUndefined, z.string().min(1).default('./data')),
  SUPABASE_URL: z.preprocess(emptyAsUndefined, z.string().url().optional()),
  SUPABASE_KEY: z.preprocess(emptyAsUndefined, z.string().min(1).optional()),
  API_KEYS: commaList,
  RATE_LIMIT_API_MAX: z.preprocess(emptyAsUndefined, z.coerce.number().int().min(1).default(100)),
  RATE_LIMIT_OPTIMIZE_MAX: z.preprocess(emptyAsUndefined, z.coerce.number().int().min(1).default(10)),
  CORS_ALLOWED_ORIGINS: commaList,
}).refine(
  (env) => env.STORAGE_DRIVER !== 'supabase' || (env.SUPABASE_URL !== undefined && env.SUPABASE_KEY !== undefined),
  { message: 'STORAGE_DRIVER=supabase kräver SUPABASE_URL och SUPABASE_KEY' }
);

export interface AppConfig {
  port: number;
  nodeEnv: 'development' | 'production' | 'test';
  logLevel?: LogLevel;
  storage:
    | { driver: 'memory' }
    | { driver: 'file'; dataDir: string }
    | { driver: 'supabase'; url: string; key: string };
  apiKeys: string[];
  corsAllowedOrigins: string[];
  rateLimit: {
    apiMax: number;
    optimizeMax: number;
  };
}

const DEFAULT_CORS_ORIGINS = ['http://localhost:3000', 'http://localhost:5173', 'http://127.0.0.1:3000'];

/**
 * Tolka miljön till AppConfig. Kastar med läsbart meddelande vid fel.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = ConfigSchema.safeParse(env);
  if (!result.success) {
    const details = result.error.issues
      .map(issue => `${issue.path.join('.') || 'env'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Ogiltig konfiguration: ${details}`);
  }

  const parsed = result.data;
  let storage: AppConfig['storage'];
  if (parsed.STORAGE_DRIVER === 'supabase' && parsed.SUPABASE_URL && parsed.SUPABASE_KEY) {
    storage = { driver: 'supabase', url: parsed.SUPABASE_URL, key: parsed.SUPABASE_KEY };
  } else if (parsed.STORAGE_DRIVER === 'memory') {
    storage = { driver: 'memory' };
  } else {
    storage = { driver: 'file', dataDir: parsed.DATA_DIR };
  }

  return {
    port: parsed.PORT,
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,
    storage,
    apiKeys: parsed.API_KEYS,
    corsAllowedOrigins: parsed.CORS_ALLOWED_ORIGINS.length > 0 ? parsed.CORS_ALLOWED_ORIGINS : DEFAULT_CORS_ORIGINS,
    rateLimit: {
      apiMax: parsed.RATE_LIMIT_API_MAX,
      optimizeMax: parsed.RATE_LIMIT_OPTIMIZE_MAX,
    },
  };
}
