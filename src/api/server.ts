/**
 * FEST - Fertilizer Decision Support System
 * Copyright (c) 2025 Johan Wågstam <wagis79@gmail.com>
 * All rights reserved.
 */

import type { Express } from 'express';
import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import path from 'path';
import fs from 'fs';
import swaggerUi from 'swagger-ui-express';
import YAML from 'yaml';
import log from '../utils/logger';
import type { AppConfig } from '../config';
import type { FarmService } from '../services/farm-service';
import {
  createApiKeyGuard,
  createRateLimiters,
  errorHandler,
  notFoundHandler,
  requestLogger,
} from './middleware';
import { healthRoutes, createPublicRoutes, createFarmRoutes } from './routes';

export type ServerConfig = Pick<AppConfig, 'nodeEnv' | 'apiKeys' | 'corsAllowedOrigins' | 'rateLimit'>;

export interface AppDependencies {
  service: FarmService;
  config: ServerConfig;
}

const OPENAPI_PATH = path.join(__dirname, '../../openapi.yaml');

export function createApp({ service, config }: AppDependencies): Express {
  const app = express();

  // Trust proxy i produktion (rate-limiting och X-Forwarded-For)
  if (config.nodeEnv === 'production') {
    app.set('trust proxy', 1);
  }

  // ===========================================================================
  // GLOBAL MIDDLEWARE
  // ===========================================================================

  app.use(helmet({
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'self'"],
        scriptSrc: ["'self'", "'unsafe-eval'"], // unsafe-eval needed for Swagger UI
        scriptSrcAttr: ["'none'"],
        styleSrc: ["'self'", "'unsafe-inline'"], // Swagger UI inline styles
        imgSrc: ["'self'", "data:", "https:"],
        connectSrc: ["'self'"],
      },
    },
    crossOriginEmbedderPolicy: false,
  }));

  // CORS - vitlistade domäner
  const allowedOrigins = config.corsAllowedOrigins;
  app.use(cors({
    origin: (origin, callback) => {
      // Requests utan origin (same-origin, server-to-server, curl)
      if (!origin) {
        return callback(null, true);
      }
      if (allowedOrigins.includes(origin) || allowedOrigins.includes('*')) {
        return callback(null, true);
      }
      if (config.nodeEnv !== 'production' && (origin.startsWith('http://localhost') || origin.startsWith('http://127.0.0.1'))) {
        return callback(null, true);
      }
      log.warn('CORS blockad för origin', { origin, allowedOrigins });
      return callback(new Error('Not allowed by CORS'));
    },
    methods: ['GET', 'POST', 'PATCH', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-API-Key', 'X-Requested-With'],
  }));

  app.use(express.json({ limit: '256kb' }));
  app.use(requestLogger);

  const { apiLimiter, optimizeLimiter } = createRateLimiters(config.rateLimit);
  const requireApiKey = createApiKeyGuard(config.apiKeys);

  if (config.apiKeys.length === 0) {
    log.warn('Inga API-nycklar konfigurerade - API:t är öppet');
  }

  // ===========================================================================
  // SWAGGER UI - API DOCUMENTATION
  // ===========================================================================

  if (fs.existsSync(OPENAPI_PATH)) {
    try {
      const swaggerDocument = YAML.parse(fs.readFileSync(OPENAPI_PATH, 'utf8'));
      const swaggerOptions = {
        customCss: '.swagger-ui .topbar { display: none }',
        customSiteTitle: 'Sales Planner API',
        swaggerOptions: { docExpansion: 'list' },
      };
      app.use('/api-docs', swaggerUi.serveFiles(swaggerDocument, swaggerOptions), swaggerUi.setup(swaggerDocument, swaggerOptions));
    } catch (err) {
      log.warn('Kunde inte läsa OpenAPI-specen för Swagger UI', { error: err instanceof Error ? err.message : String(err) });
    }
  }

  // ===========================================================================
  // API ROUTES
  // ===========================================================================

  app.use('/health', healthRoutes);

  app.use('/api', apiLimiter, requireApiKey);
  app.use('/api', createPublicRoutes(service, optimizeLimiter));
  app.use('/api/farms', createFarmRoutes(service, optimizeLimiter));
  app.use('/api', notFoundHandler);

  app.use(errorHandler);

  return app;
}
