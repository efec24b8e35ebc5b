/**
 * Public API Routes
 * Katalog och fristående optimering (utan lagrad gård)
 */

import { Router } from 'express';
import type { Request, Response, NextFunction, RequestHandler } from 'express';
import log from '../../utils/logger';
import { optimizeSales } from '../../engine/optimize-sales';
import type { FarmService } from '../../services/farm-service';
import { validate, OptimizeRequestSchema, generateOptimizeWarnings } from '../validation';

export function createPublicRoutes(service: FarmService, optimizeLimiter: RequestHandler): Router {
  const router = Router();

  /**
   * GET /api/catalog
   * Alla produkter i spelets katalog
   */
  router.get('/catalog', (req: Request, res: Response) => {
    const products = service.getCatalog();
    res.json({
      success: true,
      count: products.length,
      products,
    });
  });

  /**
   * POST /api/optimize
   * Säljplan för en lista lagerposter och ett mål
   */
  router.post('/optimize', optimizeLimiter, (req: Request, res: Response, next: NextFunction) => {
    try {
      const { target, entries } = validate(OptimizeRequestSchema, req.body);

      log.request('POST', '/api/optimize', { target, entries: entries.length });

      const warnings = generateOptimizeWarnings({ target, entries });
      if (warnings.length > 0) {
        log.warn('Valideringsvarningar', { warnings });
      }

      const plan = optimizeSales(entries, target);

      log.optimize(`Fristående plan: ${plan.totalTrips} resor`, {
        targetMet: plan.targetMet,
        totalRevenue: plan.totalRevenue,
      });

      const response: Record<string, unknown> = {
        success: true,
        plan,
      };
      if (warnings.length > 0) {
        response.warnings = warnings;
      }

      res.json(response);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
