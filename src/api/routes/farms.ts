/**
 * Farm Routes
 * Gårdar, lager och säljplaner
 */

import { Router } from 'express';
import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { FarmService } from '../../services/farm-service';
import {
  validate,
  AddStockEntrySchema,
  CreateFarmSchema,
  CustomProductSchema,
  PlanRequestSchema,
  RenameFarmSchema,
  StockQuerySchema,
  UpdateStockEntrySchema,
} from '../validation';

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

/**
 * Skicka vidare fel från async-handlers till felhanteraren
 */
function handle(handler: AsyncHandler): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };
}

export function createFarmRoutes(service: FarmService, optimizeLimiter: RequestHandler): Router {
  const router = Router();

  /**
   * GET /api/farms
   */
  router.get('/', handle(async (req, res) => {
    const farms = await service.listFarms();
    res.json({ success: true, count: farms.length, farms });
  }));

  /**
   * POST /api/farms
   */
  router.post('/', handle(async (req, res) => {
    const { name } = validate(CreateFarmSchema, req.body ?? {});
    const farm = await service.createFarm(name);
    res.status(201).json({ success: true, farm });
  }));

  /**
   * GET /api/farms/:farmId
   */
  router.get('/:farmId', handle(async (req, res) => {
    const farm = await service.getFarm(req.params.farmId);
    res.json({ success: true, farm });
  }));

  /**
   * PATCH /api/farms/:farmId
   * Byt namn
   */
  router.patch('/:farmId', handle(async (req, res) => {
    const { name } = validate(RenameFarmSchema, req.body);
    const farm = await service.renameFarm(req.params.farmId, name);
    res.json({ success: true, farm });
  }));

  /**
   * DELETE /api/farms/:farmId
   */
  router.delete('/:farmId', handle(async (req, res) => {
    await service.deleteFarm(req.params.farmId);
    res.json({ success: true });
  }));

  /**
   * POST /api/farms/:farmId/reset
   */
  router.post('/:farmId/reset', handle(async (req, res) => {
    const farm = await service.resetFarm(req.params.farmId);
    res.json({ success: true, farm });
  }));

  // ===========================================================================
  // LAGER
  // ===========================================================================

  /**
   * GET /api/farms/:farmId/stock?sort=added|stock|money|name&order=asc|desc&lang=es|en
   */
  router.get('/:farmId/stock', handle(async (req, res) => {
    const { sort, order, lang } = validate(StockQuerySchema, req.query);
    const summary = await service.getStockSummary(req.params.farmId, {
      sort,
      ascending: order === 'asc',
      language: lang,
    });
    res.json({ success: true, ...summary });
  }));

  /**
   * POST /api/farms/:farmId/stock
   * Lägg till produkt från katalogen
   */
  router.post('/:farmId/stock', handle(async (req, res) => {
    const input = validate(AddStockEntrySchema, req.body);
    const farm = await service.addStockEntry(req.params.farmId, input);
    res.status(201).json({ success: true, farm });
  }));

  /**
   * POST /api/farms/:farmId/custom-products
   */
  router.post('/:farmId/custom-products', handle(async (req, res) => {
    const input = validate(CustomProductSchema, req.body);
    const farm = await service.addCustomProduct(req.params.farmId, input);
    res.status(201).json({ success: true, farm });
  }));

  /**
   * PATCH /api/farms/:farmId/stock/:productId
   */
  router.patch('/:farmId/stock/:productId', handle(async (req, res) => {
    const patch = validate(UpdateStockEntrySchema, req.body);
    const farm = await service.updateStockEntry(req.params.farmId, req.params.productId, patch);
    res.json({ success: true, farm });
  }));

  /**
   * DELETE /api/farms/:farmId/stock/:productId
   */
  router.delete('/:farmId/stock/:productId', handle(async (req, res) => {
    const farm = await service.removeStockEntry(req.params.farmId, req.params.productId);
    res.json({ success: true, farm });
  }));

  // ===========================================================================
  // SÄLJPLAN
  // ===========================================================================

  /**
   * POST /api/farms/:farmId/plan
   */
  router.post('/:farmId/plan', optimizeLimiter, handle(async (req, res) => {
    const { target } = validate(PlanRequestSchema, req.body);
    const plan = await service.calculatePlan(req.params.farmId, target);
    res.json({ success: true, plan });
  }));

  /**
   * GET /api/farms/:farmId/plan
   */
  router.get('/:farmId/plan', handle(async (req, res) => {
    const plan = await service.getLastPlan(req.params.farmId);
    res.json({ success: true, plan });
  }));

  /**
   * POST /api/farms/:farmId/plan/apply
   */
  router.post('/:farmId/plan/apply', handle(async (req, res) => {
    const farm = await service.applyLastPlan(req.params.farmId);
    res.json({ success: true, farm });
  }));

  return router;
}
