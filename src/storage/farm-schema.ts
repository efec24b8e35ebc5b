/**
 * Zod-scheman för lagrade gårdar
 *
 * Allt som läses från fil eller databas valideras här en gång,
 * så att resten av koden arbetar med typade värden.
 */

import { z } from 'zod';
import type { Farm } from '../models/Farm';

export const StockEntrySchema = z.object({
  productId: z.string().min(1),
  quantity: z.number(),
  pricePerThousand: z.number(),
  capacityPerTrip: z.number(),
  minStockToKeep: z.number(),
  enabled: z.boolean(),
});

export const TripAllocationSchema = z.object({
  productId: z.string(),
  volumeSold: z.number(),
  tripsUsed: z.number().int(),
  fullTrips: z.number().int(),
  partialTrip: z.boolean(),
  revenue: z.number(),
});

export const SellingPlanSchema = z.object({
  allocations: z.array(TripAllocationSchema),
  totalTrips: z.number().int(),
  totalRevenue: z.number(),
  soldVolume: z.number(),
  targetMet: z.boolean(),
  targetAmount: z.number(),
  reason: z.enum(['no_target', 'no_products', 'target_not_reached']).nullable(),
});

export const CatalogProductSchema = z.object({
  id: z.string().min(1),
  nameEs: z.string(),
  nameEn: z.string(),
  icon: z.string(),
  defaultPricePerThousand: z.number(),
});

export const FarmSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  stock: z.array(StockEntrySchema),
  userProducts: z.array(CatalogProductSchema).default([]),
  lastPlan: SellingPlanSchema.nullable().default(null),
  updatedAt: z.string(),
});

/**
 * Tolka ett lagrat värde som gård, null om det inte går
 */
export function parseFarm(raw: unknown): Farm | null {
  const result = FarmSchema.safeParse(raw);
  return result.success ? result.data : null;
}
