/**
 * API Input Validation Schemas
 * 
 * Använder Zod för typsäker validering av alla API-requests.
 * Fel kastas som ValidationError och formateras av felhanteraren.
 */

import { z } from 'zod';
import { AppError } from '../utils/errors';

// =============================================================================
// GRUNDLÄGGANDE SCHEMAN
// =============================================================================

const volume = z.number().finite().min(0).max(1e9);
const price = z.number().finite().min(0).max(1e7);

// Negativa tal släpps igenom till varningarna, men beloppen hålls inom säkra heltal i cent
const signedVolume = z.number().finite().min(-1e9).max(1e9);
const signedPrice = z.number().finite().min(-1e7).max(1e7);

/**
 * Intäktsmål - negativt mål är ett kontraktsbrott
 */
export const TargetSchema = z.number().finite().min(0, 'Målet får inte vara negativt').max(1e12);

/**
 * Lagerpost för fristående optimering. Siffror kontrolleras som ändliga
 * och begränsade tal; felaktiga poster sorteras bort av optimeraren.
 */
export const OptimizeEntrySchema = z.object({
  productId: z.string().min(1).max(100),
  quantity: signedVolume,
  pricePerThousand: signedPrice,
  capacityPerTrip: signedVolume,
  minStockToKeep: signedVolume.optional().default(0),
  enabled: z.boolean().optional().default(true),
});

const farmName = z.string().trim().min(1, 'Namnet får inte vara tomt').max(80);

// =============================================================================
// API ENDPOINT SCHEMAN
// =============================================================================

/**
 * POST /api/optimize
 */
export const OptimizeRequestSchema = z.object({
  target: TargetSchema,
  entries: z.array(OptimizeEntrySchema).max(500),
});

export type OptimizeRequest = z.infer<typeof OptimizeRequestSchema>;

/**
 * POST /api/farms/:farmId/plan
 */
export const PlanRequestSchema = z.object({
  target: TargetSchema,
});

/**
 * POST /api/farms
 */
export const CreateFarmSchema = z.object({
  name: farmName.optional(),
});

/**
 * PATCH /api/farms/:farmId
 */
export const RenameFarmSchema = z.object({
  name: farmName,
});

/**
 * POST /api/farms/:farmId/stock
 */
export const AddStockEntrySchema = z.object({
  productId: z.string().min(1).max(100),
  quantity: volume.optional(),
  pricePerThousand: price.optional(),
  capacityPerTrip: volume.optional(),
  minStockToKeep: volume.optional(),
  enabled: z.boolean().optional(),
});

/**
 * POST /api/farms/:farmId/custom-products
 */
export const CustomProductSchema = z.object({
  nameEs: z.string().trim().min(1).max(80),
  nameEn: z.string().trim().max(80).optional(),
  icon: z.string().max(120).optional(),
  pricePerThousand: price,
  quantity: volume.optional(),
  capacityPerTrip: volume.optional(),
  minStockToKeep: volume.optional(),
  enabled: z.boolean().optional(),
});

/**
 * PATCH /api/farms/:farmId/stock/:productId
 * Negativa tal klipps till 0 i tjänsten, som i redigeringsformuläret
 */
export const UpdateStockEntrySchema = z.object({
  quantity: signedVolume.optional(),
  pricePerThousand: signedPrice.optional(),
  capacityPerTrip: signedVolume.optional(),
  minStockToKeep: signedVolume.optional(),
  enabled: z.boolean().optional(),
}).refine(
  (data) => Object.values(data).some(value => value !== undefined),
  { message: 'Minst ett fält måste anges' }
);

/**
 * GET /api/farms/:farmId/stock
 */
export const StockQuerySchema = z.object({
  sort: z.enum(['added', 'stock', 'money', 'name']).optional().default('added'),
  order: z.enum(['asc', 'desc']).optional().default('asc'),
  lang: z.enum(['es', 'en']).optional().default('es'),
});

// =============================================================================
// VALIDERING
// =============================================================================

export interface ValidationIssue {
  field: string;
  message: string;
  code: string;
}

export class ValidationError extends AppError {
  readonly details: ValidationIssue[];

  constructor(details: ValidationIssue[], message = 'Valideringsfel') {
    super(message, 400, 'VALIDATION_ERROR');
    this.details = details;
  }
}

/**
 * Validera ett värde (body eller query) mot ett Zod-schema.
 * Returnerar validerad och transformerad data.
 */
export function validate<T extends z.ZodTypeAny>(schema: T, value: unknown): z.infer<T> {
  const result = schema.safeParse(value);

  if (!result.success) {
    throw new ValidationError(
      result.error.issues.map((issue: z.ZodIssue) => ({
        field: issue.path.join('.'),
        message: issue.message,
        code: issue.code,
      }))
    );
  }

  return result.data;
}

// =============================================================================
// VARNINGS-GENERATOR
// =============================================================================

/**
 * Varningar för poster som optimeraren kommer att hoppa över
 */
export function generateOptimizeWarnings(data: OptimizeRequest): string[] {
  const warnings: string[] = [];
  const seen = new Set<string>();

  for (const entry of data.entries) {
    if (seen.has(entry.productId)) {
      warnings.push(`Produkt ${entry.productId} förekommer flera gånger; bara första posten används.`);
    }
    seen.add(entry.productId);

    if (entry.capacityPerTrip <= 0) {
      warnings.push(`Produkt ${entry.productId} saknar kapacitet per resa och ignoreras.`);
    }
    if (entry.quantity < 0 || entry.pricePerThousand < 0 || entry.minStockToKeep < 0) {
      warnings.push(`Produkt ${entry.productId} har negativa värden och ignoreras.`);
    }
  }

  if (data.entries.length > 0 && data.entries.every(entry => !entry.enabled)) {
    warnings.push('Alla produkter är avaktiverade.');
  }

  return warnings;
}
