/**
 * Spelets produktkatalog
 * Data läses från catalog.json (skrivskyddad, ingen katalogadministration)
 */

import { z } from 'zod';
import catalogData from './catalog.json';
import type { CatalogProduct } from '../models/CatalogProduct';

export const CUSTOM_PRODUCT_PREFIX = 'u_';

export type CatalogLanguage = 'es' | 'en';

const CatalogFileSchema = z.object({
  products: z.array(z.object({
    id: z.string().min(1),
    name_es: z.string(),
    name_en: z.string(),
    icon: z.string(),
    default_max_price_per_1000: z.number().min(0),
  })),
});

/**
 * Tolka katalogfilens format till CatalogProduct per id
 */
export function parseCatalog(raw: unknown): Map<string, CatalogProduct> {
  const file = CatalogFileSchema.parse(raw);
  const products = new Map<string, CatalogProduct>();

  for (const p of file.products) {
    products.set(p.id, {
      id: p.id,
      nameEs: p.name_es,
      nameEn: p.name_en,
      icon: p.icon,
      defaultPricePerThousand: p.default_max_price_per_1000,
    });
  }

  return products;
}

let cached: Map<string, CatalogProduct> | null = null;

export function loadCatalog(): Map<string, CatalogProduct> {
  if (!cached) {
    cached = parseCatalog(catalogData);
  }
  return cached;
}

export function isCustomProductId(productId: string): boolean {
  return productId.startsWith(CUSTOM_PRODUCT_PREFIX);
}

/**
 * Produktnamn på valt språk, id om produkten saknas
 */
export function getProductName(
  productId: string,
  catalog: ReadonlyMap<string, CatalogProduct>,
  language: CatalogLanguage = 'es'
): string {
  const product = catalog.get(productId);
  if (!product) return productId;
  return language === 'es' ? product.nameEs : product.nameEn;
}
