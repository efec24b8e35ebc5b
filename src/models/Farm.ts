/**
 * FEST - Fertilizer Decision Support System
 * Copyright (c) 2025 Johan Wågstam <wagis79@gmail.com>
 * All rights reserved.
 */

import type { StockEntry } from './StockEntry';
import type { SellingPlan } from './SellingPlan';
import type { CatalogProduct } from './CatalogProduct';

export interface Farm {
  id: string;
  name: string;
  stock: StockEntry[];             // i den ordning posterna lades till
  userProducts: CatalogProduct[];
  lastPlan: SellingPlan | null;    // nollställs vid varje lagerändring
  updatedAt: string;               // ISO
}

/**
 * Kortformat för listningar
 */
export interface FarmSummary {
  id: string;
  name: string;
  stockCount: number;
  updatedAt: string;
}

export type StockSortMode = 'added' | 'stock' | 'money' | 'name';

export interface StockSummary {
  farmId: string;
  totalVolume: number;
  totalValue: number;
  entries: Array<StockEntry & { value: number }>;
}
