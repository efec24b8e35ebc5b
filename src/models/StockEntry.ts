/**
 * FEST - Fertilizer Decision Support System
 * Copyright (c) 2025 Johan Wågstam <wagis79@gmail.com>
 * All rights reserved.
 */

/**
 * En lagerpost på en gård
 */
export interface StockEntry {
  productId: string;
  quantity: number;          // liter i lager
  pricePerThousand: number;  // pengar per 1000 liter
  capacityPerTrip: number;   // liter per leveransresa
  minStockToKeep: number;    // liter som aldrig säljs
  enabled: boolean;          // med i optimeringen
}
