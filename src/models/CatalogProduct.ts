/**
 * FEST - Fertilizer Decision Support System
 * Copyright (c) 2025 Johan Wågstam <wagis79@gmail.com>
 * All rights reserved.
 */

/**
 * En produkt i spelets katalog (eller en egen produkt, id med prefix u_)
 */
export interface CatalogProduct {
  id: string;
  nameEs: string;
  nameEn: string;
  icon: string;
  defaultPricePerThousand: number;
}
