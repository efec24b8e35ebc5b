/**
 * FEST - Fertilizer Decision Support System
 * Copyright (c) 2025 Johan Wågstam <wagis79@gmail.com>
 * All rights reserved.
 */

/**
 * Försäljning av en produkt i en plan
 */
export interface TripAllocation {
  productId: string;
  volumeSold: number;   // liter
  tripsUsed: number;
  fullTrips: number;    // resor med full last
  partialTrip: boolean; // sista resan är delvis lastad
  revenue: number;
}

/**
 * Varför en plan saknar rader eller inte når målet
 */
export type PlanReason = 'no_target' | 'no_products' | 'target_not_reached';

/**
 * En komplett säljplan
 */
export interface SellingPlan {
  allocations: TripAllocation[]; // prioritetsordning, högst intäkt per resa först
  totalTrips: number;
  totalRevenue: number;
  soldVolume: number;
  targetMet: boolean;
  targetAmount: number;
  reason: PlanReason | null;
}
