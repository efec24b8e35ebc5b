/**
 * FEST - Fertilizer Decision Support System
 * Copyright (c) 2025 Johan Wågstam <wagis79@gmail.com>
 * All rights reserved.
 */

/**
 * Penningberäkningar i fast punkt
 *
 * Belopp summeras som heltal i hundradelar (cent) så att upprepade
 * beräkningar inte ackumulerar flyttalsfel. Priser anges per 1000 liter.
 */

export type Cents = number;

export function toCents(amount: number): Cents {
  return Math.round(amount * 100);
}

export function fromCents(cents: Cents): number {
  return cents / 100;
}

/**
 * Intäkt i cent för en volym: volym × pris / 1000 × 100
 */
export function revenueCents(volume: number, pricePerThousand: number): Cents {
  if (volume <= 0 || pricePerThousand <= 0) return 0;
  return Math.round((volume * pricePerThousand) / 10);
}

/**
 * Värdet av en lagerpost: mängd × pris per liter
 */
export function moneyValue(volume: number, pricePerThousand: number): number {
  return fromCents(revenueCents(volume, pricePerThousand));
}

export function sumCents(values: Cents[]): Cents {
  return values.reduce((sum, value) => sum + value, 0);
}
