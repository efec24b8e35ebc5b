/**
 * FEST - Fertilizer Decision Support System
 * Copyright (c) 2025 Johan Wågstam <wagis79@gmail.com>
 * All rights reserved.
 */

/**
 * Säljoptimering - färst resor till ett intäktsmål
 *
 * PRIORITET (lexikografisk):
 * 1. Minsta möjliga antal leveransresor så att intäkten >= målet
 * 2. Minsta sålda volym (mest lager kvar)
 *
 * RESEMODELL:
 * - En resa bär en produkt, högst capacityPerTrip liter
 * - Säljbar volym = max(0, quantity - minStockToKeep)
 * - Sista resan för en produkt får vara delvis lastad
 *
 * ALGORITM:
 * 1. Filtrera fram giltiga, aktiverade poster med säljbar volym och pris > 0
 * 2. Ranka på intäkt per full resa, sedan pris per 1000 L, sedan produkt-id
 * 3. Gå igenom rankningen och sälj bara den volym som behövs för resten av målet
 * 4. Kontrollera mot minsta antal resor K (de K bästa resorna) och jämför
 *    med prisordning och med en genomgång begränsad till de K resorna
 * 5. Sök bland fördelningar av K resor på produkterna efter minst såld volym
 *    (djupet först i prisordning, beskuren på intäkt och volym)
 * 6. Bästa kandidat vinner (färst resor, sedan minst såld volym)
 * 7. Nås inte målet säljs allt säljbart, targetMet = false
 *
 * Ren funktion: ingen I/O, inget delat tillstånd. Indata kopieras.
 */

import type { StockEntry } from '../models/StockEntry';
import type { SellingPlan, TripAllocation, PlanReason } from '../models/SellingPlan';
import type { Cents } from './money';
import { fromCents, moneyValue, revenueCents, sumCents, toCents } from './money';
import { InvalidTargetError } from '../utils/errors';

// ============================================================================
// KONSTANTER
// ============================================================================

/** Tolerans för volymer (liter) vid jämförelser och avrundning av resor */
const VOLUME_EPSILON = 1e-9;

/** Tolerans i cent för flyttalssummor i resräkningen */
const CENT_EPSILON = 1e-6;

/** Tak för antal noder i volymsökningen. Nås taket gäller bästa hittills. */
export const MAX_SEARCH_NODES = 50_000;

// ============================================================================
// TYPER
// ============================================================================

interface RankedEntry {
  productId: string;
  pricePerThousand: number;
  capacityPerTrip: number;
  sellableVolume: number;
  perTripRevenue: number;
}

interface DraftAllocation {
  entry: RankedEntry;
  volume: number;
  cents: Cents;
}

interface Candidate {
  drafts: DraftAllocation[];
  trips: number;
  volume: number;
  cents: Cents;
}

/** En följd av likadana resor för en produkt */
interface TripRun {
  entry: RankedEntry;
  volumePerTrip: number;
  valuePerTrip: number; // cent, flyttal
  count: number;
}

export interface TripBudget {
  trips: number;
  volumeLimits: Map<string, number>;
}

// ============================================================================
// HJÄLPFUNKTIONER
// ============================================================================

export function sellableVolume(entry: StockEntry): number {
  return Math.max(0, entry.quantity - entry.minStockToKeep);
}

/**
 * Högsta intäkt posten kan ge om allt säljbart säljs
 */
export function revenueCap(entry: StockEntry): number {
  return moneyValue(sellableVolume(entry), entry.pricePerThousand);
}

/**
 * Intäkt för en full resa, begränsad av vad som faktiskt kan säljas
 */
export function perTripRevenue(entry: StockEntry): number {
  return (Math.min(entry.capacityPerTrip, sellableVolume(entry)) * entry.pricePerThousand) / 1000;
}

export function tripsForVolume(volume: number, capacityPerTrip: number): number {
  if (volume <= VOLUME_EPSILON) return 0;
  return Math.max(1, Math.ceil(volume / capacityPerTrip - VOLUME_EPSILON));
}

function isNonNegativeNumber(value: number): boolean {
  return Number.isFinite(value) && value >= 0;
}

function isWellFormed(entry: StockEntry): boolean {
  return (
    typeof entry.productId === 'string' &&
    entry.productId.length > 0 &&
    isNonNegativeNumber(entry.quantity) &&
    isNonNegativeNumber(entry.pricePerThousand) &&
    isNonNegativeNumber(entry.minStockToKeep) &&
    Number.isFinite(entry.capacityPerTrip) &&
    entry.capacityPerTrip > 0
  );
}

function compareIds(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Säljprioritet: intäkt per resa, pris, produkt-id
 */
function comparePriority(a: RankedEntry, b: RankedEntry): number {
  return (
    b.perTripRevenue - a.perTripRevenue ||
    b.pricePerThousand - a.pricePerThousand ||
    compareIds(a.productId, b.productId)
  );
}

/**
 * Prisordning: minst volym per intäkt först
 */
function comparePrice(a: RankedEntry, b: RankedEntry): number {
  return (
    b.pricePerThousand - a.pricePerThousand ||
    b.perTripRevenue - a.perTripRevenue ||
    compareIds(a.productId, b.productId)
  );
}

/**
 * Poster som kan bidra till intäkt. Dubbletter av produkt-id: första vinner.
 */
function eligibleEntries(entries: readonly StockEntry[]): RankedEntry[] {
  const seen = new Set<string>();
  const eligible: RankedEntry[] = [];

  for (const entry of entries) {
    if (!isWellFormed(entry) || seen.has(entry.productId)) continue;
    seen.add(entry.productId);

    const sellable = sellableVolume(entry);
    if (!entry.enabled || entry.pricePerThousand <= 0 || sellable <= VOLUME_EPSILON) continue;

    eligible.push({
      productId: entry.productId,
      pricePerThousand: entry.pricePerThousand,
      capacityPerTrip: entry.capacityPerTrip,
      sellableVolume: sellable,
      perTripRevenue: perTripRevenue(entry),
    });
  }

  return eligible;
}

// ============================================================================
// RESBUDGET (minsta antal resor)
// ============================================================================

function tripRuns(entries: RankedEntry[]): TripRun[] {
  const runs: TripRun[] = [];

  for (const entry of entries) {
    const fullTrips = Math.floor(entry.sellableVolume / entry.capacityPerTrip + VOLUME_EPSILON);
    const remainder = Math.max(0, entry.sellableVolume - fullTrips * entry.capacityPerTrip);

    if (fullTrips > 0) {
      runs.push({
        entry,
        volumePerTrip: entry.capacityPerTrip,
        valuePerTrip: (entry.capacityPerTrip * entry.pricePerThousand) / 10,
        count: fullTrips,
      });
    }
    if (remainder > VOLUME_EPSILON) {
      runs.push({
        entry,
        volumePerTrip: remainder,
        valuePerTrip: (remainder * entry.pricePerThousand) / 10,
        count: 1,
      });
    }
  }

  // Inom en produkt är restresan alltid mindre värd än en full resa,
  // så sortering på värde ger samma ordning som att ta de bästa resorna en i taget
  return runs.sort((a, b) => b.valuePerTrip - a.valuePerTrip || comparePrice(a.entry, b.entry));
}

/**
 * Minsta antal resor K som når målet, och volymtak per produkt för de K
 * bästa resorna. null om målet inte kan nås.
 */
export function minimumTripBudget(entries: readonly StockEntry[], target: number): TripBudget | null {
  return tripBudget(eligibleEntries(entries), toCents(target));
}

function tripBudget(entries: RankedEntry[], targetCents: Cents): TripBudget | null {
  const volumeLimits = new Map<string, number>();
  let reached = 0;
  let trips = 0;

  for (const run of tripRuns(entries)) {
    const need = targetCents - reached;
    if (need <= CENT_EPSILON) break;

    const take = Math.min(run.count, Math.ceil(need / run.valuePerTrip - CENT_EPSILON));
    reached += take * run.valuePerTrip;
    trips += take;

    const current = volumeLimits.get(run.entry.productId) ?? 0;
    volumeLimits.set(
      run.entry.productId,
      Math.min(run.entry.sellableVolume, current + take * run.volumePerTrip)
    );
  }

  if (targetCents - reached > CENT_EPSILON) return null;
  return { trips, volumeLimits };
}

// ============================================================================
// VOLYMSÖKNING INOM RESBUDGET
// ============================================================================

/**
 * Minst såld volym bland planer med högst maxTrips resor.
 *
 * Varje gren väljer antal resor för en produkt i prisordning. Så länge
 * intäkten är under målet säljs valda produkter fullt, så volymen hittills
 * plus resten av målet till nästa pris är en undre gräns.
 * Returnerar null om ingen plan under volumeBound hittas.
 */
function leastVolumeWithinTrips(
  byPrice: RankedEntry[],
  maxTrips: number,
  targetCents: Cents,
  volumeBound: number
): Candidate | null {
  const count = byPrice.length;
  const maxTripsPerEntry = byPrice.map(e => tripsForVolume(e.sellableVolume, e.capacityPerTrip));

  // Övre gränser för intäkt från produkt i och framåt
  const capCentsFrom = new Array<number>(count + 1).fill(0);
  const bestTripCentsFrom = new Array<number>(count + 1).fill(0);
  for (let i = count - 1; i >= 0; i--) {
    const e = byPrice[i];
    capCentsFrom[i] = capCentsFrom[i + 1] + revenueCents(e.sellableVolume, e.pricePerThousand);
    bestTripCentsFrom[i] = Math.max(
      bestTripCentsFrom[i + 1],
      revenueCents(Math.min(e.capacityPerTrip, e.sellableVolume), e.pricePerThousand)
    );
  }

  const limits = new Map<string, number>();
  const found: { candidate: Candidate | null; volume: number } = { candidate: null, volume: volumeBound };
  let nodes = 0;

  const search = (index: number, tripsLeft: number, cents: Cents, volume: number): void => {
    if (nodes >= MAX_SEARCH_NODES) return;
    nodes++;

    if (cents >= targetCents) {
      const candidate = walk(byPrice, e => limits.get(e.productId) ?? 0, targetCents);
      if (candidate.volume < found.volume - VOLUME_EPSILON) {
        found.candidate = candidate;
        found.volume = candidate.volume;
      }
      return;
    }
    if (index === count || tripsLeft === 0) return;

    const need = targetCents - cents;
    if (Math.min(capCentsFrom[index], tripsLeft * bestTripCentsFrom[index]) < need) return;

    const entry = byPrice[index];
    if (volume + (need * 10) / entry.pricePerThousand >= found.volume - VOLUME_EPSILON) return;

    for (let trips = Math.min(maxTripsPerEntry[index], tripsLeft); trips >= 0; trips--) {
      const limit = Math.min(trips * entry.capacityPerTrip, entry.sellableVolume);
      limits.set(entry.productId, limit);
      search(index + 1, tripsLeft - trips, cents + revenueCents(limit, entry.pricePerThousand), volume + limit);
    }
    limits.delete(entry.productId);
  };

  search(0, maxTrips, 0, 0);
  return found.candidate;
}

// ============================================================================
// GENOMGÅNG
// ============================================================================

/**
 * Sälj i given ordning, bara den volym som behövs för resterande mål
 */
function walk(
  ordered: RankedEntry[],
  volumeLimit: (entry: RankedEntry) => number,
  targetCents: Cents
): Candidate {
  const drafts: DraftAllocation[] = [];
  let accumulated = 0;

  for (const entry of ordered) {
    const remaining = targetCents - accumulated;
    if (remaining <= 0) break;

    const limit = volumeLimit(entry);
    if (limit <= VOLUME_EPSILON) continue;

    const neededVolume = (remaining * 10) / entry.pricePerThousand;
    const coversRemaining = neededVolume <= limit + VOLUME_EPSILON;
    const volume = coversRemaining ? Math.min(neededVolume, limit) : limit;
    const cents = coversRemaining ? remaining : revenueCents(volume, entry.pricePerThousand);

    drafts.push({ entry, volume, cents });
    accumulated += cents;
  }

  return toCandidate(drafts);
}

function toCandidate(drafts: DraftAllocation[]): Candidate {
  return {
    drafts,
    trips: drafts.reduce((sum, d) => sum + tripsForVolume(d.volume, d.entry.capacityPerTrip), 0),
    volume: drafts.reduce((sum, d) => sum + d.volume, 0),
    cents: sumCents(drafts.map(d => d.cents)),
  };
}

/**
 * Bästa kandidat: når målet, färst resor, minst volym, tidigast i listan
 */
function pickCandidate(candidates: Candidate[], targetCents: Cents): Candidate {
  let best = candidates[0];

  for (const candidate of candidates.slice(1)) {
    const bestMet = best.cents >= targetCents;
    const met = candidate.cents >= targetCents;

    if (met !== bestMet) {
      if (met) best = candidate;
      continue;
    }
    if (candidate.trips !== best.trips) {
      if (candidate.trips < best.trips) best = candidate;
      continue;
    }
    if (candidate.volume < best.volume - VOLUME_EPSILON) {
      best = candidate;
    }
  }

  return best;
}

// ============================================================================
// RESULTAT
// ============================================================================

function toAllocation(draft: DraftAllocation): TripAllocation {
  const { entry, volume } = draft;
  const tripsUsed = tripsForVolume(volume, entry.capacityPerTrip);
  const fullTrips = Math.min(tripsUsed, Math.floor(volume / entry.capacityPerTrip + VOLUME_EPSILON));

  return {
    productId: entry.productId,
    volumeSold: volume,
    tripsUsed,
    fullTrips,
    partialTrip: tripsUsed > fullTrips,
    revenue: fromCents(draft.cents),
  };
}

function emptyPlan(target: number, targetMet: boolean, reason: PlanReason): SellingPlan {
  return {
    allocations: [],
    totalTrips: 0,
    totalRevenue: 0,
    soldVolume: 0,
    targetMet,
    targetAmount: target,
    reason,
  };
}

function assemblePlan(candidate: Candidate, target: number, targetCents: Cents): SellingPlan {
  const allocations = candidate.drafts
    .filter(d => d.volume > VOLUME_EPSILON)
    .sort((a, b) => comparePriority(a.entry, b.entry))
    .map(toAllocation);

  const targetMet = candidate.cents >= targetCents;

  return {
    allocations,
    totalTrips: allocations.reduce((sum, a) => sum + a.tripsUsed, 0),
    totalRevenue: fromCents(candidate.cents),
    soldVolume: allocations.reduce((sum, a) => sum + a.volumeSold, 0),
    targetMet,
    targetAmount: target,
    reason: targetMet ? null : 'target_not_reached',
  };
}

// ============================================================================
// HUVUDFUNKTION
// ============================================================================

/**
 * Beräkna säljplan för ett intäktsmål
 *
 * @throws InvalidTargetError om målet är negativt eller inte ändligt
 */
export function optimizeSales(entries: readonly StockEntry[], target: number): SellingPlan {
  if (!Number.isFinite(target) || target < 0) {
    throw new InvalidTargetError(target);
  }

  const targetCents = toCents(target);
  if (targetCents <= 0) {
    return emptyPlan(target, true, 'no_target');
  }

  const eligible = eligibleEntries(entries);
  if (eligible.length === 0) {
    return emptyPlan(target, false, 'no_products');
  }

  const byPriority = [...eligible].sort(comparePriority);
  const totalCapCents = sumCents(eligible.map(e => revenueCents(e.sellableVolume, e.pricePerThousand)));

  // Målet går inte att nå: sälj allt säljbart
  if (totalCapCents < targetCents) {
    const sellAll = byPriority.map(entry => ({
      entry,
      volume: entry.sellableVolume,
      cents: revenueCents(entry.sellableVolume, entry.pricePerThousand),
    }));
    return assemblePlan(toCandidate(sellAll), target, targetCents);
  }

  const byPrice = [...eligible].sort(comparePrice);
  const budget = tripBudget(eligible, targetCents);
  const budgetLimit = (entry: RankedEntry): number =>
    budget ? budget.volumeLimits.get(entry.productId) ?? 0 : entry.sellableVolume;

  const candidates = [
    walk(byPriority, e => e.sellableVolume, targetCents),
    walk(byPrice, e => e.sellableVolume, targetCents),
    walk(byPrice, budgetLimit, targetCents),
  ];

  if (budget) {
    const volumeBound = Math.min(
      ...candidates
        .filter(c => c.cents >= targetCents && c.trips <= budget.trips)
        .map(c => c.volume)
    );
    const searched = leastVolumeWithinTrips(byPrice, budget.trips, targetCents, volumeBound);
    if (searched) {
      candidates.push(searched);
    }
  }

  const best = pickCandidate(candidates, targetCents);

  return assemblePlan(best, target, targetCents);
}
