/**
 * Gårdstjänsten - lager, egna produkter och senaste säljplan
 *
 * Varje ändring av lagret nollställer gårdens senaste plan, eftersom
 * planen är beräknad mot ett lager som inte längre finns.
 *
 * Ändringar av en gård körs en i taget (läs → ändra → spara), så att två
 * samtidiga anrop inte skriver över varandra.
 */

import type { Farm, FarmSummary, StockSortMode, StockSummary } from '../models/Farm';
import type { StockEntry } from '../models/StockEntry';
import type { SellingPlan } from '../models/SellingPlan';
import type { CatalogProduct } from '../models/CatalogProduct';
import type { FarmRepository } from '../storage/farm-repository';
import type { CatalogLanguage } from '../data/catalog';
import { CUSTOM_PRODUCT_PREFIX, getProductName, isCustomProductId, loadCatalog } from '../data/catalog';
import { optimizeSales } from '../engine/optimize-sales';
import { fromCents, revenueCents, sumCents } from '../engine/money';
import {
  DuplicateStockEntryError,
  FarmNotFoundError,
  InvalidFarmNameError,
  NoPlanError,
  StockEntryNotFoundError,
  UnknownProductError,
} from '../utils/errors';
import { newShortId } from '../utils/ids';
import log from '../utils/logger';

export const DEFAULT_FARM_NAME = 'Mi granja';

// Restvolym under detta räknas som tom post
const EMPTY_VOLUME = 1e-6;

export interface StockEntryInput {
  productId: string;
  quantity?: number;
  pricePerThousand?: number;
  capacityPerTrip?: number;
  minStockToKeep?: number;
  enabled?: boolean;
}

export interface CustomProductInput {
  nameEs: string;
  nameEn?: string;
  icon?: string;
  pricePerThousand: number;
  quantity?: number;
  capacityPerTrip?: number;
  minStockToKeep?: number;
  enabled?: boolean;
}

export type StockEntryPatch = Partial<Omit<StockEntry, 'productId'>>;

export interface StockSummaryOptions {
  sort?: StockSortMode;
  ascending?: boolean;
  language?: CatalogLanguage;
}

export interface FarmServiceOptions {
  catalog?: ReadonlyMap<string, CatalogProduct>;
  now?: () => Date;
  newId?: () => string;
}

const nonNegative = (value: number): number => (Number.isFinite(value) ? Math.max(0, value) : 0);

export class FarmService {
  private readonly catalog: ReadonlyMap<string, CatalogProduct>;
  private readonly now: () => Date;
  private readonly newId: () => string;
  private readonly farmQueues = new Map<string, Promise<void>>();

  constructor(
    private readonly repository: FarmRepository,
    options: FarmServiceOptions = {}
  ) {
    this.catalog = options.catalog ?? loadCatalog();
    this.now = options.now ?? (() => new Date());
    this.newId = options.newId ?? newShortId;
  }

  getCatalog(): CatalogProduct[] {
    return Array.from(this.catalog.values());
  }

  // ==========================================================================
  // GÅRDAR
  // ==========================================================================

  async listFarms(): Promise<FarmSummary[]> {
    const farms = await this.repository.list();
    return farms
      .map(farm => ({
        id: farm.id,
        name: farm.name,
        stockCount: farm.stock.length,
        updatedAt: farm.updatedAt,
      }))
      .sort((a, b) => a.name.localeCompare(b.name) || a.id.localeCompare(b.id));
  }

  async createFarm(name?: string): Promise<Farm> {
    const trimmed = name?.trim();
    const farm: Farm = {
      id: this.newId(),
      name: trimmed ? trimmed : DEFAULT_FARM_NAME,
      stock: [],
      userProducts: [],
      lastPlan: null,
      updatedAt: this.now().toISOString(),
    };
    await this.repository.save(farm);
    log.info('Gård skapad', { farmId: farm.id, name: farm.name });
    return farm;
  }

  async getFarm(farmId: string): Promise<Farm> {
    const farm = await this.repository.get(farmId);
    if (!farm) {
      throw new FarmNotFoundError(farmId);
    }
    return farm;
  }

  async renameFarm(farmId: string, name: string): Promise<Farm> {
    const trimmed = name.trim();
    if (!trimmed) {
      throw new InvalidFarmNameError();
    }
    return this.mutate(farmId, async farm => {
      farm.name = trimmed;
      return this.persist(farm);
    });
  }

  /**
   * Töm lager, egna produkter och plan. Namnet behålls.
   */
  async resetFarm(farmId: string): Promise<Farm> {
    return this.mutate(farmId, async farm => {
      farm.stock = [];
      farm.userProducts = [];
      farm.lastPlan = null;
      log.info('Gård återställd', { farmId });
      return this.persist(farm);
    });
  }

  async deleteFarm(farmId: string): Promise<void> {
    return this.serialize(farmId, async () => {
      const deleted = await this.repository.delete(farmId);
      if (!deleted) {
        throw new FarmNotFoundError(farmId);
      }
      log.info('Gård borttagen', { farmId });
    });
  }

  // ==========================================================================
  // LAGER
  // ==========================================================================

  async getStockSummary(farmId: string, options: StockSummaryOptions = {}): Promise<StockSummary> {
    const farm = await this.getFarm(farmId);
    const { sort = 'added', ascending = true, language = 'es' } = options;
    const names = this.productNames(farm);

    const entries = farm.stock.map(entry => ({
      ...entry,
      valueCents: revenueCents(entry.quantity, entry.pricePerThousand),
    }));

    const direction = ascending ? 1 : -1;
    const compare: Record<Exclude<StockSortMode, 'added'>, (a: typeof entries[number], b: typeof entries[number]) => number> = {
      stock: (a, b) => a.quantity - b.quantity,
      money: (a, b) => a.valueCents - b.valueCents,
      name: (a, b) => getProductName(a.productId, names, language)
        .localeCompare(getProductName(b.productId, names, language)),
    };

    const sorted = sort === 'added'
      ? (ascending ? entries : [...entries].reverse())
      : [...entries].sort((a, b) => direction * compare[sort](a, b));

    return {
      farmId,
      totalVolume: entries.reduce((sum, entry) => sum + entry.quantity, 0),
      totalValue: fromCents(sumCents(entries.map(entry => entry.valueCents))),
      entries: sorted.map(({ valueCents, ...entry }) => ({ ...entry, value: fromCents(valueCents) })),
    };
  }

  async addStockEntry(farmId: string, input: StockEntryInput): Promise<Farm> {
    return this.mutate(farmId, async farm => {
      const product = this.productNames(farm).get(input.productId);
      if (!product) {
        throw new UnknownProductError(input.productId);
      }
      if (farm.stock.some(entry => entry.productId === input.productId)) {
        throw new DuplicateStockEntryError(input.productId);
      }

      farm.stock.push(this.newEntry(input.productId, input, product.defaultPricePerThousand));
      return this.invalidateAndPersist(farm);
    });
  }

  /**
   * Egen produkt (id u_xxxxxxxxxx) och dess lagerpost i ett steg
   */
  async addCustomProduct(farmId: string, input: CustomProductInput): Promise<Farm> {
    return this.mutate(farmId, async farm => {
      const nameEs = input.nameEs.trim();
      const product: CatalogProduct = {
        id: `${CUSTOM_PRODUCT_PREFIX}${this.newId()}`,
        nameEs,
        nameEn: input.nameEn?.trim() || nameEs,
        icon: input.icon ?? 'custom.png',
        defaultPricePerThousand: nonNegative(input.pricePerThousand),
      };

      farm.userProducts.push(product);
      farm.stock.push(this.newEntry(product.id, input, product.defaultPricePerThousand));
      return this.invalidateAndPersist(farm);
    });
  }

  async updateStockEntry(farmId: string, productId: string, patch: StockEntryPatch): Promise<Farm> {
    return this.mutate(farmId, async farm => {
      const entry = farm.stock.find(e => e.productId === productId);
      if (!entry) {
        throw new StockEntryNotFoundError(productId);
      }

      if (patch.quantity !== undefined) entry.quantity = nonNegative(patch.quantity);
      if (patch.pricePerThousand !== undefined) entry.pricePerThousand = nonNegative(patch.pricePerThousand);
      if (patch.capacityPerTrip !== undefined) entry.capacityPerTrip = nonNegative(patch.capacityPerTrip);
      if (patch.minStockToKeep !== undefined) entry.minStockToKeep = nonNegative(patch.minStockToKeep);
      if (patch.enabled !== undefined) entry.enabled = patch.enabled;

      return this.invalidateAndPersist(farm);
    });
  }

  async removeStockEntry(farmId: string, productId: string): Promise<Farm> {
    return this.mutate(farmId, async farm => {
      if (!farm.stock.some(entry => entry.productId === productId)) {
        throw new StockEntryNotFoundError(productId);
      }
      removeEntry(farm, productId);
      return this.invalidateAndPersist(farm);
    });
  }

  // ==========================================================================
  // SÄLJPLAN
  // ==========================================================================

  /**
   * Beräkna plan mot gårdens lager. Sparas som senaste plan om målet nås.
   */
  async calculatePlan(farmId: string, target: number): Promise<SellingPlan> {
    return this.mutate(farmId, async farm => {
      const started = Date.now();
      const plan = optimizeSales(farm.stock, target);

      log.optimize(`Säljplan för gård ${farmId}`, {
        target,
        entries: farm.stock.length,
        totalTrips: plan.totalTrips,
        totalRevenue: plan.totalRevenue,
        targetMet: plan.targetMet,
        durationMs: Date.now() - started,
      });

      farm.lastPlan = plan.targetMet && plan.allocations.length > 0 ? plan : null;
      await this.persist(farm);
      return plan;
    });
  }

  async getLastPlan(farmId: string): Promise<SellingPlan | null> {
    const farm = await this.getFarm(farmId);
    return farm.lastPlan;
  }

  /**
   * Dra av sålda volymer från lagret. Poster som blir tomma tas bort.
   */
  async applyLastPlan(farmId: string): Promise<Farm> {
    return this.mutate(farmId, async farm => {
      const plan = farm.lastPlan;
      if (!plan) {
        throw new NoPlanError();
      }

      for (const allocation of plan.allocations) {
        const entry = farm.stock.find(e => e.productId === allocation.productId);
        if (!entry) continue;

        const remaining = entry.quantity - allocation.volumeSold;
        entry.quantity = remaining > EMPTY_VOLUME ? remaining : 0;
        if (entry.quantity === 0) {
          removeEntry(farm, entry.productId);
        }
      }

      log.info('Plan tillämpad på lagret', {
        farmId,
        allocations: plan.allocations.length,
        soldVolume: plan.soldVolume,
      });
      return this.invalidateAndPersist(farm);
    });
  }

  // ==========================================================================
  // INTERNT
  // ==========================================================================

  /**
   * Kör uppgifter för samma gård i tur och ordning. Ett fel i en uppgift
   * stoppar inte kön.
   */
  private serialize<T>(farmId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.farmQueues.get(farmId) ?? Promise.resolve();
    const run = previous.then(task);
    const settled: Promise<void> = run.then(
      () => undefined,
      () => undefined
    );
    this.farmQueues.set(farmId, settled);
    return run.finally(() => {
      if (this.farmQueues.get(farmId) === settled) {
        this.farmQueues.delete(farmId);
      }
    });
  }

  /**
   * Läs gården, ändra och spara inom gårdens kö
   */
  private mutate<T>(farmId: string, change: (farm: Farm) => Promise<T>): Promise<T> {
    return this.serialize(farmId, async () => change(await this.getFarm(farmId)));
  }

  private productNames(farm: Farm): Map<string, CatalogProduct> {
    const products = new Map(this.catalog);
    for (const product of farm.userProducts) {
      products.set(product.id, product);
    }
    return products;
  }

  private newEntry(
    productId: string,
    input: Omit<StockEntryInput, 'productId'>,
    defaultPrice: number
  ): StockEntry {
    return {
      productId,
      quantity: nonNegative(input.quantity ?? 0),
      pricePerThousand: nonNegative(input.pricePerThousand ?? defaultPrice),
      capacityPerTrip: nonNegative(input.capacityPerTrip ?? 0),
      minStockToKeep: nonNegative(input.minStockToKeep ?? 0),
      enabled: input.enabled ?? true,
    };
  }

  private invalidateAndPersist(farm: Farm): Promise<Farm> {
    farm.lastPlan = null;
    return this.persist(farm);
  }

  private async persist(farm: Farm): Promise<Farm> {
    farm.updatedAt = this.now().toISOString();
    await this.repository.save(farm);
    return farm;
  }
}

function removeEntry(farm: Farm, productId: string): void {
  farm.stock = farm.stock.filter(entry => entry.productId !== productId);
  if (isCustomProductId(productId)) {
    farm.userProducts = farm.userProducts.filter(product => product.id !== productId);
  }
}
