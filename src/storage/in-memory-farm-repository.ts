import type { Farm } from '../models/Farm';
import type { FarmRepository } from './farm-repository';

export class InMemoryFarmRepository implements FarmRepository {
  private readonly farms = new Map<string, Farm>();

  constructor(initial: Farm[] = []) {
    for (const farm of initial) {
      this.farms.set(farm.id, structuredClone(farm));
    }
  }

  async list(): Promise<Farm[]> {
    return Array.from(this.farms.values(), farm => structuredClone(farm));
  }

  async get(id: string): Promise<Farm | null> {
    const farm = this.farms.get(id);
    return farm ? structuredClone(farm) : null;
  }

  async save(farm: Farm): Promise<void> {
    this.farms.set(farm.id, structuredClone(farm));
  }

  async delete(id: string): Promise<boolean> {
    return this.farms.delete(id);
  }
}
