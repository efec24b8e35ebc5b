/**
 * FEST - Fertilizer Decision Support System
 * Copyright (c) 2025 Johan Wågstam <wagis79@gmail.com>
 * All rights reserved.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { createClient } from '@supabase/supabase-js';
import { z } from 'zod';
import type { Farm } from '../models/Farm';
import type { FarmRepository } from './farm-repository';
import { parseFarm } from './farm-schema';
import { StorageError } from '../utils/errors';
import log from '../utils/logger';

// Tabell: farms (id text primary key, name text, data jsonb, updated_at timestamptz)
export const FARMS_TABLE = 'farms';

const FarmRowSchema = z.object({
  id: z.string(),
  data: z.unknown(),
});

/**
 * Rad i databasen för en gård
 */
export interface DBFarm {
  id: string;
  name: string;
  data: Farm;
  updated_at: string;
}

export function farmToDBFarm(farm: Farm): DBFarm {
  return {
    id: farm.id,
    name: farm.name,
    data: farm,
    updated_at: farm.updatedAt,
  };
}

/**
 * Tolka en rad, null (med varning) om data inte är en giltig gård
 */
export function dbFarmToFarm(row: unknown): Farm | null {
  const parsed = FarmRowSchema.safeParse(row);
  const farm = parsed.success ? parseFarm(parsed.data.data) : null;
  if (!farm) {
    log.warn('Ogiltig gårdsrad i Supabase', { id: parsed.success ? parsed.data.id : undefined });
  }
  return farm;
}

export class SupabaseFarmRepository implements FarmRepository {
  constructor(
    private readonly client: SupabaseClient,
    private readonly table: string = FARMS_TABLE
  ) {}

  async list(): Promise<Farm[]> {
    const { data, error } = await this.client
      .from(this.table)
      .select('id, data')
      .order('name', { ascending: true });

    if (error) {
      throw new StorageError(`Supabase-fel vid hämtning av gårdar: ${error.message}`, error);
    }

    const rows: unknown[] = data ?? [];
    log.db('Gårdar hämtade', { count: rows.length });
    return rows.map(dbFarmToFarm).filter((farm): farm is Farm => farm !== null);
  }

  async get(id: string): Promise<Farm | null> {
    const { data, error } = await this.client
      .from(this.table)
      .select('id, data')
      .eq('id', id)
      .maybeSingle();

    if (error) {
      throw new StorageError(`Supabase-fel vid hämtning av gård ${id}: ${error.message}`, error);
    }
    return data ? dbFarmToFarm(data) : null;
  }

  async save(farm: Farm): Promise<void> {
    const { error } = await this.client
      .from(this.table)
      .upsert(farmToDBFarm(farm));

    if (error) {
      throw new StorageError(`Supabase-fel vid sparande av gård ${farm.id}: ${error.message}`, error);
    }
    log.db('Gård sparad', { farmId: farm.id });
  }

  async delete(id: string): Promise<boolean> {
    const { data, error } = await this.client
      .from(this.table)
      .delete()
      .eq('id', id)
      .select('id');

    if (error) {
      throw new StorageError(`Supabase-fel vid borttagning av gård ${id}: ${error.message}`, error);
    }
    const rows: unknown[] = data ?? [];
    return rows.length > 0;
  }
}

/**
 * Skapa repository mot Supabase. Skrivningar kräver service role-nyckel
 * om tabellen har RLS påslaget.
 */
export function createSupabaseFarmRepository(url: string, key: string): SupabaseFarmRepository {
  const client = createClient(url, key, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
    },
  });
  return new SupabaseFarmRepository(client);
}
