import type { Farm } from '../models/Farm';

/**
 * Lagring av gårdar (lager, egna produkter, senaste plan)
 *
 * Implementationer: minne, JSON-fil och Supabase.
 * Returnerade gårdar är kopior; ändringar sparas först vid save().
 */
export interface FarmRepository {
  list(): Promise<Farm[]>;
  get(id: string): Promise<Farm | null>;
  save(farm: Farm): Promise<void>;
  delete(id: string): Promise<boolean>;
}
