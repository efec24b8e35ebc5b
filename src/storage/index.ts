import type { AppConfig } from '../config';
import type { FarmRepository } from './farm-repository';
import { InMemoryFarmRepository } from './in-memory-farm-repository';
import { FileFarmRepository } from './file-farm-repository';
import { createSupabaseFarmRepository } from './supabase-farm-repository';
import log from '../utils/logger';

export type { FarmRepository } from './farm-repository';
export { InMemoryFarmRepository } from './in-memory-farm-repository';
export { FileFarmRepository } from './file-farm-repository';
export { SupabaseFarmRepository, createSupabaseFarmRepository } from './supabase-farm-repository';

export function createFarmRepository(storage: AppConfig['storage']): FarmRepository {
  switch (storage.driver) {
    case 'memory':
      log.warn('Minneslagring vald - gårdar försvinner vid omstart');
      return new InMemoryFarmRepository();
    case 'file':
      log.startup(`Fillagring i ${storage.dataDir}`);
      return new FileFarmRepository(storage.dataDir);
    case 'supabase':
      log.startup('Supabase-lagring konfigurerad');
      return createSupabaseFarmRepository(storage.url, storage.key);
  }
}
