import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import type { Farm } from '../models/Farm';
import type { FarmRepository } from './farm-repository';
import { parseFarm } from './farm-schema';
import { StorageError, getErrorMessage } from '../utils/errors';
import log from '../utils/logger';

export const DATA_VERSION = 1;
export const STATE_FILE_NAME = 'farm-state.json';

const StateFileSchema = z.object({
  version: z.number().int(),
  farms: z.record(z.unknown()),
});

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Alla gårdar i ett JSON-dokument: { version, farms: { [id]: Farm } }
 *
 * Skrivning sker till en .tmp-fil som sedan byter namn, så filen är
 * alltid hel. Skrivningar köas så att två save() inte blandas.
 */
export class FileFarmRepository implements FarmRepository {
  private readonly filePath: string;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(dataDir: string) {
    this.filePath = path.join(dataDir, STATE_FILE_NAME);
  }

  get path(): string {
    return this.filePath;
  }

  async list(): Promise<Farm[]> {
    const farms = await this.read();
    return Array.from(farms.values());
  }

  async get(id: string): Promise<Farm | null> {
    const farms = await this.read();
    return farms.get(id) ?? null;
  }

  save(farm: Farm): Promise<void> {
    return this.enqueue(async () => {
      const farms = await this.read();
      farms.set(farm.id, farm);
      await this.write(farms);
    });
  }

  delete(id: string): Promise<boolean> {
    return this.enqueue(async () => {
      const farms = await this.read();
      const existed = farms.delete(id);
      if (existed) {
        await this.write(farms);
      }
      return existed;
    });
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task, task);
    this.queue = run.catch(() => undefined);
    return run;
  }

  private async read(): Promise<Map<string, Farm>> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) return new Map();
      throw new StorageError(`Kunde inte läsa ${this.filePath}: ${getErrorMessage(error)}`, error);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      throw new StorageError(`Ogiltig JSON i ${this.filePath}`, error);
    }

    const state = StateFileSchema.safeParse(raw);
    if (!state.success) {
      throw new StorageError(`Okänt format i ${this.filePath}`, state.error);
    }

    const farms = new Map<string, Farm>();
    for (const [id, value] of Object.entries(state.data.farms)) {
      const farm = parseFarm(value);
      if (!farm) {
        log.warn('Hoppar över ogiltig gård i lagringsfilen', { farmId: id, file: this.filePath });
        continue;
      }
      farms.set(farm.id, farm);
    }
    return farms;
  }

  private async write(farms: Map<string, Farm>): Promise<void> {
    const payload = {
      version: DATA_VERSION,
      farms: Object.fromEntries(farms),
    };
    const tmpPath = `${this.filePath}.tmp`;

    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(tmpPath, JSON.stringify(payload, null, 2), 'utf8');
      await fs.rename(tmpPath, this.filePath);
    } catch (error) {
      throw new StorageError(`Kunde inte skriva ${this.filePath}: ${getErrorMessage(error)}`, error);
    }
    log.db('Gårdar sparade till fil', { file: this.filePath, count: farms.size });
  }
}
