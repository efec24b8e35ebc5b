/**
 * Fillagring - Tester
 * 
 * Varje test får en egen temporär katalog.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { FileFarmRepository, DATA_VERSION, STATE_FILE_NAME } from '../../storage/file-farm-repository';
import { StorageError } from '../../utils/errors';
import { sampleFarm } from '../fixtures/farms';

describe('FileFarmRepository', () => {
  let dataDir: string;
  let repository: FileFarmRepository;

  beforeEach(async () => {
    dataDir = await fs.mkdtemp(path.join(os.tmpdir(), 'sales-planner-'));
    repository = new FileFarmRepository(path.join(dataDir, 'nested'));
  });

  afterEach(async () => {
    await fs.rm(dataDir, { recursive: true, force: true });
  });

  it('ska ge tom lista när filen saknas', async () => {
    expect(await repository.list()).toEqual([]);
    expect(await repository.get('abc1234567')).toBeNull();
  });

  it('ska spara och läsa tillbaka en gård', async () => {
    const farm = sampleFarm();

    await repository.save(farm);

    expect(await repository.get(farm.id)).toEqual(farm);
    expect(await repository.list()).toEqual([farm]);
  });

  it('ska skriva versionerat dokument utan kvarlämnad tmp-fil', async () => {
    const farm = sampleFarm();

    await repository.save(farm);

    const raw: unknown = JSON.parse(await fs.readFile(repository.path, 'utf8'));
    expect(raw).toEqual({ version: DATA_VERSION, farms: { [farm.id]: farm } });
    const files = await fs.readdir(path.dirname(repository.path));
    expect(files).toEqual([STATE_FILE_NAME]);
  });

  it('ska klara samtidiga skrivningar', async () => {
    await Promise.all([
      repository.save(sampleFarm({ id: 'farm000001', name: 'A' })),
      repository.save(sampleFarm({ id: 'farm000002', name: 'B' })),
      repository.save(sampleFarm({ id: 'farm000003', name: 'C' })),
    ]);

    const names = (await repository.list()).map(f => f.name).sort();
    expect(names).toEqual(['A', 'B', 'C']);
  });

  it('ska ta bort gård och rapportera om den fanns', async () => {
    const farm = sampleFarm();
    await repository.save(farm);

    expect(await repository.delete(farm.id)).toBe(true);
    expect(await repository.delete(farm.id)).toBe(false);
    expect(await repository.list()).toEqual([]);
  });

  it('ska hoppa över ogiltiga gårdar i filen', async () => {
    const farm = sampleFarm();
    await fs.mkdir(path.dirname(repository.path), { recursive: true });
    await fs.writeFile(repository.path, JSON.stringify({
      version: 1,
      farms: { [farm.id]: farm, broken: { id: 'broken', name: 42 } },
    }));

    expect(await repository.list()).toEqual([farm]);
  });

  it('ska fylla i saknade fält från äldre filer', async () => {
    const { userProducts: _userProducts, lastPlan: _lastPlan, ...legacy } = sampleFarm();
    await fs.mkdir(path.dirname(repository.path), { recursive: true });
    await fs.writeFile(repository.path, JSON.stringify({ version: 1, farms: { [legacy.id]: legacy } }));

    const farm = await repository.get(legacy.id);

    expect(farm?.userProducts).toEqual([]);
    expect(farm?.lastPlan).toBeNull();
  });

  it('ska kasta StorageError för trasig JSON', async () => {
    await fs.mkdir(path.dirname(repository.path), { recursive: true });
    await fs.writeFile(repository.path, '{ inte json');

    await expect(repository.list()).rejects.toThrow(StorageError);
  });

  it('ska kasta StorageError för okänt format', async () => {
    await fs.mkdir(path.dirname(repository.path), { recursive: true });
    await fs.writeFile(repository.path, JSON.stringify([1, 2, 3]));

    await expect(repository.list()).rejects.toThrow(StorageError);
  });

});
