import { describe, it, expect } from 'vitest';
import { InMemoryFarmRepository } from '../../storage/in-memory-farm-repository';
import { sampleFarm } from '../fixtures/farms';

describe('InMemoryFarmRepository', () => {

  it('ska starta med givna gårdar', async () => {
    const repository = new InMemoryFarmRepository([sampleFarm()]);

    expect(await repository.list()).toEqual([sampleFarm()]);
  });

  it('ska lämna ut kopior', async () => {
    const repository = new InMemoryFarmRepository();
    const farm = sampleFarm();
    await repository.save(farm);

    farm.name = 'Ändrad';
    const stored = await repository.get(farm.id);
    if (stored) stored.stock = [];

    expect(await repository.get(farm.id)).toEqual(sampleFarm());
  });

  it('ska rapportera om borttagen gård fanns', async () => {
    const repository = new InMemoryFarmRepository([sampleFarm()]);

    expect(await repository.delete('abc1234567')).toBe(true);
    expect(await repository.delete('abc1234567')).toBe(false);
    expect(await repository.get('abc1234567')).toBeNull();
  });

});
