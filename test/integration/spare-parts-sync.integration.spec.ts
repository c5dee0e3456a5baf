import { AssetsService } from '../../src/modules/assets/services/assets.service';
import { Component } from '../../src/modules/components/entities/component.entity';
import { SparePartsInventory } from '../../src/modules/components/entities/spare-parts-inventory.entity';
import { ComponentStatus } from '../../src/modules/components/enums/component-status.enum';
import { ComponentsService } from '../../src/modules/components/services/components.service';
import { SparePartsService } from '../../src/modules/components/services/spare-parts.service';
import { createTestApp, TestApp } from '../helpers/test-app';
import { RegistryFixtures, seedRegistry } from './registry-fixtures';

describe('Spare parts sync (integration)', () => {
  let testApp: TestApp;
  let fixtures: RegistryFixtures;
  let componentsService: ComponentsService;
  let sparePartsService: SparePartsService;

  const stockFor = (componentTypeId: number) =>
    testApp.dataSource.getRepository(SparePartsInventory).findOneBy({ componentTypeId });

  const addSpare = () =>
    componentsService.create({ componentTypeId: fixtures.componentTypeId, status: ComponentStatus.SPARE });

  beforeEach(async () => {
    testApp = await createTestApp();
    fixtures = await seedRegistry(testApp.module);
    componentsService = testApp.module.get(ComponentsService);
    sparePartsService = testApp.module.get(SparePartsService);
  });

  afterEach(async () => {
    await testApp.app.close();
  });

  it('creates the stock row with the first spare', async () => {
    expect(await stockFor(fixtures.componentTypeId)).toBeNull();

    await addSpare();
    await addSpare();

    expect((await stockFor(fixtures.componentTypeId))?.quantityAvailable).toBe(2);
  });

  it('follows installs and removals, keeping the row at zero', async () => {
    const parent = await testApp.module.get(AssetsService).create({ assetModelId: fixtures.assetModelId });
    const first = await addSpare();
    const second = await addSpare();

    await componentsService.changeStatus(first.id, { status: ComponentStatus.INSTALLED, parentAssetId: parent.id });
    expect((await stockFor(fixtures.componentTypeId))?.quantityAvailable).toBe(1);

    await componentsService.remove(second.id);
    const row = await stockFor(fixtures.componentTypeId);
    expect(row).not.toBeNull();
    expect(row?.quantityAvailable).toBe(0);

    await componentsService.unassign(first.id);
    expect((await stockFor(fixtures.componentTypeId))?.quantityAvailable).toBe(1);
  });

  it('reconciles counts changed behind the subscriber', async () => {
    await addSpare();
    // Query builder updates carry no entity, so the subscriber cannot see which type moved
    await testApp.dataSource
      .getRepository(Component)
      .update({ componentTypeId: fixtures.componentTypeId }, { status: ComponentStatus.FAILED });
    expect((await stockFor(fixtures.componentTypeId))?.quantityAvailable).toBe(1);

    await sparePartsService.syncAll();

    expect((await stockFor(fixtures.componentTypeId))?.quantityAvailable).toBe(0);
  });

  it('lists rows at or below their threshold', async () => {
    await addSpare();
    const row = await stockFor(fixtures.componentTypeId);
    if (!row) {
      throw new Error('stock row missing');
    }
    await sparePartsService.update(row.id, { quantityMinimum: 3 });

    const low = await sparePartsService.findBelowThreshold();

    expect(low.map((part) => part.componentTypeId)).toEqual([fixtures.componentTypeId]);
    expect(low[0].componentType?.typeName).toBe('RAM');
  });
});
