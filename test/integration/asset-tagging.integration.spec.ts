import { Asset } from '../../src/modules/assets/entities/asset.entity';
import { AssetsService } from '../../src/modules/assets/services/assets.service';
import { ComponentsService } from '../../src/modules/components/services/components.service';
import { ComponentStatus } from '../../src/modules/components/enums/component-status.enum';
import { createTestApp, TestApp } from '../helpers/test-app';
import { RegistryFixtures, seedRegistry } from './registry-fixtures';

describe('Tag generation (integration)', () => {
  let testApp: TestApp;
  let fixtures: RegistryFixtures;
  let assetsService: AssetsService;
  let componentsService: ComponentsService;

  beforeEach(async () => {
    testApp = await createTestApp();
    fixtures = await seedRegistry(testApp.module);
    assetsService = testApp.module.get(AssetsService);
    componentsService = testApp.module.get(ComponentsService);
  });

  afterEach(async () => {
    await testApp.app.close();
  });

  it('numbers assets under the holder department prefix', async () => {
    const first = await assetsService.create({
      assetModelId: fixtures.assetModelId,
      companyId: fixtures.companyId,
      assignedToId: fixtures.employeeId,
    });
    const second = await assetsService.create({
      assetModelId: fixtures.assetModelId,
      companyId: fixtures.companyId,
      assignedToId: fixtures.employeeId,
    });

    expect(first.assetTag).toBe('ENG0001');
    expect(second.assetTag).toBe('ENG0002');
  });

  it('falls back to the company prefix, then the default', async () => {
    const companyAsset = await assetsService.create({
      assetModelId: fixtures.assetModelId,
      companyId: fixtures.companyId,
    });
    const bareAsset = await assetsService.create({ assetModelId: fixtures.assetModelId });

    expect(companyAsset.assetTag).toBe('ACME0001');
    expect(bareAsset.assetTag).toBe('ASSET0001');
  });

  it('continues after the highest existing sequence', async () => {
    await assetsService.create({ assetModelId: fixtures.assetModelId, assetTag: 'ASSET0041' });

    const next = await assetsService.create({ assetModelId: fixtures.assetModelId });

    expect(next.assetTag).toBe('ASSET0042');
  });

  it('ignores look-alike tags that differ only in case', async () => {
    const lookAlikes = Array.from({ length: 100 }, (_, index) => ({
      assetTag: `asset9${String(index).padStart(3, '0')}`,
      assetModelId: fixtures.assetModelId,
    }));
    await testApp.dataSource
      .createQueryBuilder()
      .insert()
      .into(Asset)
      .values(lookAlikes)
      .callListeners(false)
      .execute();
    await assetsService.create({ assetModelId: fixtures.assetModelId, assetTag: 'ASSET0041' });

    const next = await assetsService.create({ assetModelId: fixtures.assetModelId });

    expect(next.assetTag).toBe('ASSET0042');
  });

  it('keeps an explicit tag, trimmed', async () => {
    const asset = await assetsService.create({ assetModelId: fixtures.assetModelId, assetTag: '  LOANER-7 ' });

    expect(asset.assetTag).toBe('LOANER-7');
  });

  it('tags components after their parent asset placement', async () => {
    const parent = await assetsService.create({
      assetModelId: fixtures.assetModelId,
      companyId: fixtures.companyId,
    });

    const installed = await componentsService.create({
      componentTypeId: fixtures.componentTypeId,
      parentAssetId: parent.id,
      status: ComponentStatus.INSTALLED,
    });
    const spare = await componentsService.create({
      componentTypeId: fixtures.componentTypeId,
      status: ComponentStatus.SPARE,
    });

    expect(installed.componentTag).toBe('ACMEC0001');
    expect(spare.componentTag).toBe('COMP0001');
  });
});
