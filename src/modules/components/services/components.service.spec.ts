import { Test, TestingModule } from '@nestjs/testing';
import { getDataSourceToken, getRepositoryToken } from '@nestjs/typeorm';
import {
  buildAsset,
  buildCompany,
  buildComponent,
  createMockAuditService,
  createMockRepository,
  MockAuditService,
  MockRepository,
} from '../../../../test/helpers/mock-factories';
import { InstalledComponentWithoutAssetError, RecordNotFoundError } from '../../../common/exceptions';
import { TablePreferencesService } from '../../../common/table';
import { Asset } from '../../assets/entities/asset.entity';
import { AuditService } from '../../audit/audit.service';
import { AuditAction, EventCategory } from '../../audit/constants/audit.constants';
import { TagService } from '../../tagging/tag.service';
import { ComponentHistory } from '../entities/component-history.entity';
import { Component } from '../entities/component.entity';
import { ComponentAction, ComponentStatus } from '../enums/component-status.enum';
import { ComponentRepository } from '../repositories/component.repository';
import { ComponentsService } from './components.service';

describe('ComponentsService', () => {
  let service: ComponentsService;
  let componentRepository: MockRepository<Component>;
  let historyRepository: MockRepository<ComponentHistory>;
  let assetRepository: MockRepository<Asset>;
  let manager: { save: jest.Mock; remove: jest.Mock };
  let auditService: MockAuditService;
  let tagService: { generateComponentTag: jest.Mock };
  const componentTags = {};

  beforeEach(async () => {
    componentRepository = createMockRepository<Component>();
    historyRepository = createMockRepository<ComponentHistory>();
    assetRepository = createMockRepository<Asset>();
    manager = {
      save: jest.fn().mockImplementation((entities) => Promise.resolve(entities)),
      remove: jest.fn().mockImplementation((entities) => Promise.resolve(entities)),
    };
    auditService = createMockAuditService();
    tagService = { generateComponentTag: jest.fn().mockResolvedValue('ENGC0001') };

    const dataSource = {
      transaction: jest.fn((work: (m: typeof manager) => Promise<unknown>) => work(manager)),
      getRepository: jest.fn(() => assetRepository),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ComponentsService,
        TablePreferencesService,
        { provide: getRepositoryToken(Component), useValue: componentRepository },
        { provide: getRepositoryToken(ComponentHistory), useValue: historyRepository },
        { provide: getDataSourceToken(), useValue: dataSource },
        { provide: ComponentRepository, useValue: componentTags },
        { provide: TagService, useValue: tagService },
        { provide: AuditService, useValue: auditService },
      ],
    }).compile();

    service = module.get<ComponentsService>(ComponentsService);
  });

  describe('create', () => {
    beforeEach(() => {
      componentRepository.save?.mockImplementation((component: Component) => Promise.resolve({ ...component, id: 9 }));
      componentRepository.findOne?.mockResolvedValue(buildComponent({ id: 9 }));
    });

    it('should reject an installed component without a parent asset', async () => {
      await expect(service.create({ componentTypeId: 1, status: ComponentStatus.INSTALLED })).rejects.toThrow(
        InstalledComponentWithoutAssetError,
      );
    });

    it('should treat a component without status as installed', async () => {
      await expect(service.create({ componentTypeId: 1 })).rejects.toThrow(InstalledComponentWithoutAssetError);
    });

    it('should generate a tag from the parent asset placement', async () => {
      const company = buildCompany({ code: 'ENG' });
      assetRepository.findOne?.mockResolvedValue(buildAsset({ id: 2, company, assignedTo: null }));

      await service.create({ componentTypeId: 1, parentAssetId: 2 });

      expect(assetRepository.findOne).toHaveBeenCalledWith({
        where: { id: 2 },
        relations: { company: true, assignedTo: { department: true } },
      });
      expect(tagService.generateComponentTag).toHaveBeenCalledWith(componentTags, { company, department: null });
      expect(componentRepository.save).toHaveBeenCalledWith(expect.objectContaining({ componentTag: 'ENGC0001' }));
    });

    it('should store a spare component with an explicit tag', async () => {
      await service.create({ componentTypeId: 1, status: ComponentStatus.SPARE, componentTag: 'RAM-01' });

      expect(tagService.generateComponentTag).not.toHaveBeenCalled();
      expect(componentRepository.save).toHaveBeenCalledWith(
        expect.objectContaining({ componentTag: 'RAM-01', status: ComponentStatus.SPARE }),
      );
    });
  });

  describe('changeStatus', () => {
    let component: Component;

    beforeEach(() => {
      component = buildComponent({ id: 9, componentTag: 'ENGC0001', status: ComponentStatus.SPARE });
      componentRepository.findOneBy?.mockResolvedValue(component);
      componentRepository.findOne?.mockResolvedValue(component);
    });

    it('should require a parent asset to install', async () => {
      await expect(service.changeStatus(9, { status: ComponentStatus.INSTALLED })).rejects.toThrow(
        InstalledComponentWithoutAssetError,
      );
      expect(componentRepository.save).not.toHaveBeenCalled();
    });

    it('should throw when the parent asset does not exist', async () => {
      assetRepository.findOneBy?.mockResolvedValue(null);

      await expect(service.changeStatus(9, { status: ComponentStatus.INSTALLED, parentAssetId: 404 })).rejects.toThrow(
        RecordNotFoundError,
      );
    });

    it('should install into the parent asset', async () => {
      assetRepository.findOneBy?.mockResolvedValue(buildAsset({ id: 2, assetTag: 'ENG0001' }));

      await service.changeStatus(9, { status: ComponentStatus.INSTALLED, parentAssetId: 2 });

      expect(componentRepository.save).toHaveBeenCalledWith(
        expect.objectContaining({ parentAssetId: 2, status: ComponentStatus.INSTALLED, removalDate: null }),
      );
      expect(auditService.record).toHaveBeenCalledWith({
        eventType: EventCategory.COMPONENT,
        action: AuditAction.ASSIGNED,
        message: 'Component ENGC0001 installed in asset ENG0001',
        detail: 'ENG0001',
        entity: component,
        changes: { status: ['spare', 'installed'], parent_asset: [null, 'ENG0001'] },
      });
    });

    it('should add an installed row to the history', async () => {
      assetRepository.findOneBy?.mockResolvedValue(buildAsset({ id: 2, assetTag: 'ENG0001' }));

      await service.changeStatus(9, { status: ComponentStatus.INSTALLED, parentAssetId: 2 });

      expect(historyRepository.save).toHaveBeenCalledWith([
        expect.objectContaining({ componentId: 9, parentAssetId: 2, action: ComponentAction.INSTALLED }),
      ]);
    });

    it('should record the removal from the previous parent when moving', async () => {
      component.status = ComponentStatus.INSTALLED;
      component.parentAssetId = 3;
      assetRepository.findOneBy?.mockResolvedValue(buildAsset({ id: 2, assetTag: 'ENG0001' }));

      await service.changeStatus(9, { status: ComponentStatus.INSTALLED, parentAssetId: 2 });

      expect(historyRepository.save).toHaveBeenCalledWith([
        expect.objectContaining({ parentAssetId: 3, action: ComponentAction.REMOVED }),
        expect.objectContaining({ parentAssetId: 2, action: ComponentAction.INSTALLED }),
      ]);
    });

    it('should add nothing to the history when reinstalled in the same parent', async () => {
      component.status = ComponentStatus.INSTALLED;
      component.parentAssetId = 2;
      assetRepository.findOneBy?.mockResolvedValue(buildAsset({ id: 2, assetTag: 'ENG0001' }));

      await service.changeStatus(9, { status: ComponentStatus.INSTALLED, parentAssetId: 2 });

      expect(historyRepository.save).toHaveBeenCalledWith([]);
    });

    it('should record a failure inside the parent asset', async () => {
      component.status = ComponentStatus.INSTALLED;
      component.parentAssetId = 2;

      await service.changeStatus(9, { status: ComponentStatus.FAILED });

      expect(historyRepository.save).toHaveBeenCalledWith(
        expect.objectContaining({ componentId: 9, parentAssetId: 2, action: ComponentAction.FAILED }),
      );
    });

    it('should record any other transition', async () => {
      await service.changeStatus(9, { status: ComponentStatus.FAILED });

      expect(auditService.record).toHaveBeenCalledWith(
        expect.objectContaining({
          action: AuditAction.STATUS_CHANGED,
          message: 'Component ENGC0001 status changed to failed',
          detail: 'Failed',
          changes: { status: ['spare', 'failed'] },
        }),
      );
    });
  });

  describe('unassign', () => {
    it('should return the component to spare stock', async () => {
      const component = buildComponent({
        id: 9,
        componentTag: 'ENGC0001',
        status: ComponentStatus.INSTALLED,
        parentAssetId: 2,
        parentAsset: buildAsset({ id: 2, assetTag: 'ENG0001' }),
      });
      componentRepository.findOne?.mockResolvedValue(component);

      await service.unassign(9);

      expect(componentRepository.save).toHaveBeenCalledWith(
        expect.objectContaining({ parentAssetId: null, parentAsset: null, status: ComponentStatus.SPARE }),
      );
      expect(historyRepository.save).toHaveBeenCalledWith(
        expect.objectContaining({ componentId: 9, parentAssetId: 2, action: ComponentAction.REMOVED }),
      );
      expect(auditService.record).toHaveBeenCalledWith(
        expect.objectContaining({
          action: AuditAction.UNASSIGNED,
          message: 'Component ENGC0001 unassigned from asset ENG0001',
          detail: 'ENG0001',
        }),
      );
    });
  });

  describe('getHistory', () => {
    it('should list the trail newest first', async () => {
      componentRepository.findOneBy?.mockResolvedValue(buildComponent({ id: 9 }));

      await service.getHistory(9);

      expect(historyRepository.find).toHaveBeenCalledWith({
        where: { componentId: 9 },
        relations: { parentAsset: true, performedBy: true },
        order: { actionDate: 'DESC', id: 'DESC' },
      });
    });

    it('should throw for an unknown component', async () => {
      componentRepository.findOneBy?.mockResolvedValue(null);

      await expect(service.getHistory(404)).rejects.toThrow(RecordNotFoundError);
    });
  });

  describe('bulkUnassign', () => {
    it('should detach the selected components in one transaction', async () => {
      const components = [
        buildComponent({ id: 1, parentAssetId: 2, status: ComponentStatus.INSTALLED }),
        buildComponent({ id: 2, parentAssetId: 3, status: ComponentStatus.INSTALLED }),
      ];
      componentRepository.find?.mockResolvedValue(components);

      await expect(service.bulkUnassign([1, 2])).resolves.toEqual({ count: 2 });

      expect(manager.save).toHaveBeenCalledWith(components);
      expect(manager.save).toHaveBeenCalledWith([
        expect.objectContaining({ componentId: 1, parentAssetId: 2, action: ComponentAction.REMOVED }),
        expect.objectContaining({ componentId: 2, parentAssetId: 3, action: ComponentAction.REMOVED }),
      ]);
      expect(components.every((component) => component.status === ComponentStatus.SPARE)).toBe(true);
      expect(auditService.record).toHaveBeenCalledWith({
        eventType: EventCategory.COMPONENT,
        action: AuditAction.UNASSIGNED,
        message: '2 component(s) bulk unassigned',
      });
    });
  });
});
