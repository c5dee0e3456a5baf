import { Test, TestingModule } from '@nestjs/testing';
import { getDataSourceToken, getRepositoryToken } from '@nestjs/typeorm';
import { IsNull } from 'typeorm';
import {
  buildAsset,
  buildCompany,
  buildEmployee,
  buildLocation,
  createMockAuditService,
  createMockRepository,
  MockAuditService,
  MockRepository,
} from '../../../../test/helpers/mock-factories';
import { AssetAssignmentConflictError, AssetNotAssignedError, RecordNotFoundError } from '../../../common/exceptions';
import { TablePreferencesService } from '../../../common/table';
import { isAutoLogSuppressed } from '../../audit/audit-scope';
import { AuditService } from '../../audit/audit.service';
import { AuditAction, EventCategory } from '../../audit/constants/audit.constants';
import { Company } from '../../organization/entities/company.entity';
import { Employee } from '../../organization/entities/employee.entity';
import { Location } from '../../organization/entities/location.entity';
import { TagService } from '../../tagging/tag.service';
import { AssetAssignment } from '../entities/asset-assignment.entity';
import { Asset } from '../entities/asset.entity';
import { AssetStatus } from '../enums/asset-status.enum';
import { AssetRepository } from '../repositories/asset.repository';
import { AssetsService } from './assets.service';

describe('AssetsService', () => {
  let service: AssetsService;
  let assetRepository: MockRepository<Asset>;
  let companyRepository: MockRepository<Company>;
  let employeeRepository: MockRepository<Employee>;
  let locationRepository: MockRepository<Location>;
  let manager: { update: jest.Mock; save: jest.Mock; create: jest.Mock; remove: jest.Mock };
  let auditService: MockAuditService;
  let tagService: { generateAssetTag: jest.Mock };
  const assetTags = {};

  const holder = buildEmployee({ id: 3, name: 'John Roe', employeeId: 'E-1002' });

  beforeEach(async () => {
    assetRepository = createMockRepository<Asset>();
    assetRepository.update = jest.fn().mockResolvedValue({ affected: 2 });
    companyRepository = createMockRepository<Company>();
    employeeRepository = createMockRepository<Employee>();
    locationRepository = createMockRepository<Location>();
    manager = {
      update: jest.fn().mockResolvedValue({ affected: 1 }),
      save: jest.fn().mockImplementation((entity) => Promise.resolve(entity)),
      create: jest.fn().mockImplementation((_target, values) => ({ ...values })),
      remove: jest.fn().mockImplementation((entities) => Promise.resolve(entities)),
    };
    auditService = createMockAuditService();
    tagService = { generateAssetTag: jest.fn().mockResolvedValue('ENG0001') };

    const dataSource = {
      transaction: jest.fn((work: (m: typeof manager) => Promise<unknown>) => work(manager)),
      getRepository: jest.fn((target: unknown) => {
        if (target === Employee) return employeeRepository;
        if (target === Location) return locationRepository;
        return companyRepository;
      }),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        AssetsService,
        TablePreferencesService,
        { provide: getRepositoryToken(Asset), useValue: assetRepository },
        { provide: getRepositoryToken(AssetAssignment), useValue: createMockRepository<AssetAssignment>() },
        { provide: getDataSourceToken(), useValue: dataSource },
        { provide: AssetRepository, useValue: assetTags },
        { provide: TagService, useValue: tagService },
        { provide: AuditService, useValue: auditService },
      ],
    }).compile();

    service = module.get<AssetsService>(AssetsService);
  });

  describe('create', () => {
    beforeEach(() => {
      assetRepository.save?.mockImplementation((asset: Asset) => Promise.resolve({ ...asset, id: 5 }));
      assetRepository.findOne?.mockResolvedValue(buildAsset({ id: 5 }));
    });

    it('should generate a tag from the company when none is given', async () => {
      const company = buildCompany({ id: 2, code: 'ENG' });
      companyRepository.findOneBy?.mockResolvedValue(company);

      await service.create({ assetModelId: 1, companyId: 2 });

      expect(tagService.generateAssetTag).toHaveBeenCalledWith(assetTags, { company, department: null });
      expect(assetRepository.save).toHaveBeenCalledWith(expect.objectContaining({ assetTag: 'ENG0001' }));
    });

    it('should keep an explicit tag', async () => {
      await service.create({ assetModelId: 1, assetTag: ' LAP-7 ' });

      expect(tagService.generateAssetTag).not.toHaveBeenCalled();
      expect(assetRepository.save).toHaveBeenCalledWith(expect.objectContaining({ assetTag: 'LAP-7' }));
    });

    it('should reject an asset held by an employee and a location at once', async () => {
      await expect(service.create({ assetModelId: 1, assignedToId: 3, locationId: 2 })).rejects.toThrow(
        AssetAssignmentConflictError,
      );
      expect(assetRepository.save).not.toHaveBeenCalled();
    });
  });

  describe('findOne', () => {
    it('should throw when the asset does not exist', async () => {
      assetRepository.findOne?.mockResolvedValue(null);

      await expect(service.findOne(99)).rejects.toThrow(RecordNotFoundError);
    });
  });

  describe('changeStatus', () => {
    it('should save without automatic logging and record the transition', async () => {
      const asset = buildAsset({ id: 5, assetTag: 'ENG0001', status: AssetStatus.PENDING });
      assetRepository.findOneBy?.mockResolvedValue(asset);
      assetRepository.findOne?.mockResolvedValue(asset);
      let suppressedDuringSave = false;
      assetRepository.save?.mockImplementation((entity: Asset) => {
        suppressedDuringSave = isAutoLogSuppressed();
        return Promise.resolve(entity);
      });

      await service.changeStatus(5, AssetStatus.ACTIVE);

      expect(suppressedDuringSave).toBe(true);
      expect(auditService.record).toHaveBeenCalledWith({
        eventType: EventCategory.ASSET,
        action: AuditAction.STATUS_CHANGED,
        message: 'Asset ENG0001 status changed to active',
        detail: 'Active',
        entity: asset,
        changes: { status: ['pending', 'active'] },
      });
    });
  });

  describe('assign', () => {
    it('should close the open assignment and open a new one', async () => {
      const asset = buildAsset({ id: 5, assetTag: 'ENG0001', assignedToId: 3, assignedTo: holder });
      assetRepository.findOne?.mockResolvedValue(asset);
      employeeRepository.findOneBy?.mockResolvedValue(buildEmployee({ id: 8 }));

      await service.assign(5, { employeeId: 8, conditionOnAssignment: 'New' });

      expect(manager.update).toHaveBeenCalledWith(
        AssetAssignment,
        { assetId: 5, employeeId: 3, returnedDate: IsNull() },
        { returnedDate: expect.any(Date) },
      );
      expect(manager.update).toHaveBeenCalledWith(Asset, { id: 5 }, { assignedToId: 8, locationId: null });
      expect(manager.create).toHaveBeenCalledWith(
        AssetAssignment,
        expect.objectContaining({ assetId: 5, employeeId: 8, conditionOnAssignment: 'New', returnedDate: null }),
      );
      expect(auditService.record).toHaveBeenCalledWith(
        expect.objectContaining({
          action: AuditAction.ASSIGNED,
          message: 'Asset ENG0001 assigned to Jane Doe (E-1001)',
          changes: { assigned_to: ['John Roe (E-1002)', 'Jane Doe (E-1001)'] },
        }),
      );
    });

    it('should throw when the employee does not exist', async () => {
      assetRepository.findOne?.mockResolvedValue(buildAsset({ id: 5 }));
      employeeRepository.findOneBy?.mockResolvedValue(null);

      await expect(service.assign(5, { employeeId: 404 })).rejects.toThrow(RecordNotFoundError);
      expect(auditService.record).not.toHaveBeenCalled();
    });
  });

  describe('unassign', () => {
    it('should reject an asset nobody holds', async () => {
      assetRepository.findOne?.mockResolvedValue(buildAsset({ id: 5, assetTag: 'ENG0001' }));

      await expect(service.unassign(5)).rejects.toThrow(AssetNotAssignedError);
      expect(manager.update).not.toHaveBeenCalled();
    });

    it('should return the asset and name the previous holder', async () => {
      assetRepository.findOne?.mockResolvedValue(
        buildAsset({ id: 5, assetTag: 'ENG0001', assignedToId: 3, assignedTo: holder }),
      );

      await service.unassign(5, { conditionOnReturn: 'Scratched lid' });

      expect(manager.update).toHaveBeenCalledWith(
        AssetAssignment,
        { assetId: 5, employeeId: 3, returnedDate: IsNull() },
        { returnedDate: expect.any(Date), conditionOnReturn: 'Scratched lid' },
      );
      expect(manager.update).toHaveBeenCalledWith(Asset, { id: 5 }, { assignedToId: null });
      expect(auditService.record).toHaveBeenCalledWith(
        expect.objectContaining({
          action: AuditAction.UNASSIGNED,
          message: 'Asset ENG0001 unassigned from John Roe (E-1002)',
          detail: 'John Roe (E-1002)',
        }),
      );
    });
  });

  describe('duplicate', () => {
    it('should store a pending unassigned copy', async () => {
      const source = buildAsset({ id: 5, assetTag: 'ENG0001', serialNumber: 'SN-1', assignedToId: 3, notes: 'Desk 4' });
      assetRepository.findOneBy?.mockResolvedValue(source);
      assetRepository.save?.mockImplementation((asset: Asset) => Promise.resolve(Object.assign(new Asset(), asset, { id: 6 })));
      assetRepository.findOne?.mockResolvedValue(buildAsset({ id: 6 }));

      await service.duplicate(5);

      expect(assetRepository.save).toHaveBeenCalledWith(
        expect.objectContaining({
          assetTag: 'ENG0001-COPY',
          serialNumber: '',
          status: AssetStatus.PENDING,
          assignedToId: null,
          notes: 'Desk 4',
        }),
      );
      expect(auditService.record).toHaveBeenCalledWith(
        expect.objectContaining({
          action: AuditAction.DUPLICATED,
          message: 'Asset ENG0001-COPY duplicated from ENG0001',
          detail: 'Pending',
        }),
      );
    });
  });

  describe('transfer', () => {
    it('should unassign a held asset moving to a location', async () => {
      assetRepository.findOne?.mockResolvedValue(
        buildAsset({ id: 5, assetTag: 'ENG0001', assignedToId: 3, assignedTo: holder, location: null }),
      );
      locationRepository.findOneBy?.mockResolvedValue(buildLocation({ id: 2, name: 'Warehouse' }));

      await service.transfer(5, { locationId: 2 });

      expect(manager.update).toHaveBeenCalledWith(Asset, { id: 5 }, { locationId: 2, assignedToId: null });
      expect(auditService.record).toHaveBeenCalledWith(
        expect.objectContaining({
          action: AuditAction.TRANSFERRED,
          message: 'Asset ENG0001 transferred to Warehouse',
          detail: 'none -> Warehouse; unassigned from John Roe (E-1002)',
          changes: { location: ['none', 'Warehouse'] },
        }),
      );
    });

    it('should clear the location', async () => {
      assetRepository.findOne?.mockResolvedValue(
        buildAsset({ id: 5, assetTag: 'ENG0001', locationId: 1, location: buildLocation() }),
      );

      await service.transfer(5, { locationId: null });

      expect(locationRepository.findOneBy).not.toHaveBeenCalled();
      expect(manager.update).toHaveBeenCalledTimes(1);
      expect(manager.update).toHaveBeenCalledWith(Asset, { id: 5 }, { locationId: null });
      expect(auditService.record).toHaveBeenCalledWith(
        expect.objectContaining({ detail: 'Berlin HQ -> none', changes: { location: ['Berlin HQ', 'none'] } }),
      );
    });
  });

  describe('bulk operations', () => {
    it('should unassign every held asset and write one entry', async () => {
      assetRepository.find?.mockResolvedValue([
        buildAsset({ id: 1, assignedToId: 3 }),
        buildAsset({ id: 2, assignedToId: 4 }),
      ]);

      await expect(service.bulkUnassign([1, 2, 3])).resolves.toEqual({ count: 2 });

      expect(manager.update).toHaveBeenCalledWith(Asset, { id: 2 }, { assignedToId: null });
      expect(auditService.record).toHaveBeenCalledTimes(1);
      expect(auditService.record).toHaveBeenCalledWith({
        eventType: EventCategory.ASSET,
        action: AuditAction.UNASSIGNED,
        message: '2 asset(s) bulk unassigned',
      });
    });

    it('should write nothing when no selected asset is held', async () => {
      assetRepository.find?.mockResolvedValue([]);

      await expect(service.bulkUnassign([1])).resolves.toEqual({ count: 0 });
      expect(auditService.record).not.toHaveBeenCalled();
    });

    it('should delete the selected assets', async () => {
      const assets = [buildAsset({ id: 1, assetTag: 'ENG0001' }), buildAsset({ id: 2, assetTag: 'ENG0002' })];
      assetRepository.findBy?.mockResolvedValue(assets);

      await expect(service.bulkDelete([1, 2])).resolves.toEqual({ count: 2 });

      expect(manager.remove).toHaveBeenCalledWith(assets);
      expect(auditService.record).toHaveBeenCalledWith({
        eventType: EventCategory.ASSET,
        action: AuditAction.BULK_DELETED,
        message: '2 asset(s) bulk deleted',
        detail: 'ENG0001, ENG0002',
      });
    });

    it('should change the status of the selected assets', async () => {
      assetRepository.find?.mockResolvedValue([buildAsset({ id: 1 }), buildAsset({ id: 2 })]);

      await expect(service.bulkStatus([1, 2, 9], AssetStatus.RETIRED)).resolves.toEqual({ count: 2 });

      expect(assetRepository.update).toHaveBeenCalledWith({ id: expect.anything() }, { status: AssetStatus.RETIRED });
      expect(auditService.record).toHaveBeenCalledWith({
        eventType: EventCategory.ASSET,
        action: AuditAction.BULK_STATUS,
        message: '2 asset(s) bulk status changed to retired',
        detail: 'retired',
      });
    });
  });
});
