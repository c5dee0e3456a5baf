import { Test, TestingModule } from '@nestjs/testing';
import { getDataSourceToken, getRepositoryToken } from '@nestjs/typeorm';
import {
  buildAsset,
  createMockAuditService,
  createMockRepository,
  MockAuditService,
  MockRepository,
} from '../../../../test/helpers/mock-factories';
import {
  InvalidStatusTransitionError,
  RecordNotFoundError,
  RequisitionCancelledError,
  RequisitionItemTargetError,
  RequisitionWithoutItemsError,
} from '../../../common/exceptions';
import { TablePreferencesService } from '../../../common/table';
import { isAutoLogSuppressed } from '../../audit/audit-scope';
import { AuditService } from '../../audit/audit.service';
import { Asset } from '../../assets/entities/asset.entity';
import { AuditAction, EventCategory } from '../../audit/constants/audit.constants';
import { DepartmentsService } from '../../organization/services/departments.service';
import { EmployeesService } from '../../organization/services/employees.service';
import { RequisitionItem } from '../entities/requisition-item.entity';
import { Requisition } from '../entities/requisition.entity';
import { RequisitionItemType, RequisitionPriority, RequisitionStatus } from '../enums/procurement.enums';
import { RequisitionsService } from './requisitions.service';

function buildRequisition(overrides: Partial<Requisition> = {}): Requisition {
  return Object.assign(new Requisition(), {
    id: 3,
    requisitionNumber: 'REQ-0003',
    companyId: 1,
    departmentId: 1,
    requestedById: 1,
    approvedById: null,
    requisitionDate: '2024-03-01',
    specifications: null,
    priority: RequisitionPriority.NORMAL,
    status: RequisitionStatus.PENDING,
    notes: null,
    fulfilledDate: null,
    cancellationReason: null,
    ...overrides,
  });
}

describe('RequisitionsService', () => {
  let service: RequisitionsService;
  let requisitionRepository: MockRepository<Requisition>;
  let itemRepository: MockRepository<RequisitionItem>;
  let targetRepository: MockRepository<Asset>;
  let departmentsService: { findOne: jest.Mock };
  let employeesService: { findOne: jest.Mock };
  let auditService: MockAuditService;

  beforeEach(async () => {
    requisitionRepository = createMockRepository<Requisition>();
    itemRepository = createMockRepository<RequisitionItem>();
    targetRepository = createMockRepository<Asset>();
    departmentsService = { findOne: jest.fn().mockResolvedValue({ id: 1 }) };
    employeesService = { findOne: jest.fn().mockResolvedValue({ id: 1 }) };
    auditService = createMockAuditService();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        RequisitionsService,
        TablePreferencesService,
        { provide: getRepositoryToken(Requisition), useValue: requisitionRepository },
        { provide: getRepositoryToken(RequisitionItem), useValue: itemRepository },
        { provide: getDataSourceToken(), useValue: { getRepository: jest.fn(() => targetRepository) } },
        { provide: DepartmentsService, useValue: departmentsService },
        { provide: EmployeesService, useValue: employeesService },
        { provide: AuditService, useValue: auditService },
      ],
    }).compile();

    service = module.get<RequisitionsService>(RequisitionsService);
  });

  describe('create', () => {
    it('should default the requisition date to today', async () => {
      requisitionRepository.save?.mockImplementation((entity: Requisition) => Promise.resolve({ ...entity, id: 3 }));
      requisitionRepository.findOne?.mockResolvedValue(buildRequisition());

      await service.create({ requisitionNumber: 'REQ-0003', companyId: 1, departmentId: 1, requestedById: 1 });

      expect(requisitionRepository.save).toHaveBeenCalledWith(
        expect.objectContaining({ requisitionDate: new Date().toISOString().slice(0, 10) }),
      );
    });

    it('should reject an unknown requester', async () => {
      employeesService.findOne.mockRejectedValue(new RecordNotFoundError('Employee', 9));

      await expect(
        service.create({ requisitionNumber: 'REQ-0004', companyId: 1, departmentId: 1, requestedById: 9 }),
      ).rejects.toThrow(RecordNotFoundError);
      expect(requisitionRepository.save).not.toHaveBeenCalled();
    });
  });

  describe('fulfil', () => {
    it('should fulfil a pending requisition without automatic logging', async () => {
      const requisition = buildRequisition();
      requisitionRepository.findOneBy?.mockResolvedValue(requisition);
      requisitionRepository.findOne?.mockResolvedValue(requisition);
      itemRepository.countBy?.mockResolvedValue(1);
      let suppressed = false;
      requisitionRepository.save?.mockImplementation((entity: Requisition) => {
        suppressed = isAutoLogSuppressed();
        return Promise.resolve(entity);
      });

      await service.fulfil(3);

      expect(suppressed).toBe(true);
      expect(requisition.status).toBe(RequisitionStatus.FULFILLED);
      expect(requisition.fulfilledDate).toBe(new Date().toISOString().slice(0, 10));
      expect(auditService.record).toHaveBeenCalledWith({
        eventType: EventCategory.REQUISITION,
        action: AuditAction.FULFILLED,
        message: 'Requisition REQ-0003 marked as fulfilled',
        detail: 'Fulfilled',
        entity: requisition,
        changes: { status: ['pending', 'fulfilled'] },
      });
    });

    it('should refuse a cancelled requisition', async () => {
      requisitionRepository.findOneBy?.mockResolvedValue(buildRequisition({ status: RequisitionStatus.CANCELLED }));

      await expect(service.fulfil(3)).rejects.toThrow(InvalidStatusTransitionError);
      expect(auditService.record).not.toHaveBeenCalled();
    });

    it('should refuse a requisition with no items', async () => {
      requisitionRepository.findOneBy?.mockResolvedValue(buildRequisition());

      await expect(service.fulfil(3)).rejects.toThrow(RequisitionWithoutItemsError);
      expect(itemRepository.countBy).toHaveBeenCalledWith({ requisitionId: 3 });
      expect(requisitionRepository.save).not.toHaveBeenCalled();
      expect(auditService.record).not.toHaveBeenCalled();
    });
  });

  describe('addItem', () => {
    it('should link an asset and type the item after it', async () => {
      const requisition = buildRequisition();
      const asset = buildAsset({ id: 8, assetTag: 'ENG0008' });
      requisitionRepository.findOneBy?.mockResolvedValue(requisition);
      targetRepository.findOneBy?.mockResolvedValue(asset);
      itemRepository.save?.mockImplementation((item: RequisitionItem) => Promise.resolve({ ...item, id: 12 }));
      itemRepository.findOne?.mockResolvedValue({ id: 12 });

      await service.addItem(3, { assetId: 8 });

      expect(itemRepository.save).toHaveBeenCalledWith(
        expect.objectContaining({
          requisitionId: 3,
          itemType: RequisitionItemType.ASSET,
          assetId: 8,
          componentId: null,
          asset,
          requisition,
        }),
      );
      expect(itemRepository.findOne).toHaveBeenCalledWith({
        where: { id: 12, requisitionId: 3 },
        relations: { requisition: true, asset: true, component: true },
      });
    });

    it('should refuse an item naming both an asset and a component', async () => {
      await expect(service.addItem(3, { assetId: 8, componentId: 2 })).rejects.toThrow(RequisitionItemTargetError);
      expect(requisitionRepository.findOneBy).not.toHaveBeenCalled();
    });

    it('should refuse an item naming nothing', async () => {
      await expect(service.addItem(3, {})).rejects.toThrow(RequisitionItemTargetError);
    });

    it('should refuse a cancelled requisition', async () => {
      requisitionRepository.findOneBy?.mockResolvedValue(buildRequisition({ status: RequisitionStatus.CANCELLED }));

      await expect(service.addItem(3, { assetId: 8 })).rejects.toThrow(RequisitionCancelledError);
      expect(itemRepository.save).not.toHaveBeenCalled();
    });

    it('should reject an unknown asset', async () => {
      requisitionRepository.findOneBy?.mockResolvedValue(buildRequisition());
      targetRepository.findOneBy?.mockResolvedValue(null);

      await expect(service.addItem(3, { assetId: 404 })).rejects.toThrow(RecordNotFoundError);
      expect(itemRepository.save).not.toHaveBeenCalled();
    });
  });

  describe('cancel', () => {
    beforeEach(() => {
      requisitionRepository.findOne?.mockResolvedValue(buildRequisition());
    });

    it('should keep the reason and use it as detail', async () => {
      const requisition = buildRequisition();
      requisitionRepository.findOneBy?.mockResolvedValue(requisition);

      await service.cancel(3, 'Budget withdrawn');

      expect(requisition.cancellationReason).toBe('Budget withdrawn');
      expect(auditService.record).toHaveBeenCalledWith(
        expect.objectContaining({
          action: AuditAction.CANCELLED,
          message: 'Requisition REQ-0003 cancelled',
          detail: 'Budget withdrawn',
          changes: { status: ['pending', 'cancelled'] },
        }),
      );
    });

    it('should fall back to the status label without a reason', async () => {
      const requisition = buildRequisition();
      requisitionRepository.findOneBy?.mockResolvedValue(requisition);

      await service.cancel(3);

      expect(requisition.cancellationReason).toBeNull();
      expect(auditService.record).toHaveBeenCalledWith(expect.objectContaining({ detail: 'Cancelled' }));
    });

    it('should refuse a fulfilled requisition', async () => {
      requisitionRepository.findOneBy?.mockResolvedValue(buildRequisition({ status: RequisitionStatus.FULFILLED }));

      await expect(service.cancel(3)).rejects.toThrow(InvalidStatusTransitionError);
    });
  });
});
