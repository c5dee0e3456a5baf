import { Test, TestingModule } from '@nestjs/testing';
import { getDataSourceToken, getRepositoryToken } from '@nestjs/typeorm';
import {
  createMockAuditService,
  createMockRepository,
  MockAuditService,
  MockRepository,
} from '../../../../test/helpers/mock-factories';
import { DuplicateValueError, RecordNotFoundError } from '../../../common/exceptions';
import { Asset } from '../../assets/entities/asset.entity';
import { AssetStatus } from '../../assets/enums/asset-status.enum';
import { AssetsService } from '../../assets/services/assets.service';
import { isAutoLogSuppressed } from '../../audit/audit-scope';
import { AuditService } from '../../audit/audit.service';
import { AuditAction, EventCategory } from '../../audit/constants/audit.constants';
import { Component } from '../../components/entities/component.entity';
import { ComponentStatus } from '../../components/enums/component-status.enum';
import { ComponentsService } from '../../components/services/components.service';
import { DepartmentsService } from '../../organization/services/departments.service';
import { InvoiceLineItem } from '../entities/invoice-line-item.entity';
import { PurchaseInvoice } from '../entities/purchase-invoice.entity';
import { LineItemType, PaymentStatus } from '../enums/procurement.enums';
import { InvoiceLineItemsService } from './invoice-line-items.service';

function buildInvoice(overrides: Partial<PurchaseInvoice> = {}): PurchaseInvoice {
  return Object.assign(new PurchaseInvoice(), {
    id: 5,
    invoiceNumber: 'INV-0005',
    companyId: 1,
    vendorId: 1,
    invoiceDate: '2024-03-01',
    totalAmount: 0,
    paymentStatus: PaymentStatus.UNPAID,
    ...overrides,
  });
}

function buildLine(overrides: Partial<InvoiceLineItem> = {}): InvoiceLineItem {
  return Object.assign(new InvoiceLineItem(), {
    id: 11,
    invoiceId: 5,
    lineNumber: 1,
    companyId: 1,
    departmentId: 2,
    itemType: LineItemType.ASSET,
    description: 'Latitude 7440',
    quantity: 1,
    itemCost: 800,
    assetModelId: 4,
    componentTypeId: null,
    notes: null,
    ...overrides,
  });
}

describe('InvoiceLineItemsService', () => {
  let service: InvoiceLineItemsService;
  let lineItemRepository: MockRepository<InvoiceLineItem>;
  let invoiceRepository: MockRepository<PurchaseInvoice>;
  let assetRepository: MockRepository<Asset>;
  let componentRepository: MockRepository<Component>;
  let departmentsService: { findOne: jest.Mock };
  let assetsService: { create: jest.Mock };
  let componentsService: { create: jest.Mock };
  let auditService: MockAuditService;

  beforeEach(async () => {
    lineItemRepository = createMockRepository<InvoiceLineItem>();
    invoiceRepository = createMockRepository<PurchaseInvoice>();
    invoiceRepository.update = jest.fn().mockResolvedValue({ affected: 1 });
    invoiceRepository.findOneBy?.mockResolvedValue(buildInvoice());
    assetRepository = createMockRepository<Asset>();
    componentRepository = createMockRepository<Component>();
    departmentsService = { findOne: jest.fn().mockResolvedValue({ id: 2 }) };
    assetsService = { create: jest.fn().mockResolvedValue({ id: 1 }) };
    componentsService = { create: jest.fn().mockResolvedValue({ id: 1 }) };
    auditService = createMockAuditService();

    const dataSource = {
      getRepository: jest.fn((target: unknown) => (target === Asset ? assetRepository : componentRepository)),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        InvoiceLineItemsService,
        { provide: getRepositoryToken(InvoiceLineItem), useValue: lineItemRepository },
        { provide: getRepositoryToken(PurchaseInvoice), useValue: invoiceRepository },
        { provide: getDataSourceToken(), useValue: dataSource },
        { provide: DepartmentsService, useValue: departmentsService },
        { provide: AssetsService, useValue: assetsService },
        { provide: ComponentsService, useValue: componentsService },
        { provide: AuditService, useValue: auditService },
      ],
    }).compile();

    service = module.get<InvoiceLineItemsService>(InvoiceLineItemsService);
  });

  describe('create', () => {
    it('should number the line after the last one and take the invoice company', async () => {
      lineItemRepository.findOne
        ?.mockResolvedValueOnce({ id: 10, lineNumber: 2 })
        .mockResolvedValueOnce(buildLine({ id: 12, lineNumber: 3 }));
      lineItemRepository.save?.mockImplementation((item: InvoiceLineItem) => Promise.resolve({ ...item, id: 12 }));

      await service.create(5, { departmentId: 2, itemType: LineItemType.SERVICE, description: 'Setup', itemCost: 90 });

      expect(lineItemRepository.save).toHaveBeenCalledWith(
        expect.objectContaining({ invoiceId: 5, lineNumber: 3, companyId: 1, quantity: 1 }),
      );
    });

    it('should refuse a line number already used on the invoice', async () => {
      lineItemRepository.existsBy?.mockResolvedValue(true);

      await expect(
        service.create(5, {
          lineNumber: 1,
          departmentId: 2,
          itemType: LineItemType.OTHER,
          description: 'Shipping',
          itemCost: 15,
        }),
      ).rejects.toThrow(DuplicateValueError);
      expect(lineItemRepository.save).not.toHaveBeenCalled();
    });

    it('should reject an unknown invoice', async () => {
      invoiceRepository.findOneBy?.mockResolvedValue(null);

      await expect(
        service.create(99, { departmentId: 2, itemType: LineItemType.OTHER, description: 'Shipping', itemCost: 15 }),
      ).rejects.toThrow(RecordNotFoundError);
    });

    it('should bring the invoice total in line with its lines', async () => {
      lineItemRepository.findOne?.mockResolvedValue(buildLine());
      lineItemRepository.save?.mockImplementation((item: InvoiceLineItem) => Promise.resolve({ ...item, id: 11 }));
      lineItemRepository.find?.mockResolvedValue([
        buildLine({ quantity: 2, itemCost: 800 }),
        buildLine({ id: 12, lineNumber: 2, quantity: 5, itemCost: 50 }),
      ]);
      let suppressed = false;
      invoiceRepository.update?.mockImplementation(() => {
        suppressed = isAutoLogSuppressed();
        return Promise.resolve({ affected: 1 });
      });

      await service.create(5, { departmentId: 2, itemType: LineItemType.ASSET, description: 'Latitude', itemCost: 800 });

      expect(invoiceRepository.update).toHaveBeenCalledWith({ id: 5 }, { totalAmount: 1850 });
      expect(suppressed).toBe(true);
    });
  });

  describe('remove', () => {
    it('should keep the invoice total when no lines remain', async () => {
      const line = buildLine();
      lineItemRepository.findOne?.mockResolvedValue(line);
      invoiceRepository.findOneBy?.mockResolvedValue(buildInvoice({ totalAmount: 800 }));

      await service.remove(5, 11);

      expect(lineItemRepository.remove).toHaveBeenCalledWith(line);
      expect(invoiceRepository.update).not.toHaveBeenCalled();
    });
  });

  describe('getReceipts', () => {
    it('should count what each line has produced', async () => {
      lineItemRepository.find?.mockResolvedValue([
        buildLine({ quantity: 3 }),
        buildLine({ id: 12, lineNumber: 2, itemType: LineItemType.SERVICE, itemCost: 90 }),
      ]);
      assetRepository.countBy?.mockResolvedValue(1);

      await expect(service.getReceipts(5)).resolves.toEqual({
        lineItemsTotal: 2490,
        itemsReceived: false,
        lines: [
          { lineItemId: 11, lineNumber: 1, received: 1, remaining: 2, complete: false },
          { lineItemId: 12, lineNumber: 2, received: 0, remaining: 1, complete: true },
        ],
      });
      expect(assetRepository.countBy).toHaveBeenCalledWith({ invoiceLineItemId: 11 });
    });
  });

  describe('receive', () => {
    it('should create only the assets a line still owes, without automatic entries', async () => {
      lineItemRepository.find?.mockResolvedValue([buildLine({ quantity: 3 })]);
      assetRepository.countBy?.mockResolvedValue(1);
      const suppressed: boolean[] = [];
      assetsService.create.mockImplementation(() => {
        suppressed.push(isAutoLogSuppressed());
        return Promise.resolve({ id: 1 });
      });

      await expect(service.receive(5)).resolves.toEqual({ createdAssets: 2, createdComponents: 0, skipped: 0 });

      expect(suppressed).toEqual([true, true]);
      expect(assetsService.create).toHaveBeenCalledWith({
        companyId: 1,
        assetModelId: 4,
        purchaseDate: '2024-03-01',
        purchaseCost: 800,
        status: AssetStatus.PENDING,
        invoiceId: 5,
        invoiceLineItemId: 11,
      });
      expect(auditService.record).toHaveBeenCalledWith({
        eventType: EventCategory.ASSET,
        action: AuditAction.CREATED,
        message: '2 asset(s) auto-created from invoice INV-0005 line 1',
        detail: 'Pending',
        entity: expect.objectContaining({ id: 5 }),
      });
    });

    it('should create spare components named after the line', async () => {
      lineItemRepository.find?.mockResolvedValue([
        buildLine({
          id: 12,
          itemType: LineItemType.COMPONENT,
          description: 'DDR5 16GB',
          quantity: 2,
          itemCost: 50,
          assetModelId: null,
          componentTypeId: 6,
        }),
      ]);

      await expect(service.receive(5)).resolves.toEqual({ createdAssets: 0, createdComponents: 2, skipped: 0 });

      expect(componentsService.create).toHaveBeenCalledTimes(2);
      expect(componentsService.create).toHaveBeenCalledWith({
        componentTypeId: 6,
        manufacturer: 'DDR5 16GB',
        status: ComponentStatus.SPARE,
        purchaseDate: '2024-03-01',
        invoiceId: 5,
        invoiceLineItemId: 12,
      });
      expect(auditService.record).toHaveBeenCalledWith(
        expect.objectContaining({
          eventType: EventCategory.COMPONENT,
          message: '2 component(s) auto-created from invoice INV-0005 line 1',
          detail: 'Spare',
        }),
      );
    });

    it('should skip complete lines and ignore service lines', async () => {
      lineItemRepository.find?.mockResolvedValue([
        buildLine({ quantity: 2 }),
        buildLine({ id: 12, lineNumber: 2, itemType: LineItemType.SERVICE }),
      ]);
      assetRepository.countBy?.mockResolvedValue(2);

      await expect(service.receive(5)).resolves.toEqual({ createdAssets: 0, createdComponents: 0, skipped: 1 });

      expect(assetsService.create).not.toHaveBeenCalled();
      expect(auditService.record).not.toHaveBeenCalled();
    });
  });
});
