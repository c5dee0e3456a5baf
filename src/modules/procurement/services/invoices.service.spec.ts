import { Test, TestingModule } from '@nestjs/testing';
import { getDataSourceToken, getRepositoryToken } from '@nestjs/typeorm';
import {
  createMockAuditService,
  createMockRepository,
  MockAuditService,
  MockRepository,
} from '../../../../test/helpers/mock-factories';
import { RecordNotFoundError } from '../../../common/exceptions';
import { TablePreferencesService } from '../../../common/table';
import { AuditService } from '../../audit/audit.service';
import { AuditAction, EventCategory } from '../../audit/constants/audit.constants';
import { CompaniesService } from '../../organization/services/companies.service';
import { PurchaseInvoice } from '../entities/purchase-invoice.entity';
import { PaymentStatus } from '../enums/procurement.enums';
import { InvoicesService } from './invoices.service';
import { VendorsService } from './vendors.service';

function buildInvoice(overrides: Partial<PurchaseInvoice> = {}): PurchaseInvoice {
  return Object.assign(new PurchaseInvoice(), {
    id: 4,
    invoiceNumber: 'INV-0004',
    companyId: 1,
    vendorId: 1,
    invoiceDate: '2024-03-01',
    totalAmount: 1299.99,
    paymentStatus: PaymentStatus.UNPAID,
    paymentDate: null,
    paymentMethod: '',
    paymentReference: '',
    receivedById: null,
    receivedDate: null,
    notes: null,
    ...overrides,
  });
}

describe('InvoicesService', () => {
  let service: InvoicesService;
  let invoiceRepository: MockRepository<PurchaseInvoice>;
  let vendorsService: { findOne: jest.Mock };
  let manager: { save: jest.Mock };
  let auditService: MockAuditService;

  beforeEach(async () => {
    invoiceRepository = createMockRepository<PurchaseInvoice>();
    vendorsService = { findOne: jest.fn().mockResolvedValue({ id: 1 }) };
    manager = { save: jest.fn().mockImplementation((entities) => Promise.resolve(entities)) };
    auditService = createMockAuditService();
    const dataSource = { transaction: jest.fn((work: (m: typeof manager) => Promise<unknown>) => work(manager)) };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        InvoicesService,
        TablePreferencesService,
        { provide: getRepositoryToken(PurchaseInvoice), useValue: invoiceRepository },
        { provide: getDataSourceToken(), useValue: dataSource },
        { provide: CompaniesService, useValue: { findOne: jest.fn().mockResolvedValue({ id: 1 }) } },
        { provide: VendorsService, useValue: vendorsService },
        { provide: AuditService, useValue: auditService },
      ],
    }).compile();

    service = module.get<InvoicesService>(InvoicesService);
  });

  it('should reject an invoice from an unknown vendor', async () => {
    vendorsService.findOne.mockRejectedValue(new RecordNotFoundError('Vendor', 9));

    await expect(
      service.create({ invoiceNumber: 'INV-0009', companyId: 1, vendorId: 9, invoiceDate: '2024-03-01' }),
    ).rejects.toThrow(RecordNotFoundError);
    expect(invoiceRepository.save).not.toHaveBeenCalled();
  });

  describe('markPaid', () => {
    it('should set the payment date and record the status change', async () => {
      const invoice = buildInvoice();
      invoiceRepository.findOneBy?.mockResolvedValue(invoice);
      invoiceRepository.findOne?.mockResolvedValue(invoice);

      await service.markPaid(4);

      expect(invoice.paymentStatus).toBe(PaymentStatus.PAID);
      expect(invoice.paymentDate).toBe(new Date().toISOString().slice(0, 10));
      expect(auditService.record).toHaveBeenCalledWith({
        eventType: EventCategory.INVOICE,
        action: AuditAction.PAID,
        message: 'Invoice INV-0004 marked as paid',
        detail: 'Paid',
        entity: invoice,
        changes: { payment_status: ['unpaid', 'paid'] },
      });
    });

    it('should keep a payment date already on record', async () => {
      const invoice = buildInvoice({ paymentStatus: PaymentStatus.PARTIALLY_PAID, paymentDate: '2024-02-15' });
      invoiceRepository.findOneBy?.mockResolvedValue(invoice);
      invoiceRepository.findOne?.mockResolvedValue(invoice);

      await service.markPaid(4);

      expect(invoice.paymentDate).toBe('2024-02-15');
      expect(auditService.record).toHaveBeenCalledWith(
        expect.objectContaining({ changes: { payment_status: ['partially_paid', 'paid'] } }),
      );
    });
  });

  describe('bulkMarkPaid', () => {
    it('should settle the unpaid selection and write one entry', async () => {
      const invoices = [buildInvoice({ id: 1 }), buildInvoice({ id: 2 })];
      invoiceRepository.findBy?.mockResolvedValue(invoices);

      await expect(service.bulkMarkPaid([1, 2, 3])).resolves.toEqual({ count: 2 });

      expect(manager.save).toHaveBeenCalledWith(invoices);
      expect(auditService.record).toHaveBeenCalledWith({
        eventType: EventCategory.INVOICE,
        action: AuditAction.PAID,
        message: '2 invoice(s) bulk marked as paid',
        detail: 'Paid',
      });
    });

    it('should write nothing when everything is already paid', async () => {
      await expect(service.bulkMarkPaid([1])).resolves.toEqual({ count: 0 });
      expect(auditService.record).not.toHaveBeenCalled();
    });
  });
});
