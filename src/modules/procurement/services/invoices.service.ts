import { Injectable } from '@nestjs/common';
import { InjectDataSource, InjectRepository } from '@nestjs/typeorm';
import { DataSource, In, Not, Repository } from 'typeorm';
import { RecordNotFoundError } from '../../../common/exceptions';
import { reverse } from '../../../common/routing/routes';
import {
  BulkAction,
  ReusableTable,
  TableColumn,
  TableContext,
  TablePreferencesService,
  TableRequest,
  urlPattern,
} from '../../../common/table';
import { suppressAutoLog } from '../../audit/audit-scope';
import { AuditService } from '../../audit/audit.service';
import { AuditAction, EventCategory } from '../../audit/constants/audit.constants';
import { CompaniesService } from '../../organization/services/companies.service';
import { CreateInvoiceDto, UpdateInvoiceDto } from '../dto';
import { PurchaseInvoice } from '../entities/purchase-invoice.entity';
import { PAYMENT_STATUS_LABELS, PaymentStatus } from '../enums/procurement.enums';
import { VendorsService } from './vendors.service';

const PAYMENT_BADGES: Record<PaymentStatus, string> = {
  [PaymentStatus.UNPAID]: 'badge-danger',
  [PaymentStatus.PARTIALLY_PAID]: 'badge-warning',
  [PaymentStatus.PAID]: 'badge-success',
};

function today(): string {
  return new Date().toISOString().slice(0, 10);
}

@Injectable()
export class InvoicesService {
  constructor(
    @InjectRepository(PurchaseInvoice)
    private readonly invoiceRepository: Repository<PurchaseInvoice>,
    @InjectDataSource()
    private readonly dataSource: DataSource,
    private readonly companiesService: CompaniesService,
    private readonly vendorsService: VendorsService,
    private readonly auditService: AuditService,
    private readonly tablePreferences: TablePreferencesService,
  ) {}

  async create(dto: CreateInvoiceDto): Promise<PurchaseInvoice> {
    await this.companiesService.findOne(dto.companyId);
    await this.vendorsService.findOne(dto.vendorId);
    const saved = await this.invoiceRepository.save(this.invoiceRepository.create(dto));
    return this.findOne(saved.id);
  }

  findAll(request: TableRequest): Promise<TableContext<PurchaseInvoice>> {
    const qb = this.invoiceRepository
      .createQueryBuilder('invoice')
      .leftJoinAndSelect('invoice.company', 'company')
      .leftJoinAndSelect('invoice.vendor', 'vendor');

    const columns = [
      new TableColumn<PurchaseInvoice>('invoice_number', 'Invoice #', 'invoiceNumber', {
        linkPattern: urlPattern('invoices.detail', { id: 'id' }),
      }),
      new TableColumn<PurchaseInvoice>('company', 'Company', 'company.code', { sortField: 'company.code' }),
      new TableColumn<PurchaseInvoice>('vendor', 'Vendor', 'vendor.vendorName', {
        sortField: 'vendor.vendorName',
        linkPattern: urlPattern('vendors.detail', { id: 'vendor.id' }),
      }),
      new TableColumn<PurchaseInvoice>('invoice_date', 'Date', 'invoiceDate'),
      new TableColumn<PurchaseInvoice>('total_amount', 'Total', 'totalAmount', { align: 'right' }),
      new TableColumn<PurchaseInvoice>('payment_status', 'Payment', 'paymentStatus', {
        badge: true,
        badgeMap: PAYMENT_BADGES,
      }),
      new TableColumn<PurchaseInvoice>('payment_date', 'Paid On', 'paymentDate', { defaultVisible: false }),
    ];

    const bulkActions = [
      new BulkAction('mark_paid', 'Mark Paid', reverse('invoices.bulk-mark-paid'), {
        confirmation: 'Mark selected invoices as paid?',
        variant: 'primary',
      }),
    ];

    return new ReusableTable<PurchaseInvoice>(request, qb, columns, {
      tableId: 'invoices',
      defaultSort: '-invoiceDate',
      searchFields: ['invoiceNumber', 'company.name', 'company.code', 'vendor.vendorName', 'paymentStatus'],
      filterFields: { payment_status: 'paymentStatus', vendor: 'vendorId' },
      bulkActions,
      preferences: this.tablePreferences,
    }).getContext();
  }

  async findOne(id: number): Promise<PurchaseInvoice> {
    const invoice = await this.invoiceRepository.findOne({
      where: { id },
      relations: { company: true, vendor: true, receivedBy: true },
    });
    if (!invoice) {
      throw new RecordNotFoundError('Invoice', id);
    }
    return invoice;
  }

  async update(id: number, dto: UpdateInvoiceDto): Promise<PurchaseInvoice> {
    const invoice = await this.getRecord(id);
    this.invoiceRepository.merge(invoice, dto);
    await this.auditService.saveExisting(this.invoiceRepository, invoice);
    return this.findOne(id);
  }

  async remove(id: number): Promise<void> {
    await this.invoiceRepository.remove(await this.getRecord(id));
  }

  /** Settles the invoice; a payment date already on record is kept. */
  async markPaid(id: number): Promise<PurchaseInvoice> {
    const invoice = await this.getRecord(id);
    const previous = invoice.paymentStatus;

    invoice.paymentStatus = PaymentStatus.PAID;
    invoice.paymentDate = invoice.paymentDate ?? today();
    await suppressAutoLog(() => this.invoiceRepository.save(invoice));

    await this.auditService.record({
      eventType: EventCategory.INVOICE,
      action: AuditAction.PAID,
      message: `Invoice ${invoice.invoiceNumber} marked as paid`,
      detail: PAYMENT_STATUS_LABELS[PaymentStatus.PAID],
      entity: invoice,
      changes: { payment_status: [previous, PaymentStatus.PAID] },
    });
    return this.findOne(id);
  }

  /** Settles every selected invoice not yet paid. */
  async bulkMarkPaid(ids: number[]): Promise<{ count: number }> {
    const invoices = await this.invoiceRepository.findBy({ id: In(ids), paymentStatus: Not(PaymentStatus.PAID) });
    const count = invoices.length;
    if (count === 0) {
      return { count };
    }

    for (const invoice of invoices) {
      invoice.paymentStatus = PaymentStatus.PAID;
      invoice.paymentDate = invoice.paymentDate ?? today();
    }
    await suppressAutoLog(() => this.dataSource.transaction((manager) => manager.save(invoices)));

    await this.auditService.record({
      eventType: EventCategory.INVOICE,
      action: AuditAction.PAID,
      message: `${count} invoice(s) bulk marked as paid`,
      detail: PAYMENT_STATUS_LABELS[PaymentStatus.PAID],
    });
    return { count };
  }

  private async getRecord(id: number): Promise<PurchaseInvoice> {
    const invoice = await this.invoiceRepository.findOneBy({ id });
    if (!invoice) {
      throw new RecordNotFoundError('Invoice', id);
    }
    return invoice;
  }
}
