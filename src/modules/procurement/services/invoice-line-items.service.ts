import { Injectable, Logger } from '@nestjs/common';
import { InjectDataSource, InjectRepository } from '@nestjs/typeorm';
import Decimal from 'decimal.js';
import { DataSource, Repository } from 'typeorm';
import { DuplicateValueError, RecordNotFoundError } from '../../../common/exceptions';
import { Asset } from '../../assets/entities/asset.entity';
import { ASSET_STATUS_LABELS, AssetStatus } from '../../assets/enums/asset-status.enum';
import { AssetsService } from '../../assets/services/assets.service';
import { suppressAutoLog } from '../../audit/audit-scope';
import { AuditService } from '../../audit/audit.service';
import { AuditAction, EventCategory } from '../../audit/constants/audit.constants';
import { Component } from '../../components/entities/component.entity';
import { COMPONENT_STATUS_LABELS, ComponentStatus } from '../../components/enums/component-status.enum';
import { ComponentsService } from '../../components/services/components.service';
import { DepartmentsService } from '../../organization/services/departments.service';
import { CreateLineItemDto, InvoiceReceipts, LineItemReceipt, ReceiveResult, UpdateLineItemDto } from '../dto';
import { InvoiceLineItem } from '../entities/invoice-line-item.entity';
import { PurchaseInvoice } from '../entities/purchase-invoice.entity';
import { LineItemType, RECEIVABLE_LINE_ITEM_TYPES } from '../enums/procurement.enums';

/** Invoice line items, and receiving them into assets and components. */
@Injectable()
export class InvoiceLineItemsService {
  private readonly logger = new Logger(InvoiceLineItemsService.name);

  constructor(
    @InjectRepository(InvoiceLineItem)
    private readonly lineItemRepository: Repository<InvoiceLineItem>,
    @InjectRepository(PurchaseInvoice)
    private readonly invoiceRepository: Repository<PurchaseInvoice>,
    @InjectDataSource()
    private readonly dataSource: DataSource,
    private readonly departmentsService: DepartmentsService,
    private readonly assetsService: AssetsService,
    private readonly componentsService: ComponentsService,
    private readonly auditService: AuditService,
  ) {}

  async findAll(invoiceId: number): Promise<InvoiceLineItem[]> {
    await this.getInvoice(invoiceId);
    return this.lineItemRepository.find({
      where: { invoiceId },
      relations: { department: true, assetModel: true, componentType: true },
      order: { lineNumber: 'ASC' },
    });
  }

  async findOne(invoiceId: number, lineItemId: number): Promise<InvoiceLineItem> {
    const item = await this.lineItemRepository.findOne({
      where: { id: lineItemId, invoiceId },
      relations: { invoice: true, company: true, department: true, assetModel: true, componentType: true },
    });
    if (!item) {
      throw new RecordNotFoundError('Line item', lineItemId);
    }
    return item;
  }

  /** Adds a line; the number defaults to the next free one on the invoice. */
  async create(invoiceId: number, dto: CreateLineItemDto): Promise<InvoiceLineItem> {
    const invoice = await this.getInvoice(invoiceId);
    await this.departmentsService.findOne(dto.departmentId);

    const lineNumber = dto.lineNumber ?? (await this.nextLineNumber(invoiceId));
    if (await this.lineItemRepository.existsBy({ invoiceId, lineNumber })) {
      throw new DuplicateValueError(`line ${lineNumber} on invoice ${invoice.invoiceNumber}`);
    }

    const item = this.lineItemRepository.create({
      ...dto,
      invoiceId,
      lineNumber,
      companyId: dto.companyId ?? invoice.companyId,
      quantity: dto.quantity ?? 1,
    });
    item.invoice = invoice;
    const saved = await this.lineItemRepository.save(item);

    await this.refreshTotal(invoice);
    return this.findOne(invoiceId, saved.id);
  }

  async update(invoiceId: number, lineItemId: number, dto: UpdateLineItemDto): Promise<InvoiceLineItem> {
    const item = await this.findOne(invoiceId, lineItemId);
    if (dto.departmentId !== undefined && dto.departmentId !== item.departmentId) {
      item.department = await this.departmentsService.findOne(dto.departmentId);
    }
    this.lineItemRepository.merge(item, dto);
    await this.auditService.saveExisting(this.lineItemRepository, item);

    await this.refreshTotal(await this.getInvoice(invoiceId));
    return this.findOne(invoiceId, lineItemId);
  }

  async remove(invoiceId: number, lineItemId: number): Promise<void> {
    const item = await this.findOne(invoiceId, lineItemId);
    await this.lineItemRepository.remove(item);
    await this.refreshTotal(await this.getInvoice(invoiceId));
  }

  async getReceipts(invoiceId: number): Promise<InvoiceReceipts> {
    const items = await this.findAll(invoiceId);

    const lines: LineItemReceipt[] = [];
    for (const item of items) {
      const received = await this.receivedCount(item);
      lines.push({
        lineItemId: item.id,
        lineNumber: item.lineNumber,
        received,
        remaining: Math.max(0, item.quantity - received),
        complete: !RECEIVABLE_LINE_ITEM_TYPES.includes(item.itemType) || received >= item.quantity,
      });
    }

    return {
      lineItemsTotal: this.sumLines(items),
      itemsReceived: lines.length > 0 && lines.every((line) => line.complete),
      lines,
    };
  }

  /**
   * Creates the assets and components still owed by each receivable line,
   * linked to the invoice and the line. Lines already complete are skipped,
   * so receiving twice creates nothing new. One entry is logged per line.
   */
  async receive(invoiceId: number): Promise<ReceiveResult> {
    const invoice = await this.getInvoice(invoiceId);
    const items = await this.lineItemRepository.find({ where: { invoiceId }, order: { lineNumber: 'ASC' } });
    const result: ReceiveResult = { createdAssets: 0, createdComponents: 0, skipped: 0 };

    for (const item of items) {
      if (!RECEIVABLE_LINE_ITEM_TYPES.includes(item.itemType)) {
        continue;
      }

      const remaining = Math.max(0, item.quantity - (await this.receivedCount(item)));
      if (remaining === 0) {
        result.skipped += 1;
        continue;
      }

      if (item.itemType === LineItemType.ASSET && item.assetModelId != null) {
        const assetModelId = item.assetModelId;
        for (let i = 0; i < remaining; i++) {
          await suppressAutoLog(() =>
            this.assetsService.create({
              companyId: invoice.companyId,
              assetModelId,
              purchaseDate: invoice.invoiceDate,
              purchaseCost: item.itemCost,
              status: AssetStatus.PENDING,
              invoiceId: invoice.id,
              invoiceLineItemId: item.id,
            }),
          );
        }
        result.createdAssets += remaining;

        await this.auditService.record({
          eventType: EventCategory.ASSET,
          action: AuditAction.CREATED,
          message: `${remaining} asset(s) auto-created from invoice ${invoice.invoiceNumber} line ${item.lineNumber}`,
          detail: ASSET_STATUS_LABELS[AssetStatus.PENDING],
          entity: invoice,
        });
      } else if (item.itemType === LineItemType.COMPONENT && item.componentTypeId != null) {
        const componentTypeId = item.componentTypeId;
        for (let i = 0; i < remaining; i++) {
          await suppressAutoLog(() =>
            this.componentsService.create({
              componentTypeId,
              manufacturer: item.description.slice(0, 255),
              status: ComponentStatus.SPARE,
              purchaseDate: invoice.invoiceDate,
              invoiceId: invoice.id,
              invoiceLineItemId: item.id,
            }),
          );
        }
        result.createdComponents += remaining;

        await this.auditService.record({
          eventType: EventCategory.COMPONENT,
          action: AuditAction.CREATED,
          message: `${remaining} component(s) auto-created from invoice ${invoice.invoiceNumber} line ${item.lineNumber}`,
          detail: COMPONENT_STATUS_LABELS[ComponentStatus.SPARE],
          entity: invoice,
        });
      }
    }

    this.logger.log(
      `Received invoice ${invoice.invoiceNumber}: ${result.createdAssets} asset(s), ` +
        `${result.createdComponents} component(s), ${result.skipped} line(s) already received`,
    );
    return result;
  }

  private async receivedCount(item: InvoiceLineItem): Promise<number> {
    if (item.itemType === LineItemType.ASSET) {
      return this.dataSource.getRepository(Asset).countBy({ invoiceLineItemId: item.id });
    }
    if (item.itemType === LineItemType.COMPONENT) {
      return this.dataSource.getRepository(Component).countBy({ invoiceLineItemId: item.id });
    }
    return 0;
  }

  private sumLines(items: InvoiceLineItem[]): number {
    return items
      .reduce((total, item) => total.plus(new Decimal(item.itemCost).times(item.quantity)), new Decimal(0))
      .toDecimalPlaces(2)
      .toNumber();
  }

  /** Invoice total follows its lines; a total entered by hand stays while there are none. */
  private async refreshTotal(invoice: PurchaseInvoice): Promise<void> {
    const items = await this.lineItemRepository.find({ where: { invoiceId: invoice.id } });
    const total = this.sumLines(items);
    if (total <= 0 || total === invoice.totalAmount) {
      return;
    }

    invoice.totalAmount = total;
    await suppressAutoLog(() => this.invoiceRepository.update({ id: invoice.id }, { totalAmount: total }));
  }

  private async nextLineNumber(invoiceId: number): Promise<number> {
    const last = await this.lineItemRepository.findOne({
      select: { id: true, lineNumber: true },
      where: { invoiceId },
      order: { lineNumber: 'DESC' },
    });
    return (last?.lineNumber ?? 0) + 1;
  }

  private async getInvoice(id: number): Promise<PurchaseInvoice> {
    const invoice = await this.invoiceRepository.findOneBy({ id });
    if (!invoice) {
      throw new RecordNotFoundError('Invoice', id);
    }
    return invoice;
  }
}
