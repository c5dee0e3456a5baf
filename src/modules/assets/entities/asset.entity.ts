import { Column, Entity, Index, JoinColumn, ManyToOne } from 'typeorm';
import { BaseRecordEntity } from '../../../common/entities/base-record.entity';
import { MoneyTransformer } from '../../../common/transformers/decimal.transformer';
import { TrackedEntityKind } from '../../audit/constants/audit.constants';
import { TrackedEntity } from '../../audit/tracked-entity.decorator';
import { AssetModel } from '../../catalog/entities/asset-model.entity';
import { Company } from '../../organization/entities/company.entity';
import { Employee } from '../../organization/entities/employee.entity';
import { Location } from '../../organization/entities/location.entity';
import { InvoiceLineItem } from '../../procurement/entities/invoice-line-item.entity';
import { PurchaseInvoice } from '../../procurement/entities/purchase-invoice.entity';
import { Requisition } from '../../procurement/entities/requisition.entity';
import { ASSET_STATUS_LABELS, AssetStatus } from '../enums/asset-status.enum';

@TrackedEntity(TrackedEntityKind.ASSET)
@Entity('assets')
export class Asset extends BaseRecordEntity {
  @Column({ name: 'company_id', type: 'int', nullable: true })
  companyId!: number | null;

  @ManyToOne(() => Company, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'company_id' })
  company?: Company | null;

  @Column({ name: 'asset_tag', type: 'varchar', length: 100, unique: true })
  assetTag!: string;

  @Column({ name: 'asset_model_id', type: 'int' })
  assetModelId!: number;

  @ManyToOne(() => AssetModel, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'asset_model_id' })
  assetModel?: AssetModel;

  @Index()
  @Column({ name: 'serial_number', type: 'varchar', length: 255, default: '' })
  serialNumber!: string;

  @Column({ type: 'simple-json', nullable: true })
  attributes!: Record<string, unknown> | null;

  @Column({ name: 'purchase_date', type: 'date', nullable: true })
  purchaseDate!: string | null;

  @Column({
    name: 'purchase_cost',
    type: 'decimal',
    precision: 12,
    scale: 2,
    nullable: true,
    transformer: MoneyTransformer,
  })
  purchaseCost!: number | null;

  @Column({ name: 'warranty_expiry_date', type: 'date', nullable: true })
  warrantyExpiryDate!: string | null;

  @Index()
  @Column({ type: 'varchar', length: 20, default: AssetStatus.PENDING })
  status!: AssetStatus;

  @Column({ name: 'location_id', type: 'int', nullable: true })
  locationId!: number | null;

  @ManyToOne(() => Location, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'location_id' })
  location?: Location | null;

  @Column({ name: 'assigned_to_id', type: 'int', nullable: true })
  assignedToId!: number | null;

  @ManyToOne(() => Employee, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'assigned_to_id' })
  assignedTo?: Employee | null;

  @Column({ name: 'requisition_id', type: 'int', nullable: true })
  requisitionId!: number | null;

  @ManyToOne(() => Requisition, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'requisition_id' })
  requisition?: Requisition | null;

  @Column({ name: 'invoice_id', type: 'int', nullable: true })
  invoiceId!: number | null;

  @ManyToOne(() => PurchaseInvoice, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'invoice_id' })
  invoice?: PurchaseInvoice | null;

  @Column({ name: 'invoice_line_item_id', type: 'int', nullable: true })
  invoiceLineItemId!: number | null;

  @ManyToOne(() => InvoiceLineItem, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'invoice_line_item_id' })
  invoiceLineItem?: InvoiceLineItem | null;

  @Column({ type: 'text', nullable: true })
  notes!: string | null;

  getStatusDisplay(): string {
    return ASSET_STATUS_LABELS[this.status] ?? this.status;
  }
}
