import { Column, Entity, Index, JoinColumn, ManyToOne } from 'typeorm';
import { BaseRecordEntity } from '../../../common/entities/base-record.entity';
import { Asset } from '../../assets/entities/asset.entity';
import { TrackedEntityKind } from '../../audit/constants/audit.constants';
import { TrackedEntity } from '../../audit/tracked-entity.decorator';
import { ComponentType } from '../../catalog/entities/component-type.entity';
import { InvoiceLineItem } from '../../procurement/entities/invoice-line-item.entity';
import { PurchaseInvoice } from '../../procurement/entities/purchase-invoice.entity';
import { Requisition } from '../../procurement/entities/requisition.entity';
import { COMPONENT_STATUS_LABELS, ComponentStatus } from '../enums/component-status.enum';

@TrackedEntity(TrackedEntityKind.COMPONENT)
@Entity('components')
@Index(['componentTypeId', 'status'])
export class Component extends BaseRecordEntity {
  @Column({ name: 'component_tag', type: 'varchar', length: 100, unique: true })
  componentTag!: string;

  @Column({ name: 'parent_asset_id', type: 'int', nullable: true })
  parentAssetId!: number | null;

  @ManyToOne(() => Asset, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'parent_asset_id' })
  parentAsset?: Asset | null;

  @Column({ name: 'component_type_id', type: 'int' })
  componentTypeId!: number;

  @ManyToOne(() => ComponentType, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'component_type_id' })
  componentType?: ComponentType;

  @Column({ type: 'varchar', length: 255, default: '' })
  manufacturer!: string;

  @Column({ type: 'varchar', length: 255, default: '' })
  model!: string;

  @Column({ name: 'serial_number', type: 'varchar', length: 255, default: '' })
  serialNumber!: string;

  @Column({ type: 'text', nullable: true })
  specifications!: string | null;

  @Column({ name: 'purchase_date', type: 'date', nullable: true })
  purchaseDate!: string | null;

  @Column({ name: 'warranty_expiry_date', type: 'date', nullable: true })
  warrantyExpiryDate!: string | null;

  @Column({ type: 'varchar', length: 20, default: ComponentStatus.INSTALLED })
  status!: ComponentStatus;

  @Column({ name: 'installation_date', type: 'date', nullable: true })
  installationDate!: string | null;

  @Column({ name: 'removal_date', type: 'date', nullable: true })
  removalDate!: string | null;

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
    return COMPONENT_STATUS_LABELS[this.status] ?? this.status;
  }
}
