import Decimal from 'decimal.js';
import { Column, Entity, Index, JoinColumn, ManyToOne, PrimaryGeneratedColumn } from 'typeorm';
import { decimalTransformer } from '../../../common/transformers/decimal.transformer';
import { TrackedEntityKind } from '../../audit/constants/audit.constants';
import { TrackedEntity } from '../../audit/tracked-entity.decorator';
import { AssetModel } from '../../catalog/entities/asset-model.entity';
import { ComponentType } from '../../catalog/entities/component-type.entity';
import { Company } from '../../organization/entities/company.entity';
import { Department } from '../../organization/entities/department.entity';
import { LineItemType } from '../enums/procurement.enums';
import { PurchaseInvoice } from './purchase-invoice.entity';

@TrackedEntity(TrackedEntityKind.LINE_ITEM)
@Entity('invoice_line_items')
@Index(['invoiceId', 'lineNumber'], { unique: true })
export class InvoiceLineItem {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ name: 'invoice_id', type: 'int' })
  invoiceId!: number;

  @ManyToOne(() => PurchaseInvoice, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'invoice_id' })
  invoice?: PurchaseInvoice;

  @Column({ name: 'line_number', type: 'int' })
  lineNumber!: number;

  @Column({ name: 'company_id', type: 'int' })
  companyId!: number;

  @ManyToOne(() => Company, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'company_id' })
  company?: Company;

  @Column({ name: 'department_id', type: 'int' })
  departmentId!: number;

  @ManyToOne(() => Department, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'department_id' })
  department?: Department;

  @Column({ name: 'item_type', type: 'varchar', length: 20 })
  itemType!: LineItemType;

  @Column({ type: 'text' })
  description!: string;

  @Column({ type: 'int', default: 1 })
  quantity!: number;

  @Column({
    name: 'item_cost',
    type: 'decimal',
    precision: 10,
    scale: 2,
    transformer: decimalTransformer(10, 2),
  })
  itemCost!: number;

  @Column({ name: 'asset_model_id', type: 'int', nullable: true })
  assetModelId!: number | null;

  @ManyToOne(() => AssetModel, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'asset_model_id' })
  assetModel?: AssetModel | null;

  @Column({ name: 'component_type_id', type: 'int', nullable: true })
  componentTypeId!: number | null;

  @ManyToOne(() => ComponentType, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'component_type_id' })
  componentType?: ComponentType | null;

  @Column({ type: 'text', nullable: true })
  notes!: string | null;

  /** `quantity × itemCost`, rounded to cents. */
  get lineTotal(): number {
    return new Decimal(this.itemCost).times(this.quantity).toDecimalPlaces(2).toNumber();
  }

  toString(): string {
    const invoice = this.invoice?.invoiceNumber ?? `Invoice #${this.invoiceId}`;
    return `${invoice} - Line ${this.lineNumber}: ${this.description}`;
  }
}
