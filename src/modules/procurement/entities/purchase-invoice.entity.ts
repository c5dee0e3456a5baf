import { Column, Entity, JoinColumn, ManyToOne } from 'typeorm';
import { BaseRecordEntity } from '../../../common/entities/base-record.entity';
import { MoneyTransformer } from '../../../common/transformers/decimal.transformer';
import { TrackedEntityKind } from '../../audit/constants/audit.constants';
import { TrackedEntity } from '../../audit/tracked-entity.decorator';
import { Company } from '../../organization/entities/company.entity';
import { Employee } from '../../organization/entities/employee.entity';
import { PAYMENT_STATUS_LABELS, PaymentStatus } from '../enums/procurement.enums';
import { Vendor } from './vendor.entity';

@TrackedEntity(TrackedEntityKind.INVOICE)
@Entity('purchase_invoices')
export class PurchaseInvoice extends BaseRecordEntity {
  @Column({ name: 'invoice_number', type: 'varchar', length: 100, unique: true })
  invoiceNumber!: string;

  @Column({ name: 'company_id', type: 'int' })
  companyId!: number;

  @ManyToOne(() => Company, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'company_id' })
  company?: Company;

  @Column({ name: 'vendor_id', type: 'int' })
  vendorId!: number;

  @ManyToOne(() => Vendor, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'vendor_id' })
  vendor?: Vendor;

  @Column({ name: 'invoice_date', type: 'date' })
  invoiceDate!: string;

  @Column({
    name: 'total_amount',
    type: 'decimal',
    precision: 12,
    scale: 2,
    default: 0,
    transformer: MoneyTransformer,
  })
  totalAmount!: number;

  @Column({ name: 'payment_status', type: 'varchar', length: 20, default: PaymentStatus.UNPAID })
  paymentStatus!: PaymentStatus;

  @Column({ name: 'payment_date', type: 'date', nullable: true })
  paymentDate!: string | null;

  @Column({ name: 'payment_method', type: 'varchar', length: 50, default: '' })
  paymentMethod!: string;

  @Column({ name: 'payment_reference', type: 'varchar', length: 100, default: '' })
  paymentReference!: string;

  @Column({ name: 'received_by_id', type: 'int', nullable: true })
  receivedById!: number | null;

  @ManyToOne(() => Employee, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'received_by_id' })
  receivedBy?: Employee | null;

  @Column({ name: 'received_date', type: 'date', nullable: true })
  receivedDate!: string | null;

  @Column({ type: 'text', nullable: true })
  notes!: string | null;

  getPaymentStatusDisplay(): string {
    return PAYMENT_STATUS_LABELS[this.paymentStatus] ?? this.paymentStatus;
  }
}
