import { Column, Entity, Index, JoinColumn, ManyToOne } from 'typeorm';
import { BaseRecordEntity } from '../../../common/entities/base-record.entity';
import { TrackedEntityKind } from '../../audit/constants/audit.constants';
import { TrackedEntity } from '../../audit/tracked-entity.decorator';
import { Company } from '../../organization/entities/company.entity';
import { Department } from '../../organization/entities/department.entity';
import { Employee } from '../../organization/entities/employee.entity';
import { REQUISITION_STATUS_LABELS, RequisitionPriority, RequisitionStatus } from '../enums/procurement.enums';

@TrackedEntity(TrackedEntityKind.REQUISITION)
@Entity('requisitions')
@Index(['status', 'priority'])
export class Requisition extends BaseRecordEntity {
  @Column({ name: 'requisition_number', type: 'varchar', length: 100, unique: true })
  requisitionNumber!: string;

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

  @Column({ name: 'requested_by_id', type: 'int' })
  requestedById!: number;

  @ManyToOne(() => Employee, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'requested_by_id' })
  requestedBy?: Employee;

  @Column({ name: 'approved_by_id', type: 'int', nullable: true })
  approvedById!: number | null;

  @ManyToOne(() => Employee, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'approved_by_id' })
  approvedBy?: Employee | null;

  @Column({ name: 'requisition_date', type: 'date' })
  requisitionDate!: string;

  @Column({ type: 'simple-json', nullable: true })
  specifications!: Record<string, unknown> | null;

  @Column({ type: 'varchar', length: 20, default: RequisitionPriority.NORMAL })
  priority!: RequisitionPriority;

  @Column({ type: 'varchar', length: 20, default: RequisitionStatus.PENDING })
  status!: RequisitionStatus;

  @Column({ type: 'text', nullable: true })
  notes!: string | null;

  @Column({ name: 'fulfilled_date', type: 'date', nullable: true })
  fulfilledDate!: string | null;

  @Column({ name: 'cancellation_reason', type: 'text', nullable: true })
  cancellationReason!: string | null;

  getStatusDisplay(): string {
    return REQUISITION_STATUS_LABELS[this.status] ?? this.status;
  }
}
