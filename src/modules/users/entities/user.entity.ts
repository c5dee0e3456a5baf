import { Column, Entity, JoinColumn, OneToOne } from 'typeorm';
import { BaseRecordEntity } from '../../../common/entities/base-record.entity';
import { Employee } from '../../organization/entities/employee.entity';

/**
 * Login account. Authentication happens upstream; the account is looked up
 * by the username the proxy forwards. Not tracked by the activity log.
 */
@Entity('users')
export class User extends BaseRecordEntity {
  @Column({ type: 'varchar', length: 150, unique: true })
  username!: string;

  @Column({ name: 'first_name', type: 'varchar', length: 150, default: '' })
  firstName!: string;

  @Column({ name: 'last_name', type: 'varchar', length: 150, default: '' })
  lastName!: string;

  @Column({ type: 'varchar', length: 255, nullable: true })
  email!: string | null;

  @Column({ name: 'is_active', type: 'boolean', default: true })
  isActive!: boolean;

  @Column({ name: 'employee_id', type: 'int', nullable: true, unique: true })
  employeeId!: number | null;

  @OneToOne(() => Employee, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'employee_id' })
  employee?: Employee | null;

  getFullName(): string {
    return `${this.firstName} ${this.lastName}`.trim();
  }

  /** Linked employee's name, else full name, else username. */
  getDisplayName(): string {
    return this.employee?.name || this.getFullName() || this.username;
  }
}
