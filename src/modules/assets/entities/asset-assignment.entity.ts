import { Column, Entity, Index, JoinColumn, ManyToOne, PrimaryGeneratedColumn } from 'typeorm';
import { TrackedEntityKind } from '../../audit/constants/audit.constants';
import { TrackedEntity } from '../../audit/tracked-entity.decorator';
import { Employee } from '../../organization/entities/employee.entity';
import { Location } from '../../organization/entities/location.entity';
import { Asset } from './asset.entity';

/** One custody period of an asset. Open while `returnedDate` is null. */
@TrackedEntity(TrackedEntityKind.ASSIGNMENT)
@Entity('asset_assignments')
export class AssetAssignment {
  @PrimaryGeneratedColumn()
  id!: number;

  @Index()
  @Column({ name: 'asset_id', type: 'int' })
  assetId!: number;

  @ManyToOne(() => Asset, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'asset_id' })
  asset?: Asset;

  @Column({ name: 'employee_id', type: 'int', nullable: true })
  employeeId!: number | null;

  @ManyToOne(() => Employee, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'employee_id' })
  employee?: Employee | null;

  @Column({ name: 'location_id', type: 'int', nullable: true })
  locationId!: number | null;

  @ManyToOne(() => Location, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'location_id' })
  location?: Location | null;

  @Column({ name: 'assigned_date' })
  assignedDate!: Date;

  @Column({ name: 'returned_date', type: Date, nullable: true })
  returnedDate!: Date | null;

  @Column({ name: 'condition_on_assignment', type: 'text', nullable: true })
  conditionOnAssignment!: string | null;

  @Column({ name: 'condition_on_return', type: 'text', nullable: true })
  conditionOnReturn!: string | null;

  @Column({ type: 'text', nullable: true })
  notes!: string | null;

  toString(): string {
    const tag = this.asset?.assetTag ?? `Asset #${this.assetId}`;
    if (this.employee) {
      return `${tag} → ${this.employee.name}`;
    }
    if (this.location) {
      return `${tag} → ${this.location.name}`;
    }
    return `${tag} - Assignment ${this.id}`;
  }
}
