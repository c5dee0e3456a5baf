import { Column, Entity, Index, JoinColumn, ManyToOne } from 'typeorm';
import { BaseRecordEntity } from '../../../common/entities/base-record.entity';
import { decimalTransformer } from '../../../common/transformers/decimal.transformer';
import { TrackedEntityKind } from '../../audit/constants/audit.constants';
import { TrackedEntity } from '../../audit/tracked-entity.decorator';
import { MaintenanceType } from '../enums/maintenance-type.enum';
import { Asset } from './asset.entity';

/** Service or upgrade work done on an asset. */
@TrackedEntity(TrackedEntityKind.MAINTENANCE)
@Entity('maintenance_records')
export class MaintenanceRecord extends BaseRecordEntity {
  @Index()
  @Column({ name: 'asset_id', type: 'int' })
  assetId!: number;

  @ManyToOne(() => Asset, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'asset_id' })
  asset?: Asset;

  @Column({ name: 'maintenance_type', type: 'varchar', length: 20 })
  maintenanceType!: MaintenanceType;

  @Column({ name: 'performed_by', type: 'varchar', length: 255, default: '' })
  performedBy!: string;

  @Column({ name: 'maintenance_date', type: 'date' })
  maintenanceDate!: string;

  @Column({
    type: 'decimal',
    precision: 10,
    scale: 2,
    nullable: true,
    transformer: decimalTransformer(10, 2),
  })
  cost!: number | null;

  @Column({ type: 'text', nullable: true })
  description!: string | null;

  @Column({ name: 'next_maintenance_date', type: 'date', nullable: true })
  nextMaintenanceDate!: string | null;

  override toString(): string {
    const subject = this.asset?.assetTag ?? `Asset #${this.assetId}`;
    return `${subject} - ${this.maintenanceType} on ${this.maintenanceDate}`;
  }
}
