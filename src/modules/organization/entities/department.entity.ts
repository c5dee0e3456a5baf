import { Column, Entity, Index, JoinColumn, ManyToOne } from 'typeorm';
import { BaseRecordEntity } from '../../../common/entities/base-record.entity';
import { TrackedEntityKind } from '../../audit/constants/audit.constants';
import { TrackedEntity } from '../../audit/tracked-entity.decorator';
import { Company } from './company.entity';
import { Location } from './location.entity';

@TrackedEntity(TrackedEntityKind.DEPARTMENT)
@Entity('departments')
@Index(['companyId', 'name'], { unique: true })
export class Department extends BaseRecordEntity {
  @Column({ name: 'company_id', type: 'int' })
  companyId!: number;

  @ManyToOne(() => Company, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'company_id' })
  company?: Company;

  @Column({ type: 'varchar', length: 255 })
  name!: string;

  @Column({ name: 'default_location_id', type: 'int', nullable: true })
  defaultLocationId!: number | null;

  @ManyToOne(() => Location, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'default_location_id' })
  defaultLocation?: Location | null;
}
