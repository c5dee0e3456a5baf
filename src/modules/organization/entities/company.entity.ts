import { Column, Entity } from 'typeorm';
import { BaseRecordEntity } from '../../../common/entities/base-record.entity';
import { TrackedEntityKind } from '../../audit/constants/audit.constants';
import { TrackedEntity } from '../../audit/tracked-entity.decorator';

@TrackedEntity(TrackedEntityKind.COMPANY)
@Entity('companies')
export class Company extends BaseRecordEntity {
  @Column({ type: 'varchar', length: 255, unique: true })
  name!: string;

  /** Short code used in tag prefix configuration */
  @Column({ type: 'varchar', length: 50, unique: true, nullable: true })
  code!: string | null;

  @Column({ type: 'text', nullable: true })
  address!: string | null;

  @Column({ type: 'varchar', length: 100, default: '' })
  city!: string;

  @Column({ type: 'varchar', length: 10, default: '' })
  zip!: string;

  @Column({ type: 'varchar', length: 100, default: '' })
  country!: string;

  @Column({ type: 'varchar', length: 50, default: '' })
  phone!: string;

  @Column({ type: 'text', nullable: true })
  notes!: string | null;

  @Column({ name: 'is_active', type: 'boolean', default: true })
  isActive!: boolean;
}
