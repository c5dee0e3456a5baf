import { Column, Entity } from 'typeorm';
import { BaseRecordEntity } from '../../../common/entities/base-record.entity';
import { TrackedEntityKind } from '../../audit/constants/audit.constants';
import { TrackedEntity } from '../../audit/tracked-entity.decorator';

@TrackedEntity(TrackedEntityKind.LOCATION)
@Entity('locations')
export class Location extends BaseRecordEntity {
  @Column({ type: 'varchar', length: 255, default: '' })
  name!: string;

  @Column({ type: 'text', nullable: true })
  address!: string | null;

  @Column({ type: 'varchar', length: 100, default: '' })
  city!: string;

  @Column({ type: 'varchar', length: 10, default: '' })
  zipcode!: string;

  @Column({ type: 'varchar', length: 100, default: '' })
  country!: string;
}
