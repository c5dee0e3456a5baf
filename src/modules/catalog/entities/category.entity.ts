import { Column, Entity } from 'typeorm';
import { BaseRecordEntity } from '../../../common/entities/base-record.entity';
import { TrackedEntityKind } from '../../audit/constants/audit.constants';
import { TrackedEntity } from '../../audit/tracked-entity.decorator';

@TrackedEntity(TrackedEntityKind.CATEGORY)
@Entity('categories')
export class Category extends BaseRecordEntity {
  @Column({ type: 'varchar', length: 255 })
  name!: string;

  @Column({ type: 'text', nullable: true })
  description!: string | null;
}
