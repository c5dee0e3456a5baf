import { Column, Entity } from 'typeorm';
import { BaseRecordEntity } from '../../../common/entities/base-record.entity';
import { TrackedEntityKind } from '../../audit/constants/audit.constants';
import { TrackedEntity } from '../../audit/tracked-entity.decorator';

@TrackedEntity(TrackedEntityKind.COMPONENT_TYPE)
@Entity('component_types')
export class ComponentType extends BaseRecordEntity {
  @Column({ name: 'type_name', type: 'varchar', length: 100, unique: true })
  typeName!: string;

  /** Free-form attribute schema for components of this type */
  @Column({ type: 'simple-json', nullable: true })
  attributes!: Record<string, unknown> | null;
}
