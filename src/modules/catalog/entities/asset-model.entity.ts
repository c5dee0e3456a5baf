import { Column, Entity, Index, JoinColumn, ManyToOne } from 'typeorm';
import { BaseRecordEntity } from '../../../common/entities/base-record.entity';
import { TrackedEntityKind } from '../../audit/constants/audit.constants';
import { TrackedEntity } from '../../audit/tracked-entity.decorator';
import { Category } from './category.entity';

@TrackedEntity(TrackedEntityKind.ASSET_MODEL)
@Entity('asset_models')
@Index(['manufacturer', 'modelName', 'modelNumber'], { unique: true })
export class AssetModel extends BaseRecordEntity {
  @Column({ name: 'category_id', type: 'int' })
  categoryId!: number;

  @ManyToOne(() => Category, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'category_id' })
  category?: Category;

  @Column({ type: 'varchar', length: 255 })
  manufacturer!: string;

  @Column({ name: 'model_name', type: 'varchar', length: 255 })
  modelName!: string;

  @Column({ name: 'model_number', type: 'varchar', length: 100, default: '' })
  modelNumber!: string;

  @Column({ type: 'text', nullable: true })
  notes!: string | null;

  override toString(): string {
    return `${this.manufacturer} ${this.modelName}`;
  }
}
