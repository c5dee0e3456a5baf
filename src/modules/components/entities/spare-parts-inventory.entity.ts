import { Column, Entity, JoinColumn, ManyToOne } from 'typeorm';
import { BaseRecordEntity } from '../../../common/entities/base-record.entity';
import { TrackedEntityKind } from '../../audit/constants/audit.constants';
import { TrackedEntity } from '../../audit/tracked-entity.decorator';
import { ComponentType } from '../../catalog/entities/component-type.entity';
import { Location } from '../../organization/entities/location.entity';

/**
 * Stock level per component type. `quantityAvailable` mirrors the number of
 * components of the type whose status is spare.
 */
@TrackedEntity(TrackedEntityKind.SPARE_PART)
@Entity('spare_parts_inventory')
export class SparePartsInventory extends BaseRecordEntity {
  @Column({ name: 'component_type_id', type: 'int', unique: true })
  componentTypeId!: number;

  @ManyToOne(() => ComponentType, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'component_type_id' })
  componentType?: ComponentType;

  @Column({ type: 'varchar', length: 255, default: '' })
  manufacturer!: string;

  @Column({ type: 'varchar', length: 255, default: '' })
  model!: string;

  @Column({ type: 'text', nullable: true })
  specifications!: string | null;

  @Column({ name: 'quantity_available', type: 'int', default: 0 })
  quantityAvailable!: number;

  @Column({ name: 'quantity_minimum', type: 'int', default: 0 })
  quantityMinimum!: number;

  @Column({ name: 'location_id', type: 'int', nullable: true })
  locationId!: number | null;

  @ManyToOne(() => Location, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'location_id' })
  location?: Location | null;

  @Column({ name: 'last_restocked', type: 'date', nullable: true })
  lastRestocked!: string | null;

  @Column({ type: 'text', nullable: true })
  notes!: string | null;

  get needsRestock(): boolean {
    return this.quantityAvailable <= this.quantityMinimum;
  }

  override toString(): string {
    const typeName = this.componentType?.typeName ?? `Component Type #${this.componentTypeId}`;
    return `${typeName} - ${this.manufacturer || 'Generic'} (${this.quantityAvailable} available)`;
  }
}
