import { Column, Entity, Index, JoinColumn, ManyToOne, PrimaryGeneratedColumn } from 'typeorm';
import { Asset } from '../../assets/entities/asset.entity';
import { TrackedEntityKind } from '../../audit/constants/audit.constants';
import { TrackedEntity } from '../../audit/tracked-entity.decorator';
import { Employee } from '../../organization/entities/employee.entity';
import { COMPONENT_ACTION_LABELS, ComponentAction } from '../enums/component-status.enum';
import { Component } from './component.entity';

/** Installation trail of a component across parent assets. */
@TrackedEntity(TrackedEntityKind.COMPONENT_HISTORY)
@Entity('component_history')
export class ComponentHistory {
  @PrimaryGeneratedColumn()
  id!: number;

  @Index()
  @Column({ name: 'component_id', type: 'int' })
  componentId!: number;

  @ManyToOne(() => Component, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'component_id' })
  component?: Component;

  @Column({ name: 'parent_asset_id', type: 'int' })
  parentAssetId!: number;

  @ManyToOne(() => Asset, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'parent_asset_id' })
  parentAsset?: Asset;

  @Column({ type: 'varchar', length: 20 })
  action!: ComponentAction;

  @Column({ name: 'action_date' })
  actionDate!: Date;

  @Column({ name: 'performed_by_id', type: 'int', nullable: true })
  performedById!: number | null;

  @ManyToOne(() => Employee, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'performed_by_id' })
  performedBy?: Employee | null;

  @Column({ type: 'text', nullable: true })
  reason!: string | null;

  @Column({ name: 'previous_component_id', type: 'int', nullable: true })
  previousComponentId!: number | null;

  @ManyToOne(() => Component, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'previous_component_id' })
  previousComponent?: Component | null;

  @Column({ type: 'text', nullable: true })
  notes!: string | null;

  getActionDisplay(): string {
    return COMPONENT_ACTION_LABELS[this.action] ?? this.action;
  }

  toString(): string {
    const subject = this.component?.componentTag ?? `Component #${this.componentId}`;
    return `${subject} - ${this.action} on ${this.actionDate.toISOString().slice(0, 10)}`;
  }
}
