import { Column, CreateDateColumn, Entity, Index, JoinColumn, ManyToOne, PrimaryGeneratedColumn } from 'typeorm';
import { Asset } from '../../assets/entities/asset.entity';
import { TrackedEntityKind } from '../../audit/constants/audit.constants';
import { TrackedEntity } from '../../audit/tracked-entity.decorator';
import { Component } from '../../components/entities/component.entity';
import { RequisitionItemType } from '../enums/procurement.enums';
import { Requisition } from './requisition.entity';

/** An asset or component handed out against a requisition. */
@TrackedEntity(TrackedEntityKind.REQUISITION_ITEM)
@Entity('requisition_items')
@Index(['requisitionId', 'createdAt'])
export class RequisitionItem {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ name: 'requisition_id', type: 'int' })
  requisitionId!: number;

  @ManyToOne(() => Requisition, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'requisition_id' })
  requisition?: Requisition;

  @Column({ name: 'item_type', type: 'varchar', length: 20 })
  itemType!: RequisitionItemType;

  @Column({ name: 'asset_id', type: 'int', nullable: true })
  assetId!: number | null;

  @ManyToOne(() => Asset, { nullable: true, onDelete: 'CASCADE' })
  @JoinColumn({ name: 'asset_id' })
  asset?: Asset | null;

  @Column({ name: 'component_id', type: 'int', nullable: true })
  componentId!: number | null;

  @ManyToOne(() => Component, { nullable: true, onDelete: 'CASCADE' })
  @JoinColumn({ name: 'component_id' })
  component?: Component | null;

  @Column({ type: 'text', nullable: true })
  notes!: string | null;

  @CreateDateColumn({ name: 'created_at' })
  createdAt!: Date;

  toString(): string {
    const requisition = this.requisition?.requisitionNumber ?? `Requisition #${this.requisitionId}`;
    if (this.itemType === RequisitionItemType.ASSET && this.asset) {
      return `${requisition} - ${this.asset.assetTag}`;
    }
    if (this.itemType === RequisitionItemType.COMPONENT && this.component) {
      return `${requisition} - ${this.component.componentTag}`;
    }
    return `${requisition} - (unlinked item)`;
  }
}
