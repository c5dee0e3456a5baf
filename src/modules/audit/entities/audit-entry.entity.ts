import { Column, Entity, Index, JoinColumn, ManyToOne, PrimaryGeneratedColumn } from 'typeorm';
import { User } from '../../users/entities/user.entity';
import {
  AUDIT_ACTION_LABELS,
  AuditAction,
  EVENT_CATEGORY_ICONS,
  EVENT_CATEGORY_LABELS,
  EventCategory,
  TrackedEntityKind,
} from '../constants/audit.constants';

/** `{ field: [old, new] }` */
export type AuditChanges = Record<string, [unknown, unknown]>;

/**
 * One recorded change. Written once and never updated or deleted.
 */
@Entity('activity_log')
@Index(['entityKind', 'entityId'])
export class AuditEntry {
  @PrimaryGeneratedColumn()
  id!: number;

  @Index()
  @Column()
  timestamp!: Date;

  @Index()
  @Column({ name: 'event_type', type: 'varchar', length: 30 })
  eventType!: EventCategory;

  @Column({ type: 'varchar', length: 30 })
  action!: AuditAction;

  @Column({ type: 'varchar', length: 512 })
  message!: string;

  @Column({ type: 'varchar', length: 512, default: '' })
  detail!: string;

  @Column({ name: 'actor_id', type: 'int', nullable: true })
  actorId!: number | null;

  @ManyToOne(() => User, { nullable: true, onDelete: 'SET NULL' })
  @JoinColumn({ name: 'actor_id' })
  actor?: User | null;

  /** Actor's display name at the time of the change */
  @Column({ name: 'actor_name', type: 'varchar', length: 255, default: '' })
  actorName!: string;

  @Column({ name: 'entity_kind', type: 'varchar', length: 30, nullable: true })
  entityKind!: TrackedEntityKind | null;

  @Column({ name: 'entity_id', type: 'int', nullable: true })
  entityId!: number | null;

  @Column({ name: 'object_repr', type: 'varchar', length: 512, default: '' })
  objectRepr!: string;

  @Column({ type: 'varchar', length: 512, default: '' })
  url!: string;

  @Column({ type: 'simple-json', nullable: true })
  changes!: AuditChanges | null;

  getIcon(): string {
    return EVENT_CATEGORY_ICONS[this.eventType] ?? '?';
  }

  getEventTypeDisplay(): string {
    return EVENT_CATEGORY_LABELS[this.eventType] ?? this.eventType;
  }

  getActionDisplay(): string {
    return AUDIT_ACTION_LABELS[this.action] ?? this.action;
  }
}
