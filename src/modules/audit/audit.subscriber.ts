import { Injectable } from '@nestjs/common';
import {
  DataSource,
  EntityManager,
  EntityMetadata,
  EntitySubscriberInterface,
  InsertEvent,
  ObjectLiteral,
  RemoveEvent,
  UpdateEvent,
} from 'typeorm';
import { getPath } from '../../common/utils/object-path.util';
import { autoLogMessage, detailFor } from './audit-display';
import { isAuditWriteActive, isAutoLogSuppressed, markUpdated } from './audit-scope';
import { AuditService } from './audit.service';
import { AuditAction, KIND_CATEGORY } from './constants/audit.constants';
import { AuditChanges } from './entities/audit-entry.entity';
import { getTrackedKind } from './tracked-entity.decorator';

type AutoLogAction = AuditAction.CREATED | AuditAction.UPDATED | AuditAction.DELETED;

function hasId(entity: ObjectLiteral): boolean {
  const id: unknown = entity.id;
  return id !== undefined && id !== null;
}

/** Dates as ISO strings and loaded relations by id, so values compare and serialize cleanly. */
export function normalizeChangeValue(value: unknown): unknown {
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (value !== null && typeof value === 'object' && !Array.isArray(value)) {
    const id: unknown = Reflect.get(value, 'id');
    if (typeof id === 'number' || typeof id === 'string') {
      return id;
    }
  }
  return value === undefined ? null : value;
}

/**
 * Writes a created/updated/deleted activity entry for every tracked entity
 * persisted through TypeORM, unless automatic logging is suppressed or the
 * event comes from an activity write.
 */
@Injectable()
export class AuditSubscriber implements EntitySubscriberInterface<ObjectLiteral> {
  constructor(
    dataSource: DataSource,
    private readonly auditService: AuditService,
  ) {
    dataSource.subscribers.push(this);
  }

  async afterInsert(event: InsertEvent<ObjectLiteral>): Promise<void> {
    await this.autoLog(event.metadata, event.entity, AuditAction.CREATED, event.manager);
  }

  async afterUpdate(event: UpdateEvent<ObjectLiteral>): Promise<void> {
    const entity = event.entity;
    // Query builder updates carry no entity identity
    if (!entity || !hasId(entity)) {
      return;
    }
    markUpdated(entity);
    const changes = this.changesFor(event);
    await this.autoLog(event.metadata, entity, AuditAction.UPDATED, event.manager, changes);
  }

  /** Logged before the row goes so the entity's fields are still readable. */
  async beforeRemove(event: RemoveEvent<ObjectLiteral>): Promise<void> {
    const entity = event.entity ?? event.databaseEntity;
    if (!entity) {
      return;
    }
    await this.autoLog(event.metadata, entity, AuditAction.DELETED, event.manager);
  }

  private async autoLog(
    metadata: EntityMetadata,
    entity: ObjectLiteral,
    action: AutoLogAction,
    manager: EntityManager,
    changes: AuditChanges | null = null,
  ): Promise<void> {
    if (isAuditWriteActive() || isAutoLogSuppressed()) {
      return;
    }
    const kind = getTrackedKind(metadata.target);
    if (!kind) {
      return;
    }

    await this.auditService.record(
      {
        eventType: KIND_CATEGORY[kind],
        action,
        message: autoLogMessage(kind, entity, action),
        detail: detailFor(entity),
        entity,
        entityKind: kind,
        changes,
      },
      manager,
    );
  }

  /** `{ column: [old, new] }` for updated scalar columns, timestamps left out. */
  private changesFor(event: UpdateEvent<ObjectLiteral>): AuditChanges | null {
    const changes: AuditChanges = {};
    for (const column of event.updatedColumns) {
      if (column.isCreateDate || column.isUpdateDate || column.isVersion) {
        continue;
      }
      const previous = normalizeChangeValue(getPath(event.databaseEntity, column.propertyPath));
      const next = normalizeChangeValue(getPath(event.entity, column.propertyPath));
      if (JSON.stringify(previous) === JSON.stringify(next)) {
        continue;
      }
      changes[column.propertyName] = [previous, next];
    }
    return Object.keys(changes).length > 0 ? changes : null;
  }
}
