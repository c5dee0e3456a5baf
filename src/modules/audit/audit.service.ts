import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, ObjectLiteral, Repository } from 'typeorm';
import { getActingUsername } from '../../common/logger/request-context';
import { ReusableTable, TableColumn, TableContext, TablePreferencesService, TableRequest } from '../../common/table';
import { User } from '../users/entities/user.entity';
import { UsersService } from '../users/services/users.service';
import { autoLogMessage, detailFor, linkFor, readAttribute, shortLabel, truncate } from './audit-display';
import { isAuditWriteActive, isAutoLogSuppressed, runAuditWrite, watchUpdates } from './audit-scope';
import {
  ACTIVITY_PAGE_SIZE,
  ACTOR_NAME_MAX_LENGTH,
  AuditAction,
  DETAIL_MAX_LENGTH,
  EntityRef,
  EventCategory,
  KIND_CATEGORY,
  MESSAGE_MAX_LENGTH,
  OBJECT_REPR_MAX_LENGTH,
  TrackedEntityKind,
  URL_MAX_LENGTH,
} from './constants/audit.constants';
import { AuditChanges, AuditEntry } from './entities/audit-entry.entity';
import { trackedKindOf } from './tracked-entity.decorator';

export interface RecordActivityInput {
  eventType: EventCategory;
  action: AuditAction;
  message: string;
  detail?: string;
  /** Affected entity; its kind, id, label and link are derived from it */
  entity?: object;
  /** Kind of `entity` when its class is not registered (plain objects) */
  entityKind?: TrackedEntityKind;
  url?: string;
  /** `undefined` means the user making the current request; `null` means nobody */
  actor?: User | null;
  actorName?: string;
  changes?: AuditChanges | null;
}

@Injectable()
export class AuditService {
  private readonly logger = new Logger(AuditService.name);

  constructor(
    @InjectRepository(AuditEntry)
    private readonly auditRepository: Repository<AuditEntry>,
    private readonly usersService: UsersService,
    private readonly tablePreferences: TablePreferencesService,
  ) {}

  /**
   * Appends one activity entry. Never throws: a failed write is logged and
   * resolves to `null` so the business operation that triggered it goes on.
   */
  async record(input: RecordActivityInput, manager?: EntityManager): Promise<AuditEntry | null> {
    try {
      // Nested in the caller's transaction as a savepoint, so a failed write rolls back alone
      return manager ? await manager.transaction((tx) => this.write(input, tx)) : await this.write(input);
    } catch (error) {
      this.logger.error(
        `Failed to record ${input.eventType}/${input.action} activity: ${error instanceof Error ? error.message : String(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
      return null;
    }
  }

  /**
   * Saves an already stored tracked entity. A save that changes nothing
   * issues no UPDATE and raises no entity event, so the `updated` entry is
   * written here instead, without changes.
   */
  async saveExisting<T extends ObjectLiteral>(repository: Repository<T>, entity: T): Promise<T> {
    const { result, updated } = await watchUpdates(() => repository.save(entity));
    const kind = trackedKindOf(entity);
    if (kind && !updated.has(entity) && !isAutoLogSuppressed() && !isAuditWriteActive()) {
      await this.record({
        eventType: KIND_CATEGORY[kind],
        action: AuditAction.UPDATED,
        message: autoLogMessage(kind, entity, AuditAction.UPDATED),
        detail: detailFor(entity),
        entity,
        entityKind: kind,
        changes: null,
      });
    }
    return result;
  }

  private async write(input: RecordActivityInput, manager?: EntityManager): Promise<AuditEntry> {
    const actor = input.actor === undefined ? await this.resolveActor(manager) : input.actor;
    const actorName = input.actorName || (actor ? actor.getDisplayName() : '');

    let entityKind: TrackedEntityKind | null = null;
    let entityId: number | null = null;
    let objectRepr = '';
    let url = input.url ?? '';

    if (input.entity) {
      entityKind = input.entityKind ?? trackedKindOf(input.entity) ?? null;
      const id = readAttribute(input.entity, 'id');
      entityId = typeof id === 'number' ? id : null;
      objectRepr = shortLabel(input.entity, entityKind ?? undefined);
      if (!url && entityKind) {
        url = linkFor(entityKind, input.entity);
      }
    }

    const repo = manager ? manager.getRepository(AuditEntry) : this.auditRepository;
    const entry = repo.create({
      timestamp: new Date(),
      eventType: input.eventType,
      action: input.action,
      message: truncate(input.message, MESSAGE_MAX_LENGTH),
      detail: truncate(input.detail ?? '', DETAIL_MAX_LENGTH),
      actorId: actor?.id ?? null,
      actorName: truncate(actorName, ACTOR_NAME_MAX_LENGTH),
      entityKind,
      entityId,
      objectRepr: truncate(objectRepr, OBJECT_REPR_MAX_LENGTH),
      url: truncate(url, URL_MAX_LENGTH),
      changes: input.changes ?? null,
    });

    return runAuditWrite(() => repo.save(entry));
  }

  /** Reverse-chronological feed, searchable and filterable by category. */
  findFeed(request: TableRequest): Promise<TableContext<AuditEntry>> {
    const qb = this.auditRepository.createQueryBuilder('entry').leftJoinAndSelect('entry.actor', 'actor');

    const table = new ReusableTable<AuditEntry>(request, qb, this.feedColumns(), {
      tableId: 'activity',
      defaultSort: '-timestamp',
      pageSize: ACTIVITY_PAGE_SIZE,
      searchFields: ['message', 'detail', 'actorName'],
      filterFields: { event_type: 'eventType', action: 'action' },
      showBulkSelect: false,
      preferences: this.tablePreferences,
    });

    return table.getContext();
  }

  /** History of one entity, newest first. The entity itself may no longer exist. */
  findForEntity(ref: EntityRef): Promise<AuditEntry[]> {
    return this.auditRepository.find({
      where: { entityKind: ref.kind, entityId: ref.id },
      relations: { actor: true },
      order: { timestamp: 'DESC', id: 'DESC' },
    });
  }

  findRecent(limit = 10): Promise<AuditEntry[]> {
    return this.auditRepository.find({
      relations: { actor: true },
      order: { timestamp: 'DESC', id: 'DESC' },
      take: limit,
    });
  }

  private async resolveActor(manager?: EntityManager): Promise<User | null> {
    const username = getActingUsername();
    if (!username) {
      return null;
    }

    try {
      const user = await this.usersService.findActiveByUsername(username, manager);
      if (!user) {
        this.logger.debug(`No active account for acting user "${username}"`);
      }
      return user;
    } catch (error) {
      this.logger.warn(
        `Could not resolve acting user "${username}": ${error instanceof Error ? error.message : String(error)}`,
      );
      return null;
    }
  }

  private feedColumns(): TableColumn<AuditEntry>[] {
    return [
      new TableColumn<AuditEntry>('timestamp', 'When', 'timestamp'),
      new TableColumn<AuditEntry>('icon', '', (entry) => entry.getIcon(), { sortable: false, width: 'w-8' }),
      new TableColumn<AuditEntry>('event_type', 'Category', (entry) => entry.getEventTypeDisplay(), {
        sortField: 'eventType',
      }),
      new TableColumn<AuditEntry>('action', 'Action', (entry) => entry.getActionDisplay(), {
        sortField: 'action',
        badge: true,
      }),
      new TableColumn<AuditEntry>('message', 'Message', 'message', {
        sortable: false,
        linkPattern: (entry) => entry.url || null,
      }),
      new TableColumn<AuditEntry>('detail', 'Detail', 'detail', { sortable: false }),
      new TableColumn<AuditEntry>('actor', 'By', 'actorName'),
    ];
  }
}
