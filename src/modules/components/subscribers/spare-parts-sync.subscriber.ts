import { Injectable, Logger } from '@nestjs/common';
import { DataSource, EntityManager, EntitySubscriberInterface, InsertEvent, RemoveEvent, UpdateEvent } from 'typeorm';
import { suppressAutoLog } from '../../audit/audit-scope';
import { Component } from '../entities/component.entity';
import { SparePartsService } from '../services/spare-parts.service';

/**
 * Re-counts spare stock for the component types touched by a component
 * insert, update or removal. Each re-count runs as a savepoint inside the
 * event's transaction; a failed sync is rolled back, logged and never fails
 * the component write.
 */
@Injectable()
export class SparePartsSyncSubscriber implements EntitySubscriberInterface<Component> {
  private readonly logger = new Logger(SparePartsSyncSubscriber.name);

  constructor(
    dataSource: DataSource,
    private readonly sparePartsService: SparePartsService,
  ) {
    dataSource.subscribers.push(this);
  }

  listenTo(): typeof Component {
    return Component;
  }

  async afterInsert(event: InsertEvent<Component>): Promise<void> {
    await this.syncTypes([event.entity.componentTypeId], event.manager);
  }

  async afterUpdate(event: UpdateEvent<Component>): Promise<void> {
    // A type change moves stock between two rows
    await this.syncTypes([event.entity?.componentTypeId, event.databaseEntity?.componentTypeId], event.manager);
  }

  async afterRemove(event: RemoveEvent<Component>): Promise<void> {
    await this.syncTypes([event.entity?.componentTypeId ?? event.databaseEntity?.componentTypeId], event.manager);
  }

  private async syncTypes(typeIds: Array<number | null | undefined>, manager: EntityManager): Promise<void> {
    const unique = new Set(typeIds.filter((id): id is number => typeof id === 'number'));
    for (const typeId of unique) {
      try {
        await suppressAutoLog(() => manager.transaction((tx) => this.sparePartsService.sync(typeId, tx)));
      } catch (error) {
        this.logger.warn(
          `Spare parts sync failed for component type ${typeId}: ${error instanceof Error ? error.message : String(error)}`,
        );
      }
    }
  }
}
