import { Injectable } from '@nestjs/common';
import { InjectDataSource, InjectRepository } from '@nestjs/typeorm';
import { DataSource, EntityManager, In, MoreThan, Not, Repository } from 'typeorm';
import { RecordNotFoundError } from '../../../common/exceptions';
import {
  ReusableTable,
  TableColumn,
  TableContext,
  TablePreferencesService,
  TableRequest,
  urlPattern,
} from '../../../common/table';
import { suppressAutoLog } from '../../audit/audit-scope';
import { AuditService } from '../../audit/audit.service';
import { CreateSparePartDto, UpdateSparePartDto } from '../dto';
import { Component } from '../entities/component.entity';
import { SparePartsInventory } from '../entities/spare-parts-inventory.entity';
import { ComponentStatus } from '../enums/component-status.enum';

export interface SparePartDetail {
  sparePart: SparePartsInventory;
  needsRestock: boolean;
  spareComponents: Component[];
}

interface SpareCountRow {
  componentTypeId: number | string;
  spareCount: number | string;
}

/**
 * Keeps `quantityAvailable` of each inventory row equal to the number of
 * spare components of its type.
 */
@Injectable()
export class SparePartsService {
  constructor(
    @InjectRepository(SparePartsInventory)
    private readonly inventoryRepository: Repository<SparePartsInventory>,
    @InjectDataSource()
    private readonly dataSource: DataSource,
    private readonly auditService: AuditService,
    private readonly tablePreferences: TablePreferencesService,
  ) {}

  /**
   * Re-counts spare components of one type. A row is created once spares
   * exist and kept at zero when they run out, so its threshold and notes
   * survive.
   */
  async sync(componentTypeId: number, manager: EntityManager = this.dataSource.manager): Promise<void> {
    const spareCount = await manager.count(Component, {
      where: { componentTypeId, status: ComponentStatus.SPARE },
    });
    const entry = await manager.findOneBy(SparePartsInventory, { componentTypeId });

    if (entry) {
      if (entry.quantityAvailable !== spareCount) {
        entry.quantityAvailable = spareCount;
        await manager.save(entry);
      }
      return;
    }

    if (spareCount > 0) {
      await manager.save(manager.create(SparePartsInventory, { componentTypeId, quantityAvailable: spareCount }));
    }
  }

  /** Reconciles every inventory row against the component table. */
  syncAll(): Promise<void> {
    return suppressAutoLog(() =>
      this.dataSource.transaction(async (manager) => {
        const rows = await manager
          .createQueryBuilder(Component, 'component')
          .select('component.componentTypeId', 'componentTypeId')
          .addSelect('COUNT(component.id)', 'spareCount')
          .where('component.status = :status', { status: ComponentStatus.SPARE })
          .groupBy('component.componentTypeId')
          .getRawMany<SpareCountRow>();

        const counts = new Map(rows.map((row) => [Number(row.componentTypeId), Number(row.spareCount)]));
        const entries = await manager.find(SparePartsInventory);
        const existing = new Set(entries.map((entry) => entry.componentTypeId));

        for (const entry of entries) {
          const count = counts.get(entry.componentTypeId);
          if (count !== undefined && entry.quantityAvailable !== count) {
            entry.quantityAvailable = count;
            await manager.save(entry);
          }
        }

        for (const [componentTypeId, count] of counts) {
          if (!existing.has(componentTypeId)) {
            await manager.save(manager.create(SparePartsInventory, { componentTypeId, quantityAvailable: count }));
          }
        }

        const countedTypes = [...counts.keys()];
        await manager.update(
          SparePartsInventory,
          countedTypes.length
            ? { componentTypeId: Not(In(countedTypes)), quantityAvailable: MoreThan(0) }
            : { quantityAvailable: MoreThan(0) },
          { quantityAvailable: 0 },
        );
      }),
    );
  }

  async findAll(request: TableRequest): Promise<TableContext<SparePartsInventory>> {
    await this.syncAll();

    const qb = this.inventoryRepository
      .createQueryBuilder('sparePart')
      .leftJoinAndSelect('sparePart.componentType', 'componentType')
      .leftJoinAndSelect('sparePart.location', 'location');

    const columns = [
      new TableColumn<SparePartsInventory>('component_type', 'Type', 'componentType.typeName', {
        sortField: 'componentType.typeName',
        linkPattern: urlPattern('spare-parts.detail', { id: 'id' }),
      }),
      new TableColumn<SparePartsInventory>('manufacturer', 'Mfg', 'manufacturer'),
      new TableColumn<SparePartsInventory>('model', 'Model', 'model'),
      new TableColumn<SparePartsInventory>('quantity_available', 'Qty Avail', 'quantityAvailable', { align: 'right' }),
      new TableColumn<SparePartsInventory>('quantity_minimum', 'Qty Min', 'quantityMinimum', { align: 'right' }),
      new TableColumn<SparePartsInventory>('restock', 'Restock', (part) => (part.needsRestock ? 'Low' : 'OK'), {
        sortable: false,
        badge: true,
        badgeMap: { Low: 'badge-danger', OK: 'badge-success' },
      }),
      new TableColumn<SparePartsInventory>('location', 'Location', 'location.name', { sortField: 'location.name' }),
      new TableColumn<SparePartsInventory>('last_restocked', 'Restocked', 'lastRestocked'),
    ];

    return new ReusableTable<SparePartsInventory>(request, qb, columns, {
      tableId: 'spare-parts',
      defaultSort: 'componentType.typeName',
      searchFields: ['componentType.typeName', 'manufacturer', 'model', 'specifications'],
      showBulkSelect: false,
      preferences: this.tablePreferences,
    }).getContext();
  }

  /** Inventory row with the spare components it counts. */
  async findOne(id: number): Promise<SparePartDetail> {
    const sparePart = await this.inventoryRepository.findOne({
      where: { id },
      relations: { componentType: true, location: true },
    });
    if (!sparePart) {
      throw new RecordNotFoundError('Spare part', id);
    }

    const spareComponents = await this.dataSource.getRepository(Component).find({
      where: { componentTypeId: sparePart.componentTypeId, status: ComponentStatus.SPARE },
      order: { componentTag: 'ASC' },
    });
    return { sparePart, needsRestock: sparePart.needsRestock, spareComponents };
  }

  /** Rows at or below their restock threshold, emptiest first. */
  findBelowThreshold(limit = 10): Promise<SparePartsInventory[]> {
    return this.inventoryRepository
      .createQueryBuilder('sparePart')
      .leftJoinAndSelect('sparePart.componentType', 'componentType')
      .where('sparePart.quantityAvailable <= sparePart.quantityMinimum')
      .orderBy('sparePart.quantityAvailable', 'ASC')
      .addOrderBy('sparePart.id', 'ASC')
      .take(limit)
      .getMany();
  }

  async create(dto: CreateSparePartDto): Promise<SparePartsInventory> {
    const sparePart = this.inventoryRepository.create(dto);
    const saved = await this.inventoryRepository.save(sparePart);
    await suppressAutoLog(() => this.sync(saved.componentTypeId));
    return (await this.findOne(saved.id)).sparePart;
  }

  async update(id: number, dto: UpdateSparePartDto): Promise<SparePartsInventory> {
    const sparePart = await this.getRecord(id);
    this.inventoryRepository.merge(sparePart, dto);
    await this.auditService.saveExisting(this.inventoryRepository, sparePart);
    return (await this.findOne(id)).sparePart;
  }

  async remove(id: number): Promise<void> {
    const sparePart = await this.getRecord(id);
    await this.inventoryRepository.remove(sparePart);
  }

  private async getRecord(id: number): Promise<SparePartsInventory> {
    const sparePart = await this.inventoryRepository.findOneBy({ id });
    if (!sparePart) {
      throw new RecordNotFoundError('Spare part', id);
    }
    return sparePart;
  }
}
