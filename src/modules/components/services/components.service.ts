import { Injectable } from '@nestjs/common';
import { InjectDataSource, InjectRepository } from '@nestjs/typeorm';
import { DataSource, In, IsNull, Not, Repository } from 'typeorm';
import { InstalledComponentWithoutAssetError, RecordNotFoundError } from '../../../common/exceptions';
import { reverse } from '../../../common/routing/routes';
import {
  BulkAction,
  ReusableTable,
  TableColumn,
  TableContext,
  TablePreferencesService,
  TableRequest,
  urlPattern,
} from '../../../common/table';
import { Asset } from '../../assets/entities/asset.entity';
import { suppressAutoLog } from '../../audit/audit-scope';
import { AuditService } from '../../audit/audit.service';
import { AuditAction, EventCategory } from '../../audit/constants/audit.constants';
import { componentTagContext } from '../../tagging/tag-context';
import { TagService } from '../../tagging/tag.service';
import { ChangeComponentStatusDto, CreateComponentDto, UpdateComponentDto } from '../dto';
import { ComponentHistory } from '../entities/component-history.entity';
import { Component } from '../entities/component.entity';
import { COMPONENT_STATUS_BADGES, ComponentAction, ComponentStatus } from '../enums/component-status.enum';
import { ComponentRepository } from '../repositories/component.repository';

export interface ComponentBulkResult {
  count: number;
}

function today(): string {
  return new Date().toISOString().slice(0, 10);
}

@Injectable()
export class ComponentsService {
  constructor(
    @InjectRepository(Component)
    private readonly componentRepository: Repository<Component>,
    @InjectRepository(ComponentHistory)
    private readonly historyRepository: Repository<ComponentHistory>,
    @InjectDataSource()
    private readonly dataSource: DataSource,
    private readonly componentTags: ComponentRepository,
    private readonly tagService: TagService,
    private readonly auditService: AuditService,
    private readonly tablePreferences: TablePreferencesService,
  ) {}

  async create(dto: CreateComponentDto): Promise<Component> {
    const component = this.componentRepository.create(dto);
    this.assertParentWhenInstalled(component);
    await this.ensureTag(component);
    const saved = await this.componentRepository.save(component);
    if (saved.status === ComponentStatus.INSTALLED && saved.parentAssetId != null) {
      const installed = this.historyEntry(saved.id, saved.parentAssetId, ComponentAction.INSTALLED);
      await suppressAutoLog(() => this.historyRepository.save(installed));
    }
    return this.findOne(saved.id);
  }

  findAll(request: TableRequest): Promise<TableContext<Component>> {
    const qb = this.componentRepository
      .createQueryBuilder('component')
      .leftJoinAndSelect('component.componentType', 'componentType')
      .leftJoinAndSelect('component.parentAsset', 'parentAsset')
      .leftJoinAndSelect('parentAsset.assignedTo', 'assignedTo')
      .leftJoinAndSelect('component.invoice', 'invoice');

    const columns = [
      new TableColumn<Component>('component_tag', 'Tag', 'componentTag', {
        linkPattern: urlPattern('components.detail', { id: 'id' }),
      }),
      new TableColumn<Component>('component_type', 'Type', 'componentType.typeName', {
        sortField: 'componentType.typeName',
      }),
      new TableColumn<Component>('manufacturer', 'Mfg', 'manufacturer'),
      new TableColumn<Component>('model', 'Model', 'model'),
      new TableColumn<Component>('serial_number', 'Serial', 'serialNumber'),
      new TableColumn<Component>('parent_asset', 'Parent', 'parentAsset.assetTag', {
        sortField: 'parentAsset.assetTag',
        linkPattern: urlPattern('assets.detail', { id: 'parentAsset.id' }),
      }),
      new TableColumn<Component>('assigned_to', 'Assigned To', 'parentAsset.assignedTo.name', {
        sortField: 'assignedTo.name',
      }),
      new TableColumn<Component>('status', 'Status', 'status', { badge: true, badgeMap: COMPONENT_STATUS_BADGES }),
      new TableColumn<Component>('invoice', 'Invoice', 'invoice.invoiceNumber', {
        sortField: 'invoice.invoiceNumber',
        defaultVisible: false,
      }),
      new TableColumn<Component>('requisition', 'Requisition', 'requisitionId', { defaultVisible: false }),
      new TableColumn<Component>('updated_at', 'Last Update', 'updatedAt', { defaultVisible: false }),
    ];

    const bulkActions = [
      new BulkAction('unassign', 'Unassign', reverse('components.bulk-unassign'), {
        confirmation: 'Unassign selected components?',
      }),
      new BulkAction('delete', 'Delete', reverse('components.bulk-delete'), {
        confirmation: 'Delete selected components? This cannot be undone.',
        variant: 'danger',
      }),
    ];

    return new ReusableTable<Component>(request, qb, columns, {
      tableId: 'components',
      defaultSort: '-updatedAt',
      searchFields: [
        'componentTag',
        'componentType.typeName',
        'serialNumber',
        'manufacturer',
        'model',
        'parentAsset.assetTag',
        'assignedTo.name',
        'assignedTo.employeeId',
        'status',
        'invoice.invoiceNumber',
      ],
      filterFields: { status: 'status', type: 'componentTypeId' },
      bulkActions,
      preferences: this.tablePreferences,
    }).getContext();
  }

  async findOne(id: number): Promise<Component> {
    const component = await this.componentRepository.findOne({
      where: { id },
      relations: { componentType: true, parentAsset: { assignedTo: true }, requisition: true, invoice: true },
    });
    if (!component) {
      throw new RecordNotFoundError('Component', id);
    }
    return component;
  }

  /** Installation trail, most recent first. */
  async getHistory(id: number): Promise<ComponentHistory[]> {
    await this.getRecord(id);
    return this.historyRepository.find({
      where: { componentId: id },
      relations: { parentAsset: true, performedBy: true },
      order: { actionDate: 'DESC', id: 'DESC' },
    });
  }

  async update(id: number, dto: UpdateComponentDto): Promise<Component> {
    const component = await this.getRecord(id);
    this.componentRepository.merge(component, dto);
    this.assertParentWhenInstalled(component);
    await this.ensureTag(component);
    await this.auditService.saveExisting(this.componentRepository, component);
    return this.findOne(id);
  }

  async remove(id: number): Promise<void> {
    const component = await this.getRecord(id);
    await this.componentRepository.remove(component);
  }

  /**
   * Moves a component to a new status. Installing needs a parent asset and
   * stamps the installation date.
   */
  async changeStatus(id: number, dto: ChangeComponentStatusDto): Promise<Component> {
    const component = await this.getRecord(id);
    const previous = component.status;

    if (dto.status === ComponentStatus.INSTALLED) {
      if (dto.parentAssetId === undefined) {
        throw new InstalledComponentWithoutAssetError();
      }
      const parent = await this.dataSource.getRepository(Asset).findOneBy({ id: dto.parentAssetId });
      if (!parent) {
        throw new RecordNotFoundError('Asset', dto.parentAssetId);
      }

      const history: ComponentHistory[] = [];
      const previousParentId = component.parentAssetId;
      if (previousParentId != null && previousParentId !== parent.id) {
        history.push(this.historyEntry(component.id, previousParentId, ComponentAction.REMOVED));
      }
      if (previous !== ComponentStatus.INSTALLED || previousParentId !== parent.id) {
        history.push(this.historyEntry(component.id, parent.id, ComponentAction.INSTALLED));
      }

      component.parentAssetId = parent.id;
      component.status = ComponentStatus.INSTALLED;
      component.installationDate = today();
      component.removalDate = null;
      await suppressAutoLog(async () => {
        await this.componentRepository.save(component);
        await this.historyRepository.save(history);
      });

      await this.auditService.record({
        eventType: EventCategory.COMPONENT,
        action: AuditAction.ASSIGNED,
        message: `Component ${component.componentTag} installed in asset ${parent.assetTag}`,
        detail: parent.assetTag,
        entity: component,
        changes: { status: [previous, ComponentStatus.INSTALLED], parent_asset: [null, parent.assetTag] },
      });
      return this.findOne(id);
    }

    component.status = dto.status;
    const parentAssetId = component.parentAssetId;
    await suppressAutoLog(async () => {
      await this.componentRepository.save(component);
      if (dto.status === ComponentStatus.FAILED && parentAssetId != null) {
        await this.historyRepository.save(this.historyEntry(component.id, parentAssetId, ComponentAction.FAILED));
      }
    });

    await this.auditService.record({
      eventType: EventCategory.COMPONENT,
      action: AuditAction.STATUS_CHANGED,
      message: `Component ${component.componentTag} status changed to ${dto.status}`,
      detail: component.getStatusDisplay(),
      entity: component,
      changes: { status: [previous, dto.status] },
    });
    return this.findOne(id);
  }

  /** Takes a component out of its parent asset and back to spare stock. */
  async unassign(id: number): Promise<Component> {
    const component = await this.findOne(id);
    const parent = component.parentAsset;
    if (!parent) {
      throw new InstalledComponentWithoutAssetError();
    }

    this.detach(component);
    await suppressAutoLog(async () => {
      await this.componentRepository.save(component);
      await this.historyRepository.save(this.historyEntry(component.id, parent.id, ComponentAction.REMOVED));
    });

    await this.auditService.record({
      eventType: EventCategory.COMPONENT,
      action: AuditAction.UNASSIGNED,
      message: `Component ${component.componentTag} unassigned from asset ${parent.assetTag}`,
      detail: parent.assetTag,
      entity: component,
    });
    return this.findOne(id);
  }

  async bulkUnassign(ids: number[]): Promise<ComponentBulkResult> {
    const components = await this.componentRepository.find({
      where: { id: In(ids), parentAssetId: Not(IsNull()) },
    });
    const count = components.length;
    if (count === 0) {
      return { count };
    }

    const history = components.flatMap((component) =>
      component.parentAssetId != null
        ? [this.historyEntry(component.id, component.parentAssetId, ComponentAction.REMOVED)]
        : [],
    );
    components.forEach((component) => this.detach(component));
    await suppressAutoLog(() =>
      this.dataSource.transaction(async (manager) => {
        await manager.save(components);
        await manager.save(history);
      }),
    );

    await this.auditService.record({
      eventType: EventCategory.COMPONENT,
      action: AuditAction.UNASSIGNED,
      message: `${count} component(s) bulk unassigned`,
    });
    return { count };
  }

  async bulkDelete(ids: number[]): Promise<ComponentBulkResult> {
    const components = await this.componentRepository.findBy({ id: In(ids) });
    const count = components.length;
    if (count === 0) {
      return { count };
    }

    await suppressAutoLog(() => this.dataSource.transaction((manager) => manager.remove(components)));

    await this.auditService.record({
      eventType: EventCategory.COMPONENT,
      action: AuditAction.BULK_DELETED,
      message: `${count} component(s) bulk deleted`,
      detail: components.map((component) => component.componentTag).join(', '),
    });
    return { count };
  }

  private historyEntry(componentId: number, parentAssetId: number, action: ComponentAction): ComponentHistory {
    return this.historyRepository.create({
      componentId,
      parentAssetId,
      action,
      actionDate: new Date(),
      performedById: null,
      reason: null,
      previousComponentId: null,
      notes: null,
    });
  }

  private detach(component: Component): void {
    component.parentAssetId = null;
    component.parentAsset = null;
    component.status = ComponentStatus.SPARE;
    component.removalDate = today();
  }

  private assertParentWhenInstalled(component: Component): void {
    const status = component.status ?? ComponentStatus.INSTALLED;
    if (status === ComponentStatus.INSTALLED && component.parentAssetId == null) {
      throw new InstalledComponentWithoutAssetError();
    }
  }

  /** Blank tags are generated from the parent asset's company and holder's department. */
  private async ensureTag(component: Component): Promise<void> {
    if (component.componentTag && component.componentTag.trim()) {
      component.componentTag = component.componentTag.trim();
      return;
    }

    component.parentAsset =
      component.parentAssetId != null
        ? await this.dataSource.getRepository(Asset).findOne({
            where: { id: component.parentAssetId },
            relations: { company: true, assignedTo: { department: true } },
          })
        : null;

    component.componentTag = await this.tagService.generateComponentTag(
      this.componentTags,
      componentTagContext(component),
    );
  }

  private async getRecord(id: number): Promise<Component> {
    const component = await this.componentRepository.findOneBy({ id });
    if (!component) {
      throw new RecordNotFoundError('Component', id);
    }
    return component;
  }
}
