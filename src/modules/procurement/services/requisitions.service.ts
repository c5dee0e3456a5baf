import { Injectable } from '@nestjs/common';
import { InjectDataSource, InjectRepository } from '@nestjs/typeorm';
import { DataSource, Repository } from 'typeorm';
import {
  InvalidStatusTransitionError,
  RecordNotFoundError,
  RequisitionCancelledError,
  RequisitionItemTargetError,
  RequisitionWithoutItemsError,
} from '../../../common/exceptions';
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
import { Asset } from '../../assets/entities/asset.entity';
import { AuditAction, EventCategory } from '../../audit/constants/audit.constants';
import { Component } from '../../components/entities/component.entity';
import { DepartmentsService } from '../../organization/services/departments.service';
import { EmployeesService } from '../../organization/services/employees.service';
import { CreateRequisitionDto, CreateRequisitionItemDto, UpdateRequisitionDto } from '../dto';
import { RequisitionItem } from '../entities/requisition-item.entity';
import { Requisition } from '../entities/requisition.entity';
import {
  REQUISITION_STATUS_LABELS,
  RequisitionItemType,
  RequisitionPriority,
  RequisitionStatus,
} from '../enums/procurement.enums';

const STATUS_BADGES: Record<RequisitionStatus, string> = {
  [RequisitionStatus.PENDING]: 'badge-warning',
  [RequisitionStatus.FULFILLED]: 'badge-success',
  [RequisitionStatus.CANCELLED]: 'badge-muted',
};

const PRIORITY_BADGES: Record<RequisitionPriority, string> = {
  [RequisitionPriority.LOW]: 'badge-muted',
  [RequisitionPriority.NORMAL]: 'badge-info',
  [RequisitionPriority.HIGH]: 'badge-warning',
  [RequisitionPriority.URGENT]: 'badge-danger',
};

function today(): string {
  return new Date().toISOString().slice(0, 10);
}

@Injectable()
export class RequisitionsService {
  constructor(
    @InjectRepository(Requisition)
    private readonly requisitionRepository: Repository<Requisition>,
    @InjectRepository(RequisitionItem)
    private readonly itemRepository: Repository<RequisitionItem>,
    @InjectDataSource()
    private readonly dataSource: DataSource,
    private readonly departmentsService: DepartmentsService,
    private readonly employeesService: EmployeesService,
    private readonly auditService: AuditService,
    private readonly tablePreferences: TablePreferencesService,
  ) {}

  async create(dto: CreateRequisitionDto): Promise<Requisition> {
    await this.departmentsService.findOne(dto.departmentId);
    await this.employeesService.findOne(dto.requestedById);

    const requisition = this.requisitionRepository.create({
      ...dto,
      requisitionDate: dto.requisitionDate ?? today(),
    });
    const saved = await this.requisitionRepository.save(requisition);
    return this.findOne(saved.id);
  }

  findAll(request: TableRequest): Promise<TableContext<Requisition>> {
    const qb = this.requisitionRepository
      .createQueryBuilder('requisition')
      .leftJoinAndSelect('requisition.company', 'company')
      .leftJoinAndSelect('requisition.department', 'department')
      .leftJoinAndSelect('requisition.requestedBy', 'requestedBy');

    const columns = [
      new TableColumn<Requisition>('requisition_number', 'Requisition #', 'requisitionNumber', {
        linkPattern: urlPattern('requisitions.detail', { id: 'id' }),
      }),
      new TableColumn<Requisition>('requested_by', 'Requested By', 'requestedBy.name', {
        sortField: 'requestedBy.name',
        linkPattern: urlPattern('employees.detail', { id: 'requestedBy.id' }),
      }),
      new TableColumn<Requisition>('department', 'Dept', 'department.name', { sortField: 'department.name' }),
      new TableColumn<Requisition>('company', 'Company', 'company.code', {
        sortField: 'company.code',
        defaultVisible: false,
      }),
      new TableColumn<Requisition>('requisition_date', 'Date', 'requisitionDate'),
      new TableColumn<Requisition>('priority', 'Priority', 'priority', { badge: true, badgeMap: PRIORITY_BADGES }),
      new TableColumn<Requisition>('status', 'Status', 'status', { badge: true, badgeMap: STATUS_BADGES }),
      new TableColumn<Requisition>('fulfilled_date', 'Fulfilled', 'fulfilledDate', { defaultVisible: false }),
    ];

    return new ReusableTable<Requisition>(request, qb, columns, {
      tableId: 'requisitions',
      defaultSort: '-requisitionDate',
      searchFields: ['requisitionNumber', 'requestedBy.name', 'department.name', 'company.code', 'status', 'priority'],
      filterFields: { status: 'status', priority: 'priority' },
      showBulkSelect: false,
      preferences: this.tablePreferences,
    }).getContext();
  }

  async findOne(id: number): Promise<Requisition> {
    const requisition = await this.requisitionRepository.findOne({
      where: { id },
      relations: { company: true, department: true, requestedBy: true, approvedBy: true },
    });
    if (!requisition) {
      throw new RecordNotFoundError('Requisition', id);
    }
    return requisition;
  }

  async update(id: number, dto: UpdateRequisitionDto): Promise<Requisition> {
    const requisition = await this.getRecord(id);
    this.requisitionRepository.merge(requisition, dto);
    await this.auditService.saveExisting(this.requisitionRepository, requisition);
    return this.findOne(id);
  }

  async remove(id: number): Promise<void> {
    await this.requisitionRepository.remove(await this.getRecord(id));
  }

  /** Assets and components handed out against the requisition, oldest first. */
  async getItems(id: number): Promise<RequisitionItem[]> {
    await this.getRecord(id);
    return this.itemRepository.find({
      where: { requisitionId: id },
      relations: { asset: true, component: true },
      order: { createdAt: 'ASC', id: 'ASC' },
    });
  }

  /**
   * @throws RequisitionItemTargetError unless exactly one of asset and component is given
   * @throws RequisitionCancelledError when the requisition was cancelled
   */
  async addItem(id: number, dto: CreateRequisitionItemDto): Promise<RequisitionItem> {
    const hasAsset = dto.assetId !== undefined;
    if (hasAsset === (dto.componentId !== undefined)) {
      throw new RequisitionItemTargetError();
    }

    const requisition = await this.getRecord(id);
    if (requisition.status === RequisitionStatus.CANCELLED) {
      throw new RequisitionCancelledError(requisition.requisitionNumber);
    }

    const item = this.itemRepository.create({
      requisitionId: requisition.id,
      itemType: hasAsset ? RequisitionItemType.ASSET : RequisitionItemType.COMPONENT,
      assetId: null,
      componentId: null,
      notes: dto.notes ?? null,
    });
    item.requisition = requisition;
    if (dto.assetId !== undefined) {
      const asset = await this.dataSource.getRepository(Asset).findOneBy({ id: dto.assetId });
      if (!asset) {
        throw new RecordNotFoundError('Asset', dto.assetId);
      }
      item.asset = asset;
      item.assetId = asset.id;
    } else if (dto.componentId !== undefined) {
      const component = await this.dataSource.getRepository(Component).findOneBy({ id: dto.componentId });
      if (!component) {
        throw new RecordNotFoundError('Component', dto.componentId);
      }
      item.component = component;
      item.componentId = component.id;
    }

    const saved = await this.itemRepository.save(item);
    return this.getItem(id, saved.id);
  }

  async removeItem(id: number, itemId: number): Promise<void> {
    await this.itemRepository.remove(await this.getItem(id, itemId));
  }

  /**
   * @throws InvalidStatusTransitionError unless the requisition is pending
   * @throws RequisitionWithoutItemsError when nothing was handed out against it
   */
  async fulfil(id: number): Promise<Requisition> {
    const requisition = await this.getPending(id, RequisitionStatus.FULFILLED);
    if ((await this.itemRepository.countBy({ requisitionId: id })) === 0) {
      throw new RequisitionWithoutItemsError(requisition.requisitionNumber);
    }

    requisition.status = RequisitionStatus.FULFILLED;
    requisition.fulfilledDate = today();
    await suppressAutoLog(() => this.requisitionRepository.save(requisition));

    await this.auditService.record({
      eventType: EventCategory.REQUISITION,
      action: AuditAction.FULFILLED,
      message: `Requisition ${requisition.requisitionNumber} marked as fulfilled`,
      detail: REQUISITION_STATUS_LABELS[RequisitionStatus.FULFILLED],
      entity: requisition,
      changes: { status: [RequisitionStatus.PENDING, RequisitionStatus.FULFILLED] },
    });
    return this.findOne(id);
  }

  /** @throws InvalidStatusTransitionError unless the requisition is pending */
  async cancel(id: number, reason?: string): Promise<Requisition> {
    const requisition = await this.getPending(id, RequisitionStatus.CANCELLED);

    requisition.status = RequisitionStatus.CANCELLED;
    if (reason) {
      requisition.cancellationReason = reason;
    }
    await suppressAutoLog(() => this.requisitionRepository.save(requisition));

    await this.auditService.record({
      eventType: EventCategory.REQUISITION,
      action: AuditAction.CANCELLED,
      message: `Requisition ${requisition.requisitionNumber} cancelled`,
      detail: reason || REQUISITION_STATUS_LABELS[RequisitionStatus.CANCELLED],
      entity: requisition,
      changes: { status: [RequisitionStatus.PENDING, RequisitionStatus.CANCELLED] },
    });
    return this.findOne(id);
  }

  private async getItem(id: number, itemId: number): Promise<RequisitionItem> {
    const item = await this.itemRepository.findOne({
      where: { id: itemId, requisitionId: id },
      relations: { requisition: true, asset: true, component: true },
    });
    if (!item) {
      throw new RecordNotFoundError('Requisition item', itemId);
    }
    return item;
  }

  private async getPending(id: number, target: RequisitionStatus): Promise<Requisition> {
    const requisition = await this.getRecord(id);
    if (requisition.status !== RequisitionStatus.PENDING) {
      throw new InvalidStatusTransitionError('Requisition', requisition.status, target);
    }
    return requisition;
  }

  private async getRecord(id: number): Promise<Requisition> {
    const requisition = await this.requisitionRepository.findOneBy({ id });
    if (!requisition) {
      throw new RecordNotFoundError('Requisition', id);
    }
    return requisition;
  }
}
