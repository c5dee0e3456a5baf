import { Injectable, Logger } from '@nestjs/common';
import { InjectDataSource, InjectRepository } from '@nestjs/typeorm';
import { DataSource, EntityManager, In, IsNull, Not, Repository } from 'typeorm';
import { AssetAssignmentConflictError, AssetNotAssignedError, RecordNotFoundError } from '../../../common/exceptions';
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
import { suppressAutoLog } from '../../audit/audit-scope';
import { AuditService } from '../../audit/audit.service';
import { AuditAction, EventCategory } from '../../audit/constants/audit.constants';
import { Company } from '../../organization/entities/company.entity';
import { Employee } from '../../organization/entities/employee.entity';
import { Location } from '../../organization/entities/location.entity';
import { assetTagContext } from '../../tagging/tag-context';
import { TagService } from '../../tagging/tag.service';
import {
  AssignAssetDto,
  BulkResult,
  CreateAssetDto,
  TransferAssetDto,
  UnassignAssetDto,
  UpdateAssetDto,
} from '../dto/asset.dto';
import { AssetAssignment } from '../entities/asset-assignment.entity';
import { Asset } from '../entities/asset.entity';
import { ASSET_STATUS_BADGES, ASSET_STATUS_LABELS, AssetStatus } from '../enums/asset-status.enum';
import { AssetRepository } from '../repositories/asset.repository';

const ASSET_RELATIONS = {
  company: true,
  assetModel: { category: true },
  location: true,
  assignedTo: { department: true, location: true },
  requisition: true,
  invoice: true,
} as const;

@Injectable()
export class AssetsService {
  private readonly logger = new Logger(AssetsService.name);

  constructor(
    @InjectRepository(Asset)
    private readonly assetRepository: Repository<Asset>,
    @InjectRepository(AssetAssignment)
    private readonly assignmentRepository: Repository<AssetAssignment>,
    @InjectDataSource()
    private readonly dataSource: DataSource,
    private readonly assetTags: AssetRepository,
    private readonly tagService: TagService,
    private readonly auditService: AuditService,
    private readonly tablePreferences: TablePreferencesService,
  ) {}

  async create(dto: CreateAssetDto): Promise<Asset> {
    const asset = this.assetRepository.create(dto);
    this.assertSingleHolder(asset);
    await this.ensureTag(asset);
    const saved = await this.assetRepository.save(asset);
    return this.findOne(saved.id);
  }

  findAll(request: TableRequest): Promise<TableContext<Asset>> {
    const qb = this.assetRepository
      .createQueryBuilder('asset')
      .leftJoinAndSelect('asset.assetModel', 'assetModel')
      .leftJoinAndSelect('assetModel.category', 'category')
      .leftJoinAndSelect('asset.assignedTo', 'assignedTo')
      .leftJoinAndSelect('assignedTo.department', 'department')
      .leftJoinAndSelect('assignedTo.location', 'employeeLocation')
      .leftJoinAndSelect('asset.location', 'location')
      .leftJoinAndSelect('asset.company', 'company');

    const columns = [
      new TableColumn<Asset>('asset_tag', 'Tag', 'assetTag', {
        linkPattern: urlPattern('assets.detail', { id: 'id' }),
      }),
      new TableColumn<Asset>('asset_model', 'Model', (asset) => asset.assetModel?.toString() ?? '', {
        sortField: 'assetModel.modelName',
      }),
      new TableColumn<Asset>('category', 'Category', 'assetModel.category.name', { sortField: 'category.name' }),
      new TableColumn<Asset>('assigned_to', 'Assigned To', 'assignedTo.name', {
        sortField: 'assignedTo.name',
        linkPattern: urlPattern('employees.detail', { id: 'assignedTo.id' }),
      }),
      new TableColumn<Asset>('company', 'Company', 'company.code', {
        sortField: 'company.code',
        linkPattern: urlPattern('companies.detail', { id: 'company.id' }),
      }),
      new TableColumn<Asset>('department', 'Dept', 'assignedTo.department.name', {
        sortField: 'department.name',
        linkPattern: urlPattern('departments.detail', { id: 'assignedTo.department.id' }),
      }),
      new TableColumn<Asset>('location', 'Location', (asset) => this.resolveLocation(asset)?.name ?? '', {
        sortField: 'location.name',
      }),
      new TableColumn<Asset>('status', 'Status', 'status', {
        badge: true,
        badgeMap: ASSET_STATUS_BADGES,
        align: 'center',
      }),
      new TableColumn<Asset>('updated_at', 'Last Update', 'updatedAt', { defaultVisible: false }),
    ];

    const bulkActions = [
      new BulkAction('unassign', 'Unassign', reverse('assets.bulk-unassign'), {
        confirmation: 'Unassign selected assets?',
      }),
      new BulkAction('status', 'Change Status', reverse('assets.bulk-status')),
      new BulkAction('delete', 'Delete', reverse('assets.bulk-delete'), {
        confirmation: 'Delete selected assets? This cannot be undone.',
        variant: 'danger',
      }),
    ];

    return new ReusableTable<Asset>(request, qb, columns, {
      tableId: 'assets',
      defaultSort: '-updatedAt',
      searchFields: [
        'assetTag',
        'category.name',
        'assetModel.modelName',
        'assetModel.manufacturer',
        'assetModel.modelNumber',
        'assignedTo.name',
        'serialNumber',
        'location.name',
        'status',
      ],
      filterFields: { status: 'status' },
      bulkActions,
      preferences: this.tablePreferences,
    }).getContext();
  }

  async findOne(id: number): Promise<Asset> {
    const asset = await this.assetRepository.findOne({ where: { id }, relations: ASSET_RELATIONS });
    if (!asset) {
      throw new RecordNotFoundError('Asset', id);
    }
    return asset;
  }

  async findByTag(assetTag: string): Promise<Asset> {
    const asset = await this.assetRepository.findOne({ where: { assetTag }, relations: ASSET_RELATIONS });
    if (!asset) {
      throw new RecordNotFoundError('Asset', assetTag);
    }
    return asset;
  }

  /** Custody history, most recent first. */
  async getAssignments(id: number): Promise<AssetAssignment[]> {
    await this.getRecord(id);
    return this.assignmentRepository.find({
      where: { assetId: id },
      relations: { employee: true, location: true },
      order: { assignedDate: 'DESC', id: 'DESC' },
    });
  }

  async update(id: number, dto: UpdateAssetDto): Promise<Asset> {
    const asset = await this.getRecord(id);
    this.assetRepository.merge(asset, dto);
    this.assertSingleHolder(asset);
    await this.ensureTag(asset);
    await this.auditService.saveExisting(this.assetRepository, asset);
    return this.findOne(id);
  }

  async remove(id: number): Promise<void> {
    const asset = await this.getRecord(id);
    await this.assetRepository.remove(asset);
  }

  async changeStatus(id: number, status: AssetStatus): Promise<Asset> {
    const asset = await this.getRecord(id);
    const previous = asset.status;

    asset.status = status;
    await suppressAutoLog(() => this.assetRepository.save(asset));

    await this.auditService.record({
      eventType: EventCategory.ASSET,
      action: AuditAction.STATUS_CHANGED,
      message: `Asset ${asset.assetTag} status changed to ${status}`,
      detail: asset.getStatusDisplay(),
      entity: asset,
      changes: { status: [previous, status] },
    });
    return this.findOne(id);
  }

  async assign(id: number, dto: AssignAssetDto): Promise<Asset> {
    const asset = await this.findOne(id);
    const employee = await this.dataSource.getRepository(Employee).findOneBy({ id: dto.employeeId });
    if (!employee) {
      throw new RecordNotFoundError('Employee', dto.employeeId);
    }

    await suppressAutoLog(() =>
      this.dataSource.transaction(async (manager) => {
        if (asset.assignedToId != null) {
          await this.closeOpenAssignments(manager, asset.id, asset.assignedToId);
        }
        await manager.update(Asset, { id: asset.id }, { assignedToId: employee.id, locationId: null });
        await manager.save(
          manager.create(AssetAssignment, {
            assetId: asset.id,
            employeeId: employee.id,
            locationId: null,
            assignedDate: new Date(),
            returnedDate: null,
            conditionOnAssignment: dto.conditionOnAssignment ?? null,
            conditionOnReturn: null,
            notes: dto.notes ?? null,
          }),
        );
      }),
    );

    const assignee = employee.toString();
    await this.auditService.record({
      eventType: EventCategory.ASSET,
      action: AuditAction.ASSIGNED,
      message: `Asset ${asset.assetTag} assigned to ${assignee}`,
      detail: assignee,
      entity: asset,
      changes: { assigned_to: [asset.assignedTo ? asset.assignedTo.toString() : null, assignee] },
    });
    return this.findOne(id);
  }

  /** @throws AssetNotAssignedError when nobody holds the asset */
  async unassign(id: number, dto: UnassignAssetDto = {}): Promise<Asset> {
    const asset = await this.findOne(id);
    const holder = asset.assignedTo;
    if (asset.assignedToId == null || !holder) {
      throw new AssetNotAssignedError(asset.assetTag);
    }

    await suppressAutoLog(() =>
      this.dataSource.transaction(async (manager) => {
        await this.closeOpenAssignments(manager, asset.id, holder.id, dto.conditionOnReturn);
        await manager.update(Asset, { id: asset.id }, { assignedToId: null });
      }),
    );

    const assignee = holder.toString();
    await this.auditService.record({
      eventType: EventCategory.ASSET,
      action: AuditAction.UNASSIGNED,
      message: `Asset ${asset.assetTag} unassigned from ${assignee}`,
      detail: assignee,
      entity: asset,
    });
    return this.findOne(id);
  }

  /** Copies the asset as a pending, unassigned record tagged `<tag>-COPY`. */
  async duplicate(id: number): Promise<Asset> {
    const source = await this.getRecord(id);
    const copy = this.assetRepository.create({
      companyId: source.companyId,
      assetTag: `${source.assetTag}-COPY`,
      assetModelId: source.assetModelId,
      serialNumber: '',
      attributes: source.attributes,
      purchaseDate: source.purchaseDate,
      purchaseCost: source.purchaseCost,
      warrantyExpiryDate: source.warrantyExpiryDate,
      status: AssetStatus.PENDING,
      locationId: source.locationId,
      assignedToId: null,
      requisitionId: source.requisitionId,
      invoiceId: source.invoiceId,
      notes: source.notes,
    });
    const saved = await suppressAutoLog(() => this.assetRepository.save(copy));

    await this.auditService.record({
      eventType: EventCategory.ASSET,
      action: AuditAction.DUPLICATED,
      message: `Asset ${saved.assetTag} duplicated from ${source.assetTag}`,
      detail: ASSET_STATUS_LABELS[saved.status],
      entity: saved,
    });
    return this.findOne(saved.id);
  }

  /**
   * Moves the asset to another location, or clears it when `locationId` is
   * null. An asset held by an employee is unassigned before it moves.
   */
  async transfer(id: number, dto: TransferAssetDto): Promise<Asset> {
    const asset = await this.findOne(id);

    let target: Location | null = null;
    if (dto.locationId !== null) {
      target = await this.dataSource.getRepository(Location).findOneBy({ id: dto.locationId });
      if (!target) {
        throw new RecordNotFoundError('Location', dto.locationId);
      }
    }

    const previousName = asset.location?.name ?? 'none';
    const targetName = target?.name ?? 'none';
    const holder = target && asset.assignedTo ? asset.assignedTo : null;

    await suppressAutoLog(() =>
      this.dataSource.transaction(async (manager) => {
        if (holder) {
          await this.closeOpenAssignments(manager, asset.id, holder.id);
        }
        await manager.update(
          Asset,
          { id: asset.id },
          holder ? { locationId: target?.id ?? null, assignedToId: null } : { locationId: target?.id ?? null },
        );
      }),
    );

    const detail = [`${previousName} -> ${targetName}`];
    if (holder) {
      detail.push(`unassigned from ${holder.toString()}`);
    }
    await this.auditService.record({
      eventType: EventCategory.ASSET,
      action: AuditAction.TRANSFERRED,
      message: `Asset ${asset.assetTag} transferred to ${targetName}`,
      detail: detail.join('; '),
      entity: asset,
      changes: { location: [previousName, targetName] },
    });
    return this.findOne(id);
  }

  /** Unassigns every selected asset that has a holder; others are skipped. */
  async bulkUnassign(ids: number[]): Promise<BulkResult> {
    const assets = await this.assetRepository.find({ where: { id: In(ids), assignedToId: Not(IsNull()) } });

    await suppressAutoLog(() =>
      this.dataSource.transaction(async (manager) => {
        for (const asset of assets) {
          if (asset.assignedToId != null) {
            await this.closeOpenAssignments(manager, asset.id, asset.assignedToId);
          }
          await manager.update(Asset, { id: asset.id }, { assignedToId: null });
        }
      }),
    );

    const count = assets.length;
    if (count > 0) {
      await this.auditService.record({
        eventType: EventCategory.ASSET,
        action: AuditAction.UNASSIGNED,
        message: `${count} asset(s) bulk unassigned`,
      });
    }
    return { count };
  }

  async bulkDelete(ids: number[]): Promise<BulkResult> {
    const assets = await this.assetRepository.findBy({ id: In(ids) });
    const count = assets.length;
    if (count === 0) {
      return { count };
    }

    await suppressAutoLog(() => this.dataSource.transaction((manager) => manager.remove(assets)));

    await this.auditService.record({
      eventType: EventCategory.ASSET,
      action: AuditAction.BULK_DELETED,
      message: `${count} asset(s) bulk deleted`,
      detail: assets.map((asset) => asset.assetTag).join(', '),
    });
    return { count };
  }

  async bulkStatus(ids: number[], status: AssetStatus): Promise<BulkResult> {
    const assets = await this.assetRepository.find({ select: { id: true }, where: { id: In(ids) } });
    const count = assets.length;
    if (count === 0) {
      return { count };
    }

    await suppressAutoLog(() =>
      this.assetRepository.update({ id: In(assets.map((asset) => asset.id)) }, { status }),
    );

    await this.auditService.record({
      eventType: EventCategory.ASSET,
      action: AuditAction.BULK_STATUS,
      message: `${count} asset(s) bulk status changed to ${status}`,
      detail: status,
    });
    return { count };
  }

  /** Employee's location when assigned, otherwise the asset's own. */
  resolveLocation(asset: Asset): Location | null {
    return asset.assignedTo?.location ?? asset.location ?? null;
  }

  private assertSingleHolder(asset: Asset): void {
    if (asset.assignedToId != null && asset.locationId != null) {
      throw new AssetAssignmentConflictError();
    }
  }

  /** Generates a tag for blank ones from the asset's company and holder's department. */
  private async ensureTag(asset: Asset): Promise<void> {
    if (asset.assetTag && asset.assetTag.trim()) {
      asset.assetTag = asset.assetTag.trim();
      return;
    }

    asset.company =
      asset.companyId != null ? await this.dataSource.getRepository(Company).findOneBy({ id: asset.companyId }) : null;
    asset.assignedTo =
      asset.assignedToId != null
        ? await this.dataSource
            .getRepository(Employee)
            .findOne({ where: { id: asset.assignedToId }, relations: { department: true } })
        : null;

    asset.assetTag = await this.tagService.generateAssetTag(this.assetTags, assetTagContext(asset));
    this.logger.debug(`Generated asset tag ${asset.assetTag}`);
  }

  private async closeOpenAssignments(
    manager: EntityManager,
    assetId: number,
    employeeId: number,
    conditionOnReturn?: string,
  ): Promise<void> {
    await manager.update(
      AssetAssignment,
      { assetId, employeeId, returnedDate: IsNull() },
      conditionOnReturn ? { returnedDate: new Date(), conditionOnReturn } : { returnedDate: new Date() },
    );
  }

  private async getRecord(id: number): Promise<Asset> {
    const asset = await this.assetRepository.findOneBy({ id });
    if (!asset) {
      throw new RecordNotFoundError('Asset', id);
    }
    return asset;
  }
}
