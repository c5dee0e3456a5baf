import { Injectable } from '@nestjs/common';
import { InjectDataSource, InjectRepository } from '@nestjs/typeorm';
import { DataSource, In, Repository } from 'typeorm';
import { RecordNotFoundError } from '../../../common/exceptions';
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
import { BulkResult } from '../dto/asset.dto';
import { CreateMaintenanceRecordDto, UpdateMaintenanceRecordDto } from '../dto/maintenance.dto';
import { Asset } from '../entities/asset.entity';
import { MaintenanceRecord } from '../entities/maintenance-record.entity';
import { MAINTENANCE_TYPE_BADGES } from '../enums/maintenance-type.enum';

@Injectable()
export class MaintenanceService {
  constructor(
    @InjectRepository(MaintenanceRecord)
    private readonly maintenanceRepository: Repository<MaintenanceRecord>,
    @InjectDataSource()
    private readonly dataSource: DataSource,
    private readonly auditService: AuditService,
    private readonly tablePreferences: TablePreferencesService,
  ) {}

  async create(dto: CreateMaintenanceRecordDto): Promise<MaintenanceRecord> {
    const asset = await this.getAsset(dto.assetId);
    const record = this.maintenanceRepository.create(dto);
    // Labels the automatic entry with the tag instead of the id
    record.asset = asset;
    const saved = await this.maintenanceRepository.save(record);
    return this.findOne(saved.id);
  }

  findAll(request: TableRequest): Promise<TableContext<MaintenanceRecord>> {
    const qb = this.maintenanceRepository.createQueryBuilder('record').leftJoinAndSelect('record.asset', 'asset');

    const columns = [
      new TableColumn<MaintenanceRecord>('asset', 'Asset', 'asset.assetTag', {
        sortField: 'asset.assetTag',
        linkPattern: urlPattern('maintenance.detail', { id: 'id' }),
      }),
      new TableColumn<MaintenanceRecord>('maintenance_type', 'Type', 'maintenanceType', {
        badge: true,
        badgeMap: MAINTENANCE_TYPE_BADGES,
      }),
      new TableColumn<MaintenanceRecord>('performed_by', 'Performed By', 'performedBy'),
      new TableColumn<MaintenanceRecord>('maintenance_date', 'Date', 'maintenanceDate'),
      new TableColumn<MaintenanceRecord>('cost', 'Cost', 'cost', { align: 'right' }),
      new TableColumn<MaintenanceRecord>('next_maintenance_date', 'Next Date', 'nextMaintenanceDate', {
        defaultVisible: false,
      }),
    ];

    const bulkActions = [
      new BulkAction('delete', 'Delete', reverse('maintenance.bulk-delete'), {
        confirmation: 'Delete selected maintenance records? This cannot be undone.',
        variant: 'danger',
      }),
    ];

    return new ReusableTable<MaintenanceRecord>(request, qb, columns, {
      tableId: 'maintenance',
      defaultSort: '-maintenanceDate',
      searchFields: ['asset.assetTag', 'performedBy', 'description', 'maintenanceType'],
      filterFields: { type: 'maintenanceType', asset: 'assetId' },
      bulkActions,
      preferences: this.tablePreferences,
    }).getContext();
  }

  async findOne(id: number): Promise<MaintenanceRecord> {
    const record = await this.maintenanceRepository.findOne({ where: { id }, relations: { asset: true } });
    if (!record) {
      throw new RecordNotFoundError('Maintenance record', id);
    }
    return record;
  }

  async update(id: number, dto: UpdateMaintenanceRecordDto): Promise<MaintenanceRecord> {
    const record = await this.findOne(id);
    if (dto.assetId !== undefined && dto.assetId !== record.assetId) {
      record.asset = await this.getAsset(dto.assetId);
    }
    this.maintenanceRepository.merge(record, dto);
    await this.auditService.saveExisting(this.maintenanceRepository, record);
    return this.findOne(id);
  }

  async remove(id: number): Promise<void> {
    await this.maintenanceRepository.remove(await this.findOne(id));
  }

  async bulkDelete(ids: number[]): Promise<BulkResult> {
    const records = await this.maintenanceRepository.find({ where: { id: In(ids) }, relations: { asset: true } });
    const count = records.length;
    if (count === 0) {
      return { count };
    }

    await suppressAutoLog(() => this.dataSource.transaction((manager) => manager.remove(records)));

    await this.auditService.record({
      eventType: EventCategory.MAINTENANCE,
      action: AuditAction.BULK_DELETED,
      message: `${count} maintenance record(s) bulk deleted`,
      detail: records.map((record) => record.toString()).join(', '),
    });
    return { count };
  }

  private async getAsset(id: number): Promise<Asset> {
    const asset = await this.dataSource.getRepository(Asset).findOneBy({ id });
    if (!asset) {
      throw new RecordNotFoundError('Asset', id);
    }
    return asset;
  }
}
