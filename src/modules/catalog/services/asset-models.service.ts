import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { RecordNotFoundError } from '../../../common/exceptions';
import {
  ReusableTable,
  TableColumn,
  TableContext,
  TablePreferencesService,
  TableRequest,
  urlPattern,
} from '../../../common/table';
import { AuditService } from '../../audit/audit.service';
import { CreateAssetModelDto, UpdateAssetModelDto } from '../dto';
import { AssetModel } from '../entities/asset-model.entity';
import { CategoriesService } from './categories.service';

@Injectable()
export class AssetModelsService {
  constructor(
    @InjectRepository(AssetModel)
    private readonly assetModelRepository: Repository<AssetModel>,
    private readonly categoriesService: CategoriesService,
    private readonly auditService: AuditService,
    private readonly tablePreferences: TablePreferencesService,
  ) {}

  async create(dto: CreateAssetModelDto): Promise<AssetModel> {
    await this.categoriesService.findOne(dto.categoryId);
    const saved = await this.assetModelRepository.save(this.assetModelRepository.create(dto));
    return this.findOne(saved.id);
  }

  findAll(request: TableRequest): Promise<TableContext<AssetModel>> {
    const qb = this.assetModelRepository
      .createQueryBuilder('assetModel')
      .leftJoinAndSelect('assetModel.category', 'category');

    const columns = [
      new TableColumn<AssetModel>('model', 'Model', (model) => model.toString(), {
        sortField: 'modelName',
        linkPattern: urlPattern('asset-models.detail', { id: 'id' }),
      }),
      new TableColumn<AssetModel>('manufacturer', 'Manufacturer', 'manufacturer'),
      new TableColumn<AssetModel>('model_number', 'Model number', 'modelNumber'),
      new TableColumn<AssetModel>('category', 'Category', 'category.name', {
        linkPattern: urlPattern('categories.detail', { id: 'categoryId' }),
      }),
    ];

    return new ReusableTable<AssetModel>(request, qb, columns, {
      tableId: 'asset-models',
      defaultSort: 'manufacturer',
      searchFields: ['manufacturer', 'modelName', 'modelNumber', 'category.name'],
      filterFields: { category: 'categoryId' },
      preferences: this.tablePreferences,
    }).getContext();
  }

  async findOne(id: number): Promise<AssetModel> {
    const model = await this.assetModelRepository.findOne({ where: { id }, relations: { category: true } });
    if (!model) {
      throw new RecordNotFoundError('Asset model', id);
    }
    return model;
  }

  async update(id: number, dto: UpdateAssetModelDto): Promise<AssetModel> {
    const model = await this.getRecord(id);
    if (dto.categoryId !== undefined) {
      await this.categoriesService.findOne(dto.categoryId);
    }
    this.assetModelRepository.merge(model, dto);
    await this.auditService.saveExisting(this.assetModelRepository, model);
    return this.findOne(id);
  }

  async remove(id: number): Promise<void> {
    await this.assetModelRepository.remove(await this.getRecord(id));
  }

  private async getRecord(id: number): Promise<AssetModel> {
    const model = await this.assetModelRepository.findOneBy({ id });
    if (!model) {
      throw new RecordNotFoundError('Asset model', id);
    }
    return model;
  }
}
