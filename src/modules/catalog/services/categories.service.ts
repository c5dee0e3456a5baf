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
import { CreateCategoryDto, UpdateCategoryDto } from '../dto';
import { Category } from '../entities/category.entity';

@Injectable()
export class CategoriesService {
  constructor(
    @InjectRepository(Category)
    private readonly categoryRepository: Repository<Category>,
    private readonly auditService: AuditService,
    private readonly tablePreferences: TablePreferencesService,
  ) {}

  create(dto: CreateCategoryDto): Promise<Category> {
    return this.categoryRepository.save(this.categoryRepository.create(dto));
  }

  findAll(request: TableRequest): Promise<TableContext<Category>> {
    const columns = [
      new TableColumn<Category>('name', 'Name', 'name', { linkPattern: urlPattern('categories.detail', { id: 'id' }) }),
      new TableColumn<Category>('description', 'Description', 'description', { sortable: false }),
    ];

    return new ReusableTable<Category>(request, this.categoryRepository.createQueryBuilder('category'), columns, {
      tableId: 'categories',
      defaultSort: 'name',
      searchFields: ['name', 'description'],
      showBulkSelect: false,
      preferences: this.tablePreferences,
    }).getContext();
  }

  async findOne(id: number): Promise<Category> {
    const category = await this.categoryRepository.findOneBy({ id });
    if (!category) {
      throw new RecordNotFoundError('Category', id);
    }
    return category;
  }

  async update(id: number, dto: UpdateCategoryDto): Promise<Category> {
    const category = await this.findOne(id);
    this.categoryRepository.merge(category, dto);
    return this.auditService.saveExisting(this.categoryRepository, category);
  }

  async remove(id: number): Promise<void> {
    await this.categoryRepository.remove(await this.findOne(id));
  }
}
