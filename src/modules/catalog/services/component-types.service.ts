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
import { CreateComponentTypeDto, UpdateComponentTypeDto } from '../dto';
import { ComponentType } from '../entities/component-type.entity';

@Injectable()
export class ComponentTypesService {
  constructor(
    @InjectRepository(ComponentType)
    private readonly componentTypeRepository: Repository<ComponentType>,
    private readonly auditService: AuditService,
    private readonly tablePreferences: TablePreferencesService,
  ) {}

  create(dto: CreateComponentTypeDto): Promise<ComponentType> {
    return this.componentTypeRepository.save(this.componentTypeRepository.create(dto));
  }

  findAll(request: TableRequest): Promise<TableContext<ComponentType>> {
    const columns = [
      new TableColumn<ComponentType>('type_name', 'Type', 'typeName', {
        linkPattern: urlPattern('component-types.detail', { id: 'id' }),
      }),
      new TableColumn<ComponentType>('attributes', 'Attributes', (type) => Object.keys(type.attributes ?? {}).join(', '), {
        sortable: false,
      }),
    ];

    return new ReusableTable<ComponentType>(
      request,
      this.componentTypeRepository.createQueryBuilder('componentType'),
      columns,
      {
        tableId: 'component-types',
        defaultSort: 'typeName',
        searchFields: ['typeName'],
        showBulkSelect: false,
        preferences: this.tablePreferences,
      },
    ).getContext();
  }

  async findOne(id: number): Promise<ComponentType> {
    const type = await this.componentTypeRepository.findOneBy({ id });
    if (!type) {
      throw new RecordNotFoundError('Component type', id);
    }
    return type;
  }

  async update(id: number, dto: UpdateComponentTypeDto): Promise<ComponentType> {
    const type = await this.findOne(id);
    this.componentTypeRepository.merge(type, dto);
    return this.auditService.saveExisting(this.componentTypeRepository, type);
  }

  async remove(id: number): Promise<void> {
    await this.componentTypeRepository.remove(await this.findOne(id));
  }
}
