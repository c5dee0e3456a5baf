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
import { CreateDepartmentDto, UpdateDepartmentDto } from '../dto';
import { Department } from '../entities/department.entity';
import { CompaniesService } from './companies.service';

@Injectable()
export class DepartmentsService {
  constructor(
    @InjectRepository(Department)
    private readonly departmentRepository: Repository<Department>,
    private readonly companiesService: CompaniesService,
    private readonly auditService: AuditService,
    private readonly tablePreferences: TablePreferencesService,
  ) {}

  async create(dto: CreateDepartmentDto): Promise<Department> {
    await this.companiesService.findOne(dto.companyId);
    const saved = await this.departmentRepository.save(this.departmentRepository.create(dto));
    return this.findOne(saved.id);
  }

  findAll(request: TableRequest): Promise<TableContext<Department>> {
    const qb = this.departmentRepository
      .createQueryBuilder('department')
      .leftJoinAndSelect('department.company', 'company')
      .leftJoinAndSelect('department.defaultLocation', 'defaultLocation');

    const columns = [
      new TableColumn<Department>('name', 'Name', 'name', {
        linkPattern: urlPattern('departments.detail', { id: 'id' }),
      }),
      new TableColumn<Department>('company', 'Company', 'company.name', {
        linkPattern: urlPattern('companies.detail', { id: 'companyId' }),
      }),
      new TableColumn<Department>('default_location', 'Default location', 'defaultLocation.name', {
        linkPattern: urlPattern('locations.detail', { id: 'defaultLocationId' }),
      }),
    ];

    return new ReusableTable<Department>(request, qb, columns, {
      tableId: 'departments',
      defaultSort: 'name',
      searchFields: ['name', 'company.name'],
      filterFields: { company: 'companyId' },
      preferences: this.tablePreferences,
    }).getContext();
  }

  async findOne(id: number): Promise<Department> {
    const department = await this.departmentRepository.findOne({
      where: { id },
      relations: { company: true, defaultLocation: true },
    });
    if (!department) {
      throw new RecordNotFoundError('Department', id);
    }
    return department;
  }

  async update(id: number, dto: UpdateDepartmentDto): Promise<Department> {
    const department = await this.getRecord(id);
    if (dto.companyId !== undefined) {
      await this.companiesService.findOne(dto.companyId);
    }
    this.departmentRepository.merge(department, dto);
    await this.auditService.saveExisting(this.departmentRepository, department);
    return this.findOne(id);
  }

  async remove(id: number): Promise<void> {
    const department = await this.getRecord(id);
    await this.departmentRepository.remove(department);
  }

  /** Row without relations, so changed foreign keys are what gets saved. */
  private async getRecord(id: number): Promise<Department> {
    const department = await this.departmentRepository.findOneBy({ id });
    if (!department) {
      throw new RecordNotFoundError('Department', id);
    }
    return department;
  }
}
