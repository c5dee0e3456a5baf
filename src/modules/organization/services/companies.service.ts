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
import { CreateCompanyDto, UpdateCompanyDto } from '../dto';
import { Company } from '../entities/company.entity';

@Injectable()
export class CompaniesService {
  constructor(
    @InjectRepository(Company)
    private readonly companyRepository: Repository<Company>,
    private readonly auditService: AuditService,
    private readonly tablePreferences: TablePreferencesService,
  ) {}

  create(dto: CreateCompanyDto): Promise<Company> {
    return this.companyRepository.save(this.companyRepository.create(dto));
  }

  findAll(request: TableRequest): Promise<TableContext<Company>> {
    const qb = this.companyRepository.createQueryBuilder('company');
    const columns = [
      new TableColumn<Company>('name', 'Name', 'name', { linkPattern: urlPattern('companies.detail', { id: 'id' }) }),
      new TableColumn<Company>('code', 'Code', 'code'),
      new TableColumn<Company>('city', 'City', 'city'),
      new TableColumn<Company>('country', 'Country', 'country'),
      new TableColumn<Company>('phone', 'Phone', 'phone', { sortable: false, defaultVisible: false }),
      new TableColumn<Company>('is_active', 'Active', 'isActive', { badge: true }),
    ];

    return new ReusableTable<Company>(request, qb, columns, {
      tableId: 'companies',
      defaultSort: 'name',
      searchFields: ['name', 'code', 'city', 'country'],
      preferences: this.tablePreferences,
    }).getContext();
  }

  async findOne(id: number): Promise<Company> {
    const company = await this.companyRepository.findOneBy({ id });
    if (!company) {
      throw new RecordNotFoundError('Company', id);
    }
    return company;
  }

  async update(id: number, dto: UpdateCompanyDto): Promise<Company> {
    const company = await this.findOne(id);
    this.companyRepository.merge(company, dto);
    return this.auditService.saveExisting(this.companyRepository, company);
  }

  async remove(id: number): Promise<void> {
    const company = await this.findOne(id);
    await this.companyRepository.remove(company);
  }
}
