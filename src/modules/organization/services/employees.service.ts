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
import { CreateEmployeeDto, UpdateEmployeeDto } from '../dto';
import { Employee } from '../entities/employee.entity';
import { DepartmentsService } from './departments.service';

@Injectable()
export class EmployeesService {
  constructor(
    @InjectRepository(Employee)
    private readonly employeeRepository: Repository<Employee>,
    private readonly departmentsService: DepartmentsService,
    private readonly auditService: AuditService,
    private readonly tablePreferences: TablePreferencesService,
  ) {}

  async create(dto: CreateEmployeeDto): Promise<Employee> {
    const employee = this.employeeRepository.create(dto);
    await this.applyDepartmentDefaults(employee);
    const saved = await this.employeeRepository.save(employee);
    return this.findOne(saved.id);
  }

  findAll(request: TableRequest): Promise<TableContext<Employee>> {
    const qb = this.employeeRepository
      .createQueryBuilder('employee')
      .leftJoinAndSelect('employee.company', 'company')
      .leftJoinAndSelect('employee.department', 'department')
      .leftJoinAndSelect('employee.location', 'location');

    const columns = [
      new TableColumn<Employee>('name', 'Name', 'name', { linkPattern: urlPattern('employees.detail', { id: 'id' }) }),
      new TableColumn<Employee>('employee_id', 'Employee ID', 'employeeId'),
      new TableColumn<Employee>('email', 'Email', 'email', { defaultVisible: false }),
      new TableColumn<Employee>('company', 'Company', 'company.name'),
      new TableColumn<Employee>('department', 'Department', 'department.name'),
      new TableColumn<Employee>('location', 'Location', 'location.name', { defaultVisible: false }),
      new TableColumn<Employee>('position', 'Position', 'position'),
      new TableColumn<Employee>('status', 'Status', (employee) => employee.getStatusDisplay(), {
        sortField: 'status',
        badge: true,
        badgeMap: { Active: 'badge-success', Inactive: 'badge-muted' },
      }),
    ];

    return new ReusableTable<Employee>(request, qb, columns, {
      tableId: 'employees',
      defaultSort: 'name',
      searchFields: ['name', 'employeeId', 'email', 'position', 'department.name'],
      filterFields: { status: 'status', company: 'companyId', department: 'departmentId' },
      preferences: this.tablePreferences,
    }).getContext();
  }

  async findOne(id: number): Promise<Employee> {
    const employee = await this.employeeRepository.findOne({
      where: { id },
      relations: { company: true, department: true, location: true },
    });
    if (!employee) {
      throw new RecordNotFoundError('Employee', id);
    }
    return employee;
  }

  async update(id: number, dto: UpdateEmployeeDto): Promise<Employee> {
    const employee = await this.getRecord(id);
    this.employeeRepository.merge(employee, dto);
    await this.applyDepartmentDefaults(employee);
    await this.auditService.saveExisting(this.employeeRepository, employee);
    return this.findOne(id);
  }

  async remove(id: number): Promise<void> {
    const employee = await this.getRecord(id);
    await this.employeeRepository.remove(employee);
  }

  /** Company and location left empty are taken from the department. */
  private async applyDepartmentDefaults(employee: Employee): Promise<void> {
    if (employee.departmentId == null) {
      return;
    }
    const department = await this.departmentsService.findOne(employee.departmentId);
    if (employee.companyId == null) {
      employee.companyId = department.companyId;
    }
    if (employee.locationId == null) {
      employee.locationId = department.defaultLocationId;
    }
  }

  private async getRecord(id: number): Promise<Employee> {
    const employee = await this.employeeRepository.findOneBy({ id });
    if (!employee) {
      throw new RecordNotFoundError('Employee', id);
    }
    return employee;
  }
}
