import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { CompaniesController, DepartmentsController, EmployeesController, LocationsController } from './controllers';
import { Company } from './entities/company.entity';
import { Department } from './entities/department.entity';
import { Employee } from './entities/employee.entity';
import { Location } from './entities/location.entity';
import { CompaniesService, DepartmentsService, EmployeesService, LocationsService } from './services';

@Module({
  imports: [TypeOrmModule.forFeature([Company, Location, Department, Employee])],
  controllers: [CompaniesController, LocationsController, DepartmentsController, EmployeesController],
  providers: [CompaniesService, LocationsService, DepartmentsService, EmployeesService],
  exports: [CompaniesService, LocationsService, DepartmentsService, EmployeesService],
})
export class OrganizationModule {}
