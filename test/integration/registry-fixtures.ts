import { TestingModule } from '@nestjs/testing';
import { AssetModelsService } from '../../src/modules/catalog/services/asset-models.service';
import { CategoriesService } from '../../src/modules/catalog/services/categories.service';
import { ComponentTypesService } from '../../src/modules/catalog/services/component-types.service';
import { CompaniesService } from '../../src/modules/organization/services/companies.service';
import { DepartmentsService } from '../../src/modules/organization/services/departments.service';
import { EmployeesService } from '../../src/modules/organization/services/employees.service';

export interface RegistryFixtures {
  companyId: number;
  departmentId: number;
  employeeId: number;
  assetModelId: number;
  componentTypeId: number;
}

/** Acme (code AC) with an Engineering department, one engineer, a laptop model and a RAM type. */
export async function seedRegistry(module: TestingModule): Promise<RegistryFixtures> {
  const company = await module.get(CompaniesService).create({ name: 'Acme', code: 'AC' });
  const department = await module.get(DepartmentsService).create({ companyId: company.id, name: 'Engineering' });
  const employee = await module.get(EmployeesService).create({
    name: 'Jane Doe',
    employeeId: 'E-1001',
    companyId: company.id,
    departmentId: department.id,
  });
  const category = await module.get(CategoriesService).create({ name: 'Laptops' });
  const assetModel = await module.get(AssetModelsService).create({
    categoryId: category.id,
    manufacturer: 'Dell',
    modelName: 'Latitude 7440',
  });
  const componentType = await module.get(ComponentTypesService).create({ typeName: 'RAM' });

  return {
    companyId: company.id,
    departmentId: department.id,
    employeeId: employee.id,
    assetModelId: assetModel.id,
    componentTypeId: componentType.id,
  };
}
