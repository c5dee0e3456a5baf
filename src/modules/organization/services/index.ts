export * from './companies.service';
export * from './departments.service';
export * from './employees.service';
export * from './locations.service';
