export * from './companies.controller';
export * from './departments.controller';
export * from './employees.controller';
export * from './locations.controller';
