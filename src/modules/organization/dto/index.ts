export * from './company.dto';
export * from './department.dto';
export * from './employee.dto';
export * from './location.dto';
