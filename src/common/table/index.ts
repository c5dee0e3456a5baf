export * from './reusable-table';
export * from './table-column';
export * from './table-preferences.service';
export * from './table-request';
export * from './table.module';
