export * from './invoice-line-items.controller';
export * from './invoices.controller';
export * from './requisitions.controller';
export * from './vendors.controller';
