export * from './invoice-line-items.service';
export * from './invoices.service';
export * from './requisitions.service';
export * from './vendors.service';
