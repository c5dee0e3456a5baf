export * from './invoice.dto';
export * from './line-item.dto';
export * from './requisition-item.dto';
export * from './requisition.dto';
export * from './vendor.dto';
