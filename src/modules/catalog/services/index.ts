export * from './asset-models.service';
export * from './categories.service';
export * from './component-types.service';
