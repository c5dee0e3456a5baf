export * from './asset-models.controller';
export * from './categories.controller';
export * from './component-types.controller';
