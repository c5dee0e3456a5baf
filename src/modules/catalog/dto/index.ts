export * from './asset-model.dto';
export * from './category.dto';
export * from './component-type.dto';
