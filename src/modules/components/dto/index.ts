export * from './component.dto';
export * from './spare-part.dto';
