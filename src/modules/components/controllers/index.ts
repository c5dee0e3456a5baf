export * from './components.controller';
export * from './spare-parts.controller';
