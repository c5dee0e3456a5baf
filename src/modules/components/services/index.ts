export * from './components.service';
export * from './spare-parts.service';
