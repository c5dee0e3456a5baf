export * from './domain.exceptions';
