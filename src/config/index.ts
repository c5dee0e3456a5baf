export { default as appConfig } from './app.config';
export { default as databaseConfig } from './database.config';
export { validate } from './env-validation';
export { default as taggingConfig } from './tagging.config';
