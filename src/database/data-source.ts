import 'dotenv/config';
import 'reflect-metadata';
import { DataSource, DataSourceOptions } from 'typeorm';
import { REGISTRY_ENTITIES } from './entities';

// Used by the TypeORM CLI for migrations; the app builds its own connection
export const dataSourceOptions: DataSourceOptions = {
  type: 'postgres',
  host: process.env.DB_HOST || 'localhost',
  port: parseInt(process.env.DB_PORT || '5432', 10),
  username: process.env.DB_USERNAME || 'asset_registry',
  password: process.env.DB_PASSWORD || 'asset_registry',
  database: process.env.DB_DATABASE || 'asset_registry',
  entities: REGISTRY_ENTITIES,
  migrations: ['src/database/migrations/*.ts'],
  logging: process.env.DB_LOGGING === 'true',
};

const dataSource = new DataSource(dataSourceOptions);

export default dataSource;
