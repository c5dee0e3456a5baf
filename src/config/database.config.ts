import { registerAs } from '@nestjs/config';

export type DatabaseDriver = 'postgres' | 'better-sqlite3';

export interface DatabaseConfig {
  type: DatabaseDriver;
  host: string;
  port: number;
  username: string;
  password: string;
  database: string;
  synchronize: boolean;
  logging: boolean;
}

// better-sqlite3 is only used by the test suites, with DB_DATABASE=:memory:
export default registerAs(
  'database',
  (): DatabaseConfig => ({
    type: process.env.DB_TYPE === 'better-sqlite3' ? 'better-sqlite3' : 'postgres',
    host: process.env.DB_HOST || 'localhost',
    port: parseInt(process.env.DB_PORT || '5432', 10),
    username: process.env.DB_USERNAME || 'asset_registry',
    password: process.env.DB_PASSWORD || 'asset_registry',
    database: process.env.DB_DATABASE || 'asset_registry',
    synchronize: process.env.DB_SYNCHRONIZE === 'true',
    logging: process.env.DB_LOGGING === 'true',
  }),
);
