import { MiddlewareConsumer, Module, NestModule } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule, TypeOrmModuleOptions } from '@nestjs/typeorm';

// Config
import { appConfig, databaseConfig, taggingConfig, validate } from './config';
import { DatabaseConfig } from './config/database.config';

// Common
import { LoggerModule } from './common/logger/logger.module';
import { RequestContextMiddleware } from './common/middleware/request-context.middleware';
import { TableModule } from './common/table/table.module';

// Modules
import { AssetsModule } from './modules/assets/assets.module';
import { AuditModule } from './modules/audit/audit.module';
import { CatalogModule } from './modules/catalog/catalog.module';
import { ComponentsModule } from './modules/components/components.module';
import { DashboardModule } from './modules/dashboard/dashboard.module';
import { OrganizationModule } from './modules/organization/organization.module';
import { ProcurementModule } from './modules/procurement/procurement.module';
import { TaggingModule } from './modules/tagging/tagging.module';
import { UsersModule } from './modules/users/users.module';

export function typeOrmOptions(configService: ConfigService): TypeOrmModuleOptions {
  const db = configService.getOrThrow<DatabaseConfig>('database');
  const common = {
    autoLoadEntities: true,
    synchronize: db.synchronize,
    logging: db.logging,
  };

  if (db.type === 'better-sqlite3') {
    return { type: 'better-sqlite3', database: db.database, ...common };
  }
  return {
    type: 'postgres',
    host: db.host,
    port: db.port,
    username: db.username,
    password: db.password,
    database: db.database,
    ...common,
  };
}

@Module({
  imports: [
    // Configuration
    ConfigModule.forRoot({
      isGlobal: true,
      load: [appConfig, databaseConfig, taggingConfig],
      validate,
    }),

    // Structured Logging with Winston
    LoggerModule,

    // Column preferences for list tables
    TableModule,

    // Database
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: typeOrmOptions,
    }),

    // Feature Modules
    TaggingModule,
    AuditModule,
    UsersModule,
    OrganizationModule,
    CatalogModule,
    AssetsModule,
    ComponentsModule,
    ProcurementModule,
    DashboardModule,
  ],
})
export class AppModule implements NestModule {
  configure(consumer: MiddlewareConsumer) {
    consumer.apply(RequestContextMiddleware).forRoutes('*');
  }
}
