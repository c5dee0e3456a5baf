import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AssetsController } from './controllers/assets.controller';
import { MaintenanceController } from './controllers/maintenance.controller';
import { AssetAssignment } from './entities/asset-assignment.entity';
import { Asset } from './entities/asset.entity';
import { MaintenanceRecord } from './entities/maintenance-record.entity';
import { AssetRepository } from './repositories/asset.repository';
import { AssetsService } from './services/assets.service';
import { MaintenanceService } from './services/maintenance.service';

@Module({
  imports: [TypeOrmModule.forFeature([Asset, AssetAssignment, MaintenanceRecord])],
  controllers: [AssetsController, MaintenanceController],
  providers: [AssetsService, MaintenanceService, AssetRepository],
  exports: [AssetsService, MaintenanceService, AssetRepository],
})
export class AssetsModule {}
