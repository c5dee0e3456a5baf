import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AssetModelsController, CategoriesController, ComponentTypesController } from './controllers';
import { AssetModel } from './entities/asset-model.entity';
import { Category } from './entities/category.entity';
import { ComponentType } from './entities/component-type.entity';
import { AssetModelsService, CategoriesService, ComponentTypesService } from './services';

@Module({
  imports: [TypeOrmModule.forFeature([Category, AssetModel, ComponentType])],
  controllers: [CategoriesController, AssetModelsController, ComponentTypesController],
  providers: [CategoriesService, AssetModelsService, ComponentTypesService],
  exports: [CategoriesService, AssetModelsService, ComponentTypesService],
})
export class CatalogModule {}
