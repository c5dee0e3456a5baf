import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ComponentsController, SparePartsController } from './controllers';
import { ComponentHistory } from './entities/component-history.entity';
import { Component } from './entities/component.entity';
import { SparePartsInventory } from './entities/spare-parts-inventory.entity';
import { ComponentRepository } from './repositories/component.repository';
import { ComponentsService, SparePartsService } from './services';
import { SparePartsSyncSubscriber } from './subscribers/spare-parts-sync.subscriber';

@Module({
  imports: [TypeOrmModule.forFeature([Component, ComponentHistory, SparePartsInventory])],
  controllers: [ComponentsController, SparePartsController],
  providers: [ComponentsService, SparePartsService, ComponentRepository, SparePartsSyncSubscriber],
  exports: [ComponentsService, SparePartsService],
})
export class ComponentsModule {}
