import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Asset } from '../assets/entities/asset.entity';
import { ComponentsModule } from '../components/components.module';
import { Component } from '../components/entities/component.entity';
import { Employee } from '../organization/entities/employee.entity';
import { PurchaseInvoice } from '../procurement/entities/purchase-invoice.entity';
import { Requisition } from '../procurement/entities/requisition.entity';
import { DashboardController } from './dashboard.controller';
import { DashboardService } from './dashboard.service';

@Module({
  imports: [TypeOrmModule.forFeature([Asset, Component, Employee, PurchaseInvoice, Requisition]), ComponentsModule],
  controllers: [DashboardController],
  providers: [DashboardService],
})
export class DashboardModule {}
