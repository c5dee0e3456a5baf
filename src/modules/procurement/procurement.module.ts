import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AssetsModule } from '../assets/assets.module';
import { ComponentsModule } from '../components/components.module';
import { OrganizationModule } from '../organization/organization.module';
import {
  InvoiceLineItemsController,
  InvoicesController,
  RequisitionsController,
  VendorsController,
} from './controllers';
import { InvoiceLineItem } from './entities/invoice-line-item.entity';
import { PurchaseInvoice } from './entities/purchase-invoice.entity';
import { RequisitionItem } from './entities/requisition-item.entity';
import { Requisition } from './entities/requisition.entity';
import { Vendor } from './entities/vendor.entity';
import { InvoiceLineItemsService, InvoicesService, RequisitionsService, VendorsService } from './services';

@Module({
  imports: [
    TypeOrmModule.forFeature([Vendor, PurchaseInvoice, InvoiceLineItem, Requisition, RequisitionItem]),
    OrganizationModule,
    AssetsModule,
    ComponentsModule,
  ],
  controllers: [VendorsController, InvoicesController, InvoiceLineItemsController, RequisitionsController],
  providers: [VendorsService, InvoicesService, InvoiceLineItemsService, RequisitionsService],
  exports: [VendorsService, InvoicesService, InvoiceLineItemsService, RequisitionsService],
})
export class ProcurementModule {}
