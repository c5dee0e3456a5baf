import { AssetAssignment } from '../modules/assets/entities/asset-assignment.entity';
import { Asset } from '../modules/assets/entities/asset.entity';
import { MaintenanceRecord } from '../modules/assets/entities/maintenance-record.entity';
import { AuditEntry } from '../modules/audit/entities/audit-entry.entity';
import { AssetModel } from '../modules/catalog/entities/asset-model.entity';
import { Category } from '../modules/catalog/entities/category.entity';
import { ComponentType } from '../modules/catalog/entities/component-type.entity';
import { ComponentHistory } from '../modules/components/entities/component-history.entity';
import { Component } from '../modules/components/entities/component.entity';
import { SparePartsInventory } from '../modules/components/entities/spare-parts-inventory.entity';
import { Company } from '../modules/organization/entities/company.entity';
import { Department } from '../modules/organization/entities/department.entity';
import { Employee } from '../modules/organization/entities/employee.entity';
import { Location } from '../modules/organization/entities/location.entity';
import { InvoiceLineItem } from '../modules/procurement/entities/invoice-line-item.entity';
import { PurchaseInvoice } from '../modules/procurement/entities/purchase-invoice.entity';
import { RequisitionItem } from '../modules/procurement/entities/requisition-item.entity';
import { Requisition } from '../modules/procurement/entities/requisition.entity';
import { Vendor } from '../modules/procurement/entities/vendor.entity';
import { User } from '../modules/users/entities/user.entity';

export const REGISTRY_ENTITIES = [
  User,
  Company,
  Location,
  Department,
  Employee,
  Category,
  AssetModel,
  ComponentType,
  Vendor,
  PurchaseInvoice,
  InvoiceLineItem,
  Requisition,
  Asset,
  AssetAssignment,
  MaintenanceRecord,
  Component,
  ComponentHistory,
  RequisitionItem,
  SparePartsInventory,
  AuditEntry,
];
