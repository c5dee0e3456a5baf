import { RouteName } from '../../../common/routing/routes';

/** Feed category of an activity entry. */
export enum EventCategory {
  ASSET = 'asset',
  REQUISITION = 'requisition',
  INVOICE = 'invoice',
  ASSIGNMENT = 'assignment',
  COMPONENT = 'component',
  USER = 'user',
  COMPANY = 'company',
  LOCATION = 'location',
  DEPARTMENT = 'department',
  VENDOR = 'vendor',
  CATEGORY = 'category',
  ASSET_MODEL = 'asset_model',
  COMPONENT_TYPE = 'component_type',
  SPARE_PART = 'spare_part',
  MAINTENANCE = 'maintenance',
  DISPOSAL = 'disposal',
  LINE_ITEM = 'line_item',
  FULFILLMENT = 'fulfillment',
}

export enum AuditAction {
  CREATED = 'created',
  UPDATED = 'updated',
  DELETED = 'deleted',
  ASSIGNED = 'assigned',
  UNASSIGNED = 'unassigned',
  STATUS_CHANGED = 'status_changed',
  DUPLICATED = 'duplicated',
  APPROVED = 'approved',
  FULFILLED = 'fulfilled',
  CANCELLED = 'cancelled',
  ACTIVATED = 'activated',
  DEACTIVATED = 'deactivated',
  BULK_DELETED = 'bulk_deleted',
  BULK_STATUS = 'bulk_status',
  PAID = 'paid',
  TRANSFERRED = 'transferred',
}

export const EVENT_CATEGORY_LABELS: Record<EventCategory, string> = {
  [EventCategory.ASSET]: 'Asset',
  [EventCategory.REQUISITION]: 'Requisition',
  [EventCategory.INVOICE]: 'Invoice',
  [EventCategory.ASSIGNMENT]: 'Assignment',
  [EventCategory.COMPONENT]: 'Component',
  [EventCategory.USER]: 'User',
  [EventCategory.COMPANY]: 'Company',
  [EventCategory.LOCATION]: 'Location',
  [EventCategory.DEPARTMENT]: 'Department',
  [EventCategory.VENDOR]: 'Vendor',
  [EventCategory.CATEGORY]: 'Category',
  [EventCategory.ASSET_MODEL]: 'Asset Model',
  [EventCategory.COMPONENT_TYPE]: 'Component Type',
  [EventCategory.SPARE_PART]: 'Spare Part',
  [EventCategory.MAINTENANCE]: 'Maintenance',
  [EventCategory.DISPOSAL]: 'Disposal',
  [EventCategory.LINE_ITEM]: 'Line Item',
  [EventCategory.FULFILLMENT]: 'Fulfillment',
};

/** Single-letter badge shown next to feed rows. */
export const EVENT_CATEGORY_ICONS: Record<EventCategory, string> = {
  [EventCategory.ASSET]: 'A',
  [EventCategory.REQUISITION]: 'R',
  [EventCategory.INVOICE]: 'I',
  [EventCategory.ASSIGNMENT]: 'X',
  [EventCategory.COMPONENT]: 'C',
  [EventCategory.USER]: 'U',
  [EventCategory.COMPANY]: 'O',
  [EventCategory.LOCATION]: 'L',
  [EventCategory.DEPARTMENT]: 'D',
  [EventCategory.VENDOR]: 'V',
  [EventCategory.CATEGORY]: 'G',
  [EventCategory.ASSET_MODEL]: 'M',
  [EventCategory.COMPONENT_TYPE]: 'T',
  [EventCategory.SPARE_PART]: 'S',
  [EventCategory.MAINTENANCE]: 'W',
  [EventCategory.DISPOSAL]: 'Z',
  [EventCategory.LINE_ITEM]: 'N',
  [EventCategory.FULFILLMENT]: 'F',
};

export const AUDIT_ACTION_LABELS: Record<AuditAction, string> = {
  [AuditAction.CREATED]: 'Created',
  [AuditAction.UPDATED]: 'Updated',
  [AuditAction.DELETED]: 'Deleted',
  [AuditAction.ASSIGNED]: 'Assigned',
  [AuditAction.UNASSIGNED]: 'Unassigned',
  [AuditAction.STATUS_CHANGED]: 'Status Changed',
  [AuditAction.DUPLICATED]: 'Duplicated',
  [AuditAction.APPROVED]: 'Approved',
  [AuditAction.FULFILLED]: 'Fulfilled',
  [AuditAction.CANCELLED]: 'Cancelled',
  [AuditAction.ACTIVATED]: 'Activated',
  [AuditAction.DEACTIVATED]: 'Deactivated',
  [AuditAction.BULK_DELETED]: 'Bulk Deleted',
  [AuditAction.BULK_STATUS]: 'Bulk Status Change',
  [AuditAction.PAID]: 'Marked Paid',
  [AuditAction.TRANSFERRED]: 'Transferred',
};

/** Entity kinds whose inserts, updates and removals are logged automatically. */
export enum TrackedEntityKind {
  ASSET = 'asset',
  ASSIGNMENT = 'assignment',
  COMPONENT = 'component',
  EMPLOYEE = 'employee',
  COMPANY = 'company',
  LOCATION = 'location',
  DEPARTMENT = 'department',
  VENDOR = 'vendor',
  CATEGORY = 'category',
  ASSET_MODEL = 'asset_model',
  COMPONENT_TYPE = 'component_type',
  SPARE_PART = 'spare_part',
  INVOICE = 'invoice',
  REQUISITION = 'requisition',
  MAINTENANCE = 'maintenance',
  COMPONENT_HISTORY = 'component_history',
  LINE_ITEM = 'line_item',
  REQUISITION_ITEM = 'requisition_item',
}

export const KIND_CATEGORY: Record<TrackedEntityKind, EventCategory> = {
  [TrackedEntityKind.ASSET]: EventCategory.ASSET,
  [TrackedEntityKind.ASSIGNMENT]: EventCategory.ASSIGNMENT,
  [TrackedEntityKind.COMPONENT]: EventCategory.COMPONENT,
  [TrackedEntityKind.EMPLOYEE]: EventCategory.USER,
  [TrackedEntityKind.COMPANY]: EventCategory.COMPANY,
  [TrackedEntityKind.LOCATION]: EventCategory.LOCATION,
  [TrackedEntityKind.DEPARTMENT]: EventCategory.DEPARTMENT,
  [TrackedEntityKind.VENDOR]: EventCategory.VENDOR,
  [TrackedEntityKind.CATEGORY]: EventCategory.CATEGORY,
  [TrackedEntityKind.ASSET_MODEL]: EventCategory.ASSET_MODEL,
  [TrackedEntityKind.COMPONENT_TYPE]: EventCategory.COMPONENT_TYPE,
  [TrackedEntityKind.SPARE_PART]: EventCategory.SPARE_PART,
  [TrackedEntityKind.INVOICE]: EventCategory.INVOICE,
  [TrackedEntityKind.REQUISITION]: EventCategory.REQUISITION,
  [TrackedEntityKind.MAINTENANCE]: EventCategory.MAINTENANCE,
  [TrackedEntityKind.COMPONENT_HISTORY]: EventCategory.COMPONENT,
  [TrackedEntityKind.LINE_ITEM]: EventCategory.LINE_ITEM,
  [TrackedEntityKind.REQUISITION_ITEM]: EventCategory.FULFILLMENT,
};

/** Polymorphic pointer to a tracked entity. The row it names may be gone. */
export interface EntityRef {
  kind: TrackedEntityKind;
  id: number;
}

export interface RouteTarget {
  routeName: RouteName;
  /** Route parameter to fill */
  param: string;
  /** Entity property supplying the parameter */
  attribute: string;
}

export const ROUTE_TABLE: Record<TrackedEntityKind, RouteTarget> = {
  [TrackedEntityKind.ASSET]: { routeName: 'assets.detail', param: 'id', attribute: 'id' },
  [TrackedEntityKind.ASSIGNMENT]: { routeName: 'assets.detail', param: 'id', attribute: 'assetId' },
  [TrackedEntityKind.COMPONENT]: { routeName: 'components.detail', param: 'id', attribute: 'id' },
  [TrackedEntityKind.EMPLOYEE]: { routeName: 'employees.detail', param: 'id', attribute: 'id' },
  [TrackedEntityKind.COMPANY]: { routeName: 'companies.detail', param: 'id', attribute: 'id' },
  [TrackedEntityKind.LOCATION]: { routeName: 'locations.detail', param: 'id', attribute: 'id' },
  [TrackedEntityKind.DEPARTMENT]: { routeName: 'departments.detail', param: 'id', attribute: 'id' },
  [TrackedEntityKind.VENDOR]: { routeName: 'vendors.detail', param: 'id', attribute: 'id' },
  [TrackedEntityKind.CATEGORY]: { routeName: 'categories.detail', param: 'id', attribute: 'id' },
  [TrackedEntityKind.ASSET_MODEL]: { routeName: 'asset-models.detail', param: 'id', attribute: 'id' },
  [TrackedEntityKind.COMPONENT_TYPE]: { routeName: 'component-types.detail', param: 'id', attribute: 'id' },
  [TrackedEntityKind.SPARE_PART]: { routeName: 'spare-parts.detail', param: 'id', attribute: 'id' },
  [TrackedEntityKind.INVOICE]: { routeName: 'invoices.detail', param: 'id', attribute: 'id' },
  [TrackedEntityKind.REQUISITION]: { routeName: 'requisitions.detail', param: 'id', attribute: 'id' },
  [TrackedEntityKind.MAINTENANCE]: { routeName: 'maintenance.detail', param: 'id', attribute: 'id' },
  [TrackedEntityKind.COMPONENT_HISTORY]: { routeName: 'components.detail', param: 'id', attribute: 'componentId' },
  [TrackedEntityKind.LINE_ITEM]: { routeName: 'invoices.detail', param: 'id', attribute: 'invoiceId' },
  [TrackedEntityKind.REQUISITION_ITEM]: { routeName: 'requisitions.detail', param: 'id', attribute: 'requisitionId' },
};

export const MESSAGE_MAX_LENGTH = 512;
export const DETAIL_MAX_LENGTH = 512;
export const ACTOR_NAME_MAX_LENGTH = 255;
export const OBJECT_REPR_MAX_LENGTH = 512;
export const URL_MAX_LENGTH = 512;

export const ACTIVITY_PAGE_SIZE = 25;
