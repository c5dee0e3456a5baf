export enum PaymentStatus {
  UNPAID = 'unpaid',
  PARTIALLY_PAID = 'partially_paid',
  PAID = 'paid',
}

export const PAYMENT_STATUS_LABELS: Record<PaymentStatus, string> = {
  [PaymentStatus.UNPAID]: 'Unpaid',
  [PaymentStatus.PARTIALLY_PAID]: 'Partially Paid',
  [PaymentStatus.PAID]: 'Paid',
};

export enum RequisitionStatus {
  PENDING = 'pending',
  FULFILLED = 'fulfilled',
  CANCELLED = 'cancelled',
}

export const REQUISITION_STATUS_LABELS: Record<RequisitionStatus, string> = {
  [RequisitionStatus.PENDING]: 'Pending',
  [RequisitionStatus.FULFILLED]: 'Fulfilled',
  [RequisitionStatus.CANCELLED]: 'Cancelled',
};

export enum RequisitionPriority {
  LOW = 'low',
  NORMAL = 'normal',
  HIGH = 'high',
  URGENT = 'urgent',
}

export enum LineItemType {
  ASSET = 'asset',
  COMPONENT = 'component',
  SERVICE = 'service',
  OTHER = 'other',
}

export const LINE_ITEM_TYPE_LABELS: Record<LineItemType, string> = {
  [LineItemType.ASSET]: 'Asset',
  [LineItemType.COMPONENT]: 'Component',
  [LineItemType.SERVICE]: 'Service',
  [LineItemType.OTHER]: 'Other',
};

/** Line item types that turn into inventory when received. */
export const RECEIVABLE_LINE_ITEM_TYPES: readonly LineItemType[] = [LineItemType.ASSET, LineItemType.COMPONENT];

export enum RequisitionItemType {
  ASSET = 'asset',
  COMPONENT = 'component',
}
