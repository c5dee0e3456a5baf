export enum MaintenanceType {
  REPAIR = 'repair',
  UPGRADE = 'upgrade',
}

export const MAINTENANCE_TYPE_LABELS: Record<MaintenanceType, string> = {
  [MaintenanceType.REPAIR]: 'Repair',
  [MaintenanceType.UPGRADE]: 'Upgrade',
};

export const MAINTENANCE_TYPE_BADGES: Record<MaintenanceType, string> = {
  [MaintenanceType.REPAIR]: 'badge-warning',
  [MaintenanceType.UPGRADE]: 'badge-success',
};
