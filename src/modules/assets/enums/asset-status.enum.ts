export enum AssetStatus {
  PENDING = 'pending',
  ACTIVE = 'active',
  IN_REPAIR = 'in_repair',
  RETIRED = 'retired',
  DISPOSED = 'disposed',
  INACTIVE = 'inactive',
}

export const ASSET_STATUS_LABELS: Record<AssetStatus, string> = {
  [AssetStatus.PENDING]: 'Pending',
  [AssetStatus.ACTIVE]: 'Active',
  [AssetStatus.IN_REPAIR]: 'In Repair',
  [AssetStatus.RETIRED]: 'Retired',
  [AssetStatus.DISPOSED]: 'Disposed',
  [AssetStatus.INACTIVE]: 'Inactive',
};

export const ASSET_STATUS_BADGES: Record<AssetStatus, string> = {
  [AssetStatus.PENDING]: 'badge-warning',
  [AssetStatus.ACTIVE]: 'badge-success',
  [AssetStatus.IN_REPAIR]: 'badge-info',
  [AssetStatus.RETIRED]: 'badge-muted',
  [AssetStatus.DISPOSED]: 'badge-danger',
  [AssetStatus.INACTIVE]: 'badge-muted',
};
