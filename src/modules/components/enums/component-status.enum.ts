export enum ComponentStatus {
  INSTALLED = 'installed',
  SPARE = 'spare',
  FAILED = 'failed',
  REMOVED = 'removed',
  DISPOSED = 'disposed',
}

export const COMPONENT_STATUS_LABELS: Record<ComponentStatus, string> = {
  [ComponentStatus.INSTALLED]: 'Installed',
  [ComponentStatus.SPARE]: 'Spare',
  [ComponentStatus.FAILED]: 'Failed',
  [ComponentStatus.REMOVED]: 'Removed',
  [ComponentStatus.DISPOSED]: 'Disposed',
};

export const COMPONENT_STATUS_BADGES: Record<ComponentStatus, string> = {
  [ComponentStatus.INSTALLED]: 'badge-success',
  [ComponentStatus.SPARE]: 'badge-info',
  [ComponentStatus.FAILED]: 'badge-danger',
  [ComponentStatus.REMOVED]: 'badge-muted',
  [ComponentStatus.DISPOSED]: 'badge-muted',
};

export enum ComponentAction {
  INSTALLED = 'installed',
  REMOVED = 'removed',
  REPLACED = 'replaced',
  UPGRADED = 'upgraded',
  FAILED = 'failed',
}

export const COMPONENT_ACTION_LABELS: Record<ComponentAction, string> = {
  [ComponentAction.INSTALLED]: 'Installed',
  [ComponentAction.REMOVED]: 'Removed',
  [ComponentAction.REPLACED]: 'Replaced',
  [ComponentAction.UPGRADED]: 'Upgraded',
  [ComponentAction.FAILED]: 'Failed',
};
