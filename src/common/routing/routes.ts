/** Global prefix applied to every HTTP route. */
export const API_PREFIX = 'api/v1';

/**
 * Named route templates. Links stored in the activity log and rendered by
 * list tables are built from these names, never from hand-written paths.
 */
export const ROUTES = {
  'companies.detail': '/companies/:id',
  'locations.detail': '/locations/:id',
  'departments.detail': '/departments/:id',
  'employees.detail': '/employees/:id',
  'categories.detail': '/categories/:id',
  'asset-models.detail': '/asset-models/:id',
  'component-types.detail': '/component-types/:id',
  'assets.list': '/assets',
  'assets.detail': '/assets/:id',
  'assets.history': '/assets/:id/assignments',
  'assets.bulk-unassign': '/assets/bulk/unassign',
  'assets.bulk-delete': '/assets/bulk/delete',
  'assets.bulk-status': '/assets/bulk/status',
  'components.detail': '/components/:id',
  'components.bulk-unassign': '/components/bulk/unassign',
  'components.bulk-delete': '/components/bulk/delete',
  'spare-parts.detail': '/spare-parts/:id',
  'vendors.detail': '/vendors/:id',
  'invoices.detail': '/invoices/:id',
  'invoices.bulk-mark-paid': '/invoices/bulk/mark-paid',
  'requisitions.detail': '/requisitions/:id',
  'maintenance.detail': '/maintenance/:id',
  'maintenance.bulk-delete': '/maintenance/bulk/delete',
  'activity.entity': '/activity/:kind/:id',
} as const;

export type RouteName = keyof typeof ROUTES;

export type RouteParams = Record<string, string | number | null | undefined>;

export class RouteResolutionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RouteResolutionError';
  }
}

function isRouteName(name: string): name is RouteName {
  return Object.prototype.hasOwnProperty.call(ROUTES, name);
}

/**
 * Resolves a named route to its full path.
 *
 * @throws RouteResolutionError when the name is unknown or a parameter is missing
 */
export function reverse(name: string, params: RouteParams = {}): string {
  if (!isRouteName(name)) {
    throw new RouteResolutionError(`Unknown route "${name}"`);
  }

  const path = ROUTES[name].replace(/:([A-Za-z]+)/g, (_match, param: string) => {
    const value = params[param];
    if (value === null || value === undefined || value === '') {
      throw new RouteResolutionError(`Route "${name}" is missing parameter "${param}"`);
    }
    return encodeURIComponent(String(value));
  });

  return `/${API_PREFIX}${path}`;
}
