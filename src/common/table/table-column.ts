import { reverse, RouteResolutionError } from '../routing/routes';
import { getPath } from '../utils/object-path.util';

export type CellAccessor<T> = string | ((item: T) => unknown);
export type LinkBuilder<T> = (item: T) => string | null;
export type ColumnAlign = 'left' | 'center' | 'right';

export interface TableColumnOptions<T> {
  sortable?: boolean;
  /** Query path used for ordering; defaults to the accessor when it is a path */
  sortField?: string;
  /** Function, or a string with `{path}` placeholders */
  linkPattern?: LinkBuilder<T> | string;
  template?: string;
  defaultVisible?: boolean;
  width?: string;
  align?: ColumnAlign;
  badge?: boolean;
  badgeMap?: Record<string, string>;
}

export interface ColumnDescriptor {
  key: string;
  label: string;
  sortable: boolean;
  sortField: string | null;
  defaultVisible: boolean;
  width: string | null;
  align: ColumnAlign;
  badge: boolean;
}

const PLACEHOLDER = /\{([\w.]+)\}/g;

export class TableColumn<T> {
  readonly sortable: boolean;
  readonly sortField: string | null;
  readonly linkPattern: LinkBuilder<T> | string | null;
  readonly template: string | null;
  readonly defaultVisible: boolean;
  readonly width: string | null;
  readonly align: ColumnAlign;
  readonly badge: boolean;
  readonly badgeMap: Record<string, string>;

  constructor(
    readonly key: string,
    readonly label: string,
    readonly accessor: CellAccessor<T>,
    options: TableColumnOptions<T> = {},
  ) {
    this.sortable = options.sortable ?? true;
    this.sortField = options.sortField ?? (typeof accessor === 'string' ? accessor : null);
    this.linkPattern = options.linkPattern ?? null;
    this.template = options.template ?? null;
    this.defaultVisible = options.defaultVisible ?? true;
    this.width = options.width ?? null;
    this.align = options.align ?? 'left';
    this.badge = options.badge ?? false;
    this.badgeMap = options.badgeMap ?? {};
  }

  getValue(item: T): unknown {
    if (typeof this.accessor === 'function') {
      return this.accessor(item);
    }
    return getPath(item, this.accessor) ?? null;
  }

  getLink(item: T): string | null {
    if (!this.linkPattern) {
      return null;
    }
    if (typeof this.linkPattern === 'function') {
      return this.linkPattern(item);
    }

    // No link at all when every placeholder is empty
    let resolvedAny = false;
    const link = this.linkPattern.replace(PLACEHOLDER, (placeholder, path: string) => {
      const value = getPath(item, path);
      if (value === null || value === undefined) {
        return placeholder;
      }
      resolvedAny = true;
      return String(value);
    });

    return resolvedAny ? link : null;
  }

  getBadgeClass(value: unknown): string {
    if (value === null || value === undefined) {
      return '';
    }
    return this.badgeMap[String(value)] ?? '';
  }

  toDescriptor(): ColumnDescriptor {
    return {
      key: this.key,
      label: this.label,
      sortable: this.sortable,
      sortField: this.sortField,
      defaultVisible: this.defaultVisible,
      width: this.width,
      align: this.align,
      badge: this.badge,
    };
  }
}

export type BulkActionVariant = 'danger' | 'primary' | 'secondary';

export interface BulkActionOptions {
  confirmation?: string;
  icon?: string;
  variant?: BulkActionVariant;
}

export interface BulkActionDescriptor {
  key: string;
  label: string;
  handler: string;
  confirmation: string | null;
  icon: string | null;
  variant: BulkActionVariant;
}

/** An operation offered on the rows selected in a table. `handler` is the endpoint path. */
export class BulkAction {
  constructor(
    readonly key: string,
    readonly label: string,
    readonly handler: string,
    readonly options: BulkActionOptions = {},
  ) {}

  toDescriptor(): BulkActionDescriptor {
    return {
      key: this.key,
      label: this.label,
      handler: this.handler,
      confirmation: this.options.confirmation ?? null,
      icon: this.options.icon ?? null,
      variant: this.options.variant ?? 'secondary',
    };
  }
}

/**
 * Link builder over a named route. `mapping` maps route parameters to
 * property paths on the row, e.g. `urlPattern('assets.detail', { id: 'id' })`.
 * Yields null when a mapped value is missing or the route cannot be resolved.
 */
export function urlPattern<T>(routeName: string, mapping: Record<string, string>): LinkBuilder<T> {
  return (item: T) => {
    const params: Record<string, string | number> = {};
    for (const [param, path] of Object.entries(mapping)) {
      const value = getPath(item, path);
      if (value === null || value === undefined) {
        return null;
      }
      params[param] = typeof value === 'number' ? value : String(value);
    }

    try {
      return reverse(routeName, params);
    } catch (error) {
      if (error instanceof RouteResolutionError) {
        return null;
      }
      throw error;
    }
  };
}
