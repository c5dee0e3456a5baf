import { Brackets, SelectQueryBuilder } from 'typeorm';
import { buildPaginationMeta, PaginationMetaDto } from '../dto/paginated-response.dto';
import { escapeLike } from '../utils/sql-like.util';
import {
  BulkAction,
  BulkActionDescriptor,
  ColumnAlign,
  ColumnDescriptor,
  TableColumn,
} from './table-column';
import { ColumnPreferenceStore } from './table-preferences.service';
import { allParams, firstParam, TableRequest } from './table-request';

export type TableRow = { id: number | string };

export type TableSource<T extends TableRow> = SelectQueryBuilder<T> | T[];

export type FilterHandler<T extends TableRow> = (qb: SelectQueryBuilder<T>, value: string) => SelectQueryBuilder<T>;

export interface ReusableTableOptions<T extends TableRow> {
  tableId?: string;
  defaultSort?: string;
  pageSize?: number;
  /** Paths matched case-insensitively against the `q` parameter */
  searchFields?: string[];
  /** Request parameter → column path or custom handler */
  filterFields?: Record<string, string | FilterHandler<T>>;
  bulkActions?: BulkAction[];
  showColumnToggle?: boolean;
  showBulkSelect?: boolean;
  lazyLoad?: boolean;
  preferences?: ColumnPreferenceStore;
}

export interface TableHeader extends Partial<ColumnDescriptor> {
  key: string;
  label: string;
  type?: 'checkbox';
  isCurrent?: boolean;
  direction?: 'asc' | 'desc';
  nextSort?: string | null;
}

export interface CheckboxCell {
  type: 'checkbox';
  value: number | string;
}

export interface DataCell {
  key: string;
  value: unknown;
  link: string | null;
  align: ColumnAlign;
  badge: boolean;
  badgeClass: string;
  template: string | null;
}

export interface TableRowContext {
  pk: number | string;
  cells: Array<CheckboxCell | DataCell>;
}

export interface TableContext<T> {
  tableId: string;
  showColumnToggle: boolean;
  showBulkSelect: boolean;
  lazyLoad: boolean;
  items: T[];
  headers: TableHeader[];
  rows: TableRowContext[];
  pagination: PaginationMetaDto;
  totalCount: number;
  currentSort: string;
  query: string;
  visibleColumns: string[];
  allColumns: ColumnDescriptor[];
  bulkActions: BulkActionDescriptor[];
  rowsUrl: string;
}

/**
 * Search, filter, sort and pagination for a list endpoint, declared once per
 * table as columns and options.
 *
 * Query builder sources get every stage. Array sources are assumed to be
 * searched, filtered and sorted by the caller and are only paginated.
 *
 * Paths name entity properties: `assetTag` is read on the root alias and
 * `department.name` on the joined alias `department` (the last two segments of
 * a longer path are used, so joins must be aliased after their relation).
 */
export class ReusableTable<T extends TableRow> {
  readonly tableId: string;
  readonly defaultSort: string;
  readonly pageSize: number;
  readonly currentSort: string;
  readonly query: string;
  readonly visibleColumns: string[];

  private source: TableSource<T>;
  private readonly options: ReusableTableOptions<T>;

  constructor(
    private readonly request: TableRequest,
    source: TableSource<T>,
    private readonly columns: TableColumn<T>[],
    options: ReusableTableOptions<T> = {},
  ) {
    this.source = source;
    this.options = options;
    this.tableId = options.tableId ?? 'data-table';
    this.defaultSort = options.defaultSort ?? this.firstSortableField();
    this.pageSize = options.pageSize ?? 20;
    this.currentSort = this.resolveSort(firstParam(request.query, 'sort'));
    this.query = (firstParam(request.query, 'q') ?? '').trim();
    this.visibleColumns = this.resolveVisibleColumns();
  }

  applySearch(): void {
    const qb = this.queryBuilder();
    const fields = this.options.searchFields ?? [];
    if (!qb || !this.query || fields.length === 0) {
      return;
    }

    const pattern = `%${escapeLike(this.query.toLowerCase())}%`;
    qb.andWhere(
      new Brackets((where) => {
        for (const field of fields) {
          where.orWhere(`LOWER(${this.sqlPath(qb, field)}) LIKE :tableSearch ESCAPE '\\'`);
        }
      }),
      { tableSearch: pattern },
    );
  }

  applyFilters(): void {
    const qb = this.queryBuilder();
    if (!qb) {
      return;
    }

    let index = 0;
    for (const [param, field] of Object.entries(this.options.filterFields ?? {})) {
      const value = firstParam(this.request.query, param);
      if (!value) {
        continue;
      }
      if (typeof field === 'string') {
        const name = `tableFilter${index++}`;
        qb.andWhere(`${this.sqlPath(qb, field)} = :${name}`, { [name]: value });
      } else {
        this.source = field(qb, value);
      }
    }
  }

  applySorting(): void {
    const qb = this.queryBuilder();
    if (!qb || !this.currentSort) {
      return;
    }

    const descending = this.currentSort.startsWith('-');
    const field = descending ? this.currentSort.slice(1) : this.currentSort;
    const order = descending ? 'DESC' : 'ASC';
    qb.orderBy(this.sqlPath(qb, field), order);
    // Stable pages when the sort field has ties
    if (field !== 'id') {
      qb.addOrderBy(`${qb.alias}.id`, order);
    }
  }

  /** `field` → `-field` when already sorted ascending by it, else `field`. */
  toggleSort(field: string | null): string | null {
    if (!field) {
      return null;
    }
    return this.currentSort === field ? `-${field}` : field;
  }

  getHeaderContext(): TableHeader[] {
    const headers: TableHeader[] = [];

    if (this.showBulkSelect) {
      headers.push({
        key: '_select',
        label: 'select_all',
        type: 'checkbox',
        sortable: false,
        width: 'checkbox-col',
        align: 'center',
      });
    }

    const activeField = this.currentSort.replace(/^-/, '');
    for (const column of this.visible()) {
      headers.push({
        ...column.toDescriptor(),
        isCurrent: column.sortField ? activeField === column.sortField : false,
        direction: this.currentSort.startsWith('-') ? 'desc' : 'asc',
        nextSort: column.sortable ? this.toggleSort(column.sortField) : null,
      });
    }

    return headers;
  }

  getRowContext(items: T[]): TableRowContext[] {
    const columns = this.visible();

    return items.map((item) => {
      const cells: Array<CheckboxCell | DataCell> = [];
      if (this.showBulkSelect) {
        cells.push({ type: 'checkbox', value: item.id });
      }

      for (const column of columns) {
        const value = column.getValue(item);
        cells.push({
          key: column.key,
          value,
          link: column.getLink(item),
          align: column.align,
          badge: column.badge,
          badgeClass: column.getBadgeClass(value),
          template: column.template,
        });
      }

      return { pk: item.id, cells };
    });
  }

  async getContext(): Promise<TableContext<T>> {
    this.applySearch();
    this.applyFilters();
    this.applySorting();

    const { items, total, page } = await this.paginate();
    const meta = buildPaginationMeta(total, page, this.pageSize);

    return {
      tableId: this.tableId,
      showColumnToggle: this.options.showColumnToggle ?? true,
      showBulkSelect: this.showBulkSelect,
      lazyLoad: this.options.lazyLoad ?? true,
      items,
      headers: this.getHeaderContext(),
      rows: this.getRowContext(items),
      pagination: meta,
      totalCount: total,
      currentSort: this.currentSort,
      query: this.query,
      visibleColumns: this.visibleColumns,
      allColumns: this.columns.map((column) => column.toDescriptor()),
      bulkActions: (this.options.bulkActions ?? []).map((action) => action.toDescriptor()),
      rowsUrl: this.request.path,
    };
  }

  /**
   * Fetches one page. A page that is not an integer (blank included) is
   * page 1; a page outside 1..lastPage is the last page.
   */
  private async paginate(): Promise<{ items: T[]; total: number; page: number }> {
    const total = Array.isArray(this.source) ? this.source.length : await this.source.getCount();
    const lastPage = Math.max(1, Math.ceil(total / this.pageSize));

    const requested = (firstParam(this.request.query, 'page') ?? '').trim();
    let page = /^-?\d+$/.test(requested) ? Number(requested) : 1;
    if (page < 1 || page > lastPage) {
      page = lastPage;
    }

    const offset = (page - 1) * this.pageSize;
    const items = Array.isArray(this.source)
      ? this.source.slice(offset, offset + this.pageSize)
      : await this.source.skip(offset).take(this.pageSize).getMany();

    return { items, total, page };
  }

  private get showBulkSelect(): boolean {
    return this.options.showBulkSelect ?? true;
  }

  private visible(): TableColumn<T>[] {
    return this.columns.filter((column) => this.visibleColumns.includes(column.key));
  }

  private queryBuilder(): SelectQueryBuilder<T> | null {
    return Array.isArray(this.source) ? null : this.source;
  }

  private firstSortableField(): string {
    const column = this.columns.find((candidate) => candidate.sortable && candidate.sortField);
    return column?.sortField ?? 'id';
  }

  /** Only sorts naming a declared sort field (or the default) are honoured. */
  private resolveSort(requested: string | undefined): string {
    if (!requested) {
      return this.defaultSort;
    }
    const field = requested.replace(/^-/, '');
    const allowed =
      field === this.defaultSort.replace(/^-/, '') ||
      this.columns.some((column) => column.sortable && column.sortField === field);
    return allowed ? requested : this.defaultSort;
  }

  private resolveVisibleColumns(): string[] {
    const known = new Set(this.columns.map((column) => column.key));
    const requested = allParams(this.request.query, 'visible_columns').filter((key) => known.has(key));
    const { preferences } = this.options;
    const username = this.request.username;

    if (requested.length > 0) {
      if (preferences && username) {
        preferences.setVisibleColumns(username, this.tableId, requested);
      }
      return requested;
    }

    const stored = preferences && username ? preferences.getVisibleColumns(username, this.tableId) : undefined;
    if (stored) {
      return stored;
    }

    return this.columns.filter((column) => column.defaultVisible).map((column) => column.key);
  }

  private sqlPath(qb: SelectQueryBuilder<T>, path: string): string {
    const segments = path.split('.');
    if (segments.length === 1) {
      return `${qb.alias}.${path}`;
    }
    return segments.slice(-2).join('.');
  }
}

