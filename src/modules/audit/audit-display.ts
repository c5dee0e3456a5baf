import { Logger } from '@nestjs/common';
import { reverse } from '../../common/routing/routes';
import { callMethod, getPath } from '../../common/utils/object-path.util';
import { EVENT_CATEGORY_LABELS, KIND_CATEGORY, ROUTE_TABLE, TrackedEntityKind } from './constants/audit.constants';

const logger = new Logger('AuditDisplay');

/** Checked in order; the first truthy one labels the entity. */
const LABEL_ATTRIBUTES = [
  'assetTag',
  'componentTag',
  'requisitionNumber',
  'invoiceNumber',
  'name',
  'vendorName',
  'typeName',
  'employeeId',
];

const DETAIL_ACCESSORS = ['getStatusDisplay', 'getPaymentStatusDisplay', 'getActionDisplay'];

export function truncate(value: string, maxLength: number): string {
  return value.length > maxLength ? value.slice(0, maxLength) : value;
}

/** `asset_model` → `Asset Model` */
export function titleize(value: string): string {
  return value
    .split('_')
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Reads a property, treating a getter that throws as absent. */
export function readAttribute(entity: object, attribute: string): unknown {
  try {
    return getPath(entity, attribute);
  } catch (error) {
    logger.debug(`Reading ${attribute} failed: ${describeError(error)}`);
    return undefined;
  }
}

/**
 * Short human label: a naming attribute, else the entity's own `toString()`,
 * else `<Kind> #<id>`.
 */
export function shortLabel(entity: object, kind?: TrackedEntityKind): string {
  for (const attribute of LABEL_ATTRIBUTES) {
    const value = readAttribute(entity, attribute);
    if (value) {
      return String(value);
    }
  }

  if (entity.toString !== Object.prototype.toString) {
    try {
      const rendered = entity.toString();
      if (rendered) {
        return rendered;
      }
    } catch (error) {
      logger.debug(`toString failed while labelling ${kind ?? 'entity'}: ${describeError(error)}`);
    }
  }

  const id = readAttribute(entity, 'id');
  const title = kind ? titleize(kind) : entity.constructor.name;
  return `${title} #${id === undefined || id === null ? '?' : String(id)}`;
}

/** Message of an automatic entry: `Asset ENG0001 updated`. */
export function autoLogMessage(kind: TrackedEntityKind, entity: object, action: string): string {
  return `${EVENT_CATEGORY_LABELS[KIND_CATEGORY[kind]]} ${shortLabel(entity, kind)} ${action}`;
}

/** Status-like secondary text; accessors that fail are skipped. */
export function detailFor(entity: object): string {
  for (const accessor of DETAIL_ACCESSORS) {
    if (typeof readAttribute(entity, accessor) !== 'function') {
      continue;
    }
    try {
      return String(callMethod(entity, accessor) ?? '');
    } catch (error) {
      logger.debug(`${accessor} failed: ${describeError(error)}`);
    }
  }
  return '';
}

/** Detail link for a tracked entity, or `''` when it cannot be built. */
export function linkFor(kind: TrackedEntityKind, entity: object): string {
  const target = ROUTE_TABLE[kind];
  if (!target) {
    return '';
  }

  const value = readAttribute(entity, target.attribute);
  if (typeof value !== 'number' && typeof value !== 'string') {
    return '';
  }

  try {
    return reverse(target.routeName, { [target.param]: value });
  } catch (error) {
    logger.debug(`No link for ${kind}: ${describeError(error)}`);
    return '';
  }
}
