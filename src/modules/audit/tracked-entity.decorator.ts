import { TrackedEntityKind } from './constants/audit.constants';

// eslint-disable-next-line @typescript-eslint/ban-types
const trackedEntities = new Map<Function, TrackedEntityKind>();

/**
 * Registers an entity class for automatic activity logging under `kind`.
 *
 * @example
 * ```typescript
 * @TrackedEntity(TrackedEntityKind.ASSET)
 * @Entity('assets')
 * export class Asset extends BaseRecordEntity {}
 * ```
 */
export function TrackedEntity(kind: TrackedEntityKind): ClassDecorator {
  return (target) => {
    trackedEntities.set(target, kind);
  };
}

/** Kind registered for an entity class (TypeORM metadata target), if any. */
// eslint-disable-next-line @typescript-eslint/ban-types
export function getTrackedKind(target: Function | string): TrackedEntityKind | undefined {
  return typeof target === 'string' ? undefined : trackedEntities.get(target);
}

/** Kind registered for the class of `entity`, if any. */
export function trackedKindOf(entity: object): TrackedEntityKind | undefined {
  return trackedEntities.get(entity.constructor);
}
