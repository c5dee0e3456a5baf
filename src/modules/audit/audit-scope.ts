import { AsyncLocalStorage } from 'async_hooks';

interface AuditScope {
  /** Automatic entries are skipped */
  suppressed: boolean;
  /** An activity entry is being written */
  writing: boolean;
}

const auditScope = new AsyncLocalStorage<AuditScope>();

function runInScope<T>(patch: Partial<AuditScope>, fn: () => T): T {
  const current = auditScope.getStore();
  return auditScope.run(
    {
      suppressed: current?.suppressed ?? false,
      writing: current?.writing ?? false,
      ...patch,
    },
    fn,
  );
}

/**
 * Runs `fn` with automatic activity logging turned off, so the caller can
 * write one descriptive entry itself. The scope belongs to the current async
 * execution context: concurrent requests are unaffected, and it ends when
 * `fn` returns or its promise settles, whether or not it fails.
 *
 * @example
 * ```typescript
 * await suppressAutoLog(() => this.assetRepository.save(asset));
 * await this.auditService.record({ action: AuditAction.STATUS_CHANGED, ... });
 * ```
 */
export function suppressAutoLog<T>(fn: () => T): T {
  return runInScope({ suppressed: true }, fn);
}

/** Marks `fn` as an activity write so entity events it raises are not logged again. */
export function runAuditWrite<T>(fn: () => T): T {
  return runInScope({ writing: true }, fn);
}

export function isAutoLogSuppressed(): boolean {
  return auditScope.getStore()?.suppressed ?? false;
}

export function isAuditWriteActive(): boolean {
  return auditScope.getStore()?.writing ?? false;
}

const updateWatch = new AsyncLocalStorage<Set<object>>();

/**
 * Runs `fn` and reports which entities it actually issued an UPDATE for.
 * TypeORM raises no update event for a save that changed nothing.
 */
export async function watchUpdates<T>(fn: () => Promise<T>): Promise<{ result: T; updated: ReadonlySet<object> }> {
  const updated = new Set<object>();
  const result = await updateWatch.run(updated, fn);
  return { result, updated };
}

export function markUpdated(entity: object): void {
  updateWatch.getStore()?.add(entity);
}
