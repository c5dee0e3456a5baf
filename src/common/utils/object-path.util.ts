/**
 * Reads a dotted property path (`assignedTo.department.name`) from a value.
 * Returns `undefined` as soon as a segment cannot be followed.
 */
export function getPath(source: unknown, path: string): unknown {
  let current: unknown = source;
  for (const segment of path.split('.')) {
    if (current === null || current === undefined) {
      return undefined;
    }
    if (typeof current !== 'object' && typeof current !== 'function') {
      return undefined;
    }
    current = Reflect.get(current, segment);
  }
  return current;
}

/**
 * Calls a zero-argument method by name when the value has one.
 * Returns `undefined` when there is no such method.
 */
export function callMethod(source: unknown, name: string): unknown {
  if (source === null || (typeof source !== 'object' && typeof source !== 'function')) {
    return undefined;
  }
  const method: unknown = Reflect.get(source, name);
  if (typeof method !== 'function') {
    return undefined;
  }
  return Reflect.apply(method, source, []);
}
