/**
 * Runtime shape checks for the loosely-typed query input callers pass in.
 */

export function isList(value: unknown): value is readonly unknown[] {
  return Array.isArray(value);
}

/**
 * A plain `{ key: value }` map, not a class instance, Date or Buffer
 */
export function isPlainObject(value: unknown): value is Readonly<Record<string, unknown>> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function isStringList(value: unknown): value is readonly string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

/**
 * Map form of a column mapping. Unlike a plain object it keeps
 * integer-like keys in insertion order.
 */
export function isOrderedMap<V>(
  value: ReadonlyMap<string, V> | Readonly<Record<string, V>>,
): value is ReadonlyMap<string, V> {
  return value instanceof Map;
}

/**
 * A LIMIT / OFFSET value that can be written inline: set and finite
 */
export function isCount(value: number | null | undefined): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}
