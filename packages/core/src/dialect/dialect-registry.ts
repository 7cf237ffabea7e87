/**
 * Dialect Registry
 *
 * Dialect packages register a factory from their `register` entry point;
 * the core never imports them directly.
 *
 * @example
 * ```typescript
 * import '@sqlweave/mysql/register';
 * const dialect = createDialect('mysql');
 * ```
 */

import { DialectNotFoundError } from '../errors';

import type { SQLDialect } from './sql-dialect';

export type DialectFactory = () => SQLDialect;

const dialectFactories = new Map<string, DialectFactory>();

/**
 * Register a dialect factory under a name (case-insensitive)
 */
export function registerDialect(name: string, factory: DialectFactory): void {
  dialectFactories.set(name.toLowerCase(), factory);
}

/**
 * Create a new dialect instance using its registered factory
 */
export function createDialect(name: string): SQLDialect {
  const factory = dialectFactories.get(name.toLowerCase());

  if (!factory) {
    throw new DialectNotFoundError(name);
  }

  return factory();
}

export function hasDialect(name: string): boolean {
  return dialectFactories.has(name.toLowerCase());
}

export function getRegisteredDialects(): string[] {
  return [...dialectFactories.keys()];
}

/**
 * Remove a registration (useful for testing)
 */
export function unregisterDialect(name: string): boolean {
  return dialectFactories.delete(name.toLowerCase());
}
