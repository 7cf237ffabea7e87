/**
 * Dialect layer: the quoting collaborator and the registry the dialect
 * packages register with.
 *
 * @module dialect
 */

export { SQLDialect, BASE_DIALECT_CONFIG } from './sql-dialect';
export type { DialectConfig, IdentifierQuoter } from './sql-dialect';
export {
  registerDialect,
  createDialect,
  hasDialect,
  getRegisteredDialects,
  unregisterDialect,
} from './dialect-registry';
export type { DialectFactory } from './dialect-registry';
