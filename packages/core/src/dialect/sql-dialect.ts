/**
 * SQL Dialect Base Class
 *
 * The quoting collaborator of the builders plus the per-dialect
 * configuration they read: identifier quote, clause separator, placeholder
 * prefix and the abstract-to-physical type map.
 *
 * Dialect packages extend this class and override the factory hooks to hand
 * out builders with their own capabilities (batch insert, sequence reset...).
 */

import { QUERY_DEFAULTS } from '../constants';
import { StatementBuilder } from '../query/statement-builder';
import { SchemaStatementBuilder } from '../schema/schema-statement-builder';

import type { TypeMap } from '../schema/type-mapper';

export interface DialectConfig {
  /** Character used to quote identifiers (e.g., ` for MySQL, " for PostgreSQL) */
  identifierQuote: string;
  /** Separator between top-level SELECT clauses and JOIN entries */
  separator: string;
  /** Prefix of generated placeholders */
  paramPrefix: string;
  /** Abstract column types mapped to physical column types */
  typeMap: TypeMap;
}

/**
 * Quoting collaborator consumed by the builders
 */
export interface IdentifierQuoter {
  quoteTableName(name: string): string;
  quoteColumnName(name: string): string;
}

export abstract class SQLDialect implements IdentifierQuoter {
  abstract readonly name: string;
  abstract readonly config: DialectConfig;

  /**
   * Quote a table name, including a schema prefix (schema.table).
   * Names containing a parenthesis are treated as raw expressions.
   */
  quoteTableName(name: string): string {
    if (name.includes('(')) {
      return name;
    }
    if (!name.includes('.')) {
      return this.quoteSimpleTableName(name);
    }
    return name
      .split('.')
      .map((part) => this.quoteSimpleTableName(part))
      .join('.');
  }

  /**
   * Quote a column name, including a table prefix (table.column)
   */
  quoteColumnName(name: string): string {
    if (name.includes('(')) {
      return name;
    }
    const dot = name.lastIndexOf('.');
    if (dot === -1) {
      return this.quoteSimpleColumnName(name);
    }
    const prefix = this.quoteTableName(name.slice(0, dot));
    return `${prefix}.${this.quoteSimpleColumnName(name.slice(dot + 1))}`;
  }

  quoteSimpleTableName(name: string): string {
    return this.wrap(name);
  }

  quoteSimpleColumnName(name: string): string {
    return name === '*' ? name : this.wrap(name);
  }

  /**
   * Statement builder bound to this dialect
   */
  createStatementBuilder(): StatementBuilder {
    return new StatementBuilder(this);
  }

  /**
   * Schema (DDL) builder bound to this dialect
   */
  createSchemaBuilder(): SchemaStatementBuilder {
    return new SchemaStatementBuilder(this);
  }

  private wrap(name: string): string {
    const quote = this.config.identifierQuote;
    if (quote === '' || name.startsWith(quote)) {
      return name;
    }
    return `${quote}${name.replaceAll(quote, quote + quote)}${quote}`;
  }
}

export const BASE_DIALECT_CONFIG: Omit<DialectConfig, 'identifierQuote' | 'typeMap'> = {
  separator: QUERY_DEFAULTS.SEPARATOR,
  paramPrefix: QUERY_DEFAULTS.PARAM_PREFIX,
};
