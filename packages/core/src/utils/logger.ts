/**
 * Logging helpers
 *
 * The builders log only through an injected Logger; these helpers give a
 * console-backed one and keep logged SQL short.
 */

import { QUERY_DEFAULTS } from '../constants';

import type { Logger } from '../types';

/* eslint-disable no-console */
export function createConsoleLogger(prefix = 'sqlweave'): Logger {
  return {
    debug: (msg, ...args) => console.debug(`[${prefix}] ${msg}`, ...args),
    info: (msg, ...args) => console.info(`[${prefix}] ${msg}`, ...args),
    warn: (msg, ...args) => console.warn(`[${prefix}] ${msg}`, ...args),
    error: (msg, ...args) => console.error(`[${prefix}] ${msg}`, ...args),
  };
}
/* eslint-enable no-console */

/**
 * Truncate long SQL for logging
 */
export function truncateSql(sql: string, maxLength: number = QUERY_DEFAULTS.LOG_SQL_MAX_LENGTH): string {
  if (sql.length <= maxLength) {
    return sql;
  }
  return `${sql.slice(0, maxLength)}...`;
}
