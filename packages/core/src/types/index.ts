export type QueryValue = string | number | bigint | boolean | Date | Buffer | null;

/**
 * Placeholder token to bound value, in binding order.
 * Shared by reference through one build and appended to in place.
 */
export type BoundParams = Record<string, unknown>;

export interface BuiltStatement {
  sql: string;
  params: BoundParams;
}

export interface Logger {
  error(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
}
