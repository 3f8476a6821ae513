/**
 * Abstract database backend interface.
 *
 * All implementations use raw SQL with `?` placeholders, no ORM.
 */

export type SqlDialect = "sqlite" | "postgres";

/** A bound statement parameter. */
export type SqlValue = string | number | null;

/** A result row, keyed by column alias. */
export type SqlRow = Record<string, unknown>;

export interface DatabaseBackend {
  readonly dialect: SqlDialect;

  /** Run DDL (one or more statements, no parameters). */
  initialize(schemaSql: string): Promise<void>;

  /** Execute a write statement and return the number of affected rows. */
  execute(sql: string, params?: SqlValue[]): Promise<number>;

  /** Run a SELECT and return all matching rows. */
  query(sql: string, params?: SqlValue[]): Promise<SqlRow[]>;

  /** Run a SELECT and return the first row, or null. */
  queryOne(sql: string, params?: SqlValue[]): Promise<SqlRow | null>;

  /** Execute `fn` inside a transaction; a rejection rolls it back. */
  transaction<T>(fn: () => Promise<T>): Promise<T>;

  /** Close the connection / release resources. */
  close(): Promise<void>;
}

/** Quote an identifier for both SQLite and PostgreSQL. */
export function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}
