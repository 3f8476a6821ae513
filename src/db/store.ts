/**
 * Persistent-store operations the load pipeline relies on, and their
 * SQL implementation over a DatabaseBackend.
 */
import { Decimal } from "../core/decimal.js";
import type { CoercedRecord, CoercedValue } from "../core/types.js";
import { quoteIdent, type DatabaseBackend, type SqlValue } from "./backend.js";

export interface EntityStore {
  /** Whether a row with `key` in `keyColumn` exists. */
  exists(tableName: string, keyColumn: string, key: SqlValue): Promise<boolean>;

  /** Overwrite `values` on the row matching `key`; returns rows touched. */
  updateByKey(
    tableName: string,
    keyColumn: string,
    key: SqlValue,
    values: Record<string, SqlValue>,
  ): Promise<number>;

  /** Insert one full row; returns rows inserted. */
  insert(tableName: string, row: Record<string, SqlValue>): Promise<number>;

  /** All committed values of `keyColumn`, as strings. */
  listKeys(tableName: string, keyColumn: string): Promise<Set<string>>;

  /** Run `fn` atomically. */
  transaction<T>(fn: () => Promise<T>): Promise<T>;
}

/** Convert a coerced value to its bound-parameter form. */
export function toSqlValue(value: CoercedValue): SqlValue {
  if (value instanceof Decimal) return value.toString();
  if (value instanceof Date) return value.toISOString();
  return value;
}

export function toSqlRow(record: CoercedRecord, columns: readonly string[]): Record<string, SqlValue> {
  const row: Record<string, SqlValue> = {};
  for (const col of columns) {
    row[col] = toSqlValue(Object.hasOwn(record, col) ? record[col] : null);
  }
  return row;
}

export class SqlEntityStore implements EntityStore {
  private db: DatabaseBackend;

  constructor(db: DatabaseBackend) {
    this.db = db;
  }

  async exists(tableName: string, keyColumn: string, key: SqlValue): Promise<boolean> {
    const row = await this.db.queryOne(
      `SELECT 1 AS ${quoteIdent("found")} FROM ${quoteIdent(tableName)} WHERE ${quoteIdent(keyColumn)} = ? LIMIT 1`,
      [key],
    );
    return row !== null;
  }

  async updateByKey(
    tableName: string,
    keyColumn: string,
    key: SqlValue,
    values: Record<string, SqlValue>,
  ): Promise<number> {
    const columns = Object.keys(values).filter((c) => c !== keyColumn);
    if (columns.length === 0) return (await this.exists(tableName, keyColumn, key)) ? 1 : 0;
    const assignments = columns.map((c) => `${quoteIdent(c)} = ?`).join(", ");
    return this.db.execute(
      `UPDATE ${quoteIdent(tableName)} SET ${assignments} WHERE ${quoteIdent(keyColumn)} = ?`,
      [...columns.map((c) => values[c]), key],
    );
  }

  async insert(tableName: string, row: Record<string, SqlValue>): Promise<number> {
    const columns = Object.keys(row);
    const placeholders = columns.map(() => "?").join(", ");
    return this.db.execute(
      `INSERT INTO ${quoteIdent(tableName)} (${columns.map(quoteIdent).join(", ")}) VALUES (${placeholders})`,
      columns.map((c) => row[c]),
    );
  }

  async listKeys(tableName: string, keyColumn: string): Promise<Set<string>> {
    const rows = await this.db.query(
      `SELECT DISTINCT ${quoteIdent(keyColumn)} AS ${quoteIdent("key")} FROM ${quoteIdent(tableName)}`,
    );
    return new Set(rows.map((r) => String(r.key)));
  }

  transaction<T>(fn: () => Promise<T>): Promise<T> {
    return this.db.transaction(fn);
  }
}
