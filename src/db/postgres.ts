/**
 * PostgreSQL database backend using postgres-js.
 */
import postgres from "postgres";
import { log } from "../logger.js";
import type { DatabaseBackend, SqlRow, SqlValue } from "./backend.js";

/** Rewrite `?` placeholders to PostgreSQL's `$1, $2, …`. */
export function toPositional(sql: string): string {
  let n = 0;
  return sql.replace(/\?/g, () => `$${++n}`);
}

export class PostgresBackend implements DatabaseBackend {
  readonly dialect = "postgres" as const;
  private sql: postgres.Sql;
  /** Set while a transaction is open so statements run on its connection. */
  private tx: postgres.TransactionSql | null = null;

  constructor(connectionString: string) {
    this.sql = postgres(connectionString, { onnotice: () => {} });
    log.db.debug("postgres client created");
  }

  private get active(): postgres.Sql | postgres.TransactionSql {
    return this.tx ?? this.sql;
  }

  async initialize(schemaSql: string): Promise<void> {
    await this.sql.unsafe(schemaSql);
  }

  async execute(sql: string, params: SqlValue[] = []): Promise<number> {
    const result = await this.active.unsafe(toPositional(sql), params);
    return result.count;
  }

  async query(sql: string, params: SqlValue[] = []): Promise<SqlRow[]> {
    const rows = await this.active.unsafe<SqlRow[]>(toPositional(sql), params);
    return [...rows];
  }

  async queryOne(sql: string, params: SqlValue[] = []): Promise<SqlRow | null> {
    const rows = await this.query(sql, params);
    return rows[0] ?? null;
  }

  async transaction<T>(fn: () => Promise<T>): Promise<T> {
    if (this.tx) return fn();
    const holder: { outcome?: { value: T } } = {};
    await this.sql.begin(async (tx) => {
      this.tx = tx;
      try {
        holder.outcome = { value: await fn() };
      } finally {
        this.tx = null;
      }
    });
    if (!holder.outcome) {
      throw new Error("transaction finished without a result");
    }
    return holder.outcome.value;
  }

  async close(): Promise<void> {
    await this.sql.end();
  }
}
