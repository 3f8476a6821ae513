/**
 * SQLite database backend using better-sqlite3.
 */
import Database from "better-sqlite3";
import { log } from "../logger.js";
import type { DatabaseBackend, SqlRow, SqlValue } from "./backend.js";

export class SQLiteBackend implements DatabaseBackend {
  readonly dialect = "sqlite" as const;
  private db: Database.Database;

  constructor(path: string = ":memory:") {
    this.db = new Database(path);
    if (path !== ":memory:") this.db.pragma("journal_mode = WAL");
    this.db.pragma("foreign_keys = ON");
    log.db.debug({ path }, "sqlite opened");
  }

  async initialize(schemaSql: string): Promise<void> {
    this.db.exec(schemaSql);
  }

  async execute(sql: string, params: SqlValue[] = []): Promise<number> {
    return this.db.prepare<SqlValue[]>(sql).run(...params).changes;
  }

  async query(sql: string, params: SqlValue[] = []): Promise<SqlRow[]> {
    return this.db.prepare<SqlValue[], SqlRow>(sql).all(...params);
  }

  async queryOne(sql: string, params: SqlValue[] = []): Promise<SqlRow | null> {
    return this.db.prepare<SqlValue[], SqlRow>(sql).get(...params) ?? null;
  }

  async transaction<T>(fn: () => Promise<T>): Promise<T> {
    this.db.exec("BEGIN");
    try {
      const result = await fn();
      this.db.exec("COMMIT");
      return result;
    } catch (err) {
      this.db.exec("ROLLBACK");
      throw err;
    }
  }

  async close(): Promise<void> {
    this.db.close();
  }
}
