/**
 * ledger-sync – validated, idempotent loading of account and transaction
 * batches from object storage into a relational store.
 */
import { buildDb, buildStorage, parseConfig, type Config } from "./config.js";
import { ETLPipeline, type ExtractionStrategy, type RunOptions } from "./core/etl.js";
import type { PipelineRunResult } from "./core/types.js";
import { RecordValidator } from "./core/validator.js";
import { quoteIdent, type DatabaseBackend } from "./db/backend.js";
import { buildSchemaSql } from "./db/schema.js";
import { createDefaultRegistry, type EntityRegistry } from "./entities/registry.js";
import { CsvExtractionStrategy } from "./extract/storage-csv.js";
import { log } from "./logger.js";
import {
  StatisticsReporter,
  computeStatistics,
  type EntityStatistics,
} from "./reporting/statistics.js";
import type { StorageBackend } from "./storage/backend.js";

export interface LedgerSyncOptions {
  registry?: EntityRegistry;
  extraction?: ExtractionStrategy;
  /** Absolute tolerance for cross-field checks. */
  tolerance?: number | string;
  /** Compute statistics after a successful run (default true). */
  reporting?: boolean;
}

export class LedgerSync {
  private storage: StorageBackend;
  private db: DatabaseBackend;
  private registry: EntityRegistry;
  private pipeline: ETLPipeline;
  private reporter: StatisticsReporter | null;

  constructor(
    storage: StorageBackend,
    db: DatabaseBackend,
    options: LedgerSyncOptions = {},
  ) {
    this.storage = storage;
    this.db = db;
    this.registry = options.registry ?? createDefaultRegistry();
    this.reporter = options.reporting === false ? null : new StatisticsReporter();
    this.pipeline = new ETLPipeline({
      registry: this.registry,
      extraction:
        options.extraction ??
        new CsvExtractionStrategy({ account: "accounts.csv", transaction: "transactions.csv" }),
      storage: this.storage,
      db: this.db,
      validator: new RecordValidator(this.registry, { tolerance: options.tolerance }),
      postLoad: this.reporter ?? undefined,
    });
  }

  /** Construct from a configuration object (validated with zod) and create tables. */
  static async fromConfig(raw: unknown): Promise<LedgerSync> {
    const config: Config = parseConfig(raw);
    const ctx = new LedgerSync(buildStorage(config.storage), buildDb(config.db), {
      extraction: new CsvExtractionStrategy(config.etl.files),
      tolerance: config.etl.tolerance,
      reporting: config.reporting.enabled,
    });
    await ctx.initialize();
    return ctx;
  }

  /** Create the target tables if they do not exist. */
  async initialize(): Promise<void> {
    const sql = buildSchemaSql(this.registry.orderedEntities(), this.db.dialect);
    await this.db.initialize(sql);
    log.db.info({ dialect: this.db.dialect }, "schema ready");
  }

  // ------------------------------------------------------------------
  // Public API
  // ------------------------------------------------------------------

  runPipeline(options: RunOptions = {}): Promise<PipelineRunResult> {
    return this.pipeline.runPipeline(options);
  }

  /** Statistics computed by the last successful run, if reporting is on. */
  get lastReport(): readonly EntityStatistics[] {
    return this.reporter?.lastReport ?? [];
  }

  /** Compute statistics for every entity table now. */
  async statistics(): Promise<EntityStatistics[]> {
    const report: EntityStatistics[] = [];
    for (const entity of this.registry.orderedEntities()) {
      report.push(await computeStatistics(this.db, entity));
    }
    return report;
  }

  /**
   * Delete every row of every entity table, children first, in one
   * transaction. Returns deleted row counts by entity name.
   */
  async clean(): Promise<Record<string, number>> {
    const entities = [...this.registry.orderedEntities()].reverse();
    const deleted = await this.db.transaction(async () => {
      const counts: Record<string, number> = {};
      for (const entity of entities) {
        counts[entity.name] = await this.db.execute(`DELETE FROM ${quoteIdent(entity.tableName)}`);
      }
      return counts;
    });
    log.db.warn({ deleted }, "entity tables cleaned");
    return deleted;
  }

  async close(): Promise<void> {
    await this.db.close();
  }
}

export { ETLPipeline } from "./core/etl.js";
export type { ExtractionStrategy, PostLoadStep, RunOptions } from "./core/etl.js";
export { RecordValidator } from "./core/validator.js";
export { TypeCoercer } from "./core/coercer.js";
export { UpsertEngine } from "./core/upsert.js";
export { Decimal } from "./core/decimal.js";
export * from "./core/exceptions.js";
export type * from "./core/types.js";
export { EntityRegistry, createDefaultRegistry } from "./entities/registry.js";
export { defineEntity } from "./entities/descriptor.js";
export type { EntityDescriptor, EntityDescriptorInput } from "./entities/descriptor.js";
export { ACCOUNT } from "./entities/account.js";
export { TRANSACTION } from "./entities/transaction.js";
export { AccountType, Direction, OffsetFlag } from "./entities/enums.js";
export { SqlEntityStore, type EntityStore } from "./db/store.js";
export type { DatabaseBackend } from "./db/backend.js";
export { SQLiteBackend } from "./db/sqlite.js";
export { PostgresBackend } from "./db/postgres.js";
export type { StorageBackend } from "./storage/backend.js";
export { DiskStorage } from "./storage/disk.js";
export { S3Storage } from "./storage/s3.js";
export { CsvExtractionStrategy } from "./extract/storage-csv.js";
export type { EntityStatistics } from "./reporting/statistics.js";
