/**
 * Shared test fixtures: sample rows, CSV builders, in-memory backends.
 */
import { mkdtempSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

import type { ExtractionStrategy } from "../src/core/etl.js";
import type { Batch, RawRecord } from "../src/core/types.js";
import { buildSchemaSql } from "../src/db/schema.js";
import { SQLiteBackend } from "../src/db/sqlite.js";
import type { EntityDescriptor } from "../src/entities/descriptor.js";
import { createDefaultRegistry } from "../src/entities/registry.js";
import { LedgerSync } from "../src/index.js";
import { DiskStorage } from "../src/storage/disk.js";

// ---------------------------------------------------------------------------
// Sample rows
// ---------------------------------------------------------------------------

export function accountRow(overrides: RawRecord = {}): RawRecord {
  return {
    accountId: "A1",
    cash: 100,
    frozenCash: 0,
    marketValue: 0,
    totalAsset: 100,
    ...overrides,
  };
}

export function transactionRow(overrides: RawRecord = {}): RawRecord {
  return {
    accountId: "A1",
    accountType: "2",
    tradedId: "T1",
    stockCode: "600000",
    tradedTime: "2025-01-02T09:30:00",
    tradedPrice: "10.50",
    tradedVolume: "100",
    tradedAmount: "1050.00",
    strategyName: "momentum",
    orderRemark: null,
    direction: "0",
    offsetFlag: "48",
    ...overrides,
  };
}

// ---------------------------------------------------------------------------
// CSV builders
// ---------------------------------------------------------------------------

export function toCsv(rows: RawRecord[]): string {
  const first = rows[0];
  if (!first) return "";
  const headers = Object.keys(first);
  const cell = (v: RawRecord[string]) => {
    if (v === null) return "";
    const s = String(v);
    return /[",\n]/.test(s) ? `"${s.replace(/"/g, '""')}"` : s;
  };
  return [headers.join(","), ...rows.map((r) => headers.map((h) => cell(r[h] ?? null)).join(","))]
    .join("\n")
    .concat("\n");
}

// ---------------------------------------------------------------------------
// In-memory extraction
// ---------------------------------------------------------------------------

/** Hands out fixed batches per entity name; records which entities were asked for. */
export class StaticExtraction implements ExtractionStrategy {
  readonly requested: string[] = [];

  constructor(private batches: Record<string, Batch>) {}

  async extract(entity: EntityDescriptor): Promise<Batch> {
    this.requested.push(entity.name);
    const batch = this.batches[entity.name];
    if (!batch) throw new Error(`no batch for ${entity.name}`);
    return batch.map((r) => ({ ...r }));
  }
}

// ---------------------------------------------------------------------------
// Backends
// ---------------------------------------------------------------------------

export function makeTmpDir(): string {
  return mkdtempSync(join(tmpdir(), "ledger-sync-test-"));
}

/** In-memory SQLite with the default account/transaction tables. */
export async function makeDb(): Promise<SQLiteBackend> {
  const db = new SQLiteBackend(":memory:");
  await db.initialize(buildSchemaSql(createDefaultRegistry().orderedEntities(), "sqlite"));
  return db;
}

export async function makeCtx(dir: string): Promise<{
  ctx: LedgerSync;
  storage: DiskStorage;
  db: SQLiteBackend;
}> {
  const storage = new DiskStorage(join(dir, "storage"));
  const db = new SQLiteBackend(":memory:");
  const ctx = new LedgerSync(storage, db);
  await ctx.initialize();
  return { ctx, storage, db };
}
