/**
 * Upsert engine – update-then-insert load of a coerced batch.
 *
 * Rows are staged by conflict key, existing rows are updated in one pass,
 * and rows whose key is still absent from the table are inserted in a
 * second pass. Both passes share one transaction: any failure rolls the
 * whole batch back.
 */
import type { EntityStore } from "../db/store.js";
import { toSqlRow } from "../db/store.js";
import type { SqlValue } from "../db/backend.js";
import { log } from "../logger.js";
import { UpsertError, type UpsertPhase } from "./exceptions.js";
import type { CoercedRecord, UpsertResult } from "./types.js";

interface StagedRow {
  key: SqlValue;
  row: Record<string, SqlValue>;
}

export class UpsertEngine {
  private store: EntityStore;

  constructor(store: EntityStore) {
    this.store = store;
  }

  async upsert(
    batch: readonly CoercedRecord[],
    tableName: string,
    conflictKey: string,
    columns: readonly string[],
  ): Promise<UpsertResult> {
    const result: UpsertResult = {
      attemptedRows: batch.length,
      updatedRows: 0,
      insertedRows: 0,
      collapsedRows: 0,
    };
    if (batch.length === 0) return result;

    let staged: Map<string, StagedRow>;
    try {
      staged = stage(batch, conflictKey, columns);
    } catch (err) {
      return { ...result, error: toUpsertError(tableName, "stage", null, err) };
    }
    result.collapsedRows = batch.length - staged.size;

    let phase: UpsertPhase = "update";
    let currentKey: string | null = null;
    try {
      const counts = await this.store.transaction(async () => {
        let updated = 0;
        let inserted = 0;

        for (const [key, { key: raw, row }] of staged) {
          currentKey = key;
          const touched = await this.store.updateByKey(tableName, conflictKey, raw, row);
          if (touched > 1) {
            throw new Error(`conflict key matched ${touched} rows`);
          }
          updated += touched;
        }

        phase = "insert";
        for (const [key, { key: raw, row }] of staged) {
          currentKey = key;
          if (await this.store.exists(tableName, conflictKey, raw)) continue;
          inserted += await this.store.insert(tableName, row);
        }
        return { updated, inserted };
      });
      result.updatedRows = counts.updated;
      result.insertedRows = counts.inserted;
    } catch (err) {
      const error = toUpsertError(tableName, phase, currentKey, err);
      log.upsert.error({ err: error, table: tableName }, "upsert rolled back");
      return { ...result, error };
    }

    log.upsert.info(
      {
        table: tableName,
        attempted: result.attemptedRows,
        updated: result.updatedRows,
        inserted: result.insertedRows,
        collapsed: result.collapsedRows,
      },
      "upsert committed",
    );
    return result;
  }
}

/** Key rows by conflict-key value; a later duplicate replaces an earlier one. */
function stage(
  batch: readonly CoercedRecord[],
  conflictKey: string,
  columns: readonly string[],
): Map<string, StagedRow> {
  const staged = new Map<string, StagedRow>();
  batch.forEach((record, rowIndex) => {
    const row = toSqlRow(record, columns);
    const key = row[conflictKey];
    if (key === null || key === undefined) {
      throw new Error(`row ${rowIndex} has no value for conflict key '${conflictKey}'`);
    }
    const id = String(key);
    // Re-insert so map order follows the surviving row's position.
    staged.delete(id);
    staged.set(id, { key, row });
  });
  return staged;
}

function toUpsertError(
  tableName: string,
  phase: UpsertPhase,
  key: string | null,
  err: unknown,
): UpsertError {
  return err instanceof UpsertError ? err : new UpsertError(tableName, phase, key, err);
}
