/**
 * Unit tests for the ETL pipeline with in-memory extraction.
 */
import { describe, test, expect } from "vitest";
import { TypeCoercer } from "../src/core/coercer.js";
import {
  ETLPipeline,
  type ETLPipelineOptions,
  type PostLoadStep,
} from "../src/core/etl.js";
import type { Batch, CoercedBatch, StepState } from "../src/core/types.js";
import type { SQLiteBackend } from "../src/db/sqlite.js";
import type { EntityDescriptor } from "../src/entities/descriptor.js";
import { EntityRegistry, createDefaultRegistry } from "../src/entities/registry.js";
import { TRANSACTION } from "../src/entities/transaction.js";
import { DiskStorage } from "../src/storage/disk.js";
import {
  StaticExtraction,
  accountRow,
  makeDb,
  makeTmpDir,
  transactionRow,
} from "./fixtures.js";

const storage = new DiskStorage(makeTmpDir());

function makePipeline(
  db: SQLiteBackend,
  batches: Record<string, Batch>,
  extra: Partial<ETLPipelineOptions> = {},
): { pipeline: ETLPipeline; extraction: StaticExtraction } {
  const extraction = new StaticExtraction(batches);
  const pipeline = new ETLPipeline({
    registry: createDefaultRegistry(),
    extraction,
    storage,
    db,
    ...extra,
  });
  return { pipeline, extraction };
}

async function countRows(db: SQLiteBackend, table: string): Promise<number> {
  const row = await db.queryOne(`SELECT COUNT(*) AS n FROM "${table}"`);
  return Number(row?.n);
}

class RecordingPostLoad implements PostLoadStep {
  readonly name = "recorder";
  seen: string[] = [];

  async run(entities: readonly EntityDescriptor[]): Promise<void> {
    this.seen = entities.map((e) => e.name);
  }
}

describe("ETLPipeline", () => {
  test("loads parents then children", async () => {
    const db = await makeDb();
    const { pipeline, extraction } = makePipeline(db, {
      account: [accountRow()],
      transaction: [transactionRow()],
    });

    const result = await pipeline.runPipeline();
    expect(result.success).toBe(true);
    expect(result.errorMessage).toBeNull();
    expect(result.runId).toMatch(/^[0-9a-f-]{36}$/);
    expect(result.steps.map((s) => [s.entityName, s.state, s.rowsLoaded])).toEqual([
      ["account", "done", 1],
      ["transaction", "done", 1],
    ]);
    expect(result.steps[1].upsert).toEqual({
      attemptedRows: 1,
      updatedRows: 0,
      insertedRows: 1,
      collapsedRows: 0,
    });
    expect(extraction.requested).toEqual(["account", "transaction"]);
    expect(result.completedAt.getTime()).toBeGreaterThanOrEqual(result.startedAt.getTime());
    expect(await countRows(db, "transactions")).toBe(1);
    await db.close();
  });

  test("state transitions of a successful step", async () => {
    const db = await makeDb();
    const transitions: string[] = [];
    const { pipeline } = makePipeline(
      db,
      { account: [accountRow()], transaction: [transactionRow()] },
      {
        onTransition: (entity: string, from: StepState, to: StepState) => {
          if (entity === "account") transitions.push(`${from}->${to}`);
        },
      },
    );
    await pipeline.runPipeline();
    expect(transitions).toEqual([
      "pending->extracting",
      "extracting->validating",
      "validating->coercing",
      "coercing->upserting",
      "upserting->done",
    ]);
    await db.close();
  });

  test("a transaction for an unloaded account fails validation before any write", async () => {
    const db = await makeDb();
    const transitions: string[] = [];
    const { pipeline } = makePipeline(
      db,
      {
        account: [accountRow()],
        transaction: [transactionRow({ accountId: "A2" })],
      },
      {
        onTransition: (entity: string, from: StepState, to: StepState) => {
          if (entity === "transaction") transitions.push(`${from}->${to}`);
        },
      },
    );

    const result = await pipeline.runPipeline();
    const stepMessage =
      "transaction (validating): Validation failed for 'transaction' (1 error, referential rule): " +
      "row 0 accountId: accountId 'A2' not found among loaded 'account' keys";

    expect(result.success).toBe(false);
    expect(result.errorMessage).toBe(`Step 'transaction' failed: ${stepMessage}`);
    expect(result.steps[0].state).toBe("done");
    expect(result.steps[1]).toMatchObject({
      entityName: "transaction",
      success: false,
      state: "failed",
      rowsLoaded: 0,
      errorMessage: stepMessage,
    });
    expect(result.steps[1].validationErrors?.map((e) => e.rule)).toEqual(["referential"]);
    expect(result.steps[1].upsert).toBeUndefined();
    expect(transitions).toEqual([
      "pending->extracting",
      "extracting->validating",
      "validating->failed",
    ]);
    expect(await countRows(db, "accounts")).toBe(1);
    expect(await countRows(db, "transactions")).toBe(0);
    await db.close();
  });

  test("a failed parent skips its dependents", async () => {
    const db = await makeDb();
    const { pipeline, extraction } = makePipeline(db, {
      account: [accountRow({ totalAsset: 100.02 })],
      transaction: [transactionRow()],
    });

    const result = await pipeline.runPipeline();
    expect(result.success).toBe(false);
    expect(result.errorMessage).toBe(
      "Step 'account' failed: account (validating): Validation failed for 'account'" +
        " (1 error, crossField rule): row 0 totalAsset: totalAsset 100.02 does not equal" +
        " cash + frozenCash + marketValue = 100 (discrepancy 0.02, tolerance 0.01)." +
        " Skipped dependent steps: transaction",
    );
    expect(result.steps[1]).toEqual({
      entityName: "transaction",
      success: false,
      state: "skipped",
      rowsLoaded: 0,
      errorMessage: "skipped: step 'account' failed",
    });
    expect(extraction.requested).toEqual(["account"]);
    expect(await countRows(db, "accounts")).toBe(0);
    await db.close();
  });

  test("extraction failures are wrapped", async () => {
    const db = await makeDb();
    const { pipeline } = makePipeline(db, { transaction: [transactionRow()] });
    const result = await pipeline.runPipeline();
    expect(result.steps[0]).toMatchObject({
      state: "failed",
      errorMessage: "account (extracting): Extraction failed: no batch for account",
    });
    await db.close();
  });

  test("coercion failures stop in the coercing state", async () => {
    class BrokenCoercer extends TypeCoercer {
      coerce(): CoercedBatch {
        throw new Error("coercer offline");
      }
    }
    const db = await makeDb();
    const { pipeline } = makePipeline(
      db,
      { account: [accountRow()], transaction: [transactionRow()] },
      { coercer: new BrokenCoercer(createDefaultRegistry()) },
    );
    const result = await pipeline.runPipeline();
    expect(result.steps[0].errorMessage).toBe("account (coercing): coercer offline");
    expect(await countRows(db, "accounts")).toBe(0);
    await db.close();
  });

  test("an upsert failure leaves the step in the upserting state", async () => {
    const db = await makeDb();
    await db.execute(`DROP TABLE "transactions"`);
    await db.execute(`DROP TABLE "accounts"`);
    const { pipeline } = makePipeline(db, {
      account: [accountRow()],
      transaction: [transactionRow()],
    });
    const result = await pipeline.runPipeline();
    expect(result.steps[0].state).toBe("failed");
    expect(result.steps[0].errorMessage?.startsWith(
      "account (upserting): Upsert into 'accounts' failed in update phase (key A1): ",
    )).toBe(true);
    expect(result.steps[0].upsert?.error?.phase).toBe("update");
    await db.close();
  });

  test("an aborted signal skips every remaining step", async () => {
    const db = await makeDb();
    const controller = new AbortController();
    controller.abort();
    const { pipeline, extraction } = makePipeline(db, {
      account: [accountRow()],
      transaction: [transactionRow()],
    });

    const result = await pipeline.runPipeline({ signal: controller.signal });
    expect(result.success).toBe(false);
    expect(result.errorMessage).toBe(
      "Run aborted before 'account'; skipped: account, transaction",
    );
    expect(result.steps.map((s) => s.errorMessage)).toEqual([
      "skipped: run aborted",
      "skipped: run aborted",
    ]);
    expect(extraction.requested).toEqual([]);
    await db.close();
  });

  test("aborting mid-run keeps completed steps", async () => {
    const db = await makeDb();
    const controller = new AbortController();
    const { pipeline } = makePipeline(
      db,
      { account: [accountRow()], transaction: [transactionRow()] },
      {
        onTransition: (entity: string, _from: StepState, to: StepState) => {
          if (entity === "account" && to === "done") controller.abort();
        },
      },
    );

    const result = await pipeline.runPipeline({ signal: controller.signal });
    expect(result.steps.map((s) => s.state)).toEqual(["done", "skipped"]);
    expect(result.errorMessage).toBe("Run aborted before 'transaction'; skipped: transaction");
    expect(await countRows(db, "accounts")).toBe(1);
    await db.close();
  });

  test("post-load runs after a successful run", async () => {
    const db = await makeDb();
    const postLoad = new RecordingPostLoad();
    const { pipeline } = makePipeline(
      db,
      { account: [accountRow()], transaction: [transactionRow()] },
      { postLoad },
    );
    const result = await pipeline.runPipeline();
    expect(result.postLoad).toEqual({ name: "recorder", success: true, errorMessage: null });
    expect(postLoad.seen).toEqual(["account", "transaction"]);
    await db.close();
  });

  test("a failing post-load step does not fail the run", async () => {
    const db = await makeDb();
    const postLoad: PostLoadStep = {
      name: "statistics",
      async run() {
        throw new Error("stats unavailable");
      },
    };
    const { pipeline } = makePipeline(
      db,
      { account: [accountRow()], transaction: [transactionRow()] },
      { postLoad },
    );
    const result = await pipeline.runPipeline();
    expect(result.success).toBe(true);
    expect(result.postLoad).toEqual({
      name: "statistics",
      success: false,
      errorMessage: "stats unavailable",
    });
    await db.close();
  });

  test("post-load is skipped when a step fails", async () => {
    const db = await makeDb();
    const postLoad = new RecordingPostLoad();
    const { pipeline } = makePipeline(
      db,
      { account: [accountRow({ cash: null })], transaction: [transactionRow()] },
      { postLoad },
    );
    const result = await pipeline.runPipeline();
    expect(result.postLoad).toBeUndefined();
    expect(postLoad.seen).toEqual([]);
    await db.close();
  });

  test("rerunning the same batches updates in place", async () => {
    const db = await makeDb();
    const batches = { account: [accountRow()], transaction: [transactionRow()] };
    await makePipeline(db, batches).pipeline.runPipeline();
    const second = await makePipeline(db, batches).pipeline.runPipeline();

    expect(second.success).toBe(true);
    expect(second.steps.map((s) => s.upsert?.updatedRows)).toEqual([1, 1]);
    expect(second.steps.map((s) => s.upsert?.insertedRows)).toEqual([0, 0]);
    expect(await countRows(db, "accounts")).toBe(1);
    expect(await countRows(db, "transactions")).toBe(1);
    await db.close();
  });

  test("registry errors fail the run before any step", async () => {
    const db = await makeDb();
    const { pipeline } = makePipeline(
      db,
      { transaction: [transactionRow()] },
      { registry: new EntityRegistry([TRANSACTION]) },
    );
    const result = await pipeline.runPipeline();
    expect(result.success).toBe(false);
    expect(result.steps).toEqual([]);
    expect(result.errorMessage).toBe(
      "Registry error: Entity type 'account' is not registered. Available: transaction",
    );
    await db.close();
  });
  test("an amount that only matches before rounding is never stored", async () => {
    const db = await makeDb();
    const { pipeline } = makePipeline(db, {
      account: [accountRow()],
      transaction: [
        transactionRow({ tradedPrice: "10.005", tradedVolume: "100", tradedAmount: "1000.50" }),
      ],
    });

    const result = await pipeline.runPipeline();
    expect(result.success).toBe(false);
    expect(result.steps[1]).toMatchObject({ entityName: "transaction", state: "failed" });
    expect(result.steps[1].validationErrors).toEqual([
      {
        rowIndex: 0,
        field: "tradedAmount",
        rule: "crossField",
        message:
          "tradedAmount 1000.50 does not equal tradedPrice * tradedVolume = 1001.00" +
          " (discrepancy 0.50, tolerance 0.01) after rounding to column scale",
      },
    ]);
    expect(await countRows(db, "transactions")).toBe(0);
    await db.close();
  });

  test("a selected child runs against parents already stored", async () => {
    const db = await makeDb();
    await makePipeline(db, { account: [accountRow()] }).pipeline.runPipeline({ only: ["account"] });

    const postLoad = new RecordingPostLoad();
    const { pipeline, extraction } = makePipeline(
      db,
      { transaction: [transactionRow()] },
      { postLoad },
    );
    const result = await pipeline.runPipeline({ only: ["transaction"] });
    expect(result.success).toBe(true);
    expect(result.steps.map((s) => [s.entityName, s.state, s.rowsLoaded])).toEqual([
      ["transaction", "done", 1],
    ]);
    expect(extraction.requested).toEqual(["transaction"]);
    expect(postLoad.seen).toEqual(["transaction"]);
    expect(await countRows(db, "transactions")).toBe(1);
    await db.close();
  });

  test("a selected child without stored parents fails referential checks", async () => {
    const db = await makeDb();
    const { pipeline } = makePipeline(db, { transaction: [transactionRow()] });
    const result = await pipeline.runPipeline({ only: ["transaction"] });
    expect(result.success).toBe(false);
    expect(result.steps).toHaveLength(1);
    expect(result.steps[0].validationErrors?.map((e) => e.message)).toEqual([
      "accountId 'A1' not found among loaded 'account' keys",
    ]);
    await db.close();
  });

  test("selecting an unregistered entity fails the run before any step", async () => {
    const db = await makeDb();
    const { pipeline, extraction } = makePipeline(db, { account: [accountRow()] });
    const result = await pipeline.runPipeline({ only: ["position"] });
    expect(result.success).toBe(false);
    expect(result.steps).toEqual([]);
    expect(result.errorMessage).toBe(
      "Registry error: Entity type 'position' is not registered. Available: account, transaction",
    );
    expect(extraction.requested).toEqual([]);
    await db.close();
  });
});
