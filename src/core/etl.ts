/**
 * ETL pipeline core – collaborator interfaces and the ETLPipeline runner.
 *
 * Entity types run strictly one after another, parents first. Each step
 * moves pending → extracting → validating → coercing → upserting → done,
 * or to failed from any state. A failed step ends the run: every later
 * step is recorded as skipped.
 */
import { randomUUID } from "node:crypto";

import type { DatabaseBackend } from "../db/backend.js";
import { SqlEntityStore, type EntityStore } from "../db/store.js";
import { columnNames, type EntityDescriptor } from "../entities/descriptor.js";
import type { EntityRegistry } from "../entities/registry.js";
import { log } from "../logger.js";
import type { StorageBackend } from "../storage/backend.js";
import { TypeCoercer } from "./coercer.js";
import {
  ExtractionFailedException,
  ValidationError,
} from "./exceptions.js";
import type {
  Batch,
  PipelineRunResult,
  PipelineStepResult,
  PostLoadResult,
  StepState,
} from "./types.js";
import { UpsertEngine } from "./upsert.js";
import { RecordValidator } from "./validator.js";

// ---------------------------------------------------------------------------
// Collaborator interfaces
// ---------------------------------------------------------------------------

/** Supplies one raw batch per entity type and run. */
export interface ExtractionStrategy {
  extract(entity: EntityDescriptor, storage: StorageBackend): Promise<Batch>;
}

/** Work run after every entity step succeeded; its failure never fails the run. */
export interface PostLoadStep {
  readonly name: string;
  run(entities: readonly EntityDescriptor[], db: DatabaseBackend): Promise<void>;
}

export type TransitionListener = (
  entityName: string,
  from: StepState,
  to: StepState,
) => void;

export interface ETLPipelineOptions {
  registry: EntityRegistry;
  extraction: ExtractionStrategy;
  storage: StorageBackend;
  db: DatabaseBackend;
  validator?: RecordValidator;
  coercer?: TypeCoercer;
  postLoad?: PostLoadStep;
  onTransition?: TransitionListener;
}

export interface RunOptions {
  /** Checked between entity steps only. */
  signal?: AbortSignal;
  /**
   * Run only these entity types. A parent left out is not re-run; its rows
   * already in the database serve as the referential key set.
   */
  only?: readonly string[];
}

// ---------------------------------------------------------------------------
// Pipeline runner
// ---------------------------------------------------------------------------

export class ETLPipeline {
  private registry: EntityRegistry;
  private extraction: ExtractionStrategy;
  private storage: StorageBackend;
  private db: DatabaseBackend;
  private validator: RecordValidator;
  private coercer: TypeCoercer;
  private postLoad: PostLoadStep | null;
  private onTransition: TransitionListener | null;

  constructor(opts: ETLPipelineOptions) {
    this.registry = opts.registry;
    this.extraction = opts.extraction;
    this.storage = opts.storage;
    this.db = opts.db;
    this.validator = opts.validator ?? new RecordValidator(opts.registry);
    this.coercer = opts.coercer ?? new TypeCoercer(opts.registry);
    this.postLoad = opts.postLoad ?? null;
    this.onTransition = opts.onTransition ?? null;
  }

  /** Run every registered (or every selected) entity type once. Never rejects. */
  async runPipeline(options: RunOptions = {}): Promise<PipelineRunResult> {
    const runId = randomUUID();
    const startedAt = new Date();
    const runLog = log.pipeline.child({ runId });
    runLog.info("run started");

    const steps: PipelineStepResult[] = [];
    let errorMessage: string | null = null;

    let entities: EntityDescriptor[];
    try {
      entities = this.registry.orderedEntities();
      if (options.only) {
        const selected = new Set(options.only.map((name) => this.registry.lookup(name).name));
        entities = entities.filter((e) => selected.has(e.name));
      }
    } catch (err) {
      errorMessage = `Registry error: ${describe(err)}`;
      runLog.error({ err }, "run aborted before first step");
      return { runId, success: false, steps, startedAt, completedAt: new Date(), errorMessage };
    }

    const store = new SqlEntityStore(this.db);
    const scheduled = new Set(entities.map((e) => e.name));
    const succeeded = new Set<string>();

    for (const [idx, entity] of entities.entries()) {
      if (options.signal?.aborted) {
        errorMessage = `Run aborted before '${entity.name}'; skipped: ${entities
          .slice(idx)
          .map((e) => e.name)
          .join(", ")}`;
        steps.push(...entities.slice(idx).map((e) => skippedStep(e.name, "run aborted")));
        runLog.warn({ entity: entity.name }, "run aborted");
        break;
      }

      const step = await this.runStep(entity, store, scheduled, succeeded);
      steps.push(step);
      if (step.success) {
        succeeded.add(entity.name);
        continue;
      }

      const rest = entities.slice(idx + 1);
      steps.push(...rest.map((e) => skippedStep(e.name, `step '${entity.name}' failed`)));
      errorMessage =
        `Step '${entity.name}' failed: ${step.errorMessage}` +
        (rest.length > 0
          ? `. Skipped dependent steps: ${rest.map((e) => e.name).join(", ")}`
          : "");
      break;
    }

    const success = errorMessage === null;
    const result: PipelineRunResult = {
      runId,
      success,
      steps,
      startedAt,
      completedAt: new Date(),
      errorMessage,
    };

    if (success && this.postLoad) {
      result.postLoad = await this.runPostLoad(this.postLoad, entities);
      result.completedAt = new Date();
    }

    runLog.info(
      {
        success,
        durationMs: result.completedAt.getTime() - startedAt.getTime(),
        rows: steps.reduce((s, st) => s + st.rowsLoaded, 0),
      },
      success ? "run completed" : "run failed",
    );
    return result;
  }

  private async runStep(
    entity: EntityDescriptor,
    store: EntityStore,
    scheduled: ReadonlySet<string>,
    succeeded: ReadonlySet<string>,
  ): Promise<PipelineStepResult> {
    let state: StepState = "pending";
    const move = (to: StepState): void => {
      log.pipeline.debug({ entity: entity.name, from: state, to }, "step transition");
      this.onTransition?.(entity.name, state, to);
      state = to;
    };

    const step: PipelineStepResult = {
      entityName: entity.name,
      success: false,
      state,
      rowsLoaded: 0,
      errorMessage: null,
    };

    try {
      const parent = this.registry.parentOf(entity);
      if (parent && scheduled.has(parent.name) && !succeeded.has(parent.name)) {
        throw new Error(`parent step '${parent.name}' has not completed`);
      }

      move("extracting");
      let batch: Batch;
      try {
        batch = await this.extraction.extract(entity, this.storage);
      } catch (err) {
        throw err instanceof ExtractionFailedException
          ? err
          : new ExtractionFailedException(describe(err));
      }

      const parentKeys = parent
        ? await store.listKeys(parent.tableName, parent.conflictKey)
        : undefined;

      move("validating");
      const outcome = this.validator.validate(entity.name, batch, { parentKeys });
      if (!outcome.valid) {
        step.validationErrors = outcome.errors;
        throw new ValidationError(entity.name, outcome.errors);
      }

      move("coercing");
      const coerced = this.coercer.coerce(entity.name, outcome.passedData);

      move("upserting");
      const upsert = await new UpsertEngine(store).upsert(
        coerced.records,
        entity.tableName,
        entity.conflictKey,
        columnNames(entity),
      );
      step.upsert = upsert;
      if (upsert.error) throw upsert.error;

      step.rowsLoaded = upsert.updatedRows + upsert.insertedRows;
      step.success = true;
      move("done");
    } catch (err) {
      step.errorMessage = `${entity.name} (${state}): ${describe(err)}`;
      log.pipeline.error({ err, entity: entity.name, state }, "step failed");
      move("failed");
    }

    step.state = state;
    return step;
  }

  private async runPostLoad(
    postLoad: PostLoadStep,
    entities: readonly EntityDescriptor[],
  ): Promise<PostLoadResult> {
    try {
      await postLoad.run(entities, this.db);
      return { name: postLoad.name, success: true, errorMessage: null };
    } catch (err) {
      log.pipeline.warn({ err, step: postLoad.name }, "post-load step failed");
      return { name: postLoad.name, success: false, errorMessage: describe(err) };
    }
  }
}

function skippedStep(entityName: string, reason: string): PipelineStepResult {
  return {
    entityName,
    success: false,
    state: "skipped",
    rowsLoaded: 0,
    errorMessage: `skipped: ${reason}`,
  };
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
