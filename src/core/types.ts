/**
 * Batch, outcome and run-result types shared across the pipeline.
 */
import type { Decimal } from "./decimal.js";
import type { UpsertError } from "./exceptions.js";

/** A loosely-typed field value as supplied by extraction. */
export type RawValue = string | number | null;

/** A field value after coercion to its physical column type. */
export type CoercedValue = string | number | Decimal | Date | null;

export type RawRecord = Record<string, RawValue>;
export type CoercedRecord = Record<string, CoercedValue>;

/** Ordered records for one entity type, keyed by physical column name. */
export type Batch = RawRecord[];

/** A coerced batch, tagged with the entity type it belongs to. */
export interface CoercedBatch {
  entityName: string;
  records: CoercedRecord[];
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

export type RuleClass = "presence" | "type" | "crossField" | "referential";

export interface ValidationIssue {
  rowIndex: number;
  field: string;
  message: string;
  rule: RuleClass;
}

export type ValidationOutcome =
  | { valid: true; errors: []; passedData: Batch }
  | { valid: false; errors: ValidationIssue[]; passedData?: undefined };

// ---------------------------------------------------------------------------
// Upsert
// ---------------------------------------------------------------------------

export interface UpsertResult {
  attemptedRows: number;
  updatedRows: number;
  insertedRows: number;
  /** Rows folded into a later row with the same conflict key. */
  collapsedRows: number;
  error?: UpsertError;
}

// ---------------------------------------------------------------------------
// Pipeline
// ---------------------------------------------------------------------------

export type StepState =
  | "pending"
  | "extracting"
  | "validating"
  | "coercing"
  | "upserting"
  | "done"
  | "failed"
  | "skipped";

export interface PipelineStepResult {
  entityName: string;
  success: boolean;
  state: StepState;
  rowsLoaded: number;
  errorMessage: string | null;
  validationErrors?: ValidationIssue[];
  upsert?: UpsertResult;
}

export interface PostLoadResult {
  name: string;
  success: boolean;
  errorMessage: string | null;
}

export interface PipelineRunResult {
  runId: string;
  success: boolean;
  steps: PipelineStepResult[];
  startedAt: Date;
  completedAt: Date;
  errorMessage: string | null;
  postLoad?: PostLoadResult;
}
