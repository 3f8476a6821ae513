/**
 * Custom exceptions for registry, validation, coercion and load operations.
 */
import type { ValidationIssue } from "./types.js";

export class ExtractionFailedException extends Error {
  constructor(message?: string) {
    super(message ? `Extraction failed: ${message}` : "Extraction failed");
    this.name = "ExtractionFailedException";
  }
}

// ---------------------------------------------------------------------------
// Registry misuse
// ---------------------------------------------------------------------------

export class DuplicateEntityError extends Error {
  entityName: string;

  constructor(entityName: string) {
    super(`Entity type '${entityName}' is already registered`);
    this.name = "DuplicateEntityError";
    this.entityName = entityName;
  }
}

export class UnknownEntityError extends Error {
  entityName: string;

  constructor(entityName: string, available: string[] = []) {
    super(
      `Entity type '${entityName}' is not registered. Available: ${
        available.length > 0 ? available.join(", ") : "(none)"
      }`,
    );
    this.name = "UnknownEntityError";
    this.entityName = entityName;
  }
}

export class InvalidDescriptorError extends Error {
  entityName: string;
  issues: string[];

  constructor(entityName: string, issues: string[]) {
    super(`Invalid descriptor for '${entityName}': ${issues.join("; ")}`);
    this.name = "InvalidDescriptorError";
    this.entityName = entityName;
    this.issues = issues;
  }
}

// ---------------------------------------------------------------------------
// Pipeline step failures
// ---------------------------------------------------------------------------

const MAX_LISTED_ISSUES = 5;

export class ValidationError extends Error {
  entityName: string;
  issues: ValidationIssue[];

  constructor(entityName: string, issues: ValidationIssue[]) {
    const listed = issues
      .slice(0, MAX_LISTED_ISSUES)
      .map((i) => `row ${i.rowIndex} ${i.field}: ${i.message}`);
    const more =
      issues.length > MAX_LISTED_ISSUES
        ? ` (+${issues.length - MAX_LISTED_ISSUES} more)`
        : "";
    super(
      `Validation failed for '${entityName}' (${issues.length} ${
        issues.length === 1 ? "error" : "errors"
      }, ${issues[0]?.rule ?? "unknown"} rule): ${listed.join("; ")}${more}`,
    );
    this.name = "ValidationError";
    this.entityName = entityName;
    this.issues = issues;
  }
}

export class CoercionError extends Error {
  entityName: string;
  column: string;
  rowIndex: number;
  value: unknown;

  constructor(
    entityName: string,
    column: string,
    rowIndex: number,
    value: unknown,
    reason: string,
  ) {
    super(
      `Cannot coerce '${entityName}.${column}' at row ${rowIndex} (${JSON.stringify(
        value,
      )}): ${reason}`,
    );
    this.name = "CoercionError";
    this.entityName = entityName;
    this.column = column;
    this.rowIndex = rowIndex;
    this.value = value;
  }
}

export type UpsertPhase = "stage" | "update" | "insert";

export class UpsertError extends Error {
  tableName: string;
  phase: UpsertPhase;
  key: string | null;

  constructor(
    tableName: string,
    phase: UpsertPhase,
    key: string | null,
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      `Upsert into '${tableName}' failed in ${phase} phase${
        key !== null ? ` (key ${key})` : ""
      }: ${reason}`,
      { cause },
    );
    this.name = "UpsertError";
    this.tableName = tableName;
    this.phase = phase;
    this.key = key;
  }
}
