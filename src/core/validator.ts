/**
 * Record validator – field and cross-field business rules for one batch.
 *
 * Rule classes run in a fixed order (presence, type/range, cross-field,
 * referential) and validation stops at the first class that reports
 * anything. A batch is accepted or rejected as a whole.
 */
import {
  findColumn,
  type ColumnSpec,
  type CrossFieldRule,
  type EntityDescriptor,
} from "../entities/descriptor.js";
import type { EntityRegistry } from "../entities/registry.js";
import { log } from "../logger.js";
import { Decimal } from "./decimal.js";
import { parseTimestamp } from "./timestamp.js";
import type {
  Batch,
  RawRecord,
  RawValue,
  RuleClass,
  ValidationIssue,
  ValidationOutcome,
} from "./types.js";

export const DEFAULT_TOLERANCE = "0.01";

const INT32_MIN = -(2 ** 31);
const INT32_MAX = 2 ** 31 - 1;

export interface ValidatorOptions {
  /** Absolute tolerance for cross-field equalities, in currency units. */
  tolerance?: number | string;
}

export interface ValidationContext {
  /** Committed conflict-key values of the parent entity. */
  parentKeys?: ReadonlySet<string>;
}

/** A missing column reads as null. */
export function readValue(row: RawRecord, column: string): RawValue {
  return Object.hasOwn(row, column) ? row[column] : null;
}

export class RecordValidator {
  private registry: EntityRegistry;
  private tolerance: Decimal;

  constructor(registry: EntityRegistry, options: ValidatorOptions = {}) {
    this.registry = registry;
    this.tolerance = Decimal.parse(options.tolerance ?? DEFAULT_TOLERANCE);
    if (this.tolerance.isNegative()) {
      throw new RangeError(`Tolerance must not be negative: ${this.tolerance}`);
    }
  }

  validate(
    entityName: string,
    batch: Batch,
    context: ValidationContext = {},
  ): ValidationOutcome {
    const descriptor = this.registry.lookup(entityName);
    log.validator.debug({ entity: entityName, rows: batch.length }, "validating batch");

    const classes: Array<[RuleClass, () => ValidationIssue[]]> = [
      ["presence", () => this.checkPresence(descriptor, batch)],
      ["type", () => this.checkTypes(descriptor, batch)],
      ["crossField", () => this.checkCrossField(descriptor, batch)],
      ["referential", () => this.checkReferences(descriptor, batch, context)],
    ];

    for (const [rule, check] of classes) {
      const errors = check();
      if (errors.length > 0) {
        log.validator.info(
          { entity: entityName, rule, errors: errors.length },
          "batch rejected",
        );
        return { valid: false, errors };
      }
    }

    log.validator.debug({ entity: entityName }, "batch accepted");
    return { valid: true, errors: [], passedData: batch };
  }

  // ------------------------------------------------------------------
  // 1. Presence
  // ------------------------------------------------------------------

  private checkPresence(d: EntityDescriptor, batch: Batch): ValidationIssue[] {
    const known = new Set(d.columns.map((c) => c.name));
    const issues: ValidationIssue[] = [];

    batch.forEach((row, rowIndex) => {
      for (const col of d.columns) {
        if (!col.nullable && readValue(row, col.name) === null) {
          issues.push({
            rowIndex,
            field: col.name,
            rule: "presence",
            message: `required column '${col.name}' is null`,
          });
        }
      }
      for (const key of Object.keys(row)) {
        if (!known.has(key)) {
          issues.push({
            rowIndex,
            field: key,
            rule: "presence",
            message: `unexpected column '${key}' for entity '${d.name}'`,
          });
        }
      }
    });
    return issues;
  }

  // ------------------------------------------------------------------
  // 2. Type / range
  // ------------------------------------------------------------------

  private checkTypes(d: EntityDescriptor, batch: Batch): ValidationIssue[] {
    const issues: ValidationIssue[] = [];
    batch.forEach((row, rowIndex) => {
      for (const col of d.columns) {
        const value = readValue(row, col.name);
        if (value === null) continue;
        const message = checkColumnValue(col, value);
        if (message !== null) {
          issues.push({ rowIndex, field: col.name, rule: "type", message });
        }
      }
    });
    return issues;
  }

  // ------------------------------------------------------------------
  // 3. Cross-field arithmetic
  // ------------------------------------------------------------------

  private checkCrossField(d: EntityDescriptor, batch: Batch): ValidationIssue[] {
    const issues: ValidationIssue[] = [];
    batch.forEach((row, rowIndex) => {
      for (const rule of d.rules) {
        const message = this.checkRule(d, rule, row);
        if (message !== null) {
          issues.push({ rowIndex, field: rule.target, rule: "crossField", message });
        }
      }
    });
    return issues;
  }

  /**
   * Checks the rule on the values as supplied, then on the values as they
   * will be stored (decimals rounded to their column scale).
   */
  private checkRule(d: EntityDescriptor, rule: CrossFieldRule, row: RawRecord): string | null {
    const names = [rule.target, ...rule.operands];
    const parsed = names.map((name) => {
      const raw = readValue(row, name);
      return raw === null ? null : Decimal.tryParse(raw);
    });
    // Null operands are left to the presence rules.
    const values = parsed.filter((v): v is Decimal => v !== null);
    if (values.length !== names.length) return null;

    const supplied = this.compareRule(rule, values);
    if (supplied !== null) return supplied;

    const stored = values.map((value, idx) => {
      const col = findColumn(d, names[idx]);
      return col?.type === "decimal" ? value.round(col.scale) : value;
    });
    const rounded = this.compareRule(rule, stored);
    return rounded === null ? null : `${rounded} after rounding to column scale`;
  }

  private compareRule(rule: CrossFieldRule, [target, ...operands]: Decimal[]): string | null {
    const computed =
      rule.kind === "sum"
        ? operands.reduce((acc, v) => acc.add(v), Decimal.zero())
        : operands.reduce((acc, v) => acc.mul(v), new Decimal(1n, 0));

    const discrepancy = target.sub(computed).abs();
    if (discrepancy.compare(this.tolerance) <= 0) return null;

    const op = rule.kind === "sum" ? " + " : " * ";
    return (
      `${rule.target} ${target} does not equal ${rule.operands.join(op)} = ${computed}` +
      ` (discrepancy ${discrepancy}, tolerance ${this.tolerance})`
    );
  }

  // ------------------------------------------------------------------
  // 4. Referential existence
  // ------------------------------------------------------------------

  private checkReferences(
    d: EntityDescriptor,
    batch: Batch,
    context: ValidationContext,
  ): ValidationIssue[] {
    const column = d.parentKeyColumn;
    if (column === null || d.parentEntity === null) return [];

    const keys = context.parentKeys ?? new Set<string>();
    const issues: ValidationIssue[] = [];
    batch.forEach((row, rowIndex) => {
      const value = readValue(row, column);
      if (value === null || keys.has(String(value))) return;
      issues.push({
        rowIndex,
        field: column,
        rule: "referential",
        message: `${column} '${value}' not found among loaded '${d.parentEntity}' keys`,
      });
    });
    return issues;
  }
}

/** Type/range check for one non-null value; returns a message or null. */
export function checkColumnValue(col: ColumnSpec, value: string | number): string | null {
  switch (col.type) {
    case "string": {
      const text = String(value);
      if (col.minLength !== undefined && text.length < col.minLength) {
        return `length ${text.length} is below minimum ${col.minLength}`;
      }
      if (col.maxLength !== undefined && text.length > col.maxLength) {
        return `length ${text.length} exceeds maximum ${col.maxLength}`;
      }
      return null;
    }

    case "int32":
    case "int64": {
      const parsed = Decimal.tryParse(value);
      if (parsed === null || !parsed.isInteger()) {
        return `'${value}' is not an integer`;
      }
      const n = parsed.toNumber();
      if (col.type === "int32" && (n < INT32_MIN || n > INT32_MAX)) {
        return `${parsed} is outside the 32-bit integer range`;
      }
      if (col.type === "int64" && !Number.isSafeInteger(n)) {
        return `${parsed} is outside the safe 64-bit integer range`;
      }
      if (col.quantity && n <= 0) {
        return `quantity must be a positive integer, got ${parsed}`;
      }
      if (col.enumValues && !col.enumValues.includes(n)) {
        return `${parsed} is not one of ${col.enumValues.join(", ")}`;
      }
      return null;
    }

    case "decimal": {
      const parsed = Decimal.tryParse(value);
      if (parsed === null) return `'${value}' is not a decimal number`;
      if (col.sign === "nonNegative" && parsed.isNegative()) {
        return `must be non-negative, got ${parsed}`;
      }
      if (col.sign === "positive" && (parsed.isNegative() || parsed.isZero())) {
        return `must be positive, got ${parsed}`;
      }
      if (parsed.round(col.scale).integerDigits() > col.precision - col.scale) {
        return `${parsed} does not fit decimal(${col.precision},${col.scale})`;
      }
      return null;
    }

    case "timestamp": {
      if (typeof value !== "string" || parseTimestamp(value, col.format) === null) {
        return `'${value}' does not match timestamp format ${col.format}`;
      }
      return null;
    }
  }
}
