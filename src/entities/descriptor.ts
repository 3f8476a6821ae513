/**
 * Entity descriptors: the static, validated description of one entity type
 * (table, conflict key, typed columns, parent link, cross-field rules).
 *
 * Descriptors are built once at startup through `defineEntity`, which
 * rejects malformed input with an InvalidDescriptorError and freezes the
 * result. Nothing re-interprets them per row.
 */
import { z } from "zod";
import { InvalidDescriptorError } from "../core/exceptions.js";
import { compileTimestampFormat } from "../core/timestamp.js";

// ---------------------------------------------------------------------------
// Column schemas
// ---------------------------------------------------------------------------

const identifier = z
  .string()
  .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, "must be a plain SQL identifier");

const ColumnBase = z.object({
  name: identifier,
  nullable: z.boolean().default(false),
});

const StringColumnSchema = ColumnBase.extend({
  type: z.literal("string"),
  minLength: z.number().int().min(0).optional(),
  maxLength: z.number().int().positive().optional(),
});

const integerFields = {
  /** Quantity columns must hold a positive integer. */
  quantity: z.boolean().default(false),
  /** Closed value set for enumerated columns. */
  enumValues: z.array(z.number().int()).min(1).optional(),
};

const Int32ColumnSchema = ColumnBase.extend({
  type: z.literal("int32"),
  ...integerFields,
});

const Int64ColumnSchema = ColumnBase.extend({
  type: z.literal("int64"),
  ...integerFields,
});

const DecimalColumnSchema = ColumnBase.extend({
  type: z.literal("decimal"),
  precision: z.number().int().min(1).max(38),
  scale: z.number().int().min(0),
  sign: z.enum(["any", "nonNegative", "positive"]).default("any"),
}).refine((c) => c.scale <= c.precision, {
  message: "scale must not exceed precision",
});

const TimestampColumnSchema = ColumnBase.extend({
  type: z.literal("timestamp"),
  format: z.string().min(1),
});

const ColumnSchema = z.union([
  StringColumnSchema,
  Int32ColumnSchema,
  Int64ColumnSchema,
  DecimalColumnSchema,
  TimestampColumnSchema,
]);

export type ColumnSpec = z.infer<typeof ColumnSchema>;
export type ColumnSpecInput = z.input<typeof ColumnSchema>;
export type ColumnType = ColumnSpec["type"];
export type DecimalColumn = Extract<ColumnSpec, { type: "decimal" }>;
export type IntegerColumn = Extract<ColumnSpec, { type: "int32" | "int64" }>;

// ---------------------------------------------------------------------------
// Cross-field rules and statistics
// ---------------------------------------------------------------------------

const CrossFieldRuleSchema = z.object({
  kind: z.enum(["sum", "product"]),
  target: identifier,
  operands: z.array(identifier).min(2),
});

export type CrossFieldRule = z.infer<typeof CrossFieldRuleSchema>;

const AggregateSchema = z.enum(["sum", "avg", "min", "max"]);
export type Aggregate = z.infer<typeof AggregateSchema>;

const StatisticsSchema = z.object({
  aggregates: z.record(identifier, z.array(AggregateSchema).min(1)).default({}),
  groupBy: z.array(identifier).default([]),
});

export type StatisticsConfig = z.infer<typeof StatisticsSchema>;

// ---------------------------------------------------------------------------
// Entity descriptor
// ---------------------------------------------------------------------------

const EntityDescriptorSchema = z.object({
  name: z.string().min(1),
  tableName: identifier,
  conflictKey: identifier,
  columns: z.array(ColumnSchema).nonempty(),
  parentEntity: z.string().min(1).optional(),
  parentKeyColumn: identifier.optional(),
  referencedKeyColumn: identifier.optional(),
  rules: z.array(CrossFieldRuleSchema).default([]),
  statistics: StatisticsSchema.default({}),
});

export type EntityDescriptorInput = z.input<typeof EntityDescriptorSchema>;

export interface EntityDescriptor {
  readonly name: string;
  readonly tableName: string;
  readonly conflictKey: string;
  readonly columns: readonly ColumnSpec[];
  readonly parentEntity: string | null;
  readonly parentKeyColumn: string | null;
  readonly referencedKeyColumn: string | null;
  readonly rules: readonly CrossFieldRule[];
  readonly statistics: StatisticsConfig;
}

/** Physical column names in declared order. */
export function columnNames(descriptor: EntityDescriptor): string[] {
  return descriptor.columns.map((c) => c.name);
}

export function findColumn(
  descriptor: EntityDescriptor,
  name: string,
): ColumnSpec | undefined {
  return descriptor.columns.find((c) => c.name === name);
}

function checkReferences(d: z.infer<typeof EntityDescriptorSchema>): string[] {
  const issues: string[] = [];
  const byName = new Map<string, ColumnSpec>();
  for (const col of d.columns) {
    if (byName.has(col.name)) issues.push(`duplicate column '${col.name}'`);
    byName.set(col.name, col);
    if (col.type === "timestamp") {
      try {
        compileTimestampFormat(col.format);
      } catch (err) {
        issues.push(`column '${col.name}': ${String(err)}`);
      }
    }
  }

  const key = byName.get(d.conflictKey);
  if (!key) {
    issues.push(`conflictKey '${d.conflictKey}' is not a declared column`);
  } else if (key.nullable) {
    issues.push(`conflictKey '${d.conflictKey}' must not be nullable`);
  }

  const parentFields = [d.parentEntity, d.parentKeyColumn, d.referencedKeyColumn];
  const declared = parentFields.filter((f) => f !== undefined).length;
  if (declared !== 0 && declared !== 3) {
    issues.push(
      "parentEntity, parentKeyColumn and referencedKeyColumn must be declared together",
    );
  }
  if (d.parentEntity === d.name) {
    issues.push("an entity cannot be its own parent");
  }
  if (d.parentKeyColumn !== undefined && !byName.has(d.parentKeyColumn)) {
    issues.push(`parentKeyColumn '${d.parentKeyColumn}' is not a declared column`);
  }

  for (const rule of d.rules) {
    for (const ref of [rule.target, ...rule.operands]) {
      const col = byName.get(ref);
      if (!col) {
        issues.push(`${rule.kind} rule references unknown column '${ref}'`);
      } else if (col.type !== "decimal" && col.type !== "int32" && col.type !== "int64") {
        issues.push(`${rule.kind} rule column '${ref}' is not numeric`);
      }
    }
  }

  for (const ref of [...Object.keys(d.statistics.aggregates), ...d.statistics.groupBy]) {
    if (!byName.has(ref)) issues.push(`statistics reference unknown column '${ref}'`);
  }

  return issues;
}

/** Validate and freeze a descriptor. */
export function defineEntity(input: EntityDescriptorInput): EntityDescriptor {
  const parsed = EntityDescriptorSchema.safeParse(input);
  const label = typeof input.name === "string" && input.name ? input.name : "(unnamed)";
  if (!parsed.success) {
    throw new InvalidDescriptorError(
      label,
      parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`),
    );
  }

  const d = parsed.data;
  const issues = checkReferences(d);
  if (issues.length > 0) throw new InvalidDescriptorError(label, issues);

  return Object.freeze({
    name: d.name,
    tableName: d.tableName,
    conflictKey: d.conflictKey,
    columns: Object.freeze(d.columns.map((c) => Object.freeze(c))),
    parentEntity: d.parentEntity ?? null,
    parentKeyColumn: d.parentKeyColumn ?? null,
    referencedKeyColumn: d.referencedKeyColumn ?? null,
    rules: Object.freeze(d.rules.map((r) => Object.freeze(r))),
    statistics: Object.freeze(d.statistics),
  });
}
