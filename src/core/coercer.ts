/**
 * Type coercer – converts validated, loosely-typed batch values into the
 * physical types declared on each column.
 *
 * A value whose runtime type already matches its column is passed through
 * untouched, so a timestamp that is already a Date is never re-parsed.
 */
import type { ColumnSpec } from "../entities/descriptor.js";
import type { EntityRegistry } from "../entities/registry.js";
import { log } from "../logger.js";
import { Decimal } from "./decimal.js";
import { CoercionError } from "./exceptions.js";
import { parseTimestamp } from "./timestamp.js";
import type { CoercedBatch, CoercedRecord, CoercedValue } from "./types.js";

const INT32_MIN = -(2 ** 31);
const INT32_MAX = 2 ** 31 - 1;

/** Input accepted by the coercer: raw values or already-typed ones. */
export type CoercibleRecord = Record<string, CoercedValue>;

type Converted = { ok: true; value: CoercedValue } | { ok: false; reason: string };

export class TypeCoercer {
  private registry: EntityRegistry;

  constructor(registry: EntityRegistry) {
    this.registry = registry;
  }

  coerce(entityName: string, batch: readonly CoercibleRecord[]): CoercedBatch {
    const descriptor = this.registry.lookup(entityName);
    let passedThrough = 0;

    const records = batch.map((row, rowIndex) => {
      const out: CoercedRecord = {};
      for (const col of descriptor.columns) {
        const value = Object.hasOwn(row, col.name) ? row[col.name] : null;
        if (value === null) {
          if (!col.nullable) {
            throw new CoercionError(entityName, col.name, rowIndex, value, "column is not nullable");
          }
          out[col.name] = null;
          continue;
        }
        if (alreadyTyped(col, value)) {
          passedThrough++;
          out[col.name] = value;
          continue;
        }
        const converted = convert(col, value);
        if (!converted.ok) {
          throw new CoercionError(entityName, col.name, rowIndex, value, converted.reason);
        }
        out[col.name] = converted.value;
      }
      return out;
    });

    log.coercer.debug(
      { entity: entityName, rows: records.length, passedThrough },
      "batch coerced",
    );
    return { entityName, records };
  }
}

function alreadyTyped(col: ColumnSpec, value: Exclude<CoercedValue, null>): boolean {
  switch (col.type) {
    case "string":
      return typeof value === "string";
    case "int32":
      return (
        typeof value === "number" &&
        Number.isInteger(value) &&
        value >= INT32_MIN &&
        value <= INT32_MAX
      );
    case "int64":
      return typeof value === "number" && Number.isSafeInteger(value);
    case "decimal":
      return value instanceof Decimal && value.scale === col.scale;
    case "timestamp":
      return value instanceof Date && !Number.isNaN(value.getTime());
  }
}

function convert(col: ColumnSpec, value: Exclude<CoercedValue, null>): Converted {
  switch (col.type) {
    case "string":
      if (value instanceof Date) return { ok: true, value: value.toISOString() };
      return { ok: true, value: String(value) };

    case "int32":
    case "int64": {
      const parsed = toDecimal(value);
      if (parsed === null || !parsed.isInteger()) {
        return { ok: false, reason: "not an integer" };
      }
      const n = parsed.toNumber();
      const inRange =
        col.type === "int32"
          ? n >= INT32_MIN && n <= INT32_MAX
          : Number.isSafeInteger(n);
      if (!inRange) return { ok: false, reason: `out of ${col.type} range` };
      return { ok: true, value: n };
    }

    case "decimal": {
      const parsed = toDecimal(value);
      if (parsed === null) return { ok: false, reason: "not a decimal number" };
      const rounded = parsed.round(col.scale);
      if (rounded.integerDigits() > col.precision - col.scale) {
        return {
          ok: false,
          reason: `does not fit decimal(${col.precision},${col.scale})`,
        };
      }
      return { ok: true, value: rounded };
    }

    case "timestamp": {
      if (typeof value !== "string") {
        return { ok: false, reason: `expected a string in format ${col.format}` };
      }
      const parsed = parseTimestamp(value, col.format);
      if (parsed === null) {
        return { ok: false, reason: `does not match format ${col.format}` };
      }
      return { ok: true, value: parsed };
    }
  }
}

function toDecimal(value: Exclude<CoercedValue, null>): Decimal | null {
  if (value instanceof Decimal) return value;
  if (value instanceof Date) return null;
  return Decimal.tryParse(value);
}
