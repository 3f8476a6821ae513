/**
 * Unit tests for TypeCoercer.
 */
import { describe, test, expect } from "vitest";
import { TypeCoercer, type CoercibleRecord } from "../src/core/coercer.js";
import { Decimal } from "../src/core/decimal.js";
import { CoercionError } from "../src/core/exceptions.js";
import { createDefaultRegistry } from "../src/entities/registry.js";
import { accountRow, transactionRow } from "./fixtures.js";

const coercer = new TypeCoercer(createDefaultRegistry());

function decimalText(value: unknown): string {
  if (!(value instanceof Decimal)) throw new Error(`not a Decimal: ${String(value)}`);
  return value.toString();
}

describe("TypeCoercer", () => {
  test("money columns become decimal(20,2)", () => {
    const { entityName, records } = coercer.coerce("account", [accountRow()]);
    expect(entityName).toBe("account");
    expect(records).toHaveLength(1);
    const [row] = records;
    expect(row.accountId).toBe("A1");
    expect(decimalText(row.cash)).toBe("100.00");
    expect(decimalText(row.frozenCash)).toBe("0.00");
    expect(decimalText(row.totalAsset)).toBe("100.00");
    expect(row.accountType).toBeNull();
    expect(row.updatedAt).toBeNull();
  });

  test("every declared column is present, unknown ones are dropped", () => {
    const { records } = coercer.coerce("account", [{ ...accountRow(), extra: "x" }]);
    expect(Object.keys(records[0])).toEqual([
      "accountId",
      "accountType",
      "cash",
      "frozenCash",
      "marketValue",
      "totalAsset",
      "updatedAt",
    ]);
  });

  test("transaction row", () => {
    const [row] = coercer.coerce("transaction", [transactionRow()]).records;
    expect(row.accountType).toBe(2);
    expect(row.tradedVolume).toBe(100);
    expect(row.direction).toBe(0);
    expect(row.offsetFlag).toBe(48);
    expect(decimalText(row.tradedPrice)).toBe("10.50");
    expect(decimalText(row.tradedAmount)).toBe("1050.00");
    expect(row.tradedTime).toEqual(new Date("2025-01-02T09:30:00.000Z"));
    expect(row.strategyName).toBe("momentum");
    expect(row.orderRemark).toBeNull();
  });

  test("rounds half away from zero to the column scale", () => {
    const [row] = coercer.coerce("account", [
      accountRow({ cash: "2.345", frozenCash: "2.344", marketValue: "0.005" }),
    ]).records;
    expect(decimalText(row.cash)).toBe("2.35");
    expect(decimalText(row.frozenCash)).toBe("2.34");
    expect(decimalText(row.marketValue)).toBe("0.01");
  });

  test("already-typed values pass through", () => {
    const updatedAt = new Date("2025-06-01T00:00:00Z");
    const cash = new Decimal(10000n, 2);
    const typed: CoercibleRecord = { ...accountRow(), cash, accountType: 2, updatedAt };
    const [row] = coercer.coerce("account", [typed]).records;
    expect(row.cash).toBe(cash);
    expect(row.updatedAt).toBe(updatedAt);
    expect(row.accountType).toBe(2);
  });

  test("a decimal at another scale is re-rounded", () => {
    const typed: CoercibleRecord = { ...accountRow(), cash: new Decimal(12345n, 3) };
    const [row] = coercer.coerce("account", [typed]).records;
    expect(decimalText(row.cash)).toBe("12.35");
  });

  test("unconvertible value", () => {
    expect(() => coercer.coerce("account", [accountRow({ cash: "abc" })])).toThrow(
      `Cannot coerce 'account.cash' at row 0 ("abc"): not a decimal number`,
    );
  });

  test("null in a non-nullable column", () => {
    const attempt = () =>
      coercer.coerce("account", [accountRow(), accountRow({ accountId: null })]);
    expect(attempt).toThrow(CoercionError);
    expect(attempt).toThrow(
      "Cannot coerce 'account.accountId' at row 1 (null): column is not nullable",
    );
  });

  test("precision overflow", () => {
    expect(() =>
      coercer.coerce("account", [accountRow({ cash: "1".repeat(19) })]),
    ).toThrow("does not fit decimal(20,2)");
  });

  test("non-integer into an integer column", () => {
    expect(() => coercer.coerce("account", [accountRow({ accountType: "3.5" })])).toThrow(
      `Cannot coerce 'account.accountType' at row 0 ("3.5"): not an integer`,
    );
  });

  test("the input batch is not modified", () => {
    const input = accountRow();
    coercer.coerce("account", [input]);
    expect(input.cash).toBe(100);
  });
});
