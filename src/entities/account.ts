/**
 * Account balances: one row per account, keyed by `accountId`.
 */
import { defineEntity } from "./descriptor.js";
import { AccountType, enumValues } from "./enums.js";

export const ISO_SECONDS = "%Y-%m-%dT%H:%M:%S";

const MONEY = { type: "decimal", precision: 20, scale: 2, sign: "nonNegative" } as const;

export const ACCOUNT = defineEntity({
  name: "account",
  tableName: "accounts",
  conflictKey: "accountId",
  columns: [
    { name: "accountId", type: "string", minLength: 1, maxLength: 20 },
    {
      name: "accountType",
      type: "int32",
      nullable: true,
      enumValues: enumValues(AccountType),
    },
    { name: "cash", ...MONEY },
    { name: "frozenCash", ...MONEY },
    { name: "marketValue", ...MONEY },
    { name: "totalAsset", ...MONEY },
    { name: "updatedAt", type: "timestamp", format: ISO_SECONDS, nullable: true },
  ],
  rules: [
    {
      kind: "sum",
      target: "totalAsset",
      operands: ["cash", "frozenCash", "marketValue"],
    },
  ],
  statistics: {
    aggregates: {
      cash: ["sum", "avg"],
      frozenCash: ["sum"],
      marketValue: ["sum"],
      totalAsset: ["sum", "avg"],
    },
    groupBy: ["accountType"],
  },
});
