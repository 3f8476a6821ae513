/**
 * Executed trades, keyed by `tradedId` and owned by an account.
 */
import { ISO_SECONDS } from "./account.js";
import { defineEntity } from "./descriptor.js";
import { AccountType, Direction, OffsetFlag, enumValues } from "./enums.js";

const PRICE = { type: "decimal", precision: 20, scale: 2, sign: "positive" } as const;

export const TRANSACTION = defineEntity({
  name: "transaction",
  tableName: "transactions",
  conflictKey: "tradedId",
  parentEntity: "account",
  parentKeyColumn: "accountId",
  referencedKeyColumn: "accountId",
  columns: [
    { name: "accountId", type: "string", minLength: 1, maxLength: 20 },
    { name: "accountType", type: "int32", nullable: true, enumValues: enumValues(AccountType) },
    { name: "tradedId", type: "string", minLength: 1, maxLength: 50 },
    { name: "stockCode", type: "string", minLength: 1, maxLength: 10 },
    { name: "tradedTime", type: "timestamp", format: ISO_SECONDS },
    { name: "tradedPrice", ...PRICE },
    { name: "tradedVolume", type: "int32", quantity: true },
    { name: "tradedAmount", ...PRICE },
    { name: "strategyName", type: "string", minLength: 1, maxLength: 50 },
    { name: "orderRemark", type: "string", nullable: true, maxLength: 100 },
    { name: "direction", type: "int32", enumValues: enumValues(Direction) },
    { name: "offsetFlag", type: "int32", enumValues: enumValues(OffsetFlag) },
    { name: "createdAt", type: "timestamp", format: ISO_SECONDS, nullable: true },
    { name: "updatedAt", type: "timestamp", format: ISO_SECONDS, nullable: true },
  ],
  rules: [
    {
      kind: "product",
      target: "tradedAmount",
      operands: ["tradedPrice", "tradedVolume"],
    },
  ],
  statistics: {
    aggregates: {
      tradedVolume: ["sum", "avg"],
      tradedAmount: ["sum"],
      tradedPrice: ["avg"],
    },
    groupBy: ["accountType", "offsetFlag", "strategyName"],
  },
});
