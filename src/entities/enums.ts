/**
 * Closed value sets for enumerated account and transaction columns.
 */

export enum AccountType {
  Future = 1,
  Security = 2,
  Credit = 3,
  FutureOption = 5,
  StockOption = 6,
  ShanghaiHkConnect = 7,
  ShenzhenHkConnect = 11,
}

/** Trade direction. Stock trades carry NotApplicable. */
export enum Direction {
  NotApplicable = 0,
  Long = 48,
  Short = 49,
}

/** Open/close flag; values are the ASCII codes '0'..'6' used by trading systems. */
export enum OffsetFlag {
  Open = 48,
  Close = 49,
  ForceClose = 50,
  CloseToday = 51,
  CloseYesterday = 52,
  ForceOff = 53,
  LocalForceClose = 54,
}

/** Numeric members of a numeric TypeScript enum. */
export function enumValues(e: object): number[] {
  return Object.values(e).filter((v): v is number => typeof v === "number");
}
