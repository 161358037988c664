/**
 * @coinpurse/money — Typed money with settlement.
 *
 * Balances (Money) and payable amounts (Amount) are tagged with their
 * currency at the type level and hold minor units in a chosen numeric
 * representation. Settlement splits a balance against an amount without
 * overflow, negative values or reuse of spent money.
 *
 * Design rules:
 * - No floating-point operations
 * - Currency and kind mismatches are type errors
 * - Settled values are consumed; reading them again throws
 * - Fail-closed: invalid input throws, never silently succeeds
 */

// Currencies
export { Currency, defineCurrency, EUR, SEK, USD, GBP, JPY, KWD } from "./currency.js";
export { CurrencyRegistry } from "./registry.js";
export { isoCurrency, lookupIso, listIsoCurrencies, IsoEntrySchema } from "./iso.js";
export type { IsoCurrencyEntry } from "./iso.js";

// Numeric representations
export {
  unsigned,
  u8,
  u16,
  u32,
  u64,
  u128,
  safeInteger,
  numericByName,
  convertValue,
} from "./numeric.js";
export type { NumericValue, Uint, StockValue } from "./numeric.js";

// Values
export { Monetary } from "./monetary.js";
export { Money } from "./money.js";
export { Amount } from "./amount.js";
export { AmountKind, defineAmountKind, Price, Shipping, Tax, Fee } from "./kind.js";

// Settlement
export { take, pay, tryPay, splitBalance, unpaidAfter, expectValue } from "./settlement.js";
export type { Split } from "./settlement.js";

// Minor-unit arithmetic
export {
  decimalsFor,
  toWholeBigInt,
  parseAmount,
  formatAmount,
  majorToMinor,
  compareMinor,
  assertSameCurrency,
} from "./money-math.js";
export type { IntegerInput, MajorInput } from "./money-math.js";

// Records
export {
  CurrencyCodeSchema,
  MinorUnitScaleSchema,
  NumericNameSchema,
  MoneyRecordSchema,
  AmountRecordSchema,
  moneyFromRecord,
  amountFromRecord,
} from "./records.js";

// Configuration & logging
export { ConfigSchema, loadConfig, parseCurrencyList, registryFromConfig } from "./config.js";
export type { AppConfig } from "./config.js";
export { createLogger } from "./logger.js";
export type { LoggerOptions } from "./logger.js";
export { Cashier, createCashier } from "./cashier.js";
export type { CashierOptions } from "./cashier.js";

// Types & errors
export type {
  MoneyErrorCode,
  TakeResult,
  PaymentResult,
  ChangeResult,
  Ordering,
} from "./types.js";
export { MoneyError, InsufficientFundsError, InvariantViolation } from "./types.js";
