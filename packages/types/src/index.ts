/**
 * @coinpurse/types — Shared types for the coinpurse packages.
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - Values carry minor units only; formatting lives in @coinpurse/money
 */

// Currency types
export type { CurrencyCode, MinorUnitScale, CurrencyInfo } from "./currency.js";
export { MINOR_UNIT_SCALES } from "./currency.js";

// Numeric representation names
export type { NumericName, UintWidth } from "./numeric.js";
export { NUMERIC_NAMES } from "./numeric.js";

// Serialized records
export type { MoneyRecord, AmountRecord } from "./record.js";

// Runtime type guards
export {
  isCurrencyCode,
  isMinorUnitScale,
  isNumericName,
  isMoneyRecord,
  isAmountRecord,
} from "./guards.js";
