/**
 * Runtime Type Guards
 *
 * Narrowing functions for coinpurse types.
 * Used where values cross a boundary (deserialized records, configuration).
 */

import type { CurrencyCode, MinorUnitScale } from "./currency.js";
import { MINOR_UNIT_SCALES } from "./currency.js";
import type { NumericName } from "./numeric.js";
import { NUMERIC_NAMES } from "./numeric.js";
import type { MoneyRecord, AmountRecord } from "./record.js";

const CURRENCY_CODE = /^[A-Z]{3}$/;
const MINOR_DIGITS = /^\d+$/;
const SCALES = new Set<unknown>(MINOR_UNIT_SCALES);
const NUMERICS = new Set<unknown>(NUMERIC_NAMES);

export function isCurrencyCode(value: unknown): value is CurrencyCode {
  return typeof value === "string" && CURRENCY_CODE.test(value);
}

export function isMinorUnitScale(value: unknown): value is MinorUnitScale {
  return SCALES.has(value);
}

export function isNumericName(value: unknown): value is NumericName {
  return NUMERICS.has(value);
}

export function isMoneyRecord(value: unknown): value is MoneyRecord {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isCurrencyCode(v.currency) &&
    isMinorUnitScale(v.minorUnit) &&
    typeof v.minor === "string" &&
    MINOR_DIGITS.test(v.minor) &&
    isNumericName(v.numeric)
  );
}

export function isAmountRecord(value: unknown): value is AmountRecord {
  if (!isMoneyRecord(value) || !("kind" in value)) return false;
  return typeof value.kind === "string" && value.kind.length > 0;
}
