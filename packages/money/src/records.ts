/**
 * @coinpurse/money — Reading monetary values back from records.
 *
 * Records arrive as untrusted JSON. They are validated with Zod, checked
 * against the currency (and kind) the caller expects, and re-expressed
 * in the caller's numeric representation.
 */

import { z } from "zod";
import type { ZodError } from "zod";
import type { MinorUnitScale, MoneyRecord } from "@coinpurse/types";
import { isMinorUnitScale, MINOR_UNIT_SCALES, NUMERIC_NAMES } from "@coinpurse/types";
import type { Amount } from "./amount.js";
import type { Currency } from "./currency.js";
import type { AmountKind } from "./kind.js";
import type { Money } from "./money.js";
import type { NumericValue } from "./numeric.js";
import { MoneyError } from "./types.js";

// =============================================================================
// Schemas
// =============================================================================

export const CurrencyCodeSchema = z.string().regex(/^[A-Z]{3}$/, "must be three upper-case letters");

export const MinorUnitScaleSchema = z.custom<MinorUnitScale>(isMinorUnitScale, {
  message: `must be one of ${MINOR_UNIT_SCALES.join(", ")}`,
});

export const NumericNameSchema = z.enum(NUMERIC_NAMES);

export const MoneyRecordSchema = z.object({
  currency: CurrencyCodeSchema,
  minorUnit: MinorUnitScaleSchema,
  minor: z.string().regex(/^\d+$/, "must be base-10 digits"),
  numeric: NumericNameSchema,
});

export const AmountRecordSchema = MoneyRecordSchema.extend({
  kind: z.string().min(1),
});

// =============================================================================
// Parsing
// =============================================================================

function formatZodErrors(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

function parseRecord<T>(schema: z.ZodType<T>, input: unknown): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new MoneyError("INVALID_RECORD", `Invalid monetary record: ${formatZodErrors(result.error)}`);
  }
  return result.data;
}

function assertCurrency(record: MoneyRecord, currency: Currency): void {
  if (record.currency !== currency.code || record.minorUnit !== currency.minorUnit) {
    throw new MoneyError(
      "CURRENCY_MISMATCH",
      `Record is in ${record.currency} (scale ${String(record.minorUnit)}), expected ${currency.code} (scale ${String(currency.minorUnit)})`,
    );
  }
}

/**
 * Rebuild Money from a record.
 *
 * @throws {MoneyError} INVALID_RECORD, CURRENCY_MISMATCH, or
 *   VALUE_OUT_OF_RANGE when the value does not fit `numeric`
 */
export function moneyFromRecord<C extends string, V>(
  input: unknown,
  currency: Currency<C>,
  numeric: NumericValue<V>,
): Money<C, V> {
  const record = parseRecord(MoneyRecordSchema, input);
  assertCurrency(record, currency);
  return currency.moneyInMinor(BigInt(record.minor), numeric);
}

/**
 * Rebuild an Amount of `kind` from a record.
 *
 * @throws {MoneyError} INVALID_RECORD, CURRENCY_MISMATCH, INVALID_KIND, or
 *   VALUE_OUT_OF_RANGE when the value does not fit `numeric`
 */
export function amountFromRecord<K extends string, C extends string, V>(
  input: unknown,
  kind: AmountKind<K>,
  currency: Currency<C>,
  numeric: NumericValue<V>,
): Amount<K, C, V> {
  const record = parseRecord(AmountRecordSchema, input);
  assertCurrency(record, currency);
  if (record.kind !== kind.name) {
    throw new MoneyError("INVALID_KIND", `Record is a ${record.kind} amount, expected ${kind.name}`);
  }
  return currency.amountInMinor(kind, BigInt(record.minor), numeric);
}
