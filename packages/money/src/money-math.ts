/**
 * @coinpurse/money — Minor-unit arithmetic helpers.
 *
 * Converts between major-unit input (numbers, bigints, decimal strings)
 * and bigint minor units, and renders minor units back as decimals.
 *
 * Rules:
 * - No floating-point operations
 * - No negative quantities
 * - Fractions finer than the currency's minor unit are rejected, never rounded
 */

import type { MinorUnitScale } from "@coinpurse/types";
import type { Currency } from "./currency.js";
import { MoneyError } from "./types.js";

/** Input accepted where a whole number of units is expected. */
export type IntegerInput = number | bigint;

/** Input accepted where a major-unit quantity is expected. */
export type MajorInput = IntegerInput | string;

const DECIMALS: Readonly<Record<MinorUnitScale, number>> = {
  1: 0,
  100: 2,
  1000: 3,
};

/**
 * Number of fractional digits implied by a minor-unit scale.
 *
 * 1 → 0, 100 → 2, 1000 → 3
 */
export function decimalsFor(scale: MinorUnitScale): number {
  return DECIMALS[scale];
}

/**
 * Validate a whole, non-negative integer and lift it to bigint.
 */
export function toWholeBigInt(input: IntegerInput): bigint {
  if (typeof input === "bigint") {
    if (input < 0n) {
      throw new MoneyError("INVALID_VALUE", `Monetary values cannot be negative: ${input.toString()}`);
    }
    return input;
  }

  if (!Number.isSafeInteger(input) || input < 0) {
    throw new MoneyError(
      "INVALID_VALUE",
      `Expected a non-negative safe integer, got: ${String(input)}`,
    );
  }
  return BigInt(input);
}

/**
 * Parse an unsigned decimal string into minor units.
 *
 * "100.50" with decimals=2 → 10050n
 * "100" with decimals=3 → 100000n
 */
export function parseAmount(amount: string, decimals: number): bigint {
  const trimmed = amount.trim();

  if (!/^\d+(\.\d+)?$/.test(trimmed)) {
    throw new MoneyError("INVALID_VALUE", `Invalid amount format: "${trimmed}"`);
  }

  const parts = trimmed.split(".");
  const intPart = parts[0] ?? "0";
  const fracPart = parts[1] ?? "";

  if (fracPart.length > decimals) {
    throw new MoneyError(
      "INVALID_VALUE",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, but currency allows ${String(decimals)}`,
    );
  }

  return BigInt(intPart + fracPart.padEnd(decimals, "0"));
}

/**
 * Render minor units as a decimal string.
 *
 * 133n with decimals=2 → "1.33"
 * 5n with decimals=3 → "0.005"
 * 500n with decimals=0 → "500"
 */
export function formatAmount(minor: bigint, decimals: number): string {
  if (decimals === 0) {
    return minor.toString();
  }

  const str = minor.toString().padStart(decimals + 1, "0");
  const intPart = str.slice(0, str.length - decimals);
  const fracPart = str.slice(str.length - decimals);
  return `${intPart}.${fracPart}`;
}

/**
 * Convert major-unit input into minor units for a scale.
 *
 * Numbers and bigints are whole major units; strings may carry a
 * fraction up to the scale's precision.
 */
export function majorToMinor(input: MajorInput, scale: MinorUnitScale): bigint {
  if (typeof input === "string") {
    return parseAmount(input, decimalsFor(scale));
  }
  return toWholeBigInt(input) * BigInt(scale);
}

/**
 * Compare two bigints. Returns -1, 0, or 1.
 */
export function compareMinor(a: bigint, b: bigint): -1 | 0 | 1 {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Assert two currencies are the same code at the same scale.
 *
 * Currencies resolved at run time share the `Currency<string>` type, and a
 * code redeclared with another scale keeps its literal type, so the
 * compiler alone cannot keep them apart.
 *
 * @throws {MoneyError} CURRENCY_MISMATCH
 */
export function assertSameCurrency(a: Currency, b: Currency): void {
  if (a.code !== b.code) {
    throw new MoneyError(
      "CURRENCY_MISMATCH",
      `Cannot operate on different currencies: "${a.code}" vs "${b.code}"`,
    );
  }
  if (a.minorUnit !== b.minorUnit) {
    throw new MoneyError(
      "CURRENCY_MISMATCH",
      `Scale mismatch for currency "${a.code}": ${String(a.minorUnit)} vs ${String(b.minorUnit)}`,
    );
  }
}
