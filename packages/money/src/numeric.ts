/**
 * @coinpurse/money — Numeric value contract.
 *
 * A monetary value stores its minor units in some numeric representation.
 * Any representation that implements NumericValue can back Money and
 * Amount; the settlement core only talks to this interface.
 *
 * Rules:
 * - Values are never negative
 * - Subtraction reports underflow as `undefined`, never wraps
 * - Translation from bigint reports overflow as `undefined`, never truncates
 */

import type { NumericName, UintWidth } from "@coinpurse/types";
import type { Ordering } from "./types.js";
import { InvariantViolation } from "./types.js";

declare const uintBrand: unique symbol;

/**
 * An unsigned integer known to fit in `W` bits.
 */
export type Uint<W extends UintWidth> = bigint & { readonly [uintBrand]: W };

/**
 * Capabilities a numeric representation must provide.
 */
export interface NumericValue<V> {
  readonly name: NumericName;

  /** Additive identity. */
  zero(): V;

  /** Largest representable value. Used as the ceiling when widths differ. */
  maxValue(): V;

  compare(a: V, b: V): Ordering;

  equals(a: V, b: V): boolean;

  /** `a - b`, or `undefined` when `b > a`. */
  checkedSub(a: V, b: V): V | undefined;

  /** Express an arbitrary integer in this representation, or `undefined` if it does not fit. */
  tryFrom(raw: bigint): V | undefined;

  toBigInt(value: V): bigint;
}

// ─── Fixed-width unsigned integers ───────────────────────────────────────

const UINT_NAMES: Readonly<Record<UintWidth, NumericName>> = {
  8: "u8",
  16: "u16",
  32: "u32",
  64: "u64",
  128: "u128",
};

function fits<W extends UintWidth>(value: bigint, max: bigint): value is Uint<W> {
  return value >= 0n && value <= max;
}

/**
 * Build the NumericValue for an unsigned integer of `bits` width.
 * One implementation serves every width.
 */
export function unsigned<W extends UintWidth>(bits: W): NumericValue<Uint<W>> {
  const max = (1n << BigInt(bits)) - 1n;

  const tryFrom = (raw: bigint): Uint<W> | undefined => (fits<W>(raw, max) ? raw : undefined);

  const zero = tryFrom(0n);
  const maxValue = tryFrom(max);
  if (zero === undefined || maxValue === undefined) {
    throw new InvariantViolation(`Cannot build bounds for ${UINT_NAMES[bits]}`);
  }

  return {
    name: UINT_NAMES[bits],
    zero: () => zero,
    maxValue: () => maxValue,
    compare: (a, b) => (a < b ? -1 : a > b ? 1 : 0),
    equals: (a, b) => a === b,
    checkedSub: (a, b) => (b > a ? undefined : tryFrom(a - b)),
    tryFrom,
    toBigInt: (value) => value,
  };
}

export const u8 = unsigned(8);
export const u16 = unsigned(16);
export const u32 = unsigned(32);
export const u64 = unsigned(64);
export const u128 = unsigned(128);

// ─── Safe-integer numbers ────────────────────────────────────────────────

const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER);

/**
 * Plain `number` storage, limited to Number.MAX_SAFE_INTEGER so every
 * value is exact.
 */
export const safeInteger: NumericValue<number> = {
  name: "safe",
  zero: () => 0,
  maxValue: () => Number.MAX_SAFE_INTEGER,
  compare: (a, b) => (a < b ? -1 : a > b ? 1 : 0),
  equals: (a, b) => a === b,
  checkedSub: (a, b) => (b > a ? undefined : a - b),
  tryFrom: (raw) => (raw >= 0n && raw <= MAX_SAFE ? Number(raw) : undefined),
  toBigInt: (value) => BigInt(value),
};

// ─── Lookup & translation ────────────────────────────────────────────────

/** Any value held by a stock representation. */
export type StockValue = bigint | number;

const STOCK: Readonly<Record<NumericName, NumericValue<StockValue>>> = {
  u8,
  u16,
  u32,
  u64,
  u128,
  safe: safeInteger,
};

/**
 * Resolve a stock representation by name.
 */
export function numericByName(name: NumericName): NumericValue<StockValue> {
  return STOCK[name];
}

/**
 * Re-express `value` from one representation in another.
 * Returns `undefined` when the target cannot hold it.
 */
export function convertValue<A, B>(
  value: A,
  from: NumericValue<A>,
  to: NumericValue<B>,
): B | undefined {
  return to.tryFrom(from.toBigInt(value));
}
