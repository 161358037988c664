/**
 * @coinpurse/money — Shared shape of Money and Amount.
 *
 * A monetary value is a currency tag, a numeric representation and one
 * value in that representation. The value moves out exactly once: after
 * `consume()` every read throws ALREADY_CONSUMED.
 */

import type { MoneyRecord } from "@coinpurse/types";
import type { Currency } from "./currency.js";
import type { NumericValue } from "./numeric.js";
import { formatAmount } from "./money-math.js";
import { MoneyError } from "./types.js";

/**
 * Accept `value` only if it is a whole, non-negative quantity that
 * survives a round trip through its own representation.
 */
function checkValue<V>(currency: Currency, numeric: NumericValue<V>, value: V): V {
  if (typeof value === "number" && !Number.isInteger(value)) {
    throw new MoneyError("INVALID_VALUE", `Expected whole minor units of ${currency.code}, got: ${String(value)}`);
  }

  const raw = numeric.toBigInt(value);
  if (raw < 0n) {
    throw new MoneyError("INVALID_VALUE", `Monetary values cannot be negative: ${raw.toString()}`);
  }

  const back = numeric.tryFrom(raw);
  if (back === undefined || !numeric.equals(back, value)) {
    throw new MoneyError(
      "VALUE_OUT_OF_RANGE",
      `${formatAmount(raw, currency.decimals)} ${currency.code} does not fit in ${numeric.name}`,
    );
  }
  return value;
}

export abstract class Monetary<C extends string, V> {
  readonly currency: Currency<C>;
  readonly numeric: NumericValue<V>;
  private readonly _value: V;
  private _consumed = false;

  /**
   * @throws {MoneyError} INVALID_VALUE for negative or fractional values,
   *   VALUE_OUT_OF_RANGE when `numeric` cannot hold `value`
   */
  protected constructor(currency: Currency<C>, numeric: NumericValue<V>, value: V) {
    this.currency = currency;
    this.numeric = numeric;
    this._value = checkValue(currency, numeric, value);
  }

  /** Whether the value has been moved out by a settlement. */
  get consumed(): boolean {
    return this._consumed;
  }

  /** Minor units in this value's own representation. */
  get value(): V {
    if (this._consumed) {
      throw new MoneyError(
        "ALREADY_CONSUMED",
        `${this.describe()} in ${this.currency.code} has already been consumed`,
      );
    }
    return this._value;
  }

  /** Minor units as bigint, independent of representation. */
  get minor(): bigint {
    return this.numeric.toBigInt(this.value);
  }

  /** Decimal major-unit rendering without the currency code, e.g. "1.33". */
  get major(): string {
    return formatAmount(this.minor, this.currency.decimals);
  }

  isZero(): boolean {
    return this.minor === 0n;
  }

  /**
   * Move the value out and invalidate this handle.
   * Settlement calls this on both of its inputs.
   */
  consume(): V {
    const value = this.value;
    this._consumed = true;
    return value;
  }

  toRecord(): MoneyRecord {
    return {
      currency: this.currency.code,
      minorUnit: this.currency.minorUnit,
      minor: this.minor.toString(),
      numeric: this.numeric.name,
    };
  }

  toJSON(): MoneyRecord {
    return this.toRecord();
  }

  toString(): string {
    return `${this.major} ${this.currency.code}`;
  }

  protected abstract describe(): string;
}
