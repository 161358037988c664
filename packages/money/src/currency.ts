/**
 * @coinpurse/money — Currency tags.
 *
 * A Currency<C> is declared once and carries its code as a literal type,
 * so Money<"EUR", …> and Money<"SEK", …> are unrelated types. The
 * currency is also the factory for balances and amounts in it.
 *
 * Scaling policy:
 * - `money`, `amount`: input is in major units and is scaled by minorUnit
 * - `moneyInMinor`, `amountInMinor`: input is already in minor units
 */

import type { CurrencyInfo, MinorUnitScale } from "@coinpurse/types";
import { isCurrencyCode, isMinorUnitScale } from "@coinpurse/types";
import type { AmountKind } from "./kind.js";
import type { NumericValue, Uint } from "./numeric.js";
import { u64 } from "./numeric.js";
import type { IntegerInput, MajorInput } from "./money-math.js";
import { decimalsFor, formatAmount, majorToMinor, toWholeBigInt } from "./money-math.js";
import { Money } from "./money.js";
import { Amount } from "./amount.js";
import { MoneyError } from "./types.js";

export class Currency<C extends string = string> {
  readonly code: C;
  readonly minorUnit: MinorUnitScale;
  /** Fractional digits shown when rendering: 0, 2 or 3. */
  readonly decimals: number;

  constructor(code: C, minorUnit: MinorUnitScale) {
    if (!isCurrencyCode(code)) {
      throw new MoneyError("INVALID_CURRENCY", `Currency code must be three upper-case letters, got: "${code}"`);
    }
    if (!isMinorUnitScale(minorUnit)) {
      throw new MoneyError(
        "INVALID_CURRENCY",
        `Minor unit scale for ${code} must be 1, 100 or 1000, got: ${String(minorUnit)}`,
      );
    }
    this.code = code;
    this.minorUnit = minorUnit;
    this.decimals = decimalsFor(minorUnit);
  }

  // ─── Balances ──────────────────────────────────────────────────────────

  /**
   * Money from major units: `SEK.money(1)` is 100 öre,
   * `SEK.money("1.33")` is 133 öre.
   */
  money(value: MajorInput): Money<C, Uint<64>>;
  money<V>(value: MajorInput, numeric: NumericValue<V>): Money<C, V>;
  money<V>(value: MajorInput, numeric?: NumericValue<V>): Money<C, V> | Money<C, Uint<64>> {
    const minor = majorToMinor(value, this.minorUnit);
    return numeric === undefined ? this.wrapMoney(minor, u64) : this.wrapMoney(minor, numeric);
  }

  /** Money from minor units: `SEK.moneyInMinor(133)` renders "1.33 SEK". */
  moneyInMinor(value: IntegerInput): Money<C, Uint<64>>;
  moneyInMinor<V>(value: IntegerInput, numeric: NumericValue<V>): Money<C, V>;
  moneyInMinor<V>(value: IntegerInput, numeric?: NumericValue<V>): Money<C, V> | Money<C, Uint<64>> {
    const minor = toWholeBigInt(value);
    return numeric === undefined ? this.wrapMoney(minor, u64) : this.wrapMoney(minor, numeric);
  }

  zero(): Money<C, Uint<64>>;
  zero<V>(numeric: NumericValue<V>): Money<C, V>;
  zero<V>(numeric?: NumericValue<V>): Money<C, V> | Money<C, Uint<64>> {
    return numeric === undefined ? this.wrapMoney(0n, u64) : this.wrapMoney(0n, numeric);
  }

  // ─── Payable amounts ───────────────────────────────────────────────────

  /** Amount of `kind` from major units. */
  amount<K extends string>(kind: AmountKind<K>, value: MajorInput): Amount<K, C, Uint<64>>;
  amount<K extends string, V>(kind: AmountKind<K>, value: MajorInput, numeric: NumericValue<V>): Amount<K, C, V>;
  amount<K extends string, V>(
    kind: AmountKind<K>,
    value: MajorInput,
    numeric?: NumericValue<V>,
  ): Amount<K, C, V> | Amount<K, C, Uint<64>> {
    const minor = majorToMinor(value, this.minorUnit);
    return numeric === undefined ? this.wrapAmount(kind, minor, u64) : this.wrapAmount(kind, minor, numeric);
  }

  /** Amount of `kind` from minor units. */
  amountInMinor<K extends string>(kind: AmountKind<K>, value: IntegerInput): Amount<K, C, Uint<64>>;
  amountInMinor<K extends string, V>(
    kind: AmountKind<K>,
    value: IntegerInput,
    numeric: NumericValue<V>,
  ): Amount<K, C, V>;
  amountInMinor<K extends string, V>(
    kind: AmountKind<K>,
    value: IntegerInput,
    numeric?: NumericValue<V>,
  ): Amount<K, C, V> | Amount<K, C, Uint<64>> {
    const minor = toWholeBigInt(value);
    return numeric === undefined ? this.wrapAmount(kind, minor, u64) : this.wrapAmount(kind, minor, numeric);
  }

  // ─── Identity ──────────────────────────────────────────────────────────

  equals(other: Currency): boolean {
    return this.code === other.code && this.minorUnit === other.minorUnit;
  }

  toInfo(): CurrencyInfo {
    return { code: this.code, minorUnit: this.minorUnit };
  }

  toString(): string {
    return this.code;
  }

  private wrapMoney<V>(minor: bigint, numeric: NumericValue<V>): Money<C, V> {
    const currency: Currency<C> = this;
    return new Money(currency, numeric, this.fit(minor, numeric));
  }

  private wrapAmount<K extends string, V>(kind: AmountKind<K>, minor: bigint, numeric: NumericValue<V>): Amount<K, C, V> {
    const currency: Currency<C> = this;
    return new Amount(kind, currency, numeric, this.fit(minor, numeric));
  }

  private fit<V>(minor: bigint, numeric: NumericValue<V>): V {
    const value = numeric.tryFrom(minor);
    if (value === undefined) {
      throw new MoneyError(
        "VALUE_OUT_OF_RANGE",
        `${formatAmount(minor, this.decimals)} ${this.code} does not fit in ${numeric.name}`,
      );
    }
    return value;
  }
}

/**
 * Declare a currency.
 *
 * ```ts
 * const SEK = defineCurrency("SEK", 100);
 * SEK.moneyInMinor(133).toString(); // "1.33 SEK"
 * ```
 */
export function defineCurrency<C extends string>(code: C, minorUnit: MinorUnitScale): Currency<C> {
  return new Currency(code, minorUnit);
}

// ─── Stock currencies ────────────────────────────────────────────────────

export const EUR = defineCurrency("EUR", 100);
export const SEK = defineCurrency("SEK", 100);
export const USD = defineCurrency("USD", 100);
export const GBP = defineCurrency("GBP", 100);
export const JPY = defineCurrency("JPY", 1);
export const KWD = defineCurrency("KWD", 1000);
