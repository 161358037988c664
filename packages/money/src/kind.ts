/**
 * @coinpurse/money — Named kinds of payable amount.
 *
 * Each kind is its own type parameter on Amount. `Shipping.of(EUR, 12)`
 * and `Price.of(EUR, 12)` hold the same value but cannot be swapped.
 */

import type { Amount } from "./amount.js";
import type { Currency } from "./currency.js";
import type { IntegerInput, MajorInput } from "./money-math.js";
import type { NumericValue, Uint } from "./numeric.js";
import { MoneyError } from "./types.js";

const KIND_NAME = /^[A-Za-z][A-Za-z0-9_-]*$/;

export class AmountKind<K extends string = string> {
  readonly name: K;

  constructor(name: K) {
    if (!KIND_NAME.test(name)) {
      throw new MoneyError("INVALID_KIND", `Amount kind must start with a letter, got: "${name}"`);
    }
    this.name = name;
  }

  /** An amount of this kind from major units. */
  of<C extends string>(currency: Currency<C>, value: MajorInput): Amount<K, C, Uint<64>>;
  of<C extends string, V>(currency: Currency<C>, value: MajorInput, numeric: NumericValue<V>): Amount<K, C, V>;
  of<C extends string, V>(
    currency: Currency<C>,
    value: MajorInput,
    numeric?: NumericValue<V>,
  ): Amount<K, C, V> | Amount<K, C, Uint<64>> {
    const kind: AmountKind<K> = this;
    return numeric === undefined ? currency.amount(kind, value) : currency.amount(kind, value, numeric);
  }

  /** An amount of this kind from minor units. */
  inMinor<C extends string>(currency: Currency<C>, value: IntegerInput): Amount<K, C, Uint<64>>;
  inMinor<C extends string, V>(currency: Currency<C>, value: IntegerInput, numeric: NumericValue<V>): Amount<K, C, V>;
  inMinor<C extends string, V>(
    currency: Currency<C>,
    value: IntegerInput,
    numeric?: NumericValue<V>,
  ): Amount<K, C, V> | Amount<K, C, Uint<64>> {
    const kind: AmountKind<K> = this;
    return numeric === undefined
      ? currency.amountInMinor(kind, value)
      : currency.amountInMinor(kind, value, numeric);
  }

  toString(): string {
    return this.name;
  }
}

export function defineAmountKind<K extends string>(name: K): AmountKind<K> {
  return new AmountKind(name);
}

// ─── Stock kinds ─────────────────────────────────────────────────────────

export const Price = defineAmountKind("Price");
export const Shipping = defineAmountKind("Shipping");
export const Tax = defineAmountKind("Tax");
export const Fee = defineAmountKind("Fee");
