/**
 * @coinpurse/money — Amount, something owed in one currency.
 *
 * Amount<K, C, V> is a payable quantity of kind K (Price, Shipping, …).
 * It is shaped like Money but is a different type, and two kinds never
 * stand in for one another even in the same currency and width.
 */

import type { AmountRecord } from "@coinpurse/types";
import type { Currency } from "./currency.js";
import type { AmountKind } from "./kind.js";
import type { Money } from "./money.js";
import type { NumericValue } from "./numeric.js";
import type { ChangeResult, Ordering } from "./types.js";
import { Monetary } from "./monetary.js";
import { assertSameCurrency, compareMinor } from "./money-math.js";

export class Amount<K extends string, C extends string, V> extends Monetary<C, V> {
  readonly kind: AmountKind<K>;

  constructor(kind: AmountKind<K>, currency: Currency<C>, numeric: NumericValue<V>, value: V) {
    super(currency, numeric, value);
    this.kind = kind;
  }

  /** Same kind, currency and minor-unit value, whatever the representations. */
  equals<W>(other: Amount<K, C, W>): boolean {
    return (
      this.kind.name === other.kind.name &&
      this.currency.equals(other.currency) &&
      this.minor === other.minor
    );
  }

  /**
   * Compare against a balance by minor units.
   *
   * @throws {MoneyError} CURRENCY_MISMATCH
   */
  compareTo<W>(money: Money<C, W>): Ordering {
    assertSameCurrency(this.currency, money.currency);
    return compareMinor(this.minor, money.minor);
  }

  /** True when `money` cannot cover this amount in full. */
  exceeds<W>(money: Money<C, W>): boolean {
    return this.compareTo(money) > 0;
  }

  /**
   * Settle this amount out of `money`, accepting partial payment.
   * Consumes both. Same split as `money.pay(this)`.
   */
  payWith<MV>(money: Money<C, MV>): ChangeResult<C, MV, K, V> {
    const self: Amount<K, C, V> = this;
    const { remaining, unpaid } = money.pay(self);
    return { unpaid, change: remaining };
  }

  override toRecord(): AmountRecord {
    return { ...super.toRecord(), kind: this.kind.name };
  }

  override toJSON(): AmountRecord {
    return this.toRecord();
  }

  override toString(): string {
    return `${super.toString()} (${this.kind.name})`;
  }

  protected override describe(): string {
    return this.kind.name;
  }
}
