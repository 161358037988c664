/**
 * @coinpurse/money — Money, a balance in one currency.
 *
 * Money<C, V> is funds in hand: currency C, minor units held in
 * representation V. Money of different currencies never meets in one
 * operation; that is a type error, not a runtime check.
 *
 * Settling money consumes it. The result carries a fresh Money for what
 * is left.
 */

import type { Currency } from "./currency.js";
import type { NumericValue } from "./numeric.js";
import type { TakeResult, PaymentResult, Ordering } from "./types.js";
import { InsufficientFundsError } from "./types.js";
import { Monetary } from "./monetary.js";
import { Amount } from "./amount.js";
import { assertSameCurrency, compareMinor } from "./money-math.js";
import { splitBalance, unpaidAfter } from "./settlement.js";

export class Money<C extends string, V> extends Monetary<C, V> {
  constructor(currency: Currency<C>, numeric: NumericValue<V>, value: V) {
    super(currency, numeric, value);
  }

  /** Same currency and minor-unit value, whatever the representations. */
  equals<W>(other: Money<C, W>): boolean {
    return this.currency.equals(other.currency) && this.minor === other.minor;
  }

  /** @throws {MoneyError} CURRENCY_MISMATCH */
  compare<W>(other: Money<C, W>): Ordering {
    assertSameCurrency(this.currency, other.currency);
    return compareMinor(this.minor, other.minor);
  }

  /**
   * Cover as much of `amount` as this balance allows.
   *
   * Returns the remaining balance and the part of the amount that was
   * covered, in the amount's representation. Never fails for lack of
   * funds: a short balance is emptied and `taken` reports only what it
   * held. Consumes this money and the amount.
   *
   * @throws {MoneyError} CURRENCY_MISMATCH before anything is consumed
   */
  take<K extends string, AV>(amount: Amount<K, C, AV>): TakeResult<C, V, K, AV> {
    assertSameCurrency(this.currency, amount.currency);
    const split = splitBalance(this.value, this.numeric, amount.value, amount.numeric);
    this.consume();
    amount.consume();

    return {
      remaining: new Money(this.currency, this.numeric, split.remaining),
      taken: new Amount(amount.kind, amount.currency, amount.numeric, split.taken),
    };
  }

  /**
   * Pay `amount`, accepting partial payment.
   *
   * Returns the remaining balance and what is still owed, as a new
   * amount of the same kind. Consumes this money and the amount.
   *
   * @throws {MoneyError} CURRENCY_MISMATCH before anything is consumed
   */
  pay<K extends string, AV>(amount: Amount<K, C, AV>): PaymentResult<C, V, K, AV> {
    assertSameCurrency(this.currency, amount.currency);
    const requested = amount.value;
    const split = splitBalance(this.value, this.numeric, requested, amount.numeric);
    const unpaid = unpaidAfter(requested, split.taken, amount.numeric);
    this.consume();
    amount.consume();

    return {
      remaining: new Money(this.currency, this.numeric, split.remaining),
      unpaid: new Amount(amount.kind, amount.currency, amount.numeric, unpaid),
    };
  }

  /**
   * Pay `amount` in full and return the change.
   *
   * @throws {InsufficientFundsError} when the amount exceeds this balance;
   *   nothing is consumed in that case
   * @throws {MoneyError} CURRENCY_MISMATCH before anything is consumed
   */
  tryPay<K extends string, AV>(amount: Amount<K, C, AV>): Money<C, V> {
    assertSameCurrency(this.currency, amount.currency);
    const self: Money<C, V> = this;
    if (amount.exceeds(self)) {
      throw new InsufficientFundsError<C, V, K, AV>(amount, self);
    }
    return this.pay(amount).remaining;
  }

  protected override describe(): string {
    return "Money";
  }
}
