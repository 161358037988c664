/**
 * @coinpurse/money — Settlement core.
 *
 * Applies a balance against a payable amount held in possibly different
 * numeric representations and splits it into what remains and what was
 * taken.
 *
 * Rules:
 * - Never produces a negative quantity
 * - An amount too large for the balance's representation is clamped to
 *   that representation's maximum, so it simply reads as unaffordable
 * - Nothing is taken beyond what the balance holds
 * - A translation or subtraction the branch proved safe must succeed;
 *   if it does not, the numeric contract is broken and InvariantViolation
 *   is thrown
 */

import type { Money } from "./money.js";
import type { Amount } from "./amount.js";
import type { NumericValue } from "./numeric.js";
import { convertValue } from "./numeric.js";
import type { TakeResult, PaymentResult } from "./types.js";
import { InvariantViolation } from "./types.js";

// ─── Raw split ───────────────────────────────────────────────────────────

/**
 * Outcome of applying a balance to a requested amount, in raw values.
 */
export interface Split<MV, AV> {
  /** What is left of the balance, in the balance's representation. */
  readonly remaining: MV;
  /** How much of the request was covered, in the amount's representation. */
  readonly taken: AV;
}

/**
 * Unwrap a value the caller has proven to exist.
 */
export function expectValue<T>(value: T | undefined, violation: string): T {
  if (value === undefined) {
    throw new InvariantViolation(violation);
  }
  return value;
}

/**
 * Split `balance` against `requested`.
 *
 * needed < balance → remaining = balance − needed, taken = requested
 * needed = balance → remaining = 0, taken = balance
 * needed > balance → remaining = 0, taken = balance
 */
export function splitBalance<MV, AV>(
  balance: MV,
  balanceNumeric: NumericValue<MV>,
  requested: AV,
  amountNumeric: NumericValue<AV>,
): Split<MV, AV> {
  const needed = convertValue(requested, amountNumeric, balanceNumeric) ?? balanceNumeric.maxValue();

  if (balanceNumeric.compare(needed, balance) < 0) {
    return {
      remaining: expectValue(
        balanceNumeric.checkedSub(balance, needed),
        `${balanceNumeric.name} subtraction underflowed although the balance is larger`,
      ),
      taken: expectValue(
        convertValue(needed, balanceNumeric, amountNumeric),
        `Requested amount no longer fits in ${amountNumeric.name}`,
      ),
    };
  }

  // Equal or short: the whole balance goes.
  return {
    remaining: balanceNumeric.zero(),
    taken: expectValue(
      convertValue(balance, balanceNumeric, amountNumeric),
      `Balance does not fit in ${amountNumeric.name} although it does not exceed the amount`,
    ),
  };
}

/**
 * What is still owed after `taken` was covered out of `requested`.
 */
export function unpaidAfter<AV>(requested: AV, taken: AV, amountNumeric: NumericValue<AV>): AV {
  return expectValue(
    amountNumeric.checkedSub(requested, taken),
    `${amountNumeric.name} subtraction underflowed: more was taken than requested`,
  );
}

// ─── Functional forms ────────────────────────────────────────────────────

/**
 * Take as much of `amount` as `money` covers. Consumes both.
 */
export function take<C extends string, MV, K extends string, AV>(
  money: Money<C, MV>,
  amount: Amount<K, NoInfer<C>, AV>,
): TakeResult<C, MV, K, AV> {
  return money.take(amount);
}

/**
 * Pay `amount` out of `money`, accepting partial payment. Consumes both.
 */
export function pay<C extends string, MV, K extends string, AV>(
  money: Money<C, MV>,
  amount: Amount<K, NoInfer<C>, AV>,
): PaymentResult<C, MV, K, AV> {
  return money.pay(amount);
}

/**
 * Pay `amount` in full or throw InsufficientFundsError without consuming
 * anything. Returns the change.
 */
export function tryPay<C extends string, MV, K extends string, AV>(
  money: Money<C, MV>,
  amount: Amount<K, NoInfer<C>, AV>,
): Money<C, MV> {
  return money.tryPay(amount);
}
