/**
 * @coinpurse/money — Errors and settlement result shapes.
 *
 * Rules:
 * - Recoverable conditions are MoneyError with a code
 * - Broken numeric contracts are InvariantViolation, never a MoneyError
 * - Settlement results are fresh values; the inputs are consumed
 */

import type { Money } from "./money.js";
import type { Amount } from "./amount.js";

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for recoverable money operations. */
export type MoneyErrorCode =
  | "INVALID_VALUE"
  | "VALUE_OUT_OF_RANGE"
  | "INVALID_CURRENCY"
  | "UNKNOWN_CURRENCY"
  | "DUPLICATE_CURRENCY"
  | "INVALID_KIND"
  | "CURRENCY_MISMATCH"
  | "ALREADY_CONSUMED"
  | "INVALID_RECORD"
  | "INVALID_CONFIG"
  | "INSUFFICIENT_FUNDS";

/**
 * Structured error for recoverable failures.
 * Always thrown, never returned as a code.
 */
export class MoneyError extends Error {
  public readonly code: MoneyErrorCode;

  constructor(code: MoneyErrorCode, message: string) {
    super(message);
    this.name = "MoneyError";
    this.code = code;
  }
}

/**
 * Thrown by guarded payment when the balance cannot cover the amount.
 *
 * Neither value is consumed: `available` can be topped up and paid again.
 */
export class InsufficientFundsError<C extends string, MV, K extends string, AV> extends MoneyError {
  public readonly required: Amount<K, C, AV>;
  public readonly available: Money<C, MV>;

  constructor(required: Amount<K, C, AV>, available: Money<C, MV>) {
    super(
      "INSUFFICIENT_FUNDS",
      `Not enough money. Required: ${required.toString()}, available: ${available.toString()}`,
    );
    this.name = "InsufficientFundsError";
    this.required = required;
    this.available = available;
  }
}

/**
 * A numeric representation broke its own contract: a subtraction or
 * translation that the settlement branch proved safe came back empty.
 *
 * Not part of the recoverable surface. Callers should let it propagate.
 */
export class InvariantViolation extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvariantViolation";
  }
}

// ─── Settlement Results ──────────────────────────────────────────────────

/**
 * Result of `take`: what is left of the balance and how much of the
 * amount it covered.
 */
export interface TakeResult<C extends string, MV, K extends string, AV> {
  readonly remaining: Money<C, MV>;
  readonly taken: Amount<K, C, AV>;
}

/**
 * Result of `pay`: what is left of the balance and what is still owed.
 */
export interface PaymentResult<C extends string, MV, K extends string, AV> {
  readonly remaining: Money<C, MV>;
  readonly unpaid: Amount<K, C, AV>;
}

/**
 * Result of `Amount.payWith`: the same split, named from the payee's side.
 */
export interface ChangeResult<C extends string, MV, K extends string, AV> {
  readonly unpaid: Amount<K, C, AV>;
  readonly change: Money<C, MV>;
}

/** Three-way comparison outcome. */
export type Ordering = -1 | 0 | 1;
