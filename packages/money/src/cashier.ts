/**
 * @coinpurse/money — Cashier.
 *
 * Runs settlements and records them in a structured log. The arithmetic
 * is exactly Money.take / pay / tryPay; the cashier adds the log lines
 * and opens balances in the configured representation.
 */

import type { Logger } from "pino";
import type { NumericName } from "@coinpurse/types";
import type { Amount } from "./amount.js";
import type { Currency } from "./currency.js";
import type { AmountKind } from "./kind.js";
import type { Money } from "./money.js";
import type { MajorInput } from "./money-math.js";
import type { NumericValue, StockValue } from "./numeric.js";
import { numericByName } from "./numeric.js";
import type { AppConfig } from "./config.js";
import { createLogger } from "./logger.js";
import type { PaymentResult, TakeResult } from "./types.js";
import { InsufficientFundsError } from "./types.js";

export interface CashierOptions {
  readonly logger: Logger;
  /** Representation for `open` and `bill`. Defaults to u64. */
  readonly numeric?: NumericName | undefined;
}

export class Cashier {
  private readonly logger: Logger;
  private readonly numeric: NumericValue<StockValue>;

  constructor(options: CashierOptions) {
    this.logger = options.logger;
    this.numeric = numericByName(options.numeric ?? "u64");
  }

  /** A balance of `value` major units in the configured representation. */
  open<C extends string>(currency: Currency<C>, value: MajorInput): Money<C, StockValue> {
    return currency.money(value, this.numeric);
  }

  /** An amount of `value` major units in the configured representation. */
  bill<K extends string, C extends string>(
    kind: AmountKind<K>,
    currency: Currency<C>,
    value: MajorInput,
  ): Amount<K, C, StockValue> {
    return currency.amount(kind, value, this.numeric);
  }

  take<C extends string, MV, K extends string, AV>(
    money: Money<C, MV>,
    amount: Amount<K, NoInfer<C>, AV>,
  ): TakeResult<C, MV, K, AV> {
    const balance = money.minor;
    const requested = amount.minor;
    const result = money.take(amount);

    this.logger.debug(
      {
        currency: money.currency.code,
        kind: amount.kind.name,
        balance: balance.toString(),
        requested: requested.toString(),
        taken: result.taken.minor.toString(),
        remaining: result.remaining.minor.toString(),
      },
      "Amount taken",
    );
    return result;
  }

  pay<C extends string, MV, K extends string, AV>(
    money: Money<C, MV>,
    amount: Amount<K, NoInfer<C>, AV>,
  ): PaymentResult<C, MV, K, AV> {
    const balance = money.minor;
    const requested = amount.minor;
    const result = money.pay(amount);

    this.logger.debug(
      {
        currency: money.currency.code,
        kind: amount.kind.name,
        balance: balance.toString(),
        requested: requested.toString(),
        unpaid: result.unpaid.minor.toString(),
        remaining: result.remaining.minor.toString(),
      },
      "Payment settled",
    );
    return result;
  }

  /**
   * Guarded payment. A refusal is logged at warn and rethrown.
   */
  tryPay<C extends string, MV, K extends string, AV>(
    money: Money<C, MV>,
    amount: Amount<K, NoInfer<C>, AV>,
  ): Money<C, MV> {
    const requested = amount.minor;
    try {
      const remaining = money.tryPay(amount);
      this.logger.debug(
        {
          currency: remaining.currency.code,
          kind: amount.kind.name,
          paid: requested.toString(),
          remaining: remaining.minor.toString(),
        },
        "Payment settled in full",
      );
      return remaining;
    } catch (err) {
      if (err instanceof InsufficientFundsError) {
        this.logger.warn(
          {
            currency: money.currency.code,
            kind: amount.kind.name,
            required: err.required.minor.toString(),
            available: err.available.minor.toString(),
          },
          "Insufficient funds",
        );
      }
      throw err;
    }
  }
}

/**
 * Cashier wired from configuration: pino logger at LOG_LEVEL and the
 * COINPURSE_NUMERIC representation.
 */
export function createCashier(config: AppConfig): Cashier {
  return new Cashier({
    logger: createLogger({ level: config.LOG_LEVEL, pretty: config.LOG_PRETTY }),
    numeric: config.COINPURSE_NUMERIC,
  });
}
