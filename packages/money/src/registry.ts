/**
 * @coinpurse/money — Currency registry.
 *
 * Resolves currency codes that only exist at run time (configuration,
 * deserialized records) to Currency tags.
 *
 * Rules:
 * - A code is registered at most once
 * - Registered currencies win over the ISO table
 * - Registered currencies cannot be modified or removed
 */

import { Currency } from "./currency.js";
import { isoCurrency } from "./iso.js";
import { MoneyError } from "./types.js";

export class CurrencyRegistry {
  private readonly _currencies: Map<string, Currency> = new Map();

  /**
   * Register a currency.
   * Throws if the code is already registered.
   */
  register<C extends string>(currency: Currency<C>): Currency<C> {
    if (this._currencies.has(currency.code)) {
      throw new MoneyError("DUPLICATE_CURRENCY", `Currency already registered: "${currency.code}"`);
    }
    this._currencies.set(currency.code, currency);
    return currency;
  }

  /**
   * Get a registered currency by code.
   * Returns undefined if not registered.
   */
  get(code: string): Currency | undefined {
    return this._currencies.get(code);
  }

  has(code: string): boolean {
    return this._currencies.has(code);
  }

  /**
   * Registered currency for `code`, else the ISO table's.
   *
   * @throws {MoneyError} UNKNOWN_CURRENCY if neither knows it
   */
  resolve(code: string): Currency {
    return this._currencies.get(code) ?? isoCurrency(code);
  }

  getAll(): readonly Currency[] {
    return [...this._currencies.values()];
  }

  get count(): number {
    return this._currencies.size;
  }
}
