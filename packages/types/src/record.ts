/**
 * Serialized forms of monetary values.
 *
 * Records are plain JSON-safe objects. Minor-unit values are decimal
 * strings because u64/u128 values exceed Number.MAX_SAFE_INTEGER.
 */

import type { CurrencyCode, MinorUnitScale } from "./currency.js";
import type { NumericName } from "./numeric.js";

/**
 * A balance as it leaves the process.
 */
export interface MoneyRecord {
  /** Alphabetic currency code (e.g., "EUR") */
  readonly currency: CurrencyCode;

  /** Minor units per major unit for `currency` */
  readonly minorUnit: MinorUnitScale;

  /** Value in minor units, base-10 digits only (e.g., "133") */
  readonly minor: string;

  /** Numeric representation the value was held in */
  readonly numeric: NumericName;
}

/**
 * A payable amount as it leaves the process.
 */
export interface AmountRecord extends MoneyRecord {
  /** Name of the amount kind (e.g., "Shipping") */
  readonly kind: string;
}
