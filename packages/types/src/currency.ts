/**
 * Currency Types
 *
 * Identifiers and scales shared by every coinpurse package.
 *
 * Rules:
 * - Currency codes are three upper-case letters (ISO 4217 alphabetic form)
 * - Scale is the number of minor units in one major unit
 * - Only decimal scales are representable (1, 100, 1000)
 */

/**
 * Alphabetic currency code, e.g. "EUR", "SEK", "JPY".
 */
export type CurrencyCode = string;

/** All accepted minor-unit scales, smallest first. */
export const MINOR_UNIT_SCALES = [1, 100, 1000] as const;

/**
 * Minor units per major unit.
 * JPY = 1, EUR = 100 (cents), KWD = 1000 (fils).
 */
export type MinorUnitScale = (typeof MINOR_UNIT_SCALES)[number];

/**
 * Static description of a currency, independent of any runtime tag.
 */
export interface CurrencyInfo {
  readonly code: CurrencyCode;
  readonly minorUnit: MinorUnitScale;
}
