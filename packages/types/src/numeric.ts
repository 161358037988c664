/**
 * Names of the stock numeric representations.
 *
 * `u8`…`u128` are fixed-width unsigned integers backed by bigint.
 * `safe` is a plain number capped at Number.MAX_SAFE_INTEGER.
 */
export const NUMERIC_NAMES = ["u8", "u16", "u32", "u64", "u128", "safe"] as const;

export type NumericName = (typeof NUMERIC_NAMES)[number];

/** Bit widths of the fixed-width unsigned representations. */
export type UintWidth = 8 | 16 | 32 | 64 | 128;
