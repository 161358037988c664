/**
 * @coinpurse/money — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import type { CurrencyInfo } from "@coinpurse/types";
import { isCurrencyCode, isMinorUnitScale, MINOR_UNIT_SCALES } from "@coinpurse/types";
import { defineCurrency } from "./currency.js";
import { NumericNameSchema } from "./records.js";
import { CurrencyRegistry } from "./registry.js";
import { MoneyError } from "./types.js";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  LOG_PRETTY: z
    .string()
    .transform((v) => v === "true")
    .default("false"),

  // Extra currencies, "CODE:SCALE" comma-separated
  COINPURSE_CURRENCIES: z.string().default(""),

  // Representation used by Cashier.open / Cashier.bill
  COINPURSE_NUMERIC: NumericNameSchema.default("u64"),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Currency list parsing
// =============================================================================

/**
 * Parse the COINPURSE_CURRENCIES env var.
 *
 * Format: "EUR:100,JPY:1,KWD:1000"
 */
export function parseCurrencyList(raw: string): readonly CurrencyInfo[] {
  if (raw.trim() === "") {
    return [];
  }

  const currencies: CurrencyInfo[] = [];

  for (const entry of raw.split(",")) {
    const parts = entry.trim().split(":");
    const code = parts[0];
    const scaleText = parts[1];
    if (parts.length !== 2 || code === undefined || scaleText === undefined) {
      throw new MoneyError(
        "INVALID_CONFIG",
        `Invalid COINPURSE_CURRENCIES entry: "${entry.trim()}". Expected format: CODE:SCALE`,
      );
    }

    const minorUnit = Number(scaleText);

    if (!isCurrencyCode(code)) {
      throw new MoneyError("INVALID_CONFIG", `Invalid currency code "${code}" in COINPURSE_CURRENCIES`);
    }
    if (!isMinorUnitScale(minorUnit)) {
      throw new MoneyError(
        "INVALID_CONFIG",
        `Invalid scale "${scaleText}" for ${code} in COINPURSE_CURRENCIES. Must be: ${MINOR_UNIT_SCALES.join(", ")}`,
      );
    }
    if (currencies.some((c) => c.code === code)) {
      throw new MoneyError("INVALID_CONFIG", `Currency ${code} listed twice in COINPURSE_CURRENCIES`);
    }

    currencies.push({ code, minorUnit });
  }

  return currencies;
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if env vars are invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}

/**
 * Registry holding every currency listed in the configuration.
 */
export function registryFromConfig(config: AppConfig): CurrencyRegistry {
  const registry = new CurrencyRegistry();
  for (const { code, minorUnit } of parseCurrencyList(config.COINPURSE_CURRENCIES)) {
    registry.register(defineCurrency(code, minorUnit));
  }
  return registry;
}
