/**
 * @coinpurse/money — ISO 4217 currency table.
 *
 * The table ships as data/iso-4217.json and is read once, on first use.
 * Only currencies with a decimal minor unit of 1, 100 or 1000 are listed.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import type { MinorUnitScale } from "@coinpurse/types";
import { Currency } from "./currency.js";
import { CurrencyCodeSchema, MinorUnitScaleSchema } from "./records.js";
import { MoneyError } from "./types.js";

const TABLE_URL = new URL("../data/iso-4217.json", import.meta.url);

export const IsoEntrySchema = z.object({
  code: CurrencyCodeSchema,
  name: z.string().min(1),
  minorUnit: MinorUnitScaleSchema,
});

export interface IsoCurrencyEntry {
  readonly code: string;
  readonly name: string;
  readonly minorUnit: MinorUnitScale;
}

let table: ReadonlyMap<string, IsoCurrencyEntry> | undefined;

function loadTable(): ReadonlyMap<string, IsoCurrencyEntry> {
  if (table === undefined) {
    const raw: unknown = JSON.parse(readFileSync(TABLE_URL, "utf8"));
    const entries = z.array(IsoEntrySchema).parse(raw);
    table = new Map(entries.map((entry) => [entry.code, entry]));
  }
  return table;
}

export function lookupIso(code: string): IsoCurrencyEntry | undefined {
  return loadTable().get(code);
}

export function listIsoCurrencies(): readonly IsoCurrencyEntry[] {
  return [...loadTable().values()];
}

/**
 * Currency for an ISO 4217 code, with the minor unit from the table.
 *
 * @throws {MoneyError} UNKNOWN_CURRENCY if the code is not listed
 */
export function isoCurrency<C extends string>(code: C): Currency<C> {
  const entry = lookupIso(code);
  if (entry === undefined) {
    throw new MoneyError("UNKNOWN_CURRENCY", `Not an ISO 4217 currency with a decimal minor unit: "${code}"`);
  }
  return new Currency(code, entry.minorUnit);
}
