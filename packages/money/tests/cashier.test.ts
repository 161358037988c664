/**
 * Tests for Cashier settlement logging.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { Cashier, createCashier } from "../src/cashier.js";
import { createLogger } from "../src/logger.js";
import { loadConfig } from "../src/config.js";
import { EUR, SEK } from "../src/currency.js";
import { Price, Shipping } from "../src/kind.js";
import { u16 } from "../src/numeric.js";
import { InsufficientFundsError } from "../src/types.js";
import { thrown } from "./helpers.js";

// =============================================================================
// Helpers
// =============================================================================

interface LogLine {
  readonly level: number;
  readonly msg: string;
  readonly [field: string]: unknown;
}

function isLogLine(value: unknown): value is LogLine {
  if (typeof value !== "object" || value === null) return false;
  const obj = value as Record<string, unknown>;
  return typeof obj["level"] === "number" && typeof obj["msg"] === "string";
}

function collect(lines: LogLine[]): { write(msg: string): void } {
  return {
    write(msg: string): void {
      const parsed: unknown = JSON.parse(msg);
      if (isLogLine(parsed)) {
        lines.push(parsed);
      }
    },
  };
}

// =============================================================================
// Tests
// =============================================================================

describe("Cashier", () => {
  let lines: LogLine[];
  let cashier: Cashier;

  beforeEach(() => {
    lines = [];
    cashier = new Cashier({
      logger: createLogger({ level: "debug" }, collect(lines)),
      numeric: "u16",
    });
  });

  it("opens balances and bills in the configured representation", () => {
    const money = cashier.open(EUR, 10);
    const bill = cashier.bill(Shipping, EUR, 12);
    expect(money.numeric).toBe(u16);
    expect(money.minor).toBe(1000n);
    expect(bill.numeric).toBe(u16);
    expect(bill.toString()).toBe("12.00 EUR (Shipping)");
  });

  it("defaults to u64", () => {
    const plain = new Cashier({ logger: createLogger({ level: "silent" }, collect(lines)) });
    expect(plain.open(EUR, 1).numeric.name).toBe("u64");
  });

  it("logs partial payments at debug", () => {
    const { remaining, unpaid } = cashier.pay(cashier.open(EUR, 10), cashier.bill(Shipping, EUR, 12));
    expect(remaining.minor).toBe(0n);
    expect(unpaid.minor).toBe(200n);

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      level: 20,
      name: "coinpurse",
      msg: "Payment settled",
      currency: "EUR",
      kind: "Shipping",
      balance: "1000",
      requested: "1200",
      unpaid: "200",
      remaining: "0",
    });
  });

  it("logs takes at debug", () => {
    const { taken } = cashier.take(EUR.moneyInMinor(512, u16), Price.inMinor(EUR, 128));
    expect(taken.minor).toBe(128n);
    expect(lines[0]).toMatchObject({
      level: 20,
      msg: "Amount taken",
      balance: "512",
      requested: "128",
      taken: "128",
      remaining: "384",
    });
  });

  it("logs full payments", () => {
    const change = cashier.tryPay(cashier.open(SEK, 2), cashier.bill(Price, SEK, "1.90"));
    expect(change.minor).toBe(10n);
    expect(lines[0]).toMatchObject({
      level: 20,
      msg: "Payment settled in full",
      currency: "SEK",
      kind: "Price",
      paid: "190",
      remaining: "10",
    });
  });

  it("logs refusals at warn and rethrows", () => {
    const money = cashier.open(SEK, "1.90");
    const price = cashier.bill(Price, SEK, 2);

    expect(thrown(() => cashier.tryPay(money, price))).toBeInstanceOf(InsufficientFundsError);
    expect(money.consumed).toBe(false);
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      level: 40,
      msg: "Insufficient funds",
      currency: "SEK",
      kind: "Price",
      required: "200",
      available: "190",
    });
  });

  it("does not log below the configured level", () => {
    const quiet = new Cashier({ logger: createLogger({ level: "warn" }, collect(lines)) });
    quiet.pay(quiet.open(EUR, 1), quiet.bill(Price, EUR, 1));
    expect(lines).toHaveLength(0);
  });
});

describe("createCashier", () => {
  it("uses the configured representation", () => {
    const cashier = createCashier(loadConfig({ LOG_LEVEL: "silent", COINPURSE_NUMERIC: "u32" }));
    expect(cashier.open(EUR, 1).numeric.name).toBe("u32");
  });
});
