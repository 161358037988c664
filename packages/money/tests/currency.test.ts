/**
 * Tests for currency tags and their factories.
 *
 * Covers:
 * - Declaration and validation
 * - Major vs minor scaling policy
 * - Display formatting per scale
 * - Representation bounds at construction
 */

import { describe, it, expect } from "vitest";
import { Currency, defineCurrency, EUR, SEK, JPY, KWD } from "../src/currency.js";
import { Shipping } from "../src/kind.js";
import { u8, u16, safeInteger } from "../src/numeric.js";
import { thrown } from "./helpers.js";

describe("defineCurrency", () => {
  it("declares code, scale and decimals", () => {
    const nok = defineCurrency("NOK", 100);
    expect(nok).toBeInstanceOf(Currency);
    expect(nok.code).toBe("NOK");
    expect(nok.minorUnit).toBe(100);
    expect(nok.decimals).toBe(2);
  });

  it("derives decimals from the scale", () => {
    expect(JPY.decimals).toBe(0);
    expect(KWD.decimals).toBe(3);
  });

  it("rejects malformed codes", () => {
    expect(thrown(() => defineCurrency("sek", 100))).toMatchObject({ code: "INVALID_CURRENCY" });
    expect(thrown(() => defineCurrency("EURO", 100))).toMatchObject({ code: "INVALID_CURRENCY" });
  });

  it("compares by code and scale", () => {
    expect(defineCurrency("EUR", 100).equals(EUR)).toBe(true);
    expect(EUR.equals(SEK)).toBe(false);
    expect(defineCurrency("EUR", 1000).equals(EUR)).toBe(false);
  });

  it("describes itself", () => {
    expect(SEK.toInfo()).toEqual({ code: "SEK", minorUnit: 100 });
    expect(SEK.toString()).toBe("SEK");
  });
});

describe("money (major units)", () => {
  it("scales whole units by the minor unit", () => {
    expect(SEK.money(1).minor).toBe(100n);
    expect(KWD.money(2).minor).toBe(2000n);
    expect(JPY.money(500).minor).toBe(500n);
  });

  it("accepts decimal strings", () => {
    expect(SEK.money("1.33").minor).toBe(133n);
    expect(KWD.money("0.005").minor).toBe(5n);
  });

  it("defaults to u64", () => {
    expect(SEK.money(1).numeric.name).toBe("u64");
  });

  it("uses the requested representation", () => {
    const small = EUR.money(2, u8);
    expect(small.numeric.name).toBe("u8");
    expect(small.minor).toBe(200n);
  });

  it("rejects values the representation cannot hold", () => {
    const err = thrown(() => EUR.money(3, u8));
    expect(err).toMatchObject({ name: "MoneyError", code: "VALUE_OUT_OF_RANGE" });
    expect(err).toMatchObject({ message: "3.00 EUR does not fit in u8" });
  });

  it("rejects negative and fractional input", () => {
    expect(thrown(() => EUR.money(-1))).toMatchObject({ code: "INVALID_VALUE" });
    expect(thrown(() => EUR.money(1.5))).toMatchObject({ code: "INVALID_VALUE" });
    expect(thrown(() => EUR.money("1.333"))).toMatchObject({ code: "INVALID_VALUE" });
  });
});

describe("moneyInMinor", () => {
  it("takes minor units as given", () => {
    expect(SEK.moneyInMinor(133).minor).toBe(133n);
    expect(SEK.moneyInMinor(133n, u16).numeric.name).toBe("u16");
  });

  it("agrees with money for whole units", () => {
    expect(EUR.money(1).equals(EUR.moneyInMinor(100))).toBe(true);
  });

  it("accepts safe-integer storage", () => {
    const money = EUR.moneyInMinor(42, safeInteger);
    expect(money.value).toBe(42);
  });
});

describe("zero", () => {
  it("creates an empty balance", () => {
    expect(EUR.zero().isZero()).toBe(true);
    expect(EUR.zero(u16).numeric.name).toBe("u16");
  });
});

describe("amount factories", () => {
  it("scales major units for amounts too", () => {
    expect(EUR.amount(Shipping, 12).minor).toBe(1200n);
  });

  it("takes minor units as given", () => {
    const shipping = EUR.amountInMinor(Shipping, 12, u8);
    expect(shipping.minor).toBe(12n);
    expect(shipping.numeric.name).toBe("u8");
    expect(shipping.kind).toBe(Shipping);
  });
});

describe("display", () => {
  it("renders minor units with the scale's precision", () => {
    expect(SEK.moneyInMinor(133).toString()).toBe("1.33 SEK");
    expect(SEK.moneyInMinor(100).toString()).toBe("1.00 SEK");
    expect(SEK.money(1).toString()).toBe("1.00 SEK");
  });

  it("renders scale-1 currencies without a fraction", () => {
    expect(JPY.money(500).toString()).toBe("500 JPY");
  });

  it("renders three-decimal currencies", () => {
    expect(KWD.moneyInMinor(5).toString()).toBe("0.005 KWD");
  });

  it("works in template strings", () => {
    expect(`${EUR.moneyInMinor(988)}`).toBe("9.88 EUR");
  });
});
