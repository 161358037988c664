/**
 * Tests for rebuilding values from records.
 */

import { describe, it, expect } from "vitest";
import { EUR, SEK } from "../src/currency.js";
import { Price, Shipping } from "../src/kind.js";
import { u8, u16, u128, safeInteger } from "../src/numeric.js";
import { amountFromRecord, moneyFromRecord, MoneyRecordSchema } from "../src/records.js";
import { thrown } from "./helpers.js";

const sekRecord = { currency: "SEK", minorUnit: 100, minor: "133", numeric: "u64" };

describe("moneyFromRecord", () => {
  it("rebuilds money in the requested representation", () => {
    const money = moneyFromRecord(sekRecord, SEK, u16);
    expect(money.minor).toBe(133n);
    expect(money.numeric).toBe(u16);
    expect(money.toString()).toBe("1.33 SEK");
  });

  it("reads back what toRecord wrote", () => {
    const record: unknown = JSON.parse(JSON.stringify(EUR.moneyInMinor(18_446_744_073_709_551_615n)));
    expect(moneyFromRecord(record, EUR, u128).minor).toBe(18_446_744_073_709_551_615n);
  });

  it("can move a value into number storage", () => {
    expect(moneyFromRecord(sekRecord, SEK, safeInteger).value).toBe(133);
  });

  it("rejects malformed records with the failing paths", () => {
    const err = thrown(() => moneyFromRecord({ ...sekRecord, currency: "sek" }, SEK, u16));
    expect(err).toMatchObject({
      name: "MoneyError",
      code: "INVALID_RECORD",
      message: "Invalid monetary record: currency: must be three upper-case letters",
    });
  });

  it("rejects negative or fractional minor values", () => {
    expect(thrown(() => moneyFromRecord({ ...sekRecord, minor: "-1" }, SEK, u16))).toMatchObject({
      message: "Invalid monetary record: minor: must be base-10 digits",
    });
    expect(thrown(() => moneyFromRecord({ ...sekRecord, minor: "1.5" }, SEK, u16))).toMatchObject({
      code: "INVALID_RECORD",
    });
  });

  it("rejects non-objects", () => {
    expect(thrown(() => moneyFromRecord(null, SEK, u16))).toMatchObject({ code: "INVALID_RECORD" });
  });

  it("rejects another currency", () => {
    expect(thrown(() => moneyFromRecord(sekRecord, EUR, u16))).toMatchObject({
      code: "CURRENCY_MISMATCH",
      message: "Record is in SEK (scale 100), expected EUR (scale 100)",
    });
  });

  it("rejects values the representation cannot hold", () => {
    expect(thrown(() => moneyFromRecord({ ...sekRecord, minor: "300" }, SEK, u8))).toMatchObject({
      code: "VALUE_OUT_OF_RANGE",
      message: "3.00 SEK does not fit in u8",
    });
  });
});

describe("amountFromRecord", () => {
  it("rebuilds an amount of the expected kind", () => {
    const amount = amountFromRecord({ ...sekRecord, kind: "Price" }, Price, SEK, u16);
    expect(amount.kind).toBe(Price);
    expect(amount.toString()).toBe("1.33 SEK (Price)");
  });

  it("rejects another kind", () => {
    expect(thrown(() => amountFromRecord({ ...sekRecord, kind: "Shipping" }, Price, SEK, u16))).toMatchObject({
      code: "INVALID_KIND",
      message: "Record is a Shipping amount, expected Price",
    });
  });

  it("requires a kind", () => {
    expect(thrown(() => amountFromRecord(sekRecord, Shipping, SEK, u16))).toMatchObject({
      code: "INVALID_RECORD",
    });
  });
});

describe("MoneyRecordSchema", () => {
  it("accepts records written by toRecord", () => {
    expect(MoneyRecordSchema.safeParse(SEK.moneyInMinor(5, u8).toRecord()).success).toBe(true);
  });

  it("rejects unsupported scales", () => {
    expect(MoneyRecordSchema.safeParse({ ...sekRecord, minorUnit: 10 }).success).toBe(false);
    expect(thrown(() => moneyFromRecord({ ...sekRecord, minorUnit: 10 }, SEK, u16))).toMatchObject({
      message: "Invalid monetary record: minorUnit: must be one of 1, 100, 1000",
    });
  });

  it("rejects unknown representations", () => {
    expect(MoneyRecordSchema.safeParse({ ...sekRecord, numeric: "i64" }).success).toBe(false);
  });
});
