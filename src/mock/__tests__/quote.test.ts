import { describe, it, expect } from "vitest";
import {
  createQuote,
  FIELD_CODES,
  fromWireFormat,
  isFieldCode,
  missingFieldCodes,
  QuoteSchema,
  toWireFormat,
  WIRE_FIELD_CODES,
  type Quote,
} from "../quote.js";

const reference: Quote = createQuote({
  symbol: "TEST",
  last: 100.0,
  bid: 99.95,
  ask: 100.05,
  volume: 1000,
  high: 101.0,
  low: 99.0,
  netChange: 1.0,
  netChangePercent: 1.0,
  timestamp: 1234567890,
});

describe("toWireFormat", () => {
  it("maps every attribute to its LEVELONE field code", () => {
    expect(toWireFormat(reference)).toEqual({
      "1": 99.95,
      "2": 100.05,
      "3": 100.0,
      "8": 1000,
      "10": 101.0,
      "11": 99.0,
      "18": 1.0,
      "42": 1.0,
    });
  });

  it("emits exactly the eight known codes and nothing else", () => {
    expect(Object.keys(toWireFormat(reference))).toEqual(["1", "2", "3", "8", "10", "11", "18", "42"]);
  });

  it("does not carry symbol or timestamp", () => {
    const wire: Record<string, unknown> = toWireFormat(reference);
    expect(wire.symbol).toBeUndefined();
    expect(wire.timestamp).toBeUndefined();
  });
});

describe("fromWireFormat", () => {
  it("restores a quote from its wire fields", () => {
    expect(fromWireFormat("test", toWireFormat(reference), 1234567890)).toEqual(reference);
  });

  it("ignores unknown codes and reads missing codes as zero", () => {
    const quote = fromWireFormat("MSFT", { "3": 410.5, "99": 7, "8": 12.4 }, 5);
    expect(quote).toEqual({
      symbol: "MSFT",
      bid: 0,
      ask: 0,
      last: 410.5,
      volume: 12,
      high: 0,
      low: 0,
      netChange: 0,
      netChangePercent: 0,
      timestamp: 5,
    });
  });

  it("fills absent codes from a base quote", () => {
    const quote = fromWireFormat("TEST", { "3": 100.5, "8": 1200 }, 1234567891, reference);
    expect(quote).toEqual({ ...reference, last: 100.5, volume: 1200, timestamp: 1234567891 });
  });
});

describe("FIELD_CODES", () => {
  it("maps each code to the attribute it names", () => {
    const wire = toWireFormat(reference);
    for (const code of WIRE_FIELD_CODES) {
      expect(wire[code]).toBe(reference[FIELD_CODES[code]]);
    }
  });
});

describe("missingFieldCodes", () => {
  it("lists known codes that are absent or not finite numbers", () => {
    expect(missingFieldCodes(toWireFormat(reference))).toEqual([]);
    expect(missingFieldCodes({ "1": 1, "2": 2, "3": "x", "8": 4, "10": 5, "11": Number.NaN, "99": 1 })).toEqual([
      "3",
      "11",
      "18",
      "42",
    ]);
  });
});

describe("createQuote", () => {
  it("returns a frozen value", () => {
    expect(Object.isFrozen(reference)).toBe(true);
  });

  it("does not enforce bid <= last <= ask", () => {
    const inverted = createQuote({ ...reference, bid: 101, ask: 99 });
    expect(inverted.bid).toBe(101);
    expect(inverted.ask).toBe(99);
  });
});

describe("QuoteSchema", () => {
  it("accepts a well-formed quote", () => {
    expect(QuoteSchema.safeParse(reference).success).toBe(true);
  });

  it("rejects negative prices and fractional volume", () => {
    expect(QuoteSchema.safeParse({ ...reference, last: -1 }).success).toBe(false);
    expect(QuoteSchema.safeParse({ ...reference, volume: 1.5 }).success).toBe(false);
    expect(QuoteSchema.safeParse({ ...reference, symbol: "  " }).success).toBe(false);
  });

  it("requires last to lie within low and high", () => {
    expect(QuoteSchema.safeParse({ ...reference, last: 101.5 }).success).toBe(false);
    expect(QuoteSchema.safeParse({ ...reference, last: 98.5 }).success).toBe(false);
    expect(QuoteSchema.safeParse({ ...reference, last: 101 }).success).toBe(true);
  });
});

describe("isFieldCode", () => {
  it("recognises only the published codes", () => {
    for (const code of WIRE_FIELD_CODES) expect(isFieldCode(code)).toBe(true);
    expect(isFieldCode("4")).toBe(false);
    expect(isFieldCode("key")).toBe(false);
  });
});
