import { describe, it, expect } from "vitest";
import { createQuote, type Quote } from "../../mock/quote.js";
import { buildEnvelope, LEVELONE_EQUITIES, serializeEnvelope, StreamMessageSchema } from "../protocol.js";

function quote(symbol: string, timestamp: number): Quote {
  return createQuote({
    symbol,
    last: 10,
    bid: 9.95,
    ask: 10.05,
    volume: 100,
    high: 11,
    low: 9,
    netChange: 0.5,
    netChangePercent: 5.26,
    timestamp,
  });
}

describe("buildEnvelope", () => {
  it("wraps quotes in a single SUBS data item keyed by symbol", () => {
    const envelope = buildEnvelope([quote("AAPL", 100), quote("MSFT", 250)]);
    expect(envelope).toEqual({
      data: [
        {
          service: LEVELONE_EQUITIES,
          timestamp: 250,
          command: "SUBS",
          content: [
            { key: "AAPL", "1": 9.95, "2": 10.05, "3": 10, "8": 100, "10": 11, "11": 9, "18": 0.5, "42": 5.26 },
            { key: "MSFT", "1": 9.95, "2": 10.05, "3": 10, "8": 100, "10": 11, "11": 9, "18": 0.5, "42": 5.26 },
          ],
        },
      ],
    });
  });

  it("stamps an empty envelope with the current time", () => {
    const before = Date.now();
    const [item] = buildEnvelope([]).data;
    expect(item?.content).toEqual([]);
    expect(item?.timestamp).toBeGreaterThanOrEqual(before);
  });

  it("serializes to JSON that the inbound schema accepts", () => {
    const raw = serializeEnvelope(buildEnvelope([quote("SPY", 1)]));
    expect(StreamMessageSchema.safeParse(JSON.parse(raw)).success).toBe(true);
  });
});

describe("StreamMessageSchema", () => {
  it("accepts frames without data such as heartbeats", () => {
    expect(StreamMessageSchema.safeParse({ notify: [{ heartbeat: "1" }] }).success).toBe(true);
    expect(StreamMessageSchema.safeParse({}).success).toBe(true);
  });

  it("rejects non-numeric known field codes", () => {
    const result = StreamMessageSchema.safeParse({
      data: [{ service: LEVELONE_EQUITIES, content: [{ key: "AAPL", "3": "not-a-number" }] }],
    });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.message).toBe("field 3 must be a finite number");
    }
  });

  it("rejects content records without a key", () => {
    const result = StreamMessageSchema.safeParse({
      data: [{ service: LEVELONE_EQUITIES, content: [{ "3": 1 }] }],
    });
    expect(result.success).toBe(false);
  });

  it("passes unknown field codes through", () => {
    const result = StreamMessageSchema.safeParse({
      data: [{ service: LEVELONE_EQUITIES, content: [{ key: "AAPL", "3": 1, "99": "extra" }] }],
    });
    expect(result.success).toBe(true);
  });
});
