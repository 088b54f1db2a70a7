import { z } from "zod";

const positivePrice = z.number().finite().positive();

export const QuoteSchema = z
  .object({
    symbol: z.string().trim().min(1),
    last: positivePrice,
    bid: positivePrice,
    ask: positivePrice,
    volume: z.number().int().nonnegative(),
    high: positivePrice,
    low: positivePrice,
    netChange: z.number().finite(),
    netChangePercent: z.number().finite(),
    timestamp: z.number().int().nonnegative(),
  })
  .refine((q) => q.low <= q.last && q.last <= q.high, {
    message: "last must lie between low and high",
    path: ["last"],
  });

export type Quote = Readonly<z.infer<typeof QuoteSchema>>;

export const WIRE_FIELD_CODES = ["1", "2", "3", "8", "10", "11", "18", "42"] as const;

export type FieldCode = (typeof WIRE_FIELD_CODES)[number];

export type WireQuoteFields = Record<FieldCode, number>;

/**
 * LEVELONE_EQUITIES field codes. This table is the compatibility contract
 * with consumers written against the real feed; do not add or renumber.
 */
export const FIELD_CODES = {
  "1": "bid",
  "2": "ask",
  "3": "last",
  "8": "volume",
  "10": "high",
  "11": "low",
  "18": "netChange",
  "42": "netChangePercent",
} as const satisfies Record<FieldCode, keyof Quote>;

type WireAttribute = (typeof FIELD_CODES)[FieldCode];

const EMPTY_ATTRIBUTES: Record<WireAttribute, number> = {
  bid: 0,
  ask: 0,
  last: 0,
  volume: 0,
  high: 0,
  low: 0,
  netChange: 0,
  netChangePercent: 0,
};

export function isFieldCode(key: string): key is FieldCode {
  return WIRE_FIELD_CODES.some((code) => code === key);
}

/** Build a frozen quote. No bid/last/ask ordering is enforced here. */
export function createQuote(fields: Quote): Quote {
  return Object.freeze({ ...fields });
}

export function toWireFormat(quote: Quote): WireQuoteFields {
  const field = (code: FieldCode): number => quote[FIELD_CODES[code]];
  return {
    "1": field("1"),
    "2": field("2"),
    "3": field("3"),
    "8": field("8"),
    "10": field("10"),
    "11": field("11"),
    "18": field("18"),
    "42": field("42"),
  };
}

/** Known codes a wire record does not carry as a finite number. */
export function missingFieldCodes(fields: Partial<Record<string, unknown>>): FieldCode[] {
  return WIRE_FIELD_CODES.filter((code) => {
    const value = fields[code];
    return typeof value !== "number" || !Number.isFinite(value);
  });
}

/**
 * Map wire fields back to a quote. Unknown codes are ignored. An absent code
 * takes its value from `base` when given (partial updates), otherwise 0.
 */
export function fromWireFormat(
  symbol: string,
  fields: Partial<Record<string, unknown>>,
  timestamp: number,
  base?: Quote,
): Quote {
  const values: Record<WireAttribute, number> = { ...EMPTY_ATTRIBUTES };
  for (const code of WIRE_FIELD_CODES) {
    const attribute = FIELD_CODES[code];
    const value = fields[code];
    if (typeof value === "number" && Number.isFinite(value)) {
      values[attribute] = value;
    } else if (base) {
      values[attribute] = base[attribute];
    }
  }

  return createQuote({
    symbol: symbol.trim().toUpperCase(),
    ...values,
    volume: Math.max(0, Math.round(values.volume)),
    timestamp,
  });
}
