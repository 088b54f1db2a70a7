import { z } from "zod";
import { WIRE_FIELD_CODES, toWireFormat, type Quote, type WireQuoteFields } from "../mock/quote.js";

export const LEVELONE_EQUITIES = "LEVELONE_EQUITIES";

export type WireContent = WireQuoteFields & { key: string };

export interface WireDataItem {
  service: string;
  timestamp: number;
  command: "SUBS";
  content: WireContent[];
}

export interface WireEnvelope {
  data: WireDataItem[];
}

/** Wrap quotes into a single LEVELONE_EQUITIES data item stamped with the newest quote time. */
export function buildEnvelope(quotes: readonly Quote[]): WireEnvelope {
  const timestamp = quotes.reduce((max, q) => Math.max(max, q.timestamp), 0) || Date.now();
  return {
    data: [
      {
        service: LEVELONE_EQUITIES,
        timestamp,
        command: "SUBS",
        content: quotes.map((q) => ({ key: q.symbol, ...toWireFormat(q) })),
      },
    ],
  };
}

export function serializeEnvelope(envelope: WireEnvelope): string {
  return JSON.stringify(envelope);
}

// ── Inbound validation ──────────────────────────────────────────────────

const ContentRecordSchema = z
  .object({ key: z.string().trim().min(1) })
  .passthrough()
  .superRefine((record, ctx) => {
    for (const code of WIRE_FIELD_CODES) {
      const value: unknown = record[code];
      if (value === undefined) continue;
      if (typeof value !== "number" || !Number.isFinite(value)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [code],
          message: `field ${code} must be a finite number`,
        });
      }
    }
  });

const DataItemSchema = z
  .object({
    service: z.string(),
    timestamp: z.number().int().nonnegative().optional(),
    command: z.string().optional(),
    content: z.array(ContentRecordSchema).optional(),
  })
  .passthrough();

/** Real feeds also send `response` and `notify` frames; those pass through untouched. */
export const StreamMessageSchema = z
  .object({
    data: z.array(DataItemSchema).optional(),
  })
  .passthrough();
