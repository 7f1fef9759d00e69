import { z } from "zod";

export const ENVELOPE_VERSION = "1.0";

/**
 * Wire shape forwarded to the downstream target. Field names and order are
 * part of the contract with the consumer.
 */
export interface Envelope {
  readonly EventVersion: string;
  readonly EventSource: string;
  readonly Event: {
    readonly Title: string;
    readonly Description: string;
  };
}

export const EnvelopeSchema: z.ZodType<Envelope> = z.object({
  EventVersion: z.string(),
  EventSource: z.string(),
  Event: z.object({
    Title: z.string(),
    Description: z.string(),
  }),
});

export function buildEnvelope(params: {
  title: string;
  source: string;
  description: string;
}): Envelope {
  return Object.freeze({
    EventVersion: ENVELOPE_VERSION,
    EventSource: params.source,
    Event: Object.freeze({
      Title: params.title,
      Description: params.description,
    }),
  });
}

export function serializeEnvelope(envelope: Envelope): Uint8Array {
  return Buffer.from(JSON.stringify(envelope), "utf8");
}

export function parseEnvelope(payload: Uint8Array | string): Envelope {
  const text =
    typeof payload === "string" ? payload : Buffer.from(payload).toString("utf8");
  return EnvelopeSchema.parse(JSON.parse(text));
}
