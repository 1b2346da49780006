// src/models/objector.ts

import { z } from 'zod';
import { RedditApiError } from '../utils/errors';

const ThingSchema = z.object({
  kind: z.string(),
  data: z.record(z.unknown()),
});

export type Thing = z.infer<typeof ThingSchema>;

// Shape of POST responses sent with api_type=json
const JsonEnvelopeSchema = z.object({
  json: z.object({
    errors: z.array(z.array(z.string().nullable())).default([]),
    data: z
      .object({ things: z.array(ThingSchema).optional() })
      .passthrough()
      .optional(),
  }),
});

const ListingSchema = z.object({
  kind: z.literal('Listing'),
  data: z.object({ children: z.array(ThingSchema) }),
});

/**
 * @throws {RedditApiError} when the response reports `json.errors`
 */
export function raiseForApiErrors(payload: unknown): void {
  const envelope = JsonEnvelopeSchema.safeParse(payload);
  if (!envelope.success || envelope.data.json.errors.length === 0) return;

  throw new RedditApiError(
    envelope.data.json.errors.map(([errorType, message, field]) => ({
      errorType: errorType ?? 'UNKNOWN',
      message: message ?? '',
      field: field || undefined,
    }))
  );
}

/**
 * Data of the first thing in a `json.data.things` envelope.
 */
export function firstThingData(payload: unknown): Record<string, unknown> | undefined {
  const envelope = JsonEnvelopeSchema.safeParse(payload);
  if (!envelope.success) return undefined;
  return envelope.data.json.data?.things?.[0]?.data;
}

export function parseListing(payload: unknown): Thing[] {
  const listing = ListingSchema.safeParse(payload);
  return listing.success ? listing.data.data.children : [];
}
