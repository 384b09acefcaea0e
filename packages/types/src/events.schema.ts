import { z } from 'zod';

/**
 * Event Envelope Schemas
 * The storage/wire shape every producer and consumer of the journal agrees on
 */

/** Any value that survives a JSON round trip */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ])
);

export const StreamIdSchema = z
  .string()
  .min(1, 'streamId is required')
  .max(255, 'streamId must be at most 255 characters');

export const StreamVersionSchema = z.number().int().nonnegative();

export const EventTypeSchema = z.string().min(1, 'event type is required').max(255);

// Committed event, immutable once written
export const EventEnvelopeSchema = z.object({
  eventId: z.string().uuid(),
  streamId: StreamIdSchema,
  version: z.number().int().positive(),
  type: EventTypeSchema,
  payload: JsonValueSchema,
  correlationId: z.string().uuid(),
  causationId: z.string().uuid().nullable(),
  occurredAt: z.string().datetime({ offset: true }),
});

// Append input; ids and timestamp are filled in by the journal when absent
export const NewEventSchema = z.object({
  type: EventTypeSchema,
  payload: JsonValueSchema,
  eventId: z.string().uuid().optional(),
  correlationId: z.string().uuid().optional(),
  causationId: z.string().uuid().nullable().optional(),
  occurredAt: z.string().datetime({ offset: true }).optional(),
});

export const NewEventBatchSchema = z
  .array(NewEventSchema)
  .min(1, 'append requires at least one event');

export const SnapshotSchema = z.object({
  streamId: StreamIdSchema,
  version: z.number().int().positive(),
  state: JsonValueSchema,
  takenAt: z.coerce.date(),
});

export type EventEnvelope = z.infer<typeof EventEnvelopeSchema>;
export type NewEvent = z.infer<typeof NewEventSchema>;
export type Snapshot = z.infer<typeof SnapshotSchema>;

/**
 * Decode a serialized envelope (a JSON string or an already-parsed row)
 */
export function parseEventEnvelope(input: unknown): EventEnvelope {
  const raw: unknown = typeof input === 'string' ? JSON.parse(input) : input;
  return EventEnvelopeSchema.parse(raw);
}
