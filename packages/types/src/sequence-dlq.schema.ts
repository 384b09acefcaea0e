import { z } from 'zod';
import { EventEnvelopeSchema, StreamIdSchema } from './events.schema.js';

/**
 * Sequence-aware dead-letter queue schemas
 */

export const StreamFlowStateSchema = z.enum(['FLOWING', 'QUARANTINED']);

export const DlqEntrySchema = z.object({
  projectionName: z.string().min(1),
  streamId: StreamIdSchema,
  failedAtVersion: z.number().int().positive(),
  reason: z.string(),
  enqueuedAt: z.coerce.date(),
  updatedAt: z.coerce.date(),
  redriveAttempts: z.number().int().nonnegative(),
  lastRedriveAt: z.coerce.date().nullable(),
  queuedEvents: z.array(EventEnvelopeSchema).min(1),
});

// Operator-facing summary returned by ListDLQ
export const DlqListingSchema = z.object({
  projectionName: z.string(),
  streamId: StreamIdSchema,
  failedAtVersion: z.number().int().positive(),
  queuedCount: z.number().int().positive(),
  reason: z.string(),
  enqueuedAt: z.coerce.date(),
  redriveAttempts: z.number().int().nonnegative(),
  lastRedriveAt: z.coerce.date().nullable(),
});

export type StreamFlowState = z.infer<typeof StreamFlowStateSchema>;
export type DlqEntry = z.infer<typeof DlqEntrySchema>;
export type DlqListing = z.infer<typeof DlqListingSchema>;
