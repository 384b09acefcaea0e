/**
 * StreamVault Types Package
 *
 * Zod schemas and inferred types shared by the journal, projections and the
 * sequence-aware dead-letter queue.
 *
 * @module @streamvault/types
 */

export {
  JsonValueSchema,
  StreamIdSchema,
  StreamVersionSchema,
  EventTypeSchema,
  EventEnvelopeSchema,
  NewEventSchema,
  NewEventBatchSchema,
  SnapshotSchema,
  parseEventEnvelope,
  type JsonValue,
  type EventEnvelope,
  type NewEvent,
  type Snapshot,
} from './events.schema.js';

export {
  StreamFlowStateSchema,
  DlqEntrySchema,
  DlqListingSchema,
  type StreamFlowState,
  type DlqEntry,
  type DlqListing,
} from './sequence-dlq.schema.js';
