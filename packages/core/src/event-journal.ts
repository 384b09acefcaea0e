import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import {
  JsonValueSchema,
  NewEventBatchSchema,
  StreamIdSchema,
  StreamVersionSchema,
  type EventEnvelope,
  type NewEvent,
} from '@streamvault/types';
import { createLogger, type Logger } from './logger.js';
import { StorageError, ValidationError, VersionConflictError } from './errors.js';
import {
  PG_UNIQUE_VIOLATION,
  getErrorCode,
  toStorageError,
  withTransaction,
  type DatabaseClient,
  type DatabasePool,
} from './database.js';
import { withRetry } from './utils.js';

/**
 * Event Journal - durable, ordered, append-only event storage
 *
 * Events are keyed by stream and per-stream version. Every committed event also
 * gets a journal-wide commit position, used only to drive catch-up reads.
 */

// =============================================================================
// TYPES
// =============================================================================

export interface JournalRecord {
  position: number;
  event: EventEnvelope;
}

export type AppendResult =
  | {
      status: 'committed';
      streamId: string;
      version: number;
      events: EventEnvelope[];
    }
  | {
      status: 'conflict';
      streamId: string;
      expectedVersion: number;
      actualVersion: number;
    };

export interface EventJournalRepository {
  /** Commit pre-versioned envelopes if the stream is still at expectedVersion */
  append(streamId: string, expectedVersion: number, events: EventEnvelope[]): Promise<AppendResult>;
  /** Events with fromVersion <= version <= toVersion, ascending, at most limit */
  readStream(
    streamId: string,
    fromVersion: number,
    toVersion: number,
    limit: number
  ): Promise<EventEnvelope[]>;
  /** Records with afterPosition < position <= toPosition, ascending, at most limit */
  readAll(afterPosition: number, toPosition: number, limit: number): Promise<JournalRecord[]>;
  getStreamVersion(streamId: string): Promise<number>;
  getHeadPosition(): Promise<number>;
  listStreams(): Promise<string[]>;
  /** Null out payloads of a stream, keeping ids, types and versions */
  erasePayloads(streamId: string): Promise<number>;
}

export interface EventPublisher {
  publish(events: readonly EventEnvelope[]): Promise<void>;
}

export interface EventJournalOptions {
  /** Page size for cursor reads */
  pageSize?: number;
  /** Bounded exponential backoff for StorageError */
  retry?: {
    maxRetries: number;
    baseDelayMs: number;
    maxDelayMs?: number;
  };
  clock?: () => Date;
}

// =============================================================================
// IN-MEMORY REPOSITORY
// =============================================================================

/**
 * In-memory journal (for development/testing)
 *
 * The version check and the commit run without an intervening await, so two
 * concurrent appends with the same expectedVersion cannot both succeed.
 */
export class InMemoryEventJournalRepository implements EventJournalRepository {
  private log: JournalRecord[] = [];
  private streams = new Map<string, JournalRecord[]>();

  append(streamId: string, expectedVersion: number, events: EventEnvelope[]): Promise<AppendResult> {
    const stream = this.streams.get(streamId) ?? [];
    const actualVersion = stream.length;

    if (actualVersion !== expectedVersion) {
      return Promise.resolve({ status: 'conflict', streamId, expectedVersion, actualVersion });
    }

    const records = events.map((event) => ({ position: 0, event }));
    for (const record of records) {
      record.position = this.log.length + 1;
      this.log.push(record);
      stream.push(record);
    }
    this.streams.set(streamId, stream);

    return Promise.resolve({
      status: 'committed',
      streamId,
      version: stream.length,
      events: [...events],
    });
  }

  readStream(
    streamId: string,
    fromVersion: number,
    toVersion: number,
    limit: number
  ): Promise<EventEnvelope[]> {
    const stream = this.streams.get(streamId) ?? [];
    const start = Math.max(fromVersion, 1) - 1;
    const end = Math.min(toVersion, start + limit);
    return Promise.resolve(stream.slice(start, end).map((record) => record.event));
  }

  readAll(afterPosition: number, toPosition: number, limit: number): Promise<JournalRecord[]> {
    const end = Math.min(toPosition, afterPosition + limit);
    return Promise.resolve(
      this.log.slice(afterPosition, end).map((record) => ({ ...record }))
    );
  }

  getStreamVersion(streamId: string): Promise<number> {
    return Promise.resolve(this.streams.get(streamId)?.length ?? 0);
  }

  getHeadPosition(): Promise<number> {
    return Promise.resolve(this.log.length);
  }

  listStreams(): Promise<string[]> {
    return Promise.resolve(Array.from(this.streams.keys()));
  }

  erasePayloads(streamId: string): Promise<number> {
    const stream = this.streams.get(streamId) ?? [];
    let erased = 0;
    for (const record of stream) {
      if (record.event.payload !== null) {
        record.event = { ...record.event, payload: null };
        erased++;
      }
    }
    return Promise.resolve(erased);
  }

  // For testing
  clear(): void {
    this.log = [];
    this.streams.clear();
  }
}

// =============================================================================
// POSTGRESQL REPOSITORY
// =============================================================================

export const JOURNAL_MIGRATION_SQL = `
CREATE TABLE IF NOT EXISTS event_streams (
  stream_id VARCHAR(255) PRIMARY KEY,
  version BIGINT NOT NULL DEFAULT 0,
  updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
);

CREATE TABLE IF NOT EXISTS event_journal (
  position BIGSERIAL PRIMARY KEY,
  event_id UUID NOT NULL UNIQUE,
  stream_id VARCHAR(255) NOT NULL,
  version BIGINT NOT NULL,
  type VARCHAR(255) NOT NULL,
  payload JSONB,
  correlation_id UUID NOT NULL,
  causation_id UUID,
  occurred_at TIMESTAMPTZ NOT NULL,
  committed_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
  payload_erased_at TIMESTAMPTZ
);

-- Backstop for optimistic concurrency: no two events share (stream_id, version)
CREATE UNIQUE INDEX IF NOT EXISTS idx_event_journal_stream_version
  ON event_journal (stream_id, version);
`;

const JournalRowSchema = z.object({
  position: z.coerce.number(),
  event_id: z.string(),
  stream_id: z.string(),
  version: z.coerce.number(),
  type: z.string(),
  payload: JsonValueSchema,
  correlation_id: z.string(),
  causation_id: z.string().nullable(),
  occurred_at: z.coerce.date(),
});

const VersionRowSchema = z.object({ version: z.coerce.number() });
const HeadRowSchema = z.object({ head: z.coerce.number() });
const StreamRowSchema = z.object({ stream_id: z.string() });

type JournalRow = z.infer<typeof JournalRowSchema>;

function rowToRecord(row: JournalRow): JournalRecord {
  return {
    position: row.position,
    event: {
      eventId: row.event_id,
      streamId: row.stream_id,
      version: row.version,
      type: row.type,
      payload: row.payload,
      correlationId: row.correlation_id,
      causationId: row.causation_id,
      occurredAt: row.occurred_at.toISOString(),
    },
  };
}

/**
 * PostgreSQL journal
 *
 * Appends lock the stream row, compare versions and insert the batch in one
 * transaction. Commit positions come from a sequence and may become visible out
 * of order under concurrent writers; consumers rely on per-stream versions, not
 * positions, for ordering.
 */
export class PostgresEventJournalRepository implements EventJournalRepository {
  private logger: Logger;

  constructor(private readonly db: DatabasePool) {
    this.logger = createLogger({ name: 'event-journal-pg' });
  }

  async initialize(): Promise<void> {
    await this.db.query(JOURNAL_MIGRATION_SQL);
    this.logger.info('Event journal initialized');
  }

  async append(
    streamId: string,
    expectedVersion: number,
    events: EventEnvelope[]
  ): Promise<AppendResult> {
    try {
      return await withTransaction<AppendResult>(this.db, async (tx) => {
        await tx.query(
          `INSERT INTO event_streams (stream_id, version) VALUES ($1, 0)
           ON CONFLICT (stream_id) DO NOTHING`,
          [streamId]
        );
        const locked = await tx.query(
          'SELECT version FROM event_streams WHERE stream_id = $1 FOR UPDATE',
          [streamId]
        );
        const actualVersion = VersionRowSchema.parse(locked.rows[0]).version;

        if (actualVersion !== expectedVersion) {
          return { status: 'conflict', streamId, expectedVersion, actualVersion };
        }

        await this.insertEvents(tx, events);
        const version = expectedVersion + events.length;
        await tx.query(
          'UPDATE event_streams SET version = $2, updated_at = NOW() WHERE stream_id = $1',
          [streamId, version]
        );

        return { status: 'committed', streamId, version, events: [...events] };
      });
    } catch (error) {
      if (getErrorCode(error) === PG_UNIQUE_VIOLATION) {
        const actualVersion = await this.getStreamVersion(streamId);
        return { status: 'conflict', streamId, expectedVersion, actualVersion };
      }
      throw toStorageError('append', error);
    }
  }

  private async insertEvents(tx: DatabaseClient, events: EventEnvelope[]): Promise<void> {
    const params: unknown[] = [];
    const tuples = events.map((event, index) => {
      const base = index * 8;
      params.push(
        event.eventId,
        event.streamId,
        event.version,
        event.type,
        JSON.stringify(event.payload),
        event.correlationId,
        event.causationId,
        event.occurredAt
      );
      const slots = Array.from({ length: 8 }, (_, offset) => `$${base + offset + 1}`);
      return `(${slots.join(', ')})`;
    });

    await tx.query(
      `INSERT INTO event_journal
       (event_id, stream_id, version, type, payload, correlation_id, causation_id, occurred_at)
       VALUES ${tuples.join(', ')}`,
      params
    );
  }

  async readStream(
    streamId: string,
    fromVersion: number,
    toVersion: number,
    limit: number
  ): Promise<EventEnvelope[]> {
    try {
      const result = await this.db.query(
        `SELECT * FROM event_journal
         WHERE stream_id = $1 AND version >= $2 AND version <= $3
         ORDER BY version ASC
         LIMIT $4`,
        [streamId, fromVersion, toVersion, limit]
      );
      return result.rows.map((row) => rowToRecord(JournalRowSchema.parse(row)).event);
    } catch (error) {
      throw toStorageError('readStream', error);
    }
  }

  async readAll(afterPosition: number, toPosition: number, limit: number): Promise<JournalRecord[]> {
    try {
      const result = await this.db.query(
        `SELECT * FROM event_journal
         WHERE position > $1 AND position <= $2
         ORDER BY position ASC
         LIMIT $3`,
        [afterPosition, toPosition, limit]
      );
      return result.rows.map((row) => rowToRecord(JournalRowSchema.parse(row)));
    } catch (error) {
      throw toStorageError('readAll', error);
    }
  }

  async getStreamVersion(streamId: string): Promise<number> {
    try {
      const result = await this.db.query(
        'SELECT version FROM event_streams WHERE stream_id = $1',
        [streamId]
      );
      const row = result.rows[0];
      return row ? VersionRowSchema.parse(row).version : 0;
    } catch (error) {
      throw toStorageError('getStreamVersion', error);
    }
  }

  async getHeadPosition(): Promise<number> {
    try {
      const result = await this.db.query(
        'SELECT COALESCE(MAX(position), 0) AS head FROM event_journal'
      );
      return HeadRowSchema.parse(result.rows[0]).head;
    } catch (error) {
      throw toStorageError('getHeadPosition', error);
    }
  }

  async listStreams(): Promise<string[]> {
    try {
      const result = await this.db.query(
        'SELECT stream_id FROM event_streams WHERE version > 0 ORDER BY stream_id'
      );
      return result.rows.map((row) => StreamRowSchema.parse(row).stream_id);
    } catch (error) {
      throw toStorageError('listStreams', error);
    }
  }

  async erasePayloads(streamId: string): Promise<number> {
    try {
      const result = await this.db.query(
        `UPDATE event_journal
         SET payload = NULL, payload_erased_at = NOW()
         WHERE stream_id = $1 AND payload IS NOT NULL`,
        [streamId]
      );
      return result.rowCount ?? 0;
    } catch (error) {
      throw toStorageError('erasePayloads', error);
    }
  }
}

// =============================================================================
// CURSORS
// =============================================================================

type StorageCall = <T>(operation: string, fn: () => Promise<T>) => Promise<T>;

/**
 * Lazy, restartable, finite read of one stream.
 *
 * The upper bound is fixed when the cursor is created; every iteration starts
 * again from `fromVersion` and pages through the repository.
 */
export class JournalCursor implements AsyncIterable<EventEnvelope> {
  constructor(
    private readonly repository: EventJournalRepository,
    private readonly call: StorageCall,
    readonly streamId: string,
    readonly fromVersion: number,
    readonly toVersion: number,
    private readonly pageSize: number
  ) {}

  async *[Symbol.asyncIterator](): AsyncIterator<EventEnvelope> {
    let next = this.fromVersion;

    while (next <= this.toVersion) {
      const from = next;
      const page = await this.call('readStream', () =>
        this.repository.readStream(this.streamId, from, this.toVersion, this.pageSize)
      );
      if (page.length === 0) return;

      for (const event of page) {
        yield event;
        next = event.version + 1;
      }
    }
  }

  async toArray(): Promise<EventEnvelope[]> {
    const events: EventEnvelope[] = [];
    for await (const event of this) {
      events.push(event);
    }
    return events;
  }
}

/**
 * Catch-up read across every stream in commit order, bounded by the head
 * position at creation time
 */
export class AllStreamsCursor implements AsyncIterable<JournalRecord> {
  constructor(
    private readonly repository: EventJournalRepository,
    private readonly call: StorageCall,
    readonly afterPosition: number,
    readonly toPosition: number,
    private readonly pageSize: number
  ) {}

  async *[Symbol.asyncIterator](): AsyncIterator<JournalRecord> {
    let after = this.afterPosition;

    while (after < this.toPosition) {
      const from = after;
      const page = await this.call('readAll', () =>
        this.repository.readAll(from, this.toPosition, this.pageSize)
      );
      if (page.length === 0) return;

      for (const record of page) {
        yield record;
        after = record.position;
      }
    }
  }
}

// =============================================================================
// EVENT JOURNAL SERVICE
// =============================================================================

const DEFAULT_PAGE_SIZE = 500;
const DEFAULT_RETRY = { maxRetries: 3, baseDelayMs: 50, maxDelayMs: 2000 };

/**
 * Event Journal Service - main interface for event operations
 *
 * @example
 * ```typescript
 * const journal = new EventJournal(new InMemoryEventJournalRepository());
 *
 * const result = await journal.append('acct-42', 0, [
 *   { type: 'Deposited', payload: { amount: 100 } },
 * ]);
 *
 * for await (const event of await journal.read('acct-42')) {
 *   console.log(event.version, event.type);
 * }
 * ```
 */
export class EventJournal {
  private publishers: EventPublisher[] = [];
  private inflight = new Set<Promise<void>>();
  private logger: Logger;
  private pageSize: number;
  private retry: Required<NonNullable<EventJournalOptions['retry']>>;
  private clock: () => Date;

  constructor(
    private readonly repository: EventJournalRepository,
    options: EventJournalOptions = {}
  ) {
    this.logger = createLogger({ name: 'event-journal' });
    this.pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
    this.retry = { ...DEFAULT_RETRY, ...options.retry };
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Add an event publisher (in-process delivery to projections)
   */
  addPublisher(publisher: EventPublisher): void {
    this.publishers.push(publisher);
  }

  /**
   * Append a batch to a stream if it is still at expectedVersion
   */
  async append(
    streamId: string,
    expectedVersion: number,
    events: readonly NewEvent[]
  ): Promise<AppendResult> {
    const validStreamId = this.validateStreamId(streamId);
    const validExpected = StreamVersionSchema.safeParse(expectedVersion);
    if (!validExpected.success) {
      throw new ValidationError('expectedVersion must be a non-negative integer', {
        expectedVersion,
      });
    }

    const batch = NewEventBatchSchema.safeParse(events);
    if (!batch.success) {
      throw new ValidationError('Invalid event batch', batch.error.flatten());
    }

    const envelopes = this.toEnvelopes(validStreamId, validExpected.data, batch.data);
    let attempts = 0;
    let result = await this.call('append', () => {
      attempts += 1;
      return this.repository.append(validStreamId, validExpected.data, envelopes);
    });

    // A retried append may conflict with its own earlier, unacknowledged commit
    if (result.status === 'conflict' && attempts > 1) {
      result = (await this.findCommittedBatch(validStreamId, validExpected.data, envelopes)) ?? result;
    }

    if (result.status === 'conflict') {
      this.logger.debug(
        { streamId, expectedVersion, actualVersion: result.actualVersion },
        'Append rejected: version conflict'
      );
      return result;
    }

    this.logger.debug(
      { streamId, version: result.version, count: result.events.length },
      'Events committed'
    );
    this.notifyPublishers(result.events);
    return result;
  }

  /**
   * Append and throw VersionConflictError instead of returning the conflict
   */
  async appendOrThrow(
    streamId: string,
    expectedVersion: number,
    events: readonly NewEvent[]
  ): Promise<number> {
    const result = await this.append(streamId, expectedVersion, events);
    if (result.status === 'conflict') {
      throw new VersionConflictError(streamId, result.expectedVersion, result.actualVersion);
    }
    return result.version;
  }

  /**
   * Read a stream from a version (inclusive); bounded by the version at call time
   */
  async read(streamId: string, fromVersion = 1): Promise<JournalCursor> {
    const validStreamId = this.validateStreamId(streamId);
    const toVersion = await this.getStreamVersion(validStreamId);
    return new JournalCursor(
      this.repository,
      this.call,
      validStreamId,
      Math.max(fromVersion, 1),
      toVersion,
      this.pageSize
    );
  }

  /**
   * Read every stream in commit order after a position
   */
  async readAll(afterPosition = 0): Promise<AllStreamsCursor> {
    const head = await this.call('getHeadPosition', () => this.repository.getHeadPosition());
    return new AllStreamsCursor(this.repository, this.call, afterPosition, head, this.pageSize);
  }

  async getStreamVersion(streamId: string): Promise<number> {
    return this.call('getStreamVersion', () => this.repository.getStreamVersion(streamId));
  }

  async listStreams(): Promise<string[]> {
    return this.call('listStreams', () => this.repository.listStreams());
  }

  /**
   * Erase payloads of a stream (right-to-be-forgotten); ordering metadata stays
   */
  async erasePayloads(streamId: string): Promise<number> {
    const erased = await this.call('erasePayloads', () => this.repository.erasePayloads(streamId));
    this.logger.info({ streamId, erased }, 'Stream payloads erased');
    return erased;
  }

  /**
   * Wait until every publisher notification issued so far has settled
   */
  async flush(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.all(this.inflight);
    }
  }

  private notifyPublishers(events: EventEnvelope[]): void {
    for (const publisher of this.publishers) {
      const delivery = publisher.publish(events).catch((err: unknown) => {
        this.logger.error(
          { err, streamId: events[0]?.streamId, count: events.length },
          'Failed to publish events'
        );
      });
      this.inflight.add(delivery);
      void delivery.finally(() => this.inflight.delete(delivery));
    }
  }

  private async findCommittedBatch(
    streamId: string,
    expectedVersion: number,
    envelopes: EventEnvelope[]
  ): Promise<AppendResult | null> {
    const toVersion = expectedVersion + envelopes.length;
    const stored = await this.call('readStream', () =>
      this.repository.readStream(streamId, expectedVersion + 1, toVersion, envelopes.length)
    );
    const committed =
      stored.length === envelopes.length &&
      stored.every((event, index) => event.eventId === envelopes[index]?.eventId);
    if (!committed) {
      return null;
    }

    this.logger.warn(
      { streamId, version: toVersion, count: stored.length },
      'Append acknowledgement lost; batch was already committed'
    );
    return { status: 'committed', streamId, version: toVersion, events: stored };
  }

  private toEnvelopes(
    streamId: string,
    expectedVersion: number,
    events: NewEvent[]
  ): EventEnvelope[] {
    const batchCorrelationId = uuidv4();
    const now = this.clock().toISOString();

    return events.map((event, index) => ({
      eventId: event.eventId ?? uuidv4(),
      streamId,
      version: expectedVersion + index + 1,
      type: event.type,
      payload: event.payload,
      correlationId: event.correlationId ?? batchCorrelationId,
      causationId: event.causationId ?? null,
      occurredAt: event.occurredAt ?? now,
    }));
  }

  private validateStreamId(streamId: string): string {
    const parsed = StreamIdSchema.safeParse(streamId);
    if (!parsed.success) {
      throw new ValidationError('Invalid streamId', parsed.error.flatten());
    }
    return parsed.data;
  }

  private call: StorageCall = (operation, fn) =>
    withRetry(fn, {
      maxRetries: this.retry.maxRetries,
      baseDelayMs: this.retry.baseDelayMs,
      maxDelayMs: this.retry.maxDelayMs,
      shouldRetry: (error) => error instanceof StorageError,
      onRetry: (error, attempt, delayMs) => {
        this.logger.warn({ err: error, operation, attempt, delayMs }, 'Storage call failed, retrying');
      },
    });
}

/**
 * Create an in-memory journal (for testing)
 */
export function createInMemoryEventJournal(options?: EventJournalOptions): EventJournal {
  return new EventJournal(new InMemoryEventJournalRepository(), options);
}
