/**
 * Sequence-aware Dead Letter Queue (SDLQ)
 *
 * When a projection fails on event v of a stream, the (projection, stream) pair
 * is quarantined: v and every later event of that stream are parked here in
 * version order, while every other stream keeps flowing. Redrive replays the
 * parked tail one event at a time through the projection's normal apply path.
 *
 * Features:
 * - O(1) quarantine lookup on the hot path (QuarantineRegistry)
 * - Contiguous, version-ordered queues; duplicates ignored, gaps rejected
 * - Partial redrive progress is kept; cancellation between events
 * - Opt-in scheduled redrive with per-entry exponential backoff
 */

import { z } from 'zod';
import {
  EventEnvelopeSchema,
  type DlqEntry,
  type DlqListing,
  type EventEnvelope,
  type StreamFlowState,
} from '@streamvault/types';
import { createLogger, type Logger } from './logger.js';
import { SequenceGapError, ValidationError, toError } from './errors.js';
import { toStorageError, withTransaction, type DatabasePool } from './database.js';
import { KeyedLock, projectionStreamKey } from './utils.js';

const logger: Logger = createLogger({ name: 'sequence-dlq' });

// =============================================================================
// TYPES
// =============================================================================

export interface QuarantineKey {
  projectionName: string;
  streamId: string;
}

export type RedriveResult =
  | {
      status: 'success';
      projectionName: string;
      streamId: string;
      redriven: number;
      lastVersion: number | null;
    }
  | {
      status: 'partial';
      projectionName: string;
      streamId: string;
      redriven: number;
      failedAtVersion: number;
      reason: string;
    }
  | {
      status: 'cancelled';
      projectionName: string;
      streamId: string;
      redriven: number;
      nextVersion: number | null;
    }
  | {
      status: 'not_quarantined';
      projectionName: string;
      streamId: string;
    };

/** Applies one event through the projection's normal path; throws on failure */
export type RedriveApply = (event: EventEnvelope) => Promise<void>;

export interface RedriveOptions {
  signal?: AbortSignal;
}

export type EnqueueOutcome = 'queued' | 'duplicate';

export interface DlqStats {
  quarantinedStreams: number;
  queuedEvents: number;
  byProjection: Record<string, number>;
}

export interface SequenceDlqRepository {
  /** Create an entry holding a single event; no-op if one is already open */
  open(key: QuarantineKey, event: EventEnvelope, reason: string, at: Date): Promise<void>;
  appendEvent(key: QuarantineKey, event: EventEnvelope, at: Date): Promise<void>;
  /** Highest queued version, or null when no entry is open */
  getTailVersion(key: QuarantineKey): Promise<number | null>;
  peekHead(key: QuarantineKey): Promise<EventEnvelope | null>;
  /** Remove the head event; failedAtVersion moves to the new head. Returns the remaining count */
  removeHead(key: QuarantineKey, version: number, at: Date): Promise<number>;
  recordFailure(key: QuarantineKey, failedAtVersion: number, reason: string, at: Date): Promise<void>;
  close(key: QuarantineKey): Promise<void>;
  get(key: QuarantineKey): Promise<DlqEntry | null>;
  list(): Promise<DlqListing[]>;
  listKeys(): Promise<QuarantineKey[]>;
  deleteProjection(projectionName: string): Promise<number>;
}

// =============================================================================
// QUARANTINE REGISTRY
// =============================================================================

/**
 * In-process index of quarantined (projection, stream) pairs.
 *
 * Owned by the SDLQ and shared by reference with the projection runner.
 * Mutated only on quarantine and close.
 */
export class QuarantineRegistry {
  // streamId -> projection names
  private byStream = new Map<string, Set<string>>();
  private total = 0;

  isQuarantined(projectionName: string, streamId: string): boolean {
    return this.byStream.get(streamId)?.has(projectionName) ?? false;
  }

  add(projectionName: string, streamId: string): void {
    let projections = this.byStream.get(streamId);
    if (!projections) {
      projections = new Set();
      this.byStream.set(streamId, projections);
    }
    if (!projections.has(projectionName)) {
      projections.add(projectionName);
      this.total++;
    }
  }

  remove(projectionName: string, streamId: string): void {
    const projections = this.byStream.get(streamId);
    if (projections?.delete(projectionName)) {
      this.total--;
      if (projections.size === 0) {
        this.byStream.delete(streamId);
      }
    }
  }

  /** Projections holding the stream in quarantine */
  projectionsFor(streamId: string): string[] {
    return Array.from(this.byStream.get(streamId) ?? []);
  }

  removeProjection(projectionName: string): number {
    let removed = 0;
    for (const streamId of Array.from(this.byStream.keys())) {
      if (this.isQuarantined(projectionName, streamId)) {
        this.remove(projectionName, streamId);
        removed++;
      }
    }
    return removed;
  }

  entries(): QuarantineKey[] {
    const keys: QuarantineKey[] = [];
    for (const [streamId, projections] of this.byStream) {
      for (const projectionName of projections) {
        keys.push({ projectionName, streamId });
      }
    }
    return keys;
  }

  clear(): void {
    this.byStream.clear();
    this.total = 0;
  }

  get size(): number {
    return this.total;
  }
}

// =============================================================================
// IN-MEMORY REPOSITORY
// =============================================================================

interface MutableEntry {
  failedAtVersion: number;
  reason: string;
  enqueuedAt: Date;
  updatedAt: Date;
  redriveAttempts: number;
  lastRedriveAt: Date | null;
  queuedEvents: EventEnvelope[];
}

/**
 * In-memory SDLQ storage (for development/testing)
 */
export class InMemorySequenceDlqRepository implements SequenceDlqRepository {
  private entries = new Map<string, { key: QuarantineKey; entry: MutableEntry }>();

  open(key: QuarantineKey, event: EventEnvelope, reason: string, at: Date): Promise<void> {
    const id = projectionStreamKey(key.projectionName, key.streamId);
    if (!this.entries.has(id)) {
      this.entries.set(id, {
        key: { ...key },
        entry: {
          failedAtVersion: event.version,
          reason,
          enqueuedAt: at,
          updatedAt: at,
          redriveAttempts: 0,
          lastRedriveAt: null,
          queuedEvents: [event],
        },
      });
    }
    return Promise.resolve();
  }

  appendEvent(key: QuarantineKey, event: EventEnvelope, at: Date): Promise<void> {
    const entry = this.require(key);
    entry.queuedEvents.push(event);
    entry.updatedAt = at;
    return Promise.resolve();
  }

  getTailVersion(key: QuarantineKey): Promise<number | null> {
    const entry = this.find(key);
    const tail = entry?.queuedEvents[entry.queuedEvents.length - 1];
    return Promise.resolve(tail ? tail.version : null);
  }

  peekHead(key: QuarantineKey): Promise<EventEnvelope | null> {
    return Promise.resolve(this.find(key)?.queuedEvents[0] ?? null);
  }

  removeHead(key: QuarantineKey, version: number, at: Date): Promise<number> {
    const entry = this.require(key);
    entry.queuedEvents = entry.queuedEvents.filter((event) => event.version !== version);
    const head = entry.queuedEvents[0];
    if (head) {
      entry.failedAtVersion = head.version;
    }
    entry.updatedAt = at;
    return Promise.resolve(entry.queuedEvents.length);
  }

  recordFailure(
    key: QuarantineKey,
    failedAtVersion: number,
    reason: string,
    at: Date
  ): Promise<void> {
    const entry = this.require(key);
    entry.failedAtVersion = failedAtVersion;
    entry.reason = reason;
    entry.redriveAttempts++;
    entry.lastRedriveAt = at;
    entry.updatedAt = at;
    return Promise.resolve();
  }

  close(key: QuarantineKey): Promise<void> {
    this.entries.delete(projectionStreamKey(key.projectionName, key.streamId));
    return Promise.resolve();
  }

  get(key: QuarantineKey): Promise<DlqEntry | null> {
    const entry = this.find(key);
    if (!entry) {
      return Promise.resolve(null);
    }
    return Promise.resolve({
      ...key,
      ...entry,
      queuedEvents: [...entry.queuedEvents],
    });
  }

  list(): Promise<DlqListing[]> {
    const listings = Array.from(this.entries.values(), ({ key, entry }) => ({
      projectionName: key.projectionName,
      streamId: key.streamId,
      failedAtVersion: entry.failedAtVersion,
      queuedCount: entry.queuedEvents.length,
      reason: entry.reason,
      enqueuedAt: entry.enqueuedAt,
      redriveAttempts: entry.redriveAttempts,
      lastRedriveAt: entry.lastRedriveAt,
    }));
    return Promise.resolve(
      listings.sort((a, b) => a.enqueuedAt.getTime() - b.enqueuedAt.getTime())
    );
  }

  listKeys(): Promise<QuarantineKey[]> {
    return Promise.resolve(Array.from(this.entries.values(), ({ key }) => ({ ...key })));
  }

  deleteProjection(projectionName: string): Promise<number> {
    let deleted = 0;
    for (const [id, { key }] of this.entries) {
      if (key.projectionName === projectionName) {
        this.entries.delete(id);
        deleted++;
      }
    }
    return Promise.resolve(deleted);
  }

  // For testing
  clear(): void {
    this.entries.clear();
  }

  private find(key: QuarantineKey): MutableEntry | undefined {
    return this.entries.get(projectionStreamKey(key.projectionName, key.streamId))?.entry;
  }

  private require(key: QuarantineKey): MutableEntry {
    const entry = this.find(key);
    if (!entry) {
      throw new ValidationError(`No open DLQ entry for ${key.projectionName}/${key.streamId}`);
    }
    return entry;
  }
}

// =============================================================================
// POSTGRESQL REPOSITORY
// =============================================================================

/**
 * SQL migration for the SDLQ tables
 * Run this before using the Postgres repository
 */
export const SEQUENCE_DLQ_MIGRATION_SQL = `
CREATE TABLE IF NOT EXISTS sequence_dlq_entries (
  projection_name VARCHAR(255) NOT NULL,
  stream_id VARCHAR(255) NOT NULL,
  failed_at_version BIGINT NOT NULL,
  reason TEXT NOT NULL,
  enqueued_at TIMESTAMPTZ NOT NULL,
  updated_at TIMESTAMPTZ NOT NULL,
  redrive_attempts INTEGER NOT NULL DEFAULT 0,
  last_redrive_at TIMESTAMPTZ,
  PRIMARY KEY (projection_name, stream_id)
);

CREATE TABLE IF NOT EXISTS sequence_dlq_events (
  projection_name VARCHAR(255) NOT NULL,
  stream_id VARCHAR(255) NOT NULL,
  version BIGINT NOT NULL,
  event JSONB NOT NULL,
  PRIMARY KEY (projection_name, stream_id, version),
  FOREIGN KEY (projection_name, stream_id)
    REFERENCES sequence_dlq_entries (projection_name, stream_id) ON DELETE CASCADE
);

CREATE INDEX IF NOT EXISTS idx_sequence_dlq_entries_enqueued
  ON sequence_dlq_entries (enqueued_at);
`;

const EntryRowSchema = z.object({
  projection_name: z.string(),
  stream_id: z.string(),
  failed_at_version: z.coerce.number(),
  reason: z.string(),
  enqueued_at: z.coerce.date(),
  updated_at: z.coerce.date(),
  redrive_attempts: z.coerce.number(),
  last_redrive_at: z.coerce.date().nullable(),
});

const ListingRowSchema = EntryRowSchema.extend({ queued_count: z.coerce.number() });

const EventRowSchema = z.object({ event: EventEnvelopeSchema });
const TailRowSchema = z.object({ tail: z.union([z.null(), z.coerce.number()]) });
const RemainingRowSchema = z.object({
  remaining: z.coerce.number(),
  head: z.union([z.null(), z.coerce.number()]),
});
const KeyRowSchema = z.object({ projection_name: z.string(), stream_id: z.string() });

/**
 * PostgreSQL SDLQ storage
 *
 * One row per open entry plus one row per parked event; closing an entry
 * cascades to its events.
 */
export class PostgresSequenceDlqRepository implements SequenceDlqRepository {
  constructor(private readonly db: DatabasePool) {}

  async initialize(): Promise<void> {
    await this.db.query(SEQUENCE_DLQ_MIGRATION_SQL);
    logger.info('Sequence DLQ initialized');
  }

  async open(key: QuarantineKey, event: EventEnvelope, reason: string, at: Date): Promise<void> {
    try {
      await withTransaction(this.db, async (client) => {
        const created = await client.query(
          `INSERT INTO sequence_dlq_entries
           (projection_name, stream_id, failed_at_version, reason, enqueued_at, updated_at)
           VALUES ($1, $2, $3, $4, $5, $5)
           ON CONFLICT (projection_name, stream_id) DO NOTHING`,
          [key.projectionName, key.streamId, event.version, reason, at]
        );
        if ((created.rowCount ?? 0) > 0) {
          await client.query(
            `INSERT INTO sequence_dlq_events (projection_name, stream_id, version, event)
             VALUES ($1, $2, $3, $4)`,
            [key.projectionName, key.streamId, event.version, JSON.stringify(event)]
          );
        }
      });
    } catch (error) {
      throw toStorageError('dlqOpen', error);
    }
  }

  async appendEvent(key: QuarantineKey, event: EventEnvelope, at: Date): Promise<void> {
    try {
      await withTransaction(this.db, async (client) => {
        await client.query(
          `INSERT INTO sequence_dlq_events (projection_name, stream_id, version, event)
           VALUES ($1, $2, $3, $4)
           ON CONFLICT (projection_name, stream_id, version) DO NOTHING`,
          [key.projectionName, key.streamId, event.version, JSON.stringify(event)]
        );
        await client.query(
          `UPDATE sequence_dlq_entries SET updated_at = $3
           WHERE projection_name = $1 AND stream_id = $2`,
          [key.projectionName, key.streamId, at]
        );
      });
    } catch (error) {
      throw toStorageError('dlqAppend', error);
    }
  }

  async getTailVersion(key: QuarantineKey): Promise<number | null> {
    try {
      const result = await this.db.query(
        `SELECT MAX(version) AS tail FROM sequence_dlq_events
         WHERE projection_name = $1 AND stream_id = $2`,
        [key.projectionName, key.streamId]
      );
      return TailRowSchema.parse(result.rows[0]).tail;
    } catch (error) {
      throw toStorageError('dlqTail', error);
    }
  }

  async peekHead(key: QuarantineKey): Promise<EventEnvelope | null> {
    try {
      const result = await this.db.query(
        `SELECT event FROM sequence_dlq_events
         WHERE projection_name = $1 AND stream_id = $2
         ORDER BY version ASC
         LIMIT 1`,
        [key.projectionName, key.streamId]
      );
      const row = result.rows[0];
      return row ? EventRowSchema.parse(row).event : null;
    } catch (error) {
      throw toStorageError('dlqPeek', error);
    }
  }

  async removeHead(key: QuarantineKey, version: number, at: Date): Promise<number> {
    try {
      return await withTransaction(this.db, async (client) => {
        await client.query(
          `DELETE FROM sequence_dlq_events
           WHERE projection_name = $1 AND stream_id = $2 AND version = $3`,
          [key.projectionName, key.streamId, version]
        );
        const counted = await client.query(
          `SELECT COUNT(*) AS remaining, MIN(version) AS head FROM sequence_dlq_events
           WHERE projection_name = $1 AND stream_id = $2`,
          [key.projectionName, key.streamId]
        );
        const { remaining, head } = RemainingRowSchema.parse(counted.rows[0]);
        if (head !== null) {
          await client.query(
            `UPDATE sequence_dlq_entries SET failed_at_version = $3, updated_at = $4
             WHERE projection_name = $1 AND stream_id = $2`,
            [key.projectionName, key.streamId, head, at]
          );
        }
        return remaining;
      });
    } catch (error) {
      throw toStorageError('dlqRemoveHead', error);
    }
  }

  async recordFailure(
    key: QuarantineKey,
    failedAtVersion: number,
    reason: string,
    at: Date
  ): Promise<void> {
    try {
      await this.db.query(
        `UPDATE sequence_dlq_entries
         SET failed_at_version = $3,
             reason = $4,
             redrive_attempts = redrive_attempts + 1,
             last_redrive_at = $5,
             updated_at = $5
         WHERE projection_name = $1 AND stream_id = $2`,
        [key.projectionName, key.streamId, failedAtVersion, reason, at]
      );
    } catch (error) {
      throw toStorageError('dlqRecordFailure', error);
    }
  }

  async close(key: QuarantineKey): Promise<void> {
    try {
      await this.db.query(
        'DELETE FROM sequence_dlq_entries WHERE projection_name = $1 AND stream_id = $2',
        [key.projectionName, key.streamId]
      );
    } catch (error) {
      throw toStorageError('dlqClose', error);
    }
  }

  async get(key: QuarantineKey): Promise<DlqEntry | null> {
    try {
      const entryResult = await this.db.query(
        'SELECT * FROM sequence_dlq_entries WHERE projection_name = $1 AND stream_id = $2',
        [key.projectionName, key.streamId]
      );
      const row = entryResult.rows[0];
      if (!row) {
        return null;
      }
      const entry = EntryRowSchema.parse(row);

      const eventsResult = await this.db.query(
        `SELECT event FROM sequence_dlq_events
         WHERE projection_name = $1 AND stream_id = $2
         ORDER BY version ASC`,
        [key.projectionName, key.streamId]
      );

      return {
        projectionName: entry.projection_name,
        streamId: entry.stream_id,
        failedAtVersion: entry.failed_at_version,
        reason: entry.reason,
        enqueuedAt: entry.enqueued_at,
        updatedAt: entry.updated_at,
        redriveAttempts: entry.redrive_attempts,
        lastRedriveAt: entry.last_redrive_at,
        queuedEvents: eventsResult.rows.map((eventRow) => EventRowSchema.parse(eventRow).event),
      };
    } catch (error) {
      throw toStorageError('dlqGet', error);
    }
  }

  async list(): Promise<DlqListing[]> {
    try {
      const result = await this.db.query(`
        SELECT e.*, COUNT(v.version) AS queued_count
        FROM sequence_dlq_entries e
        JOIN sequence_dlq_events v
          ON v.projection_name = e.projection_name AND v.stream_id = e.stream_id
        GROUP BY e.projection_name, e.stream_id
        ORDER BY e.enqueued_at ASC
      `);

      return result.rows.map((row) => {
        const parsed = ListingRowSchema.parse(row);
        return {
          projectionName: parsed.projection_name,
          streamId: parsed.stream_id,
          failedAtVersion: parsed.failed_at_version,
          queuedCount: parsed.queued_count,
          reason: parsed.reason,
          enqueuedAt: parsed.enqueued_at,
          redriveAttempts: parsed.redrive_attempts,
          lastRedriveAt: parsed.last_redrive_at,
        };
      });
    } catch (error) {
      throw toStorageError('dlqList', error);
    }
  }

  async listKeys(): Promise<QuarantineKey[]> {
    try {
      const result = await this.db.query(
        'SELECT projection_name, stream_id FROM sequence_dlq_entries'
      );
      return result.rows.map((row) => {
        const parsed = KeyRowSchema.parse(row);
        return { projectionName: parsed.projection_name, streamId: parsed.stream_id };
      });
    } catch (error) {
      throw toStorageError('dlqListKeys', error);
    }
  }

  async deleteProjection(projectionName: string): Promise<number> {
    try {
      const result = await this.db.query(
        'DELETE FROM sequence_dlq_entries WHERE projection_name = $1',
        [projectionName]
      );
      return result.rowCount ?? 0;
    } catch (error) {
      throw toStorageError('dlqDeleteProjection', error);
    }
  }
}

// =============================================================================
// SDLQ SERVICE
// =============================================================================

export interface SequenceDeadLetterQueueOptions {
  registry?: QuarantineRegistry;
  lock?: KeyedLock;
  clock?: () => Date;
}

type RedriveStep =
  | { kind: 'applied'; version: number; closed: boolean }
  | { kind: 'failed'; version: number; reason: string }
  | { kind: 'closed' };

/**
 * Sequence-aware DLQ service
 *
 * `quarantine` and `enqueue` are called by the projection runner while it holds
 * the (projection, stream) lock; `redrive` takes that same lock for each event.
 *
 * @example
 * ```typescript
 * const dlq = new SequenceDeadLetterQueue(new InMemorySequenceDlqRepository());
 * await dlq.initialize();
 *
 * const result = await dlq.redrive('balances.v1', 'acct-42', async (event) => {
 *   await readModels.transaction('balances.v1', (tx) => applyBalance(tx, event));
 * });
 * ```
 */
export class SequenceDeadLetterQueue {
  readonly registry: QuarantineRegistry;
  readonly lock: KeyedLock;
  private clock: () => Date;

  constructor(
    private readonly repository: SequenceDlqRepository,
    options: SequenceDeadLetterQueueOptions = {}
  ) {
    this.registry = options.registry ?? new QuarantineRegistry();
    this.lock = options.lock ?? new KeyedLock();
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Rebuild the quarantine registry from storage
   */
  async initialize(): Promise<void> {
    const keys = await this.repository.listKeys();
    this.registry.clear();
    for (const key of keys) {
      this.registry.add(key.projectionName, key.streamId);
    }
    logger.info({ quarantined: keys.length }, 'Quarantine registry loaded');
  }

  isQuarantined(projectionName: string, streamId: string): boolean {
    return this.registry.isQuarantined(projectionName, streamId);
  }

  getState(projectionName: string, streamId: string): StreamFlowState {
    return this.isQuarantined(projectionName, streamId) ? 'QUARANTINED' : 'FLOWING';
  }

  /**
   * Run a task under the (projection, stream) lock
   */
  runExclusive<T>(projectionName: string, streamId: string, task: () => Promise<T>): Promise<T> {
    return this.lock.run(projectionStreamKey(projectionName, streamId), task);
  }

  /**
   * FLOWING -> QUARANTINED at event.version; appends instead if already quarantined
   */
  async quarantine(projectionName: string, event: EventEnvelope, reason: string): Promise<void> {
    if (this.registry.isQuarantined(projectionName, event.streamId)) {
      await this.enqueue(projectionName, event);
      return;
    }

    await this.repository.open(
      { projectionName, streamId: event.streamId },
      event,
      reason,
      this.clock()
    );
    this.registry.add(projectionName, event.streamId);

    logger.warn(
      {
        projectionName,
        streamId: event.streamId,
        version: event.version,
        eventId: event.eventId,
        eventType: event.type,
        reason,
      },
      'Stream quarantined for projection'
    );
  }

  /**
   * Park an event behind the open entry of its stream
   * @throws SequenceGapError when the event does not follow the queue tail
   */
  async enqueue(projectionName: string, event: EventEnvelope): Promise<EnqueueOutcome> {
    const key = { projectionName, streamId: event.streamId };
    const tail = await this.repository.getTailVersion(key);

    if (tail === null) {
      throw new ValidationError(
        `Stream ${event.streamId} is not quarantined for ${projectionName}`
      );
    }
    if (event.version <= tail) {
      logger.debug(
        { projectionName, streamId: event.streamId, version: event.version, tail },
        'Duplicate event ignored by DLQ'
      );
      return 'duplicate';
    }
    if (event.version !== tail + 1) {
      throw new SequenceGapError(event.streamId, tail + 1, event.version);
    }

    await this.repository.appendEvent(key, event, this.clock());
    return 'queued';
  }

  /**
   * Replay the parked tail in version order, one event at a time
   */
  async redrive(
    projectionName: string,
    streamId: string,
    apply: RedriveApply,
    options: RedriveOptions = {}
  ): Promise<RedriveResult> {
    if (!this.registry.isQuarantined(projectionName, streamId)) {
      return { status: 'not_quarantined', projectionName, streamId };
    }

    const key = { projectionName, streamId };
    let redriven = 0;
    let lastVersion: number | null = null;
    logger.info({ projectionName, streamId }, 'Redrive started');

    for (;;) {
      if (options.signal?.aborted) {
        const head = await this.repository.peekHead(key);
        logger.info(
          { projectionName, streamId, redriven, nextVersion: head?.version ?? null },
          'Redrive cancelled'
        );
        return {
          status: 'cancelled',
          projectionName,
          streamId,
          redriven,
          nextVersion: head?.version ?? null,
        };
      }

      const step = await this.runExclusive(projectionName, streamId, () =>
        this.redriveStep(key, apply)
      );

      if (step.kind === 'failed') {
        logger.warn(
          { projectionName, streamId, redriven, failedAtVersion: step.version, reason: step.reason },
          'Redrive stopped at failing event'
        );
        return {
          status: 'partial',
          projectionName,
          streamId,
          redriven,
          failedAtVersion: step.version,
          reason: step.reason,
        };
      }

      if (step.kind === 'applied') {
        redriven++;
        lastVersion = step.version;
      }

      if (step.kind === 'closed' || step.closed) {
        logger.info({ projectionName, streamId, redriven, lastVersion }, 'Redrive completed');
        return { status: 'success', projectionName, streamId, redriven, lastVersion };
      }
    }
  }

  private async redriveStep(key: QuarantineKey, apply: RedriveApply): Promise<RedriveStep> {
    const head = await this.repository.peekHead(key);
    if (!head) {
      await this.closeEntry(key);
      return { kind: 'closed' };
    }

    try {
      await apply(head);
    } catch (error) {
      const reason = toError(error).message;
      await this.repository.recordFailure(key, head.version, reason, this.clock());
      return { kind: 'failed', version: head.version, reason };
    }

    const remaining = await this.repository.removeHead(key, head.version, this.clock());
    if (remaining === 0) {
      await this.closeEntry(key);
      return { kind: 'applied', version: head.version, closed: true };
    }
    return { kind: 'applied', version: head.version, closed: false };
  }

  private async closeEntry(key: QuarantineKey): Promise<void> {
    await this.repository.close(key);
    this.registry.remove(key.projectionName, key.streamId);
  }

  async list(): Promise<DlqListing[]> {
    return this.repository.list();
  }

  async get(projectionName: string, streamId: string): Promise<DlqEntry | null> {
    return this.repository.get({ projectionName, streamId });
  }

  async getStats(): Promise<DlqStats> {
    const listings = await this.repository.list();
    const byProjection: Record<string, number> = {};
    let queuedEvents = 0;

    for (const listing of listings) {
      byProjection[listing.projectionName] = (byProjection[listing.projectionName] ?? 0) + 1;
      queuedEvents += listing.queuedCount;
    }

    return { quarantinedStreams: listings.length, queuedEvents, byProjection };
  }

  /**
   * Drop every entry of a projection (retired or rebuilt read models)
   */
  async discardProjection(projectionName: string): Promise<number> {
    const deleted = await this.repository.deleteProjection(projectionName);
    this.registry.removeProjection(projectionName);
    if (deleted > 0) {
      logger.info({ projectionName, deleted }, 'DLQ entries discarded');
    }
    return deleted;
  }
}

// =============================================================================
// SCHEDULED REDRIVE
// =============================================================================

export interface RedriveSchedulerOptions {
  intervalMs: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Entries with this many failed redrives are left for an operator */
  maxAutoAttempts: number;
  clock?: () => Date;
}

export type ScheduledRedrive = (projectionName: string, streamId: string) => Promise<RedriveResult>;

/**
 * Opt-in periodic redrive with per-entry exponential backoff
 */
export class RedriveScheduler {
  private timer: ReturnType<typeof setInterval> | null = null;
  private running = false;
  private clock: () => Date;

  constructor(
    private readonly dlq: SequenceDeadLetterQueue,
    private readonly redrive: ScheduledRedrive,
    private readonly options: RedriveSchedulerOptions
  ) {
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * When the entry becomes eligible, or null once automatic attempts are spent
   */
  nextAttemptAt(listing: DlqListing): Date | null {
    if (listing.redriveAttempts >= this.options.maxAutoAttempts) {
      return null;
    }
    const delay = Math.min(
      this.options.baseDelayMs * Math.pow(2, listing.redriveAttempts),
      this.options.maxDelayMs
    );
    const reference = listing.lastRedriveAt ?? listing.enqueuedAt;
    return new Date(reference.getTime() + delay);
  }

  /**
   * Redrive every due entry once; returns how many were attempted
   */
  async tick(): Promise<number> {
    if (this.running) {
      return 0;
    }
    this.running = true;

    try {
      const now = this.clock();
      let attempted = 0;

      for (const listing of await this.dlq.list()) {
        const dueAt = this.nextAttemptAt(listing);
        if (!dueAt || dueAt.getTime() > now.getTime()) {
          continue;
        }
        attempted++;
        const result = await this.redrive(listing.projectionName, listing.streamId);
        logger.info(
          {
            projectionName: listing.projectionName,
            streamId: listing.streamId,
            status: result.status,
            attempt: listing.redriveAttempts + 1,
          },
          'Scheduled redrive finished'
        );
      }

      return attempted;
    } finally {
      this.running = false;
    }
  }

  start(): void {
    this.stop();
    this.timer = setInterval(() => {
      this.tick().catch((error: unknown) => {
        logger.error({ err: error }, 'Scheduled redrive failed');
      });
    }, this.options.intervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }
}
