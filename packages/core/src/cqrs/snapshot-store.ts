/**
 * CQRS Snapshot Store
 *
 * Provides efficient aggregate state reconstruction by:
 * - Storing periodic snapshots of folded stream state
 * - Loading from snapshot + subsequent events (vs full replay)
 * - Event-count and age based snapshot policy
 * - PostgreSQL persistence with TTL cleanup
 */

import { z } from 'zod';
import { JsonValueSchema, type JsonValue, type Snapshot } from '@streamvault/types';
import { createLogger, type Logger } from '../logger.js';
import { toStorageError, type DatabasePool } from '../database.js';

// ============================================================================
// SNAPSHOT STORE INTERFACES
// ============================================================================

export interface SnapshotStoreConfig {
  /** Snapshot once this many events accumulated since the last snapshot */
  everyEvents: number;
  /** Snapshot once the last snapshot is this old and the stream moved on */
  maxAgeMs: number;
  /** Superseded snapshots older than this are removed by cleanup */
  retentionMs: number;
  clock: () => Date;
}

export interface SnapshotStoreRepository {
  save(snapshot: Snapshot): Promise<void>;
  loadLatest(streamId: string): Promise<Snapshot | null>;
  /** Delete snapshots of a stream with version < the given version */
  deleteOlderThan(streamId: string, version: number): Promise<number>;
  /** Delete snapshots older than maxAgeMs, never the latest of a stream */
  cleanup(maxAgeMs: number, now: Date): Promise<number>;
}

const DEFAULT_CONFIG: SnapshotStoreConfig = {
  everyEvents: 1000,
  maxAgeMs: 10 * 60 * 1000, // 10 minutes
  retentionMs: 30 * 24 * 60 * 60 * 1000, // 30 days
  clock: () => new Date(),
};

// ============================================================================
// IN-MEMORY SNAPSHOT STORE
// ============================================================================

export class InMemorySnapshotStore implements SnapshotStoreRepository {
  // Per stream, ascending by version
  private snapshots = new Map<string, Snapshot[]>();

  save(snapshot: Snapshot): Promise<void> {
    const history = (this.snapshots.get(snapshot.streamId) ?? []).filter(
      (existing) => existing.version !== snapshot.version
    );
    history.push({ ...snapshot });
    history.sort((a, b) => a.version - b.version);
    this.snapshots.set(snapshot.streamId, history);
    return Promise.resolve();
  }

  loadLatest(streamId: string): Promise<Snapshot | null> {
    const history = this.snapshots.get(streamId) ?? [];
    const latest = history[history.length - 1];
    return Promise.resolve(latest ? { ...latest } : null);
  }

  deleteOlderThan(streamId: string, version: number): Promise<number> {
    const history = this.snapshots.get(streamId) ?? [];
    const kept = history.filter((snapshot) => snapshot.version >= version);
    if (history.length > 0) {
      this.snapshots.set(streamId, kept);
    }
    return Promise.resolve(history.length - kept.length);
  }

  cleanup(maxAgeMs: number, now: Date): Promise<number> {
    let deleted = 0;

    for (const [streamId, history] of this.snapshots) {
      const latest = history[history.length - 1];
      const kept = history.filter(
        (snapshot) =>
          snapshot === latest || now.getTime() - snapshot.takenAt.getTime() <= maxAgeMs
      );
      deleted += history.length - kept.length;
      this.snapshots.set(streamId, kept);
    }

    return Promise.resolve(deleted);
  }

  // For testing
  clear(): void {
    this.snapshots.clear();
  }

  size(): number {
    let total = 0;
    for (const history of this.snapshots.values()) {
      total += history.length;
    }
    return total;
  }
}

// ============================================================================
// POSTGRESQL SNAPSHOT STORE
// ============================================================================

export const SNAPSHOT_MIGRATION_SQL = `
CREATE TABLE IF NOT EXISTS stream_snapshots (
  stream_id VARCHAR(255) NOT NULL,
  version BIGINT NOT NULL,
  state JSONB NOT NULL,
  taken_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
  PRIMARY KEY (stream_id, version)
);

CREATE INDEX IF NOT EXISTS idx_stream_snapshots_latest
  ON stream_snapshots (stream_id, version DESC);

CREATE INDEX IF NOT EXISTS idx_stream_snapshots_taken_at
  ON stream_snapshots (taken_at);
`;

const SnapshotRowSchema = z.object({
  stream_id: z.string(),
  version: z.coerce.number(),
  state: JsonValueSchema,
  taken_at: z.coerce.date(),
});

export class PostgresSnapshotStore implements SnapshotStoreRepository {
  private logger: Logger;

  constructor(private readonly db: DatabasePool) {
    this.logger = createLogger({ name: 'snapshot-store' });
  }

  async initialize(): Promise<void> {
    await this.db.query(SNAPSHOT_MIGRATION_SQL);
    this.logger.info('Snapshot store initialized');
  }

  async save(snapshot: Snapshot): Promise<void> {
    try {
      await this.db.query(
        `INSERT INTO stream_snapshots (stream_id, version, state, taken_at)
         VALUES ($1, $2, $3, $4)
         ON CONFLICT (stream_id, version) DO UPDATE
         SET state = EXCLUDED.state, taken_at = EXCLUDED.taken_at`,
        [snapshot.streamId, snapshot.version, JSON.stringify(snapshot.state), snapshot.takenAt]
      );
    } catch (error) {
      throw toStorageError('saveSnapshot', error);
    }
  }

  async loadLatest(streamId: string): Promise<Snapshot | null> {
    try {
      const result = await this.db.query(
        `SELECT stream_id, version, state, taken_at FROM stream_snapshots
         WHERE stream_id = $1
         ORDER BY version DESC
         LIMIT 1`,
        [streamId]
      );

      const row = result.rows[0];
      if (!row) {
        return null;
      }
      const parsed = SnapshotRowSchema.parse(row);
      return {
        streamId: parsed.stream_id,
        version: parsed.version,
        state: parsed.state,
        takenAt: parsed.taken_at,
      };
    } catch (error) {
      throw toStorageError('loadSnapshot', error);
    }
  }

  async deleteOlderThan(streamId: string, version: number): Promise<number> {
    try {
      const result = await this.db.query(
        'DELETE FROM stream_snapshots WHERE stream_id = $1 AND version < $2',
        [streamId, version]
      );
      return result.rowCount ?? 0;
    } catch (error) {
      throw toStorageError('deleteSnapshots', error);
    }
  }

  async cleanup(maxAgeMs: number, now: Date): Promise<number> {
    const cutoff = new Date(now.getTime() - maxAgeMs);

    try {
      const result = await this.db.query(
        `DELETE FROM stream_snapshots s
         WHERE s.taken_at < $1
         AND s.version < (
           SELECT MAX(latest.version) FROM stream_snapshots latest
           WHERE latest.stream_id = s.stream_id
         )`,
        [cutoff]
      );
      return result.rowCount ?? 0;
    } catch (error) {
      throw toStorageError('cleanupSnapshots', error);
    }
  }
}

// ============================================================================
// SNAPSHOT POLICY
// ============================================================================

/**
 * Decides when the rehydrator persists a new snapshot.
 *
 * Snapshot when N events accumulated since the last one (or since the start of
 * the stream), or when the last one is older than T and the stream has moved
 * past it. Never for an empty stream.
 */
export class SnapshotPolicy {
  constructor(
    readonly everyEvents: number = DEFAULT_CONFIG.everyEvents,
    readonly maxAgeMs: number = DEFAULT_CONFIG.maxAgeMs
  ) {}

  shouldSnapshot(currentVersion: number, last: Snapshot | null, now: Date): boolean {
    if (currentVersion <= 0) {
      return false;
    }
    if (!last) {
      return currentVersion >= this.everyEvents;
    }
    if (currentVersion <= last.version) {
      return false;
    }
    if (currentVersion - last.version >= this.everyEvents) {
      return true;
    }
    return now.getTime() - last.takenAt.getTime() >= this.maxAgeMs;
  }
}

// ============================================================================
// SNAPSHOT MANAGER
// ============================================================================

export class SnapshotManager {
  private repository: SnapshotStoreRepository;
  private config: SnapshotStoreConfig;
  private logger: Logger;
  private cleanupInterval: ReturnType<typeof setInterval> | null = null;
  readonly policy: SnapshotPolicy;

  constructor(repository: SnapshotStoreRepository, config: Partial<SnapshotStoreConfig> = {}) {
    this.repository = repository;
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.policy = new SnapshotPolicy(this.config.everyEvents, this.config.maxAgeMs);
    this.logger = createLogger({ name: 'snapshot-manager' });
  }

  now(): Date {
    return this.config.clock();
  }

  /**
   * Save a snapshot and prune the ones it supersedes. A failed prune leaves
   * the older snapshots for the retention cleanup task.
   */
  async saveSnapshot(snapshot: Snapshot): Promise<void> {
    await this.repository.save(snapshot);

    let pruned = 0;
    try {
      pruned = await this.repository.deleteOlderThan(snapshot.streamId, snapshot.version);
    } catch (error) {
      this.logger.warn(
        { err: error, streamId: snapshot.streamId, version: snapshot.version },
        'Snapshot prune failed; left for retention cleanup'
      );
    }
    this.logger.debug(
      { streamId: snapshot.streamId, version: snapshot.version, pruned },
      'Snapshot saved'
    );
  }

  /**
   * Save state folded up to `version`, stamped with the manager's clock
   */
  async save(streamId: string, version: number, state: JsonValue): Promise<Snapshot> {
    const snapshot = { streamId, version, state, takenAt: this.config.clock() };
    await this.saveSnapshot(snapshot);
    return snapshot;
  }

  /**
   * Get the latest snapshot for a stream
   */
  async loadLatest(streamId: string): Promise<Snapshot | null> {
    return this.repository.loadLatest(streamId);
  }

  /**
   * Start periodic cleanup task. Saves already prune superseded snapshots, so
   * this only removes what a failed prune left behind.
   */
  startCleanupTask(intervalMs: number = 24 * 60 * 60 * 1000): void {
    this.stopCleanupTask();
    this.cleanupInterval = setInterval(() => {
      this.runCleanup()
        .then((deleted) => {
          if (deleted > 0) {
            this.logger.info({ deleted }, 'Snapshot cleanup completed');
          }
        })
        .catch((error: unknown) => {
          this.logger.error({ err: error }, 'Snapshot cleanup failed');
        });
    }, intervalMs);

    this.cleanupInterval.unref();
  }

  /**
   * Stop cleanup task
   */
  stopCleanupTask(): void {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = null;
    }
  }

  /**
   * Run cleanup manually
   */
  async runCleanup(): Promise<number> {
    return this.repository.cleanup(this.config.retentionMs, this.config.clock());
  }
}

// ============================================================================
// FACTORY FUNCTIONS
// ============================================================================

export function createSnapshotManager(
  repository: SnapshotStoreRepository,
  config?: Partial<SnapshotStoreConfig>
): SnapshotManager {
  return new SnapshotManager(repository, config);
}

export function createInMemorySnapshotManager(
  config?: Partial<SnapshotStoreConfig>
): SnapshotManager {
  return new SnapshotManager(new InMemorySnapshotStore(), config);
}
