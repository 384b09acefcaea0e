/**
 * CQRS Projections
 *
 * Read models built from event streams with:
 * - Event handlers for read-model updates
 * - A per-stream checkpoint committed with every read-model write
 * - In-memory and PostgreSQL read-model storage
 */

import { z } from 'zod';
import { JsonValueSchema, type EventEnvelope, type JsonValue } from '@streamvault/types';
import { createLogger, type Logger } from '../logger.js';
import { ValidationError } from '../errors.js';
import { toStorageError, withTransaction, type DatabaseClient, type DatabasePool } from '../database.js';

// ============================================================================
// CORE TYPES
// ============================================================================

/** Key/value access to one projection's read model */
export interface ReadModelAccess {
  get(key: string): Promise<JsonValue | undefined>;
  put(key: string, value: JsonValue): Promise<void>;
  delete(key: string): Promise<void>;
}

/** Read-model access plus the per-stream checkpoint, committed together */
export interface ReadModelTransaction extends ReadModelAccess {
  getCheckpoint(streamId: string): Promise<number>;
  setCheckpoint(streamId: string, version: number): Promise<void>;
}

export interface ReadModelRow {
  key: string;
  value: JsonValue;
}

export interface ReadModelStore {
  /** Run fn in one unit of work; nothing it wrote is visible if it throws */
  transaction<T>(namespace: string, fn: (tx: ReadModelTransaction) => Promise<T>): Promise<T>;
  get(namespace: string, key: string): Promise<JsonValue | undefined>;
  list(namespace: string): Promise<ReadModelRow[]>;
  getCheckpoint(namespace: string, streamId: string): Promise<number>;
  /** Drop every row and checkpoint of a namespace */
  clear(namespace: string): Promise<void>;
}

/**
 * Must be idempotent: a pure function of the event and already-committed rows
 */
export type ProjectionHandler = (
  readModel: ReadModelAccess,
  event: EventEnvelope
) => Promise<void> | void;

export interface ProjectionDefinition {
  name: string;
  version: number;
  handlers: Map<string, ProjectionHandler>;
  /** Runs for event types without a dedicated handler */
  fallback: ProjectionHandler | null;
}

/**
 * Storage namespace of one projection version
 */
export function projectionNamespace(definition: Pick<ProjectionDefinition, 'name' | 'version'>): string {
  return `${definition.name}.v${definition.version}`;
}

// ============================================================================
// PROJECTION BUILDER
// ============================================================================

export class ProjectionBuilder {
  private handlers = new Map<string, ProjectionHandler>();
  private fallback: ProjectionHandler | null = null;

  constructor(
    private name: string,
    private version: number
  ) {}

  /**
   * Register handler for an event type
   */
  on(eventType: string, handler: ProjectionHandler): this {
    this.handlers.set(eventType, handler);
    return this;
  }

  /**
   * Register handler for an event type with a validated payload
   */
  onPayload<TPayload>(
    eventType: string,
    schema: z.ZodType<TPayload, z.ZodTypeDef, unknown>,
    handler: (readModel: ReadModelAccess, payload: TPayload, event: EventEnvelope) => Promise<void> | void
  ): this {
    const projectionName = this.name;
    return this.on(eventType, (readModel, event) => {
      const parsed = schema.safeParse(event.payload);
      if (!parsed.success) {
        throw new ValidationError(
          `Projection ${projectionName} rejected ${eventType} at ${event.streamId}@${event.version}`,
          parsed.error.flatten()
        );
      }
      return handler(readModel, parsed.data, event);
    });
  }

  /**
   * Handle every event type that has no dedicated handler
   */
  onAny(handler: ProjectionHandler): this {
    this.fallback = handler;
    return this;
  }

  /**
   * Build the projection definition
   */
  build(): ProjectionDefinition {
    if (!Number.isInteger(this.version) || this.version < 1) {
      throw new ValidationError('Projection version must be a positive integer', {
        name: this.name,
        version: this.version,
      });
    }
    return {
      name: this.name,
      version: this.version,
      handlers: new Map(this.handlers),
      fallback: this.fallback,
    };
  }
}

/**
 * Create a new projection builder
 */
export function defineProjection(name: string, version = 1): ProjectionBuilder {
  return new ProjectionBuilder(name, version);
}

/**
 * Handler for an event, or null when the projection ignores its type
 */
export function resolveHandler(
  definition: ProjectionDefinition,
  eventType: string
): ProjectionHandler | null {
  return definition.handlers.get(eventType) ?? definition.fallback;
}

// ============================================================================
// IN-MEMORY READ MODEL STORE
// ============================================================================

interface NamespaceState {
  rows: Map<string, JsonValue>;
  checkpoints: Map<string, number>;
}

/**
 * In-memory read models (for development/testing)
 *
 * Writes are staged per transaction and applied only when fn resolves.
 */
export class InMemoryReadModelStore implements ReadModelStore {
  private namespaces = new Map<string, NamespaceState>();

  async transaction<T>(namespace: string, fn: (tx: ReadModelTransaction) => Promise<T>): Promise<T> {
    const committed = this.namespaceState(namespace);
    // undefined marks a staged delete
    const staged = new Map<string, JsonValue | undefined>();
    const stagedCheckpoints = new Map<string, number>();

    const tx: ReadModelTransaction = {
      get: (key) => {
        const value = staged.has(key) ? staged.get(key) : committed.rows.get(key);
        return Promise.resolve(value === undefined ? undefined : structuredClone(value));
      },
      put: (key, value) => {
        staged.set(key, structuredClone(value));
        return Promise.resolve();
      },
      delete: (key) => {
        staged.set(key, undefined);
        return Promise.resolve();
      },
      getCheckpoint: (streamId) =>
        Promise.resolve(stagedCheckpoints.get(streamId) ?? committed.checkpoints.get(streamId) ?? 0),
      setCheckpoint: (streamId, version) => {
        stagedCheckpoints.set(streamId, version);
        return Promise.resolve();
      },
    };

    const result = await fn(tx);

    for (const [key, value] of staged) {
      if (value === undefined) {
        committed.rows.delete(key);
      } else {
        committed.rows.set(key, value);
      }
    }
    for (const [streamId, version] of stagedCheckpoints) {
      committed.checkpoints.set(streamId, version);
    }

    return result;
  }

  get(namespace: string, key: string): Promise<JsonValue | undefined> {
    const value = this.namespaces.get(namespace)?.rows.get(key);
    return Promise.resolve(value === undefined ? undefined : structuredClone(value));
  }

  list(namespace: string): Promise<ReadModelRow[]> {
    const rows = this.namespaces.get(namespace)?.rows ?? new Map<string, JsonValue>();
    return Promise.resolve(
      Array.from(rows, ([key, value]) => ({ key, value: structuredClone(value) })).sort((a, b) =>
        a.key.localeCompare(b.key)
      )
    );
  }

  getCheckpoint(namespace: string, streamId: string): Promise<number> {
    return Promise.resolve(this.namespaces.get(namespace)?.checkpoints.get(streamId) ?? 0);
  }

  clear(namespace: string): Promise<void> {
    this.namespaces.delete(namespace);
    return Promise.resolve();
  }

  private namespaceState(namespace: string): NamespaceState {
    let state = this.namespaces.get(namespace);
    if (!state) {
      state = { rows: new Map(), checkpoints: new Map() };
      this.namespaces.set(namespace, state);
    }
    return state;
  }
}

// ============================================================================
// POSTGRESQL READ MODEL STORE
// ============================================================================

export const READ_MODEL_MIGRATION_SQL = `
CREATE TABLE IF NOT EXISTS projection_read_models (
  namespace VARCHAR(255) NOT NULL,
  key VARCHAR(512) NOT NULL,
  value JSONB NOT NULL,
  updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
  PRIMARY KEY (namespace, key)
);

CREATE TABLE IF NOT EXISTS projection_checkpoints (
  namespace VARCHAR(255) NOT NULL,
  stream_id VARCHAR(255) NOT NULL,
  last_applied_version BIGINT NOT NULL,
  updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
  PRIMARY KEY (namespace, stream_id)
);
`;

const ValueRowSchema = z.object({ value: JsonValueSchema });
const KeyValueRowSchema = z.object({ key: z.string(), value: JsonValueSchema });
const CheckpointRowSchema = z.object({ last_applied_version: z.coerce.number() });

async function selectValue(
  client: DatabaseClient,
  namespace: string,
  key: string
): Promise<JsonValue | undefined> {
  const result = await client.query(
    'SELECT value FROM projection_read_models WHERE namespace = $1 AND key = $2',
    [namespace, key]
  );
  const row = result.rows[0];
  return row ? ValueRowSchema.parse(row).value : undefined;
}

async function selectCheckpoint(
  client: DatabaseClient,
  namespace: string,
  streamId: string,
  forUpdate: boolean
): Promise<number> {
  const result = await client.query(
    `SELECT last_applied_version FROM projection_checkpoints
     WHERE namespace = $1 AND stream_id = $2${forUpdate ? ' FOR UPDATE' : ''}`,
    [namespace, streamId]
  );
  const row = result.rows[0];
  return row ? CheckpointRowSchema.parse(row).last_applied_version : 0;
}

/**
 * PostgreSQL read models
 *
 * Handler writes and the checkpoint upsert share one pg transaction.
 */
export class PostgresReadModelStore implements ReadModelStore {
  private logger: Logger;

  constructor(private readonly db: DatabasePool) {
    this.logger = createLogger({ name: 'read-model-store' });
  }

  async initialize(): Promise<void> {
    await this.db.query(READ_MODEL_MIGRATION_SQL);
    this.logger.info('Read model store initialized');
  }

  async transaction<T>(namespace: string, fn: (tx: ReadModelTransaction) => Promise<T>): Promise<T> {
    return withTransaction(this.db, async (client) => {
      const tx: ReadModelTransaction = {
        get: (key) => selectValue(client, namespace, key),
        put: async (key, value) => {
          await client.query(
            `INSERT INTO projection_read_models (namespace, key, value, updated_at)
             VALUES ($1, $2, $3, NOW())
             ON CONFLICT (namespace, key) DO UPDATE
             SET value = EXCLUDED.value, updated_at = NOW()`,
            [namespace, key, JSON.stringify(value)]
          );
        },
        delete: async (key) => {
          await client.query(
            'DELETE FROM projection_read_models WHERE namespace = $1 AND key = $2',
            [namespace, key]
          );
        },
        getCheckpoint: (streamId) => selectCheckpoint(client, namespace, streamId, true),
        setCheckpoint: async (streamId, version) => {
          await client.query(
            `INSERT INTO projection_checkpoints (namespace, stream_id, last_applied_version, updated_at)
             VALUES ($1, $2, $3, NOW())
             ON CONFLICT (namespace, stream_id) DO UPDATE
             SET last_applied_version = EXCLUDED.last_applied_version, updated_at = NOW()`,
            [namespace, streamId, version]
          );
        },
      };
      return fn(tx);
    });
  }

  async get(namespace: string, key: string): Promise<JsonValue | undefined> {
    try {
      return await selectValue(this.db, namespace, key);
    } catch (error) {
      throw toStorageError('getReadModel', error);
    }
  }

  async list(namespace: string): Promise<ReadModelRow[]> {
    try {
      const result = await this.db.query(
        'SELECT key, value FROM projection_read_models WHERE namespace = $1 ORDER BY key',
        [namespace]
      );
      return result.rows.map((row) => KeyValueRowSchema.parse(row));
    } catch (error) {
      throw toStorageError('listReadModel', error);
    }
  }

  async getCheckpoint(namespace: string, streamId: string): Promise<number> {
    try {
      return await selectCheckpoint(this.db, namespace, streamId, false);
    } catch (error) {
      throw toStorageError('getCheckpoint', error);
    }
  }

  async clear(namespace: string): Promise<void> {
    await withTransaction(this.db, async (client) => {
      await client.query('DELETE FROM projection_read_models WHERE namespace = $1', [namespace]);
      await client.query('DELETE FROM projection_checkpoints WHERE namespace = $1', [namespace]);
    });
    this.logger.info({ namespace }, 'Read model cleared');
  }
}
