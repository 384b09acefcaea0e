/**
 * Event-sourcing engine
 *
 * Wires the journal, snapshot manager, read-model store, SDLQ and projection
 * runner together. In-memory adapters by default; PostgreSQL when a pool is
 * supplied.
 */

import type { DlqListing, EventEnvelope, NewEvent, Snapshot } from '@streamvault/types';
import {
  EventJournal,
  InMemoryEventJournalRepository,
  PostgresEventJournalRepository,
  type AppendResult,
  type EventJournalRepository,
  type JournalCursor,
} from './event-journal.js';
import {
  InMemorySnapshotStore,
  PostgresSnapshotStore,
  SnapshotManager,
  type SnapshotStoreRepository,
} from './cqrs/snapshot-store.js';
import {
  InMemoryReadModelStore,
  PostgresReadModelStore,
  defineProjection,
  type ProjectionDefinition,
  type ProjectionHandler,
  type ReadModelStore,
} from './cqrs/projections.js';
import {
  ProjectionRunner,
  type ProjectionInfo,
  type ReplayOptions,
  type ReplayReport,
} from './cqrs/projection-runner.js';
import { Rehydrator, type RehydratorOptions } from './cqrs/rehydrator.js';
import {
  ConcurrencyController,
  type ConcurrencyControllerOptions,
} from './cqrs/concurrency-controller.js';
import type { AggregateDefinition, EventMap } from './cqrs/aggregate.js';
import {
  InMemorySequenceDlqRepository,
  PostgresSequenceDlqRepository,
  RedriveScheduler,
  SequenceDeadLetterQueue,
  type DlqStats,
  type RedriveResult,
  type SequenceDlqRepository,
} from './sequence-dead-letter-queue.js';
import { loadConfig, type StreamVaultConfig } from './env.js';
import { createDatabasePool, type DatabasePool } from './database.js';
import { createLogger, type Logger } from './logger.js';

export interface EventSourcingEngineOptions {
  /** PostgreSQL pool; built from config.databaseUrl when omitted, in-memory when neither is set */
  database?: DatabasePool;
  /** Defaults to loadConfig(process.env) */
  config?: StreamVaultConfig;
  /** Deliver committed appends to the projection runner in process (default true) */
  autoProject?: boolean;
  clock?: () => Date;
}

export interface EngineRedriveOptions {
  /** Only this projection; every quarantined projection of the stream otherwise */
  projectionName?: string;
  signal?: AbortSignal;
}

export interface EngineRedriveResult {
  status: 'success' | 'partial' | 'cancelled' | 'not_quarantined';
  streamId: string;
  results: RedriveResult[];
}

interface Adapters {
  journal: EventJournalRepository;
  snapshots: SnapshotStoreRepository;
  readModels: ReadModelStore;
  dlq: SequenceDlqRepository;
  migrations: Array<{ initialize(): Promise<void> }>;
}

function createAdapters(database: DatabasePool | undefined): Adapters {
  if (!database) {
    return {
      journal: new InMemoryEventJournalRepository(),
      snapshots: new InMemorySnapshotStore(),
      readModels: new InMemoryReadModelStore(),
      dlq: new InMemorySequenceDlqRepository(),
      migrations: [],
    };
  }

  const journal = new PostgresEventJournalRepository(database);
  const snapshots = new PostgresSnapshotStore(database);
  const readModels = new PostgresReadModelStore(database);
  const dlq = new PostgresSequenceDlqRepository(database);
  return { journal, snapshots, readModels, dlq, migrations: [journal, snapshots, readModels, dlq] };
}

export class EventSourcingEngine {
  readonly config: StreamVaultConfig;
  readonly journal: EventJournal;
  readonly snapshots: SnapshotManager;
  readonly readModels: ReadModelStore;
  readonly dlq: SequenceDeadLetterQueue;
  readonly runner: ProjectionRunner;
  private scheduler: RedriveScheduler | null = null;
  private migrations: Array<{ initialize(): Promise<void> }>;
  private database: DatabasePool | undefined;
  private logger: Logger;

  constructor(options: EventSourcingEngineOptions = {}) {
    this.config = options.config ?? loadConfig();
    this.database =
      options.database ??
      (this.config.databaseUrl
        ? createDatabasePool({ connectionString: this.config.databaseUrl })
        : undefined);
    this.logger = createLogger({ name: 'event-sourcing-engine' });

    const clock = options.clock ?? (() => new Date());
    const adapters = createAdapters(this.database);
    this.migrations = adapters.migrations;

    this.journal = new EventJournal(adapters.journal, {
      pageSize: this.config.storage.pageSize,
      retry: {
        maxRetries: this.config.storage.maxRetries,
        baseDelayMs: this.config.storage.baseDelayMs,
      },
      clock,
    });
    this.snapshots = new SnapshotManager(adapters.snapshots, {
      everyEvents: this.config.snapshot.everyEvents,
      maxAgeMs: this.config.snapshot.maxAgeMs,
      retentionMs: this.config.snapshot.retentionMs,
      clock,
    });
    this.readModels = adapters.readModels;
    this.dlq = new SequenceDeadLetterQueue(adapters.dlq, { clock });
    this.runner = new ProjectionRunner(this.journal, this.readModels, this.dlq);

    if (options.autoProject ?? true) {
      this.journal.addPublisher(this.runner);
    }

    if (this.config.redrive.autoEnabled) {
      this.scheduler = new RedriveScheduler(
        this.dlq,
        (namespace, streamId) => this.redriveNamespace(namespace, streamId),
        {
          intervalMs: this.config.redrive.intervalMs,
          baseDelayMs: this.config.redrive.baseDelayMs,
          maxDelayMs: this.config.redrive.maxDelayMs,
          maxAutoAttempts: this.config.redrive.maxAutoAttempts,
          clock,
        }
      );
    }
  }

  /**
   * Run migrations, load the quarantine registry, start background tasks
   */
  async initialize(): Promise<void> {
    for (const migration of this.migrations) {
      await migration.initialize();
    }
    await this.dlq.initialize();
    this.snapshots.startCleanupTask();
    this.scheduler?.start();
    this.logger.info(
      { storage: this.database ? 'postgres' : 'memory', autoRedrive: this.scheduler !== null },
      'Event-sourcing engine initialized'
    );
  }

  /**
   * Stop background tasks, drain projection deliveries, release the pool
   */
  async close(): Promise<void> {
    this.scheduler?.stop();
    this.snapshots.stopCleanupTask();
    await this.journal.flush();
    if (this.database) {
      await this.database.end();
    }
    this.logger.info('Event-sourcing engine closed');
  }

  /**
   * Wait until projections have seen every append made so far
   */
  async flush(): Promise<void> {
    await this.journal.flush();
  }

  // ==========================================================================
  // JOURNAL
  // ==========================================================================

  async append(
    streamId: string,
    expectedVersion: number,
    events: readonly NewEvent[]
  ): Promise<AppendResult> {
    return this.journal.append(streamId, expectedVersion, events);
  }

  async read(streamId: string, fromVersion = 1): Promise<JournalCursor> {
    return this.journal.read(streamId, fromVersion);
  }

  async readEvents(streamId: string, fromVersion = 1): Promise<EventEnvelope[]> {
    const cursor = await this.journal.read(streamId, fromVersion);
    return cursor.toArray();
  }

  // ==========================================================================
  // SNAPSHOTS & COMMANDS
  // ==========================================================================

  /**
   * Latest snapshot of a stream
   */
  async snapshot(streamId: string): Promise<Snapshot | null> {
    return this.snapshots.loadLatest(streamId);
  }

  createRehydrator<TState, TEvents extends EventMap>(
    definition: AggregateDefinition<TState, TEvents>,
    options: Omit<RehydratorOptions, 'snapshots'> = {}
  ): Rehydrator<TState, TEvents> {
    return new Rehydrator(definition, this.journal, { ...options, snapshots: this.snapshots });
  }

  createController<TState, TEvents extends EventMap>(
    definition: AggregateDefinition<TState, TEvents>,
    options: ConcurrencyControllerOptions = {}
  ): ConcurrencyController<TState, TEvents> {
    return new ConcurrencyController(this.createRehydrator(definition), this.journal, {
      maxRetries: this.config.concurrency.maxRetries,
      ...options,
    });
  }

  // ==========================================================================
  // PROJECTIONS
  // ==========================================================================

  /**
   * Register a projection definition, or a single apply function as version 1
   */
  registerProjection(definition: ProjectionDefinition): ProjectionInfo;
  registerProjection(name: string, apply: ProjectionHandler): ProjectionInfo;
  registerProjection(
    definitionOrName: ProjectionDefinition | string,
    apply?: ProjectionHandler
  ): ProjectionInfo {
    if (typeof definitionOrName !== 'string') {
      return this.runner.register(definitionOrName);
    }
    const builder = defineProjection(definitionOrName, 1);
    if (apply) {
      builder.onAny(apply);
    }
    return this.runner.register(builder.build());
  }

  async replay(name: string, fromVersion = 0, options: Omit<ReplayOptions, 'fromVersion'> = {}): Promise<ReplayReport> {
    return this.runner.replay(name, { ...options, fromVersion });
  }

  // ==========================================================================
  // DLQ
  // ==========================================================================

  async listDlq(): Promise<DlqListing[]> {
    return this.dlq.list();
  }

  async dlqStats(): Promise<DlqStats> {
    return this.dlq.getStats();
  }

  /**
   * Redrive a stream for one projection, or for every projection holding it.
   * `projectionName` may be the live name or the namespace `listDlq` reports.
   */
  async redrive(streamId: string, options: EngineRedriveOptions = {}): Promise<EngineRedriveResult> {
    const names = options.projectionName
      ? [options.projectionName]
      : this.runner.quarantinedProjections(streamId);

    const results: RedriveResult[] = [];
    for (const name of names) {
      const redriveOptions = options.signal ? { signal: options.signal } : {};
      results.push(await this.runner.redrive(name, streamId, redriveOptions));
    }

    return { status: summarize(results), streamId, results };
  }

  private async redriveNamespace(namespace: string, streamId: string): Promise<RedriveResult> {
    const projection = this.runner
      .listProjections()
      .find((info) => info.status === 'live' && info.namespace === namespace);
    if (!projection) {
      return { status: 'not_quarantined', projectionName: namespace, streamId };
    }
    return this.runner.redrive(projection.name, streamId);
  }
}

function summarize(results: RedriveResult[]): EngineRedriveResult['status'] {
  const attempted = results.filter((result) => result.status !== 'not_quarantined');
  if (attempted.length === 0) {
    return 'not_quarantined';
  }
  if (attempted.some((result) => result.status === 'partial')) {
    return 'partial';
  }
  if (attempted.some((result) => result.status === 'cancelled')) {
    return 'cancelled';
  }
  return 'success';
}

/**
 * Create an engine
 *
 * @example
 * ```typescript
 * const engine = createEventSourcingEngine();
 * await engine.initialize();
 *
 * engine.registerProjection(balances);
 * await engine.append('acct-42', 0, [{ type: 'Deposited', payload: { amount: 100 } }]);
 * await engine.flush();
 * ```
 */
export function createEventSourcingEngine(options?: EventSourcingEngineOptions): EventSourcingEngine {
  return new EventSourcingEngine(options);
}
