export {
  createLogger,
  withCorrelationId,
  logger,
  type Logger,
  type CreateLoggerOptions,
} from './logger.js';

export {
  AppError,
  ValidationError,
  VersionConflictError,
  ConcurrencyExhaustedError,
  StorageError,
  ProjectionApplyError,
  SequenceGapError,
  UnknownEventTypeError,
  ProjectionNotFoundError,
  isOperationalError,
  toSafeErrorResponse,
  toError,
  type SafeErrorDetails,
} from './errors.js';

export {
  AppEnvSchema,
  validateEnv,
  loadConfig,
  type AppEnv,
  type StreamVaultConfig,
} from './env.js';

export {
  withRetry,
  sleep,
  isDefined,
  KeyedLock,
  projectionStreamKey,
} from './utils.js';

export {
  createDatabasePool,
  withTransaction,
  getErrorCode,
  toStorageError,
  PG_UNIQUE_VIOLATION,
  type DatabaseClient,
  type DatabasePool,
  type PoolClient,
  type QueryResult,
  type DatabaseConfig,
} from './database.js';

// Event journal
export {
  EventJournal,
  InMemoryEventJournalRepository,
  PostgresEventJournalRepository,
  JournalCursor,
  AllStreamsCursor,
  createInMemoryEventJournal,
  JOURNAL_MIGRATION_SQL,
  type AppendResult,
  type JournalRecord,
  type EventJournalRepository,
  type EventJournalOptions,
  type EventPublisher,
} from './event-journal.js';

// Aggregates, snapshots, projections
export * from './cqrs/index.js';

// Sequence-aware DLQ
export {
  SequenceDeadLetterQueue,
  QuarantineRegistry,
  InMemorySequenceDlqRepository,
  PostgresSequenceDlqRepository,
  RedriveScheduler,
  SEQUENCE_DLQ_MIGRATION_SQL,
  type QuarantineKey,
  type RedriveResult,
  type RedriveApply,
  type RedriveOptions,
  type EnqueueOutcome,
  type DlqStats,
  type SequenceDlqRepository,
  type SequenceDeadLetterQueueOptions,
  type RedriveSchedulerOptions,
  type ScheduledRedrive,
} from './sequence-dead-letter-queue.js';

export {
  EventSourcingEngine,
  createEventSourcingEngine,
  type EventSourcingEngineOptions,
  type EngineRedriveOptions,
  type EngineRedriveResult,
} from './event-sourcing-engine.js';
