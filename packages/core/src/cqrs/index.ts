/**
 * Event Sourcing Read/Write Infrastructure
 *
 * - Aggregate definitions folded from their streams
 * - Snapshot store and policy
 * - Rehydrator and optimistic command execution
 * - Projections, read-model stores and the projection runner
 */

// Aggregates
export {
  AggregateDefinition,
  defineAggregate,
  foldEvent,
  toJsonValue,
  type AggregateConfig,
  type EventMap,
  type EventSchemas,
  type EventHandlers,
  type EventType,
  type EventMetadata,
} from './aggregate.js';

// Snapshot Store
export {
  InMemorySnapshotStore,
  PostgresSnapshotStore,
  SnapshotPolicy,
  SnapshotManager,
  createSnapshotManager,
  createInMemorySnapshotManager,
  SNAPSHOT_MIGRATION_SQL,
  type SnapshotStoreConfig,
  type SnapshotStoreRepository,
} from './snapshot-store.js';

// Rehydration
export { Rehydrator, type RehydratedState, type RehydratorOptions } from './rehydrator.js';

// Optimistic concurrency
export {
  ConcurrencyController,
  type CommandOutcome,
  type ConcurrencyControllerOptions,
  type Decide,
} from './concurrency-controller.js';

// Projections
export {
  ProjectionBuilder,
  defineProjection,
  projectionNamespace,
  resolveHandler,
  InMemoryReadModelStore,
  PostgresReadModelStore,
  READ_MODEL_MIGRATION_SQL,
  type ProjectionDefinition,
  type ProjectionHandler,
  type ReadModelAccess,
  type ReadModelTransaction,
  type ReadModelStore,
  type ReadModelRow,
} from './projections.js';

// Projection runner
export {
  ProjectionRunner,
  type ApplyOutcome,
  type ProjectionInfo,
  type ProjectionStatus,
  type ReplayOptions,
  type ReplayReport,
} from './projection-runner.js';
