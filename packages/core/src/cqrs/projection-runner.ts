/**
 * Projection Runner
 *
 * Feeds committed events to projections with:
 * - Per-(projection, stream) serialization, parallel across streams
 * - Checkpoint-based deduplication and gap back-fill from the journal
 * - Quarantine of failing streams into the sequence-aware DLQ
 * - Blue-green replay of a new projection version before cutover
 */

import type { EventEnvelope, JsonValue } from '@streamvault/types';
import type { EventJournal, EventPublisher } from '../event-journal.js';
import type { RedriveOptions, RedriveResult, SequenceDeadLetterQueue } from '../sequence-dead-letter-queue.js';
import {
  ProjectionApplyError,
  ProjectionNotFoundError,
  SequenceGapError,
  ValidationError,
  toError,
} from '../errors.js';
import { createLogger, type Logger } from '../logger.js';
import {
  projectionNamespace,
  resolveHandler,
  type ProjectionDefinition,
  type ReadModelStore,
  type ReadModelRow,
} from './projections.js';

// ============================================================================
// TYPES
// ============================================================================

export type ProjectionStatus = 'live' | 'shadow';

export interface ProjectionInfo {
  name: string;
  version: number;
  namespace: string;
  status: ProjectionStatus;
}

export type ApplyOutcome = 'applied' | 'duplicate' | 'queued' | 'quarantined' | 'retired';

export interface ReplayOptions {
  /** Events below this per-stream version are not fed (default 0: everything) */
  fromVersion?: number;
  signal?: AbortSignal;
}

export interface ReplayReport {
  projectionName: string;
  version: number;
  namespace: string;
  applied: number;
  duplicates: number;
  skipped: number;
  queued: number;
  quarantined: number;
  /** True when a shadow version became live */
  cutover: boolean;
  cancelled: boolean;
}

interface RegisteredProjection {
  definition: ProjectionDefinition;
  namespace: string;
}

type StepResult = { kind: 'done'; outcome: ApplyOutcome } | { kind: 'gap'; nextVersion: number };

// ============================================================================
// PROJECTION RUNNER
// ============================================================================

export class ProjectionRunner implements EventPublisher {
  private live = new Map<string, RegisteredProjection>();
  private shadows = new Map<string, RegisteredProjection>();
  private logger: Logger;

  constructor(
    private readonly journal: EventJournal,
    private readonly store: ReadModelStore,
    private readonly dlq: SequenceDeadLetterQueue
  ) {
    this.logger = createLogger({ name: 'projection-runner' });
  }

  /**
   * Register a projection; a higher version of a live name becomes its shadow
   */
  register(definition: ProjectionDefinition): ProjectionInfo {
    const entry = { definition, namespace: projectionNamespace(definition) };
    const current = this.live.get(definition.name);

    if (!current) {
      this.live.set(definition.name, entry);
      this.logger.info(
        { projectionName: definition.name, version: definition.version },
        'Projection registered'
      );
      return this.describe(entry, 'live');
    }

    if (definition.version <= current.definition.version) {
      throw new ValidationError(
        `Projection ${definition.name} v${definition.version} is not newer than live v${current.definition.version}`
      );
    }

    this.shadows.set(definition.name, entry);
    this.logger.info(
      {
        projectionName: definition.name,
        version: definition.version,
        liveVersion: current.definition.version,
      },
      'Shadow projection registered'
    );
    return this.describe(entry, 'shadow');
  }

  listProjections(): ProjectionInfo[] {
    return [
      ...Array.from(this.live.values(), (entry) => this.describe(entry, 'live')),
      ...Array.from(this.shadows.values(), (entry) => this.describe(entry, 'shadow')),
    ];
  }

  /**
   * Journal publisher hook
   */
  async publish(events: readonly EventEnvelope[]): Promise<void> {
    await Promise.all(events.map((event) => this.consume(event)));
  }

  /**
   * Deliver one committed event to every live projection
   *
   * Lock acquisition happens synchronously, so events consumed in version order
   * are processed in version order.
   */
  async consume(event: EventEnvelope): Promise<ApplyOutcome[]> {
    const deliveries = Array.from(this.live.values(), (projection) =>
      this.dlq.runExclusive(projection.namespace, event.streamId, () =>
        this.process(projection, event, 0)
      )
    );
    return Promise.all(deliveries);
  }

  /**
   * Feed the whole journal to the shadow of `name` (or to the live version when
   * there is no shadow). A shadow that reaches the tail is cut over to live.
   */
  async replay(name: string, options: ReplayOptions = {}): Promise<ReplayReport> {
    const target = this.shadows.get(name) ?? this.live.get(name);
    if (!target) {
      throw new ProjectionNotFoundError(name);
    }
    return this.replayInto(target, options);
  }

  /**
   * Clear the live read model and replay it from the start
   */
  async rebuild(name: string): Promise<ReplayReport> {
    const target = this.requireLive(name);
    await this.store.clear(target.namespace);
    await this.dlq.discardProjection(target.namespace);
    this.logger.info({ projectionName: name, namespace: target.namespace }, 'Projection rebuild started');
    return this.replayInto(target, {});
  }

  async getCheckpoint(name: string, streamId: string): Promise<number> {
    return this.store.getCheckpoint(this.requireLive(name).namespace, streamId);
  }

  async getReadModel(name: string, key: string): Promise<JsonValue | undefined> {
    return this.store.get(this.requireLive(name).namespace, key);
  }

  async listReadModel(name: string): Promise<ReadModelRow[]> {
    return this.store.list(this.requireLive(name).namespace);
  }

  /**
   * Names of live projections holding the stream in quarantine
   */
  quarantinedProjections(streamId: string): string[] {
    return Array.from(this.live.values())
      .filter((projection) => this.dlq.isQuarantined(projection.namespace, streamId))
      .map((projection) => projection.definition.name);
  }

  /**
   * Redrive the DLQ entry of a live projection through the normal apply path.
   * Accepts the projection name or its namespace as listed by the DLQ.
   */
  async redrive(name: string, streamId: string, options: RedriveOptions = {}): Promise<RedriveResult> {
    const projection = this.live.get(name) ?? this.findLiveNamespace(name);
    if (!projection) {
      throw new ProjectionNotFoundError(name);
    }
    return this.dlq.redrive(
      projection.namespace,
      streamId,
      (event) => this.applyRedriven(projection, event),
      options
    );
  }

  // ==========================================================================
  // APPLY PATH
  // ==========================================================================

  /**
   * Runs under the (projection, stream) lock
   */
  private async process(
    projection: RegisteredProjection,
    event: EventEnvelope,
    floor: number
  ): Promise<ApplyOutcome> {
    // Deliveries queued behind the lock before a cutover
    if (this.isRetired(projection)) {
      this.logger.debug(
        { namespace: projection.namespace, streamId: event.streamId, version: event.version },
        'Skipping delivery to retired projection version'
      );
      return 'retired';
    }

    const first = await this.step(projection, event, floor);
    if (first.kind === 'done') {
      return first.outcome;
    }

    // Back-fill the versions this projection has not seen yet
    const cursor = await this.journal.read(event.streamId, first.nextVersion);
    for await (const missing of cursor) {
      if (missing.version >= event.version) {
        break;
      }
      const filled = await this.step(projection, missing, floor);
      if (filled.kind === 'gap') {
        await this.quarantineFailure(
          projection,
          missing,
          new SequenceGapError(missing.streamId, filled.nextVersion, missing.version)
        );
      }
    }

    const last = await this.step(projection, event, floor);
    if (last.kind === 'done') {
      return last.outcome;
    }
    return this.quarantineFailure(
      projection,
      event,
      new SequenceGapError(event.streamId, last.nextVersion, event.version)
    );
  }

  private async step(
    projection: RegisteredProjection,
    event: EventEnvelope,
    floor: number
  ): Promise<StepResult> {
    if (this.dlq.isQuarantined(projection.namespace, event.streamId)) {
      return { kind: 'done', outcome: await this.park(projection, event) };
    }

    try {
      const result = await this.applyOne(projection, event, floor);
      if (result.kind === 'gap') {
        return result;
      }
      return { kind: 'done', outcome: result.outcome };
    } catch (error) {
      return { kind: 'done', outcome: await this.quarantineFailure(projection, event, error) };
    }
  }

  /**
   * Handler and checkpoint in one read-model transaction
   */
  private async applyOne(
    projection: RegisteredProjection,
    event: EventEnvelope,
    floor: number
  ): Promise<StepResult> {
    const { definition, namespace } = projection;

    try {
      return await this.store.transaction<StepResult>(namespace, async (tx) => {
        const checkpoint = Math.max(await tx.getCheckpoint(event.streamId), floor);
        if (event.version <= checkpoint) {
          return { kind: 'done', outcome: 'duplicate' };
        }
        if (event.version > checkpoint + 1) {
          return { kind: 'gap', nextVersion: checkpoint + 1 };
        }

        const handler = resolveHandler(definition, event.type);
        if (handler) {
          await handler(tx, event);
        }
        await tx.setCheckpoint(event.streamId, event.version);
        return { kind: 'done', outcome: 'applied' };
      });
    } catch (error) {
      throw new ProjectionApplyError(
        definition.name,
        event.streamId,
        event.version,
        toError(error)
      );
    }
  }

  /**
   * Redrive path: same transaction as normal flow, never re-quarantines
   */
  private async applyRedriven(projection: RegisteredProjection, event: EventEnvelope): Promise<void> {
    const result = await this.applyOne(projection, event, 0);
    if (result.kind === 'gap') {
      throw new SequenceGapError(event.streamId, result.nextVersion, event.version);
    }
  }

  private async park(projection: RegisteredProjection, event: EventEnvelope): Promise<ApplyOutcome> {
    try {
      const outcome = await this.dlq.enqueue(projection.namespace, event);
      return outcome === 'duplicate' ? 'duplicate' : 'queued';
    } catch (error) {
      if (!(error instanceof SequenceGapError)) {
        throw error;
      }
      // Queue tail is behind: park the missing versions first
      let parkedVersion = error.expectedVersion - 1;
      const cursor = await this.journal.read(event.streamId, error.expectedVersion);
      for await (const missing of cursor) {
        if (missing.version > event.version) {
          break;
        }
        await this.dlq.enqueue(projection.namespace, missing);
        parkedVersion = missing.version;
      }
      if (parkedVersion < event.version) {
        await this.dlq.enqueue(projection.namespace, event);
      }
      return 'queued';
    }
  }

  private async quarantineFailure(
    projection: RegisteredProjection,
    event: EventEnvelope,
    error: unknown
  ): Promise<ApplyOutcome> {
    const reason = toError(error).message;
    this.logger.error(
      {
        err: error,
        projectionName: projection.definition.name,
        namespace: projection.namespace,
        streamId: event.streamId,
        version: event.version,
        eventId: event.eventId,
        eventType: event.type,
      },
      'Projection failed, quarantining stream'
    );
    await this.dlq.quarantine(projection.namespace, event, reason);
    return 'quarantined';
  }

  // ==========================================================================
  // REPLAY
  // ==========================================================================

  private async replayInto(
    target: RegisteredProjection,
    options: ReplayOptions
  ): Promise<ReplayReport> {
    const { name, version } = target.definition;
    const fromVersion = options.fromVersion ?? 0;
    const floor = Math.max(fromVersion - 1, 0);
    const report: ReplayReport = {
      projectionName: name,
      version,
      namespace: target.namespace,
      applied: 0,
      duplicates: 0,
      skipped: 0,
      queued: 0,
      quarantined: 0,
      cutover: false,
      cancelled: false,
    };

    this.logger.info({ projectionName: name, version, fromVersion }, 'Replay started');

    const cursor = await this.journal.readAll(0);
    for await (const { event } of cursor) {
      if (options.signal?.aborted) {
        report.cancelled = true;
        this.logger.info({ projectionName: name, version }, 'Replay cancelled');
        return report;
      }
      if (event.version < fromVersion) {
        report.skipped++;
        continue;
      }
      const outcome = await this.dlq.runExclusive(target.namespace, event.streamId, () =>
        this.process(target, event, floor)
      );
      this.count(report, outcome);
    }

    if (this.shadows.get(name) === target) {
      await this.cutover(name, target);
      report.cutover = true;

      // Events committed during the replay pass
      const tail = await this.journal.readAll(cursor.toPosition);
      for await (const { event } of tail) {
        const outcome = await this.dlq.runExclusive(target.namespace, event.streamId, () =>
          this.process(target, event, floor)
        );
        this.count(report, outcome);
      }
    }

    this.logger.info(
      {
        projectionName: name,
        version,
        applied: report.applied,
        quarantined: report.quarantined,
        cutover: report.cutover,
      },
      'Replay completed'
    );
    return report;
  }

  private async cutover(name: string, shadow: RegisteredProjection): Promise<void> {
    const previous = this.live.get(name);
    this.live.set(name, shadow);
    this.shadows.delete(name);

    if (previous) {
      await this.dlq.discardProjection(previous.namespace);
    }
    this.logger.info(
      {
        projectionName: name,
        version: shadow.definition.version,
        retiredVersion: previous?.definition.version,
      },
      'Projection cut over to new version'
    );
  }

  private count(report: ReplayReport, outcome: ApplyOutcome): void {
    switch (outcome) {
      case 'applied':
        report.applied++;
        break;
      case 'duplicate':
        report.duplicates++;
        break;
      case 'queued':
        report.queued++;
        break;
      case 'quarantined':
        report.quarantined++;
        break;
      case 'retired':
        report.skipped++;
        break;
    }
  }

  private findLiveNamespace(namespace: string): RegisteredProjection | undefined {
    return Array.from(this.live.values()).find((projection) => projection.namespace === namespace);
  }

  private isRetired(projection: RegisteredProjection): boolean {
    const { name } = projection.definition;
    return this.live.get(name) !== projection && this.shadows.get(name) !== projection;
  }

  private requireLive(name: string): RegisteredProjection {
    const projection = this.live.get(name);
    if (!projection) {
      throw new ProjectionNotFoundError(name);
    }
    return projection;
  }

  private describe(entry: RegisteredProjection, status: ProjectionStatus): ProjectionInfo {
    return {
      name: entry.definition.name,
      version: entry.definition.version,
      namespace: entry.namespace,
      status,
    };
  }
}
