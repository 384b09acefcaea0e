import type { Snapshot } from '@streamvault/types';
import type { EventJournal } from '../event-journal.js';
import { createLogger, type Logger } from '../logger.js';
import type { AggregateDefinition, EventMap } from './aggregate.js';
import type { SnapshotManager } from './snapshot-store.js';

/**
 * Rebuilds aggregate state from the latest snapshot plus the events after it.
 *
 * Folding is pure; the only side effect is the policy-driven snapshot save,
 * whose failure is logged and never fails the read.
 */

export interface RehydratedState<TState> {
  streamId: string;
  state: TState;
  version: number;
  /** Version of the snapshot the fold started from, 0 when none */
  snapshotVersion: number;
  replayedEvents: number;
}

export interface RehydratorOptions {
  snapshots?: SnapshotManager;
  /** Persist a snapshot when the policy says so (default true) */
  snapshotOnRehydrate?: boolean;
}

export class Rehydrator<TState, TEvents extends EventMap> {
  private logger: Logger;
  private snapshots: SnapshotManager | undefined;
  private snapshotOnRehydrate: boolean;

  constructor(
    readonly definition: AggregateDefinition<TState, TEvents>,
    private readonly journal: EventJournal,
    options: RehydratorOptions = {}
  ) {
    this.snapshots = options.snapshots;
    this.snapshotOnRehydrate = options.snapshotOnRehydrate ?? true;
    this.logger = createLogger({ name: `rehydrator:${definition.name}` });
  }

  async rehydrate(streamId: string): Promise<RehydratedState<TState>> {
    const snapshot = await this.loadSnapshot(streamId);
    let state = this.definition.initialState;
    let version = 0;

    if (snapshot) {
      state = snapshot.state;
      version = snapshot.version;
    }
    const snapshotVersion = version;

    const cursor = await this.journal.read(streamId, version + 1);
    let replayedEvents = 0;
    for await (const event of cursor) {
      state = this.definition.fold(state, event);
      version = event.version;
      replayedEvents++;
    }

    if (this.snapshots && this.snapshotOnRehydrate) {
      await this.maybeSnapshot(this.snapshots, streamId, state, version, snapshot?.raw ?? null);
    }

    return { streamId, state, version, snapshotVersion, replayedEvents };
  }

  /**
   * Rehydrate and persist a snapshot regardless of the policy
   */
  async takeSnapshot(streamId: string): Promise<Snapshot | null> {
    if (!this.snapshots) {
      return null;
    }
    const { state, version } = await this.rehydrate(streamId);
    if (version === 0) {
      return null;
    }
    return this.snapshots.save(streamId, version, this.definition.encodeState(state));
  }

  private async loadSnapshot(
    streamId: string
  ): Promise<{ state: TState; version: number; raw: Snapshot } | null> {
    if (!this.snapshots) {
      return null;
    }

    const raw = await this.snapshots.loadLatest(streamId);
    if (!raw) {
      return null;
    }

    try {
      return { state: this.definition.decodeState(raw.state), version: raw.version, raw };
    } catch (error) {
      // Stale state shape; fall back to a full replay
      this.logger.warn(
        { err: error, streamId, snapshotVersion: raw.version },
        'Snapshot state rejected, replaying from the start'
      );
      return null;
    }
  }

  private async maybeSnapshot(
    snapshots: SnapshotManager,
    streamId: string,
    state: TState,
    version: number,
    last: Snapshot | null
  ): Promise<void> {
    const now = snapshots.now();
    if (!snapshots.policy.shouldSnapshot(version, last, now)) {
      return;
    }

    try {
      await snapshots.saveSnapshot({
        streamId,
        version,
        state: this.definition.encodeState(state),
        takenAt: now,
      });
    } catch (error) {
      this.logger.warn({ err: error, streamId, version }, 'Snapshot save failed');
    }
  }
}
