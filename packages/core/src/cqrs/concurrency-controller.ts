import type { EventEnvelope, NewEvent } from '@streamvault/types';
import type { EventJournal } from '../event-journal.js';
import { ConcurrencyExhaustedError } from '../errors.js';
import { createLogger, type Logger } from '../logger.js';
import { KeyedLock } from '../utils.js';
import type { EventMap } from './aggregate.js';
import type { Rehydrator } from './rehydrator.js';

/**
 * Optimistic command execution: rehydrate, decide, append at the observed
 * version, and start over on conflict.
 */

export type Decide<TState> = (
  state: TState,
  version: number
) => readonly NewEvent[] | Promise<readonly NewEvent[]>;

export type CommandOutcome<TState> =
  | {
      status: 'committed';
      streamId: string;
      version: number;
      events: EventEnvelope[];
      attempts: number;
    }
  | {
      status: 'noop';
      streamId: string;
      version: number;
      state: TState;
      attempts: number;
    };

export interface ConcurrencyControllerOptions {
  /** Retries after the first conflict (default 3) */
  maxRetries?: number;
  /** Queue commands per stream in process so one append per stream is in flight */
  serializeWrites?: boolean;
}

export class ConcurrencyController<TState, TEvents extends EventMap> {
  private logger: Logger;
  private maxRetries: number;
  private writeLock: KeyedLock | null;

  constructor(
    private readonly rehydrator: Rehydrator<TState, TEvents>,
    private readonly journal: EventJournal,
    options: ConcurrencyControllerOptions = {}
  ) {
    this.maxRetries = options.maxRetries ?? 3;
    this.writeLock = options.serializeWrites ? new KeyedLock() : null;
    this.logger = createLogger({ name: `concurrency:${rehydrator.definition.name}` });
  }

  /**
   * Run a command against fresh state
   * @throws ConcurrencyExhaustedError after maxRetries conflicting retries
   */
  async execute(streamId: string, decide: Decide<TState>): Promise<CommandOutcome<TState>> {
    if (this.writeLock) {
      return this.writeLock.run(streamId, () => this.attempt(streamId, decide));
    }
    return this.attempt(streamId, decide);
  }

  private async attempt(streamId: string, decide: Decide<TState>): Promise<CommandOutcome<TState>> {
    const maxAttempts = this.maxRetries + 1;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const { state, version } = await this.rehydrator.rehydrate(streamId);
      const events = await decide(state, version);

      if (events.length === 0) {
        return { status: 'noop', streamId, version, state, attempts: attempt };
      }

      const result = await this.journal.append(streamId, version, events);
      if (result.status === 'committed') {
        return {
          status: 'committed',
          streamId,
          version: result.version,
          events: result.events,
          attempts: attempt,
        };
      }

      this.logger.debug(
        { streamId, attempt, expectedVersion: version, actualVersion: result.actualVersion },
        'Command hit a version conflict'
      );
    }

    this.logger.warn({ streamId, attempts: maxAttempts }, 'Command retries exhausted');
    throw new ConcurrencyExhaustedError(streamId, maxAttempts);
  }
}
