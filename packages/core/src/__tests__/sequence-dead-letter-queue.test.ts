/**
 * Sequence-aware DLQ Tests
 * Quarantine, ordered parking, redrive and scheduled redrive
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { DlqListing, EventEnvelope } from '@streamvault/types';
import {
  InMemorySequenceDlqRepository,
  QuarantineRegistry,
  RedriveScheduler,
  SequenceDeadLetterQueue,
} from '../sequence-dead-letter-queue.js';
import { SequenceGapError, ValidationError } from '../errors.js';
import { eventAt } from './helpers/events.js';

const T0 = new Date('2026-06-01T00:00:00.000Z');
const PROJECTION = 'balances.v1';

describe('QuarantineRegistry', () => {
  let registry: QuarantineRegistry;

  beforeEach(() => {
    registry = new QuarantineRegistry();
  });

  it('should track pairs independently', () => {
    registry.add('p1', 's1');
    registry.add('p2', 's1');
    registry.add('p1', 's2');
    registry.add('p1', 's1');

    expect(registry.size).toBe(3);
    expect(registry.isQuarantined('p1', 's1')).toBe(true);
    expect(registry.isQuarantined('p2', 's2')).toBe(false);
    expect(registry.projectionsFor('s1')).toEqual(['p1', 'p2']);
  });

  it('should remove single pairs and whole projections', () => {
    registry.add('p1', 's1');
    registry.add('p1', 's2');
    registry.add('p2', 's1');

    registry.remove('p2', 's1');
    expect(registry.removeProjection('p1')).toBe(2);

    expect(registry.size).toBe(0);
    expect(registry.entries()).toEqual([]);
  });
});

describe('SequenceDeadLetterQueue', () => {
  let repository: InMemorySequenceDlqRepository;
  let dlq: SequenceDeadLetterQueue;
  let now: Date;

  beforeEach(() => {
    now = T0;
    repository = new InMemorySequenceDlqRepository();
    dlq = new SequenceDeadLetterQueue(repository, { clock: () => now });
  });

  // ==========================================================================
  // QUARANTINE & ENQUEUE
  // ==========================================================================

  describe('quarantine', () => {
    it('should open an entry at the failing version', async () => {
      const failing = eventAt('acct-42', 5);

      await dlq.quarantine(PROJECTION, failing, 'handler exploded');

      expect(dlq.isQuarantined(PROJECTION, 'acct-42')).toBe(true);
      expect(dlq.isQuarantined('other.v1', 'acct-42')).toBe(false);
      expect(await dlq.get(PROJECTION, 'acct-42')).toEqual({
        projectionName: PROJECTION,
        streamId: 'acct-42',
        failedAtVersion: 5,
        reason: 'handler exploded',
        enqueuedAt: T0,
        updatedAt: T0,
        redriveAttempts: 0,
        lastRedriveAt: null,
        queuedEvents: [failing],
      });
    });

    it('should report the flow state of each pair', async () => {
      expect(dlq.getState(PROJECTION, 'acct-42')).toBe('FLOWING');

      await dlq.quarantine(PROJECTION, eventAt('acct-42', 5), 'handler exploded');
      expect(dlq.getState(PROJECTION, 'acct-42')).toBe('QUARANTINED');
      expect(dlq.getState(PROJECTION, 'acct-7')).toBe('FLOWING');

      await dlq.redrive(PROJECTION, 'acct-42', () => Promise.resolve());
      expect(dlq.getState(PROJECTION, 'acct-42')).toBe('FLOWING');
    });

    it('should append when the pair is already quarantined', async () => {
      await dlq.quarantine(PROJECTION, eventAt('acct-42', 5), 'first');
      await dlq.quarantine(PROJECTION, eventAt('acct-42', 6), 'second');

      const entry = await dlq.get(PROJECTION, 'acct-42');

      expect(entry?.reason).toBe('first');
      expect(entry?.queuedEvents.map((e) => e.version)).toEqual([5, 6]);
    });
  });

  describe('enqueue', () => {
    beforeEach(async () => {
      await dlq.quarantine(PROJECTION, eventAt('acct-42', 3), 'boom');
    });

    it('should park the next version', async () => {
      expect(await dlq.enqueue(PROJECTION, eventAt('acct-42', 4))).toBe('queued');
      expect((await dlq.get(PROJECTION, 'acct-42'))?.queuedEvents.map((e) => e.version)).toEqual([3, 4]);
    });

    it('should ignore versions at or below the tail', async () => {
      await dlq.enqueue(PROJECTION, eventAt('acct-42', 4));

      expect(await dlq.enqueue(PROJECTION, eventAt('acct-42', 4))).toBe('duplicate');
      expect(await dlq.enqueue(PROJECTION, eventAt('acct-42', 2))).toBe('duplicate');
      expect((await dlq.get(PROJECTION, 'acct-42'))?.queuedEvents).toHaveLength(2);
    });

    it('should reject a gap after the tail', async () => {
      const error: unknown = await dlq.enqueue(PROJECTION, eventAt('acct-42', 6)).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(SequenceGapError);
      if (!(error instanceof SequenceGapError)) return;
      expect(error.expectedVersion).toBe(4);
      expect(error.receivedVersion).toBe(6);
    });

    it('should reject a stream that is not quarantined', async () => {
      await expect(dlq.enqueue(PROJECTION, eventAt('acct-7', 1))).rejects.toBeInstanceOf(
        ValidationError
      );
    });
  });

  // ==========================================================================
  // REDRIVE
  // ==========================================================================

  describe('redrive', () => {
    beforeEach(async () => {
      await dlq.quarantine(PROJECTION, eventAt('acct-42', 3), 'boom');
      await dlq.enqueue(PROJECTION, eventAt('acct-42', 4));
      await dlq.enqueue(PROJECTION, eventAt('acct-42', 5));
    });

    it('should apply parked events in version order and close the entry', async () => {
      const applied: number[] = [];

      const result = await dlq.redrive(PROJECTION, 'acct-42', (event) => {
        applied.push(event.version);
        return Promise.resolve();
      });

      expect(applied).toEqual([3, 4, 5]);
      expect(result).toEqual({
        status: 'success',
        projectionName: PROJECTION,
        streamId: 'acct-42',
        redriven: 3,
        lastVersion: 5,
      });
      expect(dlq.isQuarantined(PROJECTION, 'acct-42')).toBe(false);
      expect(await dlq.get(PROJECTION, 'acct-42')).toBeNull();
    });

    it('should stop at the first failure and keep the rest parked', async () => {
      now = new Date(T0.getTime() + 5000);
      const apply = vi.fn((event: EventEnvelope) =>
        event.version === 4 ? Promise.reject(new Error('still broken')) : Promise.resolve()
      );

      const result = await dlq.redrive(PROJECTION, 'acct-42', apply);
      const entry = await dlq.get(PROJECTION, 'acct-42');

      expect(result).toEqual({
        status: 'partial',
        projectionName: PROJECTION,
        streamId: 'acct-42',
        redriven: 1,
        failedAtVersion: 4,
        reason: 'still broken',
      });
      expect(apply).toHaveBeenCalledTimes(2);
      expect(entry?.failedAtVersion).toBe(4);
      expect(entry?.reason).toBe('still broken');
      expect(entry?.redriveAttempts).toBe(1);
      expect(entry?.lastRedriveAt).toEqual(now);
      expect(entry?.queuedEvents.map((e) => e.version)).toEqual([4, 5]);
      expect(dlq.isQuarantined(PROJECTION, 'acct-42')).toBe(true);
    });

    it('should resume from the failed version on the next redrive', async () => {
      await dlq.redrive(PROJECTION, 'acct-42', (event) =>
        event.version === 4 ? Promise.reject(new Error('still broken')) : Promise.resolve()
      );
      const applied: number[] = [];

      const result = await dlq.redrive(PROJECTION, 'acct-42', (event) => {
        applied.push(event.version);
        return Promise.resolve();
      });

      expect(applied).toEqual([4, 5]);
      expect(result.status).toBe('success');
    });

    it('should stop between events when cancelled', async () => {
      const controller = new AbortController();

      const result = await dlq.redrive(
        PROJECTION,
        'acct-42',
        () => {
          controller.abort();
          return Promise.resolve();
        },
        { signal: controller.signal }
      );

      expect(result).toEqual({
        status: 'cancelled',
        projectionName: PROJECTION,
        streamId: 'acct-42',
        redriven: 1,
        nextVersion: 4,
      });
      const entry = await dlq.get(PROJECTION, 'acct-42');
      expect(entry?.failedAtVersion).toBe(4);
      expect(entry?.queuedEvents.map((e) => e.version)).toEqual([4, 5]);
    });

    it('should report not_quarantined for a flowing stream', async () => {
      const apply = vi.fn(() => Promise.resolve());

      const result = await dlq.redrive(PROJECTION, 'acct-7', apply);

      expect(result).toEqual({ status: 'not_quarantined', projectionName: PROJECTION, streamId: 'acct-7' });
      expect(apply).not.toHaveBeenCalled();
    });

    it('should take the pair lock for each event', async () => {
      const order: string[] = [];
      const redrive = dlq.redrive(PROJECTION, 'acct-42', (event) => {
        order.push(`redrive:${event.version}`);
        return Promise.resolve();
      });
      const other = dlq.runExclusive(PROJECTION, 'acct-42', () => {
        order.push('exclusive');
        return Promise.resolve();
      });

      await Promise.all([redrive, other]);

      // the exclusive task slots in between redrive steps, never inside one
      expect(order.filter((entry) => entry.startsWith('redrive'))).toEqual([
        'redrive:3',
        'redrive:4',
        'redrive:5',
      ]);
      expect(order).toContain('exclusive');
    });
  });

  // ==========================================================================
  // OPERATOR VIEWS
  // ==========================================================================

  describe('listing and stats', () => {
    it('should list entries oldest first with queued counts', async () => {
      now = new Date(T0.getTime() + 1000);
      await dlq.quarantine('p2.v1', eventAt('acct-2', 1), 'late');
      now = T0;
      await dlq.quarantine(PROJECTION, eventAt('acct-1', 2), 'early');
      await dlq.enqueue(PROJECTION, eventAt('acct-1', 3));

      const listings = await dlq.list();

      expect(listings.map((l) => [l.projectionName, l.streamId, l.queuedCount])).toEqual([
        [PROJECTION, 'acct-1', 2],
        ['p2.v1', 'acct-2', 1],
      ]);
      expect(await dlq.getStats()).toEqual({
        quarantinedStreams: 2,
        queuedEvents: 3,
        byProjection: { [PROJECTION]: 1, 'p2.v1': 1 },
      });
    });

    it('should discard every entry of a projection', async () => {
      await dlq.quarantine(PROJECTION, eventAt('acct-1', 1), 'x');
      await dlq.quarantine(PROJECTION, eventAt('acct-2', 1), 'x');
      await dlq.quarantine('p2.v1', eventAt('acct-1', 1), 'x');

      expect(await dlq.discardProjection(PROJECTION)).toBe(2);
      expect(dlq.isQuarantined(PROJECTION, 'acct-1')).toBe(false);
      expect(dlq.isQuarantined('p2.v1', 'acct-1')).toBe(true);
    });

    it('should rebuild the registry from storage on initialize', async () => {
      await repository.open({ projectionName: PROJECTION, streamId: 'acct-9' }, eventAt('acct-9', 4), 'x', T0);
      const restarted = new SequenceDeadLetterQueue(repository);

      expect(restarted.isQuarantined(PROJECTION, 'acct-9')).toBe(false);
      await restarted.initialize();
      expect(restarted.isQuarantined(PROJECTION, 'acct-9')).toBe(true);
    });
  });
});

describe('RedriveScheduler', () => {
  const options = { intervalMs: 1000, baseDelayMs: 1000, maxDelayMs: 8000, maxAutoAttempts: 3 };

  function listing(overrides: Partial<DlqListing> = {}): DlqListing {
    return {
      projectionName: PROJECTION,
      streamId: 'acct-1',
      failedAtVersion: 1,
      queuedCount: 1,
      reason: 'x',
      enqueuedAt: T0,
      redriveAttempts: 0,
      lastRedriveAt: null,
      ...overrides,
    };
  }

  it('should back off exponentially from the last attempt', () => {
    const scheduler = new RedriveScheduler(
      new SequenceDeadLetterQueue(new InMemorySequenceDlqRepository()),
      vi.fn(),
      { ...options, maxAutoAttempts: 10 }
    );
    const last = new Date(T0.getTime() + 60_000);

    expect(scheduler.nextAttemptAt(listing())).toEqual(new Date(T0.getTime() + 1000));
    expect(scheduler.nextAttemptAt(listing({ redriveAttempts: 2, lastRedriveAt: last }))).toEqual(
      new Date(last.getTime() + 4000)
    );
    expect(scheduler.nextAttemptAt(listing({ redriveAttempts: 6, lastRedriveAt: last }))).toEqual(
      new Date(last.getTime() + 8000)
    );
  });

  it('should leave entries alone once automatic attempts are spent', () => {
    const scheduler = new RedriveScheduler(
      new SequenceDeadLetterQueue(new InMemorySequenceDlqRepository()),
      vi.fn(),
      options
    );

    expect(scheduler.nextAttemptAt(listing({ redriveAttempts: 3, lastRedriveAt: T0 }))).toBeNull();
  });

  it('should redrive only due entries on tick', async () => {
    let now = T0;
    const dlq = new SequenceDeadLetterQueue(new InMemorySequenceDlqRepository(), { clock: () => now });
    await dlq.quarantine(PROJECTION, eventAt('acct-1', 1), 'x');
    const redrive = vi.fn((projectionName: string, streamId: string) =>
      Promise.resolve({ status: 'not_quarantined' as const, projectionName, streamId })
    );
    const scheduler = new RedriveScheduler(dlq, redrive, { ...options, clock: () => now });

    now = new Date(T0.getTime() + 500);
    expect(await scheduler.tick()).toBe(0);

    now = new Date(T0.getTime() + 1000);
    expect(await scheduler.tick()).toBe(1);
    expect(redrive).toHaveBeenCalledWith(PROJECTION, 'acct-1');
  });

  it('should not overlap ticks', async () => {
    const dlq = new SequenceDeadLetterQueue(new InMemorySequenceDlqRepository(), { clock: () => T0 });
    await dlq.quarantine(PROJECTION, eventAt('acct-1', 1), 'x');
    const redrive = vi.fn((projectionName: string, streamId: string) =>
      Promise.resolve({ status: 'not_quarantined' as const, projectionName, streamId })
    );
    const scheduler = new RedriveScheduler(dlq, redrive, {
      ...options,
      clock: () => new Date(T0.getTime() + 1000),
    });

    const counts = await Promise.all([scheduler.tick(), scheduler.tick()]);

    expect(counts).toEqual([1, 0]);
  });
});
