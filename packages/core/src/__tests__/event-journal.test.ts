/**
 * Event Journal Tests
 * Append semantics, optimistic concurrency, cursors and storage retries
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import fc from 'fast-check';
import type { EventEnvelope, NewEvent } from '@streamvault/types';
import {
  EventJournal,
  InMemoryEventJournalRepository,
  type AppendResult,
  type EventPublisher,
} from '../event-journal.js';
import { StorageError, ValidationError, VersionConflictError } from '../errors.js';

const FIXED_NOW = new Date('2026-03-01T09:30:00.000Z');

function deposit(amount: number, overrides: Partial<NewEvent> = {}): NewEvent {
  return { type: 'Deposited', payload: { amount }, ...overrides };
}

function committedVersion(result: AppendResult): number {
  if (result.status !== 'committed') {
    throw new Error(`expected a commit, got ${result.status}`);
  }
  return result.version;
}

describe('EventJournal', () => {
  let repository: InMemoryEventJournalRepository;
  let journal: EventJournal;

  beforeEach(() => {
    repository = new InMemoryEventJournalRepository();
    journal = new EventJournal(repository, { pageSize: 2, clock: () => FIXED_NOW });
  });

  // ==========================================================================
  // APPEND
  // ==========================================================================

  describe('append', () => {
    it('should assign consecutive versions starting at 1', async () => {
      const result = await journal.append('acct-1', 0, [deposit(10), deposit(20)]);

      expect(result.status).toBe('committed');
      if (result.status !== 'committed') return;
      expect(result.version).toBe(2);
      expect(result.events.map((e) => e.version)).toEqual([1, 2]);
    });

    it('should fill in envelope metadata', async () => {
      const result = await journal.append('acct-1', 0, [deposit(10), deposit(20)]);
      if (result.status !== 'committed') throw new Error('not committed');

      const [first, second] = result.events;
      expect(first?.streamId).toBe('acct-1');
      expect(first?.occurredAt).toBe('2026-03-01T09:30:00.000Z');
      expect(first?.causationId).toBeNull();
      expect(first?.eventId).not.toBe(second?.eventId);
      // one correlation id per batch
      expect(first?.correlationId).toBe(second?.correlationId);
    });

    it('should keep caller-supplied metadata', async () => {
      const eventId = '2b7e1516-28ae-4d2a-abf7-158809cf4f3c';
      const correlationId = '6bc1bee2-2e40-4f96-9b3a-6d6c3d1a9e55';
      const result = await journal.append('acct-1', 0, [
        deposit(10, { eventId, correlationId, occurredAt: '2025-12-31T23:59:59.000Z' }),
      ]);
      if (result.status !== 'committed') throw new Error('not committed');

      expect(result.events[0]?.eventId).toBe(eventId);
      expect(result.events[0]?.correlationId).toBe(correlationId);
      expect(result.events[0]?.occurredAt).toBe('2025-12-31T23:59:59.000Z');
    });

    it('should report a conflict when the stream moved on', async () => {
      await journal.append('acct-1', 0, [deposit(10)]);

      const result = await journal.append('acct-1', 0, [deposit(20)]);

      expect(result).toEqual({
        status: 'conflict',
        streamId: 'acct-1',
        expectedVersion: 0,
        actualVersion: 1,
      });
      expect(await journal.getStreamVersion('acct-1')).toBe(1);
    });

    it('should commit exactly one of two concurrent appends at the same version', async () => {
      await journal.append('acct-1', 0, [deposit(1), deposit(2), deposit(3)]);

      const results = await Promise.all([
        journal.append('acct-1', 3, [deposit(4)]),
        journal.append('acct-1', 3, [deposit(5)]),
      ]);

      expect(results.filter((r) => r.status === 'committed')).toHaveLength(1);
      expect(results.filter((r) => r.status === 'conflict')).toHaveLength(1);
      const events = await (await journal.read('acct-1')).toArray();
      expect(events.map((e) => e.version)).toEqual([1, 2, 3, 4]);
    });

    it('should reject an empty batch', async () => {
      await expect(journal.append('acct-1', 0, [])).rejects.toBeInstanceOf(ValidationError);
    });

    it('should reject an empty stream id', async () => {
      await expect(journal.append('', 0, [deposit(1)])).rejects.toBeInstanceOf(ValidationError);
    });

    it('should reject a negative expected version', async () => {
      await expect(journal.append('acct-1', -1, [deposit(1)])).rejects.toBeInstanceOf(
        ValidationError
      );
    });

    it('should keep versions dense for any sequence of batches', async () => {
      await fc.assert(
        fc.asyncProperty(fc.array(fc.integer({ min: 1, max: 5 }), { minLength: 1, maxLength: 10 }), async (sizes) => {
          const local = new EventJournal(new InMemoryEventJournalRepository());
          let version = 0;
          for (const size of sizes) {
            const batch = Array.from({ length: size }, (_, i) => deposit(i + 1));
            version = committedVersion(await local.append('stream-p', version, batch));
          }

          const events = await (await local.read('stream-p')).toArray();
          const total = sizes.reduce((sum, size) => sum + size, 0);
          expect(events.map((e) => e.version)).toEqual(
            Array.from({ length: total }, (_, i) => i + 1)
          );
        }),
        { numRuns: 25 }
      );
    });
  });

  describe('appendOrThrow', () => {
    it('should return the new version', async () => {
      expect(await journal.appendOrThrow('acct-1', 0, [deposit(1), deposit(2)])).toBe(2);
    });

    it('should throw VersionConflictError on conflict', async () => {
      await journal.append('acct-1', 0, [deposit(1)]);

      const error: unknown = await journal.appendOrThrow('acct-1', 0, [deposit(2)]).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(VersionConflictError);
      if (!(error instanceof VersionConflictError)) return;
      expect(error.expectedVersion).toBe(0);
      expect(error.actualVersion).toBe(1);
    });
  });

  // ==========================================================================
  // READ
  // ==========================================================================

  describe('read', () => {
    beforeEach(async () => {
      await journal.append('acct-1', 0, [deposit(1), deposit(2), deposit(3), deposit(4), deposit(5)]);
    });

    it('should page through the whole stream in order', async () => {
      const events = await (await journal.read('acct-1')).toArray();

      expect(events.map((e) => e.payload)).toEqual([
        { amount: 1 },
        { amount: 2 },
        { amount: 3 },
        { amount: 4 },
        { amount: 5 },
      ]);
    });

    it('should start at fromVersion inclusive', async () => {
      const events = await (await journal.read('acct-1', 4)).toArray();

      expect(events.map((e) => e.version)).toEqual([4, 5]);
    });

    it('should be bounded by the version at creation time', async () => {
      const cursor = await journal.read('acct-1');
      await journal.append('acct-1', 5, [deposit(6)]);

      const events = await cursor.toArray();

      expect(cursor.toVersion).toBe(5);
      expect(events).toHaveLength(5);
    });

    it('should restart from the beginning on each iteration', async () => {
      const cursor = await journal.read('acct-1', 2);

      const first = await cursor.toArray();
      const second = await cursor.toArray();

      expect(second).toEqual(first);
      expect(first.map((e) => e.version)).toEqual([2, 3, 4, 5]);
    });

    it('should be empty for an unknown stream', async () => {
      const cursor = await journal.read('acct-unknown');

      expect(cursor.toVersion).toBe(0);
      expect(await cursor.toArray()).toEqual([]);
    });
  });

  describe('readAll', () => {
    it('should read every stream in commit order after a position', async () => {
      await journal.append('acct-a', 0, [deposit(1), deposit(2)]);
      await journal.append('acct-b', 0, [deposit(3)]);

      const all: string[] = [];
      for await (const record of await journal.readAll()) {
        all.push(`${record.position}:${record.event.streamId}@${record.event.version}`);
      }
      const tail: number[] = [];
      for await (const record of await journal.readAll(2)) {
        tail.push(record.position);
      }

      expect(all).toEqual(['1:acct-a@1', '2:acct-a@2', '3:acct-b@1']);
      expect(tail).toEqual([3]);
    });
  });

  describe('listStreams', () => {
    it('should list streams in creation order', async () => {
      await journal.append('acct-b', 0, [deposit(1)]);
      await journal.append('acct-a', 0, [deposit(1)]);

      expect(await journal.listStreams()).toEqual(['acct-b', 'acct-a']);
    });
  });

  // ==========================================================================
  // ERASURE
  // ==========================================================================

  describe('erasePayloads', () => {
    it('should null payloads and keep ordering metadata', async () => {
      await journal.append('acct-1', 0, [deposit(1), deposit(2)]);

      const erased = await journal.erasePayloads('acct-1');
      const events = await (await journal.read('acct-1')).toArray();

      expect(erased).toBe(2);
      expect(events.map((e) => [e.version, e.type, e.payload])).toEqual([
        [1, 'Deposited', null],
        [2, 'Deposited', null],
      ]);
      expect(await journal.erasePayloads('acct-1')).toBe(0);
    });
  });

  // ==========================================================================
  // PUBLISHERS
  // ==========================================================================

  describe('publishers', () => {
    it('should deliver committed events to every publisher', async () => {
      const received: EventEnvelope[][] = [];
      const publisher: EventPublisher = {
        publish: (events) => {
          received.push([...events]);
          return Promise.resolve();
        },
      };
      journal.addPublisher(publisher);

      await journal.append('acct-1', 0, [deposit(1), deposit(2)]);
      await journal.flush();

      expect(received).toHaveLength(1);
      expect(received[0]?.map((e) => e.version)).toEqual([1, 2]);
    });

    it('should not deliver conflicting appends', async () => {
      const publish = vi.fn(() => Promise.resolve());
      await journal.append('acct-1', 0, [deposit(1)]);
      journal.addPublisher({ publish });

      await journal.append('acct-1', 0, [deposit(2)]);
      await journal.flush();

      expect(publish).not.toHaveBeenCalled();
    });

    it('should keep the append committed when a publisher fails', async () => {
      journal.addPublisher({ publish: () => Promise.reject(new Error('subscriber down')) });

      const result = await journal.append('acct-1', 0, [deposit(1)]);
      await journal.flush();

      expect(result.status).toBe('committed');
      expect(await journal.getStreamVersion('acct-1')).toBe(1);
    });
  });

  // ==========================================================================
  // STORAGE RETRIES
  // ==========================================================================

  describe('storage retries', () => {
    it('should retry StorageError with backoff and then succeed', async () => {
      const flaky = new InMemoryEventJournalRepository();
      const realAppend = flaky.append.bind(flaky);
      let failures = 2;
      vi.spyOn(flaky, 'append').mockImplementation((streamId, expected, events) => {
        if (failures > 0) {
          failures--;
          return Promise.reject(new StorageError('append', 'connection reset'));
        }
        return realAppend(streamId, expected, events);
      });
      const retrying = new EventJournal(flaky, { retry: { maxRetries: 3, baseDelayMs: 1 } });

      const result = await retrying.append('acct-1', 0, [deposit(1)]);

      expect(result.status).toBe('committed');
      expect(flaky.append).toHaveBeenCalledTimes(3);
    });

    it('should report a commit whose acknowledgement was lost', async () => {
      const lossy = new InMemoryEventJournalRepository();
      const realAppend = lossy.append.bind(lossy);
      let dropAck = true;
      vi.spyOn(lossy, 'append').mockImplementation(async (streamId, expected, events) => {
        const result = await realAppend(streamId, expected, events);
        if (dropAck) {
          dropAck = false;
          throw new StorageError('append', 'connection reset after commit');
        }
        return result;
      });
      const retrying = new EventJournal(lossy, { retry: { maxRetries: 3, baseDelayMs: 1 } });
      const publish = vi.fn((_events: readonly EventEnvelope[]) => Promise.resolve());
      retrying.addPublisher({ publish });

      const result = await retrying.append('acct-1', 0, [deposit(1), deposit(2)]);
      await retrying.flush();

      expect(result.status).toBe('committed');
      expect(committedVersion(result)).toBe(2);
      expect(lossy.append).toHaveBeenCalledTimes(2);
      expect(await retrying.getStreamVersion('acct-1')).toBe(2);
      expect(publish).toHaveBeenCalledTimes(1);
      expect(publish.mock.calls[0]?.[0].map((e) => e.version)).toEqual([1, 2]);
    });

    it('should still report a conflict when a retried append lost to another writer', async () => {
      const contended = new InMemoryEventJournalRepository();
      const realAppend = contended.append.bind(contended);
      let interfere = true;
      vi.spyOn(contended, 'append').mockImplementation(async (streamId, expected, events) => {
        if (interfere) {
          interfere = false;
          const rival = events.map((event) => ({ ...event, eventId: '0b7c8a52-3f4e-4d6a-9b1c-2e3f4a5b6c7d' }));
          await realAppend(streamId, expected, rival);
          throw new StorageError('append', 'connection reset');
        }
        return realAppend(streamId, expected, events);
      });
      const retrying = new EventJournal(contended, { retry: { maxRetries: 3, baseDelayMs: 1 } });

      const result = await retrying.append('acct-1', 0, [deposit(1)]);

      expect(result).toEqual({ status: 'conflict', streamId: 'acct-1', expectedVersion: 0, actualVersion: 1 });
    });

    it('should give up after the retry budget', async () => {
      const down = new InMemoryEventJournalRepository();
      vi.spyOn(down, 'getStreamVersion').mockRejectedValue(
        new StorageError('getStreamVersion', 'connection refused')
      );
      const retrying = new EventJournal(down, { retry: { maxRetries: 2, baseDelayMs: 1 } });

      await expect(retrying.getStreamVersion('acct-1')).rejects.toBeInstanceOf(StorageError);
      expect(down.getStreamVersion).toHaveBeenCalledTimes(3);
    });

    it('should not retry other errors', async () => {
      const broken = new InMemoryEventJournalRepository();
      vi.spyOn(broken, 'listStreams').mockRejectedValue(new Error('syntax error'));
      const retrying = new EventJournal(broken, { retry: { maxRetries: 3, baseDelayMs: 1 } });

      await expect(retrying.listStreams()).rejects.toThrow('syntax error');
      expect(broken.listStreams).toHaveBeenCalledTimes(1);
    });
  });
});
