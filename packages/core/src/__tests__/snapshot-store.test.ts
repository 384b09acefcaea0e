/**
 * Snapshot Store Tests
 * Policy decisions, in-memory history and pruning
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { Snapshot } from '@streamvault/types';
import {
  InMemorySnapshotStore,
  SnapshotManager,
  SnapshotPolicy,
  createInMemorySnapshotManager,
} from '../cqrs/snapshot-store.js';

const NOW = new Date('2026-05-10T12:00:00.000Z');

function snapshotAt(version: number, ageMs = 0, streamId = 'acct-1'): Snapshot {
  return {
    streamId,
    version,
    state: { total: version },
    takenAt: new Date(NOW.getTime() - ageMs),
  };
}

describe('SnapshotPolicy', () => {
  const policy = new SnapshotPolicy(3, 1000);

  it('should never snapshot an empty stream', () => {
    expect(policy.shouldSnapshot(0, null, NOW)).toBe(false);
  });

  it('should wait for N events before the first snapshot', () => {
    expect(policy.shouldSnapshot(2, null, NOW)).toBe(false);
    expect(policy.shouldSnapshot(3, null, NOW)).toBe(true);
  });

  it('should not snapshot when the stream has not moved', () => {
    expect(policy.shouldSnapshot(3, snapshotAt(3, 5000), NOW)).toBe(false);
  });

  it('should snapshot once N events accumulated since the last one', () => {
    const last = snapshotAt(3, 10);

    expect(policy.shouldSnapshot(5, last, NOW)).toBe(false);
    expect(policy.shouldSnapshot(6, last, NOW)).toBe(true);
  });

  it('should snapshot when the last one is older than T', () => {
    expect(policy.shouldSnapshot(4, snapshotAt(3, 999), NOW)).toBe(false);
    expect(policy.shouldSnapshot(4, snapshotAt(3, 1000), NOW)).toBe(true);
  });
});

describe('InMemorySnapshotStore', () => {
  let store: InMemorySnapshotStore;

  beforeEach(() => {
    store = new InMemorySnapshotStore();
  });

  it('should load the highest version', async () => {
    await store.save(snapshotAt(4));
    await store.save(snapshotAt(2));

    expect((await store.loadLatest('acct-1'))?.version).toBe(4);
    expect(await store.loadLatest('acct-2')).toBeNull();
  });

  it('should replace a snapshot saved at the same version', async () => {
    await store.save(snapshotAt(4));
    await store.save({ ...snapshotAt(4), state: { total: 99 } });

    expect(store.size()).toBe(1);
    expect((await store.loadLatest('acct-1'))?.state).toEqual({ total: 99 });
  });

  it('should delete versions below a bound', async () => {
    await store.save(snapshotAt(1));
    await store.save(snapshotAt(2));
    await store.save(snapshotAt(3));

    expect(await store.deleteOlderThan('acct-1', 3)).toBe(2);
    expect(store.size()).toBe(1);
  });

  it('should keep the latest snapshot of each stream during cleanup', async () => {
    await store.save(snapshotAt(1, 5000));
    await store.save(snapshotAt(2, 4000));
    await store.save(snapshotAt(7, 4000, 'acct-2'));

    const deleted = await store.cleanup(1000, NOW);

    expect(deleted).toBe(1);
    expect((await store.loadLatest('acct-1'))?.version).toBe(2);
    expect((await store.loadLatest('acct-2'))?.version).toBe(7);
  });
});

describe('SnapshotManager', () => {
  let store: InMemorySnapshotStore;
  let manager: SnapshotManager;

  beforeEach(() => {
    store = new InMemorySnapshotStore();
    manager = new SnapshotManager(store, { everyEvents: 3, retentionMs: 1000, clock: () => NOW });
  });

  afterEach(() => {
    manager.stopCleanupTask();
    vi.useRealTimers();
  });

  it('should stamp snapshots with its clock and prune superseded ones', async () => {
    await manager.save('acct-1', 3, { total: 3 });
    const latest = await manager.save('acct-1', 6, { total: 6 });

    expect(latest.takenAt).toEqual(NOW);
    expect(store.size()).toBe(1);
    expect(await manager.loadLatest('acct-1')).toEqual({
      streamId: 'acct-1',
      version: 6,
      state: { total: 6 },
      takenAt: NOW,
    });
  });

  it('should keep the new snapshot when pruning fails and sweep the rest on cleanup', async () => {
    let now = NOW;
    const sweeping = new SnapshotManager(store, { retentionMs: 1000, clock: () => now });
    await sweeping.save('acct-1', 3, { total: 3 });
    vi.spyOn(store, 'deleteOlderThan').mockRejectedValueOnce(new Error('connection reset'));

    await sweeping.save('acct-1', 6, { total: 6 });
    expect(store.size()).toBe(2);
    expect((await sweeping.loadLatest('acct-1'))?.version).toBe(6);

    now = new Date(NOW.getTime() + 1001);
    expect(await sweeping.runCleanup()).toBe(1);
    expect(store.size()).toBe(1);
    expect((await sweeping.loadLatest('acct-1'))?.version).toBe(6);
  });

  it('should build its policy from the config', () => {
    expect(manager.policy.everyEvents).toBe(3);
    expect(manager.policy.maxAgeMs).toBe(10 * 60 * 1000);
  });

  it('should run cleanup with the retention window', async () => {
    const spy = vi.spyOn(store, 'cleanup');

    await manager.runCleanup();

    expect(spy).toHaveBeenCalledWith(1000, NOW);
  });

  it('should run cleanup periodically once started', async () => {
    vi.useFakeTimers();
    const spy = vi.spyOn(store, 'cleanup');

    manager.startCleanupTask(500);
    await vi.advanceTimersByTimeAsync(1100);
    manager.stopCleanupTask();
    await vi.advanceTimersByTimeAsync(1000);

    expect(spy).toHaveBeenCalledTimes(2);
  });

  it('should create an in-memory manager with defaults', async () => {
    const defaults = createInMemorySnapshotManager();

    expect(defaults.policy.everyEvents).toBe(1000);
    expect(await defaults.loadLatest('acct-1')).toBeNull();
  });
});
