import { describe, it, expect, beforeEach } from 'vitest';
import { SNAPSHOT_KEY, SnapshotCache } from '../../src/cache/snapshot-cache.js';
import { SnapshotState } from '../../src/cache/snapshot-state.js';
import { FakeRedis, makeBatch, makeResult } from '../helpers/fakes.js';

const HOUR = 3_600_000;
const PUBLISHED_AT = Date.parse('2026-03-01T08:00:05.000Z');

describe('SnapshotCache', () => {
  let clock: number;
  let redis: FakeRedis;
  let cache: SnapshotCache;

  beforeEach(() => {
    clock = PUBLISHED_AT;
    redis = new FakeRedis(() => clock);
    cache = new SnapshotCache({ redis, intervalMs: HOUR, now: () => new Date(clock) });
  });

  it('should publish with timing derived from the interval', async () => {
    const batch = makeBatch([makeResult('https://a.test')]);

    const snapshot = await cache.publish(batch);

    expect(snapshot.lastUpdate).toBe('2026-03-01T08:00:05.000Z');
    expect(snapshot.nextUpdate).toBe('2026-03-01T09:00:05.000Z');
    expect(redis.ttlMs(SNAPSHOT_KEY)).toBe(HOUR);
    expect(await cache.read()).toEqual(snapshot);
  });

  it('should serve the in-process snapshot once Redis expires', async () => {
    await cache.publish(makeBatch([makeResult('https://a.test')]));
    clock += HOUR;

    expect(await redis.get(SNAPSHOT_KEY)).toBeNull();
    const snapshot = await cache.read();
    expect(snapshot?.batch.results.map((r) => r.endpoint)).toEqual(['https://a.test']);
  });

  it('should keep publishing into memory while Redis is down', async () => {
    redis.failing = true;

    const published = await cache.publish(makeBatch([makeResult('https://b.test')]));
    const snapshot = await cache.read();

    expect(snapshot).toBe(published);
    expect(snapshot?.batch.total).toBe(1);
  });

  it('should return null before anything was published', async () => {
    expect(await cache.read()).toBeNull();
  });

  it('should ignore a malformed Redis payload', async () => {
    await cache.publish(makeBatch([makeResult('https://a.test')]));
    await redis.set(SNAPSHOT_KEY, '{"batch":', 'EX', 60);

    const snapshot = await cache.read();
    expect(snapshot?.batch.results[0]?.endpoint).toBe('https://a.test');
  });

  it('should ignore a Redis payload with the wrong shape', async () => {
    await redis.set(SNAPSHOT_KEY, JSON.stringify({ batch: { total: 'three' } }), 'EX', 60);
    expect(await cache.read()).toBeNull();
  });

  it('should prefer the Redis tier when both are present', async () => {
    await cache.publish(makeBatch([makeResult('https://local.test')]));
    clock += 1000;
    const other = new SnapshotCache({ redis, intervalMs: HOUR, now: () => new Date(clock) });
    await other.publish(makeBatch([makeResult('https://shared.test')]));

    const snapshot = await cache.read();
    expect(snapshot?.batch.results[0]?.endpoint).toBe('https://shared.test');
  });

  it('should serve the newer in-process snapshot when the last Redis write failed', async () => {
    await cache.publish(makeBatch([makeResult('https://old.test')]));
    clock += 60_000;
    redis.failingWrites = true;

    await cache.publish(makeBatch([makeResult('https://new.test')]));

    expect(await redis.get(SNAPSHOT_KEY)).not.toBeNull();
    const snapshot = await cache.read();
    expect(snapshot?.batch.results[0]?.endpoint).toBe('https://new.test');
    expect(snapshot?.lastUpdate).toBe('2026-03-01T08:01:05.000Z');
  });

  it('should hand out frozen snapshots detached from the published batch', async () => {
    const batch = makeBatch([makeResult('https://a.test')]);
    const snapshot = await cache.publish(batch);

    batch.results.push(makeResult('https://late.test'));

    expect(snapshot.batch.results).toHaveLength(1);
    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot.batch.results[0])).toBe(true);
    expect(() => {
      snapshot.batch.results.push(makeResult('https://x.test'));
    }).toThrow(TypeError);
  });

  describe('warm', () => {
    it('should seed the in-process tier from Redis', async () => {
      await cache.publish(makeBatch([makeResult('https://a.test')]));
      const state = new SnapshotState();
      const restarted = new SnapshotCache({ redis, intervalMs: HOUR, state });

      expect(await restarted.warm()).toBe(true);
      expect(state.current()?.lastUpdate).toBe('2026-03-01T08:00:05.000Z');
    });

    it('should report false when Redis has nothing', async () => {
      expect(await cache.warm()).toBe(false);
    });

    it('should report false when Redis is unreachable', async () => {
      redis.failing = true;
      expect(await cache.warm()).toBe(false);
    });
  });
});
