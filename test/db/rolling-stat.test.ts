import { describe, it, expect } from 'vitest';
import { accumulateStat, compareStats, mergeStat, seedStat } from '../../src/db/rolling-stat.js';
import { MemoryStore } from '../../src/db/memory-store.js';
import type { RollingStat } from '../../src/types/store.js';
import { makeResult } from '../helpers/fakes.js';

const M = 'https://a.test';

describe('accumulateStat', () => {
  it('should seed stats from the first probe', () => {
    const stat = accumulateStat(null, makeResult(M, { responseTimeMs: 100 }));

    expect(stat).toEqual({
      endpoint: M,
      totalTests: 1,
      successCount: 1,
      failCount: 0,
      avgResponseTimeMs: 100,
      lastSuccessAt: new Date('2026-03-01T08:00:00.000Z'),
      lastFailAt: null,
      currentStatus: true,
      updatedAt: new Date('2026-03-01T08:00:00.000Z'),
    });
  });

  it('should keep a cumulative mean over successes and failures', () => {
    const first = accumulateStat(
      null,
      makeResult(M, { responseTimeMs: 100, observedAt: '2026-03-01T08:00:00.000Z' }),
    );
    const second = accumulateStat(
      first,
      makeResult(M, {
        available: false,
        statusLabel: 'connection failed',
        statusCode: 0,
        responseTimeMs: 2000,
        observedAt: '2026-03-01T09:00:00.000Z',
      }),
    );
    const third = accumulateStat(
      second,
      makeResult(M, { responseTimeMs: 50, observedAt: '2026-03-01T10:00:00.000Z' }),
    );

    expect(second.avgResponseTimeMs).toBe(1050);
    expect(third).toMatchObject({
      totalTests: 3,
      successCount: 2,
      failCount: 1,
      currentStatus: true,
      lastSuccessAt: new Date('2026-03-01T10:00:00.000Z'),
      lastFailAt: new Date('2026-03-01T09:00:00.000Z'),
    });
    expect(third.avgResponseTimeMs).toBeCloseTo(716.67, 2);
  });

  it('should keep the last success time when a probe fails', () => {
    const first = accumulateStat(null, makeResult(M, { observedAt: '2026-03-01T08:00:00.000Z' }));
    const second = accumulateStat(
      first,
      makeResult(M, { available: false, observedAt: '2026-03-01T09:00:00.000Z' }),
    );

    expect(second.lastSuccessAt).toEqual(new Date('2026-03-01T08:00:00.000Z'));
    expect(second.currentStatus).toBe(false);
  });
});

describe('stats upsert rows', () => {
  const scenario = [
    makeResult(M, { responseTimeMs: 100, observedAt: '2026-03-01T08:00:00.000Z' }),
    makeResult(M, {
      available: false,
      statusLabel: 'connection failed',
      statusCode: 0,
      responseTimeMs: 2000,
      observedAt: '2026-03-01T09:00:00.000Z',
    }),
    makeResult(M, { responseTimeMs: 50, observedAt: '2026-03-01T10:00:00.000Z' }),
  ];

  it('should bind a failed probe as one failure with its own latency', () => {
    expect(seedStat(scenario[1] ?? makeResult(M))).toEqual({
      endpoint: M,
      totalTests: 1,
      successCount: 0,
      failCount: 1,
      avgResponseTimeMs: 2000,
      lastSuccessAt: null,
      lastFailAt: new Date('2026-03-01T09:00:00.000Z'),
      currentStatus: false,
      updatedAt: new Date('2026-03-01T09:00:00.000Z'),
    });
  });

  it('should fold bound rows the same way the memory store accumulates', async () => {
    const store = new MemoryStore();
    for (const result of scenario) await store.recordProbe(result);

    const [first, ...rest] = scenario.map(seedStat);
    const folded = rest.reduce((row, seed) => mergeStat(row, seed), first ?? seedStat(makeResult(M)));

    const stats = await store.getStats();
    expect(stats).toEqual([folded]);
    expect(folded).toMatchObject({ totalTests: 3, successCount: 2, failCount: 1, currentStatus: true });
    expect(folded.avgResponseTimeMs).toBeCloseTo(716.67, 2);
  });
});

describe('compareStats', () => {
  const stat = (endpoint: string, successCount: number, avg: number): RollingStat => ({
    endpoint,
    totalTests: successCount,
    successCount,
    failCount: 0,
    avgResponseTimeMs: avg,
    lastSuccessAt: null,
    lastFailAt: null,
    currentStatus: true,
    updatedAt: new Date(0),
  });

  it('should order by success count, then by average latency', () => {
    const sorted = [stat('a', 1, 10), stat('b', 3, 500), stat('c', 3, 200)].sort(compareStats);
    expect(sorted.map((s) => s.endpoint)).toEqual(['c', 'b', 'a']);
  });
});
