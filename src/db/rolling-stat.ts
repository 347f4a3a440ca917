import type { ProbeResult } from '../types/mirror.js';
import type { RollingStat } from '../types/store.js';

/**
 * Stats row for an endpoint's first probe. This is also the row the
 * `mirror_stats` upsert binds as EXCLUDED on every later probe.
 */
export function seedStat(result: ProbeResult): RollingStat {
  const observedAt = new Date(result.observedAt);
  return {
    endpoint: result.endpoint,
    totalTests: 1,
    successCount: result.available ? 1 : 0,
    failCount: result.available ? 0 : 1,
    avgResponseTimeMs: result.responseTimeMs,
    lastSuccessAt: result.available ? observedAt : null,
    lastFailAt: result.available ? null : observedAt,
    currentStatus: result.available,
    updatedAt: observedAt,
  };
}

/**
 * The ON CONFLICT rule of the `mirror_stats` upsert in queries.ts, column
 * for column. The average is a cumulative mean over every probe, failed
 * ones included.
 */
export function mergeStat(prev: RollingStat, seed: RollingStat): RollingStat {
  return {
    endpoint: prev.endpoint,
    totalTests: prev.totalTests + 1,
    successCount: prev.successCount + seed.successCount,
    failCount: prev.failCount + seed.failCount,
    avgResponseTimeMs:
      (prev.avgResponseTimeMs * prev.totalTests + seed.avgResponseTimeMs) / (prev.totalTests + 1),
    lastSuccessAt: seed.lastSuccessAt ?? prev.lastSuccessAt,
    lastFailAt: seed.lastFailAt ?? prev.lastFailAt,
    currentStatus: seed.currentStatus,
    updatedAt: seed.updatedAt,
  };
}

/** Folds one probe into an endpoint's running statistics. */
export function accumulateStat(prev: RollingStat | null, result: ProbeResult): RollingStat {
  const seed = seedStat(result);
  return prev ? mergeStat(prev, seed) : seed;
}

/** Most reliable first, then fastest. */
export function compareStats(a: RollingStat, b: RollingStat): number {
  if (a.successCount !== b.successCount) return b.successCount - a.successCount;
  return a.avgResponseTimeMs - b.avgResponseTimeMs;
}
