import type { Batch, RecommendedConfig, SnapshotTiming } from '../types/mirror.js';

export const DEFAULT_RECOMMENDED_COUNT = 5;

// Sorts results without a usable latency after every measured one.
const MISSING_LATENCY_MS = Number.MAX_SAFE_INTEGER;

function latencyOf(ms: number): number {
  return Number.isFinite(ms) ? ms : MISSING_LATENCY_MS;
}

/** Picks the fastest available mirrors of a batch. */
export function synthesize(
  batch: Batch,
  timing: SnapshotTiming | null = null,
  limit: number = DEFAULT_RECOMMENDED_COUNT,
): RecommendedConfig {
  const available = batch.results.filter((r) => r.available);
  const mirrors = [...available]
    .sort((a, b) => latencyOf(a.responseTimeMs) - latencyOf(b.responseTimeMs))
    .slice(0, limit)
    .map((r) => r.endpoint);

  return {
    mirrors,
    count: mirrors.length,
    totalAvailable: available.length,
    lastUpdate: timing?.lastUpdate ?? null,
    nextUpdate: timing?.nextUpdate ?? null,
  };
}
