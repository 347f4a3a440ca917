import type { Batch, ProbeResult } from '../types/mirror.js';

/** Available first, then fastest first. Returns a new array. */
export function rankResults(results: readonly ProbeResult[]): ProbeResult[] {
  return [...results].sort((a, b) => {
    if (a.available !== b.available) return a.available ? -1 : 1;
    return a.responseTimeMs - b.responseTimeMs;
  });
}

export function buildBatch(results: readonly ProbeResult[], observedAt: Date): Batch {
  const ranked = rankResults(results);
  const available = ranked.filter((r) => r.available).length;
  return {
    observedAt: observedAt.toISOString(),
    total: ranked.length,
    available,
    unavailable: ranked.length - available,
    results: ranked,
  };
}
