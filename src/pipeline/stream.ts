import { DEFAULT_PROBE_TIMEOUT_MS, probeEndpoint, type ProbeFn } from '../probe/http-probe.js';
import { buildBatch } from './ranking.js';
import { persistProbe } from './persist.js';
import type { Batch, ProbeResult } from '../types/mirror.js';
import type { DurableStore } from '../types/store.js';

export type BatchProgressEvent =
  | { type: 'progress'; completed: number; total: number; result: ProbeResult }
  | { type: 'done'; batch: Batch };

export interface StreamOptions {
  timeoutMs?: number;
  persistTo?: DurableStore;
  probe?: ProbeFn;
}

/**
 * Probes endpoints one at a time, in input order, so progress events
 * arrive in the order the caller listed the mirrors. The final event
 * carries the ranked batch.
 */
export async function* streamBatch(
  endpoints: readonly string[],
  options: StreamOptions = {},
): AsyncGenerator<BatchProgressEvent> {
  const { timeoutMs = DEFAULT_PROBE_TIMEOUT_MS, persistTo, probe = probeEndpoint } = options;
  const observedAt = new Date();
  const results: ProbeResult[] = [];

  for (const endpoint of endpoints) {
    const result = await probe(endpoint, { timeoutMs });
    if (persistTo) await persistProbe(persistTo, result);
    results.push(result);
    yield { type: 'progress', completed: results.length, total: endpoints.length, result };
  }

  yield { type: 'done', batch: buildBatch(results, observedAt) };
}
