import { Semaphore } from 'async-mutex';
import type { Dispatcher } from 'undici';
import { DEFAULT_PROBE_TIMEOUT_MS, probeEndpoint, type ProbeFn } from '../probe/http-probe.js';
import { buildBatch } from './ranking.js';
import { persistProbe } from './persist.js';
import type { Batch, ProbeResult } from '../types/mirror.js';
import type { DurableStore } from '../types/store.js';
import { DEADLINE_EXCEEDED, withDeadline } from '../utils/deadline.js';
import { logger } from '../utils/logger.js';

export const DEFAULT_TASK_CEILING_MS = 10_000;
export const DEFAULT_CONCURRENCY = 20;

export interface BatchOptions {
  /** Per-request probe timeout */
  timeoutMs?: number;
  /** Wall-clock budget for one probe task, persistence included */
  taskCeilingMs?: number;
  concurrency?: number;
  /** When set, every result is written to durable history and stats */
  persistTo?: DurableStore;
  probe?: ProbeFn;
  dispatcher?: Dispatcher;
}

const log = logger.child({ component: 'aggregator' });

/**
 * Probes every endpoint concurrently and returns the ranked batch.
 * Tasks that miss the ceiling are dropped from the batch, not retried.
 * Keep `timeoutMs` below `taskCeilingMs` so an unreachable mirror still
 * lands in the batch as unavailable.
 */
export async function runBatch(
  endpoints: readonly string[],
  options: BatchOptions = {},
): Promise<Batch> {
  const {
    timeoutMs = DEFAULT_PROBE_TIMEOUT_MS,
    taskCeilingMs = DEFAULT_TASK_CEILING_MS,
    concurrency = DEFAULT_CONCURRENCY,
    persistTo,
    probe = probeEndpoint,
    dispatcher,
  } = options;

  const observedAt = new Date();
  const semaphore = new Semaphore(Math.max(1, concurrency));

  const task = async (endpoint: string): Promise<ProbeResult | null> => {
    const result = await probe(endpoint, { timeoutMs, dispatcher });
    if (persistTo) await persistProbe(persistTo, result);
    return result;
  };

  // The slot is held until the probe settles, even after its result is
  // dropped, so at most `concurrency` probes are ever on the wire.
  const settled = await Promise.all(
    endpoints.map(async (endpoint) => {
      const [, release] = await semaphore.acquire();
      const work = task(endpoint)
        .catch((err: unknown) => {
          log.error({ err, endpoint }, 'Probe task failed');
          return null;
        })
        .finally(release);
      const outcome = await withDeadline(work, taskCeilingMs);
      if (outcome === DEADLINE_EXCEEDED) {
        log.warn({ endpoint, taskCeilingMs }, 'Probe task exceeded ceiling, dropping result');
        return null;
      }
      return outcome;
    }),
  );

  const results = settled.filter((r): r is ProbeResult => r !== null);
  const batch = buildBatch(results, observedAt);

  log.info(
    {
      requested: endpoints.length,
      total: batch.total,
      available: batch.available,
      durationMs: Date.now() - observedAt.getTime(),
    },
    'Batch completed',
  );

  return batch;
}
