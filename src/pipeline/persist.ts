import type { ProbeResult } from '../types/mirror.js';
import type { BatchSummary, DurableStore } from '../types/store.js';
import { logger } from '../utils/logger.js';

const log = logger.child({ component: 'durable-store' });

export async function persistProbe(store: DurableStore, result: ProbeResult): Promise<void> {
  try {
    await store.recordProbe(result);
  } catch (err) {
    log.error({ err, endpoint: result.endpoint }, 'Failed to save probe result');
  }
}

export async function persistBatch(store: DurableStore, summary: BatchSummary): Promise<void> {
  try {
    await store.recordBatch(summary);
  } catch (err) {
    log.error({ err, observedAt: summary.observedAt }, 'Failed to save batch summary');
  }
}
