import { accumulateStat, compareStats } from './rolling-stat.js';
import type { ProbeResult } from '../types/mirror.js';
import type {
  BatchSummary,
  DurableStore,
  HistoryEntry,
  HistoryFilter,
  RollingStat,
} from '../types/store.js';

/**
 * Process-local durable store for running without Postgres. Same shape
 * and ordering as the Postgres store; nothing survives a restart.
 */
export class MemoryStore implements DurableStore {
  private readonly history: HistoryEntry[] = [];
  private readonly stats = new Map<string, RollingStat>();
  private readonly batches: BatchSummary[] = [];
  private nextId = 1;

  async recordProbe(result: ProbeResult): Promise<void> {
    this.history.push({
      id: this.nextId++,
      endpoint: result.endpoint,
      available: result.available,
      statusLabel: result.statusLabel,
      statusCode: result.statusCode,
      responseTimeMs: result.responseTimeMs,
      observedAt: new Date(result.observedAt),
    });
    this.stats.set(result.endpoint, accumulateStat(this.stats.get(result.endpoint) ?? null, result));
  }

  async recordBatch(summary: BatchSummary): Promise<void> {
    this.batches.push({ ...summary });
  }

  async getHistory(filter: HistoryFilter): Promise<HistoryEntry[]> {
    return this.history
      .filter((entry) => !filter.endpoint || entry.endpoint === filter.endpoint)
      .sort((a, b) => b.observedAt.getTime() - a.observedAt.getTime() || b.id - a.id)
      .slice(0, filter.limit)
      .map((entry) => ({ ...entry }));
  }

  async getStats(): Promise<RollingStat[]> {
    return [...this.stats.values()].sort(compareStats).map((stat) => ({ ...stat }));
  }

  getBatches(): BatchSummary[] {
    return this.batches.map((b) => ({ ...b }));
  }
}
