import type { Batch, ProbeResult } from './mirror.js';

export interface HistoryEntry {
  id: number;
  endpoint: string;
  available: boolean;
  statusLabel: string;
  statusCode: number;
  responseTimeMs: number;
  observedAt: Date;
}

export interface RollingStat {
  endpoint: string;
  totalTests: number;
  successCount: number;
  failCount: number;
  avgResponseTimeMs: number;
  lastSuccessAt: Date | null;
  lastFailAt: Date | null;
  currentStatus: boolean;
  updatedAt: Date;
}

export type BatchSummary = Omit<Batch, 'results'>;

export interface HistoryFilter {
  endpoint?: string;
  limit: number;
}

/** Durable history, rolling stats and batch log. Writes may throw. */
export interface DurableStore {
  recordProbe(result: ProbeResult): Promise<void>;
  recordBatch(summary: BatchSummary): Promise<void>;
  getHistory(filter: HistoryFilter): Promise<HistoryEntry[]>;
  getStats(): Promise<RollingStat[]>;
}

/** The slice of the Redis client the volatile tier uses. */
export interface VolatileClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, mode: 'EX', seconds: number): Promise<unknown>;
}
