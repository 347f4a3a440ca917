import type { Sql } from 'postgres';
import {
  getProbeHistory,
  getRollingStats,
  insertBatchSummary,
  recordProbeResult,
} from './queries.js';
import type { DurableStore } from '../types/store.js';

export function createPostgresStore(sql: Sql): DurableStore {
  return {
    recordProbe: (result) => recordProbeResult(sql, result),
    recordBatch: (summary) => insertBatchSummary(sql, summary),
    getHistory: (filter) => getProbeHistory(sql, filter),
    getStats: () => getRollingStats(sql),
  };
}
