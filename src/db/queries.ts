import type { Sql } from 'postgres';
import { seedStat } from './rolling-stat.js';
import type { ProbeResult } from '../types/mirror.js';
import type { BatchSummary, HistoryEntry, HistoryFilter, RollingStat } from '../types/store.js';

/**
 * Appends the probe to history and folds it into the endpoint's stats row.
 * Runs in one transaction, so the reserved connection goes back to the
 * pool on commit and on rollback alike.
 */
export async function recordProbeResult(sql: Sql, result: ProbeResult): Promise<void> {
  const seed = seedStat(result);

  await sql.begin(async (tx) => {
    await tx`
      INSERT INTO mirror_probe_history
        (endpoint, available, status_label, status_code, response_time_ms, observed_at)
      VALUES (
        ${result.endpoint}, ${result.available}, ${result.statusLabel},
        ${result.statusCode}, ${result.responseTimeMs}, ${seed.updatedAt}
      )
    `;

    // mirror_stats.* is the pre-update row, EXCLUDED is the seed. Keep the
    // SET list in step with mergeStat in rolling-stat.ts.
    await tx`
      INSERT INTO mirror_stats (
        endpoint, total_tests, success_count, fail_count, avg_response_time_ms,
        last_success_at, last_fail_at, current_status, updated_at
      )
      VALUES (
        ${seed.endpoint}, ${seed.totalTests}, ${seed.successCount}, ${seed.failCount},
        ${seed.avgResponseTimeMs}, ${seed.lastSuccessAt}, ${seed.lastFailAt},
        ${seed.currentStatus}, ${seed.updatedAt}
      )
      ON CONFLICT (endpoint) DO UPDATE SET
        total_tests = mirror_stats.total_tests + 1,
        success_count = mirror_stats.success_count + EXCLUDED.success_count,
        fail_count = mirror_stats.fail_count + EXCLUDED.fail_count,
        avg_response_time_ms =
          (mirror_stats.avg_response_time_ms * mirror_stats.total_tests + EXCLUDED.avg_response_time_ms)
          / (mirror_stats.total_tests + 1),
        last_success_at = COALESCE(EXCLUDED.last_success_at, mirror_stats.last_success_at),
        last_fail_at = COALESCE(EXCLUDED.last_fail_at, mirror_stats.last_fail_at),
        current_status = EXCLUDED.current_status,
        updated_at = EXCLUDED.updated_at
    `;
  });
}

export async function insertBatchSummary(sql: Sql, summary: BatchSummary): Promise<void> {
  await sql`
    INSERT INTO mirror_batches (observed_at, total, available_count, unavailable_count)
    VALUES (${new Date(summary.observedAt)}, ${summary.total}, ${summary.available}, ${summary.unavailable})
  `;
}

export async function getProbeHistory(sql: Sql, filter: HistoryFilter): Promise<HistoryEntry[]> {
  return sql<HistoryEntry[]>`
    SELECT
      id,
      endpoint,
      available,
      status_label AS "statusLabel",
      status_code AS "statusCode",
      response_time_ms AS "responseTimeMs",
      observed_at AS "observedAt"
    FROM mirror_probe_history
    ${filter.endpoint ? sql`WHERE endpoint = ${filter.endpoint}` : sql``}
    ORDER BY observed_at DESC, id DESC
    LIMIT ${filter.limit}
  `;
}

export async function getRollingStats(sql: Sql): Promise<RollingStat[]> {
  return sql<RollingStat[]>`
    SELECT
      endpoint,
      total_tests AS "totalTests",
      success_count AS "successCount",
      fail_count AS "failCount",
      avg_response_time_ms AS "avgResponseTimeMs",
      last_success_at AS "lastSuccessAt",
      last_fail_at AS "lastFailAt",
      current_status AS "currentStatus",
      updated_at AS "updatedAt"
    FROM mirror_stats
    ORDER BY success_count DESC, avg_response_time_ms ASC
  `;
}
