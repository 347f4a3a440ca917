/** Outcome of one availability check against one mirror. */
export interface ProbeResult {
  endpoint: string;
  available: boolean;
  statusLabel: string;
  /** 0 when no variant produced an HTTP response */
  statusCode: number;
  responseTimeMs: number;
  observedAt: string;
}

/**
 * All results of one aggregation run, available mirrors first and
 * fastest first within each group.
 */
export interface Batch {
  observedAt: string;
  total: number;
  available: number;
  unavailable: number;
  results: ProbeResult[];
}

export interface SnapshotTiming {
  lastUpdate: string;
  nextUpdate: string;
}

export interface CachedSnapshot extends SnapshotTiming {
  batch: Batch;
}

export interface RecommendedConfig {
  mirrors: string[];
  count: number;
  totalAvailable: number;
  lastUpdate: string | null;
  nextUpdate: string | null;
}

export type ApplyFailureReason =
  | 'no-available-mirrors'
  | 'mkdir-failed'
  | 'backup-failed'
  | 'permission-denied'
  | 'write-failed';

export type ApplyResult =
  | { ok: true; path: string; backupPath: string | null; mirrors: string[] }
  | { ok: false; reason: ApplyFailureReason; message: string };
