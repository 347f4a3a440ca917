import { cachedSnapshotSchema } from './schema.js';
import { SnapshotState } from './snapshot-state.js';
import type { Batch, CachedSnapshot } from '../types/mirror.js';
import type { VolatileClient } from '../types/store.js';
import { logger } from '../utils/logger.js';

export const SNAPSHOT_KEY = 'mirror:snapshot';

export interface SnapshotCacheOptions {
  redis: VolatileClient;
  intervalMs: number;
  state?: SnapshotState;
  now?: () => Date;
}

const log = logger.child({ component: 'snapshot-cache' });

/**
 * Two-tier read path for the latest batch: Redis, shared across
 * processes, and the in-process snapshot from the last publish.
 */
export class SnapshotCache {
  private readonly redis: VolatileClient;
  private readonly intervalMs: number;
  private readonly state: SnapshotState;
  private readonly now: () => Date;

  constructor(options: SnapshotCacheOptions) {
    this.redis = options.redis;
    this.intervalMs = options.intervalMs;
    this.state = options.state ?? new SnapshotState();
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Replaces both tiers with a snapshot of `batch`. A Redis failure is
   * logged; the in-process tier is updated regardless.
   */
  async publish(batch: Batch): Promise<Readonly<CachedSnapshot>> {
    const lastUpdate = this.now();
    const snapshot: CachedSnapshot = {
      batch,
      lastUpdate: lastUpdate.toISOString(),
      nextUpdate: new Date(lastUpdate.getTime() + this.intervalMs).toISOString(),
    };

    const published = this.state.replace(snapshot);

    try {
      const ttlSeconds = Math.max(1, Math.ceil(this.intervalMs / 1000));
      await this.redis.set(SNAPSHOT_KEY, JSON.stringify(snapshot), 'EX', ttlSeconds);
    } catch (err) {
      log.warn({ err }, 'Failed to cache snapshot in Redis');
    }

    return published;
  }

  /**
   * Latest snapshot across both tiers. Redis wins ties; a newer in-process
   * snapshot wins when the last Redis write failed.
   */
  async read(): Promise<Readonly<CachedSnapshot> | null> {
    const volatile = await this.readVolatile();
    const local = this.state.current();
    if (!volatile) return local;
    if (!local) return volatile;
    return Date.parse(local.lastUpdate) > Date.parse(volatile.lastUpdate) ? local : volatile;
  }

  /** Seeds the in-process tier from Redis, e.g. after a restart. */
  async warm(): Promise<boolean> {
    const cached = await this.readVolatile();
    if (!cached) return false;
    this.state.replace(cached);
    log.info({ lastUpdate: cached.lastUpdate }, 'Loaded snapshot from Redis');
    return true;
  }

  private async readVolatile(): Promise<CachedSnapshot | null> {
    let raw: string | null;
    try {
      raw = await this.redis.get(SNAPSHOT_KEY);
    } catch (err) {
      log.warn({ err }, 'Redis read failed, using in-process snapshot');
      return null;
    }
    if (!raw) return null;

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      log.warn({ err }, 'Cached snapshot is not valid JSON');
      return null;
    }

    const parsed = cachedSnapshotSchema.safeParse(json);
    if (!parsed.success) {
      log.warn({ issues: parsed.error.issues.length }, 'Cached snapshot has an unexpected shape');
      return null;
    }
    return parsed.data;
  }
}
