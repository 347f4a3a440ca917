import type { Dispatcher } from 'undici';
import { broadcast } from '../api/ws-hub.js';
import type { SnapshotCache } from '../cache/snapshot-cache.js';
import { applyRecommendation, type ConfigAppliedEvent } from '../daemon-config/apply.js';
import { synthesize } from '../daemon-config/recommend.js';
import { runBatch } from '../pipeline/aggregator.js';
import { persistBatch, persistProbe } from '../pipeline/persist.js';
import { streamBatch, type BatchProgressEvent } from '../pipeline/stream.js';
import { probeEndpoint, type ProbeFn } from '../probe/http-probe.js';
import type {
  ApplyResult,
  Batch,
  CachedSnapshot,
  ProbeResult,
  RecommendedConfig,
} from '../types/mirror.js';
import type { DurableStore, HistoryEntry, HistoryFilter, RollingStat } from '../types/store.js';
import { logger } from '../utils/logger.js';

export interface MirrorServiceOptions {
  store: DurableStore;
  cache: SnapshotCache;
  endpoints: readonly string[];
  probe?: {
    timeoutMs: number;
    taskCeilingMs: number;
    concurrency: number;
    fn?: ProbeFn;
    dispatcher?: Dispatcher;
  };
  daemonConfig: {
    path: string;
    backupPath: string;
    autoApply: boolean;
    recommendedCount: number;
  };
  onConfigApplied?: (event: ConfigAppliedEvent) => void;
}

const log = logger.child({ component: 'mirror-service' });

/**
 * Query and command surface over the probe pipeline, the cache tiers and
 * the daemon config writer. The HTTP routes and the scheduler only talk
 * to this.
 */
export class MirrorService {
  private readonly store: DurableStore;
  private readonly cache: SnapshotCache;
  private readonly endpoints: readonly string[];
  private readonly probeOptions: NonNullable<MirrorServiceOptions['probe']>;
  private readonly daemonConfig: MirrorServiceOptions['daemonConfig'];
  private readonly onConfigApplied?: (event: ConfigAppliedEvent) => void;

  constructor(options: MirrorServiceOptions) {
    this.store = options.store;
    this.cache = options.cache;
    this.endpoints = [...options.endpoints];
    this.probeOptions = options.probe ?? { timeoutMs: 5000, taskCeilingMs: 10_000, concurrency: 20 };
    this.daemonConfig = options.daemonConfig;
    this.onConfigApplied = options.onConfigApplied;
  }

  listEndpoints(): string[] {
    return [...this.endpoints];
  }

  getSnapshot(): Promise<Readonly<CachedSnapshot> | null> {
    return this.cache.read();
  }

  /** Null until a batch has been published. */
  async getRecommendedConfig(): Promise<RecommendedConfig | null> {
    const snapshot = await this.cache.read();
    if (!snapshot) return null;
    return synthesize(snapshot.batch, snapshot, this.daemonConfig.recommendedCount);
  }

  /**
   * Probes `endpoints` (default: the configured list) outside the
   * scheduler gate. A persisted run also becomes the current snapshot.
   */
  async runOnDemand(
    endpoints: readonly string[] = this.endpoints,
    options: { persist?: boolean } = {},
  ): Promise<Batch> {
    const persist = options.persist ?? true;
    const batch = await this.probeAll(endpoints, persist);
    if (persist) await this.publish(batch);
    return batch;
  }

  /** Sequential variant of runOnDemand that reports each result as it lands. */
  async *streamOnDemand(
    endpoints: readonly string[] = this.endpoints,
  ): AsyncGenerator<BatchProgressEvent> {
    const events = streamBatch(endpoints, {
      timeoutMs: this.probeOptions.timeoutMs,
      persistTo: this.store,
      probe: this.probeFn(),
    });
    for await (const event of events) {
      if (event.type === 'done') {
        await this.publish(event.batch);
      } else {
        broadcast('probe:progress', event);
      }
      yield event;
    }
  }

  async probeOne(endpoint: string): Promise<ProbeResult> {
    const result = await this.probeFn()(endpoint, { timeoutMs: this.probeOptions.timeoutMs });
    await persistProbe(this.store, result);
    return result;
  }

  /** Null when there is no snapshot to derive a config from. */
  async applyConfig(): Promise<ApplyResult | null> {
    const recommended = await this.getRecommendedConfig();
    if (!recommended) return null;
    return this.writeConfig(recommended);
  }

  /** One scheduled cycle: probe, persist, publish, optionally rewrite the config. */
  async runScheduledCheck(): Promise<void> {
    log.info({ endpoints: this.endpoints.length }, 'Starting scheduled mirror check');
    const batch = await this.probeAll(this.endpoints, true);
    const snapshot = await this.publish(batch);

    if (this.daemonConfig.autoApply) {
      const result = await this.writeConfig(
        synthesize(batch, snapshot, this.daemonConfig.recommendedCount),
      );
      if (!result.ok) log.warn({ reason: result.reason }, 'Automatic config update skipped');
    }

    log.info({ available: batch.available, total: batch.total }, 'Scheduled mirror check complete');
  }

  getHistory(filter: HistoryFilter): Promise<HistoryEntry[]> {
    return this.store.getHistory(filter);
  }

  getStats(): Promise<RollingStat[]> {
    return this.store.getStats();
  }

  private probeFn(): ProbeFn {
    const probe = this.probeOptions.fn ?? probeEndpoint;
    const { dispatcher } = this.probeOptions;
    return (endpoint, options) => probe(endpoint, { ...options, dispatcher });
  }

  private probeAll(endpoints: readonly string[], persist: boolean): Promise<Batch> {
    return runBatch(endpoints, {
      timeoutMs: this.probeOptions.timeoutMs,
      taskCeilingMs: this.probeOptions.taskCeilingMs,
      concurrency: this.probeOptions.concurrency,
      persistTo: persist ? this.store : undefined,
      probe: this.probeFn(),
    });
  }

  private async publish(batch: Batch): Promise<Readonly<CachedSnapshot>> {
    await persistBatch(this.store, {
      observedAt: batch.observedAt,
      total: batch.total,
      available: batch.available,
      unavailable: batch.unavailable,
    });
    const snapshot = await this.cache.publish(batch);
    broadcast('batch:completed', {
      observedAt: batch.observedAt,
      total: batch.total,
      available: batch.available,
      unavailable: batch.unavailable,
      lastUpdate: snapshot.lastUpdate,
    });
    return snapshot;
  }

  private writeConfig(recommended: RecommendedConfig): Promise<ApplyResult> {
    return applyRecommendation(recommended, {
      path: this.daemonConfig.path,
      backupPath: this.daemonConfig.backupPath,
      notify: this.onConfigApplied,
    });
  }
}
