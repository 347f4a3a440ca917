import { createServer } from './api/server.js';
import { closeAllClients } from './api/ws-hub.js';
import { SnapshotCache } from './cache/snapshot-cache.js';
import { config } from './config.js';
import { MemoryStore } from './db/memory-store.js';
import { sql } from './db/pool.js';
import { createPostgresStore } from './db/postgres-store.js';
import { connectRedis, redis } from './db/redis.js';
import { notifyConfigApplied } from './notifications/reload-notice.js';
import { MirrorScheduler } from './scheduler/index.js';
import { MirrorService } from './service/mirror-service.js';
import type { DurableStore } from './types/store.js';
import { logger } from './utils/logger.js';

function createStore(): DurableStore {
  if (config.DURABLE_STORE === 'memory') {
    logger.warn('Using in-memory durable store, history is lost on restart');
    return new MemoryStore();
  }
  return createPostgresStore(sql);
}

async function main(): Promise<void> {
  logger.info('Starting mirror-watch...');

  const cache = new SnapshotCache({ redis, intervalMs: config.CHECK_INTERVAL_MS });
  if (await connectRedis()) {
    await cache.warm();
  }

  const service = new MirrorService({
    store: createStore(),
    cache,
    endpoints: config.MIRRORS,
    probe: {
      timeoutMs: config.PROBE_TIMEOUT_MS,
      taskCeilingMs: config.PROBE_TASK_CEILING_MS,
      concurrency: config.PROBE_CONCURRENCY,
    },
    daemonConfig: {
      path: config.DAEMON_CONFIG_PATH,
      backupPath: config.DAEMON_CONFIG_BACKUP_PATH,
      autoApply: config.AUTO_APPLY_CONFIG,
      recommendedCount: config.RECOMMENDED_MIRROR_COUNT,
    },
    onConfigApplied: notifyConfigApplied,
  });

  // First run starts immediately, then every CHECK_INTERVAL_MS after completion
  const scheduler = new MirrorScheduler({
    intervalMs: config.CHECK_INTERVAL_MS,
    job: () => service.runScheduledCheck(),
  });
  scheduler.start();

  const server = await createServer(service);
  await server.listen({ port: config.PORT, host: '0.0.0.0' });

  const shutdown = async (signal: string) => {
    logger.info(`Received ${signal}, shutting down...`);
    try {
      closeAllClients();
      await server.close();
      await scheduler.stop();
      redis.disconnect();
      await sql.end({ timeout: 5 });
      process.exit(0);
    } catch (err) {
      logger.error({ err }, 'Shutdown failed');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
}

main().catch((err) => {
  logger.fatal(err, 'Failed to start');
  process.exit(1);
});
