import { Redis } from 'ioredis';
import { config } from '../config.js';
import { logger } from '../utils/logger.js';

// Snapshot reads fall back to process memory, so a down Redis should
// fail fast instead of queueing commands.
const options = {
  maxRetriesPerRequest: 1,
  lazyConnect: true,
  enableOfflineQueue: false,
} as const;

function createRedis(): Redis {
  if (config.REDIS_URL) {
    return new Redis(config.REDIS_URL, options);
  }
  return new Redis({ host: config.REDIS_HOST, port: config.REDIS_PORT, ...options });
}

export const redis = createRedis();

redis.on('error', (err) => {
  logger.debug({ err }, 'Redis connection error');
});

/** Resolves once connected; on failure ioredis keeps retrying in the background. */
export async function connectRedis(): Promise<boolean> {
  try {
    await redis.connect();
    return true;
  } catch (err) {
    logger.warn({ err }, 'Redis unavailable, serving snapshots from process memory');
    return false;
  }
}
