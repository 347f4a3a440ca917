import Fastify from 'fastify';
import { config } from '../config.js';
import type { MirrorService } from '../service/mirror-service.js';
import { websocketPlugin } from './plugins/websocket.js';
import { configRoutes } from './routes/config.js';
import { healthRoutes } from './routes/health.js';
import { historyRoutes } from './routes/history.js';
import { mirrorsRoutes } from './routes/mirrors.js';

export interface ServerOptions {
  /** Request logging; off in tests */
  logger?: boolean;
}

export async function createServer(service: MirrorService, options: ServerOptions = {}) {
  const { logger = true } = options;

  const app = Fastify({
    logger: logger
      ? {
          level: config.LOG_LEVEL,
          transport:
            config.NODE_ENV === 'development'
              ? { target: 'pino-pretty', options: { colorize: true } }
              : undefined,
        }
      : false,
  });

  await app.register(websocketPlugin);
  await app.register(healthRoutes, { service });
  await app.register(mirrorsRoutes, { prefix: '/api', service });
  await app.register(historyRoutes, { prefix: '/api', service });
  await app.register(configRoutes, { prefix: '/api/config', service });

  return app;
}
