import type { FastifyPluginAsync } from 'fastify';
import type { MirrorService } from '../../service/mirror-service.js';
import { getClientCount } from '../ws-hub.js';

export const healthRoutes: FastifyPluginAsync<{ service: MirrorService }> = async (app, opts) => {
  app.get('/health', async () => {
    const snapshot = await opts.service.getSnapshot();
    return {
      status: snapshot ? 'ok' : 'warming-up',
      timestamp: new Date().toISOString(),
      wsClients: getClientCount(),
      lastUpdate: snapshot?.lastUpdate ?? null,
    };
  });
};
