import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import type { MirrorService } from '../../service/mirror-service.js';

const historyQuerySchema = z.object({
  mirror: z.string().trim().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(1000).default(100),
});

export const historyRoutes: FastifyPluginAsync<{ service: MirrorService }> = async (app, opts) => {
  const { service } = opts;

  // GET /api/history?mirror=&limit=: newest probe results first
  app.get('/history', async (request, reply) => {
    const query = historyQuerySchema.safeParse(request.query);
    if (!query.success) {
      return reply.status(400).send({ error: query.error.issues[0]?.message ?? 'invalid query' });
    }
    try {
      const history = await service.getHistory({ endpoint: query.data.mirror, limit: query.data.limit });
      return { history };
    } catch (err: unknown) {
      request.log.error({ err }, 'History query failed');
      return reply.status(500).send({ error: 'history unavailable' });
    }
  });

  // GET /api/statistics: per-mirror rolling stats, most reliable first
  app.get('/statistics', async (request, reply) => {
    try {
      return { statistics: await service.getStats() };
    } catch (err: unknown) {
      request.log.error({ err }, 'Statistics query failed');
      return reply.status(500).send({ error: 'statistics unavailable' });
    }
  });
};
