import type { FastifyPluginAsync } from 'fastify';
import { MIRRORS_FIELD } from '../../daemon-config/apply.js';
import type { MirrorService } from '../../service/mirror-service.js';

export const configRoutes: FastifyPluginAsync<{ service: MirrorService }> = async (app, opts) => {
  const { service } = opts;

  // GET /api/config/recommended: fastest available mirrors from the current snapshot
  app.get('/recommended', async () => {
    const recommended = await service.getRecommendedConfig();
    if (!recommended) {
      return { error: 'no test data yet', config: null };
    }
    if (recommended.count === 0) {
      return { error: 'no available mirrors', config: null };
    }
    return {
      config: { [MIRRORS_FIELD]: recommended.mirrors },
      ...recommended,
    };
  });

  // POST /api/config/update: write the recommendation into the daemon config now
  app.post('/update', async (_request, reply) => {
    const result = await service.applyConfig();
    if (!result) {
      return reply.status(400).send({ success: false, error: 'no test data, run a check first' });
    }
    if (!result.ok) {
      const status = result.reason === 'no-available-mirrors' ? 409 : 500;
      return reply.status(status).send({ success: false, reason: result.reason, error: result.message });
    }
    return {
      success: true,
      message: 'daemon config updated, reload the daemon to apply it',
      configPath: result.path,
      backupPath: result.backupPath,
      mirrors: result.mirrors,
    };
  });
};
