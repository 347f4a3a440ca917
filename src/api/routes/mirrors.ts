import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { parseEndpoints } from '../../pipeline/endpoints.js';
import type { MirrorService } from '../../service/mirror-service.js';
import { formatSseEvent, pipeSse } from '../sse.js';

const listQuerySchema = z.object({
  mirrors: z.string().optional(),
});

const singleTestSchema = z.object({
  mirror: z.string().trim().min(1),
});

/** The `mirrors` field of a batch request; a non-object body yields null so validation rejects it. */
function mirrorsField(body: unknown): unknown {
  if (body === undefined || body === null) return undefined;
  if (typeof body === 'object' && !Array.isArray(body)) {
    return 'mirrors' in body ? body.mirrors : undefined;
  }
  return null;
}

function parseJsonList(raw: string | undefined): unknown {
  if (!raw) return undefined;
  try {
    return JSON.parse(raw);
  } catch {
    return null;
  }
}

export const mirrorsRoutes: FastifyPluginAsync<{ service: MirrorService }> = async (app, opts) => {
  const { service } = opts;

  // GET /api/mirrors: the configured list, or a caller-supplied JSON list echoed back
  app.get('/mirrors', async (request) => {
    const query = listQuerySchema.safeParse(request.query);
    const raw = query.success ? query.data.mirrors : undefined;
    const parsed = parseEndpoints(parseJsonList(raw), service.listEndpoints());
    return { mirrors: parsed.ok ? parsed.endpoints : service.listEndpoints() };
  });

  // POST /api/test: probe one mirror
  app.post('/test', async (request, reply) => {
    const body = singleTestSchema.safeParse(request.body);
    if (!body.success) {
      return reply.status(400).send({ error: 'missing mirror parameter' });
    }
    return service.probeOne(body.data.mirror);
  });

  // POST /api/test/all: concurrent on-demand batch
  app.post('/test/all', async (request, reply) => {
    const endpoints = parseEndpoints(mirrorsField(request.body), service.listEndpoints());
    if (!endpoints.ok) {
      return reply.status(400).send({ error: endpoints.error });
    }
    return service.runOnDemand(endpoints.endpoints);
  });

  // POST /api/test/batch: sequential batch streamed as SSE progress events
  app.post('/test/batch', async (request, reply) => {
    const endpoints = parseEndpoints(mirrorsField(request.body), service.listEndpoints());
    if (!endpoints.ok) {
      return reply.status(400).send({ error: endpoints.error });
    }

    reply.hijack();
    const raw = reply.raw;
    raw.writeHead(200, {
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      'Connection': 'keep-alive',
      'X-Accel-Buffering': 'no',
    });

    try {
      const completed = await pipeSse(raw, service.streamOnDemand(endpoints.endpoints), (event) =>
        event.type === 'progress'
          ? { progress: event.completed, total: event.total, result: event.result }
          : { done: true, ...event.batch },
      );
      if (!completed) {
        request.log.info('Client disconnected, batch stream stopped');
        return;
      }
    } catch (err: unknown) {
      request.log.error({ err }, 'Batch stream failed');
      if (raw.destroyed) return;
      const message = err instanceof Error ? err.message : 'Unknown error';
      raw.write(formatSseEvent({ error: message }));
    }

    raw.end();
  });

  // GET /api/test/cached: latest snapshot, Redis first then process memory
  app.get('/test/cached', async () => {
    const snapshot = await service.getSnapshot();
    if (!snapshot) {
      return { results: [], total: 0, available: 0, unavailable: 0, lastUpdate: null, nextUpdate: null };
    }
    return {
      ...snapshot.batch,
      lastUpdate: snapshot.lastUpdate,
      nextUpdate: snapshot.nextUpdate,
    };
  });
};
