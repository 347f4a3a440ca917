import { z } from 'zod';
import type { CachedSnapshot } from '../types/mirror.js';

const probeResultSchema = z.object({
  endpoint: z.string(),
  available: z.boolean(),
  statusLabel: z.string(),
  statusCode: z.number(),
  responseTimeMs: z.number(),
  observedAt: z.string(),
});

export const cachedSnapshotSchema = z.object({
  batch: z.object({
    observedAt: z.string(),
    total: z.number(),
    available: z.number(),
    unavailable: z.number(),
    results: z.array(probeResultSchema),
  }),
  lastUpdate: z.string(),
  nextUpdate: z.string(),
}) satisfies z.ZodType<CachedSnapshot>;
