import { performance } from 'node:perf_hooks';
import { request, type Dispatcher } from 'undici';
import { CONNECTION_FAILED, classifyStatus, type Classification } from './classify.js';
import type { ProbeResult } from '../types/mirror.js';
import { logger } from '../utils/logger.js';

export const DEFAULT_PROBE_TIMEOUT_MS = 5000;

export interface ProbeOptions {
  timeoutMs?: number;
  /** Overrides the global undici dispatcher, e.g. with a MockAgent in tests. */
  dispatcher?: Dispatcher;
}

export type ProbeFn = (endpoint: string, options?: ProbeOptions) => Promise<ProbeResult>;

const DEFAULT_HEADERS: Record<string, string> = {
  'User-Agent': 'MirrorWatch/1.0',
  Accept: 'application/json, */*;q=0.5',
};

const log = logger.child({ component: 'probe' });

/** URL variants tried in order: the registry API root, then the bare host. */
export function probeUrls(endpoint: string): string[] {
  const base = endpoint.replace(/\/+$/, '');
  return [`${base}/v2/`, base];
}

async function tryVariant(
  url: string,
  timeoutMs: number,
  dispatcher: Dispatcher | undefined,
): Promise<Classification | null> {
  try {
    const { statusCode, body } = await request(url, {
      method: 'GET',
      headers: DEFAULT_HEADERS,
      headersTimeout: timeoutMs,
      bodyTimeout: timeoutMs,
      signal: AbortSignal.timeout(timeoutMs),
      ...(dispatcher ? { dispatcher } : {}),
    });
    await body.dump().catch((err: unknown) => {
      log.debug({ url, err }, 'Failed to drain probe response body');
    });
    return classifyStatus(statusCode);
  } catch (err) {
    log.debug({ url, err }, 'Probe variant failed');
    return null;
  }
}

/**
 * Checks one mirror within `timeoutMs` overall. Never throws: network
 * failures come back as an unavailable result with status code 0.
 */
export async function probeEndpoint(
  endpoint: string,
  options: ProbeOptions = {},
): Promise<ProbeResult> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS;
  const start = performance.now();

  // All variants share one budget, so a dead mirror costs timeoutMs in total.
  const deadline = start + timeoutMs;

  let outcome: Classification = CONNECTION_FAILED;
  for (const url of probeUrls(endpoint)) {
    const remainingMs = Math.ceil(deadline - performance.now());
    if (remainingMs <= 0) {
      log.debug({ endpoint, timeoutMs }, 'Probe budget spent, skipping remaining variants');
      break;
    }
    const classified = await tryVariant(url, remainingMs, options.dispatcher);
    if (classified) {
      outcome = classified;
      break;
    }
  }

  const elapsed = performance.now() - start;

  return {
    endpoint,
    available: outcome.available,
    statusLabel: outcome.statusLabel,
    statusCode: outcome.statusCode,
    responseTimeMs: Math.round(elapsed * 100) / 100,
    observedAt: new Date().toISOString(),
  };
}
