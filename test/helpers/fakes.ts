import fs from 'node:fs';
import net from 'node:net';
import os from 'node:os';
import path from 'node:path';
import type { ProbeFn } from '../../src/probe/http-probe.js';
import type { Batch, ProbeResult } from '../../src/types/mirror.js';
import type { VolatileClient } from '../../src/types/store.js';

export const OBSERVED_AT = '2026-03-01T08:00:00.000Z';

export function makeResult(endpoint: string, overrides: Partial<ProbeResult> = {}): ProbeResult {
  return {
    endpoint,
    available: true,
    statusLabel: 'available',
    statusCode: 200,
    responseTimeMs: 100,
    observedAt: OBSERVED_AT,
    ...overrides,
  };
}

export function makeBatch(results: ProbeResult[]): Batch {
  const available = results.filter((r) => r.available).length;
  return {
    observedAt: OBSERVED_AT,
    total: results.length,
    available,
    unavailable: results.length - available,
    results,
  };
}

/** Probe that answers from a fixed table; unknown endpoints fail to connect. */
export function tableProbe(table: Record<string, Partial<ProbeResult>>): ProbeFn {
  return async (endpoint) =>
    makeResult(endpoint, {
      available: false,
      statusLabel: 'connection failed',
      statusCode: 0,
      responseTimeMs: 5000,
      ...table[endpoint],
      observedAt: new Date().toISOString(),
    });
}

/** Redis stand-in with TTLs on an injectable clock. */
export class FakeRedis implements VolatileClient {
  failing = false;
  /** Reads keep working; only `set` throws. */
  failingWrites = false;
  private readonly data = new Map<string, { value: string; expiresAt: number }>();

  constructor(private readonly clock: () => number = () => Date.now()) {}

  async get(key: string): Promise<string | null> {
    if (this.failing) throw new Error('connect ECONNREFUSED 127.0.0.1:6379');
    const entry = this.data.get(key);
    if (!entry) return null;
    if (entry.expiresAt <= this.clock()) {
      this.data.delete(key);
      return null;
    }
    return entry.value;
  }

  async set(key: string, value: string, _mode: 'EX', seconds: number): Promise<'OK'> {
    if (this.failing || this.failingWrites) throw new Error('connect ECONNREFUSED 127.0.0.1:6379');
    this.data.set(key, { value, expiresAt: this.clock() + seconds * 1000 });
    return 'OK';
  }

  ttlMs(key: string): number | null {
    const entry = this.data.get(key);
    return entry ? entry.expiresAt - this.clock() : null;
  }
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

export function deferred<T = void>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'mirror-watch-'));
}

export interface SilentServer {
  endpoint: string;
  close: () => Promise<void>;
}

/** Local TCP server that accepts connections and never writes a byte. */
export async function startSilentServer(): Promise<SilentServer> {
  const sockets = new Set<net.Socket>();
  const server = net.createServer((socket) => {
    sockets.add(socket);
    socket.on('close', () => sockets.delete(socket));
  });
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));

  const address = server.address();
  if (!address || typeof address === 'string') throw new Error('silent server has no TCP address');

  return {
    endpoint: `http://127.0.0.1:${address.port}`,
    close: async () => {
      for (const socket of sockets) socket.destroy();
      await new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      });
    },
  };
}
