import type { ConfigAppliedEvent } from '../daemon-config/apply.js';
import type { BatchProgressEvent } from '../pipeline/stream.js';
import type { BatchSummary } from '../types/store.js';
import { logger } from '../utils/logger.js';

interface HubSocket {
  readyState: number;
  send(data: string): void;
  close(code?: number, reason?: string): void;
  on(event: string, cb: () => void): void;
}

/** Payload pushed to dashboard sockets, per event name. */
export interface HubEvents {
  'batch:completed': BatchSummary & { lastUpdate: string };
  'probe:progress': Extract<BatchProgressEvent, { type: 'progress' }>;
  'config:applied': ConfigAppliedEvent;
}

export type HubEvent = keyof HubEvents;

const OPEN = 1;
const GOING_AWAY = 1001;

const clients = new Set<HubSocket>();
const log = logger.child({ component: 'ws-hub' });

export function addClient(ws: HubSocket): void {
  clients.add(ws);
  ws.on('close', () => clients.delete(ws));
  ws.on('error', () => clients.delete(ws));
  log.debug({ count: clients.size }, 'WS client connected');
}

export function broadcast<E extends HubEvent>(event: E, data: HubEvents[E]): void {
  if (clients.size === 0) return;
  const msg = JSON.stringify({ event, data, ts: Date.now() });
  for (const ws of clients) {
    if (ws.readyState !== OPEN) continue;
    try {
      ws.send(msg);
    } catch (err) {
      log.debug({ err }, 'Dropping WS client after failed send');
      clients.delete(ws);
    }
  }
}

/** Closes every socket; used on shutdown. */
export function closeAllClients(): void {
  for (const ws of clients) {
    try {
      ws.close(GOING_AWAY, 'server shutting down');
    } catch (err) {
      log.debug({ err }, 'WS client close failed');
    }
  }
  clients.clear();
}

export function getClientCount(): number {
  return clients.size;
}
