import { broadcast } from '../api/ws-hub.js';
import type { ConfigAppliedEvent } from '../daemon-config/apply.js';
import { logger } from '../utils/logger.js';

const log = logger.child({ component: 'reload-notice' });

/**
 * Tells operators and websocket clients that the daemon needs a reload.
 * The daemon itself is never restarted from here.
 */
export function notifyConfigApplied(event: ConfigAppliedEvent): void {
  broadcast('config:applied', event);
  log.info(
    { path: event.path, count: event.mirrors.length },
    'Mirror config changed; reload the daemon to pick it up: systemctl daemon-reload && systemctl restart docker',
  );
}
