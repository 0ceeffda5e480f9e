import { Agent } from 'undici';
import type { PollerSettings } from './types';

/**
 * Build the connection pool a poller sends its requests through.
 *
 * A pool cap or idle timeout of 0 turns connection reuse off: every request
 * opens a fresh connection and closes it afterwards. A keepalive of 0
 * disables TCP keepalive probes.
 */
export function createHttpClient(settings: PollerSettings): Agent {
  const reuseConnections = settings.poolMaxIdlePerHost > 0 && settings.poolIdleTimeoutSecs > 0;
  const idleTimeoutMs = settings.poolIdleTimeoutSecs * 1000;

  // `connections` caps busy sockets too, so it stays unbounded; concurrent
  // fetches each get their own connection instead of queueing.
  return new Agent({
    connections: null,
    pipelining: reuseConnections ? 1 : 0,
    keepAliveTimeout: reuseConnections ? idleTimeoutMs : undefined,
    keepAliveMaxTimeout: reuseConnections ? idleTimeoutMs : undefined,
    connect: {
      keepAlive: settings.tcpKeepaliveSecs > 0,
      keepAliveInitialDelay: settings.tcpKeepaliveSecs * 1000,
    },
  });
}
