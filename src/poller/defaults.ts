import type { PollerSettings } from './types';

export const DEFAULT_POLL_INTERVAL_MS = 500;
export const DEFAULT_POOL_MAX_IDLE_PER_HOST = 1;
export const DEFAULT_POOL_IDLE_TIMEOUT_SECS = 90;
export const DEFAULT_REQUEST_TIMEOUT_MS = 1000;
export const DEFAULT_TCP_KEEPALIVE_SECS = 60;

export const DEFAULT_SETTINGS: Readonly<PollerSettings> = Object.freeze({
  pollIntervalMs: DEFAULT_POLL_INTERVAL_MS,
  poolMaxIdlePerHost: DEFAULT_POOL_MAX_IDLE_PER_HOST,
  poolIdleTimeoutSecs: DEFAULT_POOL_IDLE_TIMEOUT_SECS,
  requestTimeoutMs: DEFAULT_REQUEST_TIMEOUT_MS,
  tcpKeepaliveSecs: DEFAULT_TCP_KEEPALIVE_SECS,
});
