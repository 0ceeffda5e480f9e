import { ConfigurationError } from './utils/errors';
import { DEFAULT_SETTINGS } from './poller/defaults';
import type { PollerConfig, PollerSettings } from './poller/types';

export const URL_ENV_VAR = 'JSON_POLLER_URL';

export const SETTING_ENV_VARS = {
  pollIntervalMs: 'JSON_POLLER_POLL_INTERVAL_MS',
  poolMaxIdlePerHost: 'JSON_POLLER_POOL_MAX_IDLE_PER_HOST',
  poolIdleTimeoutSecs: 'JSON_POLLER_POOL_IDLE_TIMEOUT_SECS',
  requestTimeoutMs: 'JSON_POLLER_REQUEST_TIMEOUT_MS',
  tcpKeepaliveSecs: 'JSON_POLLER_TCP_KEEPALIVE_SECS',
} as const satisfies Record<keyof PollerSettings, string>;

function readNonNegativeInt(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;

  if (!/^\d+$/.test(raw)) {
    throw new ConfigurationError(`${name} must be a non-negative integer, got "${raw}"`, name);
  }
  return parseInt(raw, 10);
}

/**
 * Read a poller configuration from environment variables.
 * Unset or blank settings take their defaults.
 *
 * @throws ConfigurationError if the URL is missing or a setting is not a non-negative integer
 */
export function loadPollerConfig(env: NodeJS.ProcessEnv = process.env): PollerConfig {
  const url = env[URL_ENV_VAR]?.trim();
  if (!url) {
    throw new ConfigurationError(`${URL_ENV_VAR} is required`, URL_ENV_VAR);
  }

  return {
    url,
    pollIntervalMs: readNonNegativeInt(env, SETTING_ENV_VARS.pollIntervalMs, DEFAULT_SETTINGS.pollIntervalMs),
    poolMaxIdlePerHost: readNonNegativeInt(
      env,
      SETTING_ENV_VARS.poolMaxIdlePerHost,
      DEFAULT_SETTINGS.poolMaxIdlePerHost,
    ),
    poolIdleTimeoutSecs: readNonNegativeInt(
      env,
      SETTING_ENV_VARS.poolIdleTimeoutSecs,
      DEFAULT_SETTINGS.poolIdleTimeoutSecs,
    ),
    requestTimeoutMs: readNonNegativeInt(
      env,
      SETTING_ENV_VARS.requestTimeoutMs,
      DEFAULT_SETTINGS.requestTimeoutMs,
    ),
    tcpKeepaliveSecs: readNonNegativeInt(
      env,
      SETTING_ENV_VARS.tcpKeepaliveSecs,
      DEFAULT_SETTINGS.tcpKeepaliveSecs,
    ),
  };
}
