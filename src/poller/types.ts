/**
 * Connection and timing settings, everything but the target URL.
 */
export interface PollerSettings {
  pollIntervalMs: number;
  poolMaxIdlePerHost: number;
  poolIdleTimeoutSecs: number;
  requestTimeoutMs: number;
  tcpKeepaliveSecs: number;
}

export interface PollerConfig extends PollerSettings {
  url: string;
}

/**
 * Turns parsed JSON into the payload type. Throws when the structure does not match.
 */
export type JsonDecoder<T> = (raw: unknown) => T;

/**
 * Receives each successfully decoded payload and how long its fetch took.
 */
export type PollHandler<T> = (data: T, elapsedMs: number) => void | Promise<void>;

export interface FetchOptions {
  signal?: AbortSignal;
}

export interface StartOptions {
  /** Stops the loop. Aborting also cancels the request in flight. */
  signal?: AbortSignal;
}

/**
 * Clock and sleep used by the polling loop. Times are in milliseconds.
 */
export interface PollTimer {
  now(): number;
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}
