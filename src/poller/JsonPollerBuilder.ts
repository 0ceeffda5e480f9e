import type { Agent } from 'undici';
import type { Logger } from '../utils/logger';
import { ConstructionError } from '../utils/errors';
import { DEFAULT_SETTINGS } from './defaults';
import { createHttpClient } from './httpClient';
import { JsonPoller } from './JsonPoller';
import type { JsonDecoder, PollerConfig, PollerSettings } from './types';

interface BuilderState<T> {
  url: string;
  settings: PollerSettings;
  decode: JsonDecoder<T>;
  logger?: Logger;
}

const passThrough: JsonDecoder<unknown> = (raw) => raw;

/**
 * Accumulates poller settings over the defaults, then builds a {@link JsonPoller}.
 *
 * Nothing is validated here: the URL is checked when a request is made, and
 * numeric settings only by the HTTP client.
 */
export class JsonPollerBuilder<T = unknown> {
  private readonly state: BuilderState<T>;

  private constructor(state: BuilderState<T>) {
    this.state = state;
  }

  static create(url: string): JsonPollerBuilder<unknown> {
    return new JsonPollerBuilder<unknown>({
      url,
      settings: { ...DEFAULT_SETTINGS },
      decode: passThrough,
    });
  }

  static fromConfig(config: PollerConfig): JsonPollerBuilder<unknown> {
    const { url, ...settings } = config;
    return JsonPollerBuilder.create(url).configure(settings);
  }

  get url(): string {
    return this.state.url;
  }

  get settings(): Readonly<PollerSettings> {
    return { ...this.state.settings };
  }

  pollIntervalMs(ms: number): this {
    this.state.settings.pollIntervalMs = ms;
    return this;
  }

  poolMaxIdlePerHost(max: number): this {
    this.state.settings.poolMaxIdlePerHost = max;
    return this;
  }

  poolIdleTimeoutSecs(secs: number): this {
    this.state.settings.poolIdleTimeoutSecs = secs;
    return this;
  }

  requestTimeoutMs(ms: number): this {
    this.state.settings.requestTimeoutMs = ms;
    return this;
  }

  tcpKeepaliveSecs(secs: number): this {
    this.state.settings.tcpKeepaliveSecs = secs;
    return this;
  }

  configure(overrides: Partial<PollerSettings>): this {
    this.state.settings = { ...this.state.settings, ...overrides };
    return this;
  }

  logger(logger: Logger): this {
    this.state.logger = logger;
    return this;
  }

  /**
   * Set how parsed JSON becomes the payload type. The decoder should throw
   * when the document does not have the expected structure.
   */
  decoder<U>(decode: JsonDecoder<U>): JsonPollerBuilder<U> {
    return new JsonPollerBuilder<U>({
      url: this.state.url,
      settings: { ...this.state.settings },
      decode,
      logger: this.state.logger,
    });
  }

  /**
   * @throws ConstructionError if the HTTP client rejects the settings
   */
  build(): JsonPoller<T> {
    const config: PollerConfig = { url: this.state.url, ...this.state.settings };

    let client: Agent;
    try {
      client = createHttpClient(config);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new ConstructionError(`Failed to construct HTTP client: ${detail}`, { cause: error });
    }

    return new JsonPoller<T>({
      config,
      client,
      decode: this.state.decode,
      logger: this.state.logger,
    });
  }
}
