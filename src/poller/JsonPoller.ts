import { fetch } from 'undici';
import type { Dispatcher, Response } from 'undici';
import defaultLogger, { type Logger } from '../utils/logger';
import { FetchError, PollerError, describeTransportError } from '../utils/errors';
import { JsonPollerBuilder } from './JsonPollerBuilder';
import { computeNextTick, scheduleAfter, systemTimer } from './tickSchedule';
import type {
  FetchOptions,
  JsonDecoder,
  PollHandler,
  PollTimer,
  PollerConfig,
  StartOptions,
} from './types';

export interface JsonPollerInit<T> {
  config: PollerConfig;
  client: Dispatcher;
  decode: JsonDecoder<T>;
  logger?: Logger;
  timer?: PollTimer;
}

type AbortCause = 'timeout' | 'signal';

interface RequestState {
  abortCause: AbortCause | null;
}

/**
 * Fetches one JSON endpoint, once or on a fixed cadence.
 *
 * Settings are fixed at construction. Build instances through
 * {@link JsonPoller.builder}.
 */
export class JsonPoller<T = unknown> {
  readonly url: string;
  readonly pollIntervalMs: number;
  private readonly settings: Readonly<PollerConfig>;
  private readonly client: Dispatcher;
  private readonly decode: JsonDecoder<T>;
  private readonly logger: Logger;
  private readonly timer: PollTimer;
  private running = false;

  constructor(init: JsonPollerInit<T>) {
    this.settings = Object.freeze({ ...init.config });
    this.url = this.settings.url;
    this.pollIntervalMs = this.settings.pollIntervalMs;
    this.client = init.client;
    this.decode = init.decode;
    this.logger = (init.logger ?? defaultLogger).child({ component: 'json-poller', url: this.url });
    this.timer = init.timer ?? systemTimer;
  }

  static builder(url: string): JsonPollerBuilder<unknown> {
    return JsonPollerBuilder.create(url);
  }

  get config(): Readonly<PollerConfig> {
    return this.settings;
  }

  get isRunning(): boolean {
    return this.running;
  }

  /**
   * Perform exactly one GET and decode the body. No retries.
   *
   * @throws FetchError on transport, status or decode failure
   */
  async fetchOnce(options: FetchOptions = {}): Promise<T> {
    const { signal } = options;
    const state: RequestState = { abortCause: null };
    const controller = new AbortController();

    const onAbort = (): void => {
      state.abortCause ??= 'signal';
      controller.abort();
    };
    const cancelTimeout = scheduleAfter(this.settings.requestTimeoutMs, () => {
      state.abortCause ??= 'timeout';
      controller.abort();
    });

    if (signal?.aborted) {
      onAbort();
    } else {
      signal?.addEventListener('abort', onAbort, { once: true });
    }

    try {
      const response = await this.send(controller.signal, state);

      if (!response.ok) {
        await this.discardBody(response);
        this.logger.error({ status: response.status }, 'http error');
        throw new FetchError('status', `HTTP ${response.status}: ${response.statusText}`, this.url, {
          status: response.status,
        });
      }

      const body = await this.readBody(response, state);
      return this.decodeBody(body);
    } finally {
      cancelTimeout();
      signal?.removeEventListener('abort', onAbort);
    }
  }

  /**
   * Poll until `options.signal` aborts; without a signal this never resolves.
   *
   * The first tick fires immediately. Ticks missed while a fetch or the handler
   * is still running are skipped, and the handler is awaited before the next
   * tick, so there is never more than one fetch in flight.
   */
  async start(handler: PollHandler<T>, options: StartOptions = {}): Promise<void> {
    if (this.running) {
      throw new PollerError('Poller is already running');
    }
    this.running = true;

    const { signal } = options;
    let tickAt: number | null = null;

    this.logger.info({ pollIntervalMs: this.pollIntervalMs }, 'polling started');

    try {
      while (!signal?.aborted) {
        const now = this.timer.now();
        tickAt = tickAt === null ? now : computeNextTick(tickAt, this.pollIntervalMs, now);

        await this.timer.sleep(Math.max(0, tickAt - now), signal);
        if (signal?.aborted) break;

        await this.dispatch(handler, signal);
      }
    } finally {
      this.running = false;
    }

    this.logger.info('polling stopped');
  }

  /**
   * Release pooled connections. The poller must not be used afterwards.
   */
  async close(): Promise<void> {
    await this.client.close();
  }

  private async dispatch(handler: PollHandler<T>, signal: AbortSignal | undefined): Promise<void> {
    const startedAt = this.timer.now();
    let data: T;

    try {
      data = await this.fetchOnce({ signal });
    } catch (error) {
      if (signal?.aborted) return;
      this.logger.error({ err: error }, 'failed to fetch data');
      return;
    }

    const elapsedMs = Math.max(0, this.timer.now() - startedAt);

    try {
      await handler(data, elapsedMs);
    } catch (error) {
      this.logger.error({ err: error }, 'poll handler failed');
    }
  }

  private async send(signal: AbortSignal, state: RequestState): Promise<Response> {
    try {
      return await fetch(this.url, { method: 'GET', dispatcher: this.client, signal });
    } catch (error) {
      throw this.transportFailure(error, state);
    }
  }

  private async readBody(response: Response, state: RequestState): Promise<string> {
    try {
      return await response.text();
    } catch (error) {
      throw this.transportFailure(error, state);
    }
  }

  // The body of a non-2xx response is never exposed; cancel it so the
  // connection can go back to the pool.
  private async discardBody(response: Response): Promise<void> {
    try {
      await response.body?.cancel();
    } catch (error) {
      this.logger.debug({ err: error }, 'failed to discard response body');
    }
  }

  private decodeBody(body: string): T {
    let raw: unknown;
    try {
      raw = JSON.parse(body);
    } catch (error) {
      throw this.decodeFailure('Invalid JSON: response body could not be parsed', error);
    }

    try {
      return this.decode(raw);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw this.decodeFailure(`Unexpected response shape: ${detail}`, error);
    }
  }

  private transportFailure(error: unknown, state: RequestState): FetchError {
    if (state.abortCause === 'signal') {
      this.logger.debug('request aborted');
      return new FetchError('transport', 'Request aborted', this.url, { cause: error });
    }

    const message =
      state.abortCause === 'timeout'
        ? `Request timed out after ${this.settings.requestTimeoutMs}ms`
        : describeTransportError(error);

    this.logger.error({ err: error, reason: message }, 'request failed');
    return new FetchError('transport', message, this.url, { cause: error });
  }

  private decodeFailure(message: string, error: unknown): FetchError {
    this.logger.error({ err: error, reason: message }, 'json decode failed');
    return new FetchError('decode', message, this.url, { cause: error });
  }
}
