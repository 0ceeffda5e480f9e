import { performance } from 'node:perf_hooks';
import type { PollTimer } from './types';

/**
 * Next tick on the grid `previousTick + k * intervalMs` that is not in the past.
 *
 * Ticks that went by while the loop was busy are skipped rather than fired
 * back to back. A tick that falls exactly on `now` is due immediately.
 */
export function computeNextTick(previousTick: number, intervalMs: number, now: number): number {
  if (intervalMs <= 0) return now;

  const intervals = Math.max(1, Math.ceil((now - previousTick) / intervalMs));
  return previousTick + intervals * intervalMs;
}

/** Longest delay `setTimeout` honours; anything larger fires after 1ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

/**
 * Run `callback` once after `ms`, re-arming in steps of
 * {@link MAX_TIMER_DELAY_MS} for longer delays. Returns a cancel function.
 */
export function scheduleAfter(ms: number, callback: () => void): () => void {
  let remaining = Math.max(0, ms);
  let timer: ReturnType<typeof setTimeout>;

  const arm = (): void => {
    const delay = Math.min(remaining, MAX_TIMER_DELAY_MS);
    remaining -= delay;
    timer = setTimeout(remaining > 0 ? arm : callback, delay);
  };
  arm();

  return () => clearTimeout(timer);
}

/**
 * Resolves after `ms`, or as soon as `signal` aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }

    const onAbort = (): void => {
      cancel();
      resolve();
    };

    const cancel = scheduleAfter(ms, () => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    });

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export const systemTimer: PollTimer = {
  now: () => performance.now(),
  sleep,
};
