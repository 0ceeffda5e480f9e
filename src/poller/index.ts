export { JsonPoller } from './JsonPoller';
export { JsonPollerBuilder } from './JsonPollerBuilder';
export { createHttpClient } from './httpClient';
export { computeNextTick, sleep, systemTimer } from './tickSchedule';
export type { JsonPollerInit } from './JsonPoller';
export * from './defaults';
export * from './types';
