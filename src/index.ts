export * from './poller';
export { loadPollerConfig, SETTING_ENV_VARS, URL_ENV_VAR } from './config';
export {
  PollerError,
  ConstructionError,
  ConfigurationError,
  FetchError,
  describeTransportError,
} from './utils/errors';
export type { FetchErrorDetails, FetchFailureKind } from './utils/errors';
export { createLogger, parseLogLevel, resolveLoggerOptions } from './utils/logger';
export type { LogLevel, Logger, LoggerOptions } from './utils/logger';
