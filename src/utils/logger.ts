import pino from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export type Logger = pino.Logger;

const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

const TRUTHY_FLAGS: ReadonlySet<string> = new Set(['true', '1', 'yes', 'on']);

const PRETTY_TRANSPORT = {
  target: 'pino-pretty',
  options: { colorize: true, translateTime: 'SYS:HH:MM:ss.l' },
};

/** Unknown or missing levels fall back to `info`. */
export function parseLogLevel(raw: string | undefined): LogLevel {
  const normalized = raw?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized) ?? 'info';
}

/**
 * Parses a string flag value as boolean.
 * Recognises 'true', '1', 'yes', 'on' (case-insensitive, trimmed).
 */
export function parseBooleanFlag(raw: string | undefined): boolean {
  if (!raw) return false;
  return TRUTHY_FLAGS.has(raw.trim().toLowerCase());
}

export interface LoggerOptions {
  level?: LogLevel;
  /** Route output through pino-pretty. Off unless `LOG_PRETTY` says otherwise. */
  pretty?: boolean;
}

/**
 * Resolve explicit options against `LOG_LEVEL` and `LOG_PRETTY`.
 */
export function resolveLoggerOptions(
  options: LoggerOptions = {},
  env: NodeJS.ProcessEnv = process.env,
): pino.LoggerOptions {
  const level = options.level ?? parseLogLevel(env.LOG_LEVEL);
  const pretty = options.pretty ?? parseBooleanFlag(env.LOG_PRETTY);

  return pretty ? { level, transport: PRETTY_TRANSPORT } : { level };
}

export function createLogger(options: LoggerOptions = {}, env: NodeJS.ProcessEnv = process.env): Logger {
  return pino(resolveLoggerOptions(options, env));
}

const logger = createLogger();

export default logger;
