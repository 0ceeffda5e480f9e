/**
 * Base error for everything the poller raises.
 */
export class PollerError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * The HTTP client could not be built from the accumulated settings.
 */
export class ConstructionError extends PollerError {}

/**
 * An environment variable held a value the poller cannot use.
 */
export class ConfigurationError extends PollerError {
  public readonly variable: string;

  constructor(message: string, variable: string) {
    super(message);
    this.variable = variable;
  }
}

export type FetchFailureKind = 'transport' | 'status' | 'decode';

export interface FetchErrorDetails {
  status?: number;
  cause?: unknown;
}

/**
 * One fetch attempt failed.
 *
 * `kind` tells transport failures (nothing usable came back), status failures
 * (a non-2xx response, `status` is set) and decode failures apart.
 */
export class FetchError extends PollerError {
  public readonly kind: FetchFailureKind;
  public readonly url: string;
  public readonly status?: number;

  constructor(kind: FetchFailureKind, message: string, url: string, details: FetchErrorDetails = {}) {
    super(message, { cause: details.cause });
    this.kind = kind;
    this.url = url;
    this.status = details.status;
  }
}

/**
 * Known socket and client error patterns mapped to short descriptions.
 */
const TRANSPORT_ERROR_MAP: Array<{ pattern: RegExp; description: string }> = [
  { pattern: /ECONNREFUSED/, description: 'Connection refused' },
  { pattern: /ECONNRESET/, description: 'Connection reset' },
  { pattern: /ETIMEDOUT|UND_ERR_CONNECT_TIMEOUT/, description: 'Connection timed out' },
  { pattern: /ENOTFOUND|EAI_AGAIN/, description: 'DNS lookup failed' },
  { pattern: /EHOSTUNREACH/, description: 'Host unreachable' },
  { pattern: /ENETUNREACH/, description: 'Network unreachable' },
  { pattern: /ECONNABORTED/, description: 'Connection aborted' },
  { pattern: /EPIPE|UND_ERR_SOCKET/, description: 'Connection broken' },
  { pattern: /ERR_INVALID_URL|Failed to parse URL/, description: 'Invalid URL' },
  { pattern: /certificate|self[- ]signed/i, description: 'TLS certificate error' },
];

const MAX_CAUSE_DEPTH = 5;

interface ErrorLike {
  message: string;
  code?: unknown;
  cause?: unknown;
}

// Socket errors raised inside Node core come from another realm under some
// runners, so `instanceof Error` is not reliable for them.
function isErrorLike(value: unknown): value is ErrorLike {
  return typeof value === 'object' && value !== null && 'message' in value && typeof value.message === 'string';
}

/**
 * Flattens an error and its `cause` chain into one string of messages and codes.
 */
function collectErrorText(error: unknown): string {
  const parts: string[] = [];
  let current: unknown = error;

  for (let depth = 0; depth < MAX_CAUSE_DEPTH && isErrorLike(current); depth++) {
    parts.push(current.message);
    if (typeof current.code === 'string') {
      parts.push(current.code);
    }
    current = current.cause;
  }

  if (parts.length === 0) {
    parts.push(String(error));
  }

  return parts.join(' ');
}

/**
 * Describe a failed request in a few words.
 * Falls back to the outermost message when no known code is present.
 */
export function describeTransportError(error: unknown): string {
  const text = collectErrorText(error);

  for (const { pattern, description } of TRANSPORT_ERROR_MAP) {
    if (pattern.test(text)) {
      return description;
    }
  }

  return isErrorLike(error) ? error.message : String(error);
}
