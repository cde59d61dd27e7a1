/**
 * Error kinds a probe attempt can fail with.
 *
 * `unexpected` covers anything not modelled explicitly (protocol surprises, bugs);
 * it is still recorded as a failed attempt rather than crashing a loop.
 */
export type ProbeErrorKind = 'authentication' | 'connection' | 'timeout' | 'scrape' | 'unexpected';

/**
 * Base class for failures raised while running a probe.
 */
export class ProbeError extends Error {
  public readonly kind: ProbeErrorKind;

  constructor(kind: ProbeErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ProbeError';
    this.kind = kind;
  }
}

/**
 * The mail server rejected the configured credentials.
 */
export class AuthenticationError extends ProbeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('authentication', message, options);
    this.name = 'AuthenticationError';
  }
}

/**
 * Network, DNS or TLS level failure reaching a server.
 */
export class ConnectionError extends ProbeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('connection', message, options);
    this.name = 'ConnectionError';
  }
}

/**
 * The probe message was not observed within the poll window.
 */
export class TimeoutError extends ProbeError {
  public readonly timeoutMs: number;

  constructor(timeoutMs: number, message = `Message not observed within ${timeoutMs}ms`) {
    super('timeout', message);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * The spam score page could not be parsed.
 */
export class ScrapeError extends ProbeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('scrape', message, options);
    this.name = 'ScrapeError';
  }
}

/**
 * Missing or invalid required setting. Raised at startup only and always fatal.
 */
export class ConfigurationError extends Error {
  public readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid configuration:\n  - ${problems.join('\n  - ')}`);
    this.name = 'ConfigurationError';
    this.problems = problems;
  }
}

const CONNECTION_ERROR_CODES = new Set([
  'ECONNECTION',
  'ECONNREFUSED',
  'ECONNRESET',
  'ECONNABORTED',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ENOTFOUND',
  'EAI_AGAIN',
  'ETIMEDOUT',
  'ETIMEOUT',
  'ESOCKET',
  'EDNS',
  'ETLS',
  'EPIPE',
  'ERR_NETWORK',
  'ERR_BAD_RESPONSE',
  'ERR_BAD_REQUEST',
  'ERR_TLS_CERT_ALTNAME_INVALID',
  'CERT_HAS_EXPIRED',
  'DEPTH_ZERO_SELF_SIGNED_CERT',
  'UNABLE_TO_VERIFY_LEAF_SIGNATURE',
  'NoConnection',
  'ClosedAfterConnectTLS',
  'ClosedAfterConnectText',
]);

function readProperty(error: object, key: string): unknown {
  return Reflect.get(error, key);
}

/**
 * Maps an arbitrary thrown value onto a {@link ProbeErrorKind}.
 *
 * Understands nodemailer (`code: 'EAUTH'`, `responseCode: 535`), imapflow
 * (`authenticationFailed: true`) and axios / Node socket error codes.
 */
export function classifyError(error: unknown): ProbeErrorKind {
  if (error instanceof ProbeError) {
    return error.kind;
  }

  if (typeof error !== 'object' || error === null) {
    return 'unexpected';
  }

  const code = readProperty(error, 'code');
  const responseCode = readProperty(error, 'responseCode');

  if (readProperty(error, 'authenticationFailed') === true || code === 'EAUTH' || responseCode === 535) {
    return 'authentication';
  }

  if (typeof code === 'string' && CONNECTION_ERROR_CODES.has(code)) {
    return 'connection';
  }

  if (readProperty(error, 'isAxiosError') === true || (error instanceof Error && error.name === 'TimeoutError')) {
    return 'connection';
  }

  return 'unexpected';
}

/**
 * Wraps any thrown value into a {@link ProbeError}, preserving its classification.
 */
export function toProbeError(error: unknown): ProbeError {
  if (error instanceof ProbeError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  switch (classifyError(error)) {
    case 'authentication':
      return new AuthenticationError(message, { cause: error });
    case 'connection':
      return new ConnectionError(message, { cause: error });
    default:
      return new ProbeError('unexpected', message, { cause: error });
  }
}
