import type { TransportFailureKind } from '../types';

const TIMEOUT_CODES = new Set([
  'ETIMEDOUT',
  'ECONNABORTED',
  'ESOCKETTIMEDOUT',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
]);

const CONNECTION_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'EPIPE',
  'ENOTFOUND',
  'EAI_AGAIN',
  'ENETUNREACH',
  'EHOSTUNREACH',
  'UND_ERR_SOCKET',
  'UND_ERR_CLOSED',
]);

const TLS_CODES = new Set(['DEPTH_ZERO_SELF_SIGNED_CERT', 'SELF_SIGNED_CERT_IN_CHAIN', 'HOSTNAME_MISMATCH']);
const TLS_CODE_PREFIXES = ['ERR_TLS_', 'ERR_SSL_', 'CERT_', 'UNABLE_TO_'];

const TIMEOUT_NAMES = new Set(['TIMEOUTERROR', 'CONNECTTIMEOUTERROR', 'HEADERSTIMEOUTERROR', 'BODYTIMEOUTERROR']);

/**
 * Raised by transports for failures that never produced a response.
 */
export class TransportError extends Error {
  readonly kind: TransportFailureKind;
  readonly code?: string;

  constructor(kind: TransportFailureKind, message: string, options: { code?: string; cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'TransportError';
    this.kind = kind;
    this.code = options.code;
  }
}

function readStringField(value: unknown, field: 'code' | 'name'): string | undefined {
  if (typeof value === 'object' && value !== null && field in value) {
    const candidate: unknown = Reflect.get(value, field);
    return typeof candidate === 'string' ? candidate : undefined;
  }
  return undefined;
}

function readCause(value: unknown): unknown {
  if (typeof value === 'object' && value !== null && 'cause' in value) {
    return value.cause;
  }
  return undefined;
}

/**
 * Walks an error and its `cause` chain (fetch wraps socket errors that way)
 * and returns every code and name found, upper-cased.
 */
function collectMarkers(error: unknown): { codes: string[]; names: string[] } {
  const codes: string[] = [];
  const names: string[] = [];
  let current: unknown = error;
  for (let depth = 0; current !== undefined && current !== null && depth < 5; depth += 1) {
    const code = readStringField(current, 'code');
    const name = readStringField(current, 'name');
    if (code) codes.push(code.toUpperCase());
    if (name) names.push(name.toUpperCase());
    current = readCause(current);
  }
  return { codes, names };
}

export function classifyTransportException(error: unknown): TransportFailureKind {
  if (error instanceof TransportError) {
    return error.kind;
  }
  const { codes, names } = collectMarkers(error);
  if (codes.some((code) => TIMEOUT_CODES.has(code)) || names.some((name) => TIMEOUT_NAMES.has(name))) {
    return 'timeout';
  }
  if (codes.some((code) => TLS_CODES.has(code) || TLS_CODE_PREFIXES.some((prefix) => code.startsWith(prefix)))) {
    return 'tls_failure';
  }
  if (codes.some((code) => CONNECTION_CODES.has(code))) {
    return 'connection_failed';
  }
  return 'other';
}

export function toTransportError(error: unknown): TransportError {
  if (error instanceof TransportError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  const { codes } = collectMarkers(error);
  return new TransportError(classifyTransportException(error), message, { code: codes[0], cause: error });
}
