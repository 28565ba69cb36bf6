export type HttpMethod = 'GET' | 'HEAD' | 'OPTIONS' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export type HttpHeaders = Record<string, string>;

// ============================================================================
// Transport
// ============================================================================

/**
 * Request handed to a transport. The body is already encoded: a form-encoded
 * string, or a FormData instance for multipart uploads.
 */
export interface TransportRequest {
  method: HttpMethod;
  url: string;
  headers: HttpHeaders;
  body?: string | FormData;
}

/**
 * Canonical response shape produced by every transport, whatever the status.
 * Header names are lower-cased.
 */
export interface RawHttpResponse {
  status: number;
  headers: HttpHeaders;
  body: string;
}

/**
 * A transport performs one HTTP exchange. Completed responses resolve (2xx or
 * not); failures that never produced a response reject with a TransportError.
 */
export type HttpTransport = (request: TransportRequest, signal?: AbortSignal) => Promise<RawHttpResponse>;

/**
 * Failures that never produced a response.
 */
export type TransportFailureKind = 'timeout' | 'connection_failed' | 'tls_failure' | 'other';

/**
 * Outcome of a single failed attempt. Retry and classification both switch
 * over `kind`.
 */
export type TransportAttemptFailure = { kind: TransportFailureKind; error: Error };

export type AttemptFailure =
  | TransportAttemptFailure
  | { kind: 'http_error'; response: RawHttpResponse }
  | { kind: 'decode_failure'; response: RawHttpResponse; error: Error };

// ============================================================================
// Logging
// ============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LoggerMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LoggerMeta): void;
  info(message: string, meta?: LoggerMeta): void;
  warn(message: string, meta?: LoggerMeta): void;
  error(message: string, meta?: LoggerMeta): void;
}
