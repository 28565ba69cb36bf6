import type { ApiResponse } from '../apiResponse';
import type { HttpHeaders } from '../types';

export interface RestwellErrorOptions {
  httpStatus?: number;
  httpHeaders?: HttpHeaders;
  httpBody?: string;
  jsonBody?: unknown;
  code?: string;
  response?: ApiResponse;
  cause?: unknown;
}

/**
 * Base class of every error raised by the client. HTTP fields are only set
 * for errors that came back from the API.
 */
export abstract class RestwellError extends Error {
  readonly httpStatus?: number;
  readonly httpHeaders?: HttpHeaders;
  readonly httpBody?: string;
  readonly jsonBody?: unknown;
  readonly code?: string;
  readonly response?: ApiResponse;

  constructor(message: string, options: RestwellErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'RestwellError';
    this.httpStatus = options.httpStatus;
    this.httpHeaders = options.httpHeaders;
    this.httpBody = options.httpBody;
    this.jsonBody = options.jsonBody;
    this.code = options.code;
    this.response = options.response;
  }

  get requestId(): string | undefined {
    return this.response?.requestId;
  }
}

// ============================================================================
// HTTP response errors
// ============================================================================

/**
 * Generic API error: an unmapped status, or a body that could not be decoded.
 */
export class ApiError extends RestwellError {
  constructor(message: string, options: RestwellErrorOptions = {}) {
    super(message, options);
    this.name = 'ApiError';
  }
}

/** Missing or malformed API key (raised locally), or HTTP 401. */
export class AuthenticationError extends ApiError {
  constructor(message: string, options: RestwellErrorOptions = {}) {
    super(message, options);
    this.name = 'AuthenticationError';
  }
}

/** HTTP 403. */
export class PermissionError extends ApiError {
  constructor(message: string, options: RestwellErrorOptions = {}) {
    super(message, options);
    this.name = 'PermissionError';
  }
}

/** HTTP 400, 404 and 422. */
export class InvalidRequestError extends ApiError {
  constructor(message: string, options: RestwellErrorOptions = {}) {
    super(message, options);
    this.name = 'InvalidRequestError';
  }
}

/** HTTP 429. */
export class RateLimitError extends ApiError {
  constructor(message: string, options: RestwellErrorOptions = {}) {
    super(message, options);
    this.name = 'RateLimitError';
  }
}

// ============================================================================
// Local errors
// ============================================================================

/**
 * The request never produced a response: timeout, refused or reset
 * connection, TLS failure. Raised once retries are exhausted.
 */
export class ApiConnectionError extends RestwellError {
  constructor(message: string, options: RestwellErrorOptions = {}) {
    super(message, options);
    this.name = 'ApiConnectionError';
  }
}

export class ConfigurationError extends RestwellError {
  constructor(message: string, options: RestwellErrorOptions = {}) {
    super(message, options);
    this.name = 'ConfigurationError';
  }
}

export class NotImplementedError extends RestwellError {
  constructor(message: string) {
    super(message);
    this.name = 'NotImplementedError';
  }
}
