import { ACCOUNT_HEADER, IDEMPOTENCY_HEADER, VERSION_HEADER, getHeader } from './headers';
import type { HttpHeaders, HttpMethod } from './types';

export interface RequestContextFields {
  account?: string;
  apiKey: string;
  apiVersion?: string;
  /** Encoded request body, for logging. */
  body?: string;
  method: HttpMethod;
  path: string;
  /** Encoded query string, for logging. */
  queryParams?: string;
  idempotencyKey?: string;
}

/**
 * What one logical call sent, kept for structured logging. Never mutated:
 * `deriveFromResponseHeaders` returns a new context.
 */
export class RequestContext implements Readonly<RequestContextFields> {
  readonly account?: string;
  readonly apiKey: string;
  readonly apiVersion?: string;
  readonly body?: string;
  readonly method: HttpMethod;
  readonly path: string;
  readonly queryParams?: string;
  readonly idempotencyKey?: string;

  constructor(fields: RequestContextFields) {
    this.account = fields.account;
    this.apiKey = fields.apiKey;
    this.apiVersion = fields.apiVersion;
    this.body = fields.body;
    this.method = fields.method;
    this.path = fields.path;
    this.queryParams = fields.queryParams;
    this.idempotencyKey = fields.idempotencyKey;
  }

  /**
   * The server's account, version and idempotency headers replace what was
   * set locally. Without headers (no response) the context is returned as is.
   */
  deriveFromResponseHeaders(headers?: HttpHeaders): RequestContext {
    if (!headers) {
      return this;
    }
    return new RequestContext({
      ...this.toFields(),
      account: getHeader(headers, ACCOUNT_HEADER),
      apiVersion: getHeader(headers, VERSION_HEADER),
      idempotencyKey: getHeader(headers, IDEMPOTENCY_HEADER),
    });
  }

  toFields(): RequestContextFields {
    return {
      account: this.account,
      apiKey: this.apiKey,
      apiVersion: this.apiVersion,
      body: this.body,
      method: this.method,
      path: this.path,
      queryParams: this.queryParams,
      idempotencyKey: this.idempotencyKey,
    };
  }
}
