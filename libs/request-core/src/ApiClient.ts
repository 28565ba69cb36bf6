import { randomUUID } from 'crypto';
import { setTimeout as delay } from 'timers/promises';
import { inspect } from 'util';
import { ApiResponse, isSuccessStatus } from './apiResponse';
import { getConfig, invalidApiBaseError, parseConfig, type ClientConfig } from './config';
import {
  ParamsEncoder,
  buildMultipartBody,
  hasFileParams,
  objectsToIds,
  type Params,
} from './encoding';
import { classifyResponse, classifyTransportFailure, generalApiError } from './errors/classifier';
import { AuthenticationError, type RestwellError } from './errors/errors';
import {
  ACCOUNT_HEADER,
  CLIENT_RAW_USER_AGENT_HEADER,
  CLIENT_USER_AGENT_HEADER,
  IDEMPOTENCY_HEADER,
  REQUEST_ID_HEADER,
  VERSION_HEADER,
  getHeader,
  normalizeHeaders,
} from './headers';
import { ConsoleLogger } from './logger';
import { RequestContext } from './requestContext';
import { RetryPolicy } from './retryPolicy';
import { recordResponse, runScoped, type ScopedResult } from './session';
import { toTransportError } from './transport/failures';
import { createUndiciTransport, type UndiciTransport } from './transport/undiciTransport';
import type {
  AttemptFailure,
  HttpHeaders,
  HttpMethod,
  HttpTransport,
  Logger,
  LoggerMeta,
  RawHttpResponse,
  TransportRequest,
} from './types';
import { SystemProfiler, USER_AGENT } from './userAgent';

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface ApiClientOptions {
  /** Merged over the process-wide config (see `configure`). */
  config?: Partial<ClientConfig>;
  /** Defaults to a keep-alive undici transport owned by this client. */
  transport?: HttpTransport;
  logger?: Logger;
  sleep?: SleepFn;
  random?: () => number;
  profiler?: SystemProfiler;
}

/**
 * Per-call overrides and inputs of `executeRequest`.
 */
export interface RequestOptions {
  apiBase?: string;
  apiVersion?: string;
  apiKey?: string;
  account?: string;
  headers?: Record<string, string | undefined>;
  params?: Params;
  signal?: AbortSignal;
}

type AttemptOutcome =
  | { ok: true; response: ApiResponse }
  | { ok: false; context: RequestContext; failure: AttemptFailure };

const QUERY_METHODS = new Set<HttpMethod>(['GET', 'HEAD', 'DELETE']);
const FORM_CONTENT_TYPE = 'application/x-www-form-urlencoded';

const defaultSleep: SleepFn = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

function invalidApiKeyError(apiKey: string | undefined): AuthenticationError {
  if (!apiKey) {
    return new AuthenticationError(
      'No API key provided. Set your API key using `configure({ apiKey: "<API-KEY>" })` ' +
        'or pass `apiKey` with the request.',
    );
  }
  return new AuthenticationError(
    'Your API key is invalid, as it contains whitespace. ' +
      '(HINT: You can double-check your API key from the Restwell dashboard.)',
  );
}

function splitPath(path: string): { pathname: string; embedded: Params } {
  const queryStart = path.indexOf('?');
  const rawPath = queryStart === -1 ? path : path.slice(0, queryStart);
  const pathname = rawPath.startsWith('/') ? rawPath : `/${rawPath}`;
  if (queryStart === -1) {
    return { pathname, embedded: {} };
  }
  return { pathname, embedded: Object.fromEntries(new URLSearchParams(path.slice(queryStart + 1))) };
}

function definedEntries(params: Params): Params {
  return Object.fromEntries(Object.entries(params).filter(([, value]) => value !== undefined));
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Executes API calls: encodes params, dispatches through the transport,
 * retries transport failures with backoff, and returns a decoded
 * ApiResponse or throws a RestwellError subclass.
 *
 * One client owns one transport; use one client per concurrency unit.
 */
export class ApiClient {
  readonly config: ClientConfig;
  readonly logger: Logger;
  private readonly transport: HttpTransport;
  private readonly ownedTransport?: UndiciTransport;
  private readonly retryPolicy: RetryPolicy;
  private readonly sleep: SleepFn;
  private readonly profiler: SystemProfiler;

  constructor(options: ApiClientOptions = {}) {
    this.config = parseConfig({ ...getConfig(), ...options.config });
    this.logger = options.logger ?? new ConsoleLogger(this.config.logLevel);

    if (options.transport) {
      this.transport = options.transport;
    } else {
      const owned = createUndiciTransport({
        proxy: this.config.proxy,
        verifySslCerts: this.config.verifySslCerts,
        caBundle: this.config.caBundle,
        openTimeoutMs: this.config.openTimeoutMs,
        readTimeoutMs: this.config.readTimeoutMs,
      });
      this.ownedTransport = owned;
      this.transport = owned;
    }

    this.retryPolicy = new RetryPolicy({
      maxNetworkRetries: this.config.maxNetworkRetries,
      initialNetworkRetryDelayMs: this.config.initialNetworkRetryDelayMs,
      maxNetworkRetryDelayMs: this.config.maxNetworkRetryDelayMs,
      random: options.random,
    });
    this.sleep = options.sleep ?? defaultSleep;
    this.profiler = options.profiler ?? new SystemProfiler();
  }

  /**
   * Runs `fn` with this client as the active client and returns its result
   * together with the last response this client produced inside it.
   */
  request<T>(fn: () => Promise<T>): Promise<ScopedResult<T>> {
    return runScoped(this, fn);
  }

  async close(): Promise<void> {
    await this.ownedTransport?.close();
  }

  async executeRequest(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<ApiResponse> {
    const apiBaseError = options.apiBase === undefined ? undefined : invalidApiBaseError(options.apiBase);
    if (apiBaseError) {
      this.raise(apiBaseError);
    }
    const apiBase = (options.apiBase ?? this.config.apiBase).replace(/\/+$/, '');
    const apiVersion = options.apiVersion ?? this.config.apiVersion;
    const apiKey = options.apiKey ?? this.config.apiKey;
    const params = objectsToIds(options.params ?? {});

    if (!apiKey || /\s/.test(apiKey)) {
      this.raise(invalidApiKeyError(apiKey));
    }

    const { pathname, embedded } = splitPath(path);
    const sendsQuery = QUERY_METHODS.has(method);
    const queryParams: Params = sendsQuery ? { ...embedded, ...definedEntries(params) } : embedded;
    const bodyParams = sendsQuery ? undefined : params;

    const encoder = new ParamsEncoder();
    const query = Object.keys(queryParams).length > 0 ? encoder.encode(queryParams) : undefined;
    const multipart = bodyParams !== undefined && hasFileParams(bodyParams);

    let body: string | FormData | undefined;
    let loggedBody: string | undefined;
    if (bodyParams && multipart) {
      body = buildMultipartBody(bodyParams);
      loggedBody = inspect(bodyParams, { depth: 5, breakLength: Infinity });
    } else if (bodyParams) {
      body = encoder.encode(bodyParams);
      loggedBody = encoder.encode(bodyParams);
    }

    const headers: HttpHeaders = {
      'User-Agent': USER_AGENT,
      Authorization: `Bearer ${apiKey}`,
      ...(multipart ? {} : { 'Content-Type': FORM_CONTENT_TYPE }),
      ...this.clientUserAgentHeaders(),
      ...normalizeHeaders({
        [IDEMPOTENCY_HEADER]: this.retryPolicy.needsIdempotencyKey(method) ? randomUUID() : undefined,
        [VERSION_HEADER]: apiVersion,
        [ACCOUNT_HEADER]: options.account,
      }),
      ...normalizeHeaders(options.headers),
    };

    const request: TransportRequest = {
      method,
      url: `${apiBase}${apiVersion ? `/${apiVersion}` : ''}${pathname}${query ? `?${query}` : ''}`,
      headers,
      body,
    };

    let context = new RequestContext({
      account: options.account,
      apiKey,
      apiVersion,
      body: loggedBody,
      method,
      path: pathname,
      queryParams: query === undefined ? undefined : encoder.encode(queryParams),
      idempotencyKey: getHeader(headers, IDEMPOTENCY_HEADER),
    });

    let retries = 0;
    for (;;) {
      const outcome = await this.attempt(request, context, retries, options.signal);
      if (outcome.ok) {
        recordResponse(this, outcome.response);
        return outcome.response;
      }

      context = outcome.context;
      if (this.retryPolicy.shouldRetry(outcome.failure, retries)) {
        retries += 1;
        await this.sleep(this.retryPolicy.backoffDelay(retries), options.signal);
        continue;
      }
      throw this.finalError(outcome.failure, context, retries, apiBase);
    }
  }

  private async attempt(
    request: TransportRequest,
    context: RequestContext,
    retries: number,
    signal?: AbortSignal,
  ): Promise<AttemptOutcome> {
    this.logger.info('Request to Restwell API', { ...this.contextMeta(context), num_retries: retries });
    this.logger.debug('Request details', {
      body: context.body,
      idempotency_key: context.idempotencyKey,
      query: context.queryParams,
      num_retries: retries,
    });

    const startedAt = Date.now();
    let raw: RawHttpResponse;
    try {
      raw = await this.transport(request, signal);
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      const transportError = toTransportError(error);
      this.logger.error('Request error', {
        elapsed_ms: Date.now() - startedAt,
        error_kind: transportError.kind,
        error_message: transportError.message,
        idempotency_key: context.idempotencyKey,
        method: context.method,
        num_retries: retries,
        path: context.path,
      });
      return { ok: false, context, failure: { kind: transportError.kind, error: transportError } };
    }

    const derived = context.deriveFromResponseHeaders(raw.headers);
    const requestId = getHeader(raw.headers, REQUEST_ID_HEADER);
    this.logger.info('Response from Restwell API', {
      ...this.contextMeta(derived),
      elapsed_ms: Date.now() - startedAt,
      request_id: requestId,
      status: raw.status,
    });
    this.logger.debug('Response details', {
      body: raw.body,
      idempotency_key: derived.idempotencyKey,
      request_id: requestId,
    });

    if (!isSuccessStatus(raw.status)) {
      return { ok: false, context: derived, failure: { kind: 'http_error', response: raw } };
    }
    try {
      return { ok: true, response: ApiResponse.fromRaw(raw) };
    } catch (error) {
      return { ok: false, context: derived, failure: { kind: 'decode_failure', response: raw, error: toError(error) } };
    }
  }

  private finalError(failure: AttemptFailure, context: RequestContext, retries: number, apiBase: string): RestwellError {
    switch (failure.kind) {
      case 'http_error':
      case 'decode_failure': {
        const error =
          failure.kind === 'http_error' ? classifyResponse(failure.response) : generalApiError(failure.response, failure.error);
        this.logger.error('Restwell API error', {
          status: error.httpStatus,
          error_code: error.code,
          error_message: error.message,
          idempotency_key: context.idempotencyKey,
          request_id: getHeader(failure.response.headers, REQUEST_ID_HEADER),
        });
        return error;
      }
      case 'timeout':
      case 'connection_failed':
      case 'tls_failure':
      case 'other': {
        const error = classifyTransportFailure(failure, retries, apiBase);
        this.logger.error('Restwell network error', {
          error_message: error.message,
          idempotency_key: context.idempotencyKey,
          num_retries: retries,
        });
        return error;
      }
      default: {
        const unreachable: never = failure;
        return unreachable;
      }
    }
  }

  /** Logs and throws a failure found before anything is sent. */
  private raise(error: RestwellError): never {
    this.logger.error('Restwell API error', { error_message: error.message });
    throw error;
  }

  private contextMeta(context: RequestContext): LoggerMeta {
    return {
      account: context.account,
      api_version: context.apiVersion,
      idempotency_key: context.idempotencyKey,
      method: context.method,
      path: context.path,
    };
  }

  private clientUserAgentHeaders(): HttpHeaders {
    const userAgent = this.profiler.userAgent();
    try {
      return { [CLIENT_USER_AGENT_HEADER]: JSON.stringify(userAgent) };
    } catch (error) {
      this.logger.debug('Unable to encode client user agent', { error_message: toError(error).message });
      return { [CLIENT_RAW_USER_AGENT_HEADER]: inspect(userAgent, { breakLength: Infinity }) };
    }
  }
}
