import { Agent, ProxyAgent, request, type Dispatcher } from 'undici';
import type { HttpHeaders, HttpTransport, RawHttpResponse, TransportRequest } from '../types';
import { toTransportError } from './failures';

export interface UndiciTransportOptions {
  proxy?: string;
  verifySslCerts?: boolean;
  /** PEM-encoded CA bundle used instead of the system store. */
  caBundle?: string;
  openTimeoutMs?: number;
  readTimeoutMs?: number;
}

export type UndiciTransport = HttpTransport & {
  /** Closes the pooled connections. */
  close(): Promise<void>;
};

const DEFAULT_OPEN_TIMEOUT_MS = 30_000;
const DEFAULT_READ_TIMEOUT_MS = 80_000;

export const INSECURE_TLS_WARNING_CODE = 'RESTWELL_INSECURE_TLS';

function createDispatcher(options: UndiciTransportOptions): Dispatcher {
  const verify = options.verifySslCerts ?? true;
  const connect = {
    timeout: options.openTimeoutMs ?? DEFAULT_OPEN_TIMEOUT_MS,
    rejectUnauthorized: verify,
    ...(options.caBundle ? { ca: options.caBundle } : {}),
  };
  const readTimeoutMs = options.readTimeoutMs ?? DEFAULT_READ_TIMEOUT_MS;

  if (options.proxy) {
    return new ProxyAgent({
      uri: options.proxy,
      requestTls: connect,
      headersTimeout: readTimeoutMs,
      bodyTimeout: readTimeoutMs,
    });
  }

  return new Agent({
    connect,
    headersTimeout: readTimeoutMs,
    bodyTimeout: readTimeoutMs,
  });
}

function normalizeResponseHeaders(source: Record<string, string | string[] | undefined>): HttpHeaders {
  const headers: HttpHeaders = {};
  for (const [key, value] of Object.entries(source)) {
    if (value === undefined) continue;
    headers[key.toLowerCase()] = Array.isArray(value) ? value.join(', ') : value;
  }
  return headers;
}

/**
 * FormData bodies are serialized through the WHATWG Response encoder so the
 * multipart boundary and content type come from one place.
 */
async function encodeBody(req: TransportRequest): Promise<{ body?: string | Buffer; contentType?: string }> {
  if (req.body === undefined || typeof req.body === 'string') {
    return { body: req.body };
  }
  const encoded = new Response(req.body);
  return {
    body: Buffer.from(await encoded.arrayBuffer()),
    contentType: encoded.headers.get('content-type') ?? undefined,
  };
}

/**
 * Default transport: one keep-alive connection pool (or proxy agent) reused by
 * every request sent through it. The open timeout bounds connection setup, the
 * read timeout bounds waiting for headers and for each body chunk.
 */
export function createUndiciTransport(options: UndiciTransportOptions = {}): UndiciTransport {
  const dispatcher = createDispatcher(options);

  // Process warning rather than a log record: it must show at every log level.
  if (options.verifySslCerts === false) {
    process.emitWarning(
      'Running without SSL cert verification. You should never do this in production. ' +
        'Set verifySslCerts to true to enable verification.',
      { code: INSECURE_TLS_WARNING_CODE },
    );
  }

  const transport = async (req: TransportRequest, signal?: AbortSignal): Promise<RawHttpResponse> => {
    try {
      const { body, contentType } = await encodeBody(req);
      const headers = contentType ? { ...req.headers, 'Content-Type': contentType } : req.headers;
      const response = await request(req.url, {
        method: req.method,
        headers,
        body,
        dispatcher,
        signal,
      });
      const text = await response.body.text();

      return {
        status: response.statusCode,
        headers: normalizeResponseHeaders(response.headers),
        body: text,
      };
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      throw toTransportError(error);
    }
  };

  return Object.assign(transport, {
    close: () => dispatcher.close(),
  });
}
