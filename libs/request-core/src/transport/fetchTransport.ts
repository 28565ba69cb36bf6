import type { HttpHeaders, HttpTransport, RawHttpResponse, TransportRequest } from '../types';
import { toTransportError } from './failures';

/**
 * Transport over the global fetch API. It has no connection, proxy or TLS
 * settings of its own; use createUndiciTransport when those matter.
 * Network failures are normalized to TransportError; an abort from the
 * caller's signal propagates unchanged.
 */
export const fetchTransport: HttpTransport = async (
  req: TransportRequest,
  signal?: AbortSignal,
): Promise<RawHttpResponse> => {
  try {
    const response = await fetch(req.url, {
      method: req.method,
      headers: req.headers,
      body: req.body,
      signal,
    });
    const body = await response.text();

    const headers: HttpHeaders = {};
    response.headers.forEach((value, key) => {
      headers[key.toLowerCase()] = value;
    });

    return {
      status: response.status,
      headers,
      body,
    };
  } catch (error) {
    if (signal?.aborted) {
      throw error;
    }
    throw toTransportError(error);
  }
};
