import type { HttpHeaders } from './types';

export const ACCOUNT_HEADER = 'Restwell-Account';
export const VERSION_HEADER = 'Restwell-Version';
export const IDEMPOTENCY_HEADER = 'Idempotency-Key';
export const REQUEST_ID_HEADER = 'Request-Id';
export const CLIENT_USER_AGENT_HEADER = 'X-Restwell-Client-User-Agent';
export const CLIENT_RAW_USER_AGENT_HEADER = 'X-Restwell-Client-Raw-User-Agent';

/**
 * `idempotency-key` -> `Idempotency-Key`.
 */
export function normalizeHeaderName(name: string): string {
  return name
    .trim()
    .split('-')
    .map((part) => (part ? part[0].toUpperCase() + part.slice(1).toLowerCase() : part))
    .join('-');
}

export function normalizeHeaders(headers?: Record<string, string | undefined>): HttpHeaders {
  const result: HttpHeaders = {};
  if (!headers) return result;
  for (const [key, value] of Object.entries(headers)) {
    if (value !== undefined) {
      result[normalizeHeaderName(key)] = value;
    }
  }
  return result;
}

export function getHeader(headers: HttpHeaders, name: string): string | undefined {
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === wanted) {
      return value;
    }
  }
  return undefined;
}
