import { ApiResponse } from '../apiResponse';
import type { RawHttpResponse, TransportAttemptFailure, TransportFailureKind } from '../types';
import {
  ApiConnectionError,
  ApiError,
  AuthenticationError,
  InvalidRequestError,
  PermissionError,
  RateLimitError,
  type RestwellErrorOptions,
} from './errors';

type ErrorConstructor = new (message: string, options?: RestwellErrorOptions) => ApiError;

function errorClassForStatus(status: number): ErrorConstructor {
  switch (status) {
    case 400:
    case 404:
    case 422:
      return InvalidRequestError;
    case 401:
      return AuthenticationError;
    case 403:
      return PermissionError;
    case 429:
      return RateLimitError;
    default:
      return ApiError;
  }
}

export function generalApiError(raw: RawHttpResponse, cause?: unknown): ApiError {
  return new ApiError(
    `Invalid response object from API: ${JSON.stringify(raw.body)} (HTTP response code was ${raw.status})`,
    {
      httpStatus: raw.status,
      httpHeaders: raw.headers,
      httpBody: raw.body,
      cause,
    },
  );
}

function readString(data: unknown, field: string): string | undefined {
  if (typeof data === 'object' && data !== null && field in data) {
    const value: unknown = Reflect.get(data, field);
    return typeof value === 'string' ? value : undefined;
  }
  return undefined;
}

/**
 * Maps a completed non-2xx response onto the error taxonomy. The body is
 * decoded first; an undecodable body yields a generic ApiError with the raw
 * status and body.
 */
export function classifyResponse(raw: RawHttpResponse): ApiError {
  let response: ApiResponse;
  try {
    response = ApiResponse.fromRaw(raw);
  } catch (error) {
    return generalApiError(raw, error);
  }

  const message = readString(response.data, 'message') ?? `Request failed with status ${raw.status}`;
  const ErrorClass = errorClassForStatus(raw.status);
  return new ErrorClass(message, {
    httpStatus: raw.status,
    httpHeaders: raw.headers,
    httpBody: raw.body,
    jsonBody: response.data,
    code: readString(response.data, 'code') ?? String(raw.status),
    response,
  });
}

function connectionHint(kind: TransportFailureKind, apiBase: string): string {
  const host = URL.canParse(apiBase) ? new URL(apiBase).host : apiBase;
  switch (kind) {
    case 'connection_failed':
      return (
        `Unexpected error communicating when trying to connect to Restwell (${host}). ` +
        'You may be seeing this message because your DNS is not working or you are not connected to the internet. ' +
        'To check, try running `host ' +
        host +
        '` from the command line.'
      );
    case 'tls_failure':
      return (
        `Could not establish a secure connection to Restwell (${host}), you may need to upgrade your OpenSSL version. ` +
        'To check, try running `openssl s_client -connect ' +
        host +
        ':443` from the command line.'
      );
    case 'timeout':
      return `Could not connect to Restwell (${apiBase}). Please check your internet connection and try again.`;
    case 'other':
      return 'Unexpected error communicating with Restwell. If this problem persists, let us know at support@restwell.dev.';
    default: {
      const unreachable: never = kind;
      return unreachable;
    }
  }
}

/**
 * Builds the error for a failure that never produced a response, once
 * retries are exhausted or the failure is not retryable.
 */
export function classifyTransportFailure(
  failure: TransportAttemptFailure,
  retries: number,
  apiBase: string,
): ApiConnectionError {
  let message = connectionHint(failure.kind, apiBase);
  if (retries > 0) {
    message += ` Request was retried ${retries} times.`;
  }
  message += `\n\n(Network error: ${failure.error.message})`;
  return new ApiConnectionError(message, { cause: failure.error });
}
