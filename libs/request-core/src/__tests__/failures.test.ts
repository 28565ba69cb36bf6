import { describe, expect, it } from 'vitest';
import { TransportError, classifyTransportException, toTransportError } from '../transport/failures';

const withCode = (message: string, code: string) => Object.assign(new Error(message), { code });

describe('classifyTransportException', () => {
  it('detects socket timeouts', () => {
    expect(classifyTransportException(withCode('timed out', 'ETIMEDOUT'))).toBe('timeout');
  });

  it('detects undici timeouts by code', () => {
    const error = Object.assign(withCode('Headers Timeout Error', 'UND_ERR_HEADERS_TIMEOUT'), {
      name: 'HeadersTimeoutError',
    });
    expect(classifyTransportException(error)).toBe('timeout');
  });

  it('detects abort-signal timeouts by name', () => {
    const error = Object.assign(new Error('The operation was aborted due to timeout'), { name: 'TimeoutError' });
    expect(classifyTransportException(error)).toBe('timeout');
  });

  it('looks through the cause chain of fetch errors', () => {
    const error = new TypeError('fetch failed', { cause: withCode('connect ECONNREFUSED 127.0.0.1:443', 'ECONNREFUSED') });
    expect(classifyTransportException(error)).toBe('connection_failed');
  });

  it('matches codes case-insensitively', () => {
    expect(classifyTransportException(withCode('reset', 'econnreset'))).toBe('connection_failed');
  });

  it('detects TLS failures', () => {
    expect(classifyTransportException(withCode('certificate has expired', 'CERT_HAS_EXPIRED'))).toBe('tls_failure');
    expect(classifyTransportException(withCode('altname', 'ERR_TLS_CERT_ALTNAME_INVALID'))).toBe('tls_failure');
    expect(classifyTransportException(withCode('self signed', 'DEPTH_ZERO_SELF_SIGNED_CERT'))).toBe('tls_failure');
  });

  it('falls back to other', () => {
    expect(classifyTransportException(new Error('boom'))).toBe('other');
    expect(classifyTransportException('boom')).toBe('other');
  });
});

describe('toTransportError', () => {
  it('wraps the error with its kind and first code', () => {
    const cause = new TypeError('fetch failed', { cause: withCode('getaddrinfo ENOTFOUND', 'ENOTFOUND') });
    const error = toTransportError(cause);

    expect(error).toBeInstanceOf(TransportError);
    expect(error.kind).toBe('connection_failed');
    expect(error.code).toBe('ENOTFOUND');
    expect(error.message).toBe('fetch failed');
    expect(error.cause).toBe(cause);
  });

  it('passes transport errors through', () => {
    const error = new TransportError('timeout', 'timed out');
    expect(toTransportError(error)).toBe(error);
  });
});
