import { describe, expect, it } from 'vitest';
import { RetryPolicy } from '../retryPolicy';
import { TransportError } from '../transport/failures';
import type { AttemptFailure, TransportFailureKind } from '../types';

const createPolicy = (overrides: Partial<ConstructorParameters<typeof RetryPolicy>[0]> = {}) =>
  new RetryPolicy({
    maxNetworkRetries: 2,
    initialNetworkRetryDelayMs: 500,
    maxNetworkRetryDelayMs: 2000,
    ...overrides,
  });

const timeout: AttemptFailure = { kind: 'timeout', error: new TransportError('timeout', 'timed out') };

describe('RetryPolicy.shouldRetry', () => {
  it('retries a timeout while attempts remain', () => {
    expect(createPolicy({ maxNetworkRetries: 1 }).shouldRetry(timeout, 0)).toBe(true);
  });

  it('stops once the retry budget is used', () => {
    const policy = createPolicy();
    expect(policy.shouldRetry(timeout, 1)).toBe(true);
    expect(policy.shouldRetry(timeout, 2)).toBe(false);
  });

  it('never retries with retries disabled', () => {
    expect(createPolicy({ maxNetworkRetries: 0 }).shouldRetry(timeout, 0)).toBe(false);
  });

  it('does not retry HTTP error responses', () => {
    const notFound: AttemptFailure = {
      kind: 'http_error',
      response: { status: 404, headers: {}, body: '{"message":"missing"}' },
    };
    expect(createPolicy().shouldRetry(notFound, 0)).toBe(false);
  });

  const transportCases: Array<[TransportFailureKind, boolean]> = [
    ['timeout', true],
    ['connection_failed', true],
    ['tls_failure', false],
    ['other', false],
  ];

  it.each(transportCases)('%s -> %s', (kind, expected) => {
    const failure: AttemptFailure = { kind, error: new TransportError(kind, 'failed') };
    expect(createPolicy().shouldRetry(failure, 0)).toBe(expected);
  });

  it('does not retry undecodable responses', () => {
    const failure: AttemptFailure = {
      kind: 'decode_failure',
      response: { status: 200, headers: {}, body: 'not json' },
      error: new SyntaxError('Unexpected token'),
    };
    expect(createPolicy().shouldRetry(failure, 0)).toBe(false);
  });
});

describe('RetryPolicy.backoffDelay', () => {
  it('never goes below the initial delay', () => {
    expect(createPolicy({ random: () => 0 }).backoffDelay(1)).toBe(500);
  });

  it('doubles per attempt and applies jitter', () => {
    expect(createPolicy({ random: () => 0.5 }).backoffDelay(2)).toBe(750);
    expect(createPolicy({ random: () => 0 }).backoffDelay(3)).toBe(1000);
  });

  it('stays within [initial, max] for every random draw', () => {
    for (let step = 0; step < 100; step += 1) {
      const policy = createPolicy({ random: () => step / 100 });
      for (let attempts = 1; attempts <= 10; attempts += 1) {
        const delay = policy.backoffDelay(attempts);
        expect(delay).toBeGreaterThanOrEqual(500);
        expect(delay).toBeLessThanOrEqual(2000);
      }
    }
  });
});

describe('RetryPolicy.needsIdempotencyKey', () => {
  it('covers POST and DELETE when retries are enabled', () => {
    const policy = createPolicy();
    expect(policy.needsIdempotencyKey('POST')).toBe(true);
    expect(policy.needsIdempotencyKey('DELETE')).toBe(true);
    expect(policy.needsIdempotencyKey('GET')).toBe(false);
    expect(policy.needsIdempotencyKey('PATCH')).toBe(false);
  });

  it('is never needed without retries', () => {
    expect(createPolicy({ maxNetworkRetries: 0 }).needsIdempotencyKey('POST')).toBe(false);
  });
});
