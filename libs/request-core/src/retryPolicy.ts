import type { AttemptFailure, HttpMethod } from './types';

export interface RetryPolicyOptions {
  maxNetworkRetries: number;
  initialNetworkRetryDelayMs: number;
  maxNetworkRetryDelayMs: number;
  /** Uniform source in [0, 1). Defaults to Math.random. */
  random?: () => number;
}

/**
 * Retries transport failures only. Completed HTTP responses, whatever their
 * status, are final.
 */
export class RetryPolicy {
  readonly maxNetworkRetries: number;
  readonly initialNetworkRetryDelayMs: number;
  readonly maxNetworkRetryDelayMs: number;
  private readonly random: () => number;

  constructor(options: RetryPolicyOptions) {
    this.maxNetworkRetries = options.maxNetworkRetries;
    this.initialNetworkRetryDelayMs = options.initialNetworkRetryDelayMs;
    this.maxNetworkRetryDelayMs = options.maxNetworkRetryDelayMs;
    this.random = options.random ?? Math.random;
  }

  shouldRetry(failure: AttemptFailure, attemptsSoFar: number): boolean {
    if (attemptsSoFar >= this.maxNetworkRetries) {
      return false;
    }
    switch (failure.kind) {
      case 'timeout':
      case 'connection_failed':
        return true;
      case 'tls_failure':
      case 'other':
      case 'http_error':
      case 'decode_failure':
        return false;
      default: {
        const unreachable: never = failure;
        return unreachable;
      }
    }
  }

  /**
   * Delay before retry number `attempts` (1 for the first retry):
   * exponential, capped, jittered into [50%, 100%) and never below the
   * initial delay.
   */
  backoffDelay(attempts: number): number {
    const exponential = this.initialNetworkRetryDelayMs * 2 ** Math.max(attempts - 1, 0);
    const capped = Math.min(exponential, this.maxNetworkRetryDelayMs);
    const jittered = capped * (0.5 * (1 + this.random()));
    return Math.max(this.initialNetworkRetryDelayMs, jittered);
  }

  needsIdempotencyKey(method: HttpMethod): boolean {
    return this.maxNetworkRetries > 0 && (method === 'POST' || method === 'DELETE');
  }
}
