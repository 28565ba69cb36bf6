import { describe, expect, it } from 'vitest';
import { RequestContext } from '../requestContext';

const createContext = () =>
  new RequestContext({
    account: 'acct_local',
    apiKey: 'test-key',
    apiVersion: 'v1',
    body: 'title=Pilot',
    method: 'POST',
    path: '/episodes',
    idempotencyKey: 'local-key',
  });

describe('RequestContext', () => {
  it('returns itself when there are no headers', () => {
    const context = createContext();
    expect(context.deriveFromResponseHeaders(undefined)).toBe(context);
  });

  it('takes account, version and idempotency key from the response', () => {
    const context = createContext();
    const derived = context.deriveFromResponseHeaders({
      'restwell-account': 'acct_remote',
      'restwell-version': 'v2',
      'idempotency-key': 'remote-key',
    });

    expect(derived).not.toBe(context);
    expect(derived.account).toBe('acct_remote');
    expect(derived.apiVersion).toBe('v2');
    expect(derived.idempotencyKey).toBe('remote-key');
    expect(derived.body).toBe('title=Pilot');
    expect(derived.path).toBe('/episodes');
    expect(derived.apiKey).toBe('test-key');
  });

  it('clears fields the response does not echo', () => {
    const derived = createContext().deriveFromResponseHeaders({ 'content-type': 'application/json' });

    expect(derived.account).toBeUndefined();
    expect(derived.apiVersion).toBeUndefined();
    expect(derived.idempotencyKey).toBeUndefined();
  });

  it('does not mutate the source context', () => {
    const context = createContext();
    context.deriveFromResponseHeaders({ 'restwell-version': 'v2' });

    expect(context.apiVersion).toBe('v1');
    expect(context.account).toBe('acct_local');
  });
});
