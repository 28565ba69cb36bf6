import { AsyncLocalStorage } from 'async_hooks';
import type { ApiClient } from './ApiClient';
import type { ApiResponse } from './apiResponse';

interface ScopeFrame {
  readonly client: ApiClient;
  readonly parent?: ScopeFrame;
  lastResponse?: ApiResponse;
}

export interface ScopedResult<T> {
  result: T;
  lastResponse?: ApiResponse;
}

const storage = new AsyncLocalStorage<ScopeFrame>();

/**
 * Runs `fn` with `client` bound as the active client of the current async
 * task. The previous binding is back in place once `fn` settles, whether it
 * resolves or rejects; concurrent tasks never see each other's binding.
 */
export async function runScoped<T>(client: ApiClient, fn: () => Promise<T>): Promise<ScopedResult<T>> {
  const frame: ScopeFrame = { client, parent: storage.getStore() };
  const result = await storage.run(frame, fn);
  return { result, lastResponse: frame.lastResponse };
}

export function scopedClient(): ApiClient | undefined {
  return storage.getStore()?.client;
}

/**
 * Stores `response` as the last response of every enclosing scope bound to
 * `client`, including scopes opened outside a nested scope of another client.
 */
export function recordResponse(client: ApiClient, response: ApiResponse): void {
  for (let frame = storage.getStore(); frame; frame = frame.parent) {
    if (frame.client === client) {
      frame.lastResponse = response;
    }
  }
}
