import { ApiClient } from './ApiClient';
import { scopedClient } from './session';

let instance: ApiClient | undefined;

/**
 * The lazily created client of the current thread. Module state is per
 * thread in Node.js: each worker thread gets its own client and pool.
 */
export function defaultClient(): ApiClient {
  instance ??= new ApiClient();
  return instance;
}

/**
 * The client bound by the innermost `runScoped`, or the default client.
 */
export function activeClient(): ApiClient {
  return scopedClient() ?? defaultClient();
}

/**
 * Drops the default client so the next call builds one from the current
 * config. The old client's pool is closed.
 */
export async function resetDefaultClient(): Promise<void> {
  const previous = instance;
  instance = undefined;
  await previous?.close();
}
