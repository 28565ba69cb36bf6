import { ApiClient, type ApiClientOptions } from './ApiClient';
import { loadConfigFromEnv, type ClientConfig } from './config';

/**
 * Builds a client from `RESTWELL_*` environment variables.
 *
 * @example
 * ```typescript
 * const client = createApiClientFromEnv();
 * const { result } = await client.request(() => Episode.retrieve(1));
 * ```
 */
export function createApiClientFromEnv(
  overrides: Partial<ClientConfig> = {},
  options: Omit<ApiClientOptions, 'config'> = {},
): ApiClient {
  return new ApiClient({ ...options, config: loadConfigFromEnv(process.env, overrides) });
}
