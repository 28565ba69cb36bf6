import { readFileSync } from 'fs';
import { z, type ZodError } from 'zod';
import { ConfigurationError } from './errors/errors';

export const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

export const apiBaseSchema = z.string().url();

export const configSchema = z
  .object({
    apiBase: apiBaseSchema,
    apiVersion: z.string().min(1).optional(),
    apiKey: z.string().optional(),
    proxy: z.string().url().optional(),
    verifySslCerts: z.boolean(),
    /** PEM-encoded certificates trusted instead of the system store. */
    caBundle: z.string().optional(),
    openTimeoutMs: z.number().int().positive(),
    readTimeoutMs: z.number().int().positive(),
    maxNetworkRetries: z.number().int().nonnegative(),
    initialNetworkRetryDelayMs: z.number().int().nonnegative(),
    maxNetworkRetryDelayMs: z.number().int().nonnegative(),
    logLevel: logLevelSchema,
  })
  .refine((config) => config.initialNetworkRetryDelayMs <= config.maxNetworkRetryDelayMs, {
    message: 'must not exceed maxNetworkRetryDelayMs',
    path: ['initialNetworkRetryDelayMs'],
  });

export type ClientConfig = z.infer<typeof configSchema>;

export const DEFAULT_CONFIG: ClientConfig = {
  apiBase: 'https://api.restwell.dev',
  apiVersion: 'v1',
  verifySslCerts: true,
  openTimeoutMs: 30_000,
  readTimeoutMs: 80_000,
  maxNetworkRetries: 0,
  initialNetworkRetryDelayMs: 500,
  maxNetworkRetryDelayMs: 2_000,
  logLevel: 'error',
};

function formatIssues(error: ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

export function parseConfig(input: unknown): ClientConfig {
  const result = configSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(`Invalid Restwell configuration: ${formatIssues(result.error)}`, {
      cause: result.error,
    });
  }
  return result.data;
}

/**
 * Checks a per-call `apiBase` override, which bypasses `parseConfig`.
 */
export function invalidApiBaseError(apiBase: string): ConfigurationError | undefined {
  const result = apiBaseSchema.safeParse(apiBase);
  if (result.success) {
    return undefined;
  }
  const reason = result.error.issues.map((issue) => issue.message).join('; ');
  return new ConfigurationError(`Invalid Restwell apiBase "${apiBase}": ${reason}`, { cause: result.error });
}

// ============================================================================
// Environment
// ============================================================================

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  RESTWELL_API_BASE: z.string().optional(),
  RESTWELL_API_VERSION: z.string().optional(),
  RESTWELL_API_KEY: z.string().optional(),
  RESTWELL_PROXY: z.string().optional(),
  RESTWELL_VERIFY_SSL_CERTS: booleanFlag.optional(),
  RESTWELL_CA_BUNDLE_PATH: z.string().optional(),
  RESTWELL_OPEN_TIMEOUT_MS: z.coerce.number().optional(),
  RESTWELL_READ_TIMEOUT_MS: z.coerce.number().optional(),
  RESTWELL_MAX_NETWORK_RETRIES: z.coerce.number().optional(),
  RESTWELL_INITIAL_NETWORK_RETRY_DELAY_MS: z.coerce.number().optional(),
  RESTWELL_MAX_NETWORK_RETRY_DELAY_MS: z.coerce.number().optional(),
  RESTWELL_LOG_LEVEL: logLevelSchema.optional(),
});

function withoutEmpty(env: NodeJS.ProcessEnv): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (key.startsWith('RESTWELL_') && value !== undefined && value.trim() !== '') {
      result[key] = value.trim();
    }
  }
  return result;
}

function definedOnly(values: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
}

function readCaBundle(path: string): string {
  try {
    return readFileSync(path, 'utf8');
  } catch (error) {
    throw new ConfigurationError(`Could not read CA bundle at ${path}`, { cause: error });
  }
}

/**
 * Builds a config from `RESTWELL_*` environment variables on top of the
 * defaults. `overrides` win over the environment; blank variables are ignored.
 */
export function loadConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<ClientConfig> = {},
): ClientConfig {
  const parsed = envSchema.safeParse(withoutEmpty(env));
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid Restwell environment: ${formatIssues(parsed.error)}`, {
      cause: parsed.error,
    });
  }
  const vars = parsed.data;

  const fromEnv = definedOnly({
    apiBase: vars.RESTWELL_API_BASE,
    apiVersion: vars.RESTWELL_API_VERSION,
    apiKey: vars.RESTWELL_API_KEY,
    proxy: vars.RESTWELL_PROXY,
    verifySslCerts: vars.RESTWELL_VERIFY_SSL_CERTS,
    caBundle: vars.RESTWELL_CA_BUNDLE_PATH ? readCaBundle(vars.RESTWELL_CA_BUNDLE_PATH) : undefined,
    openTimeoutMs: vars.RESTWELL_OPEN_TIMEOUT_MS,
    readTimeoutMs: vars.RESTWELL_READ_TIMEOUT_MS,
    maxNetworkRetries: vars.RESTWELL_MAX_NETWORK_RETRIES,
    initialNetworkRetryDelayMs: vars.RESTWELL_INITIAL_NETWORK_RETRY_DELAY_MS,
    maxNetworkRetryDelayMs: vars.RESTWELL_MAX_NETWORK_RETRY_DELAY_MS,
    logLevel: vars.RESTWELL_LOG_LEVEL,
  });

  return parseConfig({ ...DEFAULT_CONFIG, ...fromEnv, ...overrides });
}

// ============================================================================
// Process-wide settings
// ============================================================================

let globalConfig: ClientConfig = DEFAULT_CONFIG;

/**
 * Validates `partial` on top of the current settings and makes the result the
 * process-wide config read by clients created afterwards.
 */
export function configure(partial: Partial<ClientConfig>): ClientConfig {
  globalConfig = parseConfig({ ...globalConfig, ...partial });
  return globalConfig;
}

export function getConfig(): ClientConfig {
  return globalConfig;
}

export function resetConfig(): void {
  globalConfig = DEFAULT_CONFIG;
}
