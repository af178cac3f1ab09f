import { ConfigurationError } from '../errors/index.js';
import { ClientConfigSchema } from '../types/common.js';
import type { ClientConfig, ClientConfigInput, Environment } from '../types/common.js';

/**
 * Default REST hosts per environment
 */
export const DEFAULT_BASE_URLS: Readonly<Record<Environment, string>> = {
  practice: 'https://api-fxpractice.oanda.com',
  live: 'https://api-fxtrade.oanda.com',
};

/**
 * Validate raw configuration and resolve defaults.
 *
 * An explicit `baseUrl` wins over `environment`. Throws ConfigurationError
 * naming every missing or invalid field.
 */
export function resolveClientConfig(input: ClientConfigInput): ClientConfig {
  const result = ClientConfigSchema.safeParse(input);

  if (!result.success) {
    const fields = [...new Set(result.error.issues.map((issue) => issue.path.join('.')))];
    const messages = result.error.issues.map((issue) => issue.message);
    throw new ConfigurationError(`Invalid client configuration: ${messages.join('; ')}`, fields);
  }

  const parsed = result.data;
  const baseUrl = parsed.baseUrl ?? DEFAULT_BASE_URLS[parsed.environment ?? 'practice'];

  return Object.freeze({
    baseUrl: baseUrl.replace(/\/+$/, ''),
    accessToken: parsed.accessToken,
    accountId: parsed.accountId,
    datetimeFormat: parsed.datetimeFormat,
    connectTimeout: parsed.connectTimeout,
    timeout: parsed.timeout,
    insecureSkipTlsVerify: parsed.insecureSkipTlsVerify,
  });
}
