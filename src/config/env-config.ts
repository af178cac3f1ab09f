/**
 * Environment variable configuration helper
 * Lets deployments supply credentials and settings without code changes
 */

import { ConfigurationError } from '../errors/index.js';
import { DatetimeFormatSchema, EnvironmentSchema } from '../types/common.js';
import type { ClientConfigInput } from '../types/common.js';

type Env = Record<string, string | undefined>;

/**
 * External credential object: `api` base URL, `token`, `account`
 */
export interface Credentials {
  api?: string;
  token?: string;
  account?: string | number;
}

/**
 * Load client configuration from environment variables
 */
export function loadConfigFromEnv(env: Env = process.env): Partial<ClientConfigInput> {
  const config: Partial<ClientConfigInput> = {};

  if (env.FXTRADE_API_URL) {
    config.baseUrl = env.FXTRADE_API_URL;
  }

  if (env.FXTRADE_ENVIRONMENT) {
    const environment = EnvironmentSchema.safeParse(env.FXTRADE_ENVIRONMENT);
    if (!environment.success) {
      throw new ConfigurationError(
        `FXTRADE_ENVIRONMENT must be one of ${EnvironmentSchema.options.join(', ')}`,
        ['environment']
      );
    }
    config.environment = environment.data;
  }

  if (env.FXTRADE_ACCESS_TOKEN) {
    config.accessToken = env.FXTRADE_ACCESS_TOKEN;
  }

  if (env.FXTRADE_ACCOUNT_ID) {
    config.accountId = env.FXTRADE_ACCOUNT_ID;
  }

  if (env.FXTRADE_DATETIME_FORMAT) {
    const format = DatetimeFormatSchema.safeParse(env.FXTRADE_DATETIME_FORMAT.toUpperCase());
    if (!format.success) {
      throw new ConfigurationError(
        `FXTRADE_DATETIME_FORMAT must be one of ${DatetimeFormatSchema.options.join(', ')}`,
        ['datetimeFormat']
      );
    }
    config.datetimeFormat = format.data;
  }

  if (env.FXTRADE_CONNECT_TIMEOUT) {
    config.connectTimeout = parseMillis(env.FXTRADE_CONNECT_TIMEOUT, 'connectTimeout');
  }

  if (env.FXTRADE_TIMEOUT) {
    config.timeout = parseMillis(env.FXTRADE_TIMEOUT, 'timeout');
  }

  if (env.FXTRADE_INSECURE_SKIP_TLS_VERIFY) {
    config.insecureSkipTlsVerify = parseFlag(
      env.FXTRADE_INSECURE_SKIP_TLS_VERIFY,
      'FXTRADE_INSECURE_SKIP_TLS_VERIFY',
      'insecureSkipTlsVerify'
    );
  }

  return config;
}

/**
 * Create client configuration with environment overrides
 */
export function createConfigWithEnv(
  baseConfig: Partial<ClientConfigInput> = {},
  env: Env = process.env
): ClientConfigInput {
  const merged: Partial<ClientConfigInput> = {
    ...baseConfig,
    ...loadConfigFromEnv(env),
  };

  const missing: string[] = [];
  if (!merged.accessToken) missing.push('accessToken');
  if (!merged.accountId) missing.push('accountId');
  if (!merged.baseUrl && !merged.environment) missing.push('baseUrl');

  if (merged.accessToken === undefined || merged.accountId === undefined || missing.length > 0) {
    throw new ConfigurationError(
      `Missing configuration: ${missing.join(', ')}. Set FXTRADE_ACCESS_TOKEN, FXTRADE_ACCOUNT_ID and FXTRADE_API_URL or FXTRADE_ENVIRONMENT.`,
      missing
    );
  }

  return {
    ...merged,
    accessToken: merged.accessToken,
    accountId: merged.accountId,
  };
}

/**
 * Map an `{ api, token, account }` credential object onto client configuration
 */
export function configFromCredentials(credentials: Credentials): ClientConfigInput {
  const missing = (['api', 'token', 'account'] as const).filter((key) => {
    const value = credentials[key];
    return value === undefined || String(value).trim() === '';
  });

  if (missing.length > 0) {
    throw new ConfigurationError(`Missing credential: ${missing.join(', ')}`, [...missing]);
  }

  return {
    baseUrl: credentials.api,
    accessToken: credentials.token ?? '',
    accountId: String(credentials.account ?? ''),
  };
}

function parseMillis(value: string, field: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new ConfigurationError(`${field} must be a number of milliseconds`, [field]);
  }
  return parsed;
}

function parseFlag(value: string, variable: string, field: string): boolean {
  switch (value.trim().toLowerCase()) {
    case 'true':
      return true;
    case 'false':
      return false;
    default:
      throw new ConfigurationError(`${variable} must be true or false`, [field]);
  }
}
