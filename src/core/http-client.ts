import { Agent, fetch as undiciFetch } from 'undici';
import type { z } from 'zod';
import { DecodeError, ErrorFactory } from '../errors/index.js';
import { silentLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import type {
  ApiResult,
  ClientConfig,
  ClientRuntimeOptions,
  FetchInit,
  FetchLike,
  FormBody,
  HeaderSet,
  HTTPMethod,
  HttpOutcome,
  JsonObject,
  RequestSpec,
} from '../types/common.js';

const defaultFetch: FetchLike = (url, init) => undiciFetch(url, init);

/**
 * HTTP adapter for the broker REST API.
 *
 * Holds the frozen header set and the connection pool; every call is a
 * single request with no retries and no status checks.
 */
export class HttpClient {
  public readonly config: ClientConfig;
  public readonly headers: HeaderSet;
  private readonly dispatcher: Agent;
  private readonly fetchImpl: FetchLike;
  private readonly logger: Logger;

  constructor(config: ClientConfig, options: ClientRuntimeOptions = {}) {
    this.config = config;
    this.headers = HttpClient.buildHeaders(config);
    this.fetchImpl = options.fetch ?? defaultFetch;
    this.logger = options.logger ?? silentLogger;

    this.dispatcher = new Agent({
      connect: {
        timeout: config.connectTimeout,
        rejectUnauthorized: !config.insecureSkipTlsVerify,
      },
    });

    if (config.insecureSkipTlsVerify) {
      this.logger.warn('TLS certificate verification is disabled', {
        baseUrl: config.baseUrl,
      });
    }
  }

  /**
   * Build the fixed header set sent with every request
   */
  static buildHeaders(config: Pick<ClientConfig, 'accessToken' | 'datetimeFormat'>): HeaderSet {
    return Object.freeze([
      Object.freeze(['Content-Type', 'application/x-www-form-urlencoded'] as const),
      Object.freeze(['X-Accept-Datetime-Format', config.datetimeFormat] as const),
      Object.freeze(['Authorization', `Bearer ${config.accessToken}`] as const),
    ]);
  }

  /**
   * Full URL for an API path
   */
  url(path: string): string {
    return `${this.config.baseUrl}${path}`;
  }

  /**
   * Dispatch primitive: one request, decoded JSON body or null.
   *
   * Broker errors (4xx/5xx) come back as their decoded body. Transport
   * failures and bodies that are not JSON objects come back as null.
   */
  async send(
    method: HTTPMethod,
    headers: HeaderSet,
    url: string,
    body?: FormBody
  ): Promise<JsonObject | null> {
    const outcome = await this.execute({ method, headers, url, body });
    return outcome.ok ? outcome.body : null;
  }

  /**
   * Dispatch a request and report transport and decode failures separately
   */
  async execute(request: RequestSpec): Promise<HttpOutcome> {
    const init: FetchInit = {
      method: request.method,
      headers: request.headers.map(([name, value]): [string, string] => [name, value]),
      signal: AbortSignal.timeout(this.config.timeout),
      dispatcher: this.dispatcher,
    };

    // Only POST carries a body
    if (request.method === 'POST' && request.body) {
      init.body = new URLSearchParams(request.body).toString();
    }

    this.logger.debug(`${request.method} ${request.url}`);

    let status: number;
    let text: string;
    try {
      const response = await this.fetchImpl(request.url, init);
      status = response.status;
      text = await response.text();
    } catch (error) {
      const transportError = ErrorFactory.fromFetchFailure(error, {
        url: request.url,
        method: request.method,
        timeout: this.config.timeout,
        connectTimeout: this.config.connectTimeout,
      });
      this.logger.warn(transportError.message, { url: request.url, method: request.method });
      return { ok: false, status: null, error: transportError };
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      const decodeError = new DecodeError('Response body is not valid JSON', {
        status,
        cause: error,
        details: { url: request.url, bodyLength: text.length },
      });
      this.logger.warn(decodeError.message, { url: request.url, status });
      return { ok: false, status, error: decodeError };
    }

    if (!isJsonObject(parsed)) {
      const decodeError = new DecodeError('Response body is not a JSON object', {
        status,
        details: { url: request.url },
      });
      this.logger.warn(decodeError.message, { url: request.url, status });
      return { ok: false, status, error: decodeError };
    }

    return { ok: true, status, body: parsed };
  }

  /**
   * Dispatch a request and validate a successful body against an endpoint schema
   */
  async call<T>(
    request: RequestSpec,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<ApiResult<T>> {
    const outcome = await this.execute(request);

    if (!outcome.ok) {
      return { success: false, status: outcome.status, error: outcome.error };
    }

    if (outcome.status >= 400) {
      return {
        success: false,
        status: outcome.status,
        error: ErrorFactory.fromBrokerResponse(outcome.status, outcome.body),
      };
    }

    const result = schema.safeParse(outcome.body);
    if (!result.success) {
      const issues = result.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      }));
      const decodeError = new DecodeError('Response does not match the expected shape', {
        status: outcome.status,
        issues,
        body: outcome.body,
        details: { url: request.url },
      });
      this.logger.warn(decodeError.message, { url: request.url, issues });
      return { success: false, status: outcome.status, error: decodeError };
    }

    return { success: true, status: outcome.status, data: result.data };
  }

  /**
   * GET request
   */
  async get<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<ApiResult<T>> {
    return this.call({ method: 'GET', url: this.url(path), headers: this.headers }, schema);
  }

  /**
   * POST request with a form body
   */
  async post<T>(
    path: string,
    body: FormBody,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<ApiResult<T>> {
    return this.call({ method: 'POST', url: this.url(path), headers: this.headers, body }, schema);
  }

  /**
   * DELETE request
   */
  async delete<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<ApiResult<T>> {
    return this.call({ method: 'DELETE', url: this.url(path), headers: this.headers }, schema);
  }

  /**
   * Close pooled connections
   */
  async close(): Promise<void> {
    await this.dispatcher.close();
  }
}

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
