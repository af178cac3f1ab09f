import { z } from 'zod';
import type { Dispatcher } from 'undici';
import type { BrokerError, DecodeError, TransportError, ValidationError } from '../errors/index.js';
import type { Logger } from '../utils/logger.js';

/**
 * Environment types for API endpoints
 */
export const EnvironmentSchema = z.enum(['practice', 'live']);
export type Environment = z.infer<typeof EnvironmentSchema>;

/**
 * Value sent in the X-Accept-Datetime-Format header
 */
export const DatetimeFormatSchema = z.enum(['UNIX', 'RFC3339']);
export type DatetimeFormat = z.infer<typeof DatetimeFormatSchema>;

const requiredString = (field: string) =>
  z.string({ required_error: `${field} is required` }).trim().min(1, `${field} must not be empty`);

/**
 * SDK configuration
 */
export const ClientConfigSchema = z
  .object({
    environment: EnvironmentSchema.optional(),
    baseUrl: z.string().url().optional(),
    accessToken: requiredString('accessToken'),
    accountId: requiredString('accountId').refine(
      (value) => value !== '.' && value !== '..',
      'accountId must not be a dot segment'
    ),
    datetimeFormat: DatetimeFormatSchema.default('UNIX'),
    connectTimeout: z.number().int().min(100).max(60000).default(5000),
    timeout: z.number().int().min(100).max(120000).default(10000),
    insecureSkipTlsVerify: z.boolean().default(false),
  })
  .refine((config) => config.baseUrl !== undefined || config.environment !== undefined, {
    message: 'baseUrl is required when no environment is given',
    path: ['baseUrl'],
  });

export type ClientConfigInput = z.input<typeof ClientConfigSchema>;

/**
 * Resolved, immutable client configuration
 */
export interface ClientConfig {
  readonly baseUrl: string;
  readonly accessToken: string;
  readonly accountId: string;
  readonly datetimeFormat: DatetimeFormat;
  readonly connectTimeout: number;
  readonly timeout: number;
  readonly insecureSkipTlsVerify: boolean;
}

/**
 * HTTP methods used by the broker API
 */
export const HTTPMethodSchema = z.enum(['GET', 'POST', 'DELETE']);
export type HTTPMethod = z.infer<typeof HTTPMethodSchema>;

/**
 * A single header as a name/value pair
 */
export type Header = readonly [name: string, value: string];

/**
 * Ordered, immutable header set sent with every request
 */
export type HeaderSet = ReadonlyArray<Header>;

/**
 * Form fields for POST bodies
 */
export type FormBody = Readonly<Record<string, string>>;

/**
 * Transient description of one request
 */
export interface RequestSpec {
  method: HTTPMethod;
  url: string;
  headers: HeaderSet;
  body?: FormBody;
}

/**
 * JSON values as produced by JSON.parse
 */
export type JsonValue = string | number | boolean | null | JsonValue[] | JsonObject;
export type JsonObject = { [key: string]: JsonValue };

/**
 * Minimal response surface the HTTP adapter reads
 */
export interface FetchResponse {
  readonly status: number;
  readonly ok: boolean;
  readonly headers: { get(name: string): string | null };
  text(): Promise<string>;
}

/**
 * Options handed to the fetch implementation
 */
export interface FetchInit {
  method: HTTPMethod;
  headers: Array<[string, string]>;
  body?: string;
  signal: AbortSignal;
  dispatcher?: Dispatcher;
}

/**
 * Fetch implementation the HTTP adapter calls; undici's fetch by default
 */
export type FetchLike = (url: string, init: FetchInit) => Promise<FetchResponse>;

/**
 * Options that are not plain data and so stay outside the schema
 */
export interface ClientRuntimeOptions {
  logger?: Logger;
  fetch?: FetchLike;
}

/**
 * Outcome of a single dispatch, before any endpoint schema is applied
 */
export type HttpOutcome =
  | { ok: true; status: number; body: JsonObject }
  | { ok: false; status: number | null; error: TransportError | DecodeError };

/**
 * Result returned by every endpoint method
 */
export type ApiResult<T> =
  | { success: true; status: number; data: T }
  | { success: false; status: number; error: BrokerError }
  | { success: false; status: number | null; error: TransportError | DecodeError | ValidationError };
