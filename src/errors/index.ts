import { BrokerErrorBodySchema } from '../types/trading.js';
import type { JsonObject } from '../types/common.js';

/**
 * Base error class for all fxTrade SDK errors
 */
export abstract class FxError extends Error {
  public override readonly name: string;
  public readonly timestamp: number;
  public readonly code?: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    options: {
      code?: string;
      details?: Record<string, unknown>;
      cause?: unknown;
    } = {}
  ) {
    super(message);
    this.name = this.constructor.name;
    this.timestamp = Date.now();
    this.code = options.code;
    this.details = options.details;

    if (options.cause !== undefined) {
      this.cause = options.cause;
    }

    // Ensure the prototype chain is maintained
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Serialize error to JSON
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      timestamp: this.timestamp,
      details: this.details,
      stack: this.stack,
    };
  }
}

/**
 * Configuration validation errors
 */
export class ConfigurationError extends FxError {
  public readonly fields: string[];

  constructor(message: string, fields: string[] = [], details?: Record<string, unknown>) {
    super(message, { code: 'CONFIG_ERROR', details: { ...details, fields } });
    this.fields = fields;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      fields: this.fields,
    };
  }
}

/**
 * Request validation errors, raised before anything is sent
 */
export class ValidationError extends FxError {
  public readonly field?: string;
  public readonly errors: Array<{ field?: string; message: string }>;

  constructor(
    message: string,
    errors: Array<{ field?: string; message: string }> = [],
    field?: string
  ) {
    super(message, { code: 'VALIDATION_ERROR', details: { field, errors } });
    this.field = field;
    this.errors = errors;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      field: this.field,
      errors: this.errors,
    };
  }
}

/**
 * Connection, TLS and socket level failures
 */
export class TransportError extends FxError {
  public readonly url?: string;
  public readonly method?: string;

  constructor(
    message: string,
    options: {
      url?: string;
      method?: string;
      code?: string;
      details?: Record<string, unknown>;
      cause?: unknown;
    } = {}
  ) {
    super(message, {
      code: options.code ?? 'TRANSPORT_ERROR',
      details: options.details,
      cause: options.cause,
    });
    this.url = options.url;
    this.method = options.method;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      url: this.url,
      method: this.method,
    };
  }
}

/**
 * Total request timeout elapsed
 */
export class TimeoutError extends TransportError {
  public readonly timeout: number;

  constructor(
    message: string,
    timeout: number,
    options: { url?: string; method?: string; cause?: unknown } = {}
  ) {
    super(message, { ...options, code: 'TIMEOUT_ERROR' });
    this.timeout = timeout;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      timeout: this.timeout,
    };
  }
}

/**
 * Response body could not be decoded into the expected shape.
 *
 * When the body was valid JSON but did not match the endpoint schema, the
 * decoded object is kept on `body`.
 */
export class DecodeError extends FxError {
  public readonly status?: number;
  public readonly issues: Array<{ path: string; message: string }>;
  public readonly body?: JsonObject;

  constructor(
    message: string,
    options: {
      status?: number;
      issues?: Array<{ path: string; message: string }>;
      body?: JsonObject;
      details?: Record<string, unknown>;
      cause?: unknown;
    } = {}
  ) {
    super(message, { code: 'DECODE_ERROR', details: options.details, cause: options.cause });
    this.status = options.status;
    this.issues = options.issues ?? [];
    this.body = options.body;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      status: this.status,
      issues: this.issues,
      body: this.body,
    };
  }
}

/**
 * Error reported by the broker in a 4xx/5xx response body.
 *
 * The decoded body is kept verbatim on `body`; `brokerCode`, `message` and
 * `moreInfo` are lifted from it when present.
 */
export class BrokerError extends FxError {
  public readonly status: number;
  public readonly brokerCode?: number;
  public readonly moreInfo?: string;
  public readonly body: Record<string, unknown>;

  constructor(
    message: string,
    options: {
      status: number;
      brokerCode?: number;
      moreInfo?: string;
      body: Record<string, unknown>;
    }
  ) {
    super(message, { code: 'BROKER_ERROR', details: { status: options.status } });
    this.status = options.status;
    this.brokerCode = options.brokerCode;
    this.moreInfo = options.moreInfo;
    this.body = options.body;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      status: this.status,
      brokerCode: this.brokerCode,
      moreInfo: this.moreInfo,
      body: this.body,
    };
  }
}

/**
 * Error factory for mapping raw failures onto the SDK error types
 */
export class ErrorFactory {
  static fromBrokerResponse(status: number, body: Record<string, unknown>): BrokerError {
    const parsed = BrokerErrorBodySchema.safeParse(body);
    if (!parsed.success) {
      return new BrokerError(`HTTP ${status}`, { status, body });
    }

    return new BrokerError(parsed.data.message, {
      status,
      brokerCode: parsed.data.code,
      moreInfo: parsed.data.moreInfo,
      body,
    });
  }

  static fromFetchFailure(
    error: unknown,
    request: { url: string; method: string; timeout: number; connectTimeout: number }
  ): TransportError {
    if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
      return new TimeoutError(`Request timed out after ${request.timeout}ms`, request.timeout, {
        url: request.url,
        method: request.method,
        cause: error,
      });
    }

    // undici reports socket failures as TypeError('fetch failed') with the real reason as cause
    const cause = error instanceof Error && error.cause instanceof Error ? error.cause : undefined;
    if (cause && 'code' in cause && cause.code === 'UND_ERR_CONNECT_TIMEOUT') {
      return new TimeoutError(
        `Connection timed out after ${request.connectTimeout}ms`,
        request.connectTimeout,
        { url: request.url, method: request.method, cause: error }
      );
    }

    const reason = cause?.message ?? (error instanceof Error ? error.message : String(error));
    return new TransportError(`Network request failed: ${reason}`, {
      url: request.url,
      method: request.method,
      cause: error,
    });
  }

  static fromValidationIssues(errors: Array<{ field?: string; message: string }>): ValidationError {
    const message = errors.length === 1
      ? errors[0]?.message ?? 'Validation failed'
      : `Validation failed with ${errors.length} errors`;

    return new ValidationError(message, errors, errors.length === 1 ? errors[0]?.field : undefined);
  }
}

/**
 * Type guard functions for error types
 */
export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError;
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}

export function isTransportError(error: unknown): error is TransportError {
  return error instanceof TransportError;
}

export function isTimeoutError(error: unknown): error is TimeoutError {
  return error instanceof TimeoutError;
}

export function isDecodeError(error: unknown): error is DecodeError {
  return error instanceof DecodeError;
}

export function isBrokerError(error: unknown): error is BrokerError {
  return error instanceof BrokerError;
}
