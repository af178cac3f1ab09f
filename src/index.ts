/**
 * fxTrade TypeScript SDK
 *
 * Typed bindings for the broker's v1 REST trading API:
 * - Prices, account, orders, trades, positions and transactions
 * - Validated order requests
 * - Per-endpoint response schemas with unknown-field passthrough
 * - Errors returned as values, never retried
 */

import { FxTradeClient as FxTradeClientDefault } from './client.js';

// Main client
export {
  FxTradeClient,
  createFxTradeClient,
  createPracticeClient,
  createLiveClient,
  type FxTradeClientConfig,
} from './client.js';

// Core HTTP client
export { HttpClient } from './core/http-client.js';

// Configuration
export { resolveClientConfig, DEFAULT_BASE_URLS } from './config/client-config.js';
export {
  loadConfigFromEnv,
  createConfigWithEnv,
  configFromCredentials,
  type Credentials,
} from './config/env-config.js';

// REST API modules
export {
  PricesApi,
  AccountsApi,
  OrdersApi,
  TradesApi,
  PositionsApi,
  TransactionsApi,
  encodeOrderRequest,
  MAX_COUNT,
  DEFAULT_COUNT,
  clampCount,
  buildListQuery,
  type ListQuery,
} from './rest/index.js';

// Schemas
export {
  InstrumentSchema,
  BrokerTimeSchema,
  BrokerErrorBodySchema,
  OrderRequestSchema,
  MarketOrderRequestSchema,
  PendingOrderRequestSchema,
  PricesResponseSchema,
  AccountInfoSchema,
  OrderSchema,
  OrdersResponseSchema,
  OrderCreatedSchema,
  OrderClosedSchema,
  TradeSchema,
  TradesResponseSchema,
  TradeClosedSchema,
  PositionSchema,
  PositionsResponseSchema,
  TransactionSchema,
  TransactionsResponseSchema,
} from './types/trading.js';

// Type definitions
export type {
  Environment,
  DatetimeFormat,
  ClientConfig,
  ClientConfigInput,
  ClientRuntimeOptions,
  HTTPMethod,
  Header,
  HeaderSet,
  FormBody,
  RequestSpec,
  JsonValue,
  JsonObject,
  FetchLike,
  FetchInit,
  FetchResponse,
  HttpOutcome,
  ApiResult,
} from './types/common.js';

export type {
  Instrument,
  BrokerTime,
  BrokerErrorBody,
  OrderSide,
  OrderType,
  Price,
  PricesResponse,
  AccountInfo,
  MarketOrderRequest,
  PendingOrderRequest,
  OrderRequest,
  Order,
  OrdersResponse,
  OrderCreated,
  OrderClosed,
  Trade,
  TradesResponse,
  TradeClosed,
  Position,
  PositionsResponse,
  Transaction,
  TransactionsResponse,
} from './types/trading.js';

// Error classes
export {
  FxError,
  ConfigurationError,
  ValidationError,
  TransportError,
  TimeoutError,
  DecodeError,
  BrokerError,
  ErrorFactory,
  // Type guards
  isConfigurationError,
  isValidationError,
  isTransportError,
  isTimeoutError,
  isDecodeError,
  isBrokerError,
} from './errors/index.js';

// Utilities
export { TimestampUtils, parseBrokerTime } from './utils/time.js';
export { consoleLogger, silentLogger, type Logger } from './utils/logger.js';

// Version information
export const VERSION = '1.0.0';

/**
 * Default export for convenience
 */
export default FxTradeClientDefault;
