import { resolveClientConfig } from './config/client-config.js';
import { HttpClient } from './core/http-client.js';
import { AccountsApi } from './rest/accounts.js';
import { OrdersApi } from './rest/orders.js';
import { PositionsApi } from './rest/positions.js';
import { PricesApi } from './rest/prices.js';
import { TradesApi } from './rest/trades.js';
import { TransactionsApi } from './rest/transactions.js';
import type { ListQuery } from './rest/query.js';
import type {
  ApiResult,
  ClientConfig,
  ClientConfigInput,
  ClientRuntimeOptions,
  FormBody,
  HeaderSet,
  HTTPMethod,
  JsonObject,
} from './types/common.js';
import type {
  AccountInfo,
  Order,
  OrderClosed,
  OrderCreated,
  OrderRequest,
  OrdersResponse,
  PositionsResponse,
  PricesResponse,
  Trade,
  TradeClosed,
  TradesResponse,
  Transaction,
  TransactionsResponse,
} from './types/trading.js';

/**
 * Combined SDK configuration
 */
export type FxTradeClientConfig = ClientConfigInput & ClientRuntimeOptions;

/**
 * Main fxTrade SDK client
 */
export class FxTradeClient {
  public readonly config: ClientConfig;
  public readonly http: HttpClient;
  public readonly prices: PricesApi;
  public readonly accounts: AccountsApi;
  public readonly orders: OrdersApi;
  public readonly trades: TradesApi;
  public readonly positions: PositionsApi;
  public readonly transactions: TransactionsApi;

  constructor(config: FxTradeClientConfig) {
    const { logger, fetch, ...settings } = config;

    // Throws ConfigurationError on missing or empty credentials
    this.config = resolveClientConfig(settings);

    this.http = new HttpClient(this.config, { logger, fetch });

    this.prices = new PricesApi(this.http);
    this.accounts = new AccountsApi(this.http);
    this.orders = new OrdersApi(this.http);
    this.trades = new TradesApi(this.http);
    this.positions = new PositionsApi(this.http);
    this.transactions = new TransactionsApi(this.http);
  }

  /**
   * Headers sent with every request
   */
  get headers(): HeaderSet {
    return this.http.headers;
  }

  /**
   * Raw dispatch: decoded JSON body, or null on transport or decode failure
   */
  send(method: HTTPMethod, headers: HeaderSet, url: string, body?: FormBody): Promise<JsonObject | null> {
    return this.http.send(method, headers, url, body);
  }

  getPrices(instruments: readonly string[]): Promise<ApiResult<PricesResponse>> {
    return this.prices.getPrices(instruments);
  }

  getAccountInfo(): Promise<ApiResult<AccountInfo>> {
    return this.accounts.getAccountInfo();
  }

  createOrder(request: OrderRequest): Promise<ApiResult<OrderCreated>> {
    return this.orders.createOrder(request);
  }

  listOrders(query?: ListQuery): Promise<ApiResult<OrdersResponse>> {
    return this.orders.listOrders(query);
  }

  getOrder(orderId: string | number): Promise<ApiResult<Order>> {
    return this.orders.getOrder(orderId);
  }

  closeOrder(orderId: string | number): Promise<ApiResult<OrderClosed>> {
    return this.orders.closeOrder(orderId);
  }

  listOpenTrades(query?: ListQuery): Promise<ApiResult<TradesResponse>> {
    return this.trades.listOpenTrades(query);
  }

  getTrade(tradeId: string | number): Promise<ApiResult<Trade>> {
    return this.trades.getTrade(tradeId);
  }

  closeTrade(tradeId: string | number): Promise<ApiResult<TradeClosed>> {
    return this.trades.closeTrade(tradeId);
  }

  listPositions(instrument?: string): Promise<ApiResult<PositionsResponse>> {
    return this.positions.listPositions(instrument);
  }

  listTransactions(query?: ListQuery): Promise<ApiResult<TransactionsResponse>> {
    return this.transactions.listTransactions(query);
  }

  getTransaction(transactionId: string | number): Promise<ApiResult<Transaction>> {
    return this.transactions.getTransaction(transactionId);
  }

  /**
   * Release pooled connections
   */
  async destroy(): Promise<void> {
    await this.http.close();
  }
}

/**
 * Factory function to create a client with validation
 */
export function createFxTradeClient(config: FxTradeClientConfig): FxTradeClient {
  return new FxTradeClient(config);
}

/**
 * Client against the practice (demo) host
 */
export function createPracticeClient(
  credentials: Pick<ClientConfigInput, 'accessToken' | 'accountId'>,
  options: Omit<FxTradeClientConfig, 'accessToken' | 'accountId' | 'environment' | 'baseUrl'> = {}
): FxTradeClient {
  return createFxTradeClient({ ...options, ...credentials, environment: 'practice' });
}

/**
 * Client against the live trading host
 */
export function createLiveClient(
  credentials: Pick<ClientConfigInput, 'accessToken' | 'accountId'>,
  options: Omit<FxTradeClientConfig, 'accessToken' | 'accountId' | 'environment' | 'baseUrl'> = {}
): FxTradeClient {
  return createFxTradeClient({ ...options, ...credentials, environment: 'live' });
}
