import type { HttpClient } from '../core/http-client.js';
import type { ApiResult } from '../types/common.js';
import { TradeClosedSchema, TradeSchema, TradesResponseSchema } from '../types/trading.js';
import type { Trade, TradeClosed, TradesResponse } from '../types/trading.js';
import { accountPath, buildListQuery, checkId, rejected, segment } from './query.js';
import type { ListQuery } from './query.js';

/**
 * Trades REST API client
 */
export class TradesApi {
  constructor(private readonly httpClient: HttpClient) {}

  /**
   * Open trades, optionally for one instrument
   */
  async listOpenTrades(query: ListQuery = {}): Promise<ApiResult<TradesResponse>> {
    return this.httpClient.get(`${this.basePath()}/trades?${buildListQuery(query)}`, TradesResponseSchema);
  }

  async getTrade(tradeId: string | number): Promise<ApiResult<Trade>> {
    const invalid = checkId(tradeId, 'tradeId');
    if (invalid) {
      return rejected(invalid);
    }

    return this.httpClient.get(`${this.basePath()}/trades/${segment(tradeId)}`, TradeSchema);
  }

  /**
   * Close an open trade at market
   */
  async closeTrade(tradeId: string | number): Promise<ApiResult<TradeClosed>> {
    const invalid = checkId(tradeId, 'tradeId');
    if (invalid) {
      return rejected(invalid);
    }

    return this.httpClient.delete(`${this.basePath()}/trades/${segment(tradeId)}`, TradeClosedSchema);
  }

  private basePath(): string {
    return accountPath(this.httpClient.config.accountId);
  }
}
