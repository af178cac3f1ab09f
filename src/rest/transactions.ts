import type { HttpClient } from '../core/http-client.js';
import type { ApiResult } from '../types/common.js';
import { TransactionSchema, TransactionsResponseSchema } from '../types/trading.js';
import type { Transaction, TransactionsResponse } from '../types/trading.js';
import { accountPath, buildListQuery, checkId, rejected, segment } from './query.js';
import type { ListQuery } from './query.js';

/**
 * Transaction history REST API client.
 *
 * Every transaction carries id, accountId, time and type; the remaining
 * fields depend on the type and are passed through untouched.
 */
export class TransactionsApi {
  constructor(private readonly httpClient: HttpClient) {}

  async listTransactions(query: ListQuery = {}): Promise<ApiResult<TransactionsResponse>> {
    return this.httpClient.get(
      `${this.basePath()}/transactions?${buildListQuery(query)}`,
      TransactionsResponseSchema
    );
  }

  async getTransaction(transactionId: string | number): Promise<ApiResult<Transaction>> {
    const invalid = checkId(transactionId, 'transactionId');
    if (invalid) {
      return rejected(invalid);
    }

    return this.httpClient.get(
      `${this.basePath()}/transactions/${segment(transactionId)}`,
      TransactionSchema
    );
  }

  private basePath(): string {
    return accountPath(this.httpClient.config.accountId);
  }
}
