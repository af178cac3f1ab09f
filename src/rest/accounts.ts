import type { HttpClient } from '../core/http-client.js';
import type { ApiResult } from '../types/common.js';
import { AccountInfoSchema } from '../types/trading.js';
import type { AccountInfo } from '../types/trading.js';
import { accountPath } from './query.js';

/**
 * Accounts REST API client
 */
export class AccountsApi {
  constructor(private readonly httpClient: HttpClient) {}

  /**
   * Balance, margin and open counts for the configured account
   */
  async getAccountInfo(): Promise<ApiResult<AccountInfo>> {
    return this.httpClient.get(accountPath(this.httpClient.config.accountId), AccountInfoSchema);
  }
}
