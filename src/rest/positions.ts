import type { HttpClient } from '../core/http-client.js';
import type { ApiResult } from '../types/common.js';
import { PositionsResponseSchema } from '../types/trading.js';
import type { PositionsResponse } from '../types/trading.js';
import { accountPath, checkId, rejected, segment } from './query.js';

/**
 * Positions REST API client
 */
export class PositionsApi {
  constructor(private readonly httpClient: HttpClient) {}

  /**
   * Open positions for every instrument, or for one.
   *
   * Without an instrument the path still ends in `/positions/`.
   */
  async listPositions(instrument = ''): Promise<ApiResult<PositionsResponse>> {
    if (instrument) {
      const invalid = checkId(instrument, 'instrument');
      if (invalid) {
        return rejected(invalid);
      }
    }

    const suffix = instrument ? segment(instrument) : '';
    const path = `${accountPath(this.httpClient.config.accountId)}/positions/${suffix}`;

    return this.httpClient.get(path, PositionsResponseSchema);
  }
}
