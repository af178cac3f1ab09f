import type { HttpClient } from '../core/http-client.js';
import { ErrorFactory } from '../errors/index.js';
import type { ApiResult } from '../types/common.js';
import { InstrumentSchema, PricesResponseSchema } from '../types/trading.js';
import type { PricesResponse } from '../types/trading.js';
import { rejected } from './query.js';

// URL-encoded comma between instruments
const INSTRUMENT_SEPARATOR = '%2C';

/**
 * Prices REST API client
 */
export class PricesApi {
  constructor(private readonly httpClient: HttpClient) {}

  /**
   * Current bid/ask for one or more instruments.
   *
   * An empty list is rejected without sending anything.
   */
  async getPrices(instruments: readonly string[]): Promise<ApiResult<PricesResponse>> {
    if (instruments.length === 0) {
      return rejected(
        ErrorFactory.fromValidationIssues([
          { field: 'instruments', message: 'At least one instrument is required' },
        ])
      );
    }

    const invalid = instruments.filter((instrument) => !InstrumentSchema.safeParse(instrument).success);
    if (invalid.length > 0) {
      return rejected(
        ErrorFactory.fromValidationIssues(
          invalid.map((instrument) => ({
            field: 'instruments',
            message: `Invalid instrument "${instrument}", expected XXX_YYY`,
          }))
        )
      );
    }

    const list = instruments.join(INSTRUMENT_SEPARATOR);
    return this.httpClient.get(`/v1/prices?instruments=${list}`, PricesResponseSchema);
  }
}
