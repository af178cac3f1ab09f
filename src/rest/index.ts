/**
 * REST API module exports
 */

export { PricesApi } from './prices.js';
export { AccountsApi } from './accounts.js';
export { OrdersApi, encodeOrderRequest } from './orders.js';
export { TradesApi } from './trades.js';
export { PositionsApi } from './positions.js';
export { TransactionsApi } from './transactions.js';
export { MAX_COUNT, DEFAULT_COUNT, clampCount, buildListQuery } from './query.js';

export type { ListQuery } from './query.js';
