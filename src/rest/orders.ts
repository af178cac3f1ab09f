import type { HttpClient } from '../core/http-client.js';
import { ErrorFactory } from '../errors/index.js';
import type { ApiResult, FormBody } from '../types/common.js';
import {
  OrderClosedSchema,
  OrderCreatedSchema,
  OrderRequestSchema,
  OrderSchema,
  OrdersResponseSchema,
} from '../types/trading.js';
import type {
  Order,
  OrderClosed,
  OrderCreated,
  OrderRequest,
  OrdersResponse,
} from '../types/trading.js';
import { accountPath, buildListQuery, checkId, rejected, segment } from './query.js';
import type { ListQuery } from './query.js';

/**
 * Order fields in the order they are written to the form body
 */
const ORDER_FIELDS = [
  'instrument',
  'units',
  'side',
  'type',
  'expiry',
  'price',
  'lowerBound',
  'upperBound',
  'stopLoss',
  'takeProfit',
  'trailingStop',
] as const;

/**
 * Serialize a validated order request to form fields, skipping absent ones
 */
export function encodeOrderRequest(order: OrderRequest): FormBody {
  const values: Partial<Record<(typeof ORDER_FIELDS)[number], string | number>> = { ...order };
  const body: Record<string, string> = {};

  for (const field of ORDER_FIELDS) {
    const value = values[field];
    if (value !== undefined) {
      body[field] = String(value);
    }
  }

  return body;
}

/**
 * Orders REST API client
 */
export class OrdersApi {
  constructor(private readonly httpClient: HttpClient) {}

  /**
   * Place a new order.
   *
   * The request is validated first; a malformed order is rejected with a
   * ValidationError and never sent.
   */
  async createOrder(request: OrderRequest): Promise<ApiResult<OrderCreated>> {
    const validated = OrderRequestSchema.safeParse(request);

    if (!validated.success) {
      return rejected(
        ErrorFactory.fromValidationIssues(
          validated.error.issues.map((issue) => ({
            field: issue.path.join('.') || undefined,
            message: issue.message,
          }))
        )
      );
    }

    return this.httpClient.post(
      `${this.basePath()}/orders`,
      encodeOrderRequest(validated.data),
      OrderCreatedSchema
    );
  }

  /**
   * Pending orders, newest first
   */
  async listOrders(query: ListQuery = {}): Promise<ApiResult<OrdersResponse>> {
    return this.httpClient.get(`${this.basePath()}/orders?${buildListQuery(query)}`, OrdersResponseSchema);
  }

  /**
   * Get order by ID
   */
  async getOrder(orderId: string | number): Promise<ApiResult<Order>> {
    const invalid = checkId(orderId, 'orderId');
    if (invalid) {
      return rejected(invalid);
    }

    return this.httpClient.get(`${this.basePath()}/orders/${segment(orderId)}`, OrderSchema);
  }

  /**
   * Cancel a pending order
   */
  async closeOrder(orderId: string | number): Promise<ApiResult<OrderClosed>> {
    const invalid = checkId(orderId, 'orderId');
    if (invalid) {
      return rejected(invalid);
    }

    return this.httpClient.delete(`${this.basePath()}/orders/${segment(orderId)}`, OrderClosedSchema);
  }

  private basePath(): string {
    return accountPath(this.httpClient.config.accountId);
  }
}
