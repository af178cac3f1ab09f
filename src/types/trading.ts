import { z } from 'zod';

/**
 * Instrument code, BASE_QUOTE
 */
export const InstrumentSchema = z
  .string()
  .regex(/^[A-Z0-9]+_[A-Z0-9]+$/, 'Instrument must be in the format XXX_YYY');
export type Instrument = z.infer<typeof InstrumentSchema>;

/**
 * Timestamp as sent by the broker: epoch microseconds (UNIX) or an RFC3339 string
 */
export const BrokerTimeSchema = z.union([z.string(), z.number()]);
export type BrokerTime = z.infer<typeof BrokerTimeSchema>;

/**
 * Broker ids arrive as JSON numbers
 */
const IdSchema = z.number();

/**
 * Order side enumeration
 */
export const OrderSideSchema = z.enum(['buy', 'sell']);
export type OrderSide = z.infer<typeof OrderSideSchema>;

/**
 * Order type enumeration
 */
export const OrderTypeSchema = z.enum(['limit', 'stop', 'marketIfTouched', 'market']);
export type OrderType = z.infer<typeof OrderTypeSchema>;

/**
 * Error body returned with 4xx/5xx responses
 */
export const BrokerErrorBodySchema = z
  .object({
    code: z.number(),
    message: z.string(),
    moreInfo: z.string().optional(),
  })
  .passthrough();
export type BrokerErrorBody = z.infer<typeof BrokerErrorBodySchema>;

// ---------------------------------------------------------------------------
// Prices
// ---------------------------------------------------------------------------

export const PriceSchema = z
  .object({
    instrument: z.string(),
    time: BrokerTimeSchema,
    bid: z.number(),
    ask: z.number(),
    // only present while the instrument is halted
    status: z.string().optional(),
  })
  .passthrough();
export type Price = z.infer<typeof PriceSchema>;

export const PricesResponseSchema = z
  .object({
    prices: z.array(PriceSchema),
  })
  .passthrough();
export type PricesResponse = z.infer<typeof PricesResponseSchema>;

// ---------------------------------------------------------------------------
// Accounts
// ---------------------------------------------------------------------------

export const AccountInfoSchema = z
  .object({
    accountId: IdSchema,
    accountName: z.string(),
    balance: z.number(),
    unrealizedPl: z.number(),
    realizedPl: z.number(),
    marginUsed: z.number(),
    marginAvail: z.number(),
    openTrades: z.number(),
    openOrders: z.number(),
    marginRate: z.number(),
    accountCurrency: z.string(),
  })
  .passthrough();
export type AccountInfo = z.infer<typeof AccountInfoSchema>;

// ---------------------------------------------------------------------------
// Orders
// ---------------------------------------------------------------------------

const positiveAmount = z.number().positive();

const OrderRequestBaseSchema = z.object({
  instrument: InstrumentSchema,
  units: z.number().int().positive(),
  side: OrderSideSchema,
  lowerBound: positiveAmount.optional(),
  upperBound: positiveAmount.optional(),
  stopLoss: positiveAmount.optional(),
  takeProfit: positiveAmount.optional(),
  trailingStop: positiveAmount.optional(),
});

/**
 * Market order: executes immediately, no expiry or trigger price
 */
export const MarketOrderRequestSchema = OrderRequestBaseSchema.extend({
  type: z.literal('market'),
}).strict();

/**
 * Limit, stop and marketIfTouched orders need an expiry and a trigger price
 */
export const PendingOrderRequestSchema = OrderRequestBaseSchema.extend({
  type: z.enum(['limit', 'stop', 'marketIfTouched']),
  expiry: z.union([z.string().min(1), z.number().nonnegative()]),
  price: positiveAmount,
}).strict();

/**
 * New order request
 */
export const OrderRequestSchema = z.discriminatedUnion('type', [
  MarketOrderRequestSchema,
  PendingOrderRequestSchema,
]);

export type MarketOrderRequest = z.infer<typeof MarketOrderRequestSchema>;
export type PendingOrderRequest = z.infer<typeof PendingOrderRequestSchema>;
export type OrderRequest = z.infer<typeof OrderRequestSchema>;

/**
 * Order response schema
 */
export const OrderSchema = z
  .object({
    id: IdSchema,
    instrument: z.string(),
    units: z.number(),
    side: OrderSideSchema,
    type: OrderTypeSchema,
    time: BrokerTimeSchema,
    price: z.number(),
    takeProfit: z.number().optional(),
    stopLoss: z.number().optional(),
    expiry: BrokerTimeSchema.optional(),
    upperBound: z.number().optional(),
    lowerBound: z.number().optional(),
    trailingStop: z.number().optional(),
  })
  .passthrough();
export type Order = z.infer<typeof OrderSchema>;

export const OrdersResponseSchema = z
  .object({
    orders: z.array(OrderSchema),
  })
  .passthrough();
export type OrdersResponse = z.infer<typeof OrdersResponseSchema>;

/**
 * Response to a new order: which fields are filled depends on whether it
 * executed (tradeOpened / tradesClosed / tradeReduced) or rests (orderOpened)
 */
export const OrderCreatedSchema = z
  .object({
    instrument: z.string(),
    time: BrokerTimeSchema,
    price: z.number(),
    orderOpened: z.record(z.unknown()).optional(),
    tradeOpened: z.record(z.unknown()).optional(),
    tradesClosed: z.array(z.record(z.unknown())).optional(),
    tradeReduced: z.record(z.unknown()).optional(),
  })
  .passthrough();
export type OrderCreated = z.infer<typeof OrderCreatedSchema>;

export const OrderClosedSchema = z
  .object({
    id: IdSchema,
    instrument: z.string(),
    units: z.number(),
    side: OrderSideSchema,
    price: z.number(),
    time: BrokerTimeSchema,
  })
  .passthrough();
export type OrderClosed = z.infer<typeof OrderClosedSchema>;

// ---------------------------------------------------------------------------
// Trades
// ---------------------------------------------------------------------------

export const TradeSchema = z
  .object({
    id: IdSchema,
    units: z.number(),
    side: OrderSideSchema,
    instrument: z.string(),
    time: BrokerTimeSchema,
    price: z.number(),
    takeProfit: z.number().optional(),
    stopLoss: z.number().optional(),
    trailingStop: z.number().optional(),
    trailingAmount: z.number().optional(),
  })
  .passthrough();
export type Trade = z.infer<typeof TradeSchema>;

export const TradesResponseSchema = z
  .object({
    trades: z.array(TradeSchema),
  })
  .passthrough();
export type TradesResponse = z.infer<typeof TradesResponseSchema>;

export const TradeClosedSchema = z
  .object({
    id: IdSchema,
    price: z.number(),
    instrument: z.string(),
    profit: z.number(),
    side: OrderSideSchema,
    time: BrokerTimeSchema,
  })
  .passthrough();
export type TradeClosed = z.infer<typeof TradeClosedSchema>;

// ---------------------------------------------------------------------------
// Positions
// ---------------------------------------------------------------------------

export const PositionSchema = z
  .object({
    instrument: z.string(),
    units: z.number(),
    side: OrderSideSchema,
    avgPrice: z.number(),
  })
  .passthrough();
export type Position = z.infer<typeof PositionSchema>;

/**
 * All positions come wrapped in `positions`; a single instrument comes back bare
 */
export const PositionsResponseSchema = z.union([
  z.object({ positions: z.array(PositionSchema) }).passthrough(),
  PositionSchema,
]);
export type PositionsResponse = z.infer<typeof PositionsResponseSchema>;

// ---------------------------------------------------------------------------
// Transactions
// ---------------------------------------------------------------------------

/**
 * Fields vary per transaction type; id, accountId, time and type are common to all
 */
export const TransactionSchema = z
  .object({
    id: IdSchema,
    accountId: IdSchema,
    time: BrokerTimeSchema,
    type: z.string(),
  })
  .passthrough();
export type Transaction = z.infer<typeof TransactionSchema>;

export const TransactionsResponseSchema = z
  .object({
    transactions: z.array(TransactionSchema),
  })
  .passthrough();
export type TransactionsResponse = z.infer<typeof TransactionsResponseSchema>;
