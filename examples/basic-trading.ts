/**
 * Basic trading example using the fxTrade SDK
 *
 * This example demonstrates:
 * - Client setup from FXTRADE_* environment variables
 * - Account and price queries
 * - Placing, listing and cancelling a limit order
 * - Reading broker timestamps
 *
 * Run against the practice host only.
 */

import {
  FxTradeClient,
  TimestampUtils,
  consoleLogger,
  createConfigWithEnv,
  isBrokerError,
  parseBrokerTime,
} from '../src/index.js';

const INSTRUMENT = 'EUR_USD';

async function basicTradingExample(): Promise<void> {
  console.log('Starting fxTrade SDK basic trading example');

  const client = new FxTradeClient({
    ...createConfigWithEnv({ environment: 'practice' }),
    logger: consoleLogger,
  });

  try {
    // Step 1: account summary
    const account = await client.getAccountInfo();
    if (!account.success) {
      throw account.error;
    }
    console.log(`Account ${account.data.accountName} (${account.data.accountId})`);
    console.log(`  Balance: ${account.data.balance} ${account.data.accountCurrency}`);
    console.log(`  Margin available: ${account.data.marginAvail}`);

    // Step 2: current quote
    const prices = await client.getPrices([INSTRUMENT]);
    if (!prices.success) {
      throw prices.error;
    }
    const quote = prices.data.prices[0];
    if (!quote) {
      throw new Error(`No price for ${INSTRUMENT}`);
    }
    console.log(`\n${INSTRUMENT} bid ${quote.bid} ask ${quote.ask}`);
    console.log(`  Quoted at ${parseBrokerTime(quote.time)?.toISOString() ?? 'unknown'}`);

    // Step 3: limit order well below the market, expiring in one hour
    const expiry = TimestampUtils.toMicros(new Date(Date.now() + 60 * 60 * 1000));
    const created = await client.createOrder({
      instrument: INSTRUMENT,
      units: 100,
      side: 'buy',
      type: 'limit',
      price: Number((quote.bid * 0.95).toFixed(5)),
      expiry,
    });

    if (!created.success) {
      if (isBrokerError(created.error)) {
        console.error(`Broker rejected the order: ${created.error.brokerCode} ${created.error.message}`);
      }
      throw created.error;
    }

    const orderId = created.data.orderOpened?.id;
    console.log(`\nOrder placed at ${created.data.price}`);

    // Step 4: pending orders
    const orders = await client.listOrders({ instrument: INSTRUMENT, count: 10 });
    if (orders.success) {
      for (const order of orders.data.orders) {
        console.log(`  #${order.id} ${order.side} ${order.units} ${order.instrument} @ ${order.price}`);
      }
    }

    // Step 5: cancel the order again
    if (typeof orderId === 'number') {
      const closed = await client.closeOrder(orderId);
      console.log(closed.success ? `Cancelled order #${orderId}` : `Cancel failed: ${closed.error.message}`);
    }
  } finally {
    await client.destroy();
  }
}

basicTradingExample().catch((error: unknown) => {
  console.error('Example failed:', error instanceof Error ? error.message : error);
  process.exit(1);
});
