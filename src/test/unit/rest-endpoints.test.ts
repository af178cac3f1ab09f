import { describe, it, expect, beforeEach } from 'vitest';
import { FxTradeClient } from '../../client.js';
import { buildListQuery, clampCount } from '../../rest/index.js';
import { BrokerError, DecodeError, ValidationError } from '../../errors/index.js';
import { MockFetch, MockHttpResponse } from '../mocks/mock-fetch.js';
import { loadFixture, unwrap } from '../fixtures/index.js';

const BASE_URL = 'https://api.test.example';
const ACCOUNT_URL = `${BASE_URL}/v1/accounts/1234567`;

describe('REST endpoints', () => {
  const mockFetch = new MockFetch();
  let client: FxTradeClient;

  beforeEach(() => {
    mockFetch.clear();
    client = new FxTradeClient({
      baseUrl: BASE_URL,
      accessToken: 'test-token',
      accountId: '1234567',
      fetch: mockFetch.fetch,
    });
  });

  describe('list query', () => {
    it('should default count to 50', () => {
      expect(buildListQuery()).toBe('count=50');
    });

    it('should clamp count above 500', () => {
      expect(clampCount(501)).toBe(500);
      expect(clampCount(10000)).toBe(500);
    });

    it('should pass counts up to 500 through unchanged', () => {
      expect(clampCount(500)).toBe(500);
      expect(clampCount(1)).toBe(1);
    });

    it('should append the instrument filter', () => {
      expect(buildListQuery({ count: 10, instrument: 'EUR_USD' })).toBe('count=10&instrument=EUR_USD');
    });
  });

  describe('getPrices', () => {
    it('should join instruments with an encoded comma', async () => {
      mockFetch.mockResponse('/v1/prices', new MockHttpResponse(200, loadFixture('prices')));

      const result = await client.getPrices(['EUR_USD', 'USD_JPY', 'EUR_CAD']);

      expect(mockFetch.lastRequest()?.url).toBe(
        `${BASE_URL}/v1/prices?instruments=EUR_USD%2CUSD_JPY%2CEUR_CAD`
      );
      expect(mockFetch.lastRequest()?.init.method).toBe('GET');
      expect(unwrap(result)).toEqual(loadFixture('prices'));
    });

    it('should keep the halted status', async () => {
      mockFetch.mockResponse('/v1/prices', new MockHttpResponse(200, loadFixture('prices')));

      const prices = unwrap(await client.getPrices(['EUR_CAD']));

      expect(prices.prices[2]?.status).toBe('halted');
      expect(prices.prices[0]?.status).toBeUndefined();
    });

    it('should not send anything for an empty list', async () => {
      const result = await client.getPrices([]);

      expect(result.success).toBe(false);
      expect(result.status).toBeNull();
      if (result.success) return;
      expect(result.error).toBeInstanceOf(ValidationError);
      expect(result.error.message).toBe('At least one instrument is required');
      expect(mockFetch.getRequestLog()).toHaveLength(0);
    });

    it('should reject malformed instruments', async () => {
      const result = await client.getPrices(['EUR_USD', 'eurusd']);

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error).toBeInstanceOf(ValidationError);
      expect(result.error.message).toBe('Invalid instrument "eurusd", expected XXX_YYY');
      expect(mockFetch.getRequestLog()).toHaveLength(0);
    });
  });

  describe('getAccountInfo', () => {
    it('should read the configured account', async () => {
      mockFetch.mockResponse('/v1/accounts/1234567', new MockHttpResponse(200, loadFixture('account')));

      const result = await client.getAccountInfo();

      expect(mockFetch.lastRequest()?.url).toBe(ACCOUNT_URL);
      expect(unwrap(result)).toEqual(loadFixture('account'));
    });

    it('should encode the account id as a path segment', async () => {
      const other = new FxTradeClient({
        baseUrl: BASE_URL,
        accessToken: 'test-token',
        accountId: 'a/b',
        fetch: mockFetch.fetch,
      });

      await other.getAccountInfo();

      expect(mockFetch.lastRequest()?.url).toBe(`${BASE_URL}/v1/accounts/a%2Fb`);
    });

    it('should report a missing field as DecodeError', async () => {
      const partial = Object.fromEntries(
        Object.entries(loadFixture('account')).filter(([key]) => key !== 'balance')
      );
      mockFetch.mockResponse('/v1/accounts/1234567', new MockHttpResponse(200, partial));

      const result = await client.getAccountInfo();

      expect(result.success).toBe(false);
      expect(result.status).toBe(200);
      if (result.success) return;
      expect(result.error).toBeInstanceOf(DecodeError);
    });
    it('should keep the decoded body when a field changes shape', async () => {
      const changed = { ...loadFixture('account'), marginRate: null };
      mockFetch.mockResponse('/v1/accounts/1234567', new MockHttpResponse(200, changed));

      const result = await client.getAccountInfo();

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error).toBeInstanceOf(DecodeError);
      if (!(result.error instanceof DecodeError)) return;
      expect(result.error.issues.map((issue) => issue.path)).toEqual(['marginRate']);
      expect(result.error.body).toEqual(changed);
      expect(result.error.body?.accountName).toBe('Primary');
      expect(result.error.toJSON().body).toEqual(changed);
    });
  });

  describe('orders', () => {
    it('should list orders with the default count', async () => {
      mockFetch.mockResponse('/orders', new MockHttpResponse(200, loadFixture('orders')));

      const result = await client.listOrders();

      expect(mockFetch.lastRequest()?.url).toBe(`${ACCOUNT_URL}/orders?count=50`);
      expect(unwrap(result)).toEqual(loadFixture('orders'));
    });

    it('should clamp the count and filter by instrument', async () => {
      mockFetch.mockResponse('/orders', new MockHttpResponse(200, { orders: [] }));

      await client.listOrders({ count: 501, instrument: 'GBP_USD' });

      expect(mockFetch.lastRequest()?.url).toBe(`${ACCOUNT_URL}/orders?count=500&instrument=GBP_USD`);
    });

    it('should get an order by id', async () => {
      mockFetch.mockResponse('/orders/900001', new MockHttpResponse(200, loadFixture('order')));

      const order = unwrap(await client.getOrder(900001));

      expect(mockFetch.lastRequest()?.url).toBe(`${ACCOUNT_URL}/orders/900001`);
      expect(order.trailingStop).toBe(15);
      expect(order.type).toBe('limit');
    });

    it('should cancel an order with DELETE', async () => {
      mockFetch.mockResponse('/orders/900050', new MockHttpResponse(200, loadFixture('order-closed')));

      const result = await client.closeOrder('900050');

      expect(mockFetch.lastRequest()?.url).toBe(`${ACCOUNT_URL}/orders/900050`);
      expect(mockFetch.lastRequest()?.init.method).toBe('DELETE');
      expect(mockFetch.lastRequest()?.init.body).toBeUndefined();
      expect(unwrap(result)).toEqual(loadFixture('order-closed'));
    });

    it('should reject an empty order id without sending', async () => {
      const result = await client.getOrder('');

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error).toBeInstanceOf(ValidationError);
      expect(result.error.message).toBe('orderId is required');
      expect(mockFetch.getRequestLog()).toHaveLength(0);
    });
  });

  describe('trades', () => {
    it('should list open trades', async () => {
      mockFetch.mockResponse('/trades', new MockHttpResponse(200, loadFixture('trades')));

      const result = await client.listOpenTrades({ instrument: 'EUR_USD' });

      expect(mockFetch.lastRequest()?.url).toBe(`${ACCOUNT_URL}/trades?count=50&instrument=EUR_USD`);
      expect(unwrap(result)).toEqual(loadFixture('trades'));
    });

    it('should get a trade by id', async () => {
      mockFetch.mockResponse('/trades/700011', new MockHttpResponse(200, loadFixture('trade')));

      const trade = unwrap(await client.getTrade(700011));

      expect(mockFetch.lastRequest()?.url).toBe(`${ACCOUNT_URL}/trades/700011`);
      expect(trade.instrument).toBe('AUD_USD');
    });

    it('should close the trade it was given', async () => {
      mockFetch.mockResponse('/trades/700010', new MockHttpResponse(200, loadFixture('trade')));
      mockFetch.mockResponse('/trades/700011', new MockHttpResponse(200, loadFixture('trade-closed')));

      await client.getTrade(700010);
      const closed = unwrap(await client.closeTrade(700011));

      const log = mockFetch.getRequestLog();
      expect(log).toHaveLength(2);
      expect(log[1]?.url).toBe(`${ACCOUNT_URL}/trades/700011`);
      expect(log[1]?.init.method).toBe('DELETE');
      expect(closed.profit).toBe(0.056);
    });

    it('should reject dot segment ids without sending', async () => {
      const closed = await client.closeTrade('..');
      const fetched = await client.getTrade('.');

      expect(closed.success).toBe(false);
      expect(fetched.success).toBe(false);
      if (closed.success || fetched.success) return;
      expect(closed.error).toBeInstanceOf(ValidationError);
      expect(closed.error.message).toBe('tradeId must not be ".."');
      expect(fetched.error.message).toBe('tradeId must not be "."');
      expect(mockFetch.getRequestLog()).toHaveLength(0);
    });

    it('should reject a blank trade id without sending', async () => {
      const result = await client.closeTrade('  ');

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error).toBeInstanceOf(ValidationError);
      expect(mockFetch.getRequestLog()).toHaveLength(0);
    });
  });

  describe('positions', () => {
    it('should keep the trailing slash when listing every position', async () => {
      mockFetch.mockResponse('/positions', new MockHttpResponse(200, loadFixture('positions')));

      const result = await client.listPositions();

      expect(mockFetch.lastRequest()?.url).toBe(`${ACCOUNT_URL}/positions/`);
      expect(unwrap(result)).toEqual(loadFixture('positions'));
    });

    it('should read a single instrument position', async () => {
      mockFetch.mockResponse('/positions/EUR_USD', new MockHttpResponse(200, loadFixture('position')));

      const result = await client.listPositions('EUR_USD');

      expect(mockFetch.lastRequest()?.url).toBe(`${ACCOUNT_URL}/positions/EUR_USD`);
      expect(unwrap(result)).toEqual(loadFixture('position'));
    });
    it('should reject a dot segment instrument without sending', async () => {
      const result = await client.listPositions('..');

      expect(result.success).toBe(false);
      expect(result.status).toBeNull();
      if (result.success) return;
      expect(result.error).toBeInstanceOf(ValidationError);
      expect(result.error.message).toBe('instrument must not be ".."');
      expect(mockFetch.getRequestLog()).toHaveLength(0);
    });
  });

  describe('transactions', () => {
    it('should list transactions', async () => {
      mockFetch.mockResponse('/transactions', new MockHttpResponse(200, loadFixture('transactions')));

      const result = await client.listTransactions({ count: 25 });

      expect(mockFetch.lastRequest()?.url).toBe(`${ACCOUNT_URL}/transactions?count=25`);
      expect(unwrap(result)).toEqual(loadFixture('transactions'));
    });

    it('should reject a dot segment transaction id without sending', async () => {
      const result = await client.getTransaction('..');

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error).toBeInstanceOf(ValidationError);
      expect(mockFetch.getRequestLog()).toHaveLength(0);
    });

    it('should keep type specific fields', async () => {
      mockFetch.mockResponse('/transactions/900070', new MockHttpResponse(200, loadFixture('transaction')));

      const transaction = unwrap(await client.getTransaction(900070));

      expect(mockFetch.lastRequest()?.url).toBe(`${ACCOUNT_URL}/transactions/900070`);
      expect(transaction.type).toBe('STOP_ORDER_CREATE');
      expect(transaction.reason).toBe('CLIENT_REQUEST');
    });
  });

  describe('broker errors', () => {
    it('should return the broker error body as BrokerError', async () => {
      mockFetch.mockResponse('/orders/1', new MockHttpResponse(400, loadFixture('error')));

      const result = await client.getOrder(1);

      expect(result.success).toBe(false);
      expect(result.status).toBe(400);
      if (result.success) return;
      expect(result.error).toBeInstanceOf(BrokerError);
      if (!(result.error instanceof BrokerError)) return;
      expect(result.error.brokerCode).toBe(43);
      expect(result.error.message).toBe('Order price must be specified for a limit order');
      expect(result.error.moreInfo).toBe('https://developer.example.com/docs/errors#43');
      expect(result.error.body).toEqual(loadFixture('error'));
    });

    it('should not retry after a broker error', async () => {
      mockFetch.mockResponse('/v1/accounts/1234567', new MockHttpResponse(500, { code: 1, message: 'Internal' }));

      await client.getAccountInfo();

      expect(mockFetch.getRequestLog()).toHaveLength(1);
    });
  });
});
