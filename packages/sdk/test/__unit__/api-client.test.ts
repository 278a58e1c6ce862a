import { PlatformClient } from '../../src/api-client';
import { PlatformError, PlatformErrorCode } from '../../src/types';
import { BufferAdapter, Logger, LogLevel } from '../../src/core/logger';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' }
  });
}

async function captureError(promise: Promise<unknown>): Promise<PlatformError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof PlatformError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected the call to fail');
}

describe('PlatformClient', () => {
  let fetchMock: jest.SpiedFunction<typeof fetch>;
  let client: PlatformClient;

  beforeEach(() => {
    fetchMock = jest.spyOn(global, 'fetch');
    client = new PlatformClient({ appId: 'app-1', appSecret: 'test-secret' });
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('constructor', () => {
    it('should require an app id and secret', () => {
      expect(() => new PlatformClient({ appId: '', appSecret: 'test-secret' })).toThrow(PlatformError);
      expect(() => new PlatformClient({ appId: 'app-1', appSecret: '' })).toThrow('appSecret is required');
    });
  });

  describe('getPurchases', () => {
    it('should request the purchase list with credentials in headers', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ transactions: [] }));

      await client.getPurchases(42);

      expect(fetchMock).toHaveBeenCalledTimes(1);
      expect(fetchMock).toHaveBeenCalledWith(
        'https://api.tonplace.net/apps/purchases?count=50&userId=42',
        expect.objectContaining({
          method: 'GET',
          body: undefined,
          headers: {
            'App-Id': 'app-1',
            Secret: 'test-secret',
            'Content-Type': 'application/json'
          }
        })
      );
    });

    it('should honour a custom count and base URL', async () => {
      const custom = new PlatformClient({
        appId: 'app-1',
        appSecret: 'test-secret',
        apiUrl: 'http://upstream.test/'
      });
      fetchMock.mockResolvedValueOnce(jsonResponse({ transactions: [] }));

      await custom.getPurchases(7, { count: 10 });

      expect(fetchMock.mock.calls[0][0]).toBe('http://upstream.test/apps/purchases?count=10&userId=7');
    });

    it('should return the purchases', async () => {
      const purchase = {
        id: 1,
        amount: 100,
        currency: 'eur',
        user_id: 42,
        created_at: 1700000000,
        status: 'paid',
        title: 'Premium'
      };
      fetchMock.mockResolvedValueOnce(jsonResponse({ transactions: [purchase] }));

      await expect(client.getPurchases(42)).resolves.toEqual([purchase]);
    });

    it('should fill missing purchase fields with zero values', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ transactions: [{ id: 9 }] }));

      await expect(client.getPurchases(42)).resolves.toEqual([
        { id: 9, amount: 0, currency: '', user_id: 0, created_at: 0, status: '', title: '' }
      ]);
    });

    it('should return an empty list when transactions is missing', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({}));

      await expect(client.getPurchases(42)).resolves.toEqual([]);
    });

    it('should reject a transactions field that is not a list', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ transactions: 'nope' }));

      const error = await captureError(client.getPurchases(42));
      expect(error.code).toBe(PlatformErrorCode.INVALID_RESPONSE);
    });
  });

  describe('createPurchase', () => {
    it('should post the purchase in euros by default', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ purchase_id: 555 }));

      const purchaseId = await client.createPurchase({ userId: 42, amount: 100, title: 'Premium' });

      expect(purchaseId).toBe(555);
      expect(fetchMock).toHaveBeenCalledWith(
        'https://api.tonplace.net/apps/purchase/create',
        expect.objectContaining({
          method: 'POST',
          body: '{"amount":100,"currency":"eur","title":"Premium","user_id":42}'
        })
      );
    });

    it('should pass an explicit currency through', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ purchase_id: 1 }));

      await client.createPurchase({ userId: 1, amount: 5, title: 'Tip', currency: 'ton' });

      expect(fetchMock.mock.calls[0][1]?.body).toBe('{"amount":5,"currency":"ton","title":"Tip","user_id":1}');
    });

    it('should reject a response without purchase_id', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ ok: true }));

      const error = await captureError(client.createPurchase({ userId: 1, amount: 5, title: 'Tip' }));
      expect(error.code).toBe(PlatformErrorCode.INVALID_RESPONSE);
      expect(error.message).toBe('purchase_id missing from response');
    });
  });

  describe('errors', () => {
    it('should surface non-200 statuses with the body', async () => {
      fetchMock.mockResolvedValueOnce(new Response('boom', { status: 500 }));

      const error = await captureError(client.getPurchases(42));
      expect(error.code).toBe(PlatformErrorCode.API_ERROR);
      expect(error.status).toBe(500);
      expect(error.message).toBe('API returned status 500: boom');
    });

    it('should treat other 2xx statuses as errors too', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ purchase_id: 1 }, 201));

      const error = await captureError(client.createPurchase({ userId: 1, amount: 5, title: 'Tip' }));
      expect(error.code).toBe(PlatformErrorCode.API_ERROR);
      expect(error.status).toBe(201);
    });

    it('should wrap network failures', async () => {
      fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'));

      const error = await captureError(client.getPurchases(42));
      expect(error.code).toBe(PlatformErrorCode.NETWORK_ERROR);
      expect(error.message).toBe('Request failed: fetch failed');
      expect(error.cause).toBeInstanceOf(TypeError);
    });

    it('should report timeouts', async () => {
      fetchMock.mockRejectedValueOnce(Object.assign(new Error('aborted'), { name: 'TimeoutError' }));

      const error = await captureError(client.getPurchases(42));
      expect(error.code).toBe(PlatformErrorCode.NETWORK_ERROR);
      expect(error.message).toBe('Request timed out after 10000ms');
    });

    it('should reject bodies that are not JSON', async () => {
      fetchMock.mockResolvedValueOnce(new Response('not json', { status: 200 }));

      const error = await captureError(client.getPurchases(42));
      expect(error.code).toBe(PlatformErrorCode.INVALID_RESPONSE);
      expect(error.message).toBe('Failed to parse response');
    });

    it('should reject JSON that is not an object', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse([1, 2]));

      const error = await captureError(client.getPurchases(42));
      expect(error.message).toBe('Response is not a JSON object');
    });
  });

  describe('logging', () => {
    it('should log requests without the secret', async () => {
      const adapter = new BufferAdapter();
      const logged = new PlatformClient({
        appId: 'app-1',
        appSecret: 'test-secret',
        logger: new Logger({ level: LogLevel.DEBUG, adapter, context: 'test' })
      });
      fetchMock.mockResolvedValueOnce(jsonResponse({ transactions: [] }));

      await logged.getPurchases(42);

      expect(adapter.logs).toHaveLength(1);
      expect(adapter.logs[0].message).toBe('GET /apps/purchases?count=50&userId=42 200');
      expect(JSON.stringify(adapter.logs[0])).not.toContain('test-secret');
    });
  });
});
