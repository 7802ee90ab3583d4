import { HttpError } from './errors';
import { createFetchExecutor, FetchLike } from './fetch-executor';

const SHOP_URL = 'https://shop.example.test/admin/api/shop.json';

describe('createFetchExecutor', () => {
  const parseJson = (response: Response): Promise<unknown> => response.json();

  test('returns the parsed body and response on success', async () => {
    const response = new Response(JSON.stringify({ id: 7 }), {
      status: 200,
      headers: { 'X-Shopify-Shop-Api-Call-Limit': '3/40' },
    });
    const fetchImpl = jest.fn<ReturnType<FetchLike>, Parameters<FetchLike>>().mockResolvedValue(response);
    const execute = createFetchExecutor(parseJson, fetchImpl);

    const outcome = await execute(new Request(SHOP_URL));

    expect(outcome).toEqual({ kind: 'success', result: { id: 7 }, response });
  });

  test('maps 429 to a rate-limited outcome', async () => {
    const fetchImpl = jest
      .fn<ReturnType<FetchLike>, Parameters<FetchLike>>()
      .mockResolvedValue(new Response('Exceeded 2 calls per second', { status: 429 }));
    const execute = createFetchExecutor(parseJson, fetchImpl);

    await expect(execute(new Request(SHOP_URL))).resolves.toEqual({ kind: 'rate-limited' });
  });

  test('maps other error statuses to an HttpError failure', async () => {
    const fetchImpl = jest
      .fn<ReturnType<FetchLike>, Parameters<FetchLike>>()
      .mockResolvedValue(new Response('Not Found', { status: 404, statusText: 'Not Found' }));
    const execute = createFetchExecutor(parseJson, fetchImpl);

    const outcome = await execute(new Request(SHOP_URL));

    expect(outcome.kind).toBe('failure');
    if (outcome.kind !== 'failure') {
      return;
    }
    expect(outcome.error).toBeInstanceOf(HttpError);
    expect(outcome.error).toMatchObject({
      status: 404,
      body: 'Not Found',
      message: 'HTTP 404 Not Found: Not Found',
    });
  });

  test('passes the request and signal to fetch', async () => {
    const fetchImpl = jest
      .fn<ReturnType<FetchLike>, Parameters<FetchLike>>()
      .mockResolvedValue(new Response('{}', { status: 200 }));
    const execute = createFetchExecutor(parseJson, fetchImpl);
    const request = new Request(SHOP_URL);
    const controller = new AbortController();

    await execute(request, controller.signal);

    expect(fetchImpl).toHaveBeenCalledWith(request, { signal: controller.signal });
  });

  test('lets network errors propagate', async () => {
    const error = new TypeError('fetch failed');
    const fetchImpl = jest.fn<ReturnType<FetchLike>, Parameters<FetchLike>>().mockRejectedValue(error);
    const execute = createFetchExecutor(parseJson, fetchImpl);

    await expect(execute(new Request(SHOP_URL))).rejects.toBe(error);
  });
});
