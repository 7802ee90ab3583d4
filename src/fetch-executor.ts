import { HttpError } from './errors';
import { ExecuteRequest } from './types';

export type FetchLike = (request: Request, init?: { signal?: AbortSignal }) => Promise<Response>;

/**
 * Build an ExecuteRequest on top of fetch.
 * 429 responses become `rate-limited`, other non-2xx responses fail with an HttpError.
 * @param parse Reads the typed result from a successful response
 */
export function createFetchExecutor<T>(
  parse: (response: Response) => Promise<T>,
  fetchImpl: FetchLike = (request, init) => fetch(request, init)
): ExecuteRequest<T> {
  return async (request, signal) => {
    const response = await fetchImpl(request, { signal });

    if (response.status === 429) {
      // Release the connection before the retry
      await response.body?.cancel();
      return { kind: 'rate-limited' };
    }

    if (!response.ok) {
      const body = await response.text();
      return {
        kind: 'failure',
        error: new HttpError(response.status, response.statusText, body),
      };
    }

    return { kind: 'success', result: await parse(response), response };
  };
}
