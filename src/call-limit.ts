import { BucketState } from './types';

export const RESPONSE_HEADER_API_CALL_LIMIT = 'X-Shopify-Shop-Api-Call-Limit';

export const REQUEST_HEADER_ACCESS_TOKEN = 'X-Shopify-Access-Token';

const CALL_LIMIT_PATTERN = /^\s*(\d+)\s*\/\s*(\d+)\s*$/;

/**
 * Parse a call-limit header value such as "32/40"
 * @returns undefined when the value is not `<used>/<capacity>`
 */
export function parseCallLimit(value: string | null | undefined): BucketState | undefined {
  if (!value) {
    return undefined;
  }

  const match = CALL_LIMIT_PATTERN.exec(value);
  if (!match) {
    return undefined;
  }

  const currentFillLevel = Number.parseInt(match[1], 10);
  const capacity = Number.parseInt(match[2], 10);
  if (!Number.isSafeInteger(currentFillLevel) || !Number.isSafeInteger(capacity) || capacity <= 0) {
    return undefined;
  }

  // The server can report an overfilled bucket after a burst
  return { capacity, currentFillLevel: Math.min(currentFillLevel, capacity) };
}

export function getBucketState(headers: Headers): BucketState | undefined {
  return parseCallLimit(headers.get(RESPONSE_HEADER_API_CALL_LIMIT));
}

/**
 * Access token that scopes the request's quota, if any
 */
export function getAccessToken(request: Request): string | undefined {
  return request.headers.get(REQUEST_HEADER_ACCESS_TOKEN) || undefined;
}
