export { SmartRetryExecutionPolicy } from './smart-retry-policy';
export { LeakyBucket, LeakyBucketOptions } from './leaky-bucket';
export { BucketRegistry } from './bucket-registry';
export { createFetchExecutor, FetchLike } from './fetch-executor';
export {
  REQUEST_HEADER_ACCESS_TOKEN,
  RESPONSE_HEADER_API_CALL_LIMIT,
  getAccessToken,
  getBucketState,
  parseCallLimit,
} from './call-limit';
export { abortable, isRateLimitError, resolveSmartRetrySettings, sleep } from './retry';
export { RateLimitError, HttpError } from './errors';

// Export types
export * from './types';
