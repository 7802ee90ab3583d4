import { LeakyBucket, LeakyBucketOptions } from './leaky-bucket';

/**
 * BucketRegistry maps access tokens to their LeakyBucket.
 * Buckets are created on first use and kept for the registry's lifetime.
 */
export class BucketRegistry {
  private readonly buckets: Map<string, LeakyBucket> = new Map();

  constructor(private readonly bucketOptions: LeakyBucketOptions = {}) {}

  /**
   * Get the bucket for a token, creating it if this is the first request
   */
  getOrCreate(accessToken: string): LeakyBucket {
    let bucket = this.buckets.get(accessToken);
    if (!bucket) {
      bucket = new LeakyBucket(this.bucketOptions);
      this.buckets.set(accessToken, bucket);
    }
    return bucket;
  }

  get(accessToken: string): LeakyBucket | undefined {
    return this.buckets.get(accessToken);
  }

  has(accessToken: string): boolean {
    return this.buckets.has(accessToken);
  }

  get size(): number {
    return this.buckets.size;
  }
}
