type RateLimitBucket = {
  windowStartedAt: number;
  count: number;
  lastSeenAt: number;
};

type FixedWindowRateLimiterOptions = {
  windowMs: number;
  maxRequests: number;
  maxBuckets?: number;
};

/** Per-key fixed-window counter; a `maxRequests` of 0 admits everything. */
export class FixedWindowRateLimiter {
  buckets: Map<string, RateLimitBucket>;
  windowMs: number;
  maxRequests: number;
  maxBuckets: number;

  constructor({ windowMs, maxRequests, maxBuckets = 2500 }: FixedWindowRateLimiterOptions) {
    this.buckets = new Map();
    this.windowMs = Math.max(1, windowMs);
    this.maxRequests = Math.max(0, Math.floor(maxRequests));
    this.maxBuckets = Math.max(1, maxBuckets);
  }

  consume(key: string, nowMs = Date.now()) {
    if (this.maxRequests === 0) return true;

    let bucket = this.buckets.get(key);
    if (!bucket || nowMs - bucket.windowStartedAt >= this.windowMs) {
      bucket = {
        windowStartedAt: nowMs,
        count: 0,
        lastSeenAt: nowMs
      };
      this.buckets.set(key, bucket);
    }

    bucket.lastSeenAt = nowMs;
    if (bucket.count >= this.maxRequests) {
      this.prune(nowMs);
      return false;
    }

    bucket.count += 1;
    this.prune(nowMs);
    return true;
  }

  prune(nowMs: number) {
    if (this.buckets.size <= this.maxBuckets) return;
    const staleBefore = nowMs - this.windowMs * 3;
    const target = Math.floor(this.maxBuckets * 0.6);
    for (const [key, bucket] of this.buckets.entries()) {
      if (bucket.lastSeenAt < staleBefore) {
        this.buckets.delete(key);
      }
      if (this.buckets.size <= target) break;
    }
  }
}
