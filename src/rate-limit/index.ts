export { TokenBucket, type TokenBucketConfig } from "./token-bucket.js";
export { SlidingWindowCounter, type SlidingWindowConfig } from "./sliding-window.js";
export { SubscriptionTracker } from "./subscription-tracker.js";
export { type RateLimiterStats, type LimiterGauges, RequestStats } from "./stats.js";
export { OperationClass, RateLimiter, type RateLimiterOptions } from "./rate-limiter.js";
export { withRateLimit, type RateLimitPolicy } from "./with-rate-limit.js";
