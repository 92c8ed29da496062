export { RateLimiter, REQUESTS_PER_MINUTE, MESSAGES_PER_MINUTE, ONE_MINUTE_MS } from './rate-limiter.js';
export type { RateLimiterOptions, RateWindow, RateLimitResult } from './rate-limiter.js';
