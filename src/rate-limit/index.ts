export {
  RateLimiter,
  getRateLimiter,
  resetRateLimiter,
  type RateLimiterOptions,
  type RateLimiterState,
} from "./rate-limiter.js";
