/**
 * AdFeed — Server Module
 */

export { createApp, type AppDependencies, type SchedulerStatus } from './app';
export {
  RateLimiter,
  rateLimit,
  type RateLimiterConfig,
  type RateLimitResult,
} from './rate-limit';
