export { RateLimiter } from "./rate-limiter/index.js";
export type {
	RateLimiterConfig,
	RateLimitResult,
} from "./rate-limiter/index.js";

export { RateLimiterGroup } from "./rate-limiter/group.js";

export { createFixedWindow } from "./rate-limiter/strategies/fixed-window.js";
export { createSlidingLog } from "./rate-limiter/strategies/sliding-log.js";
export { createTokenBucket } from "./rate-limiter/strategies/token-bucket.js";
export type { RateLimitStrategy } from "./rate-limiter/strategies/types.js";

export { RateLimiterConfigError } from "./errors.js";
export { monotonicClock } from "./utils/clock.js";
export type { Clock } from "./types.js";
