import { RateLimiterConfigError } from "../errors.js";
import type { Clock } from "../types.js";
import { createFixedWindow } from "./strategies/fixed-window.js";
import { createSlidingLog } from "./strategies/sliding-log.js";
import { createTokenBucket } from "./strategies/token-bucket.js";
import type { RateLimitStrategy } from "./strategies/types.js";

// --- Configuration types (discriminated union by strategy) ---

interface RateLimiterBase {
	/** Monotonic millisecond clock. Default: `performance.now()` */
	clock?: Clock;
}

interface FixedWindowConfig extends RateLimiterBase {
	strategy: "fixed-window";
	/** Maximum number of requests allowed per window. */
	limit: number;
	/** Window duration in milliseconds. */
	window: number;
}

interface SlidingLogConfig extends RateLimiterBase {
	strategy: "sliding-log";
	/** Maximum number of requests allowed in any window. */
	limit: number;
	/** Window duration in milliseconds. */
	window: number;
}

interface TokenBucketConfig extends RateLimiterBase {
	strategy: "token-bucket";
	/** Maximum number of tokens the bucket can hold. */
	capacity: number;
	/** Milliseconds between two tokens being added. */
	refillInterval: number;
}

export type RateLimiterConfig =
	| FixedWindowConfig
	| SlidingLogConfig
	| TokenBucketConfig;

// --- Result type ---

export interface RateLimitResult {
	/** Whether the request is allowed. */
	allowed: boolean;
	/**
	 * Admissions left right now: unused quota in the fixed window, tokens in
	 * the bucket, or free slots in the sliding log (which reopen one by one
	 * as logged requests age out).
	 */
	remaining: number;
	/** The configured `limit`, or `capacity` for the token bucket. */
	limit: number;
	/**
	 * Milliseconds to wait before retrying. 0 when allowed, otherwise
	 * always positive. What to do with a rejected request is up to you.
	 */
	retryAfter: number;
}

function describeStrategy(config: { strategy?: unknown }): string {
	return String(config.strategy);
}

// --- Main class ---

/**
 * An in-memory rate limiter supporting fixed-window, sliding-log,
 * and token-bucket strategies.
 *
 * Each instance is one independent limiter. Hold one per thing you're
 * limiting (or use RateLimiterGroup for per-key limits). Decisions are
 * synchronous and there is no locking and no background timer.
 *
 * @example
 * ```ts
 * const limiter = new RateLimiter({
 *   strategy: "sliding-log",
 *   limit: 100,
 *   window: 60_000,
 * });
 *
 * const result = limiter.tryConsume();
 * if (!result.allowed) {
 *   // reject: retry after result.retryAfter milliseconds
 * }
 * ```
 */
export class RateLimiter {
	private strategy: RateLimitStrategy;

	/** @throws RateLimiterConfigError if the config can't describe a limiter. */
	constructor(config: RateLimiterConfig) {
		switch (config.strategy) {
			case "fixed-window":
				this.strategy = createFixedWindow(
					config.limit,
					config.window,
					config.clock,
				);
				break;
			case "sliding-log":
				this.strategy = createSlidingLog(
					config.limit,
					config.window,
					config.clock,
				);
				break;
			case "token-bucket":
				this.strategy = createTokenBucket(
					config.capacity,
					config.refillInterval,
					config.clock,
				);
				break;
			default:
				throw new RateLimiterConfigError(
					"strategy",
					`unknown strategy: ${describeStrategy(config)}`,
				);
		}
	}

	/**
	 * Decide whether a request may proceed and, if so, consume one unit.
	 * This is the primary method. Call it once per incoming request,
	 * right before doing the protected work.
	 */
	tryConsume(): RateLimitResult {
		return this.strategy.tryConsume();
	}

	/**
	 * Report what `tryConsume` would decide right now, without consuming.
	 * Expired windows, earned tokens and aged-out log entries are still
	 * applied, since none of them uses up quota.
	 */
	peek(): RateLimitResult {
		return this.strategy.peek();
	}

	/**
	 * Forget all usage, as if the limiter had just been constructed.
	 */
	reset(): void {
		this.strategy.reset();
	}
}
