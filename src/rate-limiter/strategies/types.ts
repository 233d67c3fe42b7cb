import type { RateLimitResult } from "../index.js";

/**
 * The decision contract every algorithm implements. The RateLimiter class
 * delegates to whichever strategy was configured, so call sites never
 * depend on the algorithm.
 *
 * Strategies are plain synchronous state machines with no locking; state
 * only moves when one of these methods runs.
 */
export interface RateLimitStrategy {
	/** Decide on one request, consuming a unit if it is admitted. */
	tryConsume(): RateLimitResult;
	/** What `tryConsume` would decide right now, without consuming. */
	peek(): RateLimitResult;
	/** Back to the freshly-constructed state, anchored at the current instant. */
	reset(): void;
}
