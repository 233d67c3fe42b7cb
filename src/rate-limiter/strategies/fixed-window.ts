import type { Clock } from "../../types.js";
import { monotonicClock } from "../../utils/clock.js";
import {
	assertPositiveCount,
	assertPositiveDuration,
} from "../../utils/validate.js";
import type { RateLimitResult } from "../index.js";
import type { RateLimitStrategy } from "./types.js";

/**
 * Count requests in consecutive windows of `windowMs`, admitting at most
 * `limit` per window.
 *
 * Windows are not aligned to any boundary and nothing is scheduled: the
 * window rolls over lazily, on the first call at least `windowMs` after it
 * started, and the new window starts at that call. An idle limiter
 * therefore costs nothing.
 *
 * Known weakness: a burst at the end of one window followed by a burst at
 * the start of the next admits up to 2 × limit requests in well under
 * `windowMs`. Use the sliding log if that matters.
 *
 * Example with limit=3, window=1000:
 *   t=0    ×3 → allowed, allowed, allowed
 *   t=0       → rejected, retryAfter 1000
 *   t=1010    → allowed (new window started at 1010)
 */
export function createFixedWindow(
	limit: number,
	windowMs: number,
	clock: Clock = monotonicClock,
): RateLimitStrategy {
	assertPositiveCount("limit", limit);
	assertPositiveDuration("window", windowMs);

	let windowStart = clock();
	let count = 0;

	function rollover(now: number): void {
		if (now - windowStart >= windowMs) {
			count = 0;
			windowStart = now;
		}
	}

	function result(allowed: boolean, now: number): RateLimitResult {
		return {
			allowed,
			remaining: limit - count,
			limit,
			// Time left until the current window ends.
			retryAfter: allowed ? 0 : windowMs - (now - windowStart),
		};
	}

	return {
		tryConsume(): RateLimitResult {
			const now = clock();
			rollover(now);

			if (count >= limit) {
				return result(false, now);
			}

			count++;
			return result(true, now);
		},

		peek(): RateLimitResult {
			const now = clock();
			// Rolling over an expired window consumes nothing, so peek may do it.
			rollover(now);
			return result(count < limit, now);
		},

		reset(): void {
			windowStart = clock();
			count = 0;
		},
	};
}
