import type { Clock } from "../../types.js";
import { monotonicClock } from "../../utils/clock.js";
import {
	assertPositiveCount,
	assertPositiveDuration,
} from "../../utils/validate.js";
import type { RateLimitResult } from "../index.js";
import type { RateLimitStrategy } from "./types.js";

/**
 * A bucket of up to `capacity` tokens, starting full. Each admitted request
 * takes one token; one token comes back every `refillIntervalMs`.
 *
 * `capacity` bounds the burst, `refillIntervalMs` sets the steady rate:
 * for 10 requests/sec use a refill interval of 100ms.
 *
 * While the bucket is below capacity, `lastRefill` advances by whole
 * intervals only. Once the bucket is full it is re-anchored to the current
 * instant instead: a full bucket earns nothing, so it must not bank idle
 * time either. The cost is that `lastRefill` is not always a whole number
 * of intervals past construction; in exchange a bucket left idle behaves
 * exactly like a new one, rather than handing back its first spent token
 * almost immediately.
 */
export function createTokenBucket(
	capacity: number,
	refillIntervalMs: number,
	clock: Clock = monotonicClock,
): RateLimitStrategy {
	assertPositiveCount("capacity", capacity);
	assertPositiveDuration("refillInterval", refillIntervalMs);

	let tokens = capacity;
	let lastRefill = clock();

	/**
	 * Add the tokens earned since `lastRefill`, rounded down.
	 *
	 * `lastRefill` moves forward by whole intervals only, so the fraction of
	 * an interval already elapsed carries over to the next call instead of
	 * being lost. How often we're called doesn't change the refill rate.
	 */
	function refill(now: number): void {
		if (tokens < capacity) {
			const tokensToAdd = Math.floor((now - lastRefill) / refillIntervalMs);
			if (tokensToAdd > 0) {
				tokens = Math.min(capacity, tokens + tokensToAdd);
				lastRefill += tokensToAdd * refillIntervalMs;
			}
		}

		// Nothing accrues while the bucket is full. Restart the refill clock
		// from now, or the first token spent after a long idle spell would
		// come back early.
		if (tokens === capacity) {
			lastRefill = now;
		}
	}

	function result(allowed: boolean, now: number): RateLimitResult {
		return {
			allowed,
			remaining: tokens,
			limit: capacity,
			// Time until the current partial interval completes.
			retryAfter: allowed ? 0 : refillIntervalMs - (now - lastRefill),
		};
	}

	return {
		tryConsume(): RateLimitResult {
			const now = clock();
			refill(now);

			if (tokens === 0) {
				return result(false, now);
			}

			tokens--;
			return result(true, now);
		},

		peek(): RateLimitResult {
			const now = clock();
			refill(now);
			return result(tokens > 0, now);
		},

		reset(): void {
			tokens = capacity;
			lastRefill = clock();
		},
	};
}
