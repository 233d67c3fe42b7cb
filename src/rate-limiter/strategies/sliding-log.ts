import type { Clock } from "../../types.js";
import { monotonicClock } from "../../utils/clock.js";
import {
	assertPositiveCount,
	assertPositiveDuration,
} from "../../utils/validate.js";
import type { RateLimitResult } from "../index.js";
import type { RateLimitStrategy } from "./types.js";

const INITIAL_SLOTS = 16;

/**
 * Keep the timestamp of every admitted request still inside the window and
 * admit only while there are fewer than `limit` of them. This gives an exact
 * sliding window with no boundary burst. The cost is O(limit) memory.
 *
 * The log is a ring buffer, oldest entry at `head`. It starts with a few
 * slots and doubles as it fills, never past `limit`, so a generous quota
 * costs memory only once it is actually used. An entry leaves the window
 * once it is `windowMs` old, so a rejected caller retrying after exactly
 * `retryAfter` is admitted.
 *
 * Example with limit=2, window=1000:
 *   t=0     → allowed   log [0]
 *   t=500   → allowed   log [0, 500]
 *   t=600   → rejected, retryAfter 400 (until the t=0 entry leaves)
 *   t=1010  → allowed   log [500, 1010]
 */
export function createSlidingLog(
	limit: number,
	windowMs: number,
	clock: Clock = monotonicClock,
): RateLimitStrategy {
	assertPositiveCount("limit", limit);
	assertPositiveDuration("window", windowMs);

	let log = new Float64Array(Math.min(limit, INITIAL_SLOTS));
	let head = 0;
	let size = 0;

	/**
	 * Drop entries that have left the window. After an idle spell this can
	 * clear the whole log in one call; each entry is dropped at most once,
	 * so the work is amortised O(1) per admitted request.
	 */
	function expire(now: number): void {
		while (size > 0 && now - log[head] >= windowMs) {
			head = (head + 1) % log.length;
			size--;
		}
	}

	/** Double the buffer (up to `limit`), unwrapping entries to start at 0. */
	function grow(): void {
		const next = new Float64Array(Math.min(limit, log.length * 2));
		for (let i = 0; i < size; i++) {
			next[i] = log[(head + i) % log.length];
		}
		log = next;
		head = 0;
	}

	function result(allowed: boolean, now: number): RateLimitResult {
		return {
			allowed,
			remaining: limit - size,
			limit,
			// Time until the oldest counted request leaves the window.
			retryAfter: allowed ? 0 : log[head] + windowMs - now,
		};
	}

	return {
		tryConsume(): RateLimitResult {
			const now = clock();
			expire(now);

			if (size >= limit) {
				return result(false, now);
			}

			if (size === log.length) {
				grow();
			}
			log[(head + size) % log.length] = now;
			size++;
			return result(true, now);
		},

		peek(): RateLimitResult {
			const now = clock();
			expire(now);
			return result(size < limit, now);
		},

		reset(): void {
			log = new Float64Array(Math.min(limit, INITIAL_SLOTS));
			head = 0;
			size = 0;
		},
	};
}
