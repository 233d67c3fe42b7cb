import { RateLimiter } from "./index.js";
import type { RateLimiterConfig, RateLimitResult } from "./index.js";

/**
 * One independent RateLimiter per key, all built from the same config.
 *
 * Limiters are created lazily on a key's first `tryConsume`. The group is
 * an ordinary object you own. Make as many as you need; nothing is shared
 * between groups or between keys.
 *
 * @example
 * ```ts
 * const perUser = new RateLimiterGroup({
 *   strategy: "token-bucket",
 *   capacity: 5,
 *   refillInterval: 1_000,
 * });
 *
 * if (!perUser.tryConsume(`user:${id}`).allowed) { ... }
 *
 * // From time to time, drop keys that have gone quiet
 * perUser.prune();
 * ```
 */
export class RateLimiterGroup {
	private config: RateLimiterConfig;
	private limiters = new Map<string, RateLimiter>();

	/** @throws RateLimiterConfigError up front, not on first use of a key. */
	constructor(config: RateLimiterConfig) {
		// Shallow copy: every field is a primitive or the clock function, so
		// later edits to the caller's object don't reach new limiters.
		this.config = { ...config };
		// Build one limiter to validate the config eagerly.
		new RateLimiter(this.config);
	}

	/** Number of keys currently holding a limiter. */
	get size(): number {
		return this.limiters.size;
	}

	/** Decide on one request for `key`, consuming a unit if admitted. */
	tryConsume(key: string): RateLimitResult {
		let limiter = this.limiters.get(key);
		if (!limiter) {
			limiter = new RateLimiter(this.config);
			this.limiters.set(key, limiter);
		}
		return limiter.tryConsume();
	}

	/**
	 * Check `key` without consuming. An unknown key reports a fresh
	 * limiter and is not added to the group.
	 */
	peek(key: string): RateLimitResult {
		const limiter = this.limiters.get(key) ?? new RateLimiter(this.config);
		return limiter.peek();
	}

	/** Forget all usage for `key`. */
	reset(key: string): void {
		this.limiters.get(key)?.reset();
	}

	/** Drop the limiter for `key`. Returns true if it existed. */
	delete(key: string): boolean {
		return this.limiters.delete(key);
	}

	/**
	 * Drop every limiter that has fully recovered (its peek shows the whole
	 * limit available). Such a limiter holds no usage, so a key that comes
	 * back simply starts over with a new one.
	 *
	 * @returns how many keys were dropped
	 */
	prune(): number {
		let dropped = 0;
		for (const [key, limiter] of this.limiters) {
			const state = limiter.peek();
			if (state.remaining === state.limit) {
				this.limiters.delete(key);
				dropped++;
			}
		}
		return dropped;
	}
}
