import { describe, it, expect } from "vitest";
import { RateLimiterConfigError } from "../src/errors.js";
import { RateLimiterGroup } from "../src/rate-limiter/group.js";
import { useClock } from "./setup.js";

describe("RateLimiterGroup", () => {
	const ctx = useClock();

	function createGroup(capacity: number) {
		return new RateLimiterGroup({
			strategy: "token-bucket",
			capacity,
			refillInterval: 100,
			clock: ctx.clock,
		});
	}

	it("isolates different keys", () => {
		const group = createGroup(1);

		expect(group.tryConsume("user:a").allowed).toBe(true);

		// Different key, should still be allowed
		expect(group.tryConsume("user:b").allowed).toBe(true);

		// Original key is now exhausted
		const r = group.tryConsume("user:a");
		expect(r.allowed).toBe(false);
		expect(r.retryAfter).toBe(100);

		expect(group.size).toBe(2);
	});

	it("peek on an unknown key reports a fresh limiter without adding it", () => {
		const group = createGroup(2);

		expect(group.peek("user:new")).toEqual({
			allowed: true,
			remaining: 2,
			limit: 2,
			retryAfter: 0,
		});
		expect(group.size).toBe(0);
	});

	it("reset clears one key only", () => {
		const group = createGroup(1);
		group.tryConsume("user:a");
		group.tryConsume("user:b");

		group.reset("user:a");

		expect(group.tryConsume("user:a").allowed).toBe(true);
		expect(group.tryConsume("user:b").allowed).toBe(false);
	});

	it("delete drops the key's limiter", () => {
		const group = createGroup(1);
		group.tryConsume("user:a");

		expect(group.delete("user:a")).toBe(true);
		expect(group.delete("user:a")).toBe(false);
		expect(group.size).toBe(0);

		// Comes back with a full bucket
		expect(group.tryConsume("user:a").allowed).toBe(true);
	});

	it("prune drops only keys that have recovered", () => {
		const group = createGroup(2);

		group.tryConsume("user:a");
		ctx.set(50);
		group.tryConsume("user:b");

		// user:a has earned its token back; user:b is still 50ms short
		ctx.set(100);
		expect(group.prune()).toBe(1);
		expect(group.size).toBe(1);
		expect(group.peek("user:b").remaining).toBe(1);
	});

	it("prune drops a fixed-window key once its window has rolled over", () => {
		const group = new RateLimiterGroup({
			strategy: "fixed-window",
			limit: 2,
			window: 1000,
			clock: ctx.clock,
		});

		group.tryConsume("user:a");
		ctx.set(500);
		group.tryConsume("user:b");

		// user:a's window (from t=0) is over; user:b's runs until t=1500
		ctx.set(1000);
		expect(group.prune()).toBe(1);
		expect(group.size).toBe(1);
		expect(group.peek("user:b").remaining).toBe(1);
	});

	it("prune drops a sliding-log key once its log has emptied", () => {
		const group = new RateLimiterGroup({
			strategy: "sliding-log",
			limit: 2,
			window: 1000,
			clock: ctx.clock,
		});

		group.tryConsume("user:a");
		ctx.set(500);
		group.tryConsume("user:b");

		// The t=0 entry has aged out; the t=500 one still counts
		ctx.set(1000);
		expect(group.prune()).toBe(1);
		expect(group.size).toBe(1);
		expect(group.peek("user:b").remaining).toBe(1);
	});

	it("ignores changes to the config object after construction", () => {
		const config = {
			strategy: "fixed-window" as const,
			limit: 2,
			window: 1000,
			clock: ctx.clock,
		};
		const group = new RateLimiterGroup(config);

		config.limit = 0;

		const r = group.tryConsume("user:a");
		expect(r.allowed).toBe(true);
		expect(r.remaining).toBe(1);
		expect(r.limit).toBe(2);
	});

	it("rejects a bad config up front", () => {
		expect(
			() =>
				new RateLimiterGroup({
					strategy: "fixed-window",
					limit: 0,
					window: 1000,
				}),
		).toThrow(RateLimiterConfigError);
	});
});
