import { RateLimiterConfigError } from "../errors.js";

/**
 * Assert a quota or capacity: a whole number of requests, at least one.
 *
 * @example
 * assertPositiveCount("limit", 10) // ok
 * assertPositiveCount("limit", 0)  // throws RateLimiterConfigError
 */
export function assertPositiveCount(field: string, value: number): void {
	if (!Number.isSafeInteger(value) || value <= 0) {
		throw new RateLimiterConfigError(
			field,
			`${field} must be a positive integer, got ${value}`,
		);
	}
}

/**
 * Assert a duration in milliseconds. Fractions are fine (the default clock
 * has sub-millisecond resolution); zero, negatives, NaN and Infinity are not.
 */
export function assertPositiveDuration(field: string, value: number): void {
	if (!Number.isFinite(value) || value <= 0) {
		throw new RateLimiterConfigError(
			field,
			`${field} must be a positive number of milliseconds, got ${value}`,
		);
	}
}
