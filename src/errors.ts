/**
 * Thrown synchronously from a limiter's constructor when its configuration
 * can't describe a working limiter. Decisions themselves never throw.
 */
export class RateLimiterConfigError extends Error {
	/** The config field that failed validation, e.g. "limit". */
	readonly field: string;

	constructor(field: string, message: string) {
		super(message);
		this.name = "RateLimiterConfigError";
		this.field = field;
	}
}
