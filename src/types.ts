/**
 * A monotonic time source returning milliseconds since an arbitrary origin.
 * Every limiter accepts one. Pass your own to drive decisions
 * deterministically, or leave it out to use `performance.now()`.
 */
export type Clock = () => number;
