import { performance } from "node:perf_hooks";
import type { Clock } from "../types.js";

/**
 * Default clock. `performance.now()` is monotonic: it never jumps when
 * the system wall clock is adjusted, unlike `Date.now()`.
 */
export const monotonicClock: Clock = () => performance.now();
