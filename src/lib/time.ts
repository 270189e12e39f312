import { performance } from "node:perf_hooks";

export type Clock = () => number;

/** Monotonic milliseconds; not tied to the wall clock. */
export const monotonicMs: Clock = () => performance.now();

export function formatSeconds(ms: number): string {
  return `${(ms / 1000).toFixed(6)}s`;
}
