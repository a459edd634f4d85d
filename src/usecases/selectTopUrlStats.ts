import type { UrlStat } from "../interfaces/index.js";

/** Ranks by total time, slowest first; equal totals keep their incoming order. */
export function selectTopUrlStats(stats: readonly UrlStat[], size: number): UrlStat[] {
  const limit = Math.max(0, Math.trunc(size));
  return [...stats].sort((a, b) => b.time_sum - a.time_sum).slice(0, limit);
}
