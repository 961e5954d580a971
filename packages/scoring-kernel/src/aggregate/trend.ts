import { round1 } from "../util/numeric";

/** Week-over-week health change; 0 when there is no previous week. */
export function trendDelta(previous: number | null, current: number): number {
  if (previous === null) return 0;
  return round1(current - previous);
}
