// Metric normalizer: raw signal -> [0,1] healthiness (1 = healthy).
// All mappings are linear and hard clamped; nothing extrapolates past the bounds.

import { clamp01, mean } from "../util/numeric";

// Throughput rolling mean denominator floor.
export const THROUGHPUT_MEAN_FLOOR = 0.01;

/**
 * Ratio-type mapping: 0 at `floor`, 1 at `parity` or better.
 *
 * Parity is 1 for indices (CPI, SPI, milestone rate, throughput ratio) and
 * 0 for schedule variance, which is a difference rather than a ratio.
 */
export function normalizeRatio(value: number, floor: number, parity = 1): number {
  const span = parity - floor;
  if (!(span > 0)) return value >= parity ? 1 : 0;
  return clamp01((value - floor) / span);
}

/** Penalty-type mapping: 1 at zero badness, 0 at or beyond `max`. Negative values count as zero. */
export function normalizePenalty(value: number, max: number): number {
  const badness = Math.max(0, value);
  if (!(max > 0)) return badness > 0 ? 0 : 1;
  return clamp01(1 - badness / max);
}

export type ThroughputRatio = {
  current: number;
  rolling_avg: number;
  ratio: number;
};

/**
 * Current throughput relative to its trailing mean.
 * `window` is the trailing observations with the current one last.
 */
export function throughputRatio(window: ReadonlyArray<number>): ThroughputRatio {
  if (!window.length) throw new Error("THROUGHPUT_WINDOW_EMPTY");
  const current = window[window.length - 1];
  const avg = mean(window) ?? 0;
  return { current, rolling_avg: avg, ratio: current / Math.max(avg, THROUGHPUT_MEAN_FLOOR) };
}
