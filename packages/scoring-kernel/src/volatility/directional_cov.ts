// packages/scoring-kernel/src/volatility/directional_cov.ts
//
// Directional coefficient-of-variation penalty.
//
// Two signals are kept apart:
// - erraticism: sample std of week-over-week deltas relative to their mean
// - direction: tanh of the mean delta, which amplifies or damps the erratic part
//   and sets a floor for a steady drift the wrong way
//
// Input is the raw history of one drifting quantity (slip days, throughput),
// oldest first, current last. Only the trailing window is used.

import type { VolatilityBreakdownV1, VolatilitySourceV1 } from "@healthgauge/contracts";

import { clamp, diffs, mean, sampleStd, tail } from "../util/numeric";

// Points per window, current included. Tunable; 4 points = 3 deltas.
export const VOLATILITY_WINDOW = 4;

export const COV_CAP = 2;
export const COV_SATURATION = 0.5;
export const BASE_PENALTY_MAX = 30;
export const DIRECTION_GAIN = 0.4;
export const DIRECTIONAL_FLOOR_MAX = 8;
export const PENALTY_CAP = 40;

export type TrendPolarity = "increase_is_bad" | "increase_is_good";

export type VolatilityProfile = {
  source: VolatilitySourceV1;
  polarity: TrendPolarity;
  // minimum |mean delta| used as the CoV reference
  reference_floor: number;
  // delta per week at which tanh reaches ~0.76
  direction_scale: number;
};

export const SLIP_VOLATILITY_PROFILE: VolatilityProfile = Object.freeze({
  source: "forecast_slip",
  polarity: "increase_is_bad",
  reference_floor: 10,
  direction_scale: 7,
});

export const THROUGHPUT_VOLATILITY_PROFILE: VolatilityProfile = Object.freeze({
  source: "throughput",
  polarity: "increase_is_good",
  reference_floor: 1,
  direction_scale: 3,
});

function emptyBreakdown(profile: VolatilityProfile, window: number[], deltas: number[]): VolatilityBreakdownV1 {
  return {
    source: profile.source,
    window,
    deltas,
    mean_delta: 0,
    std_delta: 0,
    reference: profile.reference_floor,
    delta_cov: 0,
    base_penalty: 0,
    dir_factor: 0,
    multiplier: 1,
    floor: 0,
    penalty: 0,
    insufficient_history: true,
  };
}

export function directionalCovPenalty(
  history: ReadonlyArray<number>,
  profile: VolatilityProfile,
  windowSize: number = VOLATILITY_WINDOW
): VolatilityBreakdownV1 {
  const window = tail(history, windowSize);
  // Never penalize on startup.
  if (window.length < 2) return emptyBreakdown(profile, window, []);

  const deltas = diffs(window);
  const meanDelta = mean(deltas) ?? 0;
  const stdDelta = deltas.length >= 2 ? sampleStd(deltas) : 0;

  const reference = Math.max(Math.abs(meanDelta), profile.reference_floor);
  const deltaCov = clamp(stdDelta / reference, 0, COV_CAP);
  const basePenalty = clamp(deltaCov / COV_SATURATION, 0, 1) * BASE_PENALTY_MAX;

  const dirFactor = Math.tanh(meanDelta / profile.direction_scale);
  // Signed so that a positive value always means "getting worse".
  const worsening = profile.polarity === "increase_is_bad" ? dirFactor : -dirFactor;

  const multiplier = 1 + DIRECTION_GAIN * worsening;
  const floor = clamp(worsening, 0, 1) * DIRECTIONAL_FLOOR_MAX;
  const penalty = clamp(Math.max(basePenalty * multiplier, floor), 0, PENALTY_CAP);

  return {
    source: profile.source,
    window,
    deltas,
    mean_delta: meanDelta,
    std_delta: stdDelta,
    reference,
    delta_cov: deltaCov,
    base_penalty: basePenalty,
    dir_factor: dirFactor,
    multiplier,
    floor,
    penalty,
    insufficient_history: false,
  };
}
