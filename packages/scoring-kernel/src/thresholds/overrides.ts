// packages/scoring-kernel/src/thresholds/overrides.ts
//
// Threshold overrides (v1).
//
// Contract:
// - any subset of THRESHOLD_KEYS_V1 may be supplied (query strings arrive as text)
// - each key is judged on its own: unknown / non-numeric / out-of-range values
//   are reported in `ignored` and the default is kept
// - the defaults constant is never touched; the result is a fresh frozen object

import {
  isThresholdKey,
  type ThresholdConfigV1,
  type ThresholdKeyV1,
  type ThresholdOverrideRejectionV1,
} from "@healthgauge/contracts";

import { DEFAULT_THRESHOLDS_V1 } from "./defaults";
import { getEditableItem } from "./manifest";

export type ResolvedThresholdsV1 = {
  thresholds: ThresholdConfigV1;
  applied: ThresholdKeyV1[];
  ignored: ThresholdOverrideRejectionV1[];
};

function parseOverrideValue(v: unknown): number | null {
  if (typeof v === "number") return Number.isFinite(v) ? v : null;
  if (typeof v === "string") {
    const s = v.trim();
    if (!s) return null;
    const n = Number(s);
    return Number.isFinite(n) ? n : null;
  }
  return null;
}

export function resolveThresholds(overrides?: Readonly<Record<string, unknown>>): ResolvedThresholdsV1 {
  const out: Record<ThresholdKeyV1, number> = { ...DEFAULT_THRESHOLDS_V1 };
  const applied: ThresholdKeyV1[] = [];
  const ignored: ThresholdOverrideRejectionV1[] = [];

  for (const [key, raw] of Object.entries(overrides ?? {})) {
    if (!isThresholdKey(key)) {
      ignored.push({ code: "UNKNOWN_KEY", key, message: `unknown threshold: ${key}` });
      continue;
    }
    const v = parseOverrideValue(raw);
    if (v === null) {
      ignored.push({ code: "VALUE_TYPE_MISMATCH", key, message: "value must be a finite number" });
      continue;
    }
    const rule = getEditableItem(key);
    if (v < rule.min || v > rule.max) {
      ignored.push({
        code: "VALUE_OUT_OF_RANGE",
        key,
        message: v < rule.min ? "value below min" : "value above max",
        meta: { min: rule.min, max: rule.max, value: v },
      });
      continue;
    }
    out[key] = v;
    applied.push(key);
  }

  return {
    thresholds: Object.freeze(out),
    applied: Array.from(new Set(applied)).sort(),
    ignored,
  };
}
