// @healthgauge/scoring-kernel
// Pure scoring engine: normalization, weights, volatility, aggregation, narrative.

export * from "./engine";
export * from "./thresholds/defaults";
export * from "./thresholds/manifest";
export * from "./thresholds/overrides";
export * from "./normalize/normalizer";
export * from "./normalize/signals";
export * from "./normalize/metric_values";
export * from "./volatility/directional_cov";
export * from "./weights/schemes";
export * from "./weights/allocator";
export * from "./aggregate/health";
export * from "./aggregate/confidence";
export * from "./aggregate/trend";
export * from "./narrative/narrative";
export * from "./util/maybe";
