// Small numeric helpers shared by every scoring stage.
// NaN saturates to the lower bound so it can never leak into a score; infinities go to their own end.

export function clamp(x: number, lo: number, hi: number): number {
  if (Number.isNaN(x)) return lo;
  if (x < lo) return lo;
  if (x > hi) return hi;
  return x;
}

export function clamp01(x: number): number {
  return clamp(x, 0, 1);
}

export function mean(xs: ReadonlyArray<number>): number | null {
  if (!xs.length) return null;
  let s = 0;
  for (const x of xs) s += x;
  return s / xs.length;
}

/** Sample standard deviation (n - 1). Returns 0 below two observations. */
export function sampleStd(xs: ReadonlyArray<number>): number {
  if (xs.length < 2) return 0;
  const m = mean(xs) ?? 0;
  let ss = 0;
  for (const x of xs) ss += (x - m) * (x - m);
  return Math.sqrt(ss / (xs.length - 1));
}

export function diffs(xs: ReadonlyArray<number>): number[] {
  const out: number[] = [];
  for (let i = 1; i < xs.length; i++) out.push(xs[i] - xs[i - 1]);
  return out;
}

export function tail<T>(xs: ReadonlyArray<T>, n: number): T[] {
  if (n <= 0) return [];
  return xs.slice(Math.max(0, xs.length - n));
}

export function roundTo(x: number, digits: number): number {
  const f = 10 ** digits;
  return Math.round(x * f) / f;
}

export function round1(x: number): number {
  return roundTo(x, 1);
}
