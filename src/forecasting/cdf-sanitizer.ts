/**
 * Numeric CDF Sanitizer
 *
 * Maps any sequence of numbers onto a CDF the platform accepts:
 *   - exactly 201 points
 *   - non-decreasing, every value in [0, 1]
 *   - open lower bound: first value >= 0.001, closed: exactly 0
 *   - open upper bound: last value <= 0.999, closed: exactly 1
 *
 * Every pass returns a new array; the input is never mutated.
 */

import {
  CDF_POINTS,
  OPEN_LOWER_MIN,
  OPEN_UPPER_MAX,
  type BoundSpec,
} from './types.js';

export const MIN_CDF_STEP = 5e-5;

export type RawCdf = ReadonlyArray<number | null | undefined>;

function isFiniteNumber(value: number | null | undefined): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

export function linearRamp(points: number = CDF_POINTS): number[] {
  if (points === 1) return [0];
  return Array.from({ length: points }, (_, i) => i / (points - 1));
}

/**
 * Interpolates interior gaps between finite neighbours and extends the
 * nearest finite value flat over leading and trailing gaps.
 * Returns null when there is no finite value at all.
 */
export function repairMissing(raw: RawCdf): number[] | null {
  const anchors: Array<{ index: number; value: number }> = [];
  raw.forEach((v, index) => {
    if (isFiniteNumber(v)) anchors.push({ index, value: v });
  });
  if (anchors.length === 0) return null;

  const out: number[] = [];
  let k = 0;
  for (let i = 0; i < raw.length; i++) {
    // k tracks the first anchor at or after i
    while (k < anchors.length && anchors[k].index < i) k++;
    const next = k < anchors.length ? anchors[k] : undefined;
    const prev = k > 0 ? anchors[k - 1] : undefined;

    if (next && next.index === i) {
      out.push(next.value);
    } else if (prev && next) {
      const frac = (i - prev.index) / (next.index - prev.index);
      out.push(prev.value + (next.value - prev.value) * frac);
    } else if (prev) {
      out.push(prev.value);
    } else if (next) {
      out.push(next.value);
    }
  }
  return out;
}

export function clampUnit(values: readonly number[]): number[] {
  return values.map(v => Math.min(1, Math.max(0, v)));
}

export function forwardMonotone(values: readonly number[]): number[] {
  const out = [...values];
  for (let i = 1; i < out.length; i++) {
    if (out[i] < out[i - 1]) out[i] = out[i - 1];
  }
  return out;
}

/**
 * Right-to-left pass: the last value is held at or below `ceiling`, and each
 * value at or below its successor.
 */
export function backwardCeiling(values: readonly number[], ceiling: number): number[] {
  const out = [...values];
  if (out.length === 0) return out;
  out[out.length - 1] = Math.min(out[out.length - 1], ceiling);
  for (let i = out.length - 2; i >= 0; i--) {
    if (out[i] > out[i + 1]) out[i] = out[i + 1];
  }
  return out;
}

/**
 * Left-to-right pass raising each value to at least its predecessor plus
 * MIN_CDF_STEP, unless that would exceed 1.
 */
export function enforceMinStep(values: readonly number[]): number[] {
  const out = [...values];
  for (let i = 1; i < out.length; i++) {
    const stepped = out[i - 1] + MIN_CDF_STEP;
    if (out[i] < stepped) {
      out[i] = stepped <= 1 ? stepped : Math.max(out[i], out[i - 1]);
    }
  }
  return out;
}

function upperCeiling(bounds: BoundSpec): number {
  return bounds.upper_bound_open ? OPEN_UPPER_MAX : 1;
}

/**
 * Pins both endpoints to the question's boundary rule and re-flows the
 * neighbouring values so the curve stays non-decreasing.
 */
export function enforceEndpoints(values: readonly number[], bounds: BoundSpec): number[] {
  if (values.length === 0) return [];

  let out = [...values];
  out[0] = bounds.lower_bound_open ? Math.max(out[0], OPEN_LOWER_MIN) : 0;
  out = enforceMinStep(out);
  out = backwardCeiling(out, upperCeiling(bounds));
  if (!bounds.upper_bound_open) out[out.length - 1] = 1;
  return out;
}

/**
 * Linear resampling over a uniform parameterisation from first to last index.
 */
export function resample(values: readonly number[], points: number = CDF_POINTS): number[] {
  const n = values.length;
  if (n === points) return [...values];
  if (n === 0) return linearRamp(points);
  if (n === 1) return new Array<number>(points).fill(values[0]);

  const out = new Array<number>(points);
  for (let j = 0; j < points; j++) {
    const t = (j * (n - 1)) / (points - 1);
    const i0 = Math.min(Math.floor(t), n - 1);
    const i1 = Math.min(i0 + 1, n - 1);
    const frac = t - i0;
    out[j] = values[i0] + (values[i1] - values[i0]) * frac;
  }
  return out;
}

/**
 * Total function: any input (including empty or all-missing, both treated as
 * a flat 0 -> 1 ramp) yields a valid 201-point CDF.
 */
export function sanitizeNumericCdf(rawCdf: RawCdf, bounds: BoundSpec): number[] {
  const repaired = repairMissing(rawCdf) ?? linearRamp();

  let cdf = clampUnit(repaired);
  cdf = forwardMonotone(cdf);
  cdf = backwardCeiling(cdf, upperCeiling(bounds));
  cdf = enforceMinStep(cdf);
  cdf = enforceEndpoints(cdf, bounds);
  cdf = resample(cdf, CDF_POINTS);

  // Resampling can drift by an ulp at the boundaries
  cdf = clampUnit(cdf);
  return enforceEndpoints(cdf, bounds);
}
