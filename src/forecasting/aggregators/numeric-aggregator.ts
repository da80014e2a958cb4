/**
 * Numeric Aggregator
 *
 * Builds an empirical CDF over a 201-point grid spanning the sampled values
 * padded by 5% of their range on each side, then hands it to the sanitizer.
 */

import type { Aggregator } from './base.js';
import { InsufficientSamplesError } from '../../core/errors.js';
import { sanitizeNumericCdf } from '../cdf-sanitizer.js';
import { CDF_POINTS, type NumericForecast, type NumericSample, type QuestionSpec } from '../types.js';

export const RANGE_PAD_FRACTION = 0.05;
/** Half-width of the grid when every sample has the same value. */
export const DEGENERATE_PAD = 1e-6;

export function buildGrid(lo: number, hi: number, points: number = CDF_POINTS): number[] {
  const span = hi - lo;
  if (!Number.isFinite(span)) return buildWideGrid(lo, hi, points);

  // Relative to magnitude so the grid still has width far from zero
  const pad = hi > lo
    ? span * RANGE_PAD_FRACTION
    : Math.max(DEGENERATE_PAD, Math.abs(lo) * DEGENERATE_PAD);
  const start = lo - pad;
  const end = hi + pad;
  return Array.from({ length: points }, (_, i) => start + ((end - start) * i) / (points - 1));
}

/**
 * Grid for samples whose span overflows a double. Works in halves and
 * interpolates between the ends so every point stays finite; the padding
 * is capped at the largest finite value.
 */
function buildWideGrid(lo: number, hi: number, points: number): number[] {
  const pad = (hi / 2 - lo / 2) * (2 * RANGE_PAD_FRACTION);
  const start = Math.max(-Number.MAX_VALUE, lo - pad);
  const end = Math.min(Number.MAX_VALUE, hi + pad);
  return Array.from({ length: points }, (_, i) => {
    const t = i / (points - 1);
    return start * (1 - t) + end * t;
  });
}

/**
 * Share of values at or below each grid point. `grid` must be ascending.
 */
export function empiricalCdf(values: readonly number[], grid: readonly number[]): number[] {
  if (values.length === 0) return grid.map(() => 0);

  const sorted = [...values].sort((a, b) => a - b);
  const out: number[] = [];
  let j = 0;
  for (const g of grid) {
    while (j < sorted.length && sorted[j] <= g) j++;
    out.push(j / sorted.length);
  }
  return out;
}

export class NumericAggregator implements Aggregator<'numeric'> {
  readonly type = 'numeric' as const;

  aggregate(samples: readonly NumericSample[], spec: QuestionSpec): NumericForecast {
    const values = samples.map(s => s.value).filter(v => Number.isFinite(v));
    if (values.length === 0) {
      throw new InsufficientSamplesError(spec.id, 0, 'no valid numeric worlds');
    }

    let lo = values[0];
    let hi = values[0];
    let total = 0;
    for (const v of values) {
      if (v < lo) lo = v;
      if (v > hi) hi = v;
      total += v;
    }

    const grid = buildGrid(lo, hi);
    const cdf = sanitizeNumericCdf(empiricalCdf(values, grid), spec);

    return {
      kind: 'numeric',
      cdf,
      grid,
      mean: total / values.length,
      sampleCount: values.length,
    };
  }
}
