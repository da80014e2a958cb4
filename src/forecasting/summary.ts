/**
 * Human-readable summaries of aggregated forecasts, for logs and reports.
 */

import type { AggregateForecast } from './types.js';

export interface ForecastSummary {
  probability?: number;
  topOption?: { name: string; probability: number };
  mean?: number | null;
  median?: number | null;
  p10?: number | null;
  p90?: number | null;
}

/**
 * First grid value whose CDF reaches `q`. Falls back to the last grid value
 * when the CDF never gets there (open upper bound). Null without a grid.
 */
export function quantileFromCdf(
  grid: readonly number[],
  cdf: readonly number[],
  q: number
): number | null {
  const n = Math.min(grid.length, cdf.length);
  if (n === 0) return null;
  for (let i = 0; i < n; i++) {
    if (cdf[i] >= q) return grid[i];
  }
  return grid[n - 1];
}

export function summarizeForecast(forecast: AggregateForecast): ForecastSummary {
  switch (forecast.kind) {
    case 'binary':
      return { probability: forecast.probability };
    case 'categorical': {
      let top: { name: string; probability: number } | undefined;
      for (const [name, probability] of Object.entries(forecast.probabilities)) {
        if (!top || probability > top.probability) top = { name, probability };
      }
      return top ? { topOption: top } : {};
    }
    case 'numeric':
      return {
        mean: forecast.mean,
        median: quantileFromCdf(forecast.grid, forecast.cdf, 0.5),
        p10: quantileFromCdf(forecast.grid, forecast.cdf, 0.1),
        p90: quantileFromCdf(forecast.grid, forecast.cdf, 0.9),
      };
  }
}
