/**
 * Forecasting Types
 */

import { z } from 'zod';
import type { QuestionId } from '../core/errors.js';

export type { QuestionId };

export const CDF_POINTS = 201;
export const MIN_PROBABILITY = 0.01;
export const MAX_PROBABILITY = 0.99;
export const OPEN_LOWER_MIN = 0.001;
export const OPEN_UPPER_MAX = 0.999;
export const SUM_TOLERANCE = 1e-6;

export const QuestionTypeSchema = z.enum(['binary', 'multiple_choice', 'numeric']);
export type QuestionType = z.infer<typeof QuestionTypeSchema>;

export const QuestionFieldsSchema = z.object({
  id: z.number().int().positive(),
  type: QuestionTypeSchema,
  title: z.string().optional(),
  options: z.array(z.string().min(1)).default([]),
  lower_bound_open: z.boolean().default(false),
  upper_bound_open: z.boolean().default(false),
});

export function refineQuestionOptions(
  spec: { type: QuestionType; options: string[] },
  ctx: z.RefinementCtx
): void {
  if (spec.type !== 'multiple_choice') return;
  if (spec.options.length < 2) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['options'],
      message: 'multiple_choice questions need at least two options',
    });
  }
  if (new Set(spec.options).size !== spec.options.length) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['options'],
      message: 'option names must be unique',
    });
  }
}

export const QuestionSpecSchema = QuestionFieldsSchema.superRefine(refineQuestionOptions);

export type QuestionSpec = Readonly<z.infer<typeof QuestionSpecSchema>>;

/**
 * Only the boundary-openness flags matter to the CDF sanitizer.
 */
export type BoundSpec = Pick<QuestionSpec, 'lower_bound_open' | 'upper_bound_open'>;

// One successful world, already tagged with its question's type

export interface BinarySample {
  kind: 'binary';
  answer: boolean;
}

export interface CategoricalSample {
  kind: 'categorical';
  scores: Readonly<Record<string, number>>;
}

export interface NumericSample {
  kind: 'numeric';
  value: number;
}

export type WorldSample = BinarySample | CategoricalSample | NumericSample;

export interface SampleKindByType {
  binary: BinarySample;
  multiple_choice: CategoricalSample;
  numeric: NumericSample;
}

export interface BinaryForecast {
  kind: 'binary';
  probability: number;
  sampleCount: number;
}

export interface CategoricalForecast {
  kind: 'categorical';
  probabilities: Record<string, number>;
  sampleCount: number;
}

export interface NumericForecast {
  kind: 'numeric';
  cdf: number[];
  /** Value at each CDF point; empty when the CDF did not come from samples. */
  grid: number[];
  /** Arithmetic mean of the samples, informational only. */
  mean: number | null;
  sampleCount: number;
}

export type AggregateForecast = BinaryForecast | CategoricalForecast | NumericForecast;

export interface ForecastByType {
  binary: BinaryForecast;
  multiple_choice: CategoricalForecast;
  numeric: NumericForecast;
}

/**
 * Wire format accepted by the forecasting platform. Exactly one field is non-null.
 */
export interface SubmissionPayload {
  readonly probability_yes: number | null;
  readonly probability_yes_per_category: Readonly<Record<string, number>> | null;
  readonly continuous_cdf: readonly number[] | null;
}

export const FORECAST_KIND_BY_TYPE: Record<QuestionType, AggregateForecast['kind']> = {
  binary: 'binary',
  multiple_choice: 'categorical',
  numeric: 'numeric',
};
