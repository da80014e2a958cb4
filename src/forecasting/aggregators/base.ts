/**
 * Base Aggregator Interface
 */

import type {
  ForecastByType,
  QuestionSpec,
  QuestionType,
  SampleKindByType,
} from '../types.js';

export interface Aggregator<T extends QuestionType> {
  readonly type: T;

  /**
   * Reduces one question's samples to a single forecast.
   * Throws InsufficientSamplesError when the samples carry no usable signal.
   */
  aggregate(samples: readonly SampleKindByType[T][], spec: QuestionSpec): ForecastByType[T];
}

export type AggregatorRegistry = { readonly [T in QuestionType]: Aggregator<T> };
