/**
 * Forecast Aggregation
 *
 * One aggregator per question type, selected by the question's type.
 */

import type { AggregatorRegistry } from './base.js';
import { BinaryAggregator } from './binary-aggregator.js';
import { CategoricalAggregator } from './categorical-aggregator.js';
import { NumericAggregator } from './numeric-aggregator.js';
import type {
  ForecastByType,
  QuestionSpec,
  QuestionType,
  SampleKindByType,
} from '../types.js';

export type { Aggregator, AggregatorRegistry } from './base.js';
export { BinaryAggregator, clampProbability } from './binary-aggregator.js';
export { CategoricalAggregator } from './categorical-aggregator.js';
export { NumericAggregator, buildGrid, empiricalCdf } from './numeric-aggregator.js';

export const aggregators: AggregatorRegistry = {
  binary: new BinaryAggregator(),
  multiple_choice: new CategoricalAggregator(),
  numeric: new NumericAggregator(),
};

export function aggregate<T extends QuestionType>(
  type: T,
  samples: readonly SampleKindByType[T][],
  spec: QuestionSpec
): ForecastByType[T] {
  if (type !== spec.type) {
    throw new Error(`Aggregation type ${type} does not match question ${spec.id} of type ${spec.type}`);
  }
  const aggregator: AggregatorRegistry[T] = aggregators[type];
  return aggregator.aggregate(samples, spec);
}
