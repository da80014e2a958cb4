/**
 * Binary Aggregator
 *
 * probability = share of worlds answering yes, clamped to the platform's
 * [0.01, 0.99] range.
 */

import type { Aggregator } from './base.js';
import { InsufficientSamplesError } from '../../core/errors.js';
import {
  MAX_PROBABILITY,
  MIN_PROBABILITY,
  type BinaryForecast,
  type BinarySample,
  type QuestionSpec,
} from '../types.js';

export function clampProbability(p: number): number {
  return Math.max(MIN_PROBABILITY, Math.min(MAX_PROBABILITY, p));
}

export class BinaryAggregator implements Aggregator<'binary'> {
  readonly type = 'binary' as const;

  aggregate(samples: readonly BinarySample[], spec: QuestionSpec): BinaryForecast {
    if (samples.length === 0) {
      throw new InsufficientSamplesError(spec.id, 0, 'no valid binary worlds');
    }

    const yes = samples.filter(s => s.answer).length;

    return {
      kind: 'binary',
      probability: clampProbability(yes / samples.length),
      sampleCount: samples.length,
    };
  }
}
