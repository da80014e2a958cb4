/**
 * Multiple Choice Aggregator
 *
 * Scores are relative likelihoods, not probabilities. Each option's score is
 * averaged over the worlds that reported it (an omitted option is missing,
 * not zero), negative averages are floored at zero, and the result is
 * normalised to sum to one.
 */

import type { Aggregator } from './base.js';
import { InsufficientSamplesError } from '../../core/errors.js';
import type { CategoricalForecast, CategoricalSample, QuestionSpec } from '../types.js';

export class CategoricalAggregator implements Aggregator<'multiple_choice'> {
  readonly type = 'multiple_choice' as const;

  aggregate(samples: readonly CategoricalSample[], spec: QuestionSpec): CategoricalForecast {
    if (samples.length === 0) {
      throw new InsufficientSamplesError(spec.id, 0, 'no valid multiple choice worlds');
    }

    const floored = spec.options.map(option => {
      let total = 0;
      let reported = 0;
      for (const sample of samples) {
        if (!Object.hasOwn(sample.scores, option)) continue;
        const score = sample.scores[option];
        total += score;
        reported++;
      }
      const average = reported > 0 ? total / reported : 0;
      return Math.max(0, average);
    });

    const sum = floored.reduce((acc, v) => acc + v, 0);
    if (!(sum > 0) || !Number.isFinite(sum)) {
      throw new InsufficientSamplesError(spec.id, samples.length, 'all option scores are zero or negative');
    }

    const probabilities: Record<string, number> = Object.fromEntries(
      spec.options.map((option, i) => [option, floored[i] / sum])
    );

    return {
      kind: 'categorical',
      probabilities,
      sampleCount: samples.length,
    };
  }
}
