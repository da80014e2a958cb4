/**
 * Sample Collector
 *
 * Turns raw per-world outputs for one question into typed samples. Worlds
 * that failed, timed out or do not match the question's output shape are
 * dropped; nothing is retried here.
 */

import { z } from 'zod';
import type { Logger } from '../core/logging/logger.js';
import type {
  QuestionSpec,
  QuestionType,
  SampleKindByType,
  WorldSample,
} from './types.js';

export const MAX_OPTION_NAME_LENGTH = 100;

const BinaryWorldSchema = z.object({ answer: z.boolean() });
const CategoricalWorldSchema = z.object({ scores: z.record(z.unknown()) });
const NumericWorldSchema = z.object({ value: z.number().finite() });

export interface CollectedSamples<T extends WorldSample = WorldSample> {
  samples: T[];
  dropped: number;
}

/**
 * Strips characters a model tends to wrap option names in, so that
 * `"Option A"\n` and `Option A` resolve to the same option.
 */
export function sanitizeOptionName(name: string): string {
  return name
    .replace(/[\u0000-\u001f\u007f]/g, ' ')
    .replace(/["'`‘’“”]/g, '')
    .replace(/\s+/g, ' ')
    .trim()
    .slice(0, MAX_OPTION_NAME_LENGTH);
}

function buildOptionLookup(options: readonly string[]): Map<string, string> {
  const lookup = new Map<string, string>();
  for (const option of options) {
    const key = sanitizeOptionName(option);
    // First option wins if two names only differ in stripped characters
    if (!lookup.has(key)) lookup.set(key, option);
  }
  return lookup;
}

function parseBinary(raw: unknown): SampleKindByType['binary'] | null {
  const parsed = BinaryWorldSchema.safeParse(raw);
  return parsed.success ? { kind: 'binary', answer: parsed.data.answer } : null;
}

function parseNumeric(raw: unknown): SampleKindByType['numeric'] | null {
  const parsed = NumericWorldSchema.safeParse(raw);
  return parsed.success ? { kind: 'numeric', value: parsed.data.value } : null;
}

function parseCategorical(
  raw: unknown,
  lookup: Map<string, string>
): SampleKindByType['multiple_choice'] | null {
  const parsed = CategoricalWorldSchema.safeParse(raw);
  if (!parsed.success) return null;

  // Option names such as `constructor` must not collide with inherited keys
  const scores = new Map<string, number>();
  for (const [key, value] of Object.entries(parsed.data.scores)) {
    if (typeof value !== 'number' || !Number.isFinite(value)) continue;
    const option = lookup.get(sanitizeOptionName(key));
    if (option === undefined || scores.has(option)) continue;
    scores.set(option, value);
  }

  // A world that scored none of the real options carries no signal
  return scores.size > 0 ? { kind: 'categorical', scores: Object.fromEntries(scores) } : null;
}

export function collectSamples<T extends QuestionType>(
  spec: QuestionSpec & { type: T },
  worlds: readonly unknown[],
  log?: Logger
): CollectedSamples<SampleKindByType[T]>;
export function collectSamples(
  spec: QuestionSpec,
  worlds: readonly unknown[],
  log?: Logger
): CollectedSamples {
  const samples: WorldSample[] = [];
  let dropped = 0;
  const lookup = buildOptionLookup(spec.options);

  worlds.forEach((raw, index) => {
    let sample: WorldSample | null = null;
    if (raw !== null && raw !== undefined && !(raw instanceof Error)) {
      switch (spec.type) {
        case 'binary':
          sample = parseBinary(raw);
          break;
        case 'multiple_choice':
          sample = parseCategorical(raw, lookup);
          break;
        case 'numeric':
          sample = parseNumeric(raw);
          break;
      }
    }

    if (sample) {
      samples.push(sample);
    } else {
      dropped++;
      log?.debug('Dropped world', {
        question_id: spec.id,
        world: index,
        reason: raw instanceof Error ? raw.message : 'unparseable output',
      });
    }
  });

  log?.debug(`Collected ${samples.length} of ${worlds.length} worlds`, {
    question_id: spec.id,
    dropped,
  });

  return { samples, dropped };
}
