/**
 * Payload Validator Tests
 */

import { describe, it, expect } from 'vitest';
import { assertValidPayload, validate } from '../../src/forecasting/payload-validator.js';
import { linearRamp } from '../../src/forecasting/cdf-sanitizer.js';
import { PayloadInvalidError, type PayloadRule } from '../../src/core/errors.js';
import type { AggregateForecast, QuestionSpec, SubmissionPayload } from '../../src/forecasting/types.js';
import { makeSpec } from '../helpers/fixtures.js';

function brokenRule(fn: () => unknown): PayloadRule | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof PayloadInvalidError) return error.rule;
    throw error;
  }
  return undefined;
}

const binary = (probability: number): AggregateForecast => ({ kind: 'binary', probability, sampleCount: 1 });
const categorical = (probabilities: Record<string, number>): AggregateForecast => ({
  kind: 'categorical',
  probabilities,
  sampleCount: 1,
});
const numeric = (cdf: number[]): AggregateForecast => ({ kind: 'numeric', cdf, grid: [], mean: null, sampleCount: 1 });

describe('binary payloads', () => {
  const spec = makeSpec({ id: 20, type: 'binary' });

  it('should build the wire payload', () => {
    const payload = validate(binary(0.5), spec);
    expect(payload).toEqual({
      probability_yes: 0.5,
      probability_yes_per_category: null,
      continuous_cdf: null,
    });
    expect(Object.isFrozen(payload)).toBe(true);
  });

  it('should accept the range limits', () => {
    expect(validate(binary(0.01), spec).probability_yes).toBe(0.01);
    expect(validate(binary(0.99), spec).probability_yes).toBe(0.99);
  });

  it('should reject probabilities outside [0.01, 0.99]', () => {
    expect(brokenRule(() => validate(binary(0.001), spec))).toBe('binary.range');
    expect(brokenRule(() => validate(binary(0.999), spec))).toBe('binary.range');
  });

  it('should reject NaN', () => {
    expect(brokenRule(() => validate(binary(Number.NaN), spec))).toBe('payload.not_finite');
  });

  it('should reject a second populated field', () => {
    const payload: SubmissionPayload = {
      probability_yes: 0.5,
      probability_yes_per_category: null,
      continuous_cdf: [0, 1],
    };
    expect(brokenRule(() => assertValidPayload(payload, spec))).toBe('payload.extra_field');
  });

  it('should reject a forecast of the wrong kind', () => {
    expect(brokenRule(() => validate(numeric(linearRamp()), spec))).toBe('payload.type_mismatch');
  });

  it('should carry the question id on the error', () => {
    expect(() => validate(binary(2), spec)).toThrow(PayloadInvalidError);
    expect(() => validate(binary(2), spec)).toThrow(/question 20 \[binary\.range\]/);
  });
});

describe('multiple choice payloads', () => {
  const spec = makeSpec({ id: 21, type: 'multiple_choice', options: ['A', 'B', 'C'] });

  it('should accept a sum within tolerance', () => {
    const payload = validate(categorical({ A: 0.5, B: 0.3, C: 0.2000005 }), spec);
    expect(payload.probability_yes_per_category).toEqual({ A: 0.5, B: 0.3, C: 0.2000005 });
  });

  it('should reject a sum of 0.97', () => {
    expect(brokenRule(() => validate(categorical({ A: 0.5, B: 0.3, C: 0.17 }), spec))).toBe('categorical.sum');
  });

  it('should require exactly the question options', () => {
    expect(brokenRule(() => validate(categorical({ A: 0.5, B: 0.5 }), spec))).toBe('categorical.keys');
    expect(brokenRule(() => validate(categorical({ A: 0.5, B: 0.25, C: 0.25, D: 0 }), spec))).toBe('categorical.keys');
  });

  it('should reject values outside [0, 1]', () => {
    expect(brokenRule(() => validate(categorical({ A: 1.5, B: -0.5, C: 0 }), spec))).toBe('categorical.range');
  });

  it('should only count own keys as options', () => {
    const builtIns = makeSpec({ id: 24, type: 'multiple_choice', options: ['constructor', 'toString', 'Other'] });
    expect(brokenRule(() => validate(categorical({ toString: 0.5, Other: 0.5 }), builtIns))).toBe('categorical.keys');
    expect(validate(categorical({ constructor: 0.6, toString: 0.2, Other: 0.2 }), builtIns).probability_yes_per_category)
      .toEqual({ constructor: 0.6, toString: 0.2, Other: 0.2 });
  });
});

describe('numeric payloads', () => {
  const closed = makeSpec({ id: 22, type: 'numeric' });
  const open: QuestionSpec = makeSpec({ id: 23, type: 'numeric', lower_bound_open: true, upper_bound_open: true });

  it('should accept the linear ramp for closed bounds', () => {
    expect(validate(numeric(linearRamp()), closed).continuous_cdf).toHaveLength(201);
  });

  it('should require 201 points', () => {
    expect(brokenRule(() => validate(numeric(linearRamp(200)), closed))).toBe('numeric.length');
  });

  it('should reject a decreasing step', () => {
    const cdf = linearRamp();
    cdf[100] = 0.4;
    expect(brokenRule(() => validate(numeric(cdf), closed))).toBe('numeric.monotonic');
  });

  it('should pin closed bounds to exactly 0 and 1', () => {
    const raisedStart = linearRamp();
    raisedStart[0] = 0.001;
    expect(brokenRule(() => validate(numeric(raisedStart), closed))).toBe('numeric.lower_bound');

    const loweredEnd = linearRamp();
    loweredEnd[200] = 0.999;
    expect(brokenRule(() => validate(numeric(loweredEnd), closed))).toBe('numeric.upper_bound');
  });

  it('should keep open bounds off the extremes', () => {
    expect(brokenRule(() => validate(numeric(linearRamp()), open))).toBe('numeric.lower_bound');

    const cdf = linearRamp();
    cdf[0] = 0.001;
    expect(brokenRule(() => validate(numeric(cdf), open))).toBe('numeric.upper_bound');

    cdf[200] = 0.999;
    expect(validate(numeric(cdf), open).continuous_cdf?.[200]).toBe(0.999);
  });
});
