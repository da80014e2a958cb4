/**
 * Payload Validator
 *
 * Last check before a forecast leaves the process. A violation is
 * deterministic, so the caller drops the question instead of retrying.
 */

import { PayloadInvalidError, type PayloadRule } from '../core/errors.js';
import {
  CDF_POINTS,
  FORECAST_KIND_BY_TYPE,
  MAX_PROBABILITY,
  MIN_PROBABILITY,
  OPEN_LOWER_MIN,
  OPEN_UPPER_MAX,
  SUM_TOLERANCE,
  type AggregateForecast,
  type QuestionSpec,
  type QuestionType,
  type SubmissionPayload,
} from './types.js';

type PayloadField = keyof SubmissionPayload;

const FIELD_BY_TYPE: Record<QuestionType, PayloadField> = {
  binary: 'probability_yes',
  multiple_choice: 'probability_yes_per_category',
  numeric: 'continuous_cdf',
};

const ALL_FIELDS: readonly PayloadField[] = [
  'probability_yes',
  'probability_yes_per_category',
  'continuous_cdf',
];

export function toSubmissionPayload(forecast: AggregateForecast): SubmissionPayload {
  switch (forecast.kind) {
    case 'binary':
      return {
        probability_yes: forecast.probability,
        probability_yes_per_category: null,
        continuous_cdf: null,
      };
    case 'categorical':
      return {
        probability_yes: null,
        probability_yes_per_category: { ...forecast.probabilities },
        continuous_cdf: null,
      };
    case 'numeric':
      return {
        probability_yes: null,
        probability_yes_per_category: null,
        continuous_cdf: [...forecast.cdf],
      };
  }
}

function fail(spec: QuestionSpec, rule: PayloadRule, detail: string, value: unknown): never {
  throw new PayloadInvalidError(spec.id, rule, detail, value);
}

function checkFinite(spec: QuestionSpec, values: Iterable<number>): void {
  for (const v of values) {
    if (typeof v !== 'number' || !Number.isFinite(v)) {
      fail(spec, 'payload.not_finite', 'values must be finite numbers', v);
    }
  }
}

function checkBinary(spec: QuestionSpec, p: number | null): void {
  if (p === null || p === undefined) {
    fail(spec, 'binary.missing', 'probability_yes is required', p);
  }
  checkFinite(spec, [p]);
  if (p < MIN_PROBABILITY || p > MAX_PROBABILITY) {
    fail(spec, 'binary.range', `probability_yes must be within [${MIN_PROBABILITY}, ${MAX_PROBABILITY}]`, p);
  }
}

function checkCategorical(
  spec: QuestionSpec,
  probs: Readonly<Record<string, number>> | null
): void {
  if (probs === null || probs === undefined) {
    fail(spec, 'categorical.missing', 'probability_yes_per_category is required', probs);
  }

  const keys = Object.keys(probs);
  const expected = new Set(spec.options);
  const missing = spec.options.filter(o => !Object.hasOwn(probs, o));
  const unexpected = keys.filter(k => !expected.has(k));
  if (missing.length > 0 || unexpected.length > 0) {
    fail(spec, 'categorical.keys', 'keys must exactly match the question options', { missing, unexpected });
  }

  const values = Object.values(probs);
  checkFinite(spec, values);
  for (const [option, p] of Object.entries(probs)) {
    if (p < 0 || p > 1) {
      fail(spec, 'categorical.range', `probability for "${option}" must be within [0, 1]`, p);
    }
  }

  const sum = values.reduce((acc, v) => acc + v, 0);
  if (Math.abs(sum - 1) > SUM_TOLERANCE) {
    fail(spec, 'categorical.sum', `probabilities must sum to 1 within ${SUM_TOLERANCE}`, sum);
  }
}

function checkNumeric(spec: QuestionSpec, cdf: readonly number[] | null): void {
  if (cdf === null || cdf === undefined) {
    fail(spec, 'numeric.missing', 'continuous_cdf is required', cdf);
  }
  if (cdf.length !== CDF_POINTS) {
    fail(spec, 'numeric.length', `continuous_cdf must have exactly ${CDF_POINTS} points`, cdf.length);
  }
  checkFinite(spec, cdf);

  for (let i = 0; i < cdf.length; i++) {
    if (cdf[i] < 0 || cdf[i] > 1) {
      fail(spec, 'numeric.range', `continuous_cdf[${i}] must be within [0, 1]`, cdf[i]);
    }
    if (i > 0 && cdf[i] < cdf[i - 1]) {
      fail(spec, 'numeric.monotonic', `continuous_cdf decreases at index ${i}`, {
        index: i,
        previous: cdf[i - 1],
        current: cdf[i],
      });
    }
  }

  const first = cdf[0];
  const last = cdf[cdf.length - 1];
  if (spec.lower_bound_open ? first < OPEN_LOWER_MIN : first !== 0) {
    const expected = spec.lower_bound_open ? `>= ${OPEN_LOWER_MIN} (open bound)` : '0 (closed bound)';
    fail(spec, 'numeric.lower_bound', `first CDF value must be ${expected}`, first);
  }
  if (spec.upper_bound_open ? last > OPEN_UPPER_MAX : last !== 1) {
    const expected = spec.upper_bound_open ? `<= ${OPEN_UPPER_MAX} (open bound)` : '1 (closed bound)';
    fail(spec, 'numeric.upper_bound', `last CDF value must be ${expected}`, last);
  }
}

/**
 * Checks an already-built payload against the platform contract for `spec`.
 */
export function assertValidPayload(payload: SubmissionPayload, spec: QuestionSpec): void {
  const field = FIELD_BY_TYPE[spec.type];
  for (const other of ALL_FIELDS) {
    if (other !== field && payload[other] !== null && payload[other] !== undefined) {
      fail(spec, 'payload.extra_field', `${other} must be null for a ${spec.type} question`, payload[other]);
    }
  }

  switch (spec.type) {
    case 'binary':
      checkBinary(spec, payload.probability_yes);
      break;
    case 'multiple_choice':
      checkCategorical(spec, payload.probability_yes_per_category);
      break;
    case 'numeric':
      checkNumeric(spec, payload.continuous_cdf);
      break;
  }
}

/**
 * Builds the wire payload for `forecast` and checks it.
 * Throws PayloadInvalidError naming the first rule broken.
 */
export function validate(forecast: AggregateForecast, spec: QuestionSpec): SubmissionPayload {
  if (forecast.kind !== FORECAST_KIND_BY_TYPE[spec.type]) {
    fail(spec, 'payload.type_mismatch', `a ${forecast.kind} forecast cannot answer a ${spec.type} question`, forecast.kind);
  }

  const payload = toSubmissionPayload(forecast);
  assertValidPayload(payload, spec);

  return Object.freeze({
    probability_yes: payload.probability_yes,
    probability_yes_per_category: payload.probability_yes_per_category
      ? Object.freeze({ ...payload.probability_yes_per_category })
      : null,
    continuous_cdf: payload.continuous_cdf ? Object.freeze([...payload.continuous_cdf]) : null,
  });
}
