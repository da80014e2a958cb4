/**
 * Forecast Pipeline
 *
 * Runs a batch of questions strictly one after another:
 * ledger filter -> collect -> aggregate -> validate -> submit -> record.
 *
 * Per-question failures become outcomes. Anything that makes the ledger
 * untrustworthy propagates and ends the run.
 */

import { z } from 'zod';
import { collectSamples } from './collector.js';
import { aggregate } from './aggregators/index.js';
import { validate } from './payload-validator.js';
import { summarizeForecast, type ForecastSummary } from './summary.js';
import {
  QuestionFieldsSchema,
  refineQuestionOptions,
  type QuestionId,
  type QuestionSpec,
  type QuestionType,
  type SubmissionPayload,
} from './types.js';
import type { Submitter } from '../submission/submitter.js';
import {
  InsufficientSamplesError,
  PayloadInvalidError,
  type PayloadRule,
} from '../core/errors.js';
import { logger as rootLogger, type Logger } from '../core/logging/logger.js';

export const QuestionBatchItemSchema = QuestionFieldsSchema.extend({
  worlds: z.array(z.unknown()),
}).superRefine(refineQuestionOptions);

export const QuestionBatchSchema = z.object({
  questions: z.array(QuestionBatchItemSchema),
});

export type QuestionBatch = z.infer<typeof QuestionBatchSchema>;

export interface BatchItem {
  spec: QuestionSpec;
  worlds: readonly unknown[];
}

export type OutcomeStatus =
  | 'submitted'
  | 'skipped_posted'
  | 'insufficient_samples'
  | 'payload_invalid'
  | 'submit_failed';

export interface QuestionOutcome {
  questionId: QuestionId;
  type: QuestionType;
  title?: string;
  status: OutcomeStatus;
  sampleCount?: number;
  dropped?: number;
  forecast?: ForecastSummary;
  rule?: PayloadRule;
  error?: string;
}

export type BatchSummary = Record<OutcomeStatus, number> & { total: number };

export interface BatchResult {
  outcomes: QuestionOutcome[];
  summary: BatchSummary;
}

/** The part of the posted-id ledger the pipeline relies on. */
export interface PostedLedger {
  contains(id: QuestionId): boolean;
  record(id: QuestionId): void;
}

export interface RunForecastBatchOptions {
  items: readonly BatchItem[];
  ledger: PostedLedger;
  submitter: Submitter;
  /** Ignore the ledger filter. Successful submissions are still recorded. */
  force?: boolean;
  logger?: Logger;
  onOutcome?: (outcome: QuestionOutcome, index: number) => void;
}

export function batchItemsFromFile(batch: QuestionBatch): BatchItem[] {
  return batch.questions.map(({ worlds, ...spec }) => ({ spec, worlds }));
}

export function summarizeOutcomes(outcomes: readonly QuestionOutcome[]): BatchSummary {
  const summary: BatchSummary = {
    total: outcomes.length,
    submitted: 0,
    skipped_posted: 0,
    insufficient_samples: 0,
    payload_invalid: 0,
    submit_failed: 0,
  };
  for (const outcome of outcomes) {
    summary[outcome.status]++;
  }
  return summary;
}

async function processQuestion(
  item: BatchItem,
  options: RunForecastBatchOptions,
  log: Logger
): Promise<QuestionOutcome> {
  const { spec, worlds } = item;
  const base = { questionId: spec.id, type: spec.type, title: spec.title };

  if (!options.force && options.ledger.contains(spec.id)) {
    log.info('Already posted, skipping');
    return { ...base, status: 'skipped_posted' };
  }

  const { samples, dropped } = collectSamples(spec, worlds, log);

  let payload: SubmissionPayload;
  let forecast: ForecastSummary;
  try {
    const aggregated = aggregate(spec.type, samples, spec);
    forecast = summarizeForecast(aggregated);
    payload = validate(aggregated, spec);
  } catch (error) {
    if (error instanceof InsufficientSamplesError) {
      log.warn(error.message, { samples: samples.length, dropped });
      return { ...base, status: 'insufficient_samples', sampleCount: samples.length, dropped, error: error.message };
    }
    if (error instanceof PayloadInvalidError) {
      log.error(error.message, { rule: error.rule });
      return { ...base, status: 'payload_invalid', sampleCount: samples.length, dropped, rule: error.rule, error: error.message };
    }
    throw error;
  }

  const stats = { ...base, sampleCount: samples.length, dropped, forecast };
  const result = await options.submitter.submit(spec.id, payload);
  if (!result.ok) {
    log.error('Submission failed', { error: result.error, status: result.statusCode });
    return { ...stats, status: 'submit_failed', error: result.error };
  }

  // A failed write here leaves the platform ahead of the ledger; stop the run
  options.ledger.record(spec.id);
  return { ...stats, status: 'submitted' };
}

export async function runForecastBatch(options: RunForecastBatchOptions): Promise<BatchResult> {
  const log = options.logger ?? rootLogger;
  const outcomes: QuestionOutcome[] = [];

  log.info(`Processing ${options.items.length} questions`, {
    submitter: options.submitter.name,
    force: options.force ?? false,
  });

  for (const [index, item] of options.items.entries()) {
    const outcome = await processQuestion(item, options, log.child({ question_id: item.spec.id }));
    outcomes.push(outcome);
    options.onOutcome?.(outcome, index);
  }

  const summary = summarizeOutcomes(outcomes);
  log.info('Batch complete', { ...summary });
  return { outcomes, summary };
}
