/**
 * Worldcast - forecast aggregation, canonicalization and idempotent submission
 */

export * from './forecasting/types.js';
export { collectSamples, sanitizeOptionName, type CollectedSamples } from './forecasting/collector.js';
export {
  aggregate,
  aggregators,
  BinaryAggregator,
  CategoricalAggregator,
  NumericAggregator,
  type Aggregator,
} from './forecasting/aggregators/index.js';
export { sanitizeNumericCdf, MIN_CDF_STEP, type RawCdf } from './forecasting/cdf-sanitizer.js';
export { validate, assertValidPayload, toSubmissionPayload } from './forecasting/payload-validator.js';
export { quantileFromCdf, summarizeForecast, type ForecastSummary } from './forecasting/summary.js';
export {
  runForecastBatch,
  QuestionBatchSchema,
  batchItemsFromFile,
  type BatchItem,
  type BatchResult,
  type BatchSummary,
  type OutcomeStatus,
  type PostedLedger,
  type QuestionOutcome,
} from './forecasting/pipeline.js';
export { PostedIdLedger, createLedger } from './core/ledger/posted-ledger.js';
export {
  WorldcastError,
  InsufficientSamplesError,
  PayloadInvalidError,
  LedgerCorruptError,
  ConfigError,
  SubmissionError,
  type PayloadRule,
} from './core/errors.js';
export { loadConfig, getConfig } from './core/config/loader.js';
export type { Config } from './core/config/schema.js';
export { Logger, logger } from './core/logging/logger.js';
export {
  DryRunSubmitter,
  HttpSubmitter,
  type Submitter,
  type SubmissionResult,
} from './submission/index.js';
