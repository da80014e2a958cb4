/**
 * Error Types
 *
 * Conditions detected by the forecasting core are deterministic for a given
 * input and never retryable. Only transport failures may be.
 */

export type QuestionId = number;

export class WorldcastError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;
  public readonly questionId?: QuestionId;
  public readonly retryable: boolean;

  constructor(
    message: string,
    code: string,
    options?: {
      cause?: Error;
      context?: Record<string, unknown>;
      questionId?: QuestionId;
      retryable?: boolean;
    }
  ) {
    super(message);
    this.name = 'WorldcastError';
    this.code = code;
    this.context = options?.context;
    this.questionId = options?.questionId;
    this.retryable = options?.retryable ?? false;

    if (options?.cause) {
      this.cause = options.cause;
    }

    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      questionId: this.questionId,
      context: this.context,
      retryable: this.retryable,
    };
  }
}

/**
 * No usable world survived collection, or the surviving worlds carry no signal.
 * The question is skipped; the run continues.
 */
export class InsufficientSamplesError extends WorldcastError {
  public readonly sampleCount: number;

  constructor(questionId: QuestionId, sampleCount: number, reason: string) {
    super(`Insufficient samples for question ${questionId}: ${reason}`, 'INSUFFICIENT_SAMPLES', {
      questionId,
      context: { sampleCount, reason },
    });
    this.name = 'InsufficientSamplesError';
    this.sampleCount = sampleCount;
  }
}

export type PayloadRule =
  | 'payload.type_mismatch'
  | 'payload.extra_field'
  | 'payload.not_finite'
  | 'binary.missing'
  | 'binary.range'
  | 'categorical.missing'
  | 'categorical.keys'
  | 'categorical.range'
  | 'categorical.sum'
  | 'numeric.missing'
  | 'numeric.length'
  | 'numeric.range'
  | 'numeric.monotonic'
  | 'numeric.lower_bound'
  | 'numeric.upper_bound';

/**
 * A payload would be rejected by the platform. Submission for the question is
 * aborted; the run continues.
 */
export class PayloadInvalidError extends WorldcastError {
  public readonly rule: PayloadRule;
  public readonly value: unknown;

  constructor(questionId: QuestionId, rule: PayloadRule, detail: string, value: unknown) {
    super(`Invalid payload for question ${questionId} [${rule}]: ${detail}`, 'PAYLOAD_INVALID', {
      questionId,
      context: { rule, value },
    });
    this.name = 'PayloadInvalidError';
    this.rule = rule;
    this.value = value;
  }
}

/**
 * The posted-id store exists but cannot be trusted. Fatal to the run.
 */
export class LedgerCorruptError extends WorldcastError {
  public readonly path: string;

  constructor(path: string, detail: string, cause?: Error) {
    super(`Posted-id ledger at ${path} is corrupt: ${detail}`, 'LEDGER_CORRUPT', {
      cause,
      context: { path },
    });
    this.name = 'LedgerCorruptError';
    this.path = path;
  }
}

export class ConfigError extends WorldcastError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', { context });
    this.name = 'ConfigError';
  }
}

export class SubmissionError extends WorldcastError {
  public readonly statusCode?: number;

  constructor(
    message: string,
    options?: { questionId?: QuestionId; statusCode?: number; cause?: Error }
  ) {
    // Rate limits and server errors may clear up on their own
    const status = options?.statusCode;
    const retryable = status === 429 || (status !== undefined && status >= 500);

    super(message, 'SUBMISSION_ERROR', {
      questionId: options?.questionId,
      cause: options?.cause,
      context: { statusCode: status },
      retryable,
    });
    this.name = 'SubmissionError';
    this.statusCode = status;
  }
}

export function isWorldcastError(error: unknown): error is WorldcastError {
  return error instanceof WorldcastError;
}

/**
 * Errors that end the whole run rather than a single question.
 */
export function isFatalError(error: unknown): boolean {
  return error instanceof LedgerCorruptError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
