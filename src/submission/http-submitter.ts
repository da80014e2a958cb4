/**
 * HTTP Submitter - posts forecasts to the platform's forecast endpoint
 */

import { request } from 'undici';
import type { Submitter, SubmissionResult } from './submitter.js';
import type { QuestionId, SubmissionPayload } from '../forecasting/types.js';
import type { SubmissionConfig } from '../core/config/schema.js';
import { SubmissionError, errorMessage } from '../core/errors.js';
import { withRetry } from '../core/retry.js';
import { logger as rootLogger, type Logger } from '../core/logging/logger.js';

export const FORECAST_PATH = '/api/questions/forecast/';

export interface HttpSubmitterOptions {
  baseUrl: string;
  token: string;
  timeoutMs?: number;
  maxRetries?: number;
  /** First backoff delay; doubles on each retry. */
  retryBaseDelayMs?: number;
  logger?: Logger;
}

export class HttpSubmitter implements Submitter {
  readonly name = 'http';
  private readonly url: string;
  private readonly token: string;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryBaseDelayMs: number;
  private readonly log: Logger;

  constructor(options: HttpSubmitterOptions) {
    if (!options.token) {
      throw new Error('A submission token is required. Set WORLDCAST_API_TOKEN or submission.token.');
    }
    this.url = new URL(FORECAST_PATH, options.baseUrl).toString();
    this.token = options.token;
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.maxRetries = options.maxRetries ?? 2;
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? 1000;
    this.log = options.logger ?? rootLogger;
  }

  async submit(questionId: QuestionId, payload: SubmissionPayload): Promise<SubmissionResult> {
    try {
      const statusCode = await withRetry(() => this.post(questionId, payload), {
        maxRetries: this.maxRetries,
        baseDelay: this.retryBaseDelayMs,
        shouldRetry: error => error instanceof SubmissionError && error.retryable,
      });
      this.log.info('Forecast submitted', { question_id: questionId, status: statusCode });
      return { ok: true, statusCode };
    } catch (error) {
      const statusCode = error instanceof SubmissionError ? error.statusCode : undefined;
      this.log.error('Forecast submission failed', {
        question_id: questionId,
        status: statusCode,
        error: errorMessage(error),
      });
      return { ok: false, error: errorMessage(error), statusCode };
    }
  }

  private async post(questionId: QuestionId, payload: SubmissionPayload): Promise<number> {
    const response = await request(this.url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'Authorization': `Token ${this.token}`,
      },
      body: JSON.stringify([{ question: questionId, ...payload }]),
      bodyTimeout: this.timeoutMs,
      headersTimeout: this.timeoutMs,
    });

    const text = await response.body.text();
    if (response.statusCode >= 200 && response.statusCode < 300) {
      return response.statusCode;
    }

    throw new SubmissionError(
      `Platform rejected forecast (${response.statusCode}): ${text.slice(0, 300)}`,
      { questionId, statusCode: response.statusCode }
    );
  }
}

export function createHttpSubmitter(config: SubmissionConfig, logger?: Logger): HttpSubmitter {
  return new HttpSubmitter({
    baseUrl: config.base_url,
    token: config.token ?? '',
    timeoutMs: config.timeout_ms,
    maxRetries: config.max_retries,
    logger,
  });
}
