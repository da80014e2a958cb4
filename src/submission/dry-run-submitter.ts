/**
 * Dry-run Submitter - accepts every payload without any network call
 */

import type { Submitter, SubmissionResult } from './submitter.js';
import type { QuestionId, SubmissionPayload } from '../forecasting/types.js';
import { logger as rootLogger, type Logger } from '../core/logging/logger.js';

export class DryRunSubmitter implements Submitter {
  readonly name = 'dry-run';
  readonly submitted: Array<{ questionId: QuestionId; payload: SubmissionPayload }> = [];

  constructor(private readonly log: Logger = rootLogger) {}

  async submit(questionId: QuestionId, payload: SubmissionPayload): Promise<SubmissionResult> {
    this.submitted.push({ questionId, payload });
    this.log.info('Dry run: forecast not sent', {
      question_id: questionId,
      probability_yes: payload.probability_yes,
      categories: payload.probability_yes_per_category
        ? Object.keys(payload.probability_yes_per_category).length
        : undefined,
      cdf_points: payload.continuous_cdf?.length,
    });
    return { ok: true };
  }
}
