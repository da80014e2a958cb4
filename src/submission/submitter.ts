/**
 * Submission Collaborator Interface
 */

import type { QuestionId, SubmissionPayload } from '../forecasting/types.js';

export type SubmissionResult =
  | { ok: true; statusCode?: number }
  | { ok: false; error: string; statusCode?: number };

export interface Submitter {
  readonly name: string;

  /**
   * Sends one validated payload. Resolves with a failure result rather than
   * rejecting when the platform refuses the forecast.
   */
  submit(questionId: QuestionId, payload: SubmissionPayload): Promise<SubmissionResult>;
}
