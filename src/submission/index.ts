export type { Submitter, SubmissionResult } from './submitter.js';
export { DryRunSubmitter } from './dry-run-submitter.js';
export { HttpSubmitter, createHttpSubmitter, FORECAST_PATH } from './http-submitter.js';
