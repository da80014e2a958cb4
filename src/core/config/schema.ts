/**
 * Configuration Schema - Zod validation for all config
 */

import { z } from 'zod';

export const GeneralConfigSchema = z.object({
  name: z.string().default('Worldcast'),
  environment: z.enum(['development', 'production']).default('development'),
});

export const LedgerConfigSchema = z.object({
  path: z.string().min(1).default('./.worldcast-state/posted_ids.json'),
});

export const SubmissionConfigSchema = z.object({
  base_url: z.string().url().default('https://www.metaculus.com'),
  token: z.string().optional(),
  timeout_ms: z.number().positive().default(30000),
  max_retries: z.number().int().nonnegative().default(2),
  dry_run: z.boolean().default(true),
});

export const ReportingConfigSchema = z.object({
  out_dir: z.string().default('./reports'),
  enabled: z.boolean().default(true),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  format: z.enum(['json', 'pretty']).default('pretty'),
  file: z.string().optional(),
});

export const ConfigSchema = z.object({
  general: GeneralConfigSchema.default({}),
  ledger: LedgerConfigSchema.default({}),
  submission: SubmissionConfigSchema.default({}),
  reporting: ReportingConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type LedgerConfig = z.infer<typeof LedgerConfigSchema>;
export type SubmissionConfig = z.infer<typeof SubmissionConfigSchema>;
export type ReportingConfig = z.infer<typeof ReportingConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
