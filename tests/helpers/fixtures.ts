/**
 * Shared test fixtures
 */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { Logger } from '../../src/core/logging/logger.js';
import { QuestionSpecSchema, type QuestionSpec } from '../../src/forecasting/types.js';

export function makeSpec(input: Record<string, unknown>): QuestionSpec {
  return QuestionSpecSchema.parse(input);
}

export function silentLogger(): Logger {
  const log = new Logger();
  log.configure({ silent: true });
  return log;
}

export function makeTempDir(prefix: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `worldcast-${prefix}-`));
}

export function isNonDecreasing(values: readonly number[]): boolean {
  return values.every((v, i) => i === 0 || v >= values[i - 1]);
}
