/**
 * Integration Test - Batch pipeline against a real ledger file and a fake submitter
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import { PostedIdLedger } from '../../src/core/ledger/posted-ledger.js';
import {
  QuestionBatchSchema,
  batchItemsFromFile,
  runForecastBatch,
  type BatchItem,
  type PostedLedger,
} from '../../src/forecasting/pipeline.js';
import type { Submitter, SubmissionResult } from '../../src/submission/submitter.js';
import type { QuestionId, SubmissionPayload } from '../../src/forecasting/types.js';
import { makeTempDir, silentLogger } from '../helpers/fixtures.js';

class FakeSubmitter implements Submitter {
  readonly name = 'fake';
  readonly calls: Array<{ questionId: QuestionId; payload: SubmissionPayload }> = [];

  constructor(private readonly failing: ReadonlySet<QuestionId> = new Set()) {}

  async submit(questionId: QuestionId, payload: SubmissionPayload): Promise<SubmissionResult> {
    this.calls.push({ questionId, payload });
    return this.failing.has(questionId)
      ? { ok: false, error: 'rejected by platform', statusCode: 400 }
      : { ok: true, statusCode: 201 };
  }
}

const batch = QuestionBatchSchema.parse({
  questions: [
    {
      id: 101,
      type: 'binary',
      title: 'Will it rain?',
      worlds: [{ answer: true }, { answer: true }, { answer: true }, { answer: false }],
    },
    {
      id: 102,
      type: 'multiple_choice',
      options: ['Red', 'Blue'],
      worlds: [{ scores: { Red: 3, Blue: 1 } }],
    },
    {
      id: 103,
      type: 'numeric',
      worlds: [{ value: 10 }, { value: 20 }, { value: 30 }],
    },
    { id: 104, type: 'binary', worlds: [null, { error: 'timeout' }] },
    {
      id: 105,
      type: 'multiple_choice',
      options: ['Red', 'Blue'],
      worlds: [{ scores: { Red: -1, Blue: -2 } }],
    },
    { id: 106, type: 'binary', worlds: [{ answer: false }] },
    { id: 107, type: 'binary', worlds: [{ answer: true }] },
  ],
});

describe('runForecastBatch', () => {
  let dir: string;
  let ledgerPath: string;
  let items: BatchItem[];

  const openLedger = (): PostedIdLedger => {
    const ledger = new PostedIdLedger({ path: ledgerPath, logger: silentLogger() });
    ledger.load();
    return ledger;
  };

  beforeEach(() => {
    dir = makeTempDir('pipeline');
    ledgerPath = path.join(dir, 'posted_ids.json');
    items = batchItemsFromFile(batch);
    openLedger().record(107);
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should submit, skip and record each question once', async () => {
    const ledger = openLedger();
    const submitter = new FakeSubmitter(new Set([106]));

    const result = await runForecastBatch({ items, ledger, submitter, logger: silentLogger() });

    expect(result.outcomes.map(o => [o.questionId, o.status])).toEqual([
      [101, 'submitted'],
      [102, 'submitted'],
      [103, 'submitted'],
      [104, 'insufficient_samples'],
      [105, 'insufficient_samples'],
      [106, 'submit_failed'],
      [107, 'skipped_posted'],
    ]);
    expect(result.summary).toEqual({
      total: 7,
      submitted: 3,
      skipped_posted: 1,
      insufficient_samples: 2,
      payload_invalid: 0,
      submit_failed: 1,
    });
    expect(submitter.calls.map(c => c.questionId)).toEqual([101, 102, 103, 106]);
    expect(openLedger().list()).toEqual([107, 101, 102, 103]);
  });

  it('should send canonical payloads', async () => {
    const submitter = new FakeSubmitter();
    await runForecastBatch({ items, ledger: openLedger(), submitter, logger: silentLogger() });

    const [binary, categorical, numeric] = submitter.calls.map(c => c.payload);
    expect(binary).toEqual({ probability_yes: 0.75, probability_yes_per_category: null, continuous_cdf: null });
    expect(categorical.probability_yes_per_category).toEqual({ Red: 0.75, Blue: 0.25 });
    expect(numeric.continuous_cdf).toHaveLength(201);
    expect(numeric.continuous_cdf?.[0]).toBe(0);
    expect(numeric.continuous_cdf?.[200]).toBe(1);
  });

  it('should summarize each forecast', async () => {
    const result = await runForecastBatch({
      items,
      ledger: openLedger(),
      submitter: new FakeSubmitter(),
      logger: silentLogger(),
    });

    const [binary, categorical, numeric] = result.outcomes;
    expect(binary.forecast).toEqual({ probability: 0.75 });
    expect(binary.sampleCount).toBe(4);
    expect(categorical.forecast).toEqual({ topOption: { name: 'Red', probability: 0.75 } });
    expect(numeric.forecast?.mean).toBe(20);
    expect(numeric.forecast?.median).toBe(20);
    expect(numeric.forecast?.p10).toBeCloseTo(10.1, 9);
    expect(numeric.forecast?.p90).toBeCloseTo(30.01, 9);
    expect(result.outcomes[3].dropped).toBe(2);
  });

  it('should skip everything already posted on a second run', async () => {
    await runForecastBatch({ items, ledger: openLedger(), submitter: new FakeSubmitter(), logger: silentLogger() });

    const submitter = new FakeSubmitter();
    const result = await runForecastBatch({ items, ledger: openLedger(), submitter, logger: silentLogger() });

    expect(result.summary.submitted).toBe(0);
    expect(result.summary.skipped_posted).toBe(5);
    expect(submitter.calls).toEqual([]);
  });

  it('should resubmit posted questions in force mode', async () => {
    const ledger = openLedger();
    const submitter = new FakeSubmitter();

    const result = await runForecastBatch({ items, ledger, submitter, force: true, logger: silentLogger() });

    expect(result.outcomes[6].status).toBe('submitted');
    expect(submitter.calls.map(c => c.questionId)).toEqual([101, 102, 103, 106, 107]);
    expect(openLedger().list()).toEqual([107, 101, 102, 103, 106]);
  });

  it('should stop the run when the ledger cannot record', async () => {
    const ledger: PostedLedger = {
      contains: () => false,
      record: () => {
        throw new Error('disk full');
      },
    };
    const submitter = new FakeSubmitter();

    await expect(
      runForecastBatch({ items, ledger, submitter, logger: silentLogger() })
    ).rejects.toThrow('disk full');
    expect(submitter.calls.map(c => c.questionId)).toEqual([101]);
  });

  it('should reject a malformed batch file', () => {
    const result = QuestionBatchSchema.safeParse({
      questions: [{ id: 1, type: 'multiple_choice', options: ['Only'], worlds: [] }],
    });
    expect(result.success).toBe(false);
  });
});
