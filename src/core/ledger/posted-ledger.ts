/**
 * Posted-Id Ledger
 *
 * Durable set of question ids already submitted. The whole set is rewritten
 * on every change: written to `<path>.tmp`, flushed, then renamed over the
 * real file, so a crash leaves either the old or the new list on disk.
 *
 * Single writer per file; there is no cross-process locking.
 */

import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { LedgerCorruptError, errorMessage, type QuestionId } from '../errors.js';
import { logger as rootLogger, type Logger } from '../logging/logger.js';

const LedgerFileSchema = z.array(z.number().int().positive());

export interface PostedIdLedgerOptions {
  path: string;
  logger?: Logger;
}

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

export class PostedIdLedger {
  readonly path: string;
  private readonly tmpPath: string;
  private readonly log: Logger;
  private ids: QuestionId[] = [];
  private index = new Set<QuestionId>();
  private loaded = false;

  constructor(options: PostedIdLedgerOptions) {
    this.path = path.resolve(options.path);
    this.tmpPath = `${this.path}.tmp`;
    this.log = options.logger ?? rootLogger;
  }

  /**
   * Reads the persisted set. A missing file is a first run; an unreadable or
   * malformed one raises LedgerCorruptError.
   */
  load(): ReadonlySet<QuestionId> {
    let content: string;
    try {
      content = fs.readFileSync(this.path, 'utf-8');
    } catch (error) {
      if (isNodeError(error) && error.code === 'ENOENT') {
        this.replaceState([]);
        this.log.debug('No posted-id ledger yet, starting empty', { ledger: this.path });
        return this.snapshot();
      }
      throw new LedgerCorruptError(this.path, `unreadable: ${errorMessage(error)}`, error instanceof Error ? error : undefined);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new LedgerCorruptError(this.path, 'not valid JSON', error instanceof Error ? error : undefined);
    }

    const result = LedgerFileSchema.safeParse(parsed);
    if (!result.success) {
      throw new LedgerCorruptError(this.path, 'expected a JSON array of positive integer question ids');
    }

    const unique = [...new Set(result.data)];
    if (unique.length !== result.data.length) {
      this.log.warn('Posted-id ledger contains duplicate ids; ignoring repeats', {
        ledger: this.path,
        duplicates: result.data.length - unique.length,
      });
    }

    this.replaceState(unique);
    this.log.debug(`Loaded ${unique.length} posted ids`, { ledger: this.path });
    return this.snapshot();
  }

  contains(id: QuestionId): boolean {
    this.assertLoaded();
    return this.index.has(id);
  }

  /**
   * Adds `id` and persists the full set. Recording an id twice is a no-op.
   * If the write fails the in-memory set is rolled back and the error rethrown.
   */
  record(id: QuestionId): void {
    this.assertLoaded();
    if (this.index.has(id)) return;

    this.ids.push(id);
    this.index.add(id);
    try {
      this.persist();
    } catch (error) {
      this.ids.pop();
      this.index.delete(id);
      throw error;
    }

    this.log.info('Recorded posted question', { question_id: id, ledger: this.path });
  }

  list(): readonly QuestionId[] {
    this.assertLoaded();
    return [...this.ids];
  }

  get size(): number {
    return this.ids.length;
  }

  private snapshot(): ReadonlySet<QuestionId> {
    return new Set(this.ids);
  }

  private replaceState(ids: QuestionId[]): void {
    this.ids = ids;
    this.index = new Set(ids);
    this.loaded = true;
  }

  private assertLoaded(): void {
    if (!this.loaded) {
      throw new Error('PostedIdLedger.load() must be called before use');
    }
  }

  private persist(): void {
    fs.mkdirSync(path.dirname(this.path), { recursive: true });

    const content = JSON.stringify(this.ids, null, 2) + '\n';
    try {
      const fd = fs.openSync(this.tmpPath, 'w');
      try {
        fs.writeSync(fd, content);
        fs.fsyncSync(fd);
      } finally {
        fs.closeSync(fd);
      }
      fs.renameSync(this.tmpPath, this.path);
    } catch (error) {
      fs.rmSync(this.tmpPath, { force: true });
      throw error;
    }
  }
}

export function createLedger(ledgerPath: string, logger?: Logger): PostedIdLedger {
  return new PostedIdLedger({ path: ledgerPath, logger });
}
