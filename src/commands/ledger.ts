/**
 * Ledger Command - Inspect the posted-id ledger
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig } from '../core/config/loader.js';
import { createLedger } from '../core/ledger/posted-ledger.js';
import { errorMessage, isFatalError } from '../core/errors.js';

interface LedgerOptions {
  config?: string;
  check?: string;
}

export function parseQuestionId(value: string): number {
  const id = Number(value);
  if (!Number.isInteger(id) || id <= 0) {
    throw new Error(`Not a question id: ${value}`);
  }
  return id;
}

export const ledgerCommand = new Command('ledger')
  .description('List question ids already posted')
  .option('-c, --config <path>', 'Config file path')
  .option('--check <id>', 'Report whether one question id is recorded')
  .action((options: LedgerOptions) => {
    try {
      const config = loadConfig(options.config);
      const ledger = createLedger(config.ledger.path);
      ledger.load();

      if (options.check !== undefined) {
        const id = parseQuestionId(options.check);
        console.log(ledger.contains(id)
          ? `${chalk.green('[POSTED]')} Q${id}`
          : `${chalk.gray('[NOT POSTED]')} Q${id}`);
        return;
      }

      console.log();
      console.log(chalk.bold(`Posted questions (${ledger.size})`));
      console.log(chalk.gray(ledger.path));
      console.log('-'.repeat(40));
      const ids = ledger.list();
      if (ids.length === 0) {
        console.log(chalk.gray('No questions posted yet.'));
      }
      for (const id of ids) {
        console.log(`  ${id}`);
      }
    } catch (error) {
      console.log(chalk.red(`[FAIL] ${errorMessage(error)}`));
      process.exit(isFatalError(error) ? 2 : 1);
    }
  });
