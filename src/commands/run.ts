/**
 * Run Command - Aggregate, validate and submit a batch of questions
 */

import { Command } from 'commander';
import fs from 'node:fs';
import chalk from 'chalk';
import ora from 'ora';
import inquirer from 'inquirer';
import { loadConfig } from '../core/config/loader.js';
import { createLedger } from '../core/ledger/posted-ledger.js';
import { formatForecast, generateReport } from '../core/reporting/reporter.js';
import { logger, configureLogger, createRunId } from '../core/logging/logger.js';
import { errorMessage, isFatalError, isWorldcastError } from '../core/errors.js';
import {
  QuestionBatchSchema,
  batchItemsFromFile,
  runForecastBatch,
  type BatchResult,
  type OutcomeStatus,
  type QuestionBatch,
} from '../forecasting/pipeline.js';
import { DryRunSubmitter, createHttpSubmitter, type Submitter } from '../submission/index.js';

interface RunOptions {
  config?: string;
  force?: boolean;
  yes?: boolean;
  submit?: boolean;
  report: boolean;
}

export function readBatchFile(batchFile: string): QuestionBatch {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(batchFile, 'utf-8'));
  } catch (error) {
    throw new Error(`Cannot read batch file ${batchFile}: ${errorMessage(error)}`);
  }

  const result = QuestionBatchSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.errors.map(e => `${e.path.join('.')}: ${e.message}`);
    throw new Error(`Invalid batch file ${batchFile}: ${issues.join('; ')}`);
  }
  return result.data;
}

async function confirmForce(): Promise<boolean> {
  const answers = await inquirer.prompt<{ proceed: boolean }>([
    {
      type: 'confirm',
      name: 'proceed',
      message: 'Force mode resubmits questions that were already posted. Continue?',
      default: false,
    },
  ]);
  return answers.proceed;
}

const STATUS_COLORS: Record<OutcomeStatus, (text: string) => string> = {
  submitted: chalk.green,
  skipped_posted: chalk.gray,
  insufficient_samples: chalk.yellow,
  payload_invalid: chalk.red,
  submit_failed: chalk.red,
};

export const runCommand = new Command('run')
  .description('Aggregate world outputs and submit forecasts for a batch of questions')
  .argument('<batch_file>', 'JSON file with questions and their world outputs')
  .option('-c, --config <path>', 'Config file path')
  .option('--force', 'Resubmit questions already recorded in the ledger')
  .option('-y, --yes', 'Skip the force-mode confirmation')
  .option('--submit', 'Send forecasts to the platform instead of a dry run')
  .option('--no-report', 'Skip report generation')
  .action(async (batchFile: string, options: RunOptions) => {
    const spinner = ora('Loading batch...').start();

    try {
      const config = loadConfig(options.config);
      configureLogger({
        level: config.logging.level,
        format: config.logging.format,
        file: config.logging.file,
      });

      const runId = createRunId();
      logger.setContext({ run_id: runId, command: 'run' });

      const batch = readBatchFile(batchFile);
      const items = batchItemsFromFile(batch);

      const ledger = createLedger(config.ledger.path);
      ledger.load();
      spinner.succeed(`Loaded ${items.length} questions, ${ledger.size} already posted`);

      if (options.force && !options.yes && !(await confirmForce())) {
        console.log(chalk.yellow('Aborted.'));
        return;
      }

      const dryRun = options.submit ? false : config.submission.dry_run;
      const submitter: Submitter = dryRun
        ? new DryRunSubmitter()
        : createHttpSubmitter(config.submission);

      spinner.start(`Forecasting (${dryRun ? 'dry run' : 'submitting'})...`);
      const result = await runForecastBatch({
        items,
        ledger,
        submitter,
        force: options.force ?? false,
        onOutcome: (outcome, index) => {
          spinner.text = `[${index + 1}/${items.length}] Q${outcome.questionId}: ${outcome.status}`;
        },
      });
      spinner.succeed('Batch complete');

      displayResult(result);

      if (options.report !== false && config.reporting.enabled) {
        const report = generateReport({
          runId,
          command: 'run',
          timestamp: Date.now(),
          outcomes: result.outcomes,
          summary: result.summary,
          settings: {
            batch_file: batchFile,
            dry_run: dryRun,
            force: options.force ?? false,
          },
        });
        console.log();
        console.log(`Reports: ${chalk.cyan(report.paths.join(', '))}`);
      }

      console.log();
      console.log(`Run ID: ${chalk.gray(runId)}`);
    } catch (error) {
      spinner.fail(`Run failed: ${errorMessage(error)}`);
      logger.error('Run failed', isWorldcastError(error) ? error.toJSON() : { error: errorMessage(error) });
      process.exit(isFatalError(error) ? 2 : 1);
    }
  });

function displayResult(result: BatchResult): void {
  console.log();
  console.log(chalk.bold('='.repeat(70)));
  console.log(chalk.bold('FORECAST RESULTS'));
  console.log(chalk.bold('='.repeat(70)));
  console.log();

  for (const outcome of result.outcomes) {
    const color = STATUS_COLORS[outcome.status];
    const title = outcome.title ? ` ${outcome.title.slice(0, 40)}` : '';
    console.log(`${chalk.bold(`Q${outcome.questionId}`)}${title} ${chalk.gray(`(${outcome.type})`)}`);
    console.log(`  Outcome:  ${color(outcome.status)}`);
    if (outcome.forecast) {
      console.log(`  Forecast: ${formatForecast(outcome.forecast)}`);
    }
    if (outcome.sampleCount !== undefined) {
      console.log(`  Samples:  ${outcome.sampleCount} used, ${outcome.dropped ?? 0} dropped`);
    }
    if (outcome.error) {
      console.log(`  ${chalk.gray(outcome.error)}`);
    }
    console.log();
  }

  const { summary } = result;
  console.log('-'.repeat(70));
  console.log(
    `${chalk.green(summary.submitted)} submitted, ` +
    `${chalk.gray(summary.skipped_posted)} already posted, ` +
    `${chalk.yellow(summary.insufficient_samples)} insufficient, ` +
    `${chalk.red(summary.payload_invalid + summary.submit_failed)} failed ` +
    `(${summary.total} total)`
  );
}
