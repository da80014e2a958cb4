/**
 * Doctor Command - Validate configuration, ledger and submission settings
 */

import { Command } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import chalk from 'chalk';
import { loadConfig } from '../core/config/loader.js';
import type { Config } from '../core/config/schema.js';
import { createLedger } from '../core/ledger/posted-ledger.js';
import { errorMessage } from '../core/errors.js';

export interface CheckResult {
  name: string;
  status: 'pass' | 'fail' | 'warn' | 'skip';
  message: string;
  details?: string;
}

interface DoctorOptions {
  config?: string;
}

export const doctorCommand = new Command('doctor')
  .description('Validate configuration, ledger and submission settings')
  .option('-c, --config <path>', 'Config file path')
  .action((options: DoctorOptions) => {
    console.log();
    console.log(chalk.bold('Worldcast Doctor'));
    console.log('='.repeat(60));

    const results: CheckResult[] = [];
    try {
      const config = loadConfig(options.config);
      results.push({
        name: 'Configuration',
        status: 'pass',
        message: `Loaded configuration: ${config.general.name}`,
        details: `Environment: ${config.general.environment}`,
      });
      results.push(checkLedger(config));
      results.push(checkSubmission(config));
      results.push(checkReporting(config));
    } catch (error) {
      results.push({
        name: 'Configuration',
        status: 'fail',
        message: `Failed to load config: ${errorMessage(error)}`,
      });
    }

    console.log();
    for (const result of results) {
      const icon = result.status === 'pass' ? chalk.green('[OK]') :
                   result.status === 'fail' ? chalk.red('[FAIL]') :
                   result.status === 'warn' ? chalk.yellow('[WARN]') :
                   chalk.gray('[SKIP]');

      console.log(`${icon} ${result.name}`);
      console.log(`     ${chalk.gray(result.message)}`);
      if (result.details) {
        console.log(`     ${chalk.gray(result.details)}`);
      }
      console.log();
    }

    console.log('-'.repeat(60));
    const passCount = results.filter(r => r.status === 'pass').length;
    const failCount = results.filter(r => r.status === 'fail').length;
    const warnCount = results.filter(r => r.status === 'warn').length;
    console.log(`${chalk.green(passCount)} passed, ${chalk.red(failCount)} failed, ${chalk.yellow(warnCount)} warnings`);
    console.log();

    if (failCount > 0) {
      console.log(chalk.red('Some checks failed. Please fix the issues above.'));
      process.exit(1);
    } else if (warnCount > 0) {
      console.log(chalk.yellow('Some warnings detected. Dry runs will work; submission may not.'));
    } else {
      console.log(chalk.green('All checks passed! worldcast is ready to use.'));
    }
  });

export function checkLedger(config: Config): CheckResult {
  try {
    const ledger = createLedger(config.ledger.path);
    ledger.load();
    return {
      name: 'Posted-id ledger',
      status: 'pass',
      message: `Readable at ${ledger.path}`,
      details: `Questions posted: ${ledger.size}`,
    };
  } catch (error) {
    return {
      name: 'Posted-id ledger',
      status: 'fail',
      message: errorMessage(error),
      details: 'Fix or remove the file by hand; a corrupt ledger is never reset automatically',
    };
  }
}

export function checkSubmission(config: Config): CheckResult {
  const { submission } = config;
  if (submission.token) {
    return {
      name: 'Submission',
      status: 'pass',
      message: `Token configured for ${submission.base_url}`,
      details: submission.dry_run ? 'dry_run is on; pass --submit to send forecasts' : undefined,
    };
  }
  return {
    name: 'Submission',
    status: submission.dry_run ? 'warn' : 'fail',
    message: 'No submission token configured',
    details: 'Set WORLDCAST_API_TOKEN or submission.token',
  };
}

export function checkReporting(config: Config): CheckResult {
  if (!config.reporting.enabled) {
    return { name: 'Reports', status: 'skip', message: 'Reporting disabled' };
  }
  const outDir = path.resolve(config.reporting.out_dir);
  try {
    fs.mkdirSync(outDir, { recursive: true });
    fs.accessSync(outDir, fs.constants.W_OK);
    return { name: 'Reports', status: 'pass', message: `Writable: ${outDir}` };
  } catch (error) {
    return { name: 'Reports', status: 'fail', message: `Cannot write to ${outDir}: ${errorMessage(error)}` };
  }
}
