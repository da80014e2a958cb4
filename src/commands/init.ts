/**
 * Init Command - Write starter configuration
 */

import { Command } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import chalk from 'chalk';
import ora from 'ora';
import { CONFIG_FILENAME, generateDefaultConfig } from '../core/config/loader.js';
import { ConfigSchema } from '../core/config/schema.js';
import { errorMessage } from '../core/errors.js';

interface InitOptions {
  force?: boolean;
}

export const ENV_EXAMPLE = `# Forecast submission
WORLDCAST_API_TOKEN=your-api-token-here
WORLDCAST_API_URL=https://www.metaculus.com

# Posted-id ledger location
WORLDCAST_LEDGER_PATH=./.worldcast-state/posted_ids.json

# Logging
LOG_LEVEL=info
`;

export const initCommand = new Command('init')
  .description('Write a starter config file and .env.example')
  .option('-f, --force', 'Overwrite existing files')
  .action((options: InitOptions) => {
    const spinner = ora('Initializing...').start();

    try {
      const basePath = process.cwd();

      const configPath = path.join(basePath, CONFIG_FILENAME);
      if (fs.existsSync(configPath) && !options.force) {
        spinner.info(`${CONFIG_FILENAME} already exists (use --force to overwrite)`);
      } else {
        fs.writeFileSync(configPath, generateDefaultConfig());
        spinner.succeed(`Created ${chalk.cyan(CONFIG_FILENAME)}`);
      }

      const envPath = path.join(basePath, '.env.example');
      if (fs.existsSync(envPath) && !options.force) {
        spinner.info('.env.example already exists');
      } else {
        fs.writeFileSync(envPath, ENV_EXAMPLE);
        spinner.succeed(`Created ${chalk.cyan('.env.example')}`);
      }

      const defaults = ConfigSchema.parse({});
      for (const dir of [defaults.reporting.out_dir, path.dirname(defaults.ledger.path)]) {
        const dirPath = path.resolve(basePath, dir);
        if (!fs.existsSync(dirPath)) {
          fs.mkdirSync(dirPath, { recursive: true });
          spinner.succeed(`Created ${chalk.cyan(dir + '/')} directory`);
        }
      }

      console.log();
      console.log(chalk.green('[OK] Initialization complete!'));
      console.log();
      console.log('Next steps:');
      console.log(`  1. Copy ${chalk.cyan('.env.example')} to ${chalk.cyan('.env')} and add your API token`);
      console.log(`  2. Edit ${chalk.cyan(CONFIG_FILENAME)} to configure your setup`);
      console.log(`  3. Run ${chalk.cyan('worldcast doctor')} to validate your configuration`);
      console.log(`  4. Run ${chalk.cyan('worldcast run <batch_file>')} for a dry run`);
    } catch (error) {
      spinner.fail(`Initialization failed: ${errorMessage(error)}`);
      process.exit(1);
    }
  });
