#!/usr/bin/env node

/**
 * Worldcast CLI - aggregate simulated-world forecasts and submit them once
 */

import { Command } from 'commander';
import {
  initCommand,
  runCommand,
  ledgerCommand,
  doctorCommand,
} from '../commands/index.js';

const program = new Command();

program
  .name('worldcast')
  .description('Aggregate per-world forecasts into platform payloads and submit each question once')
  .version('1.0.0');

program.addCommand(initCommand);
program.addCommand(runCommand);
program.addCommand(ledgerCommand);
program.addCommand(doctorCommand);

await program.parseAsync(process.argv);
