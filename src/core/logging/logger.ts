/**
 * Structured Logger
 *
 * One JSON object per line, or a short coloured line in `pretty` mode.
 * Children share their parent's settings, so configuring the root logger
 * after a child was created still applies to that child.
 */

import fs from 'node:fs';
import path from 'node:path';
import chalk from 'chalk';
import { nanoid } from 'nanoid';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'json' | 'pretty';

export interface LogContext {
  run_id?: string;
  question_id?: number;
  command?: string;
  [key: string]: unknown;
}

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  /** Every entry is also appended here as JSON, whatever the console format. */
  file?: string;
  silent?: boolean;
}

interface LoggerSettings {
  level: LogLevel;
  format: LogFormat;
  file?: string;
  silent: boolean;
}

const SEVERITY: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const LEVEL_STYLE: Record<LogLevel, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
};

export class Logger {
  private readonly settings: LoggerSettings;
  private context: LogContext;

  constructor(settings?: LoggerSettings, context: LogContext = {}) {
    this.settings = settings ?? { level: 'info', format: 'json', silent: false };
    this.context = context;
  }

  configure(options: LoggerOptions): void {
    const s = this.settings;
    s.level = options.level ?? s.level;
    s.format = options.format ?? s.format;
    s.silent = options.silent ?? s.silent;
    if (options.file) {
      fs.mkdirSync(path.dirname(options.file), { recursive: true });
      s.file = options.file;
    }
  }

  setContext(ctx: LogContext): void {
    Object.assign(this.context, ctx);
  }

  child(ctx: LogContext): Logger {
    return new Logger(this.settings, { ...this.context, ...ctx });
  }

  debug(message: string, context?: LogContext): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.write('error', message, context);
  }

  private write(level: LogLevel, message: string, context?: LogContext): void {
    const { settings } = this;
    if (SEVERITY[level] < SEVERITY[settings.level]) return;

    const fields: LogContext = { ...this.context, ...context };
    const line = JSON.stringify({ timestamp: new Date().toISOString(), level, message, ...fields });

    if (!settings.silent) {
      const out = settings.format === 'pretty' ? pretty(level, message, fields) : line;
      if (level === 'error') console.error(out);
      else console.log(out);
    }

    if (settings.file) {
      fs.appendFileSync(settings.file, line + '\n');
    }
  }
}

function pretty(level: LogLevel, message: string, fields: LogContext): string {
  const tag = LEVEL_STYLE[level](level.toUpperCase().padEnd(5));
  const run = fields.run_id ? chalk.gray(` ${fields.run_id.slice(0, 8)}`) : '';
  const question = fields.question_id !== undefined ? chalk.bold(` Q${fields.question_id}`) : '';
  return `${tag}${run}${question} ${message}`;
}

export const logger = new Logger();

export function createRunId(): string {
  return nanoid();
}

export function configureLogger(options: LoggerOptions): void {
  logger.configure(options);
}
