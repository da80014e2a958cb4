/**
 * Configuration Loader
 *
 * YAML file + environment overrides, validated against ConfigSchema.
 */

import fs from 'node:fs';
import path from 'node:path';
import dotenv from 'dotenv';
import YAML from 'yaml';
import { ConfigSchema, type Config } from './schema.js';
import { ConfigError, errorMessage } from '../errors.js';

export const CONFIG_FILENAME = 'worldcast.config.yaml';

let cachedConfig: Config | null = null;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readConfigFile(configPath: string): Record<string, unknown> {
  if (!fs.existsSync(configPath)) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = YAML.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Failed to parse ${configPath}: ${errorMessage(error)}`, {
      path: configPath,
    });
  }

  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) {
    throw new ConfigError(`${configPath} must contain a mapping at the top level`, { path: configPath });
  }
  return parsed;
}

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = raw[key];
  return isRecord(value) ? { ...value } : {};
}

function applyEnvOverrides(raw: Record<string, unknown>): Record<string, unknown> {
  const env = process.env;
  const ledger = section(raw, 'ledger');
  const submission = section(raw, 'submission');
  const logging = section(raw, 'logging');

  if (env.WORLDCAST_LEDGER_PATH) ledger.path = env.WORLDCAST_LEDGER_PATH;
  if (env.WORLDCAST_API_URL) submission.base_url = env.WORLDCAST_API_URL;
  if (env.WORLDCAST_API_TOKEN) submission.token = env.WORLDCAST_API_TOKEN;
  if (env.LOG_LEVEL) logging.level = env.LOG_LEVEL;

  return { ...raw, ledger, submission, logging };
}

export function loadConfig(configPath?: string): Config {
  dotenv.config();

  const finalPath = configPath ?? path.join(process.cwd(), CONFIG_FILENAME);
  const raw = applyEnvOverrides(readConfigFile(finalPath));
  const result = ConfigSchema.safeParse(raw);

  if (!result.success) {
    const fields = result.error.errors.map(e => `${e.path.join('.')}: ${e.message}`);
    throw new ConfigError(`Invalid configuration: ${fields.join('; ')}`, { path: finalPath, fields });
  }

  cachedConfig = result.data;
  return cachedConfig;
}

export function getConfig(): Config {
  return cachedConfig ?? loadConfig();
}

export function clearConfigCache(): void {
  cachedConfig = null;
}

export function generateDefaultConfig(): string {
  const defaults = ConfigSchema.parse({});
  const header = [
    '# Worldcast configuration',
    '# Secrets such as submission.token are better supplied via WORLDCAST_API_TOKEN.',
    '',
  ].join('\n');
  return header + YAML.stringify(defaults);
}
