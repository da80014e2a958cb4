/**
 * Configuration Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import YAML from 'yaml';
import { ConfigSchema } from '../../src/core/config/schema.js';
import { clearConfigCache, generateDefaultConfig, loadConfig } from '../../src/core/config/loader.js';
import { ConfigError } from '../../src/core/errors.js';
import { makeTempDir } from '../helpers/fixtures.js';

const ENV_KEYS = ['WORLDCAST_LEDGER_PATH', 'WORLDCAST_API_TOKEN', 'WORLDCAST_API_URL', 'LOG_LEVEL'] as const;

describe('ConfigSchema', () => {
  it('should parse minimal config with defaults', () => {
    const result = ConfigSchema.parse({});

    expect(result.general.name).toBe('Worldcast');
    expect(result.ledger.path).toBe('./.worldcast-state/posted_ids.json');
    expect(result.submission.base_url).toBe('https://www.metaculus.com');
    expect(result.submission.dry_run).toBe(true);
    expect(result.submission.token).toBeUndefined();
    expect(result.logging.level).toBe('info');
  });

  it('should parse full config', () => {
    const result = ConfigSchema.parse({
      general: { name: 'Test Config', environment: 'production' },
      ledger: { path: '/tmp/ledger.json' },
      submission: { base_url: 'https://forecast.test', token: 'test-token', max_retries: 0, dry_run: false },
      reporting: { out_dir: './out', enabled: false },
      logging: { level: 'debug', format: 'json' },
    });

    expect(result.general.environment).toBe('production');
    expect(result.ledger.path).toBe('/tmp/ledger.json');
    expect(result.submission.max_retries).toBe(0);
    expect(result.submission.dry_run).toBe(false);
    expect(result.reporting.enabled).toBe(false);
    expect(result.logging.format).toBe('json');
  });

  it('should reject an empty ledger path', () => {
    expect(() => ConfigSchema.parse({ ledger: { path: '' } })).toThrow();
  });

  it('should reject an invalid base url', () => {
    expect(() => ConfigSchema.parse({ submission: { base_url: 'not a url' } })).toThrow();
  });

  it('should reject negative retries', () => {
    expect(() => ConfigSchema.parse({ submission: { max_retries: -1 } })).toThrow();
  });
});

describe('loadConfig', () => {
  let dir: string;
  const savedEnv: Partial<Record<(typeof ENV_KEYS)[number], string>> = {};

  beforeEach(() => {
    clearConfigCache();
    dir = makeTempDir('config');
    for (const key of ENV_KEYS) {
      savedEnv[key] = process.env[key];
      delete process.env[key];
    }
  });

  afterEach(() => {
    clearConfigCache();
    fs.rmSync(dir, { recursive: true, force: true });
    for (const key of ENV_KEYS) {
      const value = savedEnv[key];
      if (value === undefined) delete process.env[key];
      else process.env[key] = value;
    }
  });

  it('should fall back to defaults when the file is missing', () => {
    const config = loadConfig(path.join(dir, 'missing.yaml'));
    expect(config.ledger.path).toBe('./.worldcast-state/posted_ids.json');
  });

  it('should read values from YAML', () => {
    const file = path.join(dir, 'worldcast.config.yaml');
    fs.writeFileSync(file, 'ledger:\n  path: ./state/ids.json\nsubmission:\n  dry_run: false\n');

    const config = loadConfig(file);
    expect(config.ledger.path).toBe('./state/ids.json');
    expect(config.submission.dry_run).toBe(false);
    expect(config.submission.timeout_ms).toBe(30000);
  });

  it('should let environment variables override the file', () => {
    const file = path.join(dir, 'worldcast.config.yaml');
    fs.writeFileSync(file, 'ledger:\n  path: ./state/ids.json\n');
    process.env.WORLDCAST_LEDGER_PATH = '/var/worldcast/ids.json';
    process.env.WORLDCAST_API_TOKEN = 'test-token';
    process.env.LOG_LEVEL = 'warn';

    const config = loadConfig(file);
    expect(config.ledger.path).toBe('/var/worldcast/ids.json');
    expect(config.submission.token).toBe('test-token');
    expect(config.logging.level).toBe('warn');
  });

  it('should raise ConfigError naming the invalid field', () => {
    const file = path.join(dir, 'worldcast.config.yaml');
    fs.writeFileSync(file, 'logging:\n  level: loud\n');

    expect(() => loadConfig(file)).toThrow(ConfigError);
    expect(() => loadConfig(file)).toThrow(/logging\.level/);
  });

  it('should raise ConfigError when the top level is not a mapping', () => {
    const file = path.join(dir, 'worldcast.config.yaml');
    fs.writeFileSync(file, '- one\n- two\n');

    expect(() => loadConfig(file)).toThrow(ConfigError);
  });

  it('should generate a default config that loads back unchanged', () => {
    const file = path.join(dir, 'worldcast.config.yaml');
    fs.writeFileSync(file, generateDefaultConfig());

    expect(loadConfig(file)).toEqual(ConfigSchema.parse({}));
    expect(YAML.parse(generateDefaultConfig())).toEqual(ConfigSchema.parse({}));
  });
});
