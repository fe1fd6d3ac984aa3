import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import {
  ConfigSchema,
  generateDefaultConfig,
  generateDefaultConfigYaml,
  loadConfig,
  parseConfig,
  parsePort,
  resetConfigCache,
  writeDefaultConfig,
} from '../config.js';
import { ConfigError } from '../errors.js';

const savedEnv = { ...process.env };

beforeEach(() => {
  delete process.env['READALOUD_DB_PATH'];
  delete process.env['READALOUD_CONFIG'];
  resetConfigCache();
});

afterEach(() => {
  process.env = { ...savedEnv };
  resetConfigCache();
});

describe('ConfigSchema', () => {
  it('produces valid defaults from empty object', () => {
    const result = ConfigSchema.safeParse({});
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.server.port).toBe(3893);
      expect(result.data.db.path).toBe('~/.readaloud/archive.db');
      expect(result.data.db.busy_timeout_ms).toBe(5000);
      expect(result.data.pagination.default_limit).toBe(100);
    }
  });

  it('keeps defaults next to overrides', () => {
    const result = ConfigSchema.safeParse({ server: { port: 8080 } });
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.server.port).toBe(8080);
      expect(result.data.server.host).toBe('127.0.0.1');
    }
  });

  it('rejects invalid types', () => {
    expect(ConfigSchema.safeParse({ pagination: { max_limit: 0 } }).success).toBe(false);
  });
});

describe('parseConfig', () => {
  it('lets READALOUD_DB_PATH override db.path', () => {
    process.env['READALOUD_DB_PATH'] = '/tmp/override.db';
    const config = parseConfig({ db: { path: '/tmp/file.db', busy_timeout_ms: 100 } });
    expect(config.db.path).toBe('/tmp/override.db');
    expect(config.db.busy_timeout_ms).toBe(100);
  });

  it('throws ConfigError with field errors', () => {
    expect(() => parseConfig({ server: { port: 'eighty' } })).toThrow(ConfigError);
  });
});

describe('parsePort', () => {
  it('returns undefined when no port was given', () => {
    expect(parsePort(undefined)).toBeUndefined();
  });

  it('parses a numeric port', () => {
    expect(parsePort('8080')).toBe(8080);
  });

  it('throws ConfigError for anything that is not a usable port', () => {
    for (const value of ['abc', '', '80.5', '0', '70000']) {
      expect(() => parsePort(value)).toThrow(ConfigError);
    }
    expect(() => parsePort('abc')).toThrow('Invalid port: abc');
  });
});

describe('loadConfig', () => {
  it('reads the file named by READALOUD_CONFIG', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'readaloud-config-'));
    const file = path.join(dir, 'config.yaml');
    fs.writeFileSync(file, 'server:\n  port: 9001\ndb:\n  path: /tmp/custom.db\n', 'utf-8');
    process.env['READALOUD_CONFIG'] = file;

    const config = await loadConfig(true);
    expect(config.server.port).toBe(9001);
    expect(config.db.path).toBe('/tmp/custom.db');
    expect(config.pagination.max_limit).toBe(500);

    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('fails when READALOUD_CONFIG points nowhere', async () => {
    process.env['READALOUD_CONFIG'] = path.join(os.tmpdir(), 'readaloud-missing', 'nope.yaml');
    await expect(loadConfig(true)).rejects.toBeInstanceOf(ConfigError);
  });
});

describe('writeDefaultConfig', () => {
  it('writes YAML that loads back to the defaults', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'readaloud-config-'));
    const file = path.join(dir, 'nested', 'config.yaml');
    writeDefaultConfig(file);
    process.env['READALOUD_CONFIG'] = file;

    expect(await loadConfig(true)).toEqual(generateDefaultConfig());

    fs.rmSync(dir, { recursive: true, force: true });
  });
});

describe('generateDefaultConfigYaml', () => {
  it('returns a YAML string', () => {
    const yaml = generateDefaultConfigYaml();
    expect(yaml).toContain('server:');
    expect(yaml).toContain('port: 3893');
    expect(yaml).toContain('busy_timeout_ms: 5000');
  });
});
