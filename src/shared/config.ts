import { z } from 'zod';
import { cosmiconfig } from 'cosmiconfig';
import fs from 'node:fs';
import path from 'node:path';
import { stringify as yamlStringify } from 'yaml';
import { resolvePath, getArchiveDir } from './utils.js';
import { ConfigError } from './errors.js';
import { logger } from './logger.js';

const Port = z.number().int().min(1).max(65535);

export const ConfigSchema = z.object({
  server: z
    .object({
      port: Port.default(3893),
      host: z.string().default('127.0.0.1'),
    })
    .default({}),

  db: z
    .object({
      path: z.string().default('~/.readaloud/archive.db'),
      busy_timeout_ms: z.number().int().nonnegative().default(5000),
    })
    .default({}),

  pagination: z
    .object({
      default_limit: z.number().int().positive().default(100),
      max_limit: z.number().int().positive().default(500),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

let cachedConfig: Config | null = null;

export function generateDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

export function generateDefaultConfigYaml(): string {
  return yamlStringify(generateDefaultConfig());
}

export function writeDefaultConfig(configPath: string): void {
  const yaml = generateDefaultConfigYaml();
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, yaml, 'utf-8');
}

function asRecord(value: unknown): Record<string, unknown> {
  if (value !== null && typeof value === 'object' && !Array.isArray(value)) {
    return Object.fromEntries(Object.entries(value));
  }
  return {};
}

/** Parse a --port style flag; undefined when the flag was not given. */
export function parsePort(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;

  const parsed = z.coerce.number().pipe(Port).safeParse(value);
  if (!parsed.success) {
    throw new ConfigError(`Invalid port: ${value}`, { port: value });
  }
  return parsed.data;
}

/**
 * Validate a raw config object, applying env overrides first.
 * READALOUD_DB_PATH wins over db.path from any file.
 */
export function parseConfig(raw: Record<string, unknown>): Config {
  const rawConfig = { ...raw };

  const envDbPath = process.env['READALOUD_DB_PATH'];
  if (envDbPath) {
    const db = asRecord(rawConfig['db']);
    db['path'] = envDbPath;
    rawConfig['db'] = db;
  }

  const parsed = ConfigSchema.safeParse(rawConfig);
  if (!parsed.success) {
    throw new ConfigError('Invalid configuration', {
      errors: parsed.error.flatten().fieldErrors,
    });
  }
  return parsed.data;
}

export async function loadConfig(force = false): Promise<Config> {
  if (cachedConfig && !force) return cachedConfig;

  const explorer = cosmiconfig('readaloud', {
    searchPlaces: [
      'readaloud.config.yaml',
      'readaloud.config.yml',
      '.readaloudrc.yaml',
      '.readaloudrc.yml',
    ],
  });

  const envConfigPath = process.env['READALOUD_CONFIG'];
  const defaultConfigPath = path.join(getArchiveDir(), 'config.yaml');

  let rawConfig: Record<string, unknown> = {};

  if (envConfigPath) {
    const resolved = resolvePath(envConfigPath);
    if (!fs.existsSync(resolved)) {
      throw new ConfigError(`Config file not found: ${resolved}`);
    }
    const result = await explorer.load(resolved);
    rawConfig = asRecord(result?.config);
  } else if (fs.existsSync(defaultConfigPath)) {
    const result = await explorer.load(defaultConfigPath);
    rawConfig = asRecord(result?.config);
  } else {
    logger.debug('No config file found, using defaults');
  }

  cachedConfig = parseConfig(rawConfig);
  return cachedConfig;
}

export function resetConfigCache(): void {
  cachedConfig = null;
}
