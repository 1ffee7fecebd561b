import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { DEFAULT_QUERY_BASE_URL } from './config.js';
import { ConfigLoadFailed, InvalidOption } from './errors.js';
import { OUTPUT_FORMATS, isOutputFormat } from './types.js';
import { createLogger } from './utils/logging.js';
import { getConfigFilePath } from './utils/paths.js';

const logToFile = createLogger('CONFIG');

export const HISTORY_LIMIT = 100;

export const LOG_LEVELS = ['all', 'debug', 'info', 'warning', 'error', 'fatal', 'trace'] as const;
const LEVEL_ALIASES: Record<string, string> = { warn: 'warning' };

export const CONFIG_KEYS = ['source', 'limit', 'format', 'logLevel', 'queryBaseUrl'] as const;
export type ConfigKey = (typeof CONFIG_KEYS)[number];

const stringsOnly = (items: unknown[]): string[] =>
  items.filter((item): item is string => typeof item === 'string');

const stringEntries = (record: Record<string, unknown>): Record<string, string> =>
  Object.fromEntries(
    Object.entries(record).filter((entry): entry is [string, string] => typeof entry[1] === 'string')
  );

// Invalid keys fall back to their defaults one at a time.
const configSchema = z.object({
  defaultSource: z.string().optional().catch(undefined),
  defaultLimit: z.number().int().positive().catch(100),
  outputFormat: z.enum(['json', 'table', 'csv', 'pretty']).catch('json'),
  defaultLogLevel: z
    .string()
    .catch('all')
    .transform((level) => level || 'all'),
  queryBaseUrl: z.string().optional().catch(undefined),
  queryHistory: z.array(z.unknown()).transform(stringsOnly).catch([]),
  savedQueries: z.record(z.unknown()).transform(stringEntries).catch({}),
  sourceAliases: z.record(z.unknown()).transform(stringEntries).catch({})
});

export type CliConfig = z.infer<typeof configSchema>;

/** Validates a decoded config document; absent or invalid keys take their defaults. */
export function parseConfig(data: unknown): CliConfig {
  return configSchema.parse(data ?? {});
}

export function defaultConfig(): CliConfig {
  return parseConfig({});
}

export function applyConfigUpdate(config: CliConfig, updates: Partial<CliConfig>): CliConfig {
  return { ...config, ...updates };
}

/** Newest first, capped at {@link HISTORY_LIMIT}. */
export function withHistoryEntry(config: CliConfig, entry: string): CliConfig {
  return { ...config, queryHistory: [entry, ...config.queryHistory].slice(0, HISTORY_LIMIT) };
}

export function queryBaseUrlOf(config: CliConfig): string {
  return config.queryBaseUrl || DEFAULT_QUERY_BASE_URL;
}

export function isConfigKey(key: string): key is ConfigKey {
  return (CONFIG_KEYS as readonly string[]).includes(key);
}

/**
 * Turns `config set <key> <value>` into a config update, validating the value
 * for its key.
 */
export function configUpdateFor(key: string, value: string): Partial<CliConfig> {
  if (!isConfigKey(key)) {
    throw new InvalidOption(`Invalid config key: ${key}\nValid keys: ${CONFIG_KEYS.join(', ')}`);
  }

  switch (key) {
    case 'source':
      return { defaultSource: value };
    case 'limit': {
      const limit = /^\s*-?\d+\s*$/.test(value) ? parseInt(value, 10) : NaN;
      if (!Number.isInteger(limit) || limit < 1) {
        throw new InvalidOption('Limit must be a positive number');
      }
      return { defaultLimit: limit };
    }
    case 'format':
      if (!isOutputFormat(value)) {
        throw new InvalidOption(`Invalid format: ${value}\nValid formats: ${OUTPUT_FORMATS.join(', ')}`);
      }
      return { outputFormat: value };
    case 'logLevel': {
      const normalized = value.trim().toLowerCase();
      const resolved = LEVEL_ALIASES[normalized] ?? normalized;
      if (!(LOG_LEVELS as readonly string[]).includes(resolved)) {
        throw new InvalidOption(`Invalid log level: ${value}\nValid levels: ${[...LOG_LEVELS].sort().join(', ')}`);
      }
      return { defaultLogLevel: resolved };
    }
    case 'queryBaseUrl':
      if (!value.startsWith('http://') && !value.startsWith('https://')) {
        throw new InvalidOption('queryBaseUrl must start with http:// or https://');
      }
      return { queryBaseUrl: value };
  }
}

/** The JSON config file under the config directory. */
export class ConfigStore {
  readonly filePath: string;

  constructor(filePath: string = getConfigFilePath()) {
    this.filePath = filePath;
  }

  load(): CliConfig {
    if (!fs.existsSync(this.filePath)) {
      return defaultConfig();
    }

    try {
      const content = fs.readFileSync(this.filePath, 'utf8');
      return parseConfig(JSON.parse(content));
    } catch (error) {
      const failure = new ConfigLoadFailed(this.filePath, error);
      logToFile('WARN', failure.message);
      console.error(`Warning: ${failure.message}`);
      return defaultConfig();
    }
  }

  save(config: CliConfig): void {
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    fs.writeFileSync(this.filePath, JSON.stringify(config, null, 2), 'utf8');
    logToFile('DEBUG', 'Config saved', { filePath: this.filePath });
  }

  update(updates: Partial<CliConfig>): CliConfig {
    const next = applyConfigUpdate(this.load(), updates);
    this.save(next);
    return next;
  }

  addToHistory(entry: string): CliConfig {
    const next = withHistoryEntry(this.load(), entry);
    this.save(next);
    return next;
  }
}
