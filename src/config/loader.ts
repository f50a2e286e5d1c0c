/**
 * Configuration loading.
 *
 * Reads a YAML or JSON file, overlays environment variables, validates the
 * result with zod and resolves output paths against the config file's
 * directory. Missing default config falls back to built-in defaults.
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, isAbsolute, resolve } from 'node:path';
import { z } from 'zod';

import type { ExtractorConfig } from '../types/config.js';
import { errorMessage } from '../utils/errors.js';
import { parseDuration } from '../utils/time.js';
import { parseYaml } from '../utils/yaml.js';

export const DEFAULT_CONFIG_FILE = 'misp-extractor.yaml';

export const DEFAULT_IOC_TYPES = [
  'ip-src', 'ip-dst', 'domain', 'hostname', 'url',
  'md5', 'sha1', 'sha256', 'filename', 'email-src',
  'email-dst', 'mutex', 'regkey', 'snort', 'yara',
];

// --- Zod Schemas ---

const durationSchema = z
  .union([z.string(), z.number()])
  .transform((value, ctx) => {
    try {
      return parseDuration(value);
    } catch (err) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: errorMessage(err) });
      return z.NEVER;
    }
  });

export const ConfigFileSchema = z.object({
  database: z
    .object({
      host: z.string().min(1).default('localhost'),
      port: z.coerce.number().int().min(1).max(65535).default(3306),
      user: z.string().min(1).default('misp'),
      password: z.string().default(''),
      database: z.string().min(1).default('misp'),
      connectTimeoutMs: z.number().int().positive().default(10000),
      connectRetries: z.number().int().min(0).max(10).default(2),
    })
    .default({}),
  extraction: z
    .object({
      lookback: durationSchema.default('24h'),
      iocTypes: z
        .array(z.string().trim().min(1))
        .min(1, 'iocTypes must list at least one attribute type')
        .default(DEFAULT_IOC_TYPES),
      queryTimeoutMs: z.number().int().positive().default(300000),
    })
    .default({}),
  output: z
    .object({
      jsonFile: z.string().min(1).default('misp_recent_iocs.json'),
      cacheDb: z.string().min(1).default('ioc_cache.db'),
      backupDb: z.string().min(1).optional(),
    })
    .default({}),
  logging: z
    .object({
      level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
      file: z.string().min(1).optional(),
    })
    .default({}),
});

export type ConfigFileInput = z.input<typeof ConfigFileSchema>;

export interface LoadConfigOptions {
  /** Explicit config path. When set, the file must exist. */
  path?: string;
  /** Directory searched for DEFAULT_CONFIG_FILE. Default: process.cwd() */
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export interface LoadedConfig {
  config: ExtractorConfig;
  /** Absolute path of the file that was read, or null when defaults were used. */
  source: string | null;
}

export class ConfigError extends Error {
  constructor(message: string, public readonly issues: string[] = []) {
    super(issues.length > 0 ? `${message}:\n  - ${issues.join('\n  - ')}` : message);
    this.name = 'ConfigError';
  }
}

/**
 * Load, validate and resolve the extractor configuration.
 */
export function loadConfig(options: LoadConfigOptions = {}): LoadedConfig {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;

  let source: string | null = null;
  let raw: unknown = {};

  if (options.path) {
    source = resolve(cwd, options.path);
    if (!existsSync(source)) {
      throw new ConfigError(`Config file not found: ${source}`);
    }
  } else if (existsSync(resolve(cwd, DEFAULT_CONFIG_FILE))) {
    source = resolve(cwd, DEFAULT_CONFIG_FILE);
  }

  if (source) {
    try {
      raw = parseYaml(readFileSync(source, 'utf-8')) ?? {};
    } catch (err) {
      throw new ConfigError(`Cannot parse config file ${source}: ${errorMessage(err)}`);
    }
  }

  const parsed = ConfigFileSchema.safeParse(applyEnvOverrides(raw, env));
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid configuration${source ? ` in ${source}` : ''}`,
      parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`),
    );
  }

  const baseDir = source ? dirname(source) : cwd;
  const file = parsed.data;

  const config: ExtractorConfig = {
    database: { ...file.database },
    extraction: {
      lookbackMs: file.extraction.lookback,
      iocTypes: [...new Set(file.extraction.iocTypes)],
      queryTimeoutMs: file.extraction.queryTimeoutMs,
    },
    output: {
      jsonFile: resolvePath(baseDir, file.output.jsonFile),
      cacheDb: resolvePath(baseDir, file.output.cacheDb),
      backupDb: file.output.backupDb ? resolvePath(baseDir, file.output.backupDb) : undefined,
    },
    logging: {
      level: file.logging.level,
      file: file.logging.file ? resolvePath(baseDir, file.logging.file) : undefined,
    },
  };

  return { config, source };
}

function resolvePath(baseDir: string, path: string): string {
  return isAbsolute(path) ? path : resolve(baseDir, path);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const ENV_OVERRIDES: Array<[envKey: string, section: string, key: string]> = [
  ['MISP_DB_HOST', 'database', 'host'],
  ['MISP_DB_PORT', 'database', 'port'],
  ['MISP_DB_USER', 'database', 'user'],
  ['MISP_DB_PASSWORD', 'database', 'password'],
  ['MISP_DB_NAME', 'database', 'database'],
  ['LOG_LEVEL', 'logging', 'level'],
  ['LOG_FILE', 'logging', 'file'],
];

/**
 * Overlay environment variables onto the raw file contents.
 * Non-object input is passed through for the schema to reject.
 */
export function applyEnvOverrides(raw: unknown, env: NodeJS.ProcessEnv): unknown {
  if (!isRecord(raw)) return raw;

  const result: Record<string, unknown> = { ...raw };
  for (const [envKey, section, key] of ENV_OVERRIDES) {
    const value = env[envKey];
    if (value === undefined || value === '') continue;
    const current = result[section];
    result[section] = { ...(isRecord(current) ? current : {}), [key]: value };
  }
  return result;
}

/**
 * Copy of the config safe to print: the database password is masked.
 */
export function redactConfig(config: ExtractorConfig): ExtractorConfig {
  return {
    ...config,
    database: { ...config.database, password: config.database.password ? '********' : '' },
  };
}
