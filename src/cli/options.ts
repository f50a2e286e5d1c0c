/**
 * Shared CLI option helpers.
 *
 * Config loading with command-line overrides, logger setup and
 * chalk-coloured message printers used across all commands.
 */

import { resolve } from 'node:path';
import type { Command } from 'commander';
import chalk from 'chalk';

import { loadConfig, type LoadedConfig } from '../config/loader.js';
import { parseDuration } from '../utils/time.js';
import { setLogFile, setLogLevel } from '../utils/logger.js';

// ---------------------------------------------------------------------------
// Option registration helpers
// ---------------------------------------------------------------------------

export interface ConfigOptions {
  config?: string;
  verbose?: boolean;
}

/**
 * Add the -c/--config option to a command.
 */
export function addConfigOption(cmd: Command): Command {
  return cmd.option('-c, --config <path>', 'Path to YAML/JSON config file (default: ./misp-extractor.yaml)');
}

/**
 * Add the --verbose flag to a command.
 */
export function addVerboseOption(cmd: Command): Command {
  return cmd.option('--verbose', 'Debug logging');
}

// ---------------------------------------------------------------------------
// Config resolution
// ---------------------------------------------------------------------------

export interface ConfigOverrides {
  lookback?: string;
  types?: string;
  jsonFile?: string;
  cacheDb?: string;
  backupDb?: string;
}

/**
 * Parse a comma-separated attribute type list.
 *
 * @example parseTypes('ip-dst, md5,,md5') => ['ip-dst', 'md5']
 */
export function parseTypes(typesStr: string): string[] {
  const types = typesStr
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
  return [...new Set(types)];
}

/**
 * Load the config file, then apply command-line overrides on top.
 * Override paths resolve against the working directory.
 */
export function resolveConfig(options: ConfigOptions & ConfigOverrides): LoadedConfig {
  const loaded = loadConfig({ path: options.config });
  const { config } = loaded;

  if (options.lookback) {
    config.extraction.lookbackMs = parseDuration(options.lookback);
  }
  if (options.types !== undefined) {
    const types = parseTypes(options.types);
    if (types.length === 0) {
      throw new Error('--types must list at least one attribute type');
    }
    config.extraction.iocTypes = types;
  }
  if (options.jsonFile) config.output.jsonFile = resolve(options.jsonFile);
  if (options.cacheDb) config.output.cacheDb = resolve(options.cacheDb);
  if (options.backupDb) config.output.backupDb = resolve(options.backupDb);

  setLogLevel(options.verbose ? 'debug' : config.logging.level);
  setLogFile(config.logging.file);

  return loaded;
}

// ---------------------------------------------------------------------------
// Message display
// ---------------------------------------------------------------------------

/**
 * Print a user-friendly error message with optional details.
 */
export function printError(message: string, detail?: string): void {
  console.error(chalk.red(`\nError: ${message}`));
  if (detail) {
    console.error(chalk.gray(`  ${detail}`));
  }
  console.error('');
}

export function printInfo(message: string): void {
  console.log(chalk.cyan(`  ${message}`));
}

export function printSuccess(message: string): void {
  console.log(chalk.green(`  ${message}`));
}

export function printWarning(message: string): void {
  console.log(chalk.yellow(`  ${message}`));
}

export function printHeader(title: string): void {
  console.log('');
  console.log(chalk.bold.cyan(`  ${title}`));
  console.log(chalk.gray('  ─────────────────────────────────────────'));
  console.log('');
}
