/**
 * Run command: one extraction run against MISP.
 *
 * Intended to be invoked by cron (or any scheduler) once per interval.
 * Exit codes: 0 succeeded, 2 degraded (a sink failed), 1 failed/rejected.
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';

import { Extractor } from '../../pipeline/extractor.js';
import type { SourceConnector } from '../../source/connection.js';
import type { DatabaseConfig } from '../../types/config.js';
import type { RunState, RunSummary } from '../../types/ioc.js';
import { errorMessage } from '../../utils/errors.js';
import { setLogToStderr } from '../../utils/logger.js';
import { formatDuration } from '../../utils/time.js';
import {
  addConfigOption,
  addVerboseOption,
  resolveConfig,
  printError,
  printHeader,
  printInfo,
  printSuccess,
  printWarning,
  type ConfigOptions,
  type ConfigOverrides,
} from '../options.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

interface RunOptions extends ConfigOptions, ConfigOverrides {
  json?: boolean;
}

export interface RunCommandDeps {
  /** Source connector factory. Default: MySQL */
  createConnector?: (database: DatabaseConfig) => SourceConnector;
}

const STATE_LABELS: Partial<Record<RunState, string>> = {
  reading: 'Querying MISP database...',
  normalizing: 'Normalizing attributes...',
  writing: 'Writing cache and snapshot...',
};

export const EXIT_CODES: Record<RunSummary['status'], number> = {
  succeeded: 0,
  degraded: 2,
  failed: 1,
  rejected: 1,
};

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerRunCommand(program: Command, deps: RunCommandDeps = {}): void {
  const cmd = program
    .command('run')
    .description('Extract IOCs changed within the lookback window into the snapshot and cache')
    .option('--lookback <duration>', 'Lookback window, e.g. 90m, 24h, 7d (bare number = hours)')
    .option('--types <list>', 'Comma-separated MISP attribute types to extract')
    .option('--json-file <path>', 'Snapshot output file')
    .option('--cache-db <path>', 'SQLite cache file')
    .option('--backup-db <path>', 'Copy the existing cache here before writing')
    .option('--json', 'Print the run summary as JSON');

  addConfigOption(cmd);
  addVerboseOption(cmd);

  cmd.action(async (options: RunOptions) => {
    const summary = await runExtraction(options, deps);
    process.exitCode = EXIT_CODES[summary.status];
  });
}

// ---------------------------------------------------------------------------
// Main Logic
// ---------------------------------------------------------------------------

async function runExtraction(options: RunOptions, deps: RunCommandDeps): Promise<RunSummary> {
  // stdout carries only the JSON summary
  if (options.json) setLogToStderr(true);

  const { config, source } = resolveConfig(options);

  if (!options.json) {
    printHeader('MISP IOC Extraction');
    printInfo(`Config:   ${source ?? '(built-in defaults)'}`);
    printInfo(`Source:   ${config.database.user}@${config.database.host}:${config.database.port}/${config.database.database}`);
    printInfo(`Lookback: ${formatDuration(config.extraction.lookbackMs)}`);
    printInfo(`Types:    ${config.extraction.iocTypes.join(', ')}`);
    printInfo(`Snapshot: ${config.output.jsonFile}`);
    printInfo(`Cache:    ${config.output.cacheDb}`);
    console.log('');
  }

  const spinner = ora({
    text: 'Starting run...',
    isEnabled: !options.json && process.stdout.isTTY,
    isSilent: options.json,
  });
  spinner.start();

  const extractor = new Extractor({
    config,
    createConnector: deps.createConnector,
    onStateChange: (state) => {
      const label = STATE_LABELS[state];
      if (label) spinner.text = label;
    },
  });

  let summary: RunSummary;
  try {
    summary = await extractor.runOnce();
  } catch (err) {
    spinner.fail(chalk.red('Run aborted'));
    printError('Unexpected failure', errorMessage(err));
    throw err;
  }

  if (options.json) {
    spinner.stop();
    console.log(JSON.stringify(summary, null, 2));
    return summary;
  }

  switch (summary.status) {
    case 'succeeded':
      spinner.succeed(chalk.green('Run completed'));
      break;
    case 'degraded':
      spinner.warn(chalk.yellow('Run completed with sink errors'));
      break;
    default:
      spinner.fail(chalk.red(`Run ${summary.status}`));
  }

  printSummary(summary);
  return summary;
}

function printSummary(summary: RunSummary): void {
  console.log('');
  console.log(chalk.bold('  Run Summary'));
  console.log(chalk.gray('  ─────────────────────────────────────────'));
  console.log(`  ${chalk.cyan('Rows read:')}           ${summary.rows_read}`);
  console.log(`  ${chalk.cyan('Records normalized:')}  ${summary.records_normalized}`);
  console.log(`  ${chalk.cyan('Records dropped:')}     ${summary.records_dropped}`);
  console.log(`  ${chalk.cyan('Cache writes:')}        ${summary.cache_writes}`);
  console.log(`  ${chalk.cyan('Snapshot written:')}    ${summary.snapshot_written ? 'yes' : 'no'}`);
  console.log(`  ${chalk.cyan('Duration:')}            ${(summary.duration_ms / 1000).toFixed(1)}s`);
  console.log('');

  if (summary.status === 'succeeded') {
    printSuccess('Extraction complete');
  } else if (summary.status === 'degraded') {
    printWarning(summary.error ?? 'One or more sinks failed');
  } else {
    printError(`Run ${summary.status}`, summary.error);
  }
  console.log('');
}
