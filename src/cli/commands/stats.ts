/**
 * Stats command: summarize the IOC cache and the latest snapshot.
 */

import type { Command } from 'commander';
import chalk from 'chalk';

import { CacheSink } from '../../sinks/cache-sink.js';
import { readSnapshot } from '../../sinks/snapshot-sink.js';
import { errorMessage } from '../../utils/errors.js';
import {
  addConfigOption,
  resolveConfig,
  printHeader,
  printWarning,
  type ConfigOptions,
} from '../options.js';

interface StatsOptions extends ConfigOptions {
  cacheDb?: string;
  jsonFile?: string;
}

export function registerStatsCommand(program: Command): void {
  const cmd = program
    .command('stats')
    .description('Show IOC counts in the cache and the latest snapshot')
    .option('--cache-db <path>', 'SQLite cache file')
    .option('--json-file <path>', 'Snapshot file');

  addConfigOption(cmd);

  cmd.action(async (options: StatsOptions) => {
    await runStats(options);
  });
}

async function runStats(options: StatsOptions): Promise<void> {
  const { config } = resolveConfig(options);

  printHeader('IOC Cache Statistics');

  const snapshot = await readSnapshot(config.output.jsonFile);
  if (snapshot === null) {
    printWarning(`No snapshot at ${config.output.jsonFile}`);
  } else {
    console.log(`  ${chalk.cyan('Latest snapshot:')}     ${snapshot.length} records`);
  }

  let cache: CacheSink;
  try {
    cache = CacheSink.open(config.output.cacheDb, { readonly: true });
  } catch (err) {
    printWarning(`Cache unavailable: ${errorMessage(err)}`);
    console.log('');
    return;
  }

  try {
    console.log(`  ${chalk.cyan('Cached IOCs:')}         ${cache.count()}`);
    for (const { attribute_type, count } of cache.countByType()) {
      console.log(`    ${chalk.gray(attribute_type)}: ${count}`);
    }
  } finally {
    cache.close();
  }
  console.log('');
}
