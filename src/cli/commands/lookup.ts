/**
 * Lookup command: search the local IOC cache for an exact value.
 */

import type { Command } from 'commander';
import chalk from 'chalk';

import { CacheSink } from '../../sinks/cache-sink.js';
import type { IocRecord } from '../../types/ioc.js';
import {
  addConfigOption,
  resolveConfig,
  printInfo,
  printWarning,
  type ConfigOptions,
} from '../options.js';

interface LookupOptions extends ConfigOptions {
  cacheDb?: string;
  limit: string;
  json?: boolean;
}

export function registerLookupCommand(program: Command): void {
  const cmd = program
    .command('lookup')
    .description('Look up an indicator value in the IOC cache')
    .argument('<value>', 'Indicator value (IP, domain, hash, ...)')
    .option('--cache-db <path>', 'SQLite cache file')
    .option('-n, --limit <count>', 'Maximum matches to show', '20')
    .option('--json', 'Print matches as JSON');

  addConfigOption(cmd);

  cmd.action((value: string, options: LookupOptions) => {
    const found = runLookup(value, options);
    process.exitCode = found ? 0 : 3;
  });
}

function runLookup(value: string, options: LookupOptions): boolean {
  const { config } = resolveConfig(options);
  const limit = Number.parseInt(options.limit, 10);
  if (!Number.isInteger(limit) || limit <= 0) {
    throw new Error(`--limit must be a positive integer, got "${options.limit}"`);
  }

  const cache = CacheSink.open(config.output.cacheDb, { readonly: true });
  let matches: IocRecord[];
  try {
    matches = cache.findByValue(value.trim(), limit);
  } finally {
    cache.close();
  }

  if (options.json) {
    console.log(JSON.stringify(matches, null, 2));
    return matches.length > 0;
  }

  if (matches.length === 0) {
    printWarning(`No cached IOC matches "${value}"`);
    return false;
  }

  console.log('');
  printInfo(`${matches.length} match(es) for ${chalk.bold(value)}`);
  console.log('');
  for (const m of matches) {
    const idsTag = m.attribute_to_ids ? chalk.red('IDS') : chalk.gray('---');
    console.log(`  ${idsTag} ${chalk.cyan(m.attribute_type.padEnd(12))} event ${m.event_id} · ${m.event_info}`);
    console.log(chalk.gray(`      attribute ${m.attribute_id}, ${m.attribute_category}, changed ${m.attribute_timestamp}, imported ${m.import_time}`));
    if (m.attribute_comment) {
      console.log(chalk.gray(`      ${m.attribute_comment}`));
    }
  }
  console.log('');
  return true;
}
