#!/usr/bin/env node

/**
 * misp-ioc-extractor CLI: cache recently changed MISP indicators.
 *
 * Usage:
 *   misp-ioc-extractor run --config ./misp-extractor.yaml
 *   misp-ioc-extractor run --lookback 6h --types ip-dst,domain --json
 *   misp-ioc-extractor lookup 203.0.113.7
 *   misp-ioc-extractor stats
 *   misp-ioc-extractor config
 */

import 'dotenv/config';

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import chalk from 'chalk';

import { registerRunCommand } from './commands/run.js';
import { registerLookupCommand } from './commands/lookup.js';
import { registerStatsCommand } from './commands/stats.js';
import { registerConfigCommand } from './commands/config.js';
import { errorMessage } from '../utils/errors.js';

const pkg: { version: string } = JSON.parse(
  readFileSync(new URL('../../package.json', import.meta.url), 'utf-8'),
);

const program = new Command();

program
  .name('misp-ioc-extractor')
  .description('Extract recently changed IOCs from a MISP database into a JSON snapshot and a SQLite cache')
  .version(pkg.version);

registerRunCommand(program);
registerLookupCommand(program);
registerStatsCommand(program);
registerConfigCommand(program);

program.exitOverride();

async function main(): Promise<void> {
  try {
    await program.parseAsync();
  } catch (err) {
    // CommanderError for help/version is expected, not an error
    if (err instanceof Error && 'code' in err) {
      const { code } = err;
      if (code === 'commander.helpDisplayed' || code === 'commander.version' || code === 'commander.help') {
        return;
      }
    }

    console.error('');
    console.error(chalk.red(`Error: ${errorMessage(err)}`));
    console.error('');
    console.error(chalk.gray('Run "misp-ioc-extractor --help" for usage information.'));
    console.error('');
    process.exit(1);
  }
}

void main();
