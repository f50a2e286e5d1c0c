/**
 * Config command: print the effective configuration as YAML.
 */

import type { Command } from 'commander';

import { redactConfig } from '../../config/loader.js';
import { formatDuration } from '../../utils/time.js';
import { serializeYaml } from '../../utils/yaml.js';
import { addConfigOption, resolveConfig, type ConfigOptions } from '../options.js';

export function registerConfigCommand(program: Command): void {
  const cmd = program
    .command('config')
    .description('Print the effective configuration (password masked)');

  addConfigOption(cmd);

  cmd.action((options: ConfigOptions) => {
    const { config, source } = resolveConfig(options);
    const { lookbackMs, ...extraction } = config.extraction;
    const printable = {
      ...redactConfig(config),
      extraction: { lookback: formatDuration(lookbackMs), ...extraction },
    };
    console.log(`# source: ${source ?? 'built-in defaults'}`);
    console.log(serializeYaml(printable));
  });
}
