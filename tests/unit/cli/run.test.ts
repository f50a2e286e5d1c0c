import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Command } from 'commander';

import { registerRunCommand } from '@/cli/commands/run.js';
import { setLogLevel, setLogToStderr } from '@/utils/logger.js';
import { FakeMispSource, epoch } from '../../helpers/misp-source.js';

let dir: string;
let configPath: string;
let source: FakeMispSource;
let stdout: string[];
let stderr: string[];

beforeEach(() => {
  vi.stubEnv('LOG_LEVEL', 'info');
  dir = mkdtempSync(join(tmpdir(), 'misp-cli-'));
  configPath = join(dir, 'misp-extractor.yaml');
  writeFileSync(
    configPath,
    [
      'database:',
      '  password: test-secret',
      '  connectRetries: 0',
      'extraction:',
      '  lookback: 24h',
      '  iocTypes: [ip-dst, domain]',
      'output:',
      '  jsonFile: recent.json',
      '  cacheDb: cache.db',
      'logging:',
      '  level: info',
      '',
    ].join('\n'),
  );

  const hourAgo = epoch(new Date()) - 3600;
  source = new FakeMispSource()
    .addEvent({ id: 1, timestamp: hourAgo })
    .addAttribute({ id: 10, event_id: 1, type: 'ip-dst', value1: '203.0.113.7', timestamp: hourAgo })
    .addAttribute({ id: 11, event_id: 1, type: 'domain', value1: 'bad.example', timestamp: hourAgo });

  stdout = [];
  stderr = [];
  const toStdout = (...args: unknown[]) => {
    stdout.push(args.map(String).join(' '));
  };
  const toStderr = (...args: unknown[]) => {
    stderr.push(args.map(String).join(' '));
  };
  vi.spyOn(console, 'log').mockImplementation(toStdout);
  vi.spyOn(console, 'info').mockImplementation(toStdout);
  vi.spyOn(console, 'debug').mockImplementation(toStdout);
  vi.spyOn(console, 'warn').mockImplementation(toStderr);
  vi.spyOn(console, 'error').mockImplementation(toStderr);
});

afterEach(() => {
  vi.restoreAllMocks();
  vi.unstubAllEnvs();
  setLogToStderr(false);
  setLogLevel('error');
  process.exitCode = undefined;
  source.db.close();
  rmSync(dir, { recursive: true, force: true });
});

function program(): Command {
  const cli = new Command();
  registerRunCommand(cli, { createConnector: () => source.connector() });
  return cli;
}

describe('run command', () => {
  it('prints only the JSON summary on stdout with --json', async () => {
    await program().parseAsync(['node', 'misp-extractor', 'run', '--json', '--config', configPath]);

    const summary: unknown = JSON.parse(stdout.join('\n'));
    expect(summary).toMatchObject({
      status: 'succeeded',
      rows_read: 2,
      records_normalized: 2,
      records_dropped: 0,
      cache_writes: 2,
      snapshot_written: true,
    });
    expect(stderr.some((line) => line.includes('[extractor] Run succeeded: rows_read=2'))).toBe(true);
    expect(process.exitCode).toBe(0);
  });

  it('keeps info logging on stdout without --json', async () => {
    await program().parseAsync(['node', 'misp-extractor', 'run', '--config', configPath]);

    expect(stdout.some((line) => line.includes('[extractor] Run succeeded: rows_read=2'))).toBe(true);
    expect(stderr).toEqual([]);
    expect(process.exitCode).toBe(0);
  });
});
