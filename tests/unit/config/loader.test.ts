/**
 * Unit tests for configuration loading.
 *
 * Tests: loadConfig, applyEnvOverrides, redactConfig
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import {
  loadConfig,
  applyEnvOverrides,
  redactConfig,
  ConfigError,
  DEFAULT_CONFIG_FILE,
  DEFAULT_IOC_TYPES,
} from '@/config/loader.js';

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'misp-config-'));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe('loadConfig', () => {
  it('falls back to built-in defaults when no config file exists', () => {
    const { config, source } = loadConfig({ cwd: dir, env: {} });

    expect(source).toBeNull();
    expect(config.database).toEqual({
      host: 'localhost',
      port: 3306,
      user: 'misp',
      password: '',
      database: 'misp',
      connectTimeoutMs: 10000,
      connectRetries: 2,
    });
    expect(config.extraction.lookbackMs).toBe(86_400_000);
    expect(config.extraction.iocTypes).toEqual(DEFAULT_IOC_TYPES);
    expect(config.extraction.queryTimeoutMs).toBe(300000);
    expect(config.output.jsonFile).toBe(join(dir, 'misp_recent_iocs.json'));
    expect(config.output.cacheDb).toBe(join(dir, 'ioc_cache.db'));
    expect(config.output.backupDb).toBeUndefined();
    expect(config.logging).toEqual({ level: 'info', file: undefined });
  });

  it('reads the default YAML file from the working directory', () => {
    writeFileSync(
      join(dir, DEFAULT_CONFIG_FILE),
      [
        'database:',
        '  host: misp-db.internal',
        '  password: test-secret',
        'extraction:',
        '  lookback: 6h',
        '  iocTypes: [ip-dst, md5, ip-dst]',
        'output:',
        '  jsonFile: out/recent.json',
        '  cacheDb: /var/lib/iocs/cache.db',
        '  backupDb: out/cache_yesterday.db',
        'logging:',
        '  level: debug',
        '  file: logs/extractor.log',
      ].join('\n'),
    );

    const { config, source } = loadConfig({ cwd: dir, env: {} });

    expect(source).toBe(join(dir, DEFAULT_CONFIG_FILE));
    expect(config.database.host).toBe('misp-db.internal');
    expect(config.database.password).toBe('test-secret');
    expect(config.extraction.lookbackMs).toBe(21_600_000);
    expect(config.extraction.iocTypes).toEqual(['ip-dst', 'md5']);
    expect(config.output.jsonFile).toBe(join(dir, 'out/recent.json'));
    expect(config.output.cacheDb).toBe('/var/lib/iocs/cache.db');
    expect(config.output.backupDb).toBe(join(dir, 'out/cache_yesterday.db'));
    expect(config.logging).toEqual({ level: 'debug', file: join(dir, 'logs/extractor.log') });
  });

  it('reads JSON config and treats a numeric lookback as hours', () => {
    const path = join(dir, 'config.json');
    writeFileSync(path, JSON.stringify({ extraction: { lookback: 48, iocTypes: ['domain'] } }));

    const { config, source } = loadConfig({ path, cwd: '/', env: {} });

    expect(source).toBe(path);
    expect(config.extraction.lookbackMs).toBe(172_800_000);
    expect(config.extraction.iocTypes).toEqual(['domain']);
    expect(config.output.cacheDb).toBe(join(dir, 'ioc_cache.db'));
  });

  it('throws when an explicit config path does not exist', () => {
    expect(() => loadConfig({ path: 'missing.yaml', cwd: dir, env: {} })).toThrow(
      `Config file not found: ${join(dir, 'missing.yaml')}`,
    );
  });

  it('reports every invalid field', () => {
    writeFileSync(
      join(dir, DEFAULT_CONFIG_FILE),
      'database:\n  port: 99999\nextraction:\n  iocTypes: []\n  lookback: soon\n',
    );

    let error: unknown;
    try {
      loadConfig({ cwd: dir, env: {} });
    } catch (err) {
      error = err;
    }

    expect(error).toBeInstanceOf(ConfigError);
    const issues = error instanceof ConfigError ? error.issues : [];
    expect(issues).toHaveLength(3);
    expect(issues).toContain('extraction.iocTypes: iocTypes must list at least one attribute type');
    expect(issues).toContain('extraction.lookback: Invalid duration: "soon" (expected e.g. 90m, 24h, 7d)');
    expect(issues.some((i) => i.startsWith('database.port: '))).toBe(true);
  });

  it('rejects unparseable YAML', () => {
    writeFileSync(join(dir, DEFAULT_CONFIG_FILE), 'database: [unclosed');

    expect(() => loadConfig({ cwd: dir, env: {} })).toThrow(ConfigError);
  });

  it('applies environment overrides on top of the file', () => {
    writeFileSync(join(dir, DEFAULT_CONFIG_FILE), 'database:\n  host: from-file\n  user: file-user\n');

    const { config } = loadConfig({
      cwd: dir,
      env: { MISP_DB_HOST: 'from-env', MISP_DB_PORT: '3307', MISP_DB_PASSWORD: 'test-secret', LOG_LEVEL: 'warn' },
    });

    expect(config.database.host).toBe('from-env');
    expect(config.database.port).toBe(3307);
    expect(config.database.user).toBe('file-user');
    expect(config.database.password).toBe('test-secret');
    expect(config.logging.level).toBe('warn');
  });
});

describe('applyEnvOverrides', () => {
  it('ignores empty variables', () => {
    expect(applyEnvOverrides({ database: { host: 'a' } }, { MISP_DB_HOST: '' })).toEqual({
      database: { host: 'a' },
    });
  });

  it('creates missing sections', () => {
    expect(applyEnvOverrides({}, { MISP_DB_NAME: 'misp_prod' })).toEqual({
      database: { database: 'misp_prod' },
    });
  });

  it('passes non-object input through unchanged', () => {
    expect(applyEnvOverrides('just a string', { MISP_DB_HOST: 'x' })).toBe('just a string');
  });
});

describe('redactConfig', () => {
  it('masks a non-empty password and leaves the original untouched', () => {
    const { config } = loadConfig({ cwd: dir, env: { MISP_DB_PASSWORD: 'test-secret' } });

    expect(redactConfig(config).database.password).toBe('********');
    expect(config.database.password).toBe('test-secret');
  });
});
