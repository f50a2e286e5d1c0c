import { join } from 'node:path';

import type { ExtractorConfig } from '@/types/config.js';

/** Extractor config whose outputs live under `dir`. */
export function makeConfig(dir: string, output: Partial<ExtractorConfig['output']> = {}): ExtractorConfig {
  return {
    database: {
      host: 'localhost',
      port: 3306,
      user: 'misp',
      password: 'test-secret',
      database: 'misp',
      connectTimeoutMs: 1000,
      connectRetries: 0,
    },
    extraction: {
      lookbackMs: 24 * 60 * 60 * 1000,
      iocTypes: ['ip-dst', 'domain', 'md5'],
      queryTimeoutMs: 5000,
    },
    output: {
      jsonFile: join(dir, 'misp_recent_iocs.json'),
      cacheDb: join(dir, 'ioc_cache.db'),
      ...output,
    },
    logging: { level: 'error' },
  };
}
