/**
 * Sinks: where normalized records end up.
 */

export {
  CacheSink,
  CACHE_TABLE,
  CACHE_SCHEMA_SQL,
  CacheRowSchema,
  toCacheParams,
  fromCacheRow,
  type CacheRow,
  type CacheSinkOptions,
} from './cache-sink.js';

export {
  serializeSnapshot,
  writeSnapshot,
  readSnapshot,
  SnapshotSchema,
} from './snapshot-sink.js';
