/**
 * Configuration types for the extractor.
 */

export interface ExtractorConfig {
  database: DatabaseConfig;
  extraction: ExtractionConfig;
  output: OutputConfig;
  logging: LogConfig;
}

export interface DatabaseConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
  connectTimeoutMs: number;
  connectRetries: number;        // extra attempts on transient network errors
}

export interface ExtractionConfig {
  lookbackMs: number;
  iocTypes: string[];            // MISP attribute types, never empty
  queryTimeoutMs: number;
}

export interface OutputConfig {
  jsonFile: string;              // absolute after loading
  cacheDb: string;
  backupDb?: string;
}

export interface LogConfig {
  level: 'debug' | 'info' | 'warn' | 'error';
  file?: string;
}
