/**
 * Run orchestrator.
 *
 * One run: read the window from MISP, normalize, then write the cache and
 * the snapshot in sequence. Read failures fail the run before anything is
 * written; sink failures degrade it. Every trigger yields exactly one
 * RunSummary, and at most one run executes at a time.
 *
 *   idle -> reading -> normalizing -> writing -> done
 *              \________________________________-> failed
 */

import { existsSync } from 'node:fs';

import type { DatabaseConfig, ExtractorConfig } from '../types/config.js';
import type { IocRecord, RawAttributeRow, RunState, RunStatus, RunSummary } from '../types/ioc.js';
import { normalizeRows } from '../normalization/normalizer.js';
import { CacheSink } from '../sinks/cache-sink.js';
import { writeSnapshot } from '../sinks/snapshot-sink.js';
import { createMysqlConnector, withSourceConnection, type SourceConnector } from '../source/connection.js';
import { fetchRecentAttributes } from '../source/reader.js';
import { StorageError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('extractor');

const TRANSITIONS: Record<RunState, readonly RunState[]> = {
  idle: ['reading', 'failed'],
  reading: ['normalizing', 'failed'],
  normalizing: ['writing', 'failed'],
  writing: ['done', 'failed'],
  done: [],
  failed: [],
};

export type ConfigProvider = () => ExtractorConfig;

export interface ExtractorOptions {
  /** Config, or a provider read once at the start of every run. */
  config: ExtractorConfig | ConfigProvider;
  /** Builds the source connector from the database section. Default: MySQL */
  createConnector?: (database: DatabaseConfig) => SourceConnector;
  /** Wall clock for the window bound and import_time. Default: () => new Date() */
  clock?: () => Date;
  /** Rows per cache transaction. */
  cacheBatchSize?: number;
  onStateChange?: (state: RunState, previous: RunState) => void;
}

interface RunCounts {
  rows_read: number;
  records_normalized: number;
  records_dropped: number;
  cache_writes: number;
  snapshot_written: boolean;
}

export class Extractor {
  private currentState: RunState = 'idle';
  private running = false;
  private readonly clock: () => Date;
  private readonly createConnector: (database: DatabaseConfig) => SourceConnector;

  constructor(private readonly options: ExtractorOptions) {
    this.clock = options.clock ?? (() => new Date());
    this.createConnector = options.createConnector ?? createMysqlConnector;
  }

  get state(): RunState {
    return this.currentState;
  }

  get isRunning(): boolean {
    return this.running;
  }

  /**
   * Execute one extraction run. A call made while another run is still in
   * progress returns a `rejected` summary without touching source or sinks.
   */
  async runOnce(): Promise<RunSummary> {
    const startedAt = this.clock();
    const counts: RunCounts = {
      rows_read: 0,
      records_normalized: 0,
      records_dropped: 0,
      cache_writes: 0,
      snapshot_written: false,
    };

    if (this.running) {
      log.warn('Run rejected: another run is still in progress');
      return this.summarize('rejected', startedAt, counts, 'A run is already in progress');
    }

    this.running = true;
    this.currentState = 'idle';

    try {
      const config = this.resolveConfig();

      // --- Reading ---
      this.transition('reading');
      let rows: RawAttributeRow[];
      try {
        rows = await withSourceConnection(this.createConnector(config.database), (connection) =>
          fetchRecentAttributes(connection, {
            lookbackMs: config.extraction.lookbackMs,
            iocTypes: config.extraction.iocTypes,
            now: startedAt,
            timeoutMs: config.extraction.queryTimeoutMs,
          }),
        );
      } catch (err) {
        return this.fail(startedAt, counts, err);
      }
      counts.rows_read = rows.length;

      // --- Normalizing ---
      this.transition('normalizing');
      const { records, dropped } = normalizeRows(rows, { clock: this.clock });
      counts.records_normalized = records.length;
      counts.records_dropped = dropped.length;

      // --- Writing ---
      this.transition('writing');
      const sinkErrors: string[] = [];
      counts.cache_writes = this.writeCache(records, config, sinkErrors);
      counts.snapshot_written = await this.writeSnapshotFile(records, config, sinkErrors);

      this.transition('done');
      const status: RunStatus = sinkErrors.length > 0 ? 'degraded' : 'succeeded';
      return this.summarize(status, startedAt, counts, sinkErrors.length > 0 ? sinkErrors.join('; ') : undefined);
    } catch (err) {
      return this.fail(startedAt, counts, err);
    } finally {
      this.running = false;
    }
  }

  // ---------------------------------------------------------------------------
  // Sinks
  // ---------------------------------------------------------------------------

  private writeCache(
    records: readonly IocRecord[],
    config: ExtractorConfig,
    sinkErrors: string[],
  ): number {
    const { cacheDb, backupDb } = config.output;
    const existed = existsSync(cacheDb);
    let cache: CacheSink | undefined;

    try {
      cache = CacheSink.open(cacheDb, { batchSize: this.options.cacheBatchSize });

      if (backupDb && existed) {
        try {
          cache.backup(backupDb);
        } catch (err) {
          log.warn(`Proceeding without cache backup: ${errorMessage(err)}`);
        }
      }

      return cache.writeAll(records);
    } catch (err) {
      const written = err instanceof StorageError ? err.written : 0;
      log.error(`Cache write failed after ${written} of ${records.length} records: ${errorMessage(err)}`);
      sinkErrors.push(`cache: ${errorMessage(err)}`);
      return written;
    } finally {
      cache?.close();
    }
  }

  private async writeSnapshotFile(
    records: readonly IocRecord[],
    config: ExtractorConfig,
    sinkErrors: string[],
  ): Promise<boolean> {
    try {
      await writeSnapshot(records, config.output.jsonFile);
      return true;
    } catch (err) {
      log.error(`Snapshot write failed: ${errorMessage(err)}`);
      sinkErrors.push(`snapshot: ${errorMessage(err)}`);
      return false;
    }
  }

  // ---------------------------------------------------------------------------
  // State and summaries
  // ---------------------------------------------------------------------------

  private resolveConfig(): ExtractorConfig {
    const { config } = this.options;
    return typeof config === 'function' ? config() : config;
  }

  private transition(next: RunState): void {
    const previous = this.currentState;
    if (!TRANSITIONS[previous].includes(next)) {
      throw new Error(`Invalid run state transition: ${previous} -> ${next}`);
    }
    this.currentState = next;
    log.debug(`State ${previous} -> ${next}`);
    this.notify(next, previous);
  }

  private notify(state: RunState, previous: RunState): void {
    try {
      this.options.onStateChange?.(state, previous);
    } catch (err) {
      log.warn(`State listener threw: ${errorMessage(err)}`);
    }
  }

  private fail(startedAt: Date, counts: RunCounts, err: unknown): RunSummary {
    const previous = this.currentState;
    this.currentState = 'failed';
    this.notify('failed', previous);
    const name = err instanceof Error ? err.name : 'Error';
    return this.summarize('failed', startedAt, counts, `${name}: ${errorMessage(err)}`);
  }

  private summarize(status: RunStatus, startedAt: Date, counts: RunCounts, error?: string): RunSummary {
    const finishedAt = this.clock();
    const summary: RunSummary = {
      status,
      ...counts,
      ...(error !== undefined ? { error } : {}),
      started_at: startedAt.toISOString(),
      finished_at: finishedAt.toISOString(),
      duration_ms: Math.max(0, finishedAt.getTime() - startedAt.getTime()),
    };

    const line =
      `Run ${status}: rows_read=${summary.rows_read} normalized=${summary.records_normalized} ` +
      `dropped=${summary.records_dropped} cache_writes=${summary.cache_writes} ` +
      `snapshot_written=${summary.snapshot_written}`;

    if (status === 'succeeded') {
      log.info(line);
    } else if (status === 'degraded' || status === 'rejected') {
      log.warn(error ? `${line} (${error})` : line);
    } else {
      log.error(error ? `${line} (${error})` : line);
    }
    return summary;
  }
}
