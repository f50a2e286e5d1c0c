/**
 * Snapshot sink: the current run's records as a JSON array.
 *
 * The file is replaced atomically: content goes to a temp file in the
 * same directory which is then renamed over the target, so readers see
 * either the previous snapshot or the new one.
 */

import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { randomBytes } from 'node:crypto';
import { basename, dirname, join } from 'node:path';

import { z } from 'zod';

import type { IocRecord } from '../types/ioc.js';
import { StorageError, errorCode, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('snapshot');

export const SnapshotSchema = z.array(
  z.object({
    event_id: z.number().int(),
    event_uuid: z.string(),
    event_info: z.string(),
    event_date: z.string(),
    event_timestamp: z.string(),
    attribute_id: z.number().int(),
    attribute_type: z.string(),
    attribute_category: z.string(),
    attribute_value: z.string(),
    attribute_timestamp: z.string(),
    attribute_comment: z.string(),
    attribute_to_ids: z.boolean(),
    import_time: z.string(),
  }),
);

/**
 * Serialize records as pretty-printed JSON (2-space indentation).
 */
export function serializeSnapshot(records: readonly IocRecord[]): string {
  return JSON.stringify(records, null, 2) + '\n';
}

/**
 * Replace the snapshot at `outputPath` with `records`.
 * An empty run still writes `[]`.
 *
 * @throws StorageError when the directory or file cannot be written.
 */
export async function writeSnapshot(records: readonly IocRecord[], outputPath: string): Promise<void> {
  const dir = dirname(outputPath);
  const tempPath = join(dir, `.${basename(outputPath)}.${process.pid}.${randomBytes(4).toString('hex')}.tmp`);

  try {
    await mkdir(dir, { recursive: true });
    await writeFile(tempPath, serializeSnapshot(records), 'utf-8');
    await rename(tempPath, outputPath);
  } catch (err) {
    await rm(tempPath, { force: true }).catch((cleanupErr: unknown) => {
      log.warn(`Cannot remove temp snapshot ${tempPath}: ${errorMessage(cleanupErr)}`);
    });
    throw new StorageError(`Cannot write snapshot ${outputPath}: ${errorMessage(err)}`, 0, { cause: err });
  }

  log.info(`Wrote ${records.length} records to ${outputPath}`);
}

/**
 * Read a snapshot back. Returns null when no snapshot exists yet.
 */
export async function readSnapshot(path: string): Promise<IocRecord[] | null> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (err) {
    if (errorCode(err) === 'ENOENT') return null;
    throw new StorageError(`Cannot read snapshot ${path}: ${errorMessage(err)}`, 0, { cause: err });
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (err) {
    throw new StorageError(`Snapshot ${path} is not valid JSON: ${errorMessage(err)}`, 0, { cause: err });
  }

  const parsed = SnapshotSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new StorageError(`Snapshot ${path} is malformed at ${issue.path.join('.') || '(root)'}: ${issue.message}`);
  }
  return parsed.data;
}
