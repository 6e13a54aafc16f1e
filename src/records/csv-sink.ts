/**
 * Append-only CSV record sink
 *
 * The file is opened on the first append. A header row is written only when
 * the file is new or empty, so restarting a run against the same file keeps
 * one header. Every append is a single write of one row.
 */

import * as fs from 'fs';
import * as path from 'path';

import type { FileHandle } from 'fs/promises';

import { RecordPersistError } from '$types/errors';

import { CSV_HEADER, encodeCsvRow, recordToRow } from './helpers';

import type { ChangeRecord, CsvRecordSinkConfig, RecordSink } from './types';

/**
 * Create a CSV record sink
 *
 * @example
 * ```typescript
 * const sink = createCsvRecordSink({ path: 'miniserver_monitor_20261019_080000.csv' });
 * await sink.append(record);
 * await sink.close();
 * ```
 */
export function createCsvRecordSink(config: CsvRecordSinkConfig): RecordSink {
  let handle: FileHandle | null = null;
  let closed = false;

  async function open(): Promise<FileHandle> {
    await fs.promises.mkdir(path.dirname(config.path), { recursive: true });
    const opened = await fs.promises.open(config.path, 'a');

    try {
      const stats = await opened.stat();
      if (stats.size === 0) {
        await opened.write(CSV_HEADER);
      }
    } catch (err) {
      await opened.close();
      throw err;
    }

    return opened;
  }

  async function append(record: ChangeRecord): Promise<void> {
    if (closed) {
      throw new RecordPersistError(config.path, { cause: new Error('sink is closed') });
    }

    try {
      const target = handle ?? await open();
      handle = target;
      await target.write(encodeCsvRow(recordToRow(record)));
    } catch (err) {
      throw new RecordPersistError(config.path, { cause: err });
    }
  }

  async function close(): Promise<void> {
    if (closed) {
      return;
    }
    closed = true;

    const current = handle;
    handle = null;
    if (!current) {
      return;
    }

    try {
      await current.close();
    } catch (err) {
      throw new RecordPersistError(config.path, { cause: err });
    }
  }

  return {
    append: append,
    close: close
  };
}
