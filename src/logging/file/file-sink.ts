/**
 * File output sink
 *
 * Appends plain (uncoloured) lines prefixed with an ISO timestamp. Lines
 * written before initialize() are held in memory and flushed once the file
 * is open. If the file cannot be opened, or a write fails, held lines are
 * discarded and the sink stops accepting new ones.
 */

import * as fs from 'fs';
import * as path from 'path';

import type { FileSink, FileSinkConfig, InitMessage, LogEntry } from '../types';

function toLine(entry: LogEntry): string {
  return entry.time.toISOString() + ' ' + entry.formatted + '\n';
}

function openStream(filePath: string): Promise<fs.WriteStream> {
  const stream = fs.createWriteStream(filePath, { flags: 'a', encoding: 'utf8' });
  return new Promise((resolve, reject) => {
    stream.once('error', reject);
    stream.once('open', () => {
      stream.removeListener('error', reject);
      resolve(stream);
    });
  });
}

/**
 * Create a file sink
 *
 * @param config - Sink configuration (path)
 * @returns File sink instance
 */
export function createFileSink(config: FileSinkConfig): FileSink {
  const pending: string[] = [];
  let stream: fs.WriteStream | null = null;
  let disabled = false;

  function write(entry: LogEntry) {
    if (disabled) {
      return;
    }
    const line = toLine(entry);
    if (stream) {
      stream.write(line);
    } else {
      pending.push(line);
    }
  }

  async function initialize(): Promise<InitMessage> {
    if (stream) {
      return { success: true, message: 'File sink already open: ' + config.path };
    }

    let opened: fs.WriteStream;
    try {
      await fs.promises.mkdir(path.dirname(config.path), { recursive: true });
      opened = await openStream(config.path);
    } catch (err) {
      disabled = true;
      pending.length = 0;
      throw err;
    }

    opened.on('error', (err) => {
      // Later lines are dropped; the console sink keeps reporting
      disabled = true;
      stream = null;
      console.warn('Log file write failed: ' + String(err));
    });

    stream = opened;
    for (const line of pending.splice(0, pending.length)) {
      opened.write(line);
    }

    return { success: true, message: 'Logging to ' + config.path };
  }

  async function close(): Promise<void> {
    const current = stream;
    if (!current) {
      return;
    }
    stream = null;
    await new Promise<void>((resolve, reject) => {
      current.once('error', reject);
      current.end(() => resolve());
    });
  }

  function getPendingCount(): number {
    return pending.length;
  }

  return {
    write: write,
    initialize: initialize,
    close: close,
    getPendingCount: getPendingCount
  };
}
