// src/core/record/file-recorder.ts
import * as path from 'path';
import * as fs from 'fs/promises';
import type { FileHandle } from 'fs/promises';
import { DATA_DIR_NAME } from '../config/constants.js';
import { toCsvLine } from './csv.js';
import type {
  FetchedItem,
  RecorderFactory,
  RecorderOptions,
  RecordingSession,
} from '../backend/types.js';

class NullSession implements RecordingSession {
  async write(): Promise<void> {}

  async close(): Promise<void> {}
}

abstract class FileSession implements RecordingSession {
  private closed = false;

  constructor(protected readonly handle: FileHandle) {}

  async write(rows: readonly FetchedItem[]): Promise<void> {
    if (this.closed) {
      throw new Error('Recording session is already closed');
    }
    if (rows.length === 0) return;
    await this.handle.appendFile(this.serialize(rows), 'utf-8');
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.handle.close();
  }

  protected abstract serialize(rows: readonly FetchedItem[]): string;
}

class JsonLinesSession extends FileSession {
  protected serialize(rows: readonly FetchedItem[]): string {
    return rows.map((row) => JSON.stringify(row) + '\n').join('');
  }
}

class CsvSession extends FileSession {
  private columns?: string[];

  constructor(handle: FileHandle, private needsHeader: boolean) {
    super(handle);
  }

  protected serialize(rows: readonly FetchedItem[]): string {
    const columns = this.columns ?? Object.keys(rows[0]);
    this.columns = columns;

    let out = '';
    if (this.needsHeader) {
      out += toCsvLine(columns);
      this.needsHeader = false;
    }
    for (const row of rows) {
      out += toCsvLine(columns.map((column) => row[column]));
    }
    return out;
  }
}

export function recordFilePath(root: string, options: RecorderOptions): string {
  const extension = options.format === 'csv' ? 'csv' : 'jsonl';
  return path.join(root, DATA_DIR_NAME, `${options.name}.${extension}`);
}

/**
 * Default recorder: appends fetched rows to `<root>/Data/<name>.<ext>`.
 * An empty storage format records nothing.
 */
export const createFileRecorder: RecorderFactory = async (root, options) => {
  if (options.format === '') {
    return new NullSession();
  }

  const filePath = recordFilePath(root, options);
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const handle = await fs.open(filePath, 'a');

  if (options.format === 'jsonl') {
    return new JsonLinesSession(handle);
  }

  try {
    const { size } = await handle.stat();
    return new CsvSession(handle, size === 0);
  } catch (error) {
    await handle.close();
    throw error;
  }
};
