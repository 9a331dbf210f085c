import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { createLogger, DEFAULT_HISTORY_LIMIT } from '@selfwright/core';
import type { ITaskHistoryStore, TaskRecord } from '@selfwright/core';
import { TaskRecordSchema, parseEach } from '../schemas.js';
import { isMissingPathError, writeJsonFileAtomic } from '../utils/file-io.js';
import { SerialQueue } from '../utils/serial-queue.js';

const log = createLogger('FileTaskHistoryStore');

/**
 * Task history persisted as one JSON array, most recent first.
 * Every append rewrites the file by temp-file + rename.
 */
export class FileTaskHistoryStore implements ITaskHistoryStore {
  private records: TaskRecord[] = [];
  private loaded = false;
  private readonly queue = new SerialQueue();
  private readonly filePath: string;

  constructor(
    baseDir: string,
    private readonly maxEntries: number = DEFAULT_HISTORY_LIMIT,
  ) {
    this.filePath = join(baseDir, 'history', 'tasks.json');
  }

  append(record: TaskRecord): Promise<void> {
    return this.queue.run(async () => {
      await this.ensureLoaded();
      const next = [record, ...this.records].slice(0, this.maxEntries);
      await writeJsonFileAtomic(this.filePath, next);
      this.records = next;
    });
  }

  list(): Promise<readonly TaskRecord[]> {
    return this.queue.run(async () => {
      await this.ensureLoaded();
      return [...this.records];
    });
  }

  private async ensureLoaded(): Promise<void> {
    if (this.loaded) return;

    try {
      const raw = await readFile(this.filePath, 'utf-8');
      const data: unknown = JSON.parse(raw);
      if (!Array.isArray(data)) throw new Error('expected a JSON array');
      const { valid, invalid } = parseEach(data, TaskRecordSchema);
      if (invalid > 0) log.warn(`Dropped ${invalid} invalid task record(s) from ${this.filePath}`);
      this.records = valid.slice(0, this.maxEntries);
    } catch (error) {
      if (!isMissingPathError(error)) {
        log.warn(`Failed to load task history, starting empty: ${String(error)}`);
      }
      this.records = [];
    }

    this.loaded = true;
  }
}
