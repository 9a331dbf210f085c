import { join } from 'node:path';
import { createLogger } from '@selfwright/core';
import type { IImprovementLog, ImprovementLogFilter, ImprovementResult } from '@selfwright/core';
import { ImprovementResultSchema, parseEach } from '../schemas.js';
import { appendJsonLine, readJsonLines } from '../utils/file-io.js';
import { SerialQueue } from '../utils/serial-queue.js';

const log = createLogger('FileImprovementLog');

/**
 * Append-only audit log of improvement results (JSONL).
 * Stores every outcome, including rejections and rollbacks.
 */
export class FileImprovementLog implements IImprovementLog {
  private results: ImprovementResult[] = [];
  private loaded = false;
  private readonly queue = new SerialQueue();
  private readonly filePath: string;

  constructor(baseDir: string) {
    this.filePath = join(baseDir, 'improvements', 'results.jsonl');
  }

  append(result: ImprovementResult): Promise<void> {
    return this.queue.run(async () => {
      await this.ensureLoaded();
      await appendJsonLine(this.filePath, result);
      this.results.push(result);
    });
  }

  async list(filter?: ImprovementLogFilter): Promise<ImprovementResult[]> {
    await this.queue.run(() => this.ensureLoaded());
    let results = [...this.results];

    if (filter?.opportunityId) {
      results = results.filter((r) => r.opportunityId === filter.opportunityId);
    }
    if (filter?.success !== undefined) {
      results = results.filter((r) => r.success === filter.success);
    }
    if (filter?.since) {
      const since = Date.parse(filter.since);
      results = results.filter((r) => Date.parse(r.timestamp) >= since);
    }

    // Newest first; appended order breaks ties
    return results
      .map((result, index) => ({ result, index }))
      .sort((a, b) => Date.parse(b.result.timestamp) - Date.parse(a.result.timestamp) || b.index - a.index)
      .map(({ result }) => result);
  }

  async latest(): Promise<ImprovementResult | null> {
    const [newest] = await this.list();
    return newest ?? null;
  }

  private async ensureLoaded(): Promise<void> {
    if (this.loaded) return;

    try {
      const { valid, invalid } = parseEach(await readJsonLines(this.filePath), ImprovementResultSchema);
      if (invalid > 0) log.warn(`Ignored ${invalid} invalid result record(s) in ${this.filePath}`);
      this.results = valid;
    } catch (error) {
      log.warn(`Failed to load improvement results: ${String(error)}`);
      this.results = [];
    }

    this.loaded = true;
  }
}
