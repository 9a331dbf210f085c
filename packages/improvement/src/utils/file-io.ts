import { randomUUID } from 'node:crypto';
import { appendFile, mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { createLogger } from '@selfwright/core';

const log = createLogger('FileIO');

/** True for "path is not there" errors (missing file, or a parent that is a file) */
export function isMissingPathError(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    (error.code === 'ENOENT' || error.code === 'ENOTDIR')
  );
}

/**
 * Replace a file atomically: write a sibling temp file, then rename over the
 * target. Readers see either the old or the new content, never a mix.
 */
export async function writeFileAtomic(filePath: string, data: string | Buffer): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  const tmpPath = `${filePath}.${process.pid}.${randomUUID().slice(0, 8)}.tmp`;
  try {
    await writeFile(tmpPath, data);
    await rename(tmpPath, filePath);
  } catch (error) {
    await rm(tmpPath, { force: true });
    throw error;
  }
}

/** Ensure directory exists, then atomically write pretty JSON to file. */
export async function writeJsonFileAtomic(filePath: string, data: unknown): Promise<void> {
  await writeFileAtomic(filePath, JSON.stringify(data, null, 2));
}

/** Append one JSON record as a line (JSONL) */
export async function appendJsonLine(filePath: string, record: unknown): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  await appendFile(filePath, `${JSON.stringify(record)}\n`, 'utf-8');
}

/** Read a JSONL file. A missing file is empty; malformed lines are skipped. */
export async function readJsonLines(filePath: string): Promise<unknown[]> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf-8');
  } catch (error) {
    if (isMissingPathError(error)) return [];
    throw error;
  }

  const records: unknown[] = [];
  const lines = raw.split('\n');
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (!line) continue;
    try {
      records.push(JSON.parse(line));
    } catch {
      log.warn(`Skipping malformed line ${i + 1} in ${filePath}`);
    }
  }
  return records;
}
