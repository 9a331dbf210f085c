import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { ImprovementResult } from '@selfwright/core';
import { FileImprovementLog } from '../stores/file-improvement-log.js';

function makeResult(overrides: Partial<ImprovementResult> = {}): ImprovementResult {
  return {
    opportunityId: 'fix-1',
    success: true,
    message: 'ok',
    changesApplied: 1,
    timestamp: '2026-03-01T12:00:00.000Z',
    finalState: 'done',
    ...overrides,
  };
}

describe('FileImprovementLog', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'improvement-log-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('appends one JSON line per result', async () => {
    const resultLog = new FileImprovementLog(dir);
    await resultLog.append(makeResult());
    await resultLog.append(makeResult({ opportunityId: 'fix-2' }));

    const lines = (await readFile(join(dir, 'improvements', 'results.jsonl'), 'utf-8')).trim().split('\n');
    expect(lines).toHaveLength(2);
    expect(JSON.parse(lines[1])).toEqual(makeResult({ opportunityId: 'fix-2' }));
  });

  it('lists newest first and filters', async () => {
    const resultLog = new FileImprovementLog(dir);
    await resultLog.append(makeResult({ opportunityId: 'a', timestamp: '2026-03-01T10:00:00.000Z' }));
    await resultLog.append(
      makeResult({ opportunityId: 'b', success: false, finalState: 'rejected', timestamp: '2026-03-01T11:00:00.000Z' }),
    );
    await resultLog.append(makeResult({ opportunityId: 'a', timestamp: '2026-03-01T12:00:00.000Z' }));

    expect((await resultLog.list()).map((r) => r.timestamp)).toEqual([
      '2026-03-01T12:00:00.000Z',
      '2026-03-01T11:00:00.000Z',
      '2026-03-01T10:00:00.000Z',
    ]);
    expect((await resultLog.list({ opportunityId: 'a' })).length).toBe(2);
    expect((await resultLog.list({ success: false })).map((r) => r.opportunityId)).toEqual(['b']);
    expect((await resultLog.list({ since: '2026-03-01T11:00:00.000Z' })).length).toBe(2);
    expect((await resultLog.latest())?.timestamp).toBe('2026-03-01T12:00:00.000Z');
  });

  it('reloads from disk and skips malformed lines', async () => {
    await mkdir(join(dir, 'improvements'), { recursive: true });
    await writeFile(
      join(dir, 'improvements', 'results.jsonl'),
      `${JSON.stringify(makeResult())}\nnot-json\n${JSON.stringify({ opportunityId: 'x' })}\n`,
      'utf-8',
    );

    const resultLog = new FileImprovementLog(dir);
    expect(await resultLog.list()).toEqual([makeResult()]);
  });

  it('returns null from latest() when empty', async () => {
    expect(await new FileImprovementLog(dir).latest()).toBeNull();
  });
});
