import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile, mkdir } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Events } from '@selfwright/core';
import type {
  FixFailureOpportunity,
  Improvement,
  IVerifier,
  IVersionControl,
  PipelineStage,
  PublishOutcome,
  StageChangedEvent,
  VerificationOutcome,
} from '@selfwright/core';
import { EventBus } from '@selfwright/eventbus';
import { ImprovementPipeline } from '../improvement-pipeline.js';
import type { PipelineDeps, SnapshotStore } from '../improvement-pipeline.js';
import { ImprovementValidator } from '../improvement-validator.js';
import { SnapshotManager } from '../snapshot-manager.js';

const opportunity: FixFailureOpportunity = {
  id: 'fix-abc',
  type: 'fix-failure',
  description: 'Fix recurring failure: boom',
  priority: 7,
  detectedAt: '2026-03-01T12:00:00.000Z',
  context: { errorMessage: 'boom', occurrenceCount: 2, sampleRequests: [], toolsInvolved: [] },
};

function makeImprovement(overrides: Partial<Improvement> = {}): Improvement {
  return {
    id: 'imp-1',
    opportunityId: 'fix-abc',
    title: 'Handle boom',
    description: 'Catch boom',
    changes: [{ path: 'src/a.ts', kind: 'modify', content: 'export const a = 2;\n', description: 'bump' }],
    verificationScript: 'process.exit(0)',
    ...overrides,
  };
}

function verification(overrides: Partial<VerificationOutcome> = {}): VerificationOutcome {
  return { passed: true, output: '', exitCode: 0, durationMs: 5, timedOut: false, mode: 'isolated', ...overrides };
}

const published: PublishOutcome = {
  committed: true,
  revision: 'abc1234',
  pushed: true,
  message: 'Pushed to origin/main',
  changedPaths: ['src/a.ts'],
};

function fakePublisher(outcome: PublishOutcome = published): IVersionControl {
  return {
    isRepository: vi.fn(async () => true),
    hasRemote: vi.fn(async () => true),
    hasPendingChanges: vi.fn(async () => true),
    changedPaths: vi.fn(async () => []),
    stagePaths: vi.fn(async () => true),
    commit: vi.fn(async () => ({ ok: true })),
    push: vi.fn(async () => ({ ok: true, message: 'ok' })),
    commitAndPublish: vi.fn(async () => outcome),
    commitHistory: vi.fn(async () => []),
    commitDetails: vi.fn(async () => null),
    revertImprovement: vi.fn(async () => ({ ok: false, pushed: false, message: 'unused' })),
    revertLast: vi.fn(async () => ({ ok: false, pushed: false, message: 'unused' })),
  };
}

function fakeSnapshots(): SnapshotStore {
  return {
    createSnapshot: vi.fn(async () => 'snap-1'),
    apply: vi.fn(async (_id: string, changes: unknown[]) => changes.length),
    rollbackTo: vi.fn(async () => {}),
    commitImprovement: vi.fn(async () => {}),
    prune: vi.fn(async () => 0),
  };
}

function isStageChange(payload: unknown): payload is StageChangedEvent {
  return typeof payload === 'object' && payload !== null && 'stage' in payload;
}

function setup(overrides: Partial<PipelineDeps> = {}) {
  const eventBus = new EventBus();
  const stages: PipelineStage[] = [];
  eventBus.on(Events.IMPROVEMENT_STAGE_CHANGED, (payload) => {
    if (isStageChange(payload)) stages.push(payload.stage);
  });
  const verifier: IVerifier = { run: vi.fn(async () => verification()) };
  const deps: PipelineDeps = {
    generator: { generate: vi.fn(async () => makeImprovement()) },
    validator: { validate: vi.fn(async (improvement: Improvement) => ({ ok: true as const, improvement })) },
    snapshots: fakeSnapshots(),
    verifier,
    publisher: fakePublisher(),
    eventBus,
    ...overrides,
  };
  return { deps, stages, eventBus, pipeline: new ImprovementPipeline(deps) };
}

describe('ImprovementPipeline', () => {
  it('walks every stage on the happy path', async () => {
    const { pipeline, stages, deps } = setup();

    const result = await pipeline.process(opportunity);

    expect(stages).toEqual(['generating', 'validating', 'snapshotting', 'applying', 'verifying', 'committing', 'publishing', 'done']);
    expect(result).toMatchObject({
      opportunityId: 'fix-abc',
      improvementId: 'imp-1',
      success: true,
      finalState: 'done',
      changesApplied: 1,
      snapshotId: 'snap-1',
      publish: published,
    });
    expect(deps.snapshots.commitImprovement).toHaveBeenCalledWith('snap-1', 'imp-1');
    expect(deps.verifier.run).toHaveBeenCalledWith({
      script: 'process.exit(0)',
      files: { 'src/a.ts': 'export const a = 2;\n' },
      timeoutMs: 60_000,
    });
  });

  it('skips verification when there is no script', async () => {
    const { pipeline, stages, deps } = setup({
      generator: { generate: vi.fn(async () => makeImprovement({ verificationScript: undefined })) },
    });

    const result = await pipeline.process(opportunity);

    expect(result.success).toBe(true);
    expect(stages).not.toContain('verifying');
    expect(deps.verifier.run).not.toHaveBeenCalled();
  });

  it('fails cleanly when generation fails', async () => {
    const { pipeline, deps } = setup({ generator: { generate: vi.fn(async () => null) } });

    const result = await pipeline.process(opportunity);

    expect(result).toMatchObject({ success: false, finalState: 'failed', failedStage: 'generating', changesApplied: 0 });
    expect(deps.snapshots.createSnapshot).not.toHaveBeenCalled();
  });

  it('rejects without touching files when validation fails', async () => {
    const { pipeline, deps, stages } = setup({
      validator: { validate: vi.fn(async () => ({ ok: false as const, errors: ['a.ts: bad', 'b.ts: worse'] })) },
    });

    const result = await pipeline.process(opportunity);

    expect(result).toMatchObject({
      success: false,
      finalState: 'rejected',
      failedStage: 'validating',
      message: 'Validation failed: a.ts: bad; b.ts: worse',
    });
    expect(stages.at(-1)).toBe('rejected');
    expect(deps.snapshots.createSnapshot).not.toHaveBeenCalled();
  });

  it('rolls back when verification fails', async () => {
    const rolledBack = vi.fn();
    const { pipeline, deps, eventBus } = setup({
      verifier: { run: vi.fn(async () => verification({ passed: false, exitCode: 1, error: 'assertion failed' })) },
    });
    eventBus.on(Events.IMPROVEMENT_ROLLED_BACK, rolledBack);

    const result = await pipeline.process(opportunity);

    expect(result).toMatchObject({
      success: false,
      finalState: 'rolled-back',
      failedStage: 'verifying',
      message: 'Verification failed: exit code 1: assertion failed',
      snapshotId: 'snap-1',
    });
    expect(deps.snapshots.rollbackTo).toHaveBeenCalledWith('snap-1');
    expect(deps.snapshots.commitImprovement).not.toHaveBeenCalled();
    expect(deps.publisher.commitAndPublish).not.toHaveBeenCalled();
    expect(rolledBack).toHaveBeenCalledWith({ opportunityId: 'fix-abc', snapshotId: 'snap-1', reason: result.message });
  });

  it('reports a verifier timeout with its marker', async () => {
    const { pipeline } = setup({
      verifier: {
        run: vi.fn(async () =>
          verification({ passed: false, exitCode: -1, timedOut: true, error: 'TIMEOUT: verification exceeded 60000ms' }),
        ),
      },
    });

    const result = await pipeline.process(opportunity);
    expect(result.message).toBe('Verification failed: TIMEOUT: verification exceeded 60000ms');
  });

  it('rolls back when applying throws', async () => {
    const snapshots = fakeSnapshots();
    vi.mocked(snapshots.apply).mockRejectedValueOnce(new Error('EACCES: permission denied'));
    const { pipeline } = setup({ snapshots });

    const result = await pipeline.process(opportunity);

    expect(result).toMatchObject({
      finalState: 'rolled-back',
      failedStage: 'applying',
      message: 'applying failed: EACCES: permission denied',
    });
    expect(snapshots.rollbackTo).toHaveBeenCalledWith('snap-1');
  });

  it('rolls back when publishing throws', async () => {
    const publisher = fakePublisher();
    vi.mocked(publisher.commitAndPublish).mockRejectedValueOnce(new Error('unexpected'));
    const { pipeline, deps } = setup({ publisher });

    const result = await pipeline.process(opportunity);

    expect(result).toMatchObject({ finalState: 'rolled-back', failedStage: 'publishing' });
    expect(deps.snapshots.rollbackTo).toHaveBeenCalledWith('snap-1');
  });

  it('fails without rollback when the snapshot cannot be taken', async () => {
    const snapshots = fakeSnapshots();
    vi.mocked(snapshots.createSnapshot).mockRejectedValueOnce(new Error('disk full'));
    const { pipeline } = setup({ snapshots });

    const result = await pipeline.process(opportunity);

    expect(result).toMatchObject({ finalState: 'failed', failedStage: 'snapshotting', message: 'disk full' });
    expect(snapshots.rollbackTo).not.toHaveBeenCalled();
  });

  it('escalates a failed rollback', async () => {
    const snapshots = fakeSnapshots();
    vi.mocked(snapshots.rollbackTo).mockRejectedValueOnce(new Error('read-only file system'));
    const rollbackFailed = vi.fn();
    const { pipeline, eventBus } = setup({
      snapshots,
      verifier: { run: vi.fn(async () => verification({ passed: false, exitCode: 2 })) },
    });
    eventBus.on(Events.ROLLBACK_FAILED, rollbackFailed);

    const result = await pipeline.process(opportunity);

    expect(result).toMatchObject({ success: false, finalState: 'failed', requiresAttention: true, snapshotId: 'snap-1' });
    expect(result.message).toBe('Verification failed: exit code 2; rollback failed: read-only file system');
    expect(rollbackFailed).toHaveBeenCalledWith({
      opportunityId: 'fix-abc',
      snapshotId: 'snap-1',
      error: 'read-only file system',
    });
  });

  it('keeps a degraded success when the push fails', async () => {
    const { pipeline } = setup({
      publisher: fakePublisher({
        committed: true,
        revision: 'abc1234',
        pushed: false,
        message: 'Committed locally; Push failed: Could not resolve host',
        error: 'Push failed: Could not resolve host',
        pushFailure: 'unreachable',
        changedPaths: ['src/a.ts'],
      }),
    });

    const result = await pipeline.process(opportunity);

    expect(result.success).toBe(true);
    expect(result.finalState).toBe('done');
    expect(result.publish?.pushed).toBe(false);
    expect(result.publish?.error).toBe('Push failed: Could not resolve host');
  });

  it('does not fail the improvement when pruning fails', async () => {
    const snapshots = fakeSnapshots();
    vi.mocked(snapshots.prune).mockRejectedValueOnce(new Error('busy'));
    const { pipeline } = setup({ snapshots });

    expect((await pipeline.process(opportunity)).success).toBe(true);
  });
});

describe('ImprovementPipeline on disk', () => {
  let root: string;
  const original = 'export const a = 1;\n';

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'pipeline-'));
    await mkdir(join(root, 'src'));
    await writeFile(join(root, 'src', 'a.ts'), original);
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  function onDisk(overrides: Partial<PipelineDeps>): ImprovementPipeline {
    return new ImprovementPipeline({
      generator: { generate: vi.fn(async () => makeImprovement()) },
      validator: new ImprovementValidator(root, join(root, '.selfwright')),
      snapshots: new SnapshotManager(root, join(root, '.selfwright')),
      verifier: { run: vi.fn(async () => verification()) },
      publisher: fakePublisher(),
      eventBus: new EventBus(),
      ...overrides,
    });
  }

  it('leaves the file untouched after a failed verification', async () => {
    const pipeline = onDisk({ verifier: { run: vi.fn(async () => verification({ passed: false, exitCode: 1 })) } });

    const result = await pipeline.process(opportunity);

    expect(result.finalState).toBe('rolled-back');
    expect(await readFile(join(root, 'src', 'a.ts'), 'utf-8')).toBe(original);
  });

  it('undoes earlier writes when a later change cannot be applied', async () => {
    await writeFile(join(root, 'blocker'), 'not a directory');
    const pipeline = onDisk({
      generator: {
        generate: vi.fn(async () =>
          makeImprovement({
            changes: [
              { path: 'src/a.ts', kind: 'modify', content: 'export const a = 2;\n', description: 'bump' },
              { path: 'blocker/b.ts', kind: 'create', content: 'export const b = 1;\n', description: 'add' },
            ],
          }),
        ),
      },
    });

    const result = await pipeline.process(opportunity);

    expect(result).toMatchObject({ finalState: 'rolled-back', failedStage: 'applying', changesApplied: 0 });
    expect(await readFile(join(root, 'src', 'a.ts'), 'utf-8')).toBe(original);
    expect(await readFile(join(root, 'blocker'), 'utf-8')).toBe('not a directory');
  });

  it('rejects changes aimed at git metadata or the snapshot index', async () => {
    const pipeline = onDisk({
      generator: {
        generate: vi.fn(async () =>
          makeImprovement({
            changes: [
              { path: 'src/a.ts', kind: 'modify', content: 'export const a = 2;\n', description: 'bump' },
              { path: '.git/config', kind: 'create', content: '[filter "x"]\n', description: 'config' },
              { path: '.selfwright/snapshots/index.jsonl', kind: 'create', content: '', description: 'wipe' },
            ],
          }),
        ),
      },
    });

    const result = await pipeline.process(opportunity);

    expect(result).toMatchObject({
      finalState: 'rejected',
      message:
        'Validation failed: .git/config: git metadata is not writable; .selfwright/snapshots/index.jsonl: the data directory is not writable',
    });
    expect(await readFile(join(root, 'src', 'a.ts'), 'utf-8')).toBe(original);
  });

  it('applies the change when everything passes', async () => {
    const result = await onDisk({}).process(opportunity);

    expect(result.success).toBe(true);
    expect(await readFile(join(root, 'src', 'a.ts'), 'utf-8')).toBe('export const a = 2;\n');
  });
});
