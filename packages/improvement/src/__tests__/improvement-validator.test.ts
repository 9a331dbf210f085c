import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, mkdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { CodeChange, Improvement } from '@selfwright/core';
import { ImprovementValidator } from '../improvement-validator.js';

function change(overrides: Partial<CodeChange> = {}): CodeChange {
  return { path: 'src/new.ts', kind: 'create', content: 'export const x = 1;\n', description: 'test', ...overrides };
}

function improvementWith(changes: CodeChange[]): Improvement {
  return { id: 'imp-1', opportunityId: 'fix-1', title: 'Test', description: 'test', changes };
}

describe('ImprovementValidator', () => {
  let root: string;
  let validator: ImprovementValidator;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'validator-'));
    await mkdir(join(root, 'src'), { recursive: true });
    await writeFile(join(root, 'src', 'existing.ts'), 'export const old = true;\n');
    validator = new ImprovementValidator(root);
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('accepts a valid create and normalises its path', async () => {
    const outcome = await validator.validate(improvementWith([change({ path: './src/../src/new.ts' })]));

    expect(outcome.ok).toBe(true);
    if (outcome.ok) expect(outcome.improvement.changes[0].path).toBe('src/new.ts');
  });

  it('captures the current content of modify targets', async () => {
    const outcome = await validator.validate(
      improvementWith([change({ path: 'src/existing.ts', kind: 'modify', content: 'export const old = false;\n' })]),
    );

    expect(outcome.ok).toBe(true);
    if (outcome.ok) expect(outcome.improvement.changes[0].previousContent).toBe('export const old = true;\n');
  });

  it('does not type-check, only parse', async () => {
    const outcome = await validator.validate(improvementWith([change({ content: "const n: number = 'x';\n" })]));
    expect(outcome.ok).toBe(true);
  });

  it('rejects changes to git metadata', async () => {
    const outcome = await validator.validate(
      improvementWith([
        change({ path: '.git/config', content: '[filter "x"]\n\tclean = touch marker; cat\n' }),
        change({ path: 'vendor/lib/.GIT/hooks/pre-commit', content: '#!/bin/sh\n' }),
        change({ path: '.gitattributes', content: '*.ts filter=x\n' }),
      ]),
    );

    expect(outcome).toEqual({
      ok: false,
      errors: [
        '.git/config: git metadata is not writable',
        'vendor/lib/.GIT/hooks/pre-commit: git metadata is not writable',
      ],
    });
  });

  it('rejects changes inside the data directory', async () => {
    const guarded = new ImprovementValidator(root, join(root, '.selfwright'));

    const outcome = await guarded.validate(
      improvementWith([change({ path: '.selfwright/snapshots/index.jsonl', kind: 'modify', content: '' })]),
    );

    expect(outcome).toEqual({
      ok: false,
      errors: ['.selfwright/snapshots/index.jsonl: the data directory is not writable'],
    });
  });

  it('allows dotfiles that only look like git metadata', async () => {
    const guarded = new ImprovementValidator(root, join(root, '.selfwright'));

    const outcome = await guarded.validate(
      improvementWith([change({ path: '.gitignore', content: 'dist/\n' }), change({ path: '.selfwright-notes.md', content: '# notes\n' })]),
    );

    expect(outcome.ok).toBe(true);
  });

  it('rejects paths outside the project root', async () => {
    const outcome = await validator.validate(
      improvementWith([change({ path: '../outside.ts' }), change({ path: '/etc/hosts' })]),
    );
    expect(outcome).toEqual({
      ok: false,
      errors: ['../outside.ts: path resolves outside the project root', '/etc/hosts: absolute paths are not allowed'],
    });
  });

  it('rejects modify and delete of missing files', async () => {
    const outcome = await validator.validate(
      improvementWith([
        change({ path: 'src/missing.ts', kind: 'modify' }),
        change({ path: 'src/gone.ts', kind: 'delete', content: '' }),
      ]),
    );
    expect(outcome).toEqual({
      ok: false,
      errors: [
        'src/missing.ts: cannot modify a file that does not exist',
        'src/gone.ts: cannot delete a file that does not exist',
      ],
    });
  });

  it('rejects source that does not parse', async () => {
    const outcome = await validator.validate(improvementWith([change({ path: 'src/bad.ts', content: 'const x = ;\n' })]));

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.errors).toHaveLength(1);
      expect(outcome.errors[0]).toMatch(/^src\/bad\.ts: Syntax error at 1:\d+: Expression expected\.$/);
    }
  });

  it('rejects invalid JSON files', async () => {
    const outcome = await validator.validate(improvementWith([change({ path: 'config/app.json', content: '{"a":' })]));

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) expect(outcome.errors[0]).toMatch(/^config\/app\.json: Invalid JSON: /);
  });

  it('does not syntax-check other file types', async () => {
    const outcome = await validator.validate(improvementWith([change({ path: 'README.md', content: '{{ not code' })]));
    expect(outcome.ok).toBe(true);
  });

  it('rejects duplicate targets and empty change lists', async () => {
    const duplicate = await validator.validate(improvementWith([change(), change({ path: 'src//new.ts' })]));
    expect(duplicate).toEqual({ ok: false, errors: ['src//new.ts: duplicate target path'] });

    expect(await validator.validate(improvementWith([]))).toEqual({
      ok: false,
      errors: ['Improvement contains no changes'],
    });
  });

  it('rejects the whole improvement when any change is invalid', async () => {
    const outcome = await validator.validate(
      improvementWith([change(), change({ path: 'src/other.ts', content: 'function (' })]),
    );
    expect(outcome.ok).toBe(false);
    if (!outcome.ok) expect(outcome.errors).toHaveLength(1);
  });
});
