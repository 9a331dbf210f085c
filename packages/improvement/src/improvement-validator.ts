import { readFile } from 'node:fs/promises';
import { isAbsolute, normalize, relative, resolve, sep } from 'node:path';
import { createLogger } from '@selfwright/core';
import type { CodeChange, Improvement } from '@selfwright/core';
import { isMissingPathError } from './utils/file-io.js';
import { checkSyntax } from './utils/syntax-check.js';

const log = createLogger('ImprovementValidator');

export type ValidationOutcome =
  | { ok: true; improvement: Improvement }
  | { ok: false; errors: string[] };

/**
 * Resolve a change path against the project root. Returns the normalised
 * relative path, or an error message when it is absolute or escapes the root.
 */
export function resolveProjectPath(projectRoot: string, path: string): { path: string } | { error: string } {
  if (isAbsolute(path)) return { error: 'absolute paths are not allowed' };
  const root = resolve(projectRoot);
  const target = resolve(root, path);
  const rel = relative(root, target);
  if (!rel || rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
    return { error: 'path resolves outside the project root' };
  }
  return { path: normalize(rel).split(sep).join('/') };
}

/** Project-relative location of the data directory, or null when it lies outside the root */
export function dataDirWithinProject(projectRoot: string, dataDir: string): string | null {
  const resolved = resolveProjectPath(projectRoot, relative(resolve(projectRoot), resolve(projectRoot, dataDir)));
  return 'path' in resolved ? resolved.path : null;
}

/**
 * Reason a normalised project path may not be written, or null. Git metadata
 * (any `.git` segment, matched case-insensitively) would let a change run
 * commands through git config or hooks; the data directory holds the
 * snapshots that rollback depends on.
 */
export function protectedPathError(path: string, dataDirPath: string | null): string | null {
  if (path.toLowerCase().split('/').includes('.git')) return 'git metadata is not writable';
  if (dataDirPath && (path === dataDirPath || path.startsWith(`${dataDirPath}/`))) {
    return 'the data directory is not writable';
  }
  return null;
}

/**
 * Static checks on a generated improvement. All-or-nothing: any problem
 * rejects the whole improvement. On success the returned copy carries
 * normalised paths and the prior content of modify/delete targets.
 */
export class ImprovementValidator {
  private readonly dataDirPath: string | null;

  constructor(
    private readonly projectRoot: string,
    dataDir?: string,
  ) {
    this.dataDirPath = dataDir === undefined ? null : dataDirWithinProject(projectRoot, dataDir);
  }

  async validate(improvement: Improvement): Promise<ValidationOutcome> {
    const errors: string[] = [];
    const changes: CodeChange[] = [];
    const seen = new Set<string>();

    if (improvement.changes.length === 0) {
      errors.push('Improvement contains no changes');
    }

    for (const change of improvement.changes) {
      const resolved = resolveProjectPath(this.projectRoot, change.path);
      if ('error' in resolved) {
        errors.push(`${change.path}: ${resolved.error}`);
        continue;
      }

      const path = resolved.path;
      const protectedError = protectedPathError(path, this.dataDirPath);
      if (protectedError) {
        errors.push(`${change.path}: ${protectedError}`);
        continue;
      }
      if (seen.has(path)) {
        errors.push(`${change.path}: duplicate target path`);
        continue;
      }
      seen.add(path);

      const previousContent = await this.readCurrent(path);
      if (change.kind !== 'create' && previousContent === null) {
        errors.push(`${change.path}: cannot ${change.kind} a file that does not exist`);
        continue;
      }

      if (change.kind !== 'delete') {
        const syntaxError = checkSyntax(path, change.content);
        if (syntaxError) {
          errors.push(`${change.path}: ${syntaxError}`);
          continue;
        }
      }

      changes.push({
        ...change,
        path,
        content: change.kind === 'delete' ? '' : change.content,
        previousContent: previousContent ?? undefined,
      });
    }

    if (errors.length > 0) {
      log.warn(`Rejected improvement "${improvement.title}": ${errors.join('; ')}`, undefined, improvement.opportunityId);
      return { ok: false, errors };
    }
    return { ok: true, improvement: { ...improvement, changes } };
  }

  private async readCurrent(path: string): Promise<string | null> {
    try {
      return await readFile(resolve(this.projectRoot, path), 'utf-8');
    } catch (error) {
      if (isMissingPathError(error) || (error instanceof Error && 'code' in error && error.code === 'EISDIR')) {
        return null;
      }
      throw error;
    }
  }
}
