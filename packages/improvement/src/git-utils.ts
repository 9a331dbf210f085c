import { execFile } from 'node:child_process';
import { createLogger } from '@selfwright/core';
import type { CommitDetails, CommitLogEntry } from '@selfwright/core';

const log = createLogger('GitUtils');

export interface GitResult {
  ok: boolean;
  stdout: string;
  stderr: string;
  /** The git executable could not be started */
  missingBinary: boolean;
  timedOut: boolean;
}

/** Runs one git command in a fixed repository. Never rejects. */
export type GitRunner = (args: string[]) => Promise<GitResult>;

export const DEFAULT_GIT_TIMEOUT_MS = 30_000;

/** execFile-backed runner; each invocation gets its own timeout */
export function createGitRunner(repoDir: string, timeoutMs: number = DEFAULT_GIT_TIMEOUT_MS): GitRunner {
  return (args) =>
    new Promise((resolve) => {
      execFile(
        'git',
        args,
        { cwd: repoDir, maxBuffer: 10 * 1024 * 1024, timeout: timeoutMs, env: { ...process.env, GIT_TERMINAL_PROMPT: '0' } },
        (error, stdout, stderr) => {
          if (error) {
            const missingBinary = error.code === 'ENOENT';
            const timedOut = error.killed === true;
            const msg = (timedOut ? `timed out after ${timeoutMs}ms` : stderr.trim()) || error.message;
            log.warn(`git ${args[0]} failed: ${msg}`);
            resolve({ ok: false, stdout: stdout.trimEnd(), stderr: msg, missingBinary, timedOut });
            return;
          }
          resolve({ ok: true, stdout: stdout.trimEnd(), stderr: stderr.trim(), missingBinary: false, timedOut: false });
        },
      );
    });
}

export async function gitCurrentBranch(git: GitRunner): Promise<string | null> {
  const result = await git(['rev-parse', '--abbrev-ref', 'HEAD']);
  return result.ok && result.stdout && result.stdout !== 'HEAD' ? result.stdout : null;
}

export async function gitRemotes(git: GitRunner): Promise<string[]> {
  const result = await git(['remote']);
  return result.ok ? result.stdout.split('\n').map((r) => r.trim()).filter(Boolean) : [];
}

/**
 * Pathspec matching `path` exactly (no globbing). `fromTop` anchors it at the
 * repository root instead of the working directory.
 */
export function literalPathspec(path: string, fromTop = false): string {
  return `:(${fromTop ? 'top,' : ''}literal)${path}`;
}

/**
 * Paths with uncommitted changes, relative to the repository root, optionally
 * limited to `pathspecs`. Untracked files are listed one by one; renames and
 * copies yield the new path.
 */
export async function gitChangedPaths(git: GitRunner, pathspecs?: string[]): Promise<string[] | null> {
  const args = ['status', '--porcelain', '-z', '--untracked-files=all'];
  if (pathspecs) args.push('--', ...pathspecs);
  const result = await git(args);
  if (!result.ok) return null;

  const fields = result.stdout.split('\0');
  const paths: string[] = [];
  for (let i = 0; i < fields.length; i++) {
    const entry = fields[i];
    if (entry.length < 4) continue;
    paths.push(entry.slice(3));
    // The original path of a rename or copy follows as its own field
    if (entry[0] === 'R' || entry[0] === 'C') i++;
  }
  return paths;
}

/** Message and stat of one commit; null when `rev` names no commit */
export async function gitCommitDetails(git: GitRunner, rev: string, improvementPrefix: string): Promise<CommitDetails | null> {
  const header = await git(['show', '-s', '--format=%h%x1f%s%x1f%an%x1f%aI%x1f%B', rev, '--']);
  if (!header.ok || !header.stdout) return null;
  const [hash = '', subject = '', author = '', date = '', message = ''] = header.stdout.split('\x1f');

  const stat = await git(['show', '--stat', '--format=', rev, '--']);
  const improvementId = /^Improvement: (\S+)$/m.exec(message)?.[1];
  return {
    hash,
    subject,
    author,
    date,
    isImprovement: subject.startsWith(improvementPrefix),
    message: message.trim(),
    stat: stat.ok ? stat.stdout.trim() : '',
    improvementId,
  };
}

export async function gitLog(git: GitRunner, limit: number, improvementPrefix: string): Promise<CommitLogEntry[]> {
  const result = await git(['log', `--max-count=${limit}`, '--format=%h%x1f%s%x1f%an%x1f%aI']);
  if (!result.ok || !result.stdout) return [];

  return result.stdout.split('\n').map((line) => {
    const [hash = '', subject = '', author = '', date = ''] = line.split('\x1f');
    return { hash, subject, author, date, isImprovement: subject.startsWith(improvementPrefix) };
  });
}
