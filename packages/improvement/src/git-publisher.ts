import { createLogger, IMPROVEMENT_COMMIT_PREFIX } from '@selfwright/core';
import type {
  CommitDetails,
  CommitLogEntry,
  CommitOutcome,
  IVersionControl,
  PublishOutcome,
  PushFailureKind,
  PushOutcome,
  RevertOutcome,
} from '@selfwright/core';
import { gitChangedPaths, gitCommitDetails, gitCurrentBranch, gitLog, gitRemotes, literalPathspec } from './git-utils.js';
import type { GitRunner } from './git-utils.js';

const log = createLogger('GitPublisher');

/** Abbreviated or full hex object name; anything else is refused before reaching git */
const COMMIT_HASH = /^[0-9a-f]{4,40}$/i;
/** How far back revertLast looks for an improvement commit */
const REVERT_SCAN_LIMIT = 100;

export interface PublisherOptions {
  enabled: boolean;
  remote: string;
  /** Branch to push; the current branch when unset */
  branch?: string;
}

export const DEFAULT_PUBLISHER_OPTIONS: PublisherOptions = {
  enabled: true,
  remote: 'origin',
};

/** Map push stderr to a failure kind */
export function classifyPushFailure(stderr: string): PushFailureKind {
  if (/\[rejected\]|non-fast-forward|fetch first|updates were rejected/i.test(stderr)) return 'rejected';
  if (/authentication failed|permission denied|could not read username|access denied|403/i.test(stderr)) return 'auth';
  if (/could not resolve host|unable to access|connection (timed out|refused)|network is unreachable|could not read from remote|timed out/i.test(stderr)) {
    return 'unreachable';
  }
  return 'unknown';
}

/** Commit body: description, improvement id and the changed files */
export function buildCommitBody(description: string, improvementId: string, changedPaths: string[]): string {
  return [
    description.trim(),
    '',
    `Improvement: ${improvementId}`,
    'Changed files:',
    ...changedPaths.map((p) => `  - ${p}`),
  ].join('\n');
}

/**
 * Publishes accepted improvements as commits. A commit that lands locally
 * but cannot be pushed is reported as a degraded success, never as a
 * reason to undo the change.
 */
export class GitPublisher implements IVersionControl {
  private readonly options: PublisherOptions;
  private configChecked = false;
  private configError: string | null = null;

  constructor(
    private readonly git: GitRunner,
    options: Partial<PublisherOptions> = {},
  ) {
    this.options = { ...DEFAULT_PUBLISHER_OPTIONS, ...options };
  }

  setEnabled(enabled: boolean): void {
    this.options.enabled = enabled;
    log.info(`Publishing ${enabled ? 'enabled' : 'disabled'}`);
  }

  isEnabled(): boolean {
    return this.options.enabled;
  }

  async isRepository(): Promise<boolean> {
    return (await this.checkConfiguration()) === null;
  }

  async hasRemote(): Promise<boolean> {
    return (await gitRemotes(this.git)).includes(this.options.remote);
  }

  async hasPendingChanges(): Promise<boolean> {
    const paths = await gitChangedPaths(this.git);
    return paths !== null && paths.length > 0;
  }

  async changedPaths(): Promise<string[]> {
    return (await gitChangedPaths(this.git)) ?? [];
  }

  async stagePaths(paths: string[]): Promise<boolean> {
    if (paths.length === 0) return true;
    return (await this.git(['add', '-A', '--', ...paths.map((p) => literalPathspec(p, true))])).ok;
  }

  async commit(title: string, body: string, paths?: string[]): Promise<CommitOutcome> {
    const args = ['commit', '-m', title, '-m', body];
    if (paths) args.push('--', ...paths.map((p) => literalPathspec(p, true)));
    const result = await this.git(args);
    if (!result.ok) return { ok: false, error: result.stderr };

    const head = await this.git(['rev-parse', '--short', 'HEAD']);
    return { ok: true, revision: head.ok ? head.stdout : undefined };
  }

  async push(branch?: string): Promise<PushOutcome> {
    const target = branch ?? this.options.branch ?? (await gitCurrentBranch(this.git));
    if (!target) return { ok: false, message: 'Could not determine the branch to push', failure: 'unknown' };

    const { remote } = this.options;
    if (!(await this.hasRemote())) {
      return { ok: false, message: `No remote named "${remote}" is configured`, failure: 'no-remote' };
    }

    const first = await this.git(['push', remote, target]);
    if (first.ok) return { ok: true, message: `Pushed to ${remote}/${target}` };

    const failure = classifyPushFailure(first.stderr);
    if (failure !== 'rejected') {
      return { ok: false, message: `Push failed: ${first.stderr}`, failure };
    }

    log.info(`Push to ${remote}/${target} rejected, rebasing once and retrying`);
    const pull = await this.git(['pull', '--rebase', remote, target]);
    if (!pull.ok) {
      const abort = await this.git(['rebase', '--abort']);
      if (!abort.ok) log.warn(`rebase --abort failed: ${abort.stderr}`);
      return { ok: false, message: `Push rejected and rebase failed: ${pull.stderr}`, failure: 'rejected' };
    }

    const retry = await this.git(['push', remote, target]);
    if (retry.ok) return { ok: true, message: `Pushed to ${remote}/${target} after rebase` };
    return {
      ok: false,
      message: `Push failed after rebase: ${retry.stderr}`,
      failure: classifyPushFailure(retry.stderr),
    };
  }

  async commitAndPublish(
    title: string,
    description: string,
    improvementId: string,
    changedPaths: string[],
  ): Promise<PublishOutcome> {
    if (!this.options.enabled) {
      return { committed: false, pushed: false, message: 'Publishing disabled', changedPaths };
    }

    const configError = await this.checkConfiguration();
    if (configError) {
      return { committed: false, pushed: false, message: 'Version control unavailable', error: configError, changedPaths };
    }

    // Only the improvement's own files are committed; the rest of the work tree is left alone
    const pending =
      changedPaths.length === 0 ? [] : await gitChangedPaths(this.git, changedPaths.map((p) => literalPathspec(p)));
    if (pending === null) {
      return { committed: false, pushed: false, message: 'Commit failed', error: 'Could not read work tree status', changedPaths };
    }
    if (pending.length === 0) {
      return { committed: false, pushed: false, message: 'No changes to commit', changedPaths: [] };
    }

    if (!(await this.stagePaths(pending))) {
      return { committed: false, pushed: false, message: 'Commit failed', error: 'Failed to stage changes', changedPaths };
    }

    const commit = await this.commit(
      `${IMPROVEMENT_COMMIT_PREFIX} ${title}`,
      buildCommitBody(description, improvementId, changedPaths),
      pending,
    );
    if (!commit.ok) {
      log.error(`Commit failed: ${commit.error ?? 'unknown error'}`, undefined, improvementId);
      return { committed: false, pushed: false, message: 'Commit failed', error: commit.error, changedPaths };
    }

    const push = await this.push();
    if (!push.ok) {
      log.warn(`Committed ${commit.revision ?? ''} but push failed (${push.failure ?? 'unknown'}): ${push.message}`, undefined, improvementId);
      return {
        committed: true,
        revision: commit.revision,
        pushed: false,
        message: `Committed locally; ${push.message}`,
        error: push.message,
        pushFailure: push.failure,
        changedPaths,
      };
    }

    log.info(`Published ${commit.revision ?? 'commit'}: ${push.message}`, undefined, improvementId);
    return { committed: true, revision: commit.revision, pushed: true, message: push.message, changedPaths };
  }

  async commitHistory(limit: number): Promise<CommitLogEntry[]> {
    if (await this.checkConfiguration()) return [];
    return gitLog(this.git, limit, IMPROVEMENT_COMMIT_PREFIX);
  }

  async commitDetails(hash: string): Promise<CommitDetails | null> {
    if (!COMMIT_HASH.test(hash) || (await this.checkConfiguration())) return null;
    return gitCommitDetails(this.git, hash, IMPROVEMENT_COMMIT_PREFIX);
  }

  async revertImprovement(hash: string): Promise<RevertOutcome> {
    const configError = await this.checkConfiguration();
    if (configError) return { ok: false, pushed: false, message: 'Version control unavailable', error: configError };
    if (!COMMIT_HASH.test(hash)) return { ok: false, pushed: false, message: `Invalid commit hash: ${hash}` };

    const found = await this.git(['log', '-1', '--format=%H%x1f%s', hash, '--']);
    if (!found.ok || !found.stdout) return { ok: false, pushed: false, message: `Commit not found: ${hash}` };

    const [fullHash = '', subject = ''] = found.stdout.split('\x1f');
    if (!subject.startsWith(IMPROVEMENT_COMMIT_PREFIX)) {
      return { ok: false, pushed: false, message: `Commit ${hash} is not an improvement commit` };
    }
    return this.revertCommit(fullHash, subject);
  }

  async revertLast(): Promise<RevertOutcome> {
    const configError = await this.checkConfiguration();
    if (configError) return { ok: false, pushed: false, message: 'Version control unavailable', error: configError };

    const target = await this.latestUnrevertedImprovement();
    if (!target) return { ok: false, pushed: false, message: 'No improvement to revert' };
    return this.revertCommit(target.hash, target.subject);
  }

  /** Newest `improve:` commit not yet undone by a later revert commit */
  private async latestUnrevertedImprovement(): Promise<{ hash: string; subject: string } | null> {
    const result = await this.git(['log', `--max-count=${REVERT_SCAN_LIMIT}`, '--format=%H%x1f%s%x1f%b%x1e']);
    if (!result.ok) return null;

    const reverted = new Set<string>();
    for (const record of result.stdout.split('\x1e')) {
      const [hash = '', subject = '', body = ''] = record.trim().split('\x1f');
      if (!hash) continue;
      for (const match of body.matchAll(/This reverts commit ([0-9a-f]{40})/g)) reverted.add(match[1]);
      if (subject.startsWith(IMPROVEMENT_COMMIT_PREFIX) && !reverted.has(hash)) return { hash, subject };
    }
    return null;
  }

  private async revertCommit(hash: string, subject: string): Promise<RevertOutcome> {
    const short = hash.slice(0, 7);
    const revert = await this.git(['revert', '--no-edit', hash]);
    if (!revert.ok) {
      const abort = await this.git(['revert', '--abort']);
      if (!abort.ok) log.warn(`revert --abort failed: ${abort.stderr}`);
      log.error(`Revert of ${short} failed: ${revert.stderr}`);
      return { ok: false, pushed: false, revertedHash: hash, message: `Revert of ${short} failed`, error: revert.stderr };
    }

    const head = await this.git(['rev-parse', '--short', 'HEAD']);
    const revision = head.ok ? head.stdout : undefined;
    log.info(`Reverted ${short} (${subject})`);

    if (!this.options.enabled) {
      return { ok: true, pushed: false, revertedHash: hash, revision, message: `Reverted ${short} locally` };
    }
    const push = await this.push();
    if (!push.ok) {
      return {
        ok: true,
        pushed: false,
        revertedHash: hash,
        revision,
        message: `Reverted ${short} locally; ${push.message}`,
        error: push.message,
      };
    }
    return { ok: true, pushed: true, revertedHash: hash, revision, message: `Reverted ${short}: ${push.message}` };
  }

  /** Check once for a usable git binary and work tree; the answer is cached */
  private async checkConfiguration(): Promise<string | null> {
    if (this.configChecked) return this.configError;

    const inside = await this.git(['rev-parse', '--is-inside-work-tree']);
    let error: string | null = null;
    if (inside.missingBinary) {
      error = 'git executable not found';
    } else if (!inside.ok || inside.stdout !== 'true') {
      error = `Not a git work tree: ${inside.stderr || inside.stdout}`;
    }
    // Timeouts are transient; check again next time
    this.configChecked = !inside.timedOut;
    this.configError = error;

    if (error) log.error(`Publishing unavailable: ${error}`);
    return this.configError;
  }
}
