import type { PublishOutcome, PushFailureKind } from '../models/improvement-result.js';

export interface CommitOutcome {
  ok: boolean;
  revision?: string;
  error?: string;
}

export interface PushOutcome {
  ok: boolean;
  message: string;
  failure?: PushFailureKind;
}

export interface CommitLogEntry {
  hash: string;
  subject: string;
  author: string;
  date: string;
  isImprovement: boolean;
}

export interface CommitDetails extends CommitLogEntry {
  /** Full commit message */
  message: string;
  /** Per-file change summary (`git show --stat`) */
  stat: string;
  /** Id from the `Improvement:` trailer of improvement commits */
  improvementId?: string;
}

export interface RevertOutcome {
  ok: boolean;
  message: string;
  /** Commit that was reverted */
  revertedHash?: string;
  /** The new revert commit */
  revision?: string;
  pushed: boolean;
  error?: string;
}

/**
 * Publishes accepted changes to version control. Paths taken and returned
 * here are relative to the repository root.
 */
export interface IVersionControl {
  isRepository(): Promise<boolean>;
  hasRemote(): Promise<boolean>;
  hasPendingChanges(): Promise<boolean>;
  changedPaths(): Promise<string[]>;
  stagePaths(paths: string[]): Promise<boolean>;
  /** Commits only `paths` when given, leaving anything else staged as it is */
  commit(title: string, body: string, paths?: string[]): Promise<CommitOutcome>;
  push(branch?: string): Promise<PushOutcome>;
  commitAndPublish(
    title: string,
    description: string,
    improvementId: string,
    changedPaths: string[],
  ): Promise<PublishOutcome>;
  commitHistory(limit: number): Promise<CommitLogEntry[]>;
  commitDetails(hash: string): Promise<CommitDetails | null>;
  /** Undo an improvement commit with a new revert commit */
  revertImprovement(hash: string): Promise<RevertOutcome>;
  /** Revert the newest improvement commit that has not been reverted yet */
  revertLast(): Promise<RevertOutcome>;
}
