import type { PipelineStage, TerminalStage } from './improvement.js';

export type PushFailureKind = 'rejected' | 'unreachable' | 'auth' | 'no-remote' | 'unknown';

export interface PublishOutcome {
  committed: boolean;
  /** Short revision id of the new commit */
  revision?: string;
  pushed: boolean;
  message: string;
  error?: string;
  pushFailure?: PushFailureKind;
  changedPaths: string[];
}

/** Append-only audit record of one opportunity's trip through the pipeline */
export interface ImprovementResult {
  opportunityId: string;
  improvementId?: string;
  title?: string;
  success: boolean;
  message: string;
  changesApplied: number;
  timestamp: string;
  finalState: TerminalStage;
  /** Stage that was active when the attempt failed */
  failedStage?: PipelineStage;
  snapshotId?: string;
  publish?: PublishOutcome;
  /** Rollback itself failed; monitored files may be inconsistent */
  requiresAttention?: boolean;
}
