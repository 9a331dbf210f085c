/**
 * Domain model for generated self-modifications.
 * An Improvement is data: it is written to disk by the snapshot manager and
 * only ever executed by the isolated verifier, never loaded in-process.
 */

export type ChangeKind = 'create' | 'modify' | 'delete';

export interface CodeChange {
  /** Path relative to the project root */
  path: string;
  kind: ChangeKind;
  /** Content on disk at validation time (modify/delete only) */
  previousContent?: string;
  /** New file content; empty for deletes */
  content: string;
  description: string;
}

export interface Improvement {
  id: string;
  opportunityId: string;
  title: string;
  description: string;
  /** Applied in order */
  changes: CodeChange[];
  /** Optional script run by the verifier against the changed files */
  verificationScript?: string;
}

/**
 * Per-opportunity pipeline states.
 *
 *   pending → generating → validating →(fail) rejected
 *   validating → snapshotting → applying →(fail) rolled-back
 *   applying → [verifying →(fail) rolled-back]
 *   verifying|applying → committing → publishing → done
 *
 * `failed` covers pre-snapshot errors that are not validation rejections.
 */
export type PipelineStage =
  | 'pending'
  | 'generating'
  | 'validating'
  | 'rejected'
  | 'snapshotting'
  | 'applying'
  | 'verifying'
  | 'committing'
  | 'publishing'
  | 'done'
  | 'rolled-back'
  | 'failed';

export type TerminalStage = Extract<PipelineStage, 'rejected' | 'rolled-back' | 'done' | 'failed'>;

/** Stages at or after which a failure must be rolled back */
export const POST_SNAPSHOT_STAGES: ReadonlySet<PipelineStage> = new Set<PipelineStage>([
  'snapshotting',
  'applying',
  'verifying',
  'committing',
  'publishing',
]);
