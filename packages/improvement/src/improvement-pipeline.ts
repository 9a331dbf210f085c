import { createLogger, errorMessage, Events, POST_SNAPSHOT_STAGES } from '@selfwright/core';
import type {
  CodeChange,
  IEventBus,
  Improvement,
  ImprovementOpportunity,
  ImprovementResult,
  ImprovementRolledBackEvent,
  IVerifier,
  IVersionControl,
  PipelineStage,
  PublishOutcome,
  RollbackFailedEvent,
  StageChangedEvent,
  TerminalStage,
  VerificationOutcome,
} from '@selfwright/core';
import type { ValidationOutcome } from './improvement-validator.js';

const log = createLogger('ImprovementPipeline');

export interface ImprovementSource {
  generate(opportunity: ImprovementOpportunity): Promise<Improvement | null>;
}

export interface ImprovementChecker {
  validate(improvement: Improvement): Promise<ValidationOutcome>;
}

export interface SnapshotStore {
  createSnapshot(label: string, paths: string[]): Promise<string>;
  apply(snapshotId: string, changes: CodeChange[]): Promise<number>;
  rollbackTo(snapshotId: string): Promise<void>;
  commitImprovement(snapshotId: string, improvementId: string): Promise<void>;
  prune(keep: number): Promise<number>;
}

export interface PipelineDeps {
  generator: ImprovementSource;
  validator: ImprovementChecker;
  snapshots: SnapshotStore;
  verifier: IVerifier;
  publisher: IVersionControl;
  eventBus: IEventBus;
}

export interface PipelineOptions {
  verificationTimeoutMs: number;
  /** Settled snapshots kept after each accepted improvement */
  keepSnapshots: number;
}

export const DEFAULT_PIPELINE_OPTIONS: PipelineOptions = {
  verificationTimeoutMs: 60_000,
  keepSnapshots: 20,
};

type Outcome = Omit<ImprovementResult, 'opportunityId' | 'timestamp' | 'changesApplied'> & {
  changesApplied?: number;
};

/** New content of every non-deleted change, keyed by path */
function verificationFiles(changes: CodeChange[]): Record<string, string> {
  const files: Record<string, string> = {};
  for (const change of changes) {
    if (change.kind !== 'delete') files[change.path] = change.content;
  }
  return files;
}

function describeVerification(outcome: VerificationOutcome): string {
  if (outcome.timedOut) return outcome.error ?? 'verification timed out';
  const detail = outcome.error || outcome.output.trim().split('\n').slice(-5).join('\n');
  return `exit code ${outcome.exitCode}${detail ? `: ${detail}` : ''}`;
}

/**
 * Drives one opportunity through generate → validate → snapshot → apply →
 * verify → commit → publish. Never throws: every path ends in a result.
 * Once a snapshot exists, any failure restores it before returning.
 */
export class ImprovementPipeline {
  private readonly options: PipelineOptions;

  constructor(
    private readonly deps: PipelineDeps,
    options: Partial<PipelineOptions> = {},
  ) {
    this.options = { ...DEFAULT_PIPELINE_OPTIONS, ...options };
  }

  async process(opportunity: ImprovementOpportunity): Promise<ImprovementResult> {
    const { generator, validator, snapshots, verifier } = this.deps;
    const cid = opportunity.id;
    let stage: PipelineStage = 'pending';
    let improvement: Improvement | undefined;
    let snapshotId: string | undefined;

    const advance = (next: PipelineStage): void => {
      const previousStage = stage;
      stage = next;
      log.debug(`[${next}] from ${previousStage}`, undefined, cid);
      this.deps.eventBus.emit(Events.IMPROVEMENT_STAGE_CHANGED, {
        opportunity,
        stage: next,
        previousStage,
      } satisfies StageChangedEvent);
    };

    const finish = (finalState: TerminalStage, outcome: Outcome): ImprovementResult => {
      if (stage !== finalState) advance(finalState);
      return {
        opportunityId: opportunity.id,
        improvementId: improvement?.id,
        title: improvement?.title,
        changesApplied: 0,
        timestamp: new Date().toISOString(),
        ...outcome,
      };
    };

    try {
      advance('generating');
      const generated = await generator.generate(opportunity);
      if (!generated) {
        return finish('failed', {
          success: false,
          finalState: 'failed',
          failedStage: 'generating',
          message: 'Failed to generate an improvement',
        });
      }
      improvement = generated;

      advance('validating');
      const validation = await validator.validate(generated);
      if (!validation.ok) {
        return finish('rejected', {
          success: false,
          finalState: 'rejected',
          failedStage: 'validating',
          message: `Validation failed: ${validation.errors.join('; ')}`,
        });
      }
      const accepted = validation.improvement;
      improvement = accepted;

      advance('snapshotting');
      const paths = accepted.changes.map((c) => c.path);
      snapshotId = await snapshots.createSnapshot(`before ${accepted.id}: ${accepted.title}`, paths);

      advance('applying');
      const applied = await snapshots.apply(snapshotId, accepted.changes);
      log.info(`[applying] Applied ${applied} change(s) under snapshot ${snapshotId}`, undefined, cid);

      if (accepted.verificationScript) {
        advance('verifying');
        const outcome = await verifier.run({
          script: accepted.verificationScript,
          files: verificationFiles(accepted.changes),
          timeoutMs: this.options.verificationTimeoutMs,
        });
        log.info(`[verifying] ${outcome.passed ? 'Passed' : 'Failed'} (${outcome.mode}, ${outcome.durationMs}ms)`, undefined, cid);
        if (!outcome.passed) {
          return await this.rollBack(opportunity, snapshotId, 'verifying', `Verification failed: ${describeVerification(outcome)}`, finish);
        }
      }

      advance('committing');
      await snapshots.commitImprovement(snapshotId, accepted.id);
      await this.pruneSnapshots(cid);

      advance('publishing');
      const publish = await this.publish(accepted);

      return finish('done', {
        success: true,
        finalState: 'done',
        message: `Applied "${accepted.title}": ${publish.message}`,
        changesApplied: applied,
        snapshotId,
        publish,
      });
    } catch (error) {
      const message = errorMessage(error);
      if (snapshotId && POST_SNAPSHOT_STAGES.has(stage)) {
        return this.rollBack(opportunity, snapshotId, stage, `${stage} failed: ${message}`, finish);
      }
      log.error(`[${stage}] ${message}`, undefined, cid);
      return finish('failed', { success: false, finalState: 'failed', failedStage: stage, message });
    }
  }

  private async publish(improvement: Improvement): Promise<PublishOutcome> {
    const paths = improvement.changes.map((c) => c.path);
    return this.deps.publisher.commitAndPublish(improvement.title, improvement.description, improvement.id, paths);
  }

  private async pruneSnapshots(cid: string): Promise<void> {
    try {
      await this.deps.snapshots.prune(this.options.keepSnapshots);
    } catch (error) {
      log.warn(`[committing] Snapshot pruning failed: ${errorMessage(error)}`, undefined, cid);
    }
  }

  private async rollBack(
    opportunity: ImprovementOpportunity,
    snapshotId: string,
    failedStage: PipelineStage,
    reason: string,
    finish: (finalState: TerminalStage, outcome: Outcome) => ImprovementResult,
  ): Promise<ImprovementResult> {
    try {
      await this.deps.snapshots.rollbackTo(snapshotId);
    } catch (error) {
      const rollbackError = errorMessage(error);
      log.error(
        `CRITICAL [${failedStage}] rollback of snapshot ${snapshotId} failed, monitored files need operator attention: ${rollbackError}`,
        undefined,
        opportunity.id,
      );
      this.deps.eventBus.emit(Events.ROLLBACK_FAILED, {
        opportunityId: opportunity.id,
        snapshotId,
        error: rollbackError,
      } satisfies RollbackFailedEvent);
      return finish('failed', {
        success: false,
        finalState: 'failed',
        failedStage,
        message: `${reason}; rollback failed: ${rollbackError}`,
        snapshotId,
        requiresAttention: true,
      });
    }

    log.warn(`[${failedStage}] Rolled back snapshot ${snapshotId}: ${reason}`, undefined, opportunity.id);
    this.deps.eventBus.emit(Events.IMPROVEMENT_ROLLED_BACK, {
      opportunityId: opportunity.id,
      snapshotId,
      reason,
    } satisfies ImprovementRolledBackEvent);
    return finish('rolled-back', {
      success: false,
      finalState: 'rolled-back',
      failedStage,
      message: reason,
      snapshotId,
    });
  }
}
