import type { TaskRecord } from '../models/task-record.js';
import type { ImprovementOpportunity } from '../models/opportunity.js';
import type { PipelineStage } from '../models/improvement.js';
import type { ImprovementResult } from '../models/improvement-result.js';

export interface TaskRecordedEvent {
  task: TaskRecord;
}

export interface CycleStartedEvent {
  trigger: 'scheduled' | 'manual';
  opportunityCount: number;
}

export interface CycleFinishedEvent {
  trigger: 'scheduled' | 'manual';
  results: ImprovementResult[];
  /** Remaining batch skipped because the user became active */
  interrupted: boolean;
}

export interface StageChangedEvent {
  opportunity: ImprovementOpportunity;
  stage: PipelineStage;
  previousStage: PipelineStage;
}

export interface ImprovementCompletedEvent {
  result: ImprovementResult;
}

export interface ImprovementFailedEvent {
  result: ImprovementResult;
  error: string;
}

export interface ImprovementRolledBackEvent {
  opportunityId: string;
  snapshotId: string;
  reason: string;
}

export interface RollbackFailedEvent {
  opportunityId: string;
  snapshotId: string;
  error: string;
}

export const Events = {
  TASK_RECORDED: 'task:recorded',
  CYCLE_STARTED: 'cycle:started',
  CYCLE_FINISHED: 'cycle:finished',
  IMPROVEMENT_STAGE_CHANGED: 'improvement:stageChanged',
  IMPROVEMENT_COMPLETED: 'improvement:completed',
  IMPROVEMENT_FAILED: 'improvement:failed',
  IMPROVEMENT_ROLLED_BACK: 'improvement:rolledBack',
  ROLLBACK_FAILED: 'improvement:rollbackFailed',
} as const;

export type EventName = (typeof Events)[keyof typeof Events];
