export * from './logger.js';
export * from './constants.js';
export * from './errors.js';

export type { TaskRecord } from './models/task-record.js';
export type {
  OpportunityType,
  FailureContext,
  LatencyContext,
  PatternContext,
  CapabilityContext,
  FixFailureOpportunity,
  OptimizeSpeedOpportunity,
  AutomatePatternOpportunity,
  NewCapabilityOpportunity,
  ImprovementOpportunity,
} from './models/opportunity.js';
export { affectedTools } from './models/opportunity.js';
export type { ChangeKind, CodeChange, Improvement, PipelineStage, TerminalStage } from './models/improvement.js';
export { POST_SNAPSHOT_STAGES } from './models/improvement.js';
export type { Snapshot, SnapshotEntry, SnapshotState, SnapshotIndexRecord } from './models/snapshot.js';
export type { ImprovementResult, PublishOutcome, PushFailureKind } from './models/improvement-result.js';

export type { IEventBus, EventHandler } from './ports/event-bus.js';
export type { IReasoningService, ReasoningRequest } from './ports/reasoning-service.js';
export type {
  VerificationMode,
  VerificationRequest,
  VerificationOutcome,
  EphemeralRunOptions,
  ProcessRunResult,
  IIsolationBackend,
  IVerifier,
} from './ports/sandbox.js';
export type {
  IVersionControl,
  CommitOutcome,
  PushOutcome,
  CommitLogEntry,
  CommitDetails,
  RevertOutcome,
} from './ports/version-control.js';
export type { ITaskHistoryStore } from './ports/task-history-store.js';
export type { IImprovementLog, ImprovementLogFilter } from './ports/improvement-log.js';

export * from './events/improvement-events.js';
