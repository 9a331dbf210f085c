export { ActivityRecorder } from './activity-recorder.js';
export { OpportunityAnalyzer, DEFAULT_ANALYZER_OPTIONS, normalizeError } from './opportunity-analyzer.js';
export type { AnalyzerOptions, TaskHistorySource } from './opportunity-analyzer.js';
export { ChangeGenerator, DEFAULT_GENERATOR_OPTIONS, parseGeneratedImprovement } from './change-generator.js';
export type { GeneratorOptions, ParseResult } from './change-generator.js';
export { GeneratedImprovementSchema, GENERATED_IMPROVEMENT_JSON_SCHEMA } from './generation-schema.js';
export type { GeneratedImprovement } from './generation-schema.js';
export { ImprovementValidator, dataDirWithinProject, protectedPathError, resolveProjectPath } from './improvement-validator.js';
export type { ValidationOutcome } from './improvement-validator.js';
export { SnapshotManager } from './snapshot-manager.js';
export { GitPublisher, DEFAULT_PUBLISHER_OPTIONS, buildCommitBody, classifyPushFailure } from './git-publisher.js';
export type { PublisherOptions } from './git-publisher.js';
export { createGitRunner, DEFAULT_GIT_TIMEOUT_MS } from './git-utils.js';
export type { GitResult, GitRunner } from './git-utils.js';
export { ImprovementPipeline, DEFAULT_PIPELINE_OPTIONS } from './improvement-pipeline.js';
export type {
  PipelineDeps,
  PipelineOptions,
  ImprovementSource,
  ImprovementChecker,
  SnapshotStore,
} from './improvement-pipeline.js';
export { ImprovementScheduler, DEFAULT_SCHEDULER_OPTIONS } from './improvement-scheduler.js';
export type {
  SchedulerOptions,
  SchedulerStatus,
  TriggerOutcome,
  CycleTrigger,
  OpportunitySource,
  OpportunityProcessor,
} from './improvement-scheduler.js';
export { FileTaskHistoryStore } from './stores/file-task-history-store.js';
export { FileImprovementLog } from './stores/file-improvement-log.js';
export { loadConfig, CONFIG_FILE_NAME } from './config.js';
export type { SelfImprovementConfig, PublisherConfig, LoadConfigOptions } from './config.js';
export { createSelfImprovementService } from './self-improvement-service.js';
export type { SelfImprovementService, ServiceDependencies, ServiceStatus } from './self-improvement-service.js';
