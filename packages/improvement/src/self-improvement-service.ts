import { createLogger } from '@selfwright/core';
import type {
  CommitDetails,
  CommitLogEntry,
  IEventBus,
  IIsolationBackend,
  ImprovementOpportunity,
  ImprovementResult,
  IReasoningService,
  RevertOutcome,
  TaskRecord,
} from '@selfwright/core';
import { EventBus } from '@selfwright/eventbus';
import { DockerClient, IsolatedVerifier } from '@selfwright/sandbox';
import { ActivityRecorder } from './activity-recorder.js';
import { ChangeGenerator } from './change-generator.js';
import type { SelfImprovementConfig } from './config.js';
import { GitPublisher } from './git-publisher.js';
import { createGitRunner } from './git-utils.js';
import type { GitRunner } from './git-utils.js';
import { ImprovementPipeline } from './improvement-pipeline.js';
import { ImprovementScheduler } from './improvement-scheduler.js';
import type { SchedulerStatus, TriggerOutcome } from './improvement-scheduler.js';
import { ImprovementValidator } from './improvement-validator.js';
import { OpportunityAnalyzer } from './opportunity-analyzer.js';
import { SnapshotManager } from './snapshot-manager.js';
import { FileImprovementLog } from './stores/file-improvement-log.js';
import { FileTaskHistoryStore } from './stores/file-task-history-store.js';

const log = createLogger('SelfImprovementService');

export interface ServiceDependencies {
  reasoning: IReasoningService;
  eventBus?: IEventBus;
  /** Defaults to the Docker CLI */
  isolation?: IIsolationBackend;
  /** Defaults to the git executable in the project root */
  git?: GitRunner;
}

export interface ServiceStatus extends SchedulerStatus {
  enabled: boolean;
  publishing: boolean;
}

/** Host-facing surface of the self-improvement system */
export interface SelfImprovementService {
  readonly eventBus: IEventBus;
  recordTask(task: TaskRecord): Promise<void>;
  recordActivity(): void;
  start(): Promise<void>;
  stop(): void;
  improveNow(focus?: string): Promise<TriggerOutcome>;
  resume(): void;
  status(): ServiceStatus;
  history(limit?: number): Promise<ImprovementResult[]>;
  lastResult(): Promise<ImprovementResult | null>;
  opportunities(): Promise<ImprovementOpportunity[]>;
  commits(limit?: number): Promise<CommitLogEntry[]>;
  commitDetails(hash: string): Promise<CommitDetails | null>;
  /** Undo a published improvement with a revert commit */
  revertImprovement(hash: string): Promise<RevertOutcome>;
  revertLast(): Promise<RevertOutcome>;
  setPublishing(enabled: boolean): void;
}

/** Wire every component from a resolved config and the host's collaborators */
export function createSelfImprovementService(
  config: SelfImprovementConfig,
  deps: ServiceDependencies,
): SelfImprovementService {
  const eventBus = deps.eventBus ?? new EventBus();

  const historyStore = new FileTaskHistoryStore(config.dataDir, config.history.maxEntries);
  const recorder = new ActivityRecorder(historyStore, eventBus);
  const analyzer = new OpportunityAnalyzer(historyStore, config.analyzer);
  const resultLog = new FileImprovementLog(config.dataDir);

  const publisher = new GitPublisher(
    deps.git ?? createGitRunner(config.projectRoot, config.publisher.commandTimeoutMs),
    config.publisher,
  );

  const pipeline = new ImprovementPipeline(
    {
      generator: new ChangeGenerator(deps.reasoning, { ...config.generator, projectRoot: config.projectRoot }),
      validator: new ImprovementValidator(config.projectRoot, config.dataDir),
      snapshots: new SnapshotManager(config.projectRoot, config.dataDir),
      verifier: new IsolatedVerifier(deps.isolation ?? new DockerClient(), config.verifier),
      publisher,
      eventBus,
    },
    { verificationTimeoutMs: config.verifier.timeoutMs, keepSnapshots: config.snapshots.keep },
  );

  const scheduler = new ImprovementScheduler(analyzer, pipeline, resultLog, eventBus, config.scheduler);

  return {
    eventBus,

    recordTask: (task) => recorder.record(task),

    recordActivity: () => scheduler.recordActivity(),

    async start() {
      if (!config.enabled) {
        log.info('Self-improvement disabled, not starting');
        return;
      }
      await scheduler.start();
    },

    stop: () => scheduler.stop(),

    async improveNow(focus) {
      if (!config.enabled) {
        return { accepted: false, reason: 'disabled', message: 'Self-improvement is disabled' };
      }
      return scheduler.improveNow(focus);
    },

    resume: () => scheduler.resume(),

    status: () => ({ ...scheduler.status(), enabled: config.enabled, publishing: publisher.isEnabled() }),

    history: (limit) => scheduler.history(limit),

    lastResult: () => scheduler.lastResult(),

    opportunities: () => analyzer.analyze(),

    commits: (limit = 20) => publisher.commitHistory(limit),

    commitDetails: (hash) => publisher.commitDetails(hash),

    revertImprovement: (hash) => publisher.revertImprovement(hash),

    revertLast: () => publisher.revertLast(),

    setPublishing: (enabled) => publisher.setEnabled(enabled),
  };
}
