import {
  createLogger,
  DEFAULT_COOLDOWN_MS,
  DEFAULT_IDLE_THRESHOLD_MS,
  DEFAULT_MAX_OPPORTUNITIES_PER_CYCLE,
  DEFAULT_TICK_INTERVAL_MS,
  errorMessage,
  Events,
} from '@selfwright/core';
import type {
  CycleFinishedEvent,
  CycleStartedEvent,
  IEventBus,
  IImprovementLog,
  ImprovementCompletedEvent,
  ImprovementFailedEvent,
  ImprovementOpportunity,
  ImprovementResult,
} from '@selfwright/core';

const log = createLogger('ImprovementScheduler');

export interface SchedulerOptions {
  /** Quiet period after the last user interaction before a cycle may start */
  idleThresholdMs: number;
  tickIntervalMs: number;
  /** Opportunities processed per cycle */
  maxOpportunitiesPerCycle: number;
  /** Minimum time between cycle starts, scheduled or manual */
  cooldownMs: number;
  /** Failed attempts after which an opportunity is skipped */
  maxAttemptsPerOpportunity: number;
  /** How far back failed attempts are counted */
  attemptMemoryMs: number;
  /** Consecutive failed results that pause the scheduler */
  maxConsecutiveFailures: number;
}

export const DEFAULT_SCHEDULER_OPTIONS: SchedulerOptions = {
  idleThresholdMs: DEFAULT_IDLE_THRESHOLD_MS,
  tickIntervalMs: DEFAULT_TICK_INTERVAL_MS,
  maxOpportunitiesPerCycle: DEFAULT_MAX_OPPORTUNITIES_PER_CYCLE,
  cooldownMs: DEFAULT_COOLDOWN_MS,
  maxAttemptsPerOpportunity: 2,
  attemptMemoryMs: 24 * 60 * 60 * 1000,
  maxConsecutiveFailures: 3,
};

export type CycleTrigger = 'scheduled' | 'manual';

export type TriggerOutcome =
  | { accepted: true; results: ImprovementResult[] }
  | { accepted: false; reason: 'cooldown'; retryAfterMs: number; message: string }
  | { accepted: false; reason: 'busy' | 'paused' | 'disabled'; message: string };

export interface SchedulerStatus {
  running: boolean;
  busy: boolean;
  paused: boolean;
  idle: boolean;
  lastActivityAt: string;
  lastAttemptAt: string | null;
  cooldownRemainingMs: number;
  consecutiveFailures: number;
}

export interface OpportunitySource {
  analyze(now?: number): Promise<ImprovementOpportunity[]>;
}

export interface OpportunityProcessor {
  process(opportunity: ImprovementOpportunity): Promise<ImprovementResult>;
}

/**
 * Runs improvement cycles while the user is away. One cycle at a time;
 * scheduled and manual cycles share the same cooldown.
 */
export class ImprovementScheduler {
  private readonly options: SchedulerOptions;
  private timer: ReturnType<typeof setInterval> | null = null;
  private lastActivityAt = Date.now();
  private lastAttemptAt: number | null = null;
  private busy = false;
  private paused = false;
  private consecutiveFailures = 0;

  constructor(
    private readonly analyzer: OpportunitySource,
    private readonly pipeline: OpportunityProcessor,
    private readonly resultLog: IImprovementLog,
    private readonly eventBus: IEventBus,
    options: Partial<SchedulerOptions> = {},
  ) {
    this.options = { ...DEFAULT_SCHEDULER_OPTIONS, ...options };
  }

  /** The host reports a user interaction */
  recordActivity(): void {
    this.lastActivityAt = Date.now();
  }

  isIdle(now: number = Date.now()): boolean {
    return now - this.lastActivityAt >= this.options.idleThresholdMs;
  }

  cooldownRemaining(now: number = Date.now()): number {
    if (this.lastAttemptAt === null) return 0;
    return Math.max(0, this.lastAttemptAt + this.options.cooldownMs - now);
  }

  async start(): Promise<void> {
    if (this.timer) return;

    // Cooldown survives restarts: seed it from the newest persisted result
    try {
      const latest = await this.resultLog.latest();
      if (latest) {
        const at = Date.parse(latest.timestamp);
        this.lastAttemptAt = Math.max(this.lastAttemptAt ?? 0, at);
      }
    } catch (error) {
      log.warn(`Could not read last attempt time: ${errorMessage(error)}`);
    }

    this.timer = setInterval(() => {
      void this.tick();
    }, this.options.tickIntervalMs);
    log.info(`Started (tick ${this.options.tickIntervalMs}ms, idle after ${this.options.idleThresholdMs}ms)`);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      log.info('Stopped');
    }
  }

  /** One scheduler check. Exposed for hosts that drive their own clock. */
  async tick(): Promise<void> {
    if (this.busy || this.paused) return;
    if (!this.isIdle()) return;
    if (this.cooldownRemaining() > 0) return;

    try {
      await this.runCycle('scheduled');
    } catch (error) {
      log.error(`Scheduled cycle failed: ${errorMessage(error)}`);
    }
  }

  /**
   * Run a cycle now, regardless of idleness. Rejected (never queued) while a
   * cycle is running, while paused, or inside the cooldown.
   */
  async improveNow(focus?: string): Promise<TriggerOutcome> {
    if (this.busy) {
      return { accepted: false, reason: 'busy', message: 'An improvement cycle is already running' };
    }
    if (this.paused) {
      return {
        accepted: false,
        reason: 'paused',
        message: `Paused after ${this.consecutiveFailures} consecutive failures; resume() to continue`,
      };
    }
    const remaining = this.cooldownRemaining();
    if (remaining > 0) {
      return {
        accepted: false,
        reason: 'cooldown',
        retryAfterMs: remaining,
        message: `Cooldown active, retry in ${Math.ceil(remaining / 1000)}s`,
      };
    }

    const results = await this.runCycle('manual', focus);
    return { accepted: true, results };
  }

  resume(): void {
    if (!this.paused) return;
    this.paused = false;
    this.consecutiveFailures = 0;
    log.info('Resumed');
  }

  async history(limit?: number): Promise<ImprovementResult[]> {
    const results = await this.resultLog.list();
    return limit === undefined ? results : results.slice(0, limit);
  }

  lastResult(): Promise<ImprovementResult | null> {
    return this.resultLog.latest();
  }

  status(): SchedulerStatus {
    const now = Date.now();
    return {
      running: this.timer !== null,
      busy: this.busy,
      paused: this.paused,
      idle: this.isIdle(now),
      lastActivityAt: new Date(this.lastActivityAt).toISOString(),
      lastAttemptAt: this.lastAttemptAt === null ? null : new Date(this.lastAttemptAt).toISOString(),
      cooldownRemainingMs: this.cooldownRemaining(now),
      consecutiveFailures: this.consecutiveFailures,
    };
  }

  private async runCycle(trigger: CycleTrigger, focus?: string): Promise<ImprovementResult[]> {
    this.busy = true;
    const startedAt = Date.now();
    this.lastAttemptAt = startedAt;
    const results: ImprovementResult[] = [];
    let interrupted = false;

    try {
      const candidates = await this.selectOpportunities(startedAt, focus);
      log.info(`${trigger} cycle: ${candidates.length} opportunit${candidates.length === 1 ? 'y' : 'ies'}`);
      this.eventBus.emit(Events.CYCLE_STARTED, {
        trigger,
        opportunityCount: candidates.length,
      } satisfies CycleStartedEvent);

      for (const opportunity of candidates) {
        if (this.lastActivityAt > startedAt) {
          interrupted = true;
          log.info('User became active, stopping cycle early');
          break;
        }
        if (this.paused) break;

        const result = await this.processSafely(opportunity);
        results.push(result);
        await this.recordResult(result);
      }
    } finally {
      this.busy = false;
      this.eventBus.emit(Events.CYCLE_FINISHED, { trigger, results, interrupted } satisfies CycleFinishedEvent);
    }

    return results;
  }

  private async selectOpportunities(now: number, focus?: string): Promise<ImprovementOpportunity[]> {
    let opportunities: ImprovementOpportunity[];
    try {
      opportunities = await this.analyzer.analyze(now);
    } catch (error) {
      log.error(`Analysis failed: ${errorMessage(error)}`);
      return [];
    }

    if (focus) {
      const needle = focus.toLowerCase();
      opportunities = opportunities.filter(
        (o) => o.type.includes(needle) || o.description.toLowerCase().includes(needle),
      );
    }

    const since = new Date(now - this.options.attemptMemoryMs).toISOString();
    const failedAttempts = new Map<string, number>();
    try {
      for (const failure of await this.resultLog.list({ success: false, since })) {
        failedAttempts.set(failure.opportunityId, (failedAttempts.get(failure.opportunityId) ?? 0) + 1);
      }
    } catch (error) {
      log.warn(`Could not read past attempts: ${errorMessage(error)}`);
    }

    return opportunities
      .filter((o) => {
        const attempts = failedAttempts.get(o.id) ?? 0;
        if (attempts >= this.options.maxAttemptsPerOpportunity) {
          log.debug(`Skipping after ${attempts} failed attempt(s)`, undefined, o.id);
          return false;
        }
        return true;
      })
      .slice(0, this.options.maxOpportunitiesPerCycle);
  }

  private async processSafely(opportunity: ImprovementOpportunity): Promise<ImprovementResult> {
    try {
      return await this.pipeline.process(opportunity);
    } catch (error) {
      const message = errorMessage(error);
      log.error(`Pipeline threw: ${message}`, undefined, opportunity.id);
      return {
        opportunityId: opportunity.id,
        success: false,
        message,
        changesApplied: 0,
        timestamp: new Date().toISOString(),
        finalState: 'failed',
      };
    }
  }

  private async recordResult(result: ImprovementResult): Promise<void> {
    try {
      await this.resultLog.append(result);
    } catch (error) {
      log.error(`Failed to persist result: ${errorMessage(error)}`, undefined, result.opportunityId);
    }

    if (result.success) {
      this.consecutiveFailures = 0;
      this.eventBus.emit(Events.IMPROVEMENT_COMPLETED, { result } satisfies ImprovementCompletedEvent);
      return;
    }

    this.consecutiveFailures++;
    this.eventBus.emit(Events.IMPROVEMENT_FAILED, { result, error: result.message } satisfies ImprovementFailedEvent);
    if (this.consecutiveFailures >= this.options.maxConsecutiveFailures) {
      this.paused = true;
      log.error(`Paused after ${this.consecutiveFailures} consecutive failures; call resume() to continue`);
    }
  }
}
