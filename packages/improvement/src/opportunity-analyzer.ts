import { createHash } from 'node:crypto';
import { createLogger, DEFAULT_ANALYSIS_WINDOW_MS } from '@selfwright/core';
import type {
  AutomatePatternOpportunity,
  FixFailureOpportunity,
  ImprovementOpportunity,
  NewCapabilityOpportunity,
  OptimizeSpeedOpportunity,
  TaskRecord,
} from '@selfwright/core';

const log = createLogger('OpportunityAnalyzer');

export interface AnalyzerOptions {
  /** Trailing window of history considered, ms */
  windowMs: number;
  /** A successful task slower than `slowFactor` × mean is an outlier */
  slowFactor: number;
  /** Successful records needed before latency outliers are reported */
  minLatencySamples: number;
}

export const DEFAULT_ANALYZER_OPTIONS: AnalyzerOptions = {
  windowMs: DEFAULT_ANALYSIS_WINDOW_MS,
  slowFactor: 3,
  minLatencySamples: 10,
};

export interface TaskHistorySource {
  list(): Promise<readonly TaskRecord[]>;
}

const MIN_FAILURE_CLUSTER = 2;
const MIN_SLOW_OCCURRENCES = 2;
const MIN_PATTERN_REPEATS = 3;
const MIN_CAPABILITY_REQUESTS = 2;
const CAPABILITY_KEY_LENGTH = 50;
const SAMPLE_LIMIT = 3;

const PRIORITY_SLOW_TOOL = 6;
const PRIORITY_PATTERN = 5;
const PRIORITY_CAPABILITY = 7;

/** Canonical form used to cluster error messages that differ only in numbers or spacing */
export function normalizeError(error: string | undefined): string {
  const trimmed = error?.trim();
  if (!trimmed) return 'unknown';
  return trimmed.toLowerCase().replace(/\s+/g, ' ').replace(/\d+/g, '#');
}

function stableId(prefix: string, key: string): string {
  return `${prefix}-${createHash('sha1').update(key).digest('hex').slice(0, 12)}`;
}

function groupBy<T>(items: readonly T[], keyOf: (item: T) => string | null): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const item of items) {
    const key = keyOf(item);
    if (key === null) continue;
    const group = groups.get(key);
    if (group) group.push(item);
    else groups.set(key, [item]);
  }
  return groups;
}

/**
 * Mines the task history for ranked improvement opportunities.
 * Pure read: never mutates the history it is given.
 */
export class OpportunityAnalyzer {
  private readonly options: AnalyzerOptions;

  constructor(
    private readonly source: TaskHistorySource,
    options: Partial<AnalyzerOptions> = {},
  ) {
    this.options = { ...DEFAULT_ANALYZER_OPTIONS, ...options };
  }

  async analyze(now: number = Date.now()): Promise<ImprovementOpportunity[]> {
    const history = await this.source.list();
    const cutoff = now - this.options.windowMs;
    const recent = history.filter((t) => Date.parse(t.timestamp) > cutoff);
    const detectedAt = new Date(now).toISOString();

    const found: ImprovementOpportunity[] = [
      ...this.detectFailureClusters(recent, detectedAt),
      ...this.detectSlowTools(recent, detectedAt),
      ...this.detectRepeatedPatterns(recent, detectedAt),
      ...this.detectMissingCapabilities(recent, detectedAt),
    ];

    // Array.prototype.sort is stable: equal priorities keep detection order
    found.sort((a, b) => b.priority - a.priority);
    log.debug(`Found ${found.length} opportunities in ${recent.length} recent task(s)`);
    return found;
  }

  async top(n: number, now?: number): Promise<ImprovementOpportunity[]> {
    return (await this.analyze(now)).slice(0, n);
  }

  private detectFailureClusters(tasks: readonly TaskRecord[], detectedAt: string): FixFailureOpportunity[] {
    const clusters = groupBy(tasks.filter((t) => !t.success), (t) => normalizeError(t.error));
    const found: FixFailureOpportunity[] = [];

    for (const [key, cluster] of clusters) {
      if (cluster.length < MIN_FAILURE_CLUSTER) continue;
      const errorMessage = cluster[0].error?.trim() || 'unknown';
      found.push({
        id: stableId('fix', key),
        type: 'fix-failure',
        description: `Fix recurring failure: ${errorMessage.slice(0, 100)}`,
        priority: Math.min(10, 5 + cluster.length),
        detectedAt,
        context: {
          errorMessage,
          occurrenceCount: cluster.length,
          sampleRequests: cluster.slice(0, SAMPLE_LIMIT).map((t) => t.request),
          toolsInvolved: [...new Set(cluster.flatMap((t) => t.toolsUsed))],
        },
      });
    }
    return found;
  }

  private detectSlowTools(tasks: readonly TaskRecord[], detectedAt: string): OptimizeSpeedOpportunity[] {
    const successful = tasks.filter((t) => t.success);
    if (successful.length < this.options.minLatencySamples) return [];

    const mean = successful.reduce((sum, t) => sum + t.durationMs, 0) / successful.length;
    const threshold = mean * this.options.slowFactor;
    const slow = successful.filter((t) => t.durationMs > threshold);

    const byTool = new Map<string, number[]>();
    for (const task of slow) {
      for (const tool of new Set(task.toolsUsed)) {
        const durations = byTool.get(tool) ?? [];
        durations.push(task.durationMs);
        byTool.set(tool, durations);
      }
    }

    const found: OptimizeSpeedOpportunity[] = [];
    for (const [toolName, durations] of byTool) {
      if (durations.length < MIN_SLOW_OCCURRENCES) continue;
      const avgDurationMs = Math.round(durations.reduce((a, b) => a + b, 0) / durations.length);
      found.push({
        id: stableId('optimize', toolName),
        type: 'optimize-speed',
        description: `Optimize slow tool: ${toolName} (avg ${avgDurationMs}ms)`,
        priority: PRIORITY_SLOW_TOOL,
        detectedAt,
        context: { toolName, avgDurationMs, occurrenceCount: durations.length },
      });
    }
    return found;
  }

  private detectRepeatedPatterns(tasks: readonly TaskRecord[], detectedAt: string): AutomatePatternOpportunity[] {
    const sequences = groupBy(tasks, (t) => (t.toolsUsed.length >= 2 ? JSON.stringify(t.toolsUsed) : null));
    const found: AutomatePatternOpportunity[] = [];

    for (const [key, group] of sequences) {
      if (group.length < MIN_PATTERN_REPEATS) continue;
      const toolSequence = [...group[0].toolsUsed];
      found.push({
        id: stableId('automate', key),
        type: 'automate-pattern',
        description: `Automate repeated tool sequence: ${toolSequence.join(' -> ')}`,
        priority: PRIORITY_PATTERN,
        detectedAt,
        context: { toolSequence, occurrenceCount: group.length },
      });
    }
    return found;
  }

  private detectMissingCapabilities(tasks: readonly TaskRecord[], detectedAt: string): NewCapabilityOpportunity[] {
    const unsupported = tasks.filter((t) => {
      if (t.success || !t.error) return false;
      const error = t.error.toLowerCase();
      return error.includes('not found') || error.includes('not supported');
    });
    const groups = groupBy(unsupported, (t) => t.request.toLowerCase().slice(0, CAPABILITY_KEY_LENGTH));
    const found: NewCapabilityOpportunity[] = [];

    for (const [key, group] of groups) {
      if (group.length < MIN_CAPABILITY_REQUESTS) continue;
      found.push({
        id: stableId('capability', key),
        type: 'new-capability',
        description: `Add capability for: ${group[0].request.slice(0, CAPABILITY_KEY_LENGTH)}`,
        priority: PRIORITY_CAPABILITY,
        detectedAt,
        context: {
          sampleRequests: group.slice(0, SAMPLE_LIMIT).map((t) => t.request),
          requestCount: group.length,
        },
      });
    }
    return found;
  }
}
