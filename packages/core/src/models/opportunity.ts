/**
 * Ranked, ephemeral signals mined from the task history.
 * Recomputed on every analysis pass and never persisted.
 */

export type OpportunityType =
  | 'fix-failure'
  | 'optimize-speed'
  | 'new-capability'
  | 'automate-pattern';

interface OpportunityBase {
  /** Stable across passes for the same grouping key */
  id: string;
  description: string;
  /** 1-10, higher first */
  priority: number;
  detectedAt: string;
}

export interface FailureContext {
  errorMessage: string;
  occurrenceCount: number;
  sampleRequests: string[];
  toolsInvolved: string[];
}

export interface LatencyContext {
  toolName: string;
  avgDurationMs: number;
  occurrenceCount: number;
}

export interface PatternContext {
  toolSequence: string[];
  occurrenceCount: number;
}

export interface CapabilityContext {
  sampleRequests: string[];
  requestCount: number;
}

export type FixFailureOpportunity = OpportunityBase & { type: 'fix-failure'; context: FailureContext };
export type OptimizeSpeedOpportunity = OpportunityBase & { type: 'optimize-speed'; context: LatencyContext };
export type AutomatePatternOpportunity = OpportunityBase & { type: 'automate-pattern'; context: PatternContext };
export type NewCapabilityOpportunity = OpportunityBase & { type: 'new-capability'; context: CapabilityContext };

export type ImprovementOpportunity =
  | FixFailureOpportunity
  | OptimizeSpeedOpportunity
  | AutomatePatternOpportunity
  | NewCapabilityOpportunity;

/** Tool names an opportunity points at, used to pick source context */
export function affectedTools(opportunity: ImprovementOpportunity): string[] {
  switch (opportunity.type) {
    case 'fix-failure':
      return opportunity.context.toolsInvolved;
    case 'optimize-speed':
      return [opportunity.context.toolName];
    case 'automate-pattern':
      return [...new Set(opportunity.context.toolSequence)];
    case 'new-capability':
      return [];
  }
}
