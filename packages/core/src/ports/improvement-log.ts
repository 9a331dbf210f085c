import type { ImprovementResult } from '../models/improvement-result.js';

export interface ImprovementLogFilter {
  opportunityId?: string;
  success?: boolean;
  /** ISO timestamp; only results at or after it */
  since?: string;
}

/** Append-only audit log of improvement results */
export interface IImprovementLog {
  append(result: ImprovementResult): Promise<void>;
  /** Newest first */
  list(filter?: ImprovementLogFilter): Promise<ImprovementResult[]>;
  latest(): Promise<ImprovementResult | null>;
}
