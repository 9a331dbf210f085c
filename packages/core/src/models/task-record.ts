/**
 * Outcome of one completed agent task, reported by the host after every task.
 * Records are never mutated once written to the history.
 */
export interface TaskRecord {
  readonly id: string;
  /** Original user request text */
  readonly request: string;
  /** Tool names in the order they were invoked */
  readonly toolsUsed: readonly string[];
  readonly success: boolean;
  readonly error?: string;
  readonly durationMs: number;
  /** ISO timestamp of task completion */
  readonly timestamp: string;
}
