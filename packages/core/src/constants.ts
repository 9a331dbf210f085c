/** Directory (under the project root) for history, snapshots and results */
export const DEFAULT_DATA_DIR_NAME = '.selfwright';

/** Subject prefix of every commit made by the publisher */
export const IMPROVEMENT_COMMIT_PREFIX = 'improve:';

export const DEFAULT_IDLE_THRESHOLD_MS = 300_000;
export const DEFAULT_TICK_INTERVAL_MS = 60_000;
export const DEFAULT_COOLDOWN_MS = 300_000;
export const DEFAULT_MAX_OPPORTUNITIES_PER_CYCLE = 3;
export const DEFAULT_HISTORY_LIMIT = 1000;
export const DEFAULT_ANALYSIS_WINDOW_MS = 7 * 24 * 60 * 60 * 1000;
