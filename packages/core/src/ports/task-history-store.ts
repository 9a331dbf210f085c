import type { TaskRecord } from '../models/task-record.js';

/** Capped, most-recent-first history of completed tasks */
export interface ITaskHistoryStore {
  append(record: TaskRecord): Promise<void>;
  list(): Promise<readonly TaskRecord[]>;
}
