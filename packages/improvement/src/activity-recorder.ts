import { createLogger, Events } from '@selfwright/core';
import type { IEventBus, ITaskHistoryStore, TaskRecord, TaskRecordedEvent } from '@selfwright/core';
import { TaskRecordSchema } from './schemas.js';

const log = createLogger('ActivityRecorder');

/** Entry point for the host's per-task reports */
export class ActivityRecorder {
  constructor(
    private readonly store: ITaskHistoryStore,
    private readonly eventBus?: IEventBus,
  ) {}

  async record(task: TaskRecord): Promise<void> {
    const parsed = TaskRecordSchema.safeParse(task);
    if (!parsed.success) {
      throw new Error(`Invalid task record: ${parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join(', ')}`);
    }

    const frozen: TaskRecord = Object.freeze({
      ...parsed.data,
      toolsUsed: Object.freeze([...parsed.data.toolsUsed]),
    });
    await this.store.append(frozen);
    log.debug(`Recorded task ${frozen.id} (${frozen.success ? 'ok' : 'failed'}, ${frozen.durationMs}ms)`);
    this.eventBus?.emit(Events.TASK_RECORDED, { task: frozen } satisfies TaskRecordedEvent);
  }

  history(): Promise<readonly TaskRecord[]> {
    return this.store.list();
  }

  /** Records completed strictly after `cutoff` (epoch ms) */
  async since(cutoff: number): Promise<TaskRecord[]> {
    const records = await this.store.list();
    return records.filter((r) => Date.parse(r.timestamp) > cutoff);
  }
}
