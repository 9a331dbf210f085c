import { describe, it, expect, vi } from 'vitest';
import { Events } from '@selfwright/core';
import type { ITaskHistoryStore, TaskRecord } from '@selfwright/core';
import { EventBus } from '@selfwright/eventbus';
import { ActivityRecorder } from '../activity-recorder.js';

class MemoryHistoryStore implements ITaskHistoryStore {
  readonly records: TaskRecord[] = [];

  async append(record: TaskRecord): Promise<void> {
    this.records.unshift(record);
  }

  async list(): Promise<readonly TaskRecord[]> {
    return [...this.records];
  }
}

function makeTask(overrides: Partial<TaskRecord> = {}): TaskRecord {
  return {
    id: 'task-1',
    request: 'summarise my inbox',
    toolsUsed: ['mail'],
    success: true,
    durationMs: 250,
    timestamp: '2026-03-01T12:00:00.000Z',
    ...overrides,
  };
}

describe('ActivityRecorder', () => {
  it('stores a frozen copy and emits TASK_RECORDED', async () => {
    const store = new MemoryHistoryStore();
    const bus = new EventBus();
    const handler = vi.fn();
    bus.on(Events.TASK_RECORDED, handler);
    const recorder = new ActivityRecorder(store, bus);

    await recorder.record(makeTask());

    expect(store.records).toHaveLength(1);
    expect(Object.isFrozen(store.records[0])).toBe(true);
    expect(Object.isFrozen(store.records[0].toolsUsed)).toBe(true);
    expect(handler).toHaveBeenCalledWith({ task: makeTask() });
  });

  it('rejects malformed records without storing them', async () => {
    const store = new MemoryHistoryStore();
    const recorder = new ActivityRecorder(store);

    await expect(recorder.record(makeTask({ durationMs: -5 }))).rejects.toThrow('Invalid task record: durationMs');
    await expect(recorder.record(makeTask({ timestamp: 'yesterday' }))).rejects.toThrow('Invalid task record');
    expect(store.records).toHaveLength(0);
  });

  it('filters history by completion time', async () => {
    const store = new MemoryHistoryStore();
    const recorder = new ActivityRecorder(store);
    await recorder.record(makeTask({ id: 'old', timestamp: '2026-03-01T10:00:00.000Z' }));
    await recorder.record(makeTask({ id: 'new', timestamp: '2026-03-01T12:00:00.000Z' }));

    const recent = await recorder.since(Date.parse('2026-03-01T11:00:00.000Z'));
    expect(recent.map((t) => t.id)).toEqual(['new']);
    expect((await recorder.history()).map((t) => t.id)).toEqual(['new', 'old']);
  });
});
