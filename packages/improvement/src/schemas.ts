import { z } from 'zod';
import type { ImprovementResult, SnapshotIndexRecord, TaskRecord } from '@selfwright/core';

const isoTimestamp = z.string().refine((value) => !Number.isNaN(Date.parse(value)), {
  message: 'Expected an ISO timestamp',
});

export const TaskRecordSchema: z.ZodType<TaskRecord> = z.object({
  id: z.string().min(1),
  request: z.string(),
  toolsUsed: z.array(z.string()),
  success: z.boolean(),
  error: z.string().optional(),
  durationMs: z.number().nonnegative(),
  timestamp: isoTimestamp,
});

const pipelineStage = z.enum([
  'pending',
  'generating',
  'validating',
  'rejected',
  'snapshotting',
  'applying',
  'verifying',
  'committing',
  'publishing',
  'done',
  'rolled-back',
  'failed',
]);

const PublishOutcomeSchema = z.object({
  committed: z.boolean(),
  revision: z.string().optional(),
  pushed: z.boolean(),
  message: z.string(),
  error: z.string().optional(),
  pushFailure: z.enum(['rejected', 'unreachable', 'auth', 'no-remote', 'unknown']).optional(),
  changedPaths: z.array(z.string()),
});

export const ImprovementResultSchema: z.ZodType<ImprovementResult> = z.object({
  opportunityId: z.string(),
  improvementId: z.string().optional(),
  title: z.string().optional(),
  success: z.boolean(),
  message: z.string(),
  changesApplied: z.number().int().nonnegative(),
  timestamp: isoTimestamp,
  finalState: z.enum(['rejected', 'rolled-back', 'done', 'failed']),
  failedStage: pipelineStage.optional(),
  snapshotId: z.string().optional(),
  publish: PublishOutcomeSchema.optional(),
  requiresAttention: z.boolean().optional(),
});

const SnapshotEntrySchema = z.object({
  path: z.string(),
  existed: z.boolean(),
  blob: z.string().optional(),
  missingParents: z.array(z.string()).optional(),
});

export const SnapshotIndexRecordSchema: z.ZodType<SnapshotIndexRecord> = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('created'),
    id: z.string(),
    label: z.string(),
    createdAt: z.string(),
    entries: z.array(SnapshotEntrySchema),
  }),
  z.object({ type: z.literal('superseded'), id: z.string(), improvementId: z.string(), at: z.string() }),
  z.object({ type: z.literal('restored'), id: z.string(), at: z.string() }),
  z.object({ type: z.literal('pruned'), id: z.string(), at: z.string() }),
]);

/** Parse each item with `schema`, dropping (and counting) the ones that do not fit */
export function parseEach<T>(items: unknown[], schema: z.ZodType<T>): { valid: T[]; invalid: number } {
  const valid: T[] = [];
  let invalid = 0;
  for (const item of items) {
    const parsed = schema.safeParse(item);
    if (parsed.success) valid.push(parsed.data);
    else invalid++;
  }
  return { valid, invalid };
}
