// Zod schemas for stored task records and queue messages
import { z } from 'zod';
import type { ResultMessage, StoredTask, TaskMessage, TaskPayload } from './types';

export const TaskStatusSchema = z.enum(['queued', 'in_progress', 'completed', 'failed']);

export const TaskPayloadSchema: z.ZodType<TaskPayload> = z.union([
  z.record(z.string(), z.unknown()),
  z.array(z.unknown()),
]);

// error/timestamps are optional so records written before they existed still load
export const StoredTaskSchema: z.ZodType<StoredTask, z.ZodTypeDef, unknown> = z.object({
  status: TaskStatusSchema,
  keyword: z.string(),
  region: z.string().nullable().default(null),
  result: TaskPayloadSchema.nullable().default(null),
  error: z.string().nullable().default(null),
  created_at: z.number().default(0),
  updated_at: z.number().default(0),
});

export const TaskMessageSchema: z.ZodType<TaskMessage, z.ZodTypeDef, unknown> = z.object({
  task_id: z.string().min(1, 'task_id is required'),
  keyword: z.string().trim().min(1, 'keyword is required'),
  region: z.string().nullable().default(null),
});

const CompletedResultSchema = z.object({
  task_id: z.string().min(1),
  status: z.literal('completed'),
  result: TaskPayloadSchema.nullable().default(null),
});

const FailedResultSchema = z.object({
  task_id: z.string().min(1),
  status: z.literal('failed'),
  error: z.string().default('unknown error'),
});

export const ResultMessageSchema: z.ZodType<ResultMessage, z.ZodTypeDef, unknown> =
  z.discriminatedUnion('status', [CompletedResultSchema, FailedResultSchema]);

/**
 * Flatten zod issues into a single readable line
 */
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
