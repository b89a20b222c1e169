/**
 * Task Queue Type Definitions
 */

/**
 * Task status values
 */
export type TaskStatus = 'queued' | 'in_progress' | 'completed' | 'failed';

export type TerminalStatus = Extract<TaskStatus, 'completed' | 'failed'>;

/**
 * Structured result payload (JSON object or array)
 */
export type TaskPayload = Record<string, unknown> | unknown[];

/**
 * Task record as persisted in the status store (keyed by task id)
 */
export interface StoredTask {
  status: TaskStatus;
  keyword: string;
  region: string | null;
  result: TaskPayload | null;
  error: string | null;
  created_at: number;
  updated_at: number;
}

/**
 * Task record returned to callers
 */
export interface TaskRecord extends StoredTask {
  task_id: string;
}

/**
 * Message carried on the task queue
 */
export interface TaskMessage {
  task_id: string;
  keyword: string;
  region: string | null;
}

/**
 * Message carried on the result queue
 */
export type ResultMessage =
  | { task_id: string; status: 'completed'; result: TaskPayload | null }
  | { task_id: string; status: 'failed'; error: string };

/**
 * Requested state change, validated by applyTransition
 */
export type TaskTransition =
  | { status: 'queued' }
  | { status: 'in_progress' }
  | { status: 'completed'; result: TaskPayload | null }
  | { status: 'failed'; error: string };

/**
 * Outcome of processing one queue delivery
 */
export type ProcessingOutcome =
  | { kind: 'completed'; taskId: string }
  | { kind: 'failed'; taskId: string; error: string }
  | { kind: 'rejected'; taskId: string | null; reason: string };

/**
 * Per-consumer processing counters
 */
export interface ProcessingStats {
  received: number;
  completed: number;
  failed: number;
  rejected: number;
}

export function emptyStats(): ProcessingStats {
  return { received: 0, completed: 0, failed: 0, rejected: 0 };
}

export function isTerminalStatus(status: TaskStatus): status is TerminalStatus {
  return status === 'completed' || status === 'failed';
}
