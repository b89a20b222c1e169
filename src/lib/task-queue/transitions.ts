/**
 * Task state machine
 *
 *   queued -> in_progress -> completed | failed
 *   queued ----------------> completed | failed
 *
 * Terminal records never change again. Re-applying the state a record is
 * already in is a no-op, so redelivered messages leave it untouched.
 */

import type { StoredTask, TaskStatus, TaskTransition } from './types';
import { isTerminalStatus } from './types';

export type TransitionResult =
  | { kind: 'applied'; record: StoredTask }
  | { kind: 'unchanged' }
  | { kind: 'rejected'; reason: string };

const ORDER: Record<TaskStatus, number> = {
  queued: 0,
  in_progress: 1,
  completed: 2,
  failed: 2,
};

export function applyTransition(
  record: StoredTask,
  transition: TaskTransition,
  now: number = Date.now()
): TransitionResult {
  const from = record.status;
  const to = transition.status;

  if (from === to) {
    return { kind: 'unchanged' };
  }

  if (isTerminalStatus(from)) {
    return { kind: 'rejected', reason: `task is already ${from}` };
  }

  if (ORDER[to] <= ORDER[from]) {
    return { kind: 'rejected', reason: `cannot move from ${from} back to ${to}` };
  }

  switch (transition.status) {
    case 'in_progress':
      return { kind: 'applied', record: { ...record, status: 'in_progress', updated_at: now } };
    case 'completed':
      return {
        kind: 'applied',
        record: { ...record, status: 'completed', result: transition.result, error: null, updated_at: now },
      };
    case 'failed':
      return {
        kind: 'applied',
        record: { ...record, status: 'failed', result: null, error: transition.error, updated_at: now },
      };
    case 'queued':
      return { kind: 'rejected', reason: 'tasks cannot be re-queued' };
  }
}
