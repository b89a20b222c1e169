/**
 * Task Manager - creates tasks and owns every status transition.
 *
 * The status store is the source of truth: a record is written before its
 * task message is published, so polling right after submission never sees
 * "not found" for a task that is in flight. If the publish then fails the
 * record stays `queued`; the error is raised to the caller and nothing is
 * retried or rolled back.
 *
 * updateStatus is a read-modify-write without a lock. Only the result
 * reconciler writes terminal states, so concurrent writers to one task are
 * not expected.
 */

import type { BrokerChannel } from '~/lib/broker/types';
import { InvalidTaskDataError, TaskNotFoundError } from '~/lib/errors';
import { getLogger } from '~/lib/log/logger';
import type { StatusStore } from '~/lib/status-store/types';
import { describeIssues, StoredTaskSchema, TaskPayloadSchema, TaskStatusSchema } from './schemas';
import { applyTransition } from './transitions';
import type { StoredTask, TaskMessage, TaskPayload, TaskRecord, TaskTransition } from './types';
import { generateTaskId } from './uuid';

const log = getLogger({ module: 'TaskManager' });

export interface TaskManagerOptions {
  store: StatusStore;
  broker: BrokerChannel;
  taskQueue: string;
  /** Region recorded when a submission names none. */
  defaultRegion: string;
}

export class TaskManager {
  private readonly store: StatusStore;
  private readonly broker: BrokerChannel;
  private readonly taskQueue: string;
  private readonly defaultRegion: string;

  constructor(options: TaskManagerOptions) {
    this.store = options.store;
    this.broker = options.broker;
    this.taskQueue = options.taskQueue;
    this.defaultRegion = options.defaultRegion;
  }

  /**
   * Create a task in `queued` state and publish it to the task queue
   * @returns the new task id
   */
  async create(keyword: string, region?: string | null): Promise<string> {
    const normalizedKeyword = typeof keyword === 'string' ? keyword.trim() : '';
    if (normalizedKeyword.length === 0) {
      throw new InvalidTaskDataError('keyword must be a non-empty string.');
    }

    const normalizedRegion = region?.trim() || this.defaultRegion;
    const taskId = generateTaskId();
    const now = Date.now();

    const record: StoredTask = {
      status: 'queued',
      keyword: normalizedKeyword,
      region: normalizedRegion,
      result: null,
      error: null,
      created_at: now,
      updated_at: now,
    };
    await this.store.set(taskId, record);

    const message: TaskMessage = { task_id: taskId, keyword: normalizedKeyword, region: normalizedRegion };
    try {
      await this.broker.publish(this.taskQueue, message);
    } catch (error) {
      log.error({ err: error, taskId }, 'task message not published, record left queued');
      throw error;
    }

    log.info({ taskId, keyword: normalizedKeyword, region: normalizedRegion }, 'task created');
    return taskId;
  }

  /**
   * Read a task record
   * @throws TaskNotFoundError when absent, InvalidTaskDataError when the stored value is malformed
   */
  async getStatus(taskId: string): Promise<TaskRecord> {
    const raw = await this.store.get(taskId);
    if (raw === null) {
      throw new TaskNotFoundError(taskId);
    }

    const parsed = StoredTaskSchema.safeParse(raw);
    if (!parsed.success) {
      log.error({ taskId, issues: describeIssues(parsed.error) }, 'stored task data is invalid');
      throw new InvalidTaskDataError(`Task ${taskId} contains invalid data: ${describeIssues(parsed.error)}`);
    }

    return { task_id: taskId, ...parsed.data };
  }

  /**
   * Move a task to a new status.
   * `result` must be null/undefined or a structured payload (object or array) and
   * is only accepted for `completed`; `error` is recorded for `failed`.
   * @returns true when the record changed, false when the write was a no-op or
   * was refused because the task is already terminal
   */
  async updateStatus(
    taskId: string,
    status: string,
    result: unknown = null,
    error?: string | null
  ): Promise<boolean> {
    const transition = this.toTransition(taskId, status, result, error);
    const current = await this.getStatus(taskId);
    const { task_id: _id, ...stored } = current;

    const outcome = applyTransition(stored, transition);
    switch (outcome.kind) {
      case 'applied':
        await this.store.set(taskId, outcome.record);
        log.info({ taskId, from: current.status, to: outcome.record.status }, 'task status updated');
        return true;
      case 'unchanged':
        log.debug({ taskId, status: current.status }, 'task already in requested status');
        return false;
      case 'rejected':
        log.warn({ taskId, from: current.status, to: transition.status, reason: outcome.reason }, 'status update ignored');
        return false;
    }
  }

  /**
   * Mark a queued task as picked up by a worker.
   * @returns false when the task is missing or already past `queued`
   */
  async claim(taskId: string): Promise<boolean> {
    const raw = await this.store.get(taskId);
    if (raw === null) {
      log.warn({ taskId }, 'cannot claim unknown task');
      return false;
    }

    const parsed = StoredTaskSchema.safeParse(raw);
    if (!parsed.success) {
      log.warn({ taskId, issues: describeIssues(parsed.error) }, 'cannot claim task with invalid data');
      return false;
    }

    const outcome = applyTransition(parsed.data, { status: 'in_progress' });
    if (outcome.kind !== 'applied') {
      log.debug({ taskId, status: parsed.data.status }, 'task not claimable');
      return false;
    }

    await this.store.set(taskId, outcome.record);
    log.info({ taskId }, 'task claimed');
    return true;
  }

  /**
   * Delete a task record (outside the normal lifecycle)
   */
  async delete(taskId: string): Promise<boolean> {
    const deleted = await this.store.delete(taskId);
    if (deleted) {
      log.info({ taskId }, 'task deleted');
    }
    return deleted;
  }

  private toTransition(
    taskId: string,
    status: string,
    result: unknown,
    error: string | null | undefined
  ): TaskTransition {
    const parsedStatus = TaskStatusSchema.safeParse(status);
    if (!parsedStatus.success) {
      throw new InvalidTaskDataError(`Unknown status '${status}' for task ${taskId}.`);
    }

    let payload: TaskPayload | null = null;
    if (result !== null && result !== undefined) {
      const parsedResult = TaskPayloadSchema.safeParse(result);
      if (!parsedResult.success) {
        log.error({ taskId, resultType: typeof result }, 'invalid result type');
        throw new InvalidTaskDataError(`Result for task ${taskId} must be an object, an array or null.`);
      }
      payload = parsedResult.data;
    }

    switch (parsedStatus.data) {
      case 'completed':
        return { status: 'completed', result: payload };
      case 'failed':
        if (payload !== null) {
          throw new InvalidTaskDataError(`Failed task ${taskId} cannot carry a result payload.`);
        }
        return { status: 'failed', error: error?.trim() || 'Task failed.' };
      case 'queued':
      case 'in_progress':
        if (payload !== null) {
          throw new InvalidTaskDataError(`Task ${taskId} can only carry a result once completed.`);
        }
        return parsedStatus.data === 'queued' ? { status: 'queued' } : { status: 'in_progress' };
    }
  }
}
