/**
 * Worker - consumes the task queue, runs the extraction engine, publishes results
 */

import { z } from 'zod';
import type { EngineSearchOptions, ExtractionEngine } from '~/lib/crawl/engine';
import { errorMessage } from '~/lib/errors';
import { QueueConsumer, type QueueConsumerOptions } from './queue-consumer';
import { describeIssues, TaskMessageSchema } from './schemas';
import type { TaskManager } from './task-manager';
import type { ProcessingOutcome, ResultMessage, TaskMessage } from './types';

export interface WorkerConfig extends QueueConsumerOptions {
  taskManager: TaskManager;
  engine: ExtractionEngine;
  resultQueue: string;
  /** Region searched when a task message carries none */
  defaultRegion: string;
  engineOptions?: EngineSearchOptions;
}

const UNKNOWN_TASK_ID = 'unknown';

// Enough to route a failure for a message that is otherwise malformed
const TaskIdSchema = z.object({ task_id: z.string().min(1) });

export class TaskWorker extends QueueConsumer {
  private readonly taskManager: TaskManager;
  private readonly engine: ExtractionEngine;
  private readonly resultQueue: string;
  private readonly defaultRegion: string;
  private readonly engineOptions: EngineSearchOptions;

  constructor(config: WorkerConfig) {
    super(config, 'TaskWorker');
    this.taskManager = config.taskManager;
    this.engine = config.engine;
    this.resultQueue = config.resultQueue;
    this.defaultRegion = config.defaultRegion;
    this.engineOptions = config.engineOptions ?? {};
  }

  protected async handle(content: string, redelivered: boolean): Promise<ProcessingOutcome> {
    const parsed = this.parseTaskMessage(content);
    if (!parsed.success) {
      const taskId = parsed.taskId ?? UNKNOWN_TASK_ID;
      const reason = `Invalid message format: ${parsed.reason}`;
      await this.publishResult({ task_id: taskId, status: 'failed', error: reason });
      return { kind: 'rejected', taskId: parsed.taskId, reason };
    }

    const task = parsed.message;
    const region = task.region ?? this.defaultRegion;
    this.logger.info({ taskId: task.task_id, keyword: task.keyword, region, redelivered }, 'processing task');

    await this.claim(task.task_id);

    let result: ResultMessage;
    try {
      const items = await this.engine.search(task.keyword, region, this.engineOptions);
      result = { task_id: task.task_id, status: 'completed', result: { items, total: items.length } };
    } catch (error) {
      this.logger.error({ err: error, taskId: task.task_id }, 'extraction failed');
      result = { task_id: task.task_id, status: 'failed', error: errorMessage(error) };
    }

    const published = await this.publishResult(result);
    if (!published) {
      return { kind: 'rejected', taskId: task.task_id, reason: 'result could not be published' };
    }

    return result.status === 'completed'
      ? { kind: 'completed', taskId: task.task_id }
      : { kind: 'failed', taskId: task.task_id, error: result.error };
  }

  private parseTaskMessage(
    content: string
  ): { success: true; message: TaskMessage } | { success: false; taskId: string | null; reason: string } {
    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch (error) {
      return { success: false, taskId: null, reason: errorMessage(error) };
    }

    const parsed = TaskMessageSchema.safeParse(data);
    if (parsed.success) {
      return { success: true, message: parsed.data };
    }

    const withId = TaskIdSchema.safeParse(data);
    return {
      success: false,
      taskId: withId.success ? withId.data.task_id : null,
      reason: describeIssues(parsed.error),
    };
  }

  // The claim only records progress; a task that cannot be claimed is still processed
  private async claim(taskId: string): Promise<void> {
    try {
      const claimed = await this.taskManager.claim(taskId);
      if (!claimed) {
        this.logger.debug({ taskId }, 'task not claimed, processing anyway');
      }
    } catch (error) {
      this.logger.warn({ err: error, taskId }, 'failed to claim task');
    }
  }

  private async publishResult(message: ResultMessage): Promise<boolean> {
    try {
      await this.broker.publish(this.resultQueue, message);
      return true;
    } catch (error) {
      this.logger.error({ err: error, taskId: message.task_id }, 'failed to publish result');
      return false;
    }
  }
}
