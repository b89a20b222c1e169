/**
 * Result Processor - applies worker results to the status store and alerts on them
 */

import { errorMessage } from '~/lib/errors';
import type { Notifier } from '~/lib/notifications/notifier';
import { QueueConsumer, type QueueConsumerOptions } from './queue-consumer';
import { describeIssues, ResultMessageSchema } from './schemas';
import type { TaskManager } from './task-manager';
import type { ProcessingOutcome, ResultMessage } from './types';

export interface ResultProcessorConfig extends QueueConsumerOptions {
  taskManager: TaskManager;
  notifier: Notifier;
}

export function outcomeMessage(result: ResultMessage): string {
  return result.status === 'completed'
    ? `Task ${result.task_id} completed successfully.`
    : `Task ${result.task_id} failed: ${result.error}`;
}

export class ResultProcessor extends QueueConsumer {
  private readonly taskManager: TaskManager;
  private readonly notifier: Notifier;

  constructor(config: ResultProcessorConfig) {
    super(config, 'ResultProcessor');
    this.taskManager = config.taskManager;
    this.notifier = config.notifier;
  }

  protected async handle(content: string): Promise<ProcessingOutcome> {
    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch (error) {
      return { kind: 'rejected', taskId: null, reason: `Invalid JSON: ${errorMessage(error)}` };
    }

    const parsed = ResultMessageSchema.safeParse(data);
    if (!parsed.success) {
      return { kind: 'rejected', taskId: null, reason: `Invalid result message: ${describeIssues(parsed.error)}` };
    }

    const result = parsed.data;
    let applied: boolean;
    try {
      applied = result.status === 'completed'
        ? await this.taskManager.updateStatus(result.task_id, 'completed', result.result)
        : await this.taskManager.updateStatus(result.task_id, 'failed', null, result.error);
    } catch (error) {
      return { kind: 'rejected', taskId: result.task_id, reason: errorMessage(error) };
    }

    if (!applied) {
      return { kind: 'rejected', taskId: result.task_id, reason: 'status update not applied' };
    }

    const message = outcomeMessage(result);
    await this.notifier.notify('chat', message);
    await this.notifier.notify('log', message);

    return result.status === 'completed'
      ? { kind: 'completed', taskId: result.task_id }
      : { kind: 'failed', taskId: result.task_id, error: result.error };
  }
}
