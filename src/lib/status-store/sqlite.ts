/**
 * SQLite status store (better-sqlite3).
 *
 * One row per task in task_status(task_id, value). better-sqlite3 is synchronous,
 * the async surface matches the other backends.
 */

import type BetterSqlite3 from 'better-sqlite3';
import { openDatabase } from '~/lib/db/connection';
import { ConnectionError, StatusStoreError } from '~/lib/errors';
import { getLogger } from '~/lib/log/logger';
import type { StoredTask } from '~/lib/task-queue/types';
import type { StatusStore } from './types';

const log = getLogger({ module: 'SqliteStatusStore' });

export class SqliteStatusStore implements StatusStore {
  readonly driver = 'sqlite' as const;
  private db: BetterSqlite3.Database | null = null;

  constructor(private readonly dbPath: string) {}

  async connect(): Promise<void> {
    if (this.db) return;

    try {
      this.db = openDatabase(this.dbPath);
      log.info({ path: this.dbPath }, 'status store opened');
    } catch (error) {
      log.error({ err: error, path: this.dbPath }, 'failed to open status store');
      throw new ConnectionError(`Could not open SQLite status store at ${this.dbPath}.`, { cause: error });
    }
  }

  async close(): Promise<void> {
    if (!this.db) return;
    this.db.close();
    this.db = null;
    log.info({}, 'status store closed');
  }

  async ping(): Promise<boolean> {
    try {
      this.requireDb().prepare('SELECT 1').get();
      return true;
    } catch (error) {
      log.warn({ err: error }, 'status store ping failed');
      return false;
    }
  }

  async set(taskId: string, record: StoredTask): Promise<void> {
    const db = this.requireDb();
    try {
      db.prepare(`
        INSERT INTO task_status (task_id, value, updated_at) VALUES (?, ?, ?)
        ON CONFLICT(task_id) DO UPDATE SET value = excluded.value, updated_at = excluded.updated_at
      `).run(taskId, JSON.stringify(record), record.updated_at);
      log.debug({ taskId, status: record.status }, 'task saved');
    } catch (error) {
      log.error({ err: error, taskId }, 'failed to save task');
      throw new StatusStoreError(`Error saving task ${taskId}.`, { cause: error });
    }
  }

  async get(taskId: string): Promise<unknown | null> {
    const db = this.requireDb();
    let row: { value: string } | undefined;
    try {
      row = db.prepare('SELECT value FROM task_status WHERE task_id = ?').get(taskId) as { value: string } | undefined;
    } catch (error) {
      log.error({ err: error, taskId }, 'failed to read task');
      throw new StatusStoreError(`Error retrieving task ${taskId}.`, { cause: error });
    }

    if (!row) {
      log.debug({ taskId }, 'task not found');
      return null;
    }

    try {
      return JSON.parse(row.value);
    } catch (error) {
      throw new StatusStoreError(`Stored value for task ${taskId} is not valid JSON.`, { cause: error });
    }
  }

  async delete(taskId: string): Promise<boolean> {
    const db = this.requireDb();
    try {
      const result = db.prepare('DELETE FROM task_status WHERE task_id = ?').run(taskId);
      if (result.changes === 0) {
        log.warn({ taskId }, 'task not found during deletion');
      }
      return result.changes > 0;
    } catch (error) {
      log.error({ err: error, taskId }, 'failed to delete task');
      throw new StatusStoreError(`Error deleting task ${taskId}.`, { cause: error });
    }
  }

  /**
   * Raw connection access (tests seed malformed rows through it)
   */
  withDatabase<T>(fn: (db: BetterSqlite3.Database) => T): T {
    return fn(this.requireDb());
  }

  private requireDb(): BetterSqlite3.Database {
    if (!this.db) {
      throw new ConnectionError('SQLite status store is not connected.');
    }
    return this.db;
  }
}
