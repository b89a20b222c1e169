import type { StoredTask } from '~/lib/task-queue/types';

/**
 * Durable key-value record of task state, keyed by task id.
 *
 * Values are stored as JSON. `get` returns the parsed value without validating
 * it; schema checks belong to the task coordinator. Transport failures raise
 * StatusStoreError, an unreachable backend on connect raises ConnectionError.
 */
export interface StatusStore {
  readonly driver: 'sqlite' | 'redis';

  /** Open the connection (idempotent). */
  connect(): Promise<void>;

  /** Release the connection. */
  close(): Promise<void>;

  /** Round-trip check used by the health endpoint. */
  ping(): Promise<boolean>;

  set(taskId: string, record: StoredTask): Promise<void>;

  /** Parsed stored value, or null when the key is absent. */
  get(taskId: string): Promise<unknown | null>;

  /** True when a record was removed. */
  delete(taskId: string): Promise<boolean>;
}
