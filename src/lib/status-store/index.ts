import type { AppSettings } from '~/lib/config/settings';
import { RedisStatusStore } from './redis';
import { SqliteStatusStore } from './sqlite';
import type { StatusStore } from './types';

/**
 * Build the status store selected by settings (not yet connected)
 */
export function createStatusStore(settings: AppSettings['store']): StatusStore {
  switch (settings.driver) {
    case 'redis':
      return new RedisStatusStore({ url: settings.redisUrl, keyPrefix: settings.keyPrefix });
    case 'sqlite':
      return new SqliteStatusStore(settings.sqlitePath);
  }
}

export type { StatusStore } from './types';
export { SqliteStatusStore } from './sqlite';
export { RedisStatusStore } from './redis';
