// Migration registry
import type BetterSqlite3 from 'better-sqlite3';
import migration001 from './001_task_status';
import { getLogger } from '~/lib/log/logger';

const log = getLogger({ module: 'DBMigrations' });

export interface Migration {
  version: number;
  description: string;
  up: (db: BetterSqlite3.Database) => void;
  down: (db: BetterSqlite3.Database) => void;
}

// Export all migrations in order
export const migrations: Migration[] = [
  migration001,
];

/**
 * Run pending migrations, each in its own transaction
 */
export function runMigrations(db: BetterSqlite3.Database): void {
  // Ensure schema_version table exists (bootstrap)
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_version (
      version INTEGER PRIMARY KEY,
      applied_at TEXT DEFAULT CURRENT_TIMESTAMP,
      description TEXT
    );
  `);

  const currentVersion = getCurrentSchemaVersion(db);
  const pendingMigrations = migrations.filter((m) => m.version > currentVersion);

  if (pendingMigrations.length === 0) {
    log.debug({ currentVersion }, 'migrations up to date');
    return;
  }

  log.info({ count: pendingMigrations.length, from: currentVersion }, 'running pending migrations');

  for (const migration of pendingMigrations) {
    const transaction = db.transaction(() => {
      migration.up(db);
      db.prepare(
        'INSERT INTO schema_version (version, description) VALUES (?, ?)'
      ).run(migration.version, migration.description);
    });

    transaction();
    log.info({ version: migration.version, description: migration.description }, 'migration applied');
  }
}

/**
 * Get current schema version
 */
export function getCurrentSchemaVersion(db: BetterSqlite3.Database): number {
  const row = db
    .prepare('SELECT MAX(version) as version FROM schema_version')
    .get() as { version: number | null } | undefined;
  return row?.version ?? 0;
}
