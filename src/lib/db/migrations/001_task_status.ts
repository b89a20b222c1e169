// Key-value table holding one JSON task record per task id
import type BetterSqlite3 from 'better-sqlite3';

export default {
  version: 1,
  description: 'Create task_status key-value table',

  up(db: BetterSqlite3.Database) {
    db.exec(`
      CREATE TABLE IF NOT EXISTS task_status (
        task_id TEXT PRIMARY KEY,
        value TEXT NOT NULL,
        updated_at INTEGER NOT NULL
      );
    `);
  },

  down(db: BetterSqlite3.Database) {
    db.exec(`
      DROP TABLE IF EXISTS task_status;
    `);
  },
};
