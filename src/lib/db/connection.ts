// Database connection and initialization
import Database from 'better-sqlite3';
import type BetterSqlite3 from 'better-sqlite3';
import { dirname } from 'path';
import { mkdirSync, existsSync } from 'fs';
import { errorMessage } from '~/lib/errors';
import { runMigrations } from './migrations';

export const IN_MEMORY = ':memory:';

/**
 * Ensure the directory holding the database file exists
 */
function ensureDatabaseDirectory(dbPath: string): void {
  const dir = dirname(dbPath);

  try {
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  } catch (error) {
    throw new Error(
      `Failed to create database directory at ${dir}: ${errorMessage(error)}. ` +
      `Ensure the parent directory exists and is writable.`,
      { cause: error }
    );
  }
}

/**
 * Open a database connection and bring the schema up to date.
 * Pass ':memory:' for a throwaway database.
 */
export function openDatabase(dbPath: string): BetterSqlite3.Database {
  if (dbPath !== IN_MEMORY) {
    ensureDatabaseDirectory(dbPath);
  }

  const db = new Database(dbPath);

  // Enable WAL mode for better concurrency (no-op for in-memory databases)
  db.pragma('journal_mode = WAL');

  // Wait on a locked database instead of failing immediately
  db.pragma('busy_timeout = 5000');

  runMigrations(db);
  return db;
}
