import type Database from "better-sqlite3";
import { runMigrations, type Migration } from "./migrations.js";

export function initSchema(
  db: Database.Database,
  onMigrate?: (from: number, to: number) => void,
): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS tasks (
      id TEXT PRIMARY KEY,
      title TEXT NOT NULL,
      description TEXT NOT NULL DEFAULT '',
      assignee TEXT NOT NULL,
      status TEXT NOT NULL DEFAULT 'New'
        CHECK (status IN ('New', 'InProgress', 'Completed')),
      deadline TEXT NOT NULL,
      created_by TEXT NOT NULL,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL,
      deadline_alerted_at TEXT
    );

    CREATE INDEX IF NOT EXISTS idx_tasks_assignee ON tasks(assignee);
    CREATE INDEX IF NOT EXISTS idx_tasks_deadline ON tasks(status, deadline);

    CREATE TABLE IF NOT EXISTS users (
      id TEXT PRIMARY KEY,
      username TEXT NOT NULL UNIQUE COLLATE NOCASE,
      email TEXT NOT NULL,
      role TEXT NOT NULL DEFAULT 'member' CHECK (role IN ('admin', 'member')),
      enabled INTEGER NOT NULL DEFAULT 1,
      created_at TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS meta (
      key TEXT PRIMARY KEY,
      value TEXT NOT NULL
    );

    INSERT OR IGNORE INTO meta (key, value) VALUES ('schema_version', '1');
  `);

  runMigrations(db, appMigrations, onMigrate);
}

/** Schema changes after version 1, applied in order by `runMigrations`. */
export const appMigrations: Migration[] = [];
