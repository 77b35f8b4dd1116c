import type Database from "better-sqlite3";

export interface Migration {
  version: number;
  up: (db: Database.Database) => void;
}

export function getSchemaVersion(db: Database.Database): number {
  const row = db
    .prepare<[], { value: string }>("SELECT value FROM meta WHERE key = 'schema_version'")
    .get();
  return row ? parseInt(row.value, 10) : 0;
}

/**
 * Apply every migration newer than the stored schema version, in order, inside
 * one transaction. Returns how many were applied.
 */
export function runMigrations(
  db: Database.Database,
  migrations: Migration[],
  onMigrate: (from: number, to: number) => void = () => {},
): number {
  const currentVersion = getSchemaVersion(db);
  const pending = migrations
    .filter((m) => m.version > currentVersion)
    .sort((a, b) => a.version - b.version);

  if (pending.length === 0) {
    return 0;
  }

  onMigrate(currentVersion, pending[pending.length - 1].version);

  const run = db.transaction(() => {
    for (const migration of pending) {
      migration.up(db);
      db.prepare("UPDATE meta SET value = ? WHERE key = 'schema_version'").run(
        String(migration.version),
      );
    }
    return pending.length;
  });

  return run();
}
