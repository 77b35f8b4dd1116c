import Database from "better-sqlite3";
import path from "path";
import fs from "fs";

export function openDb(dbPath: string): Database.Database {
  if (dbPath !== ":memory:") {
    const dir = path.dirname(dbPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true, mode: 0o700 });
    }
  }
  const db = new Database(dbPath);
  db.pragma("journal_mode = WAL");
  db.pragma("foreign_keys = ON");
  db.pragma("busy_timeout = 5000");

  if (dbPath !== ":memory:") {
    // Task descriptions and user emails live here; keep the file owner-only.
    try {
      fs.chmodSync(dbPath, 0o600);
    } catch (err) {
      process.stderr.write(
        `Warning: could not restrict permissions on ${dbPath}: ${err instanceof Error ? err.message : String(err)}\n`,
      );
    }
  }

  return db;
}
