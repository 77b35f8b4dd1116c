import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "fs";
import path from "path";
import os from "os";
import { openDb } from "../../src/db/connection.js";

describe("openDb", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "fieldtask-db-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("creates missing directories and the database file", () => {
    const dbPath = path.join(dir, "nested", "tasks.db");
    const db = openDb(dbPath);
    expect(fs.existsSync(dbPath)).toBe(true);
    db.close();
  });

  it("enables WAL and foreign keys", () => {
    const db = openDb(path.join(dir, "tasks.db"));
    expect(db.pragma("journal_mode", { simple: true })).toBe("wal");
    expect(db.pragma("foreign_keys", { simple: true })).toBe(1);
    db.close();
  });

  it.skipIf(process.platform === "win32")("restricts the file to its owner", () => {
    const dbPath = path.join(dir, "tasks.db");
    const db = openDb(dbPath);
    expect(fs.statSync(dbPath).mode & 0o777).toBe(0o600);
    db.close();
  });

  it("keeps data across reopen", () => {
    const dbPath = path.join(dir, "tasks.db");
    const first = openDb(dbPath);
    first.exec("CREATE TABLE sample (id TEXT)");
    first.close();

    const second = openDb(dbPath);
    const tables = second
      .prepare("SELECT name FROM sqlite_master WHERE type='table' AND name='sample'")
      .all();
    expect(tables).toHaveLength(1);
    second.close();
  });
});
