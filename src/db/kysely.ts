import { Kysely, SqliteDialect } from "kysely";
import type BetterSqlite3 from "better-sqlite3";

export interface TaskTable {
  id: string;
  title: string;
  description: string;
  assignee: string;
  status: string;
  deadline: string;
  created_by: string;
  created_at: string;
  updated_at: string;
  deadline_alerted_at: string | null;
}

export interface UserTable {
  id: string;
  username: string;
  email: string;
  role: string;
  enabled: number;
  created_at: string;
}

export interface MetaTable {
  key: string;
  value: string;
}

export interface DB {
  tasks: TaskTable;
  users: UserTable;
  meta: MetaTable;
}

export function createKysely(db: BetterSqlite3.Database): Kysely<DB> {
  return new Kysely<DB>({
    dialect: new SqliteDialect({ database: db }),
  });
}
