import type { Kysely, Selectable } from "kysely";
import { generateId } from "../id.js";
import type { DB, UserTable } from "../db/kysely.js";
import { ROLES, type CreateUserInput, type Role, type User } from "./types.js";

function isRole(value: string): value is Role {
  return ROLES.some((role) => role === value);
}

function rowToUser(row: Selectable<UserTable>): User {
  if (!isRole(row.role)) {
    throw new Error(`User ${row.id} has unknown role '${row.role}'`);
  }
  return {
    id: row.id,
    username: row.username,
    email: row.email,
    role: row.role,
    enabled: row.enabled === 1,
    created_at: row.created_at,
  };
}

export class DuplicateUsernameError extends Error {
  readonly username: string;

  constructor(username: string) {
    super(`Username '${username}' is already taken`);
    this.name = "DuplicateUsernameError";
    this.username = username;
  }
}

export async function createUser(
  db: Kysely<DB>,
  input: CreateUserInput,
  now?: string,
): Promise<User> {
  const existing = await findUserByUsername(db, input.username);
  if (existing) {
    throw new DuplicateUsernameError(input.username);
  }

  const user: User = {
    id: generateId(),
    username: input.username,
    email: input.email,
    role: input.role ?? "member",
    enabled: true,
    created_at: now ?? new Date().toISOString(),
  };

  await db
    .insertInto("users")
    .values({ ...user, enabled: 1 })
    .execute();

  return user;
}

export async function getUser(db: Kysely<DB>, id: string): Promise<User | null> {
  const row = await db.selectFrom("users").selectAll().where("id", "=", id).executeTakeFirst();
  return row ? rowToUser(row) : null;
}

export async function findUserByUsername(db: Kysely<DB>, username: string): Promise<User | null> {
  // The column is COLLATE NOCASE, so this match ignores case.
  const row = await db
    .selectFrom("users")
    .selectAll()
    .where("username", "=", username)
    .executeTakeFirst();
  return row ? rowToUser(row) : null;
}

export async function listUsers(db: Kysely<DB>, role?: Role): Promise<User[]> {
  let query = db.selectFrom("users").selectAll();
  if (role) {
    query = query.where("role", "=", role);
  }
  const rows = await query.orderBy("username", "asc").execute();
  return rows.map(rowToUser);
}

export async function setUserEnabled(
  db: Kysely<DB>,
  id: string,
  enabled: boolean,
): Promise<User | null> {
  await db
    .updateTable("users")
    .set({ enabled: enabled ? 1 : 0 })
    .where("id", "=", id)
    .execute();
  return getUser(db, id);
}
