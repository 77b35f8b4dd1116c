import type { Kysely, Selectable } from "kysely";
import { generateId } from "../id.js";
import type { DB, TaskTable } from "../db/kysely.js";
import type { Task, CreateTaskInput, UpdateTaskInput, TaskFilter } from "./types.js";
import { isStatus } from "./types.js";

function rowToTask(row: Selectable<TaskTable>): Task {
  if (!isStatus(row.status)) {
    throw new Error(`Task ${row.id} has unknown status '${row.status}'`);
  }
  return {
    id: row.id,
    title: row.title,
    description: row.description,
    assignee: row.assignee,
    status: row.status,
    deadline: row.deadline,
    created_by: row.created_by,
    created_at: row.created_at,
    updated_at: row.updated_at,
    deadline_alerted_at: row.deadline_alerted_at,
  };
}

export async function createTask(
  db: Kysely<DB>,
  input: CreateTaskInput,
  createdBy: string,
  now?: string,
): Promise<Task> {
  const timestamp = now ?? new Date().toISOString();
  const task: Task = {
    id: generateId(),
    title: input.title,
    description: input.description ?? "",
    assignee: input.assignee,
    status: "New",
    deadline: input.deadline,
    created_by: createdBy,
    created_at: timestamp,
    updated_at: timestamp,
    deadline_alerted_at: null,
  };

  await db.insertInto("tasks").values(task).execute();

  return task;
}

export async function listTasks(db: Kysely<DB>, filter?: TaskFilter): Promise<Task[]> {
  let query = db.selectFrom("tasks").selectAll();

  if (filter?.status) {
    query = query.where("status", "=", filter.status);
  }
  if (filter?.assignee) {
    query = query.where("assignee", "=", filter.assignee);
  }

  const rows = await query.orderBy("created_at", "asc").orderBy("id", "asc").execute();
  return rows.map(rowToTask);
}

export async function getTask(db: Kysely<DB>, id: string): Promise<Task | null> {
  const row = await db.selectFrom("tasks").selectAll().where("id", "=", id).executeTakeFirst();
  return row ? rowToTask(row) : null;
}

/**
 * Apply the given fields in a single UPDATE. Moving the deadline re-arms the
 * deadline alert for the task.
 */
export async function updateTask(
  db: Kysely<DB>,
  id: string,
  input: UpdateTaskInput,
  now?: string,
): Promise<Task | null> {
  const existing = await getTask(db, id);
  if (!existing) {
    return null;
  }

  const updates: Partial<Omit<TaskTable, "id">> = {
    updated_at: now ?? new Date().toISOString(),
  };

  if (input.title !== undefined) {
    updates.title = input.title;
  }
  if (input.description !== undefined) {
    updates.description = input.description;
  }
  if (input.assignee !== undefined) {
    updates.assignee = input.assignee;
  }
  if (input.status !== undefined) {
    updates.status = input.status;
  }
  if (input.deadline !== undefined) {
    updates.deadline = input.deadline;
    if (input.deadline !== existing.deadline) {
      updates.deadline_alerted_at = null;
    }
  }

  const result = await db.updateTable("tasks").set(updates).where("id", "=", id).executeTakeFirst();
  if (BigInt(result.numUpdatedRows) === 0n) {
    return null;
  }

  return getTask(db, id);
}

export async function deleteTask(db: Kysely<DB>, id: string): Promise<boolean> {
  const result = await db.deleteFrom("tasks").where("id", "=", id).executeTakeFirst();
  return BigInt(result.numDeletedRows) > 0n;
}

/** Unfinished, not yet alerted tasks whose deadline is at or before `cutoff`. */
export async function listDeadlineCandidates(db: Kysely<DB>, cutoff: string): Promise<Task[]> {
  const rows = await db
    .selectFrom("tasks")
    .selectAll()
    .where("status", "!=", "Completed")
    .where("deadline", "<=", cutoff)
    .where("deadline_alerted_at", "is", null)
    .orderBy("deadline", "asc")
    .orderBy("id", "asc")
    .execute();
  return rows.map(rowToTask);
}

/**
 * Set the alert marker if nobody has set it yet and the task is still
 * unfinished with the deadline the caller read. Only one of several
 * concurrent or retried scans gets `true` for a given task.
 */
export async function claimDeadlineAlert(
  db: Kysely<DB>,
  id: string,
  deadline: string,
  now: string,
): Promise<boolean> {
  const result = await db
    .updateTable("tasks")
    .set({ deadline_alerted_at: now })
    .where("id", "=", id)
    .where("deadline", "=", deadline)
    .where("status", "!=", "Completed")
    .where("deadline_alerted_at", "is", null)
    .executeTakeFirst();
  return BigInt(result.numUpdatedRows) > 0n;
}

/** Undo a claim so the next scan retries; no-op if the marker moved on. */
export async function releaseDeadlineAlert(
  db: Kysely<DB>,
  id: string,
  claimedAt: string,
): Promise<void> {
  await db
    .updateTable("tasks")
    .set({ deadline_alerted_at: null })
    .where("id", "=", id)
    .where("deadline_alerted_at", "=", claimedAt)
    .execute();
}
