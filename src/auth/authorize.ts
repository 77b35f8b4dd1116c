import { AuthorizationError } from "../errors.js";
import type { Task, TaskFilter } from "../tasks/types.js";
import type { Principal } from "../users/types.js";

export function isAdmin(principal: Principal): boolean {
  return principal.role === "admin";
}

export function requireAdmin(principal: Principal, action: string): void {
  if (!isAdmin(principal)) {
    throw new AuthorizationError(`Only admins can ${action}.`);
  }
}

export function canViewTask(principal: Principal, task: Task): boolean {
  return isAdmin(principal) || task.assignee === principal.id;
}

/**
 * Members may change only the status, and only on tasks assigned to them.
 * Runs on the raw request body, before it is validated.
 */
export function authorizeTaskUpdate(principal: Principal, task: Task, input: unknown): void {
  if (isAdmin(principal)) {
    return;
  }
  if (task.assignee !== principal.id) {
    throw new AuthorizationError("You can only update tasks assigned to you.");
  }
  if (typeof input !== "object" || input === null) {
    return;
  }
  const fields = Object.entries(input)
    .filter(([, value]) => value !== undefined)
    .map(([field]) => field);
  const forbidden = fields.filter((field) => field !== "status");
  if (forbidden.length > 0) {
    throw new AuthorizationError(`Members can only update status (attempted: ${forbidden.join(", ")}).`);
  }
}

/** Narrow a list filter to what the caller may see. */
export function scopeTaskFilter(principal: Principal, filter: TaskFilter): TaskFilter {
  if (isAdmin(principal)) {
    return filter;
  }
  if (filter.assignee !== undefined && filter.assignee !== principal.id) {
    throw new AuthorizationError("You can only list tasks assigned to you.");
  }
  return { ...filter, assignee: principal.id };
}
