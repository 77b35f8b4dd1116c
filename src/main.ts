import type { Kysely } from "kysely";
import type { DB } from "./db/kysely.js";
import type { IdentityProvider } from "./auth/identity.js";
import {
  authorizeTaskUpdate,
  canViewTask,
  requireAdmin,
  scopeTaskFilter,
} from "./auth/authorize.js";
import { AuthorizationError, NotFoundError, ValidationError } from "./errors.js";
import type { Logger } from "./log.js";
import type { NotificationDispatcher } from "./notifications/dispatcher.js";
import {
  createTask,
  deleteTask,
  getTask,
  listTasks,
  updateTask,
} from "./tasks/repository.js";
import type { Task, TaskFilter } from "./tasks/types.js";
import type { Principal, User } from "./users/types.js";
import {
  createTaskSchema,
  createUserSchema,
  parseInput,
  taskFilterSchema,
  updateTaskSchema,
} from "./validation.js";

export interface TaskServiceDeps {
  db: Kysely<DB>;
  identity: IdentityProvider;
  notifier: NotificationDispatcher;
  logger: Logger;
  now?: () => Date;
}

/**
 * The task API. Every operation takes the authenticated caller first and
 * enforces the admin/member rules before touching the store.
 */
export class TaskService {
  private readonly db: Kysely<DB>;
  private readonly identity: IdentityProvider;
  private readonly notifier: NotificationDispatcher;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(deps: TaskServiceDeps) {
    this.db = deps.db;
    this.identity = deps.identity;
    this.notifier = deps.notifier;
    this.logger = deps.logger;
    this.now = deps.now ?? (() => new Date());
  }

  async createTask(principal: Principal, input: unknown): Promise<Task> {
    requireAdmin(principal, "create tasks");
    const fields = parseInput(createTaskSchema, input);
    const assignee = await this.requireAssignee(fields.assignee);

    const task = await createTask(this.db, fields, principal.id, this.now().toISOString());
    this.logger.info("task created", { task: task.id, by: principal.username });

    await this.notifier.notifyAssignment(task, assignee);
    return task;
  }

  async listTasks(principal: Principal, filter: TaskFilter = {}): Promise<Task[]> {
    const parsed = parseInput(taskFilterSchema, filter);
    return listTasks(this.db, scopeTaskFilter(principal, parsed));
  }

  async getTask(principal: Principal, id: string): Promise<Task> {
    const task = await getTask(this.db, id);
    if (!task) {
      throw new NotFoundError("Task", id);
    }
    if (!canViewTask(principal, task)) {
      throw new AuthorizationError("You can only view tasks assigned to you.");
    }
    return task;
  }

  /**
   * Checks existence, then permissions, then the fields, so `input` may be an
   * unvalidated request body. Any status may follow any other. A status
   * change alerts the admins, or the new assignee when the same update
   * reassigns the task; a reassignment also emails the new assignee.
   */
  async updateTask(principal: Principal, id: string, input: unknown): Promise<Task> {
    const existing = await getTask(this.db, id);
    if (!existing) {
      throw new NotFoundError("Task", id);
    }
    authorizeTaskUpdate(principal, existing, input);
    const fields = parseInput(updateTaskSchema, input);

    let newAssignee: User | null = null;
    if (fields.assignee !== undefined && fields.assignee !== existing.assignee) {
      newAssignee = await this.requireAssignee(fields.assignee);
    }

    const updated = await updateTask(this.db, existing.id, fields, this.now().toISOString());
    if (!updated) {
      throw new NotFoundError("Task", id);
    }
    this.logger.info("task updated", {
      task: updated.id,
      by: principal.username,
      fields: Object.keys(fields).join(","),
    });

    if (newAssignee) {
      await this.notifier.notifyAssignment(updated, newAssignee);
    }
    if (updated.status !== existing.status) {
      await this.notifyStatusChange(principal, existing, updated, newAssignee);
    }
    return updated;
  }

  async deleteTask(principal: Principal, id: string): Promise<void> {
    requireAdmin(principal, "delete tasks");
    const deleted = await deleteTask(this.db, id);
    if (!deleted) {
      throw new NotFoundError("Task", id);
    }
    this.logger.info("task deleted", { task: id, by: principal.username });
  }

  async listUsers(principal: Principal): Promise<User[]> {
    requireAdmin(principal, "list users");
    return this.identity.listUsers();
  }

  async createUser(principal: Principal, input: unknown): Promise<User> {
    requireAdmin(principal, "create users");
    const fields = parseInput(createUserSchema, input);
    const user = await this.identity.createUser(fields);
    this.logger.info("user created", { user: user.username, role: user.role, by: principal.username });
    return user;
  }

  private async requireAssignee(id: string): Promise<User> {
    const user = await this.identity.getUser(id);
    if (!user || !user.enabled) {
      throw new ValidationError(`Assignee '${id}' is not an active user.`);
    }
    return user;
  }

  private async notifyStatusChange(
    principal: Principal,
    before: Task,
    after: Task,
    newAssignee: User | null,
  ): Promise<void> {
    // The write already succeeded; a directory hiccup here must not turn it
    // into an error response.
    try {
      const recipients = newAssignee
        ? [newAssignee.id]
        : (await this.identity.listUsers("admin")).map((u) => u.id);
      const assignee = newAssignee ?? (await this.identity.getUser(after.assignee));
      await this.notifier.notifyStatusChange(after, before.status, principal, assignee, recipients);
    } catch (err) {
      this.logger.warn("could not resolve status change recipients", { task: after.id, error: err });
    }
  }
}
