import { describe, it, expect, beforeEach } from "vitest";
import { AuthorizationError, NotFoundError, ValidationError } from "../src/errors.js";
import type { Principal } from "../src/users/types.js";
import { asPrincipal, createTestContext, type TestContext } from "./helpers/fakes.js";

describe("TaskService", () => {
  let ctx: TestContext;
  let admin: Principal;
  let member1: Principal;
  let member2: Principal;

  beforeEach(async () => {
    ctx = await createTestContext();
    admin = asPrincipal(ctx.admin);
    member1 = asPrincipal(ctx.member1);
    member2 = asPrincipal(ctx.member2);
  });

  const newTask = () =>
    ctx.service.createTask(admin, {
      title: "Inspect site A",
      description: "Check the fence",
      assignee: ctx.member1.id,
      deadline: "2026-10-20",
    });

  describe("createTask", () => {
    it("creates a New task and emails the assignee", async () => {
      const task = await newTask();

      expect(task).toMatchObject({
        title: "Inspect site A",
        description: "Check the fence",
        assignee: ctx.member1.id,
        status: "New",
        deadline: "2026-10-20T00:00:00.000Z",
        created_by: ctx.admin.id,
        deadline_alerted_at: null,
      });
      expect(ctx.email.sent.map((m) => m.to)).toEqual(["member1@example.com"]);
      expect(ctx.logger.messages("info")).toContain("task created");
    });

    it("is admin only", async () => {
      await expect(
        ctx.service.createTask(member1, {
          title: "x",
          assignee: ctx.member1.id,
          deadline: "2026-10-20",
        }),
      ).rejects.toThrow("Only admins can create tasks.");
    });

    it("rejects unknown and disabled assignees", async () => {
      await expect(
        ctx.service.createTask(admin, { title: "x", assignee: "ghost", deadline: "2026-10-20" }),
      ).rejects.toThrow("Assignee 'ghost' is not an active user.");

      await ctx.identity.disableUser("member2");
      await expect(
        ctx.service.createTask(admin, { title: "x", assignee: ctx.member2.id, deadline: "2026-10-20" }),
      ).rejects.toThrow(ValidationError);
    });

    it("still creates the task when the email fails", async () => {
      ctx.email.failing = true;
      const task = await newTask();
      expect(await ctx.service.getTask(admin, task.id)).toEqual(task);
      expect(ctx.logger.messages("warn")).toEqual(["assignment email failed"]);
    });
  });

  describe("reads", () => {
    it("scopes member listings to their own tasks", async () => {
      const mine = await newTask();
      await ctx.service.createTask(admin, {
        title: "Other",
        assignee: ctx.member2.id,
        deadline: "2026-10-21",
      });

      expect((await ctx.service.listTasks(member1)).map((t) => t.id)).toEqual([mine.id]);
      expect(await ctx.service.listTasks(admin)).toHaveLength(2);
      await expect(
        ctx.service.listTasks(member1, { assignee: ctx.member2.id }),
      ).rejects.toThrow(AuthorizationError);
    });

    it("hides other members' tasks", async () => {
      const task = await newTask();
      await expect(ctx.service.getTask(member2, task.id)).rejects.toThrow(
        "You can only view tasks assigned to you.",
      );
      await expect(ctx.service.getTask(admin, "missing")).rejects.toThrow(
        new NotFoundError("Task", "missing"),
      );
    });
  });

  describe("updateTask", () => {
    it("lets the assignee change status and alerts the admins", async () => {
      const task = await newTask();
      const updated = await ctx.service.updateTask(member1, task.id, { status: "InProgress" });

      expect(updated.status).toBe("InProgress");
      expect(ctx.push.published).toEqual([
        {
          event: "status_changed",
          task_id: task.id,
          subject: "Task Status Updated: Inspect site A",
          message: `Task 'Inspect site A' (ID: ${task.id}) status changed from 'New' to 'InProgress' by member1. Task is assigned to member1.`,
          recipients: [ctx.admin.id],
        },
      ]);
    });

    it("does not notify when the status is unchanged", async () => {
      const task = await newTask();
      await ctx.service.updateTask(member1, task.id, { status: "New" });
      expect(ctx.push.published).toEqual([]);
    });

    it("allows any status to follow any other", async () => {
      const task = await newTask();
      await ctx.service.updateTask(member1, task.id, { status: "Completed" });
      const reopened = await ctx.service.updateTask(member1, task.id, { status: "New" });
      expect(reopened.status).toBe("New");
    });

    it("restricts members to the status of their own tasks", async () => {
      const task = await newTask();
      await expect(
        ctx.service.updateTask(member1, task.id, { title: "Renamed" }),
      ).rejects.toThrow("Members can only update status (attempted: title).");
      await expect(
        ctx.service.updateTask(member2, task.id, { status: "Completed" }),
      ).rejects.toThrow("You can only update tasks assigned to you.");
    });

    it("reassigns, emails the new assignee and tells them about the status", async () => {
      const task = await newTask();
      ctx.email.sent = [];

      const updated = await ctx.service.updateTask(admin, task.id, {
        assignee: ctx.member2.id,
        status: "InProgress",
      });

      expect(updated.assignee).toBe(ctx.member2.id);
      expect(ctx.email.sent.map((m) => m.to)).toEqual(["member2@example.com"]);
      expect(ctx.push.published[0]?.recipients).toEqual([ctx.member2.id]);
      expect(ctx.push.published[0]?.message).toContain("Task is assigned to member2.");
    });

    it("checks existence before permissions and input", async () => {
      await expect(ctx.service.updateTask(member1, "missing", {})).rejects.toThrow(NotFoundError);
    });

    it("rejects empty updates", async () => {
      const task = await newTask();
      await expect(ctx.service.updateTask(admin, task.id, {})).rejects.toThrow(
        "No fields to update.",
      );
    });

    it("keeps the update when status notification fails", async () => {
      const task = await newTask();
      ctx.push.failing = true;
      const updated = await ctx.service.updateTask(member1, task.id, { status: "Completed" });
      expect(updated.status).toBe("Completed");
      expect(ctx.logger.messages("warn")).toEqual(["push notification failed"]);
    });
  });

  describe("deleteTask", () => {
    it("removes the task for admins only", async () => {
      const task = await newTask();
      await expect(ctx.service.deleteTask(member1, task.id)).rejects.toThrow(
        "Only admins can delete tasks.",
      );

      await ctx.service.deleteTask(admin, task.id);
      await expect(ctx.service.getTask(admin, task.id)).rejects.toThrow(NotFoundError);
      await expect(ctx.service.deleteTask(admin, task.id)).rejects.toThrow(NotFoundError);
    });
  });

  describe("users", () => {
    it("lets admins list and create users", async () => {
      const user = await ctx.service.createUser(admin, {
        username: "member3",
        email: "member3@example.com",
      });
      expect(user.role).toBe("member");
      expect((await ctx.service.listUsers(admin)).map((u) => u.username)).toEqual([
        "admin",
        "member1",
        "member2",
        "member3",
      ]);
    });

    it("refuses members", async () => {
      await expect(ctx.service.listUsers(member1)).rejects.toThrow("Only admins can list users.");
      await expect(
        ctx.service.createUser(member1, { username: "x", email: "x@example.com" }),
      ).rejects.toThrow("Only admins can create users.");
    });
  });
});
