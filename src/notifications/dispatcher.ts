import type { Logger } from "../log.js";
import type { Status, Task } from "../tasks/types.js";
import type { Principal, User } from "../users/types.js";
import type { EmailChannel, PushChannel, PushMessage } from "./types.js";

const SUBJECT_TITLE_LENGTH = 50;

export interface DispatcherOptions {
  email: EmailChannel | null;
  push: PushChannel | null;
  senderAddress: string | null;
  logger: Logger;
}

function subjectTitle(task: Task): string {
  return task.title.slice(0, SUBJECT_TITLE_LENGTH);
}

export function assignmentEmailText(task: Task, assignee: User): string {
  const lines = [`Hello ${assignee.username},`, "", `A new task '${task.title}' has been assigned to you.`];
  if (task.description) {
    lines.push("", task.description);
  }
  lines.push("", `Deadline: ${task.deadline}`, "", "Thank you.");
  return lines.join("\n");
}

/**
 * Delivers task notifications. Every method resolves to whether the message
 * went out; delivery problems are logged and never thrown, so callers can
 * await it without risking the operation that triggered it.
 */
export class NotificationDispatcher {
  constructor(private options: DispatcherOptions) {}

  async notifyAssignment(task: Task, assignee: User): Promise<boolean> {
    const { email, senderAddress, logger } = this.options;
    if (!email || !senderAddress) {
      logger.info("email channel not configured, skipping assignment email", { task: task.id });
      return false;
    }

    try {
      await email.send({
        from: senderAddress,
        to: assignee.email,
        subject: "New Task Assigned to You",
        text: assignmentEmailText(task, assignee),
      });
      logger.info("sent assignment email", { task: task.id, to: assignee.email });
      return true;
    } catch (err) {
      logger.warn("assignment email failed", { task: task.id, to: assignee.email, error: err });
      return false;
    }
  }

  notifyStatusChange(
    task: Task,
    oldStatus: Status,
    actor: Principal,
    assignee: User | null,
    recipients: string[],
  ): Promise<boolean> {
    const assignedTo = assignee ? assignee.username : task.assignee;
    return this.publish({
      event: "status_changed",
      task_id: task.id,
      subject: `Task Status Updated: ${subjectTitle(task)}`,
      message: `Task '${task.title}' (ID: ${task.id}) status changed from '${oldStatus}' to '${task.status}' by ${actor.username}. Task is assigned to ${assignedTo}.`,
      recipients,
    });
  }

  notifyDeadline(task: Task, assignee: User | null, recipients: string[]): Promise<boolean> {
    const assignedTo = assignee ? assignee.username : task.assignee;
    return this.publish({
      event: "deadline_approaching",
      task_id: task.id,
      subject: `Task Deadline Approaching: ${subjectTitle(task)}`,
      message: `Task '${task.title}' assigned to ${assignedTo} is nearing its deadline (${task.deadline}).`,
      recipients,
    });
  }

  private async publish(message: PushMessage): Promise<boolean> {
    const { push, logger } = this.options;
    if (!push) {
      logger.info("push channel not configured, skipping notification", {
        event: message.event,
        task: message.task_id,
      });
      return false;
    }

    try {
      await push.publish(message);
      logger.info("published push notification", {
        event: message.event,
        task: message.task_id,
        recipients: message.recipients.length,
      });
      return true;
    } catch (err) {
      logger.warn("push notification failed", {
        event: message.event,
        task: message.task_id,
        error: err,
      });
      return false;
    }
  }
}
