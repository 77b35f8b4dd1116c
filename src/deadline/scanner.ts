import type { Kysely } from "kysely";
import type { DB } from "../db/kysely.js";
import type { IdentityProvider } from "../auth/identity.js";
import type { Logger } from "../log.js";
import type { NotificationDispatcher } from "../notifications/dispatcher.js";
import {
  claimDeadlineAlert,
  listDeadlineCandidates,
  releaseDeadlineAlert,
} from "../tasks/repository.js";
import type { Task } from "../tasks/types.js";

export interface DeadlineScannerOptions {
  db: Kysely<DB>;
  identity: IdentityProvider;
  notifier: NotificationDispatcher;
  logger: Logger;
  lookaheadHours: number;
  notifyAdmins?: boolean;
}

export interface ScanResult {
  /** Candidates found (unfinished, unflagged, due within the window). */
  scanned: number;
  /** Task ids alerted by this run. */
  alerted: string[];
  /** Task ids whose alert failed; their marker is cleared for the next run. */
  failed: string[];
}

/**
 * Alerts assignees about unfinished tasks due within the lookahead window,
 * including overdue ones that were never alerted. Each task is alerted once
 * per deadline: the marker is claimed before sending and only released again
 * when delivery fails.
 */
export class DeadlineScanner {
  constructor(private options: DeadlineScannerOptions) {}

  get lookaheadMs(): number {
    return this.options.lookaheadHours * 60 * 60 * 1000;
  }

  async scan(now: Date = new Date()): Promise<ScanResult> {
    const { db, logger } = this.options;
    const cutoff = new Date(now.getTime() + this.lookaheadMs).toISOString();
    const candidates = await listDeadlineCandidates(db, cutoff);
    const result: ScanResult = { scanned: candidates.length, alerted: [], failed: [] };

    let admins: string[] | null = null;
    for (const task of candidates) {
      const claimedAt = now.toISOString();
      if (!(await claimDeadlineAlert(db, task.id, task.deadline, claimedAt))) {
        logger.debug("deadline alert claimed elsewhere or task changed", { task: task.id });
        continue;
      }

      let delivered = false;
      try {
        if (this.options.notifyAdmins && admins === null) {
          admins = (await this.options.identity.listUsers("admin")).map((u) => u.id);
        }
        delivered = await this.alert(task, admins ?? []);
      } catch (err) {
        logger.warn("deadline alert failed", { task: task.id, error: err });
      }

      if (delivered) {
        result.alerted.push(task.id);
      } else {
        await releaseDeadlineAlert(db, task.id, claimedAt);
        result.failed.push(task.id);
      }
    }

    logger.info("deadline scan finished", {
      scanned: result.scanned,
      alerted: result.alerted.length,
      failed: result.failed.length,
    });
    return result;
  }

  private async alert(task: Task, admins: string[]): Promise<boolean> {
    const assignee = await this.options.identity.getUser(task.assignee);
    const recipients = [task.assignee, ...admins.filter((id) => id !== task.assignee)];
    return this.options.notifier.notifyDeadline(task, assignee, recipients);
  }
}
