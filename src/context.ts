import type Database from "better-sqlite3";
import type { Kysely } from "kysely";
import { openDb } from "./db/connection.js";
import { createKysely, type DB } from "./db/kysely.js";
import { initSchema } from "./db/schema.js";
import { LocalIdentityProvider, type IdentityProvider } from "./auth/identity.js";
import type { Config } from "./config/config.js";
import { DeadlineScanner } from "./deadline/scanner.js";
import type { Logger } from "./log.js";
import { TaskService } from "./main.js";
import { NotificationDispatcher } from "./notifications/dispatcher.js";
import { HttpEmailRelay, HttpPushTopic } from "./notifications/http.js";

export interface AppContext {
  sqlite: Database.Database;
  db: Kysely<DB>;
  identity: IdentityProvider;
  notifier: NotificationDispatcher;
  service: TaskService;
  scanner: DeadlineScanner;
  close(): Promise<void>;
}

export function createNotifier(config: Config, logger: Logger): NotificationDispatcher {
  return new NotificationDispatcher({
    email: config.email_endpoint
      ? new HttpEmailRelay({ endpoint: config.email_endpoint, apiKey: config.email_api_key })
      : null,
    push: config.push_endpoint
      ? new HttpPushTopic({ endpoint: config.push_endpoint, apiKey: config.push_api_key })
      : null,
    senderAddress: config.sender_address,
    logger,
  });
}

/**
 * Open the store and wire every collaborator from config. `existing` lets
 * tests pass an in-memory database.
 */
export function createContext(
  config: Config,
  logger: Logger,
  existing?: Database.Database,
): AppContext {
  if (!config.token_secret) {
    throw new Error(
      "token_secret is not set. Add it to the config file or set FIELDTASK_TOKEN_SECRET.",
    );
  }

  const sqlite = existing ?? openDb(config.db_path);
  initSchema(sqlite, (from, to) => {
    logger.info("migrating database", { from, to });
  });
  const db = createKysely(sqlite);
  const identity = new LocalIdentityProvider(db, {
    secret: config.token_secret,
    tokenTtlHours: config.token_ttl_hours,
  });
  const notifier = createNotifier(config, logger);
  const service = new TaskService({ db, identity, notifier, logger });
  const scanner = new DeadlineScanner({
    db,
    identity,
    notifier,
    logger,
    lookaheadHours: config.deadline_lookahead_hours,
    notifyAdmins: config.deadline_notify_admins,
  });

  return {
    sqlite,
    db,
    identity,
    notifier,
    service,
    scanner,
    close: async () => {
      await db.destroy();
    },
  };
}
