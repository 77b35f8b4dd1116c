import { serve } from "@hono/node-server";
import type { Config } from "../config/config.js";
import { createContext } from "../context.js";
import { startDeadlineSchedule } from "../deadline/schedule.js";
import { bold } from "../format/colors.js";
import type { Logger } from "../log.js";
import { createApp } from "./routes.js";

export interface RunningServer {
  port: number;
  close(): Promise<void>;
}

/** Serve the API and run the deadline scanner on its interval until closed. */
export function startServer(config: Config, logger: Logger): Promise<RunningServer> {
  const ctx = createContext(config, logger);
  const app = createApp({
    service: ctx.service,
    identity: ctx.identity,
    scanner: ctx.scanner,
    logger,
    corsOrigin: config.cors_origin,
  });
  const schedule = startDeadlineSchedule(
    ctx.scanner,
    config.deadline_scan_interval_minutes * 60 * 1000,
    logger,
  );

  return new Promise((resolve) => {
    const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
      logger.info(`${bold("fieldtask")} listening`, { url: `http://localhost:${info.port}` });
      resolve({
        port: info.port,
        close: () =>
          new Promise<void>((done, fail) => {
            schedule.stop();
            server.close((err) => {
              if (err) {
                fail(err);
                return;
              }
              schedule
                .idle()
                .then(() => ctx.close())
                .then(done, fail);
            });
          }),
      });
    });
  });
}
