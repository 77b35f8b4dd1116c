import type { Logger } from "../log.js";
import type { DeadlineScanner } from "./scanner.js";

export interface DeadlineSchedule {
  stop(): void;
  /** Resolves once the scan in progress, if any, has settled. */
  idle(): Promise<void>;
}

/**
 * Run the scanner every `intervalMs`. A tick that fires while the previous
 * scan is still running is skipped. The timer does not keep the process alive.
 */
export function startDeadlineSchedule(
  scanner: DeadlineScanner,
  intervalMs: number,
  logger: Logger,
): DeadlineSchedule {
  let running: Promise<void> | null = null;

  const tick = () => {
    if (running) {
      logger.debug("previous deadline scan still running, skipping tick");
      return;
    }
    running = scanner
      .scan()
      .then(
        () => undefined,
        (err: unknown) => {
          logger.error("deadline scan failed", { error: err });
        },
      )
      .finally(() => {
        running = null;
      });
  };

  const timer = setInterval(tick, intervalMs);
  timer.unref();
  logger.info("deadline scanner scheduled", { every_minutes: intervalMs / 60000 });

  return {
    stop: () => clearInterval(timer),
    idle: () => running ?? Promise.resolve(),
  };
}
