/**
 * Schedule Run Command - Run the configured jobs until interrupted
 */

import { schedulerFromConfig, type TickworkConfig } from "../../../config.js";
import { createLoggerWithCleanup, pinoCronLogger } from "../../../log.js";
import { commandJob } from "../../../runtime/command-job.js";
import { OutputFormatter } from "../../output-formatter.js";
import { ValidationError } from "../../error-handler.js";

export interface ScheduleRunOptions {
  quiet?: boolean;
}

/**
 * Resolves with the first of SIGINT or SIGTERM.
 */
export function waitForShutdownSignal(): Promise<NodeJS.Signals> {
  return new Promise((resolve) => {
    const onSignal = (signal: NodeJS.Signals) => {
      process.off("SIGINT", onSignal);
      process.off("SIGTERM", onSignal);
      resolve(signal);
    };
    process.on("SIGINT", onSignal);
    process.on("SIGTERM", onSignal);
  });
}

/**
 * Register every enabled job, run until a shutdown signal, then drain
 */
export async function scheduleRun(
  cfg: TickworkConfig,
  options: ScheduleRunOptions = {},
  shutdown: () => Promise<NodeJS.Signals> = waitForShutdownSignal,
): Promise<void> {
  const out = new OutputFormatter({ quiet: options.quiet });

  const jobs = cfg.jobs.filter((job) => job.enabled);
  if (jobs.length === 0) {
    throw new ValidationError("No enabled jobs in config", 'Add an entry under "jobs" with a name, schedule and command.');
  }

  const { logger, close } = createLoggerWithCleanup(cfg.logging.level, cfg.resolved.logFilePath);
  try {
    const scheduler = schedulerFromConfig(cfg, pinoCronLogger(logger.child({ component: "cron" })));

    for (const job of jobs) {
      const id = scheduler.addJob(job.schedule, commandJob(job, logger));
      logger.info({ entry: id, name: job.name, schedule: job.schedule }, "Job registered");
    }

    scheduler.start();
    out.success(`Scheduler running with ${jobs.length} job(s) in ${scheduler.timezone}. Press Ctrl+C to stop.`);

    const signal = await shutdown();
    out.info(`Received ${signal}, waiting for running jobs to finish...`);
    await scheduler.stop();
    out.success("Scheduler stopped");
  } finally {
    await close();
  }
}

export default scheduleRun;
