/**
 * Job Chain - decorators applied to every job a scheduler runs
 */

import type { CronLogger } from "../log.js";
import { formatDuration } from "./duration.js";
import { toError } from "./errors.js";
import type { Job, JobWrapper } from "./types.js";

const MAX_STACK_LENGTH = 64 * 1024;
const DELAY_REPORT_MS = 60_000;

/**
 * Sequence of wrappers that decorate submitted jobs with cross-cutting
 * behaviour like logging or synchronization.
 */
export class Chain {
  private readonly wrappers: readonly JobWrapper[];

  constructor(...wrappers: JobWrapper[]) {
    this.wrappers = wrappers;
  }

  /**
   * Decorate a job with every wrapper in the chain. The first wrapper is
   * the outermost:
   *
   *   new Chain(m1, m2, m3).then(job)  ===  m1(m2(m3(job)))
   */
  then(job: Job): Job {
    return this.wrappers.reduceRight<Job>((wrapped, wrapper) => wrapper(wrapped), job);
  }
}

/**
 * Contain faults thrown or rejected by the job and report them through the
 * logger's error channel with a bounded stack trace.
 */
export function recover(logger: CronLogger): JobWrapper {
  return (job) => async () => {
    try {
      await job();
    } catch (err) {
      const error = toError(err);
      const stack = (error.stack ?? String(error)).slice(0, MAX_STACK_LENGTH);
      logger.error(error, "panic", { stack: `...\n${stack}` });
    }
  };
}

/**
 * Serialize runs of a job: an activation that arrives while the previous run
 * is still going waits for it to finish. Waits over a minute are logged.
 */
export function delayIfStillRunning(logger: CronLogger): JobWrapper {
  return (job) => {
    let tail: Promise<void> = Promise.resolve();

    return () => {
      const queuedAt = Date.now();
      const run = tail.then(async () => {
        const waited = Date.now() - queuedAt;
        if (waited > DELAY_REPORT_MS) {
          logger.info("delay", { duration: formatDuration(waited) });
        }
        await job();
      });
      // The caller sees a failure through `run`; the queue only needs to
      // know the run is over.
      tail = run.then(
        () => undefined,
        () => undefined,
      );
      return run;
    };
  };
}

/**
 * Drop an activation when the previous run of the job has not finished.
 * Skipped activations are logged.
 */
export function skipIfStillRunning(logger: CronLogger): JobWrapper {
  return (job) => {
    let running = false;

    return async () => {
      if (running) {
        logger.info("skip");
        return;
      }
      running = true;
      try {
        await job();
      } finally {
        running = false;
      }
    };
  };
}
