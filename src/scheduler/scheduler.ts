/**
 * Cron Scheduler - Main scheduling engine
 *
 * Features:
 * - Cron specs via a pluggable parser, or any Schedule value
 * - Hot add/remove while running
 * - Job decoration through a Chain (fault containment by default)
 * - Stop with drain of in-flight jobs
 *
 * While running, one loop owns the entry list. Callers talk to it through a
 * mailbox; while stopped they edit the list directly.
 */

import { createDefaultCronLogger, type CronLogger } from "../log.js";
import { isValidTimezone, localTimezone } from "../utils/zoned-time.js";
import { Chain, recover } from "./chain.js";
import { ConfigurationError, toError } from "./errors.js";
import { JobWaiter, Mailbox } from "./mailbox.js";
import { standardParser } from "./parser.js";
import type {
  Entry,
  EntryId,
  Job,
  LoopCommand,
  Schedule,
  ScheduleParser,
  SchedulerOptions,
} from "./types.js";

/** Longest delay setTimeout accepts; also the idle wait with no deadline. */
export const MAX_TIMER_DELAY = 2_147_483_647;

interface Timer {
  fired: Promise<void>;
  stop: () => void;
}

function startTimer(delayMs: number): Timer {
  let handle: NodeJS.Timeout | undefined;
  const fired = new Promise<void>((resolve) => {
    handle = setTimeout(resolve, Math.min(Math.max(delayMs, 0), MAX_TIMER_DELAY));
  });
  return {
    fired,
    stop: () => clearTimeout(handle),
  };
}

/**
 * Order entries by next activation; entries without one go last. The sort is
 * stable, so equal deadlines keep their relative order.
 */
function sortByTime(entries: Entry[]): void {
  entries.sort((a, b) => {
    if (!a.next) return b.next ? 1 : 0;
    if (!b.next) return -1;
    return a.next.getTime() - b.next.getTime();
  });
}

/**
 * Next activation of a schedule, with an unrepresentable instant read as
 * "never".
 */
function nextActivation(schedule: Schedule, now: Date, timezone: string): Date | null {
  const next = schedule.next(now, timezone);
  return next && !Number.isNaN(next.getTime()) ? next : null;
}

/**
 * Whether a lookup found an entry. Ids start at 1, so an id of 0 never names
 * a registered entry.
 */
export function isValidEntry(entry: Entry | undefined): entry is Entry {
  return entry !== undefined && entry.id > 0;
}

function copyEntry(entry: Entry): Entry {
  return {
    ...entry,
    next: entry.next ? new Date(entry.next.getTime()) : null,
    prev: entry.prev ? new Date(entry.prev.getTime()) : null,
  };
}

/**
 * Cron Scheduler - tracks entries and runs their jobs on schedule
 */
export class Scheduler {
  readonly timezone: string;
  private readonly parser: ScheduleParser;
  private readonly chain: Chain;
  private readonly logger: CronLogger;
  private readonly jobWaiter = new JobWaiter();
  private scheduled: Entry[] = [];
  private mailbox: Mailbox<LoopCommand> | null = null;
  private loopDone: Promise<void> = Promise.resolve();
  private nextId = 0;

  constructor(options: SchedulerOptions = {}) {
    this.logger = options.logger ?? createDefaultCronLogger();
    this.timezone = options.timezone ?? localTimezone();
    if (!isValidTimezone(this.timezone)) {
      throw new ConfigurationError(`unknown time zone: ${this.timezone}`);
    }
    this.parser = options.parser ?? standardParser;
    this.chain = options.chain ?? new Chain(recover(this.logger));
  }

  /**
   * Parse `spec` with the configured parser and schedule the job on it.
   *
   * @throws ScheduleParseError when the spec is malformed
   */
  addJob(spec: string, job: Job): EntryId {
    const schedule = this.parser.parse(spec);
    return this.schedule(schedule, job);
  }

  /**
   * Run the job on the given schedule. The job is decorated by the
   * scheduler's chain. Returns an id usable with `remove` and `entry`.
   */
  schedule(schedule: Schedule, job: Job): EntryId {
    this.nextId += 1;
    const entry: Entry = {
      id: this.nextId,
      schedule,
      next: null,
      prev: null,
      wrappedJob: this.chain.then(job),
      job,
    };

    if (this.mailbox) {
      void this.mailbox.send({ type: "add", entry });
    } else {
      this.scheduled.push(entry);
    }
    return entry.id;
  }

  /**
   * Stop scheduling the entry. A run already in progress is not interrupted.
   */
  remove(id: EntryId): void {
    if (this.mailbox) {
      void this.mailbox.send({ type: "remove", id });
    } else {
      this.removeEntry(id);
    }
  }

  /**
   * Copies of all entries, ordered by next activation while running.
   */
  entries(): Promise<Entry[]> {
    const mailbox = this.mailbox;
    if (mailbox) {
      return new Promise<Entry[]>((resolve) => {
        void mailbox.send({ type: "snapshot", reply: resolve });
      });
    }
    return Promise.resolve(this.snapshot());
  }

  /**
   * Copy of one entry, or undefined if no entry has that id.
   */
  async entry(id: EntryId): Promise<Entry | undefined> {
    const entries = await this.entries();
    return entries.find((entry) => entry.id === id);
  }

  /**
   * Check if scheduler is running
   */
  isRunning(): boolean {
    return this.mailbox !== null;
  }

  /**
   * Start the scheduler loop in the background. No-op when already running.
   */
  start(): void {
    if (this.mailbox) {
      return;
    }
    const mailbox = new Mailbox<LoopCommand>();
    this.mailbox = mailbox;
    this.loopDone = this.runLoop(mailbox).catch((err: unknown) => {
      this.logger.error(toError(err), "scheduler loop failed");
      if (this.mailbox === mailbox) {
        this.mailbox = null;
      }
    });
  }

  /**
   * Start the scheduler and resolve when its loop exits. Resolves at once
   * when already running.
   */
  run(): Promise<void> {
    if (this.mailbox) {
      return Promise.resolve();
    }
    this.start();
    return this.loopDone;
  }

  /**
   * Stop scheduling new runs. The returned promise resolves once every job
   * already dispatched has finished; running jobs are not interrupted.
   */
  stop(): Promise<void> {
    const mailbox = this.mailbox;
    if (mailbox) {
      this.mailbox = null;
      void mailbox.send({ type: "stop" });
    }
    return this.jobWaiter.wait();
  }

  /**
   * Number of dispatched jobs that have not finished yet.
   */
  get inFlight(): number {
    return this.jobWaiter.inFlight;
  }

  private async runLoop(mailbox: Mailbox<LoopCommand>): Promise<void> {
    this.logger.info("start");

    // Figure out the next activation times for each entry.
    let now = new Date();
    for (const entry of this.scheduled) {
      entry.next = nextActivation(entry.schedule, now, this.timezone);
      this.logger.info("schedule", { now, entry: entry.id, next: entry.next });
    }

    for (;;) {
      // Determine the next entry to run.
      sortByTime(this.scheduled);

      const head = this.scheduled[0];
      // With nothing due, sleep anyway; commands still wake the loop.
      const timer = startTimer(head?.next ? head.next.getTime() - now.getTime() : MAX_TIMER_DELAY);

      for (;;) {
        await Promise.race([timer.fired, mailbox.ready()]);
        const command = mailbox.take();

        if (!command) {
          mailbox.cancelWait();
          now = new Date();
          this.logger.info("wake", { now });

          // Run every entry whose next time was not after now.
          for (const entry of this.scheduled) {
            if (!entry.next || entry.next.getTime() > now.getTime()) {
              break;
            }
            this.startJob(entry.wrappedJob);
            entry.prev = entry.next;
            entry.next = nextActivation(entry.schedule, now, this.timezone);
            this.logger.info("run", { now, entry: entry.id, next: entry.next });
          }
          break;
        }

        if (command.type === "snapshot") {
          command.reply(this.snapshot());
          continue;
        }

        timer.stop();
        if (command.type === "stop") {
          this.logger.info("stop");
          return;
        }

        now = new Date();
        if (command.type === "add") {
          command.entry.next = nextActivation(command.entry.schedule, now, this.timezone);
          this.scheduled.push(command.entry);
          this.logger.info("added", { now, entry: command.entry.id, next: command.entry.next });
        } else {
          this.removeEntry(command.id);
          this.logger.info("removed", { entry: command.id });
        }
        break;
      }
    }
  }

  /**
   * Run a job outside the loop. A fault that escapes the job's wrappers is
   * reported and goes no further.
   */
  private startJob(job: Job): void {
    this.jobWaiter.add();
    void Promise.resolve()
      .then(job)
      .catch((err: unknown) => {
        this.logger.error(toError(err), "job failed");
      })
      .finally(() => {
        this.jobWaiter.done();
      });
  }

  private snapshot(): Entry[] {
    return this.scheduled.map(copyEntry);
  }

  private removeEntry(id: EntryId): void {
    this.scheduled = this.scheduled.filter((entry) => entry.id !== id);
  }
}
