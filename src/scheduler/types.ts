/**
 * Scheduler Types - Type definitions for the cron scheduling system
 *
 * This module defines the schedule, job and entry shapes shared by the
 * parser, the execution chain and the scheduler loop.
 */

import type { CronLogger } from "../log.js";
import type { Chain } from "./chain.js";

// ============================================================================
// Jobs
// ============================================================================

/**
 * Unit of work run on each activation. A returned promise counts as the job
 * still running until it settles.
 */
export type Job = () => void | Promise<void>;

/**
 * Decorates a job with cross-cutting behaviour (fault containment,
 * overlap policy, ...).
 */
export type JobWrapper = (job: Job) => Job;

// ============================================================================
// Schedules
// ============================================================================

/**
 * Describes the duty cycle of a job.
 */
export interface Schedule {
  /**
   * Next activation strictly after `after`, or null when there is none.
   * `timezone` is the zone to use when the schedule carries none of its own.
   */
  next(after: Date, timezone?: string): Date | null;
}

/**
 * Turns a textual specification into a Schedule. Throws
 * ScheduleParseError on malformed input.
 */
export interface ScheduleParser {
  parse(spec: string): Schedule;
}

// ============================================================================
// Entries
// ============================================================================

/**
 * Identifies an entry within one Scheduler. Ids start at 1; 0 never names
 * an entry.
 */
export type EntryId = number;

/**
 * A registered job together with its schedule and run bookkeeping.
 */
export interface Entry {
  id: EntryId;
  schedule: Schedule;
  /** Next activation, or null if not computed yet or unsatisfiable. */
  next: Date | null;
  /** Last activation, or null if the job never ran. */
  prev: Date | null;
  /** What actually runs: the job decorated by the scheduler's chain. */
  wrappedJob: Job;
  /** The job as it was submitted. */
  job: Job;
}

// ============================================================================
// Scheduler
// ============================================================================

/**
 * Scheduler configuration. Every field is optional.
 */
export interface SchedulerOptions {
  /** Zone for schedules without their own TZ= prefix. Default: host zone. */
  timezone?: string;
  /** Parser for textual specs. Default: five-field standard parser. */
  parser?: ScheduleParser;
  /** Wrappers applied to every job. Default: recover(logger). */
  chain?: Chain;
  /** Default: errors-only pino logger created for this instance. */
  logger?: CronLogger;
}

/**
 * Messages handed from callers to the running scheduler loop.
 */
export type LoopCommand =
  | { type: "add"; entry: Entry }
  | { type: "remove"; id: EntryId }
  | { type: "snapshot"; reply: (entries: Entry[]) => void }
  | { type: "stop" };
