/**
 * Scheduler Module - in-process cron scheduling
 *
 * Provides:
 * - Cron specs with optional seconds, names, steps and TZ= prefixes
 * - Descriptors (@hourly, @daily, @every 1h30m, ...)
 * - Fixed-interval schedules
 * - Job wrappers for fault containment and overlap control
 */

export { Scheduler, MAX_TIMER_DELAY, isValidEntry } from "./scheduler.js";
export { Parser, ParseOption, standardParser, secondsParser, parseStandard } from "./parser.js";
export { SpecSchedule, STAR_BIT } from "./spec-schedule.js";
export { ConstantDelaySchedule, every } from "./constant-delay.js";
export { Chain, recover, delayIfStillRunning, skipIfStillRunning } from "./chain.js";
export { ScheduleParseError, ConfigurationError } from "./errors.js";
export { parseDuration, formatDuration, MAX_DURATION_MS } from "./duration.js";
export type * from "./types.js";
