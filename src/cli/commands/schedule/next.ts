/**
 * Schedule Next Command - Preview upcoming activations of a spec
 */

import { parserFromConfig } from "../../../config.js";
import { SpecSchedule } from "../../../scheduler/spec-schedule.js";
import type { Schedule } from "../../../scheduler/types.js";
import { isValidTimezone, localTimezone } from "../../../utils/zoned-time.js";
import { OutputFormatter } from "../../output-formatter.js";
import { ValidationError } from "../../error-handler.js";

const MAX_COUNT = 1000;

export interface ScheduleNextOptions {
  count?: string;
  from?: string;
  tz?: string;
  seconds?: boolean;
  json?: boolean;
  quiet?: boolean;
}

/**
 * Up to `count` consecutive activations after `from`. Stops early when the
 * schedule has no further activation.
 */
export function upcomingActivations(schedule: Schedule, from: Date, count: number, timezone: string): Date[] {
  const activations: Date[] = [];
  let cursor = from;
  while (activations.length < count) {
    const next = schedule.next(cursor, timezone);
    if (!next) break;
    activations.push(next);
    cursor = next;
  }
  return activations;
}

/**
 * Print the next activations of a schedule spec
 */
export async function scheduleNext(spec: string, options: ScheduleNextOptions = {}): Promise<void> {
  const out = new OutputFormatter({ quiet: options.quiet });

  const count = options.count ? Number(options.count) : 5;
  if (!Number.isInteger(count) || count < 1 || count > MAX_COUNT) {
    throw new ValidationError(`Invalid count: ${options.count}`, `Use a whole number between 1 and ${MAX_COUNT}`);
  }

  const from = options.from ? new Date(options.from) : new Date();
  if (Number.isNaN(from.getTime())) {
    throw new ValidationError(`Invalid start time: ${options.from}`, "Use an ISO-8601 timestamp, e.g. 2024-01-01T00:00:00Z");
  }

  const timezone = options.tz?.trim() || localTimezone();
  if (!isValidTimezone(timezone)) {
    throw new ValidationError(`Unknown time zone: ${timezone}`, "Use an IANA zone name such as America/New_York");
  }

  const schedule = parserFromConfig({ seconds: options.seconds ?? false, descriptors: true }).parse(spec);
  const displayZone = schedule instanceof SpecSchedule && schedule.timezone ? schedule.timezone : timezone;
  const activations = upcomingActivations(schedule, from, count, timezone);

  if (options.json) {
    out.json({
      spec,
      timezone: displayZone,
      activations: activations.map((at) => at.toISOString()),
    });
    return;
  }

  if (activations.length === 0) {
    out.warn("No activation within the next five years");
    return;
  }

  out.header(`Next activations for "${spec}"`);
  out.activationTable(activations, displayZone);
}

export default scheduleNext;
