/**
 * Schedule Validate Command - Check that a spec parses
 */

import { parserFromConfig } from "../../../config.js";
import { ConstantDelaySchedule } from "../../../scheduler/constant-delay.js";
import { formatDuration } from "../../../scheduler/duration.js";
import { SpecSchedule } from "../../../scheduler/spec-schedule.js";
import { localTimezone } from "../../../utils/zoned-time.js";
import { OutputFormatter } from "../../output-formatter.js";

export interface ScheduleValidateOptions {
  seconds?: boolean;
  json?: boolean;
  quiet?: boolean;
}

/**
 * Validate a schedule spec. Parse errors propagate to the error handler.
 */
export async function scheduleValidate(spec: string, options: ScheduleValidateOptions = {}): Promise<void> {
  const out = new OutputFormatter({ quiet: options.quiet });

  const schedule = parserFromConfig({ seconds: options.seconds ?? false, descriptors: true }).parse(spec);
  const kind = schedule instanceof ConstantDelaySchedule ? "interval" : "cron";
  const next = schedule.next(new Date(), localTimezone());

  if (options.json) {
    out.json({ spec, valid: true, kind, next: next?.toISOString() ?? null });
    return;
  }

  out.success(`Valid schedule: ${spec}`);
  out.keyValue("Type", kind);
  if (schedule instanceof ConstantDelaySchedule) {
    out.keyValue("Every", formatDuration(schedule.delay));
  }
  if (schedule instanceof SpecSchedule && schedule.timezone) {
    out.keyValue("Time zone", schedule.timezone);
  }
  out.keyValue("Next run", next ? next.toISOString() : "never");
}

export default scheduleValidate;
