/**
 * Cron Parser - turns crontab specifications into schedules
 *
 * Supports:
 * - Configurable field sets (seconds, optional seconds, optional day-of-week)
 * - `TZ=` / `CRON_TZ=` prefixes
 * - Descriptors (@hourly, @daily, @every 1h30m, ...)
 * - Month and weekday names in place of numbers
 */

import { isValidTimezone } from "../utils/zoned-time.js";
import { every } from "./constant-delay.js";
import { parseDuration } from "./duration.js";
import { ConfigurationError, ScheduleParseError, toError } from "./errors.js";
import {
  DAYS_OF_MONTH,
  DAYS_OF_WEEK,
  HOURS,
  MINUTES,
  MONTHS,
  SECONDS,
  STAR_BIT,
  SpecSchedule,
  allBits,
  getBits,
  type Bounds,
} from "./spec-schedule.js";
import type { Schedule, ScheduleParser } from "./types.js";

/**
 * Fields (and features) a Parser accepts. Combine with `|`. A field that is
 * not included takes its default instead of being read from the spec.
 */
export enum ParseOption {
  /** Seconds field, default 0 */
  Second = 1 << 0,
  /** Optional seconds field, default 0 */
  SecondOptional = 1 << 1,
  /** Minutes field, default 0 */
  Minute = 1 << 2,
  /** Hours field, default 0 */
  Hour = 1 << 3,
  /** Day of month field, default * */
  Dom = 1 << 4,
  /** Month field, default * */
  Month = 1 << 5,
  /** Day of week field, default * */
  Dow = 1 << 6,
  /** Optional day of week field, default * */
  DowOptional = 1 << 7,
  /** Allow descriptors such as @monthly, @weekly, etc. */
  Descriptor = 1 << 8,
}

const PLACES = [
  ParseOption.Second,
  ParseOption.Minute,
  ParseOption.Hour,
  ParseOption.Dom,
  ParseOption.Month,
  ParseOption.Dow,
];

const DEFAULTS = ["0", "0", "0", "*", "*", "*"];

function countOptionals(options: number): number {
  let optionals = 0;
  if (options & ParseOption.DowOptional) optionals++;
  if (options & ParseOption.SecondOptional) optionals++;
  return optionals;
}

/**
 * Crontab parser for a chosen set of fields.
 *
 * @example
 * // Standard parser without descriptors
 * const parser = new Parser(ParseOption.Minute | ParseOption.Hour | ParseOption.Dom | ParseOption.Month | ParseOption.Dow);
 * parser.parse("0 0 15 *\/3 *");
 *
 * // Same, without the time fields and with an optional day of week
 * new Parser(ParseOption.Dom | ParseOption.Month | ParseOption.DowOptional).parse("15 *\/3");
 */
export class Parser implements ScheduleParser {
  readonly options: number;

  /**
   * @throws ConfigurationError when more than one optional field is
   * configured, since a missing field could not be attributed.
   */
  constructor(options: number) {
    if (countOptionals(options) > 1) {
      throw new ConfigurationError("multiple optionals may not be configured");
    }
    this.options = options;
  }

  parse(spec: string): Schedule {
    if (spec.length === 0) {
      throw new ScheduleParseError("empty spec string", spec);
    }

    let rest = spec;
    let timezone: string | undefined;
    if (rest.startsWith("TZ=") || rest.startsWith("CRON_TZ=")) {
      const space = rest.indexOf(" ");
      const eq = rest.indexOf("=");
      const name = space === -1 ? rest.slice(eq + 1) : rest.slice(eq + 1, space);
      if (!isValidTimezone(name)) {
        throw new ScheduleParseError(`provided bad location ${name}: unknown time zone ${name}`, spec);
      }
      timezone = name;
      rest = space === -1 ? "" : rest.slice(space).trim();
    }

    if (rest.startsWith("@")) {
      if ((this.options & ParseOption.Descriptor) === 0) {
        throw new ScheduleParseError(`parser does not accept descriptors: ${rest}`, spec);
      }
      return parseDescriptor(rest, timezone, spec);
    }

    const fields = normalizeFields(rest.split(/\s+/).filter(Boolean), this.options, spec);

    try {
      return new SpecSchedule(
        {
          second: getField(fields[0], SECONDS),
          minute: getField(fields[1], MINUTES),
          hour: getField(fields[2], HOURS),
          dom: getField(fields[3], DAYS_OF_MONTH),
          month: getField(fields[4], MONTHS),
          dow: getField(fields[5], DAYS_OF_WEEK),
        },
        timezone,
      );
    } catch (err) {
      if (err instanceof ScheduleParseError) {
        throw new ScheduleParseError(err.message, spec, { cause: err });
      }
      throw err;
    }
  }
}

/**
 * Expand the fields present in a spec to all six, filling in defaults for
 * fields the options leave out and for a missing optional field.
 */
export function normalizeFields(fields: string[], options: number, spec = fields.join(" ")): string[] {
  let opts = options;
  const optionals = countOptionals(opts);
  if (opts & ParseOption.SecondOptional) opts |= ParseOption.Second;
  if (opts & ParseOption.DowOptional) opts |= ParseOption.Dow;
  if (optionals > 1) {
    throw new ScheduleParseError("multiple optionals may not be configured", spec);
  }

  const max = PLACES.filter((place) => (opts & place) !== 0).length;
  const min = max - optionals;

  const count = fields.length;
  if (count < min || count > max) {
    const found = `[${fields.join(" ")}]`;
    if (min === max) {
      throw new ScheduleParseError(`expected exactly ${min} fields, found ${count}: ${found}`, spec);
    }
    throw new ScheduleParseError(`expected ${min} to ${max} fields, found ${count}: ${found}`, spec);
  }

  let present = fields;
  if (min < max && count === min) {
    if (opts & ParseOption.DowOptional) {
      present = [...fields, DEFAULTS[5]];
    } else {
      present = [DEFAULTS[0], ...fields];
    }
  }

  const expanded = [...DEFAULTS];
  let n = 0;
  PLACES.forEach((place, i) => {
    if (opts & place) {
      expanded[i] = present[n];
      n++;
    }
  });
  return expanded;
}

/**
 * Bits for a comma-separated list of ranges.
 */
export function getField(field: string, bounds: Bounds): bigint {
  let bits = 0n;
  for (const expr of field.split(",").filter(Boolean)) {
    bits |= getRange(expr, bounds);
  }
  return bits;
}

/**
 * Bits for one range expression:
 *   `*` | `?` | number ["-" number] ["/" number]
 * A lone `N/S` runs from N to the field maximum.
 */
export function getRange(expr: string, bounds: Bounds): bigint {
  const rangeAndStep = expr.split("/");
  const lowAndHigh = rangeAndStep[0].split("-");
  const singleDigit = lowAndHigh.length === 1;

  let start: number;
  let end: number;
  let step: number;
  let extra = 0n;

  if (lowAndHigh[0] === "*" || lowAndHigh[0] === "?") {
    start = bounds.min;
    end = bounds.max;
    extra = STAR_BIT;
  } else {
    start = parseIntOrName(lowAndHigh[0], bounds.names);
    switch (lowAndHigh.length) {
      case 1:
        end = start;
        break;
      case 2:
        end = parseIntOrName(lowAndHigh[1], bounds.names);
        break;
      default:
        throw new ScheduleParseError(`too many hyphens: ${expr}`, expr);
    }
  }

  switch (rangeAndStep.length) {
    case 1:
      step = 1;
      break;
    case 2:
      step = mustParseInt(rangeAndStep[1]);
      if (singleDigit) {
        end = bounds.max;
      }
      if (step > 1) {
        extra = 0n;
      }
      break;
    default:
      throw new ScheduleParseError(`too many slashes: ${expr}`, expr);
  }

  if (start < bounds.min) {
    throw new ScheduleParseError(`beginning of range (${start}) below minimum (${bounds.min}): ${expr}`, expr);
  }
  if (end > bounds.max) {
    throw new ScheduleParseError(`end of range (${end}) above maximum (${bounds.max}): ${expr}`, expr);
  }
  if (start > end) {
    throw new ScheduleParseError(`beginning of range (${start}) beyond end of range (${end}): ${expr}`, expr);
  }
  if (step === 0) {
    throw new ScheduleParseError(`step of range should be a positive number: ${expr}`, expr);
  }

  return getBits(start, end, step) | extra;
}

function parseIntOrName(expr: string, names?: Readonly<Record<string, number>>): number {
  const named = names?.[expr.toLowerCase()];
  if (named !== undefined) return named;
  return mustParseInt(expr);
}

function mustParseInt(expr: string): number {
  if (!/^[+-]?\d+$/.test(expr)) {
    throw new ScheduleParseError(`failed to parse int from ${expr}: invalid syntax`, expr);
  }
  const num = Number(expr);
  if (num < 0) {
    throw new ScheduleParseError(`negative number (${num}) not allowed: ${expr}`, expr);
  }
  return num;
}

function single(bounds: Bounds): bigint {
  return 1n << BigInt(bounds.min);
}

/**
 * Predefined schedule for a descriptor such as "@daily" or "@every 5m".
 */
function parseDescriptor(descriptor: string, timezone: string | undefined, spec: string): Schedule {
  switch (descriptor) {
    case "@yearly":
    case "@annually":
      return new SpecSchedule(
        {
          second: single(SECONDS),
          minute: single(MINUTES),
          hour: single(HOURS),
          dom: single(DAYS_OF_MONTH),
          month: single(MONTHS),
          dow: allBits(DAYS_OF_WEEK),
        },
        timezone,
      );

    case "@monthly":
      return new SpecSchedule(
        {
          second: single(SECONDS),
          minute: single(MINUTES),
          hour: single(HOURS),
          dom: single(DAYS_OF_MONTH),
          month: allBits(MONTHS),
          dow: allBits(DAYS_OF_WEEK),
        },
        timezone,
      );

    case "@weekly":
      return new SpecSchedule(
        {
          second: single(SECONDS),
          minute: single(MINUTES),
          hour: single(HOURS),
          dom: allBits(DAYS_OF_MONTH),
          month: allBits(MONTHS),
          dow: single(DAYS_OF_WEEK),
        },
        timezone,
      );

    case "@daily":
    case "@midnight":
      return new SpecSchedule(
        {
          second: single(SECONDS),
          minute: single(MINUTES),
          hour: single(HOURS),
          dom: allBits(DAYS_OF_MONTH),
          month: allBits(MONTHS),
          dow: allBits(DAYS_OF_WEEK),
        },
        timezone,
      );

    case "@hourly":
      return new SpecSchedule(
        {
          second: single(SECONDS),
          minute: single(MINUTES),
          hour: allBits(HOURS),
          dom: allBits(DAYS_OF_MONTH),
          month: allBits(MONTHS),
          dow: allBits(DAYS_OF_WEEK),
        },
        timezone,
      );
  }

  const prefix = "@every ";
  if (descriptor.startsWith(prefix)) {
    let duration: number;
    try {
      duration = parseDuration(descriptor.slice(prefix.length));
    } catch (err) {
      throw new ScheduleParseError(
        `failed to parse duration ${descriptor}: ${toError(err).message}`,
        spec,
        { cause: err },
      );
    }
    return every(duration);
  }

  throw new ScheduleParseError(`unrecognized descriptor: ${descriptor}`, spec);
}

/**
 * Five fields (minute, hour, day of month, month, day of week) plus
 * descriptors.
 */
export const standardParser = new Parser(
  ParseOption.Minute | ParseOption.Hour | ParseOption.Dom | ParseOption.Month | ParseOption.Dow | ParseOption.Descriptor,
);

/**
 * Six fields with a leading seconds field, plus descriptors.
 */
export const secondsParser = new Parser(
  ParseOption.Second |
    ParseOption.Minute |
    ParseOption.Hour |
    ParseOption.Dom |
    ParseOption.Month |
    ParseOption.Dow |
    ParseOption.Descriptor,
);

/**
 * Parse a standard five-field spec ("0 9 * * MON-FRI") or a descriptor
 * ("@midnight", "@every 1h30m").
 */
export function parseStandard(spec: string): Schedule {
  return standardParser.parse(spec);
}
