/**
 * Spec Schedule - cron fields stored as bitsets
 *
 * Each field is a 64-bit set where bit i means "value i is allowed". The top
 * bit records that the field was written as `*` or `?`, which decides how
 * day-of-month and day-of-week combine.
 */

import {
  HOUR_MS,
  MINUTE_MS,
  SECOND_MS,
  addDays,
  addMonths,
  floorMod,
  localTimezone,
  wallClock,
  zonedTime,
  type WallClock,
} from "../utils/zoned-time.js";
import type { Schedule } from "./types.js";

/**
 * Accepted range of a field, plus names usable in place of numbers.
 */
export interface Bounds {
  min: number;
  max: number;
  names?: Readonly<Record<string, number>>;
}

export const SECONDS: Bounds = { min: 0, max: 59 };
export const MINUTES: Bounds = { min: 0, max: 59 };
export const HOURS: Bounds = { min: 0, max: 23 };
export const DAYS_OF_MONTH: Bounds = { min: 1, max: 31 };
export const MONTHS: Bounds = {
  min: 1,
  max: 12,
  names: {
    jan: 1,
    feb: 2,
    mar: 3,
    apr: 4,
    may: 5,
    jun: 6,
    jul: 7,
    aug: 8,
    sep: 9,
    oct: 10,
    nov: 11,
    dec: 12,
  },
};
export const DAYS_OF_WEEK: Bounds = {
  min: 0,
  max: 6,
  names: {
    sun: 0,
    mon: 1,
    tue: 2,
    wed: 3,
    thu: 4,
    fri: 5,
    sat: 6,
  },
};

/** Set when the field was `*` or `?`. */
export const STAR_BIT = 1n << 63n;

/** Activations are searched at most this many years past the start. */
const YEAR_LIMIT = 5;

/**
 * Bits for every value in [min, max] reachable from min in steps of `step`.
 */
export function getBits(min: number, max: number, step: number): bigint {
  let bits = 0n;
  for (let i = min; i <= max; i += step) {
    bits |= 1n << BigInt(i);
  }
  return bits;
}

/**
 * Every value of the field, marked as a wildcard.
 */
export function allBits(bounds: Bounds): bigint {
  return getBits(bounds.min, bounds.max, 1) | STAR_BIT;
}

function hasBit(bits: bigint, value: number): boolean {
  return (bits & (1n << BigInt(value))) !== 0n;
}

export interface SpecFields {
  second: bigint;
  minute: bigint;
  hour: bigint;
  dom: bigint;
  month: bigint;
  dow: bigint;
}

/**
 * Traditional crontab schedule with second granularity.
 */
export class SpecSchedule implements Schedule {
  readonly second: bigint;
  readonly minute: bigint;
  readonly hour: bigint;
  readonly dom: bigint;
  readonly month: bigint;
  readonly dow: bigint;
  /** IANA zone from a TZ= prefix; when unset the caller's zone applies. */
  readonly timezone?: string;

  constructor(fields: SpecFields, timezone?: string) {
    this.second = fields.second;
    this.minute = fields.minute;
    this.hour = fields.hour;
    this.dom = fields.dom;
    this.month = fields.month;
    this.dow = fields.dow;
    this.timezone = timezone;
  }

  next(after: Date, timezone?: string): Date | null {
    // For month, day, hour, minute and second in turn: if the current value
    // is not allowed, step that field until it is. Stepping past the
    // field's end rolls a coarser field, so matching starts over from month.
    const zone = this.timezone ?? timezone ?? localTimezone();

    // Earliest candidate is the upcoming whole second.
    let t = after.getTime() + SECOND_MS - floorMod(after.getTime(), SECOND_MS);
    let c = wallClock(t, zone);

    // Finer fields are reset to their minimum the first time any field moves.
    let added = false;

    const yearLimit = c.year + YEAR_LIMIT;

    wrap: for (;;) {
      if (c.year > yearLimit) {
        return null;
      }

      while (!hasBit(this.month, c.month)) {
        if (!added) {
          added = true;
          t = zonedTime(c.year, c.month, 1, 0, 0, 0, zone);
        }
        t = addMonths(t, zone, 1);
        c = wallClock(t, zone);

        if (c.month === 1) continue wrap;
      }

      // Midnight does not exist on some DST days (Sao Paulo moved 00:00 to
      // 01:00), so the day loop snaps back onto the day boundary.
      while (!this.dayMatches(c)) {
        if (!added) {
          added = true;
          t = zonedTime(c.year, c.month, c.day, 0, 0, 0, zone);
        }
        t = addDays(t, zone, 1);
        c = wallClock(t, zone);

        if (c.hour !== 0) {
          t += c.hour > 12 ? (24 - c.hour) * HOUR_MS : -c.hour * HOUR_MS;
          c = wallClock(t, zone);
        }

        if (c.day === 1) continue wrap;
      }

      while (!hasBit(this.hour, c.hour)) {
        if (!added) {
          added = true;
          t = zonedTime(c.year, c.month, c.day, c.hour, 0, 0, zone);
        }
        t += HOUR_MS;
        c = wallClock(t, zone);

        if (c.hour === 0) continue wrap;
      }

      while (!hasBit(this.minute, c.minute)) {
        if (!added) {
          added = true;
          t -= floorMod(t, MINUTE_MS);
        }
        t += MINUTE_MS;
        c = wallClock(t, zone);

        if (c.minute === 0) continue wrap;
      }

      while (!hasBit(this.second, c.second)) {
        if (!added) {
          added = true;
          t -= floorMod(t, SECOND_MS);
        }
        t += SECOND_MS;
        c = wallClock(t, zone);

        if (c.second === 0) continue wrap;
      }

      return new Date(t);
    }
  }

  /**
   * Day-of-month and day-of-week must both match when either field is a
   * wildcard; otherwise matching either one is enough.
   */
  dayMatches(clock: Pick<WallClock, "day" | "weekday">): boolean {
    const domMatch = hasBit(this.dom, clock.day);
    const dowMatch = hasBit(this.dow, clock.weekday);
    if ((this.dom & STAR_BIT) !== 0n || (this.dow & STAR_BIT) !== 0n) {
      return domMatch && dowMatch;
    }
    return domMatch || dowMatch;
  }
}
