/**
 * Zoned Time - wall-clock arithmetic in an IANA time zone.
 *
 * Instants are epoch milliseconds. Wall-clock fields are read through
 * Intl.DateTimeFormat, and a wall time is turned back into an instant by
 * resolving the zone offset twice (naive guess, then at the corrected
 * instant), which settles DST gaps and overlaps the same way every time.
 */

export const SECOND_MS = 1000;
export const MINUTE_MS = 60 * SECOND_MS;
export const HOUR_MS = 60 * MINUTE_MS;

/** Wall-clock components in a target timezone. */
export interface WallClock {
  year: number;
  month: number; // 1-12
  day: number;
  hour: number;
  minute: number;
  second: number;
  weekday: number; // 0=Sun..6=Sat
}

const WEEKDAYS: Record<string, number> = {
  Sun: 0,
  Mon: 1,
  Tue: 2,
  Wed: 3,
  Thu: 4,
  Fri: 5,
  Sat: 6,
};

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timezone: string): Intl.DateTimeFormat {
  const cached = formatters.get(timezone);
  if (cached) return cached;

  const formatter = new Intl.DateTimeFormat("en-US", {
    timeZone: timezone,
    hourCycle: "h23",
    weekday: "short",
    year: "numeric",
    month: "numeric",
    day: "numeric",
    hour: "numeric",
    minute: "numeric",
    second: "numeric",
  });
  formatters.set(timezone, formatter);
  return formatter;
}

/** Remainder that is never negative, for instants before 1970. */
export function floorMod(value: number, divisor: number): number {
  return ((value % divisor) + divisor) % divisor;
}

/**
 * Name of the host time zone, e.g. "Europe/Berlin" (or "UTC" when unset).
 */
export function localTimezone(): string {
  return new Intl.DateTimeFormat().resolvedOptions().timeZone;
}

/**
 * Whether the runtime knows the given IANA zone name.
 */
export function isValidTimezone(timezone: string): boolean {
  if (!timezone.trim()) return false;
  try {
    formatterFor(timezone);
    return true;
  } catch (err) {
    if (err instanceof RangeError) return false;
    throw err;
  }
}

/**
 * Read the wall-clock time in a timezone for a given instant.
 */
export function wallClock(instant: number, timezone: string): WallClock {
  const parts = formatterFor(timezone).formatToParts(new Date(instant));
  const clock: WallClock = { year: 0, month: 0, day: 0, hour: 0, minute: 0, second: 0, weekday: 0 };

  for (const part of parts) {
    switch (part.type) {
      case "year":
        clock.year = Number(part.value);
        break;
      case "month":
        clock.month = Number(part.value);
        break;
      case "day":
        clock.day = Number(part.value);
        break;
      case "hour":
        clock.hour = Number(part.value) % 24;
        break;
      case "minute":
        clock.minute = Number(part.value);
        break;
      case "second":
        clock.second = Number(part.value);
        break;
      case "weekday":
        clock.weekday = WEEKDAYS[part.value] ?? 0;
        break;
    }
  }

  return clock;
}

/**
 * Treat wall-clock fields as if they were UTC. Overflowing fields roll over
 * (month 13 is January of the next year, day 32 the next month).
 */
function naiveInstant(
  year: number,
  month: number,
  day: number,
  hour: number,
  minute: number,
  second: number,
): number {
  const date = new Date(0);
  // setUTCFullYear keeps years 0-99 literal, unlike Date.UTC
  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(hour, minute, second, 0);
  return date.getTime();
}

/**
 * UTC offset of the zone at the given instant, in milliseconds.
 */
export function offsetAt(instant: number, timezone: string): number {
  const clock = wallClock(instant, timezone);
  const wholeSecond = instant - floorMod(instant, SECOND_MS);
  return (
    naiveInstant(clock.year, clock.month, clock.day, clock.hour, clock.minute, clock.second) -
    wholeSecond
  );
}

/**
 * Instant of the given wall-clock time in a timezone.
 *
 * Fields may overflow. A wall time inside a DST gap resolves to an instant
 * before the gap, shifted back by the size of the transition (02:30 on a
 * spring-forward day in New York reads as 01:30). A wall time inside an
 * overlap resolves to its first occurrence.
 */
export function zonedTime(
  year: number,
  month: number,
  day: number,
  hour: number,
  minute: number,
  second: number,
  timezone: string,
): number {
  const naive = naiveInstant(year, month, day, hour, minute, second);
  const guess = offsetAt(naive, timezone);
  const offset = offsetAt(naive - guess, timezone);
  return naive - offset;
}

/**
 * Add calendar days keeping the wall-clock time of day.
 */
export function addDays(instant: number, timezone: string, days: number): number {
  const c = wallClock(instant, timezone);
  return zonedTime(c.year, c.month, c.day + days, c.hour, c.minute, c.second, timezone) +
    floorMod(instant, SECOND_MS);
}

/**
 * Add calendar months keeping the day of month and time of day; a day the
 * target month lacks rolls into the following month (Jan 31 + 1 = Mar 3).
 */
export function addMonths(instant: number, timezone: string, months: number): number {
  const c = wallClock(instant, timezone);
  return zonedTime(c.year, c.month + months, c.day, c.hour, c.minute, c.second, timezone) +
    floorMod(instant, SECOND_MS);
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

/**
 * ISO-8601 rendering of an instant as wall-clock time in the zone, with its
 * offset: "2024-03-10T03:00:00-04:00".
 */
export function toZonedISOString(instant: number, timezone: string): string {
  const c = wallClock(instant, timezone);
  const offsetMinutes = Math.round(offsetAt(instant, timezone) / MINUTE_MS);
  const sign = offsetMinutes < 0 ? "-" : "+";
  const abs = Math.abs(offsetMinutes);
  const offset = `${sign}${pad(Math.floor(abs / 60))}:${pad(abs % 60)}`;
  return `${pad(c.year, 4)}-${pad(c.month)}-${pad(c.day)}T${pad(c.hour)}:${pad(c.minute)}:${pad(c.second)}${offset}`;
}
