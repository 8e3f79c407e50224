import { describe, it, expect } from "vitest";

import { secondsParser, standardParser } from "../../../src/scheduler/parser.js";
import { SpecSchedule } from "../../../src/scheduler/spec-schedule.js";

function nextOf(spec: string, from: string, timezone = "UTC"): string | null {
  const schedule = secondsParser.parse(spec);
  return schedule.next(new Date(from), timezone)?.toISOString() ?? null;
}

describe("SpecSchedule.next", () => {
  it.each([
    // Simple cases
    ["0 0/15 * * * *", "2012-07-09T14:45:00Z", "2012-07-09T15:00:00.000Z"],
    ["0 0/15 * * * *", "2012-07-09T14:59:00Z", "2012-07-09T15:00:00.000Z"],
    ["0 0/15 * * * *", "2012-07-09T14:59:59Z", "2012-07-09T15:00:00.000Z"],

    // Wrap around hours and days
    ["0 20-35/15 * * * *", "2012-07-09T15:45:00Z", "2012-07-09T16:20:00.000Z"],
    ["0 */15 * * * *", "2012-07-09T23:46:00Z", "2012-07-10T00:00:00.000Z"],
    ["0 20-35/15 * * * *", "2012-07-09T23:45:00Z", "2012-07-10T00:20:00.000Z"],
    ["15/35 20-35/15 * * * *", "2012-07-09T23:35:51Z", "2012-07-10T00:20:15.000Z"],

    // Wrap around months and years
    ["0 0 0 9 Apr-Oct ?", "2012-07-09T23:35:00Z", "2012-08-09T00:00:00.000Z"],
    ["0 0 0 */5 Apr,Aug,Oct Mon", "2012-07-09T23:35:00Z", "2012-08-01T00:00:00.000Z"],
    ["0 0 0 */5 Oct Mon", "2012-07-09T23:35:00Z", "2012-10-01T00:00:00.000Z"],
    ["0 * * * * *", "2012-12-31T23:59:45Z", "2013-01-01T00:00:00.000Z"],

    // Leap year
    ["0 0 0 29 Feb ?", "2012-07-09T23:35:00Z", "2016-02-29T00:00:00.000Z"],

    // Day of week with a wildcard day of month
    ["0 0 0 * Feb Mon/2", "2012-07-09T23:35:00Z", "2013-02-01T00:00:00.000Z"],
  ])("%s after %s", (spec, from, expected) => {
    expect(nextOf(spec, from)).toBe(expected);
  });

  it("returns null for dates that never occur", () => {
    expect(nextOf("0 0 0 30 Feb ?", "2012-07-09T23:35:00Z")).toBeNull();
    expect(nextOf("0 0 0 31 Apr ?", "2012-07-09T23:35:00Z")).toBeNull();
  });

  it("is strictly after the start, even on an activation", () => {
    const schedule = standardParser.parse("0 0 * * *");
    const next = schedule.next(new Date("2024-01-01T00:00:00Z"), "UTC");
    expect(next?.toISOString()).toBe("2024-01-02T00:00:00.000Z");
  });

  it("rounds a sub-second start up to the next whole second", () => {
    const next = nextOf("* * * * * *", "2024-01-01T00:00:00.500Z");
    expect(next).toBe("2024-01-01T00:00:01.000Z");
  });

  it("matches either day field when neither is a wildcard", () => {
    // 2024-01-02 is a Tuesday; the following Monday comes before Feb 1.
    const either = standardParser.parse("0 0 1 * MON");
    expect(either.next(new Date("2024-01-02T00:00:00Z"), "UTC")?.toISOString()).toBe(
      "2024-01-08T00:00:00.000Z",
    );

    const mondays = standardParser.parse("0 0 ? * MON");
    expect(mondays.next(new Date("2024-01-02T00:00:00Z"), "UTC")?.toISOString()).toBe(
      "2024-01-08T00:00:00.000Z",
    );

    const firsts = standardParser.parse("0 0 1 * *");
    expect(firsts.next(new Date("2024-01-02T00:00:00Z"), "UTC")?.toISOString()).toBe(
      "2024-02-01T00:00:00.000Z",
    );
  });

  it("evaluates in the zone it is given", () => {
    const schedule = standardParser.parse("0 9 * * *");
    const next = schedule.next(new Date("2023-12-31T12:00:00Z"), "Asia/Tokyo");
    expect(next?.toISOString()).toBe("2024-01-01T00:00:00.000Z");
  });

  it("prefers its own zone over the caller's", () => {
    const schedule = standardParser.parse("CRON_TZ=Asia/Tokyo 0 9 * * *");
    const next = schedule.next(new Date("2023-12-31T12:00:00Z"), "America/New_York");
    expect(next?.toISOString()).toBe("2024-01-01T00:00:00.000Z");
  });

  describe("daylight saving transitions", () => {
    it("skips a wall time that falls in a spring-forward gap", () => {
      // 02:30 does not exist in New York on 2012-03-11.
      expect(nextOf("TZ=America/New_York 0 30 2 11 Mar ?", "2012-03-11T05:00:00Z")).toBe(
        "2013-03-11T06:30:00.000Z",
      );
    });

    it("runs a repeated wall time again in standard time after fall-back", () => {
      // From 01:45 EDT the next 01:30 is the repeated one in EST.
      expect(nextOf("TZ=America/New_York 0 30 1 04 Nov ?", "2012-11-04T05:45:00Z")).toBe(
        "2012-11-04T06:30:00.000Z",
      );
    });

    it("finds a day whose midnight does not exist", () => {
      // Sao Paulo moved 2018-11-04 00:00 to 01:00.
      expect(nextOf("TZ=America/Sao_Paulo 0 0 9 4 Nov ?", "2018-11-03T13:00:00Z")).toBe(
        "2018-11-04T11:00:00.000Z",
      );
    });
  });

  it("parses the same spec to equal schedules", () => {
    const a = secondsParser.parse("0 5,10 9-17 * JAN-JUN MON-FRI");
    const b = secondsParser.parse("0 5,10 9-17 * JAN-JUN MON-FRI");
    expect(a).toBeInstanceOf(SpecSchedule);
    expect(a).toEqual(b);
  });
});

describe("SpecSchedule.dayMatches", () => {
  it("requires both fields when one is a wildcard", () => {
    const schedule = standardParser.parse("0 0 1 * *");
    if (!(schedule instanceof SpecSchedule)) throw new Error("expected a SpecSchedule");
    expect(schedule.dayMatches({ day: 1, weekday: 3 })).toBe(true);
    expect(schedule.dayMatches({ day: 2, weekday: 3 })).toBe(false);
  });

  it("accepts either field when both are restricted", () => {
    const schedule = standardParser.parse("0 0 1 * SUN");
    if (!(schedule instanceof SpecSchedule)) throw new Error("expected a SpecSchedule");
    expect(schedule.dayMatches({ day: 1, weekday: 3 })).toBe(true);
    expect(schedule.dayMatches({ day: 7, weekday: 0 })).toBe(true);
    expect(schedule.dayMatches({ day: 7, weekday: 3 })).toBe(false);
  });
});
