import { describe, it, expect } from "vitest";

import { ConstantDelaySchedule } from "../../../src/scheduler/constant-delay.js";
import { ConfigurationError, ScheduleParseError } from "../../../src/scheduler/errors.js";
import {
  ParseOption,
  Parser,
  getRange,
  normalizeFields,
  parseStandard,
  secondsParser,
  standardParser,
} from "../../../src/scheduler/parser.js";
import {
  DAYS_OF_WEEK,
  HOURS,
  MINUTES,
  STAR_BIT,
  SpecSchedule,
  getBits,
} from "../../../src/scheduler/spec-schedule.js";

const FIVE_FIELDS = ParseOption.Minute | ParseOption.Hour | ParseOption.Dom | ParseOption.Month | ParseOption.Dow;

function specSchedule(parser: Parser, spec: string): SpecSchedule {
  const schedule = parser.parse(spec);
  if (!(schedule instanceof SpecSchedule)) {
    throw new Error(`expected a SpecSchedule for ${spec}`);
  }
  return schedule;
}

function parseError(fn: () => unknown): ScheduleParseError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ScheduleParseError) return err;
    throw err;
  }
  throw new Error("expected a ScheduleParseError");
}

describe("getRange", () => {
  it.each([
    ["5", MINUTES, 1n << 5n],
    ["0-3", MINUTES, 0b1111n],
    ["0-6/2", MINUTES, 0b1010101n],
    ["5/20", MINUTES, (1n << 5n) | (1n << 25n) | (1n << 45n)],
    ["*", HOURS, getBits(0, 23, 1) | STAR_BIT],
    ["*/2", HOURS, getBits(0, 23, 2)],
    ["?", DAYS_OF_WEEK, getBits(0, 6, 1) | STAR_BIT],
    ["mon-fri", DAYS_OF_WEEK, getBits(1, 5, 1)],
    ["SUN", DAYS_OF_WEEK, 1n],
  ])("%s", (expr, bounds, expected) => {
    expect(getRange(expr, bounds)).toBe(expected);
  });

  it.each([
    ["1-2-3", "too many hyphens: 1-2-3"],
    ["*/2/3", "too many slashes: */2/3"],
    ["x", "failed to parse int from x: invalid syntax"],
    ["60", "end of range (60) above maximum (59): 60"],
    ["5-3", "beginning of range (5) beyond end of range (3): 5-3"],
    ["*/0", "step of range should be a positive number: */0"],
  ])("rejects %s", (expr, message) => {
    expect(() => getRange(expr, MINUTES)).toThrow(message);
  });
});

describe("normalizeFields", () => {
  it("fills fields the options leave out with defaults", () => {
    expect(normalizeFields(["15", "*/3"], ParseOption.Dom | ParseOption.Month)).toEqual([
      "0",
      "0",
      "0",
      "15",
      "*/3",
      "*",
    ]);
  });

  it("prepends a missing optional seconds field", () => {
    expect(normalizeFields(["5", "*", "*", "*", "*"], ParseOption.SecondOptional | FIVE_FIELDS)).toEqual([
      "0",
      "5",
      "*",
      "*",
      "*",
      "*",
    ]);
    expect(normalizeFields(["30", "5", "*", "*", "*", "*"], ParseOption.SecondOptional | FIVE_FIELDS)).toEqual([
      "30",
      "5",
      "*",
      "*",
      "*",
      "*",
    ]);
  });

  it("appends a missing optional day of week", () => {
    const options = ParseOption.Minute | ParseOption.Hour | ParseOption.Dom | ParseOption.Month | ParseOption.DowOptional;
    expect(normalizeFields(["0", "9", "1", "*"], options)).toEqual(["0", "0", "9", "1", "*", "*"]);
  });

  it("reports the wrong number of fields", () => {
    expect(() => normalizeFields(["1", "2", "3"], FIVE_FIELDS)).toThrow("expected exactly 5 fields, found 3: [1 2 3]");
    expect(() => normalizeFields(["a", "b", "c", "d"], ParseOption.SecondOptional | FIVE_FIELDS)).toThrow(
      "expected 5 to 6 fields, found 4: [a b c d]",
    );
  });
});

describe("Parser", () => {
  it("refuses more than one optional field", () => {
    expect(() => new Parser(ParseOption.SecondOptional | ParseOption.DowOptional | FIVE_FIELDS)).toThrow(
      ConfigurationError,
    );
  });

  it("parses a standard spec with second fixed at zero", () => {
    const schedule = specSchedule(standardParser, "5 * * * *");
    expect(schedule.second).toBe(1n);
    expect(schedule.minute).toBe(1n << 5n);
    expect(schedule.hour).toBe(getBits(0, 23, 1) | STAR_BIT);
    expect(schedule.timezone).toBeUndefined();
  });

  it("accepts month and weekday names in any case", () => {
    const schedule = specSchedule(standardParser, "0 0 * JAN-mar Sun");
    expect(schedule.month).toBe(0b1110n);
    expect(schedule.dow).toBe(1n);
  });

  it("reads a TZ= or CRON_TZ= prefix", () => {
    expect(specSchedule(standardParser, "TZ=UTC 0 9 * * *").timezone).toBe("UTC");
    expect(specSchedule(standardParser, "CRON_TZ=Asia/Tokyo 0 9 * * *").timezone).toBe("Asia/Tokyo");
  });

  it("rejects an unknown zone", () => {
    expect(() => standardParser.parse("TZ=Mars/Olympus * * * * *")).toThrow(
      "provided bad location Mars/Olympus: unknown time zone Mars/Olympus",
    );
  });

  it("rejects an empty spec", () => {
    expect(() => standardParser.parse("")).toThrow("empty spec string");
  });

  it("reports field errors against the whole spec", () => {
    const err = parseError(() => standardParser.parse("60 * * * *"));
    expect(err.message).toBe("end of range (60) above maximum (59): 60");
    expect(err.spec).toBe("60 * * * *");
  });

  it("reports a field count error", () => {
    expect(() => parseStandard("* * *")).toThrow("expected exactly 5 fields, found 3: [* * *]");
  });

  describe("descriptors", () => {
    it("treats @hourly like its six-field form", () => {
      expect(secondsParser.parse("@hourly")).toEqual(secondsParser.parse("0 0 * * * *"));
    });

    it("treats @daily and @midnight alike", () => {
      expect(standardParser.parse("@midnight")).toEqual(standardParser.parse("@daily"));
      expect(standardParser.parse("@daily")).toEqual(standardParser.parse("0 0 * * *"));
    });

    it("builds @yearly from the first of January", () => {
      const schedule = standardParser.parse("@annually");
      expect(schedule.next(new Date("2024-06-01T00:00:00Z"), "UTC")?.toISOString()).toBe(
        "2025-01-01T00:00:00.000Z",
      );
    });

    it("builds @weekly from Sunday midnight", () => {
      // 2024-01-03 is a Wednesday.
      const schedule = standardParser.parse("@weekly");
      expect(schedule.next(new Date("2024-01-03T12:00:00Z"), "UTC")?.toISOString()).toBe(
        "2024-01-07T00:00:00.000Z",
      );
    });

    it("keeps a zone prefix on a descriptor", () => {
      const schedule = specSchedule(standardParser, "TZ=Europe/Berlin @monthly");
      expect(schedule.timezone).toBe("Europe/Berlin");
      expect(schedule.next(new Date("2024-01-15T00:00:00Z"), "UTC")?.toISOString()).toBe(
        "2024-01-31T23:00:00.000Z",
      );
    });

    it("builds an interval from @every", () => {
      const schedule = standardParser.parse("@every 1h30m");
      expect(schedule).toBeInstanceOf(ConstantDelaySchedule);
      expect(schedule).toEqual(new ConstantDelaySchedule(5_400_000));
    });

    it("raises a sub-second @every to one second", () => {
      expect(standardParser.parse("@every 500ms")).toEqual(new ConstantDelaySchedule(1000));
    });

    it("reports a bad @every duration", () => {
      expect(() => standardParser.parse("@every abc")).toThrow(
        'failed to parse duration @every abc: invalid duration "abc"',
      );
    });

    it("rejects an @every duration too long to represent", () => {
      expect(() => standardParser.parse("@every 3000000h")).toThrow(
        'failed to parse duration @every 3000000h: invalid duration "3000000h"',
      );
    });

    it("reports an unknown descriptor", () => {
      expect(() => standardParser.parse("@fortnightly")).toThrow("unrecognized descriptor: @fortnightly");
    });

    it("rejects descriptors when not enabled", () => {
      expect(() => new Parser(FIVE_FIELDS).parse("@daily")).toThrow("parser does not accept descriptors: @daily");
    });
  });
});
