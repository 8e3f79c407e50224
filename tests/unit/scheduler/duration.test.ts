import { describe, it, expect } from "vitest";

import { formatDuration, parseDuration } from "../../../src/scheduler/duration.js";

describe("parseDuration", () => {
  it.each([
    ["1h30m", 5_400_000],
    ["1.5h", 5_400_000],
    ["90s", 90_000],
    ["250ms", 250],
    ["-2m", -120_000],
    ["+10s", 10_000],
    ["0", 0],
  ])("%s", (text, expected) => {
    expect(parseDuration(text)).toBe(expected);
  });

  it("accepts sub-millisecond units", () => {
    expect(parseDuration("1500us")).toBeCloseTo(1.5);
    expect(parseDuration("2000000ns")).toBeCloseTo(2);
  });

  it("rejects an empty string", () => {
    expect(() => parseDuration("")).toThrow('invalid duration ""');
  });

  it("rejects a number without a unit", () => {
    expect(() => parseDuration("10")).toThrow('missing unit in duration "10"');
  });

  it("rejects an unknown unit", () => {
    expect(() => parseDuration("5d")).toThrow('unknown unit "d" in duration "5d"');
  });

  it("accepts durations up to the longest representable one", () => {
    expect(parseDuration("2562047h")).toBe(9_223_369_200_000);
  });

  it("rejects durations past the longest representable one", () => {
    expect(() => parseDuration("2562048h")).toThrow('invalid duration "2562048h"');
    expect(() => parseDuration("3000000000h")).toThrow('invalid duration "3000000000h"');
  });

  it("rejects text that is not a number", () => {
    expect(() => parseDuration("soon")).toThrow('invalid duration "soon"');
  });
});

describe("formatDuration", () => {
  it.each([
    [0, "0s"],
    [250, "250ms"],
    [1500, "1.5s"],
    [125_000, "2m5s"],
    [5_400_000, "1h30m0s"],
    [-1500, "-1.5s"],
  ])("%d", (ms, expected) => {
    expect(formatDuration(ms)).toBe(expected);
  });
});
