/**
 * Duration literals such as "1h30m", "90s" or "1.5h".
 */

const UNIT_MS: Record<string, number> = {
  ns: 1e-6,
  us: 1e-3,
  "µs": 1e-3, // U+00B5 micro sign
  "μs": 1e-3, // U+03BC Greek mu
  ms: 1,
  s: 1000,
  m: 60_000,
  h: 3_600_000,
};

/** Longest representable duration: 2^63-1 nanoseconds. */
export const MAX_DURATION_MS = 9_223_372_036_854.775807;

const COMPONENT = /^(\d+\.?\d*|\.\d+)([^\d.]*)/;

/**
 * Parse a unit-suffixed duration into milliseconds.
 *
 * Accepts an optional sign followed by one or more `<number><unit>` pairs.
 * A bare "0" is the only literal allowed without a unit. Totals above
 * `MAX_DURATION_MS` are rejected.
 */
export function parseDuration(text: string): number {
  let rest = text;
  let sign = 1;
  if (rest.startsWith("-") || rest.startsWith("+")) {
    sign = rest.startsWith("-") ? -1 : 1;
    rest = rest.slice(1);
  }

  if (rest === "0") return 0;
  if (rest === "") {
    throw new Error(`invalid duration "${text}"`);
  }

  let total = 0;
  while (rest.length > 0) {
    const match = COMPONENT.exec(rest);
    if (!match) {
      throw new Error(`invalid duration "${text}"`);
    }
    const [matched, value, unit] = match;
    if (unit === "") {
      throw new Error(`missing unit in duration "${text}"`);
    }
    const factor = UNIT_MS[unit];
    if (factor === undefined) {
      throw new Error(`unknown unit "${unit}" in duration "${text}"`);
    }
    total += Number(value) * factor;
    if (total > MAX_DURATION_MS) {
      throw new Error(`invalid duration "${text}"`);
    }
    rest = rest.slice(matched.length);
  }

  return sign * total;
}

/**
 * Render milliseconds as "1h30m0s", "2m5s", "1.5s" or "250ms".
 */
export function formatDuration(ms: number): string {
  if (ms === 0) return "0s";

  const sign = ms < 0 ? "-" : "";
  let rest = Math.abs(ms);
  if (rest < 1000) return `${sign}${rest}ms`;

  const hours = Math.floor(rest / 3_600_000);
  rest -= hours * 3_600_000;
  const minutes = Math.floor(rest / 60_000);
  rest -= minutes * 60_000;
  const seconds = `${Number((rest / 1000).toFixed(3))}s`;

  if (hours > 0) return `${sign}${hours}h${minutes}m${seconds}`;
  if (minutes > 0) return `${sign}${minutes}m${seconds}`;
  return `${sign}${seconds}`;
}
