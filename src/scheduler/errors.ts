/**
 * Scheduler Errors
 */

/**
 * A schedule specification could not be parsed. Nothing from the
 * specification has been applied.
 */
export class ScheduleParseError extends Error {
  readonly code = "SCHEDULE_PARSE_ERROR";
  readonly spec: string;

  constructor(message: string, spec: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ScheduleParseError";
    this.spec = spec;
  }
}

/**
 * A programming error in how the scheduler was put together, such as a
 * parser configured with more than one optional field.
 */
export class ConfigurationError extends Error {
  readonly code = "CONFIGURATION_ERROR";

  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/**
 * Normalise anything thrown into an Error.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
