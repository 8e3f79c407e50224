import fs from "node:fs";
import path from "node:path";

import pino, { multistream } from "pino";

export type Logger = pino.Logger;

/**
 * Sink the scheduler reports through. `info` carries routine lifecycle
 * events, `error` carries faults.
 */
export interface CronLogger {
  info(message: string, fields?: Record<string, unknown>): void;
  error(err: Error, message: string, fields?: Record<string, unknown>): void;
}

/**
 * Console logger at `level`. With console output off it is silent.
 */
export function createLogger(level: string, opts?: { console?: boolean }): Logger {
  return pino({ level: opts?.console === false ? "silent" : level });
}

/**
 * Logger for long-running commands. With a `filePath` it also writes to that
 * file; `close` flushes and ends the file stream.
 */
export function createLoggerWithCleanup(
  level: string,
  filePath?: string,
  opts?: { console?: boolean },
): { logger: Logger; close: () => Promise<void> } {
  const consoleEnabled = opts?.console !== false;
  if (!filePath) {
    return { logger: createLogger(level, opts), close: async () => {} };
  }

  const dir = path.dirname(filePath);
  try {
    fs.mkdirSync(dir, { recursive: true });
  } catch (err) {
    throw new Error(`Cannot create log directory: ${dir}`, { cause: err });
  }

  const dest = pino.destination({ dest: filePath, sync: true });
  const logger = consoleEnabled
    ? pino(
        { level: "trace" },
        multistream([
          { level, stream: process.stdout },
          { level, stream: dest },
        ]),
      )
    : pino({ level }, dest);

  return {
    logger,
    close: () =>
      new Promise<void>((resolve) => {
        const timeout = setTimeout(resolve, 2000);
        timeout.unref();
        dest.once("close", () => {
          clearTimeout(timeout);
          resolve();
        });
        dest.flushSync();
        dest.end();
      }),
  };
}

/**
 * Dates in scheduler fields are logged as ISO-8601 strings.
 */
function formatFields(fields: Record<string, unknown> | undefined): Record<string, unknown> {
  if (!fields) return {};
  const formatted: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(fields)) {
    formatted[key] = value instanceof Date ? value.toISOString() : value;
  }
  return formatted;
}

/**
 * Adapt a pino logger to the scheduler's logging interface.
 */
export function pinoCronLogger(logger: Logger): CronLogger {
  return {
    info(message, fields) {
      logger.info(formatFields(fields), message);
    },
    error(err, message, fields) {
      logger.error({ err, ...formatFields(fields) }, message);
    },
  };
}

/**
 * Default scheduler logger: a fresh pino instance per call, reporting errors
 * only. Pass `pinoCronLogger(createLogger("info"))` for lifecycle events.
 */
export function createDefaultCronLogger(): CronLogger {
  return pinoCronLogger(createLogger("error").child({ component: "cron" }));
}

/** Drops every message. */
export const discardLogger: CronLogger = {
  info() {},
  error() {},
};
