/**
 * Error Handler - Consistent error reporting for CLI commands
 */

import chalk from "chalk";
import { ZodError } from "zod";

import { ConfigurationError, ScheduleParseError } from "../scheduler/errors.js";

/**
 * Base CLI error class
 */
export class CliError extends Error {
  readonly code: string;
  readonly details?: Record<string, unknown>;
  readonly suggestion?: string;

  constructor(
    message: string,
    options: { code: string; details?: Record<string, unknown>; suggestion?: string } = { code: "CLI_ERROR" },
  ) {
    super(message);
    this.name = "CliError";
    this.code = options.code;
    this.details = options.details;
    this.suggestion = options.suggestion;
  }
}

/**
 * Validation error (invalid input, etc)
 */
export class ValidationError extends CliError {
  constructor(message: string, suggestion?: string) {
    super(message, { code: "VALIDATION_ERROR", suggestion });
    this.name = "ValidationError";
  }
}

/**
 * Error codes with user-friendly messages
 */
const ERROR_MESSAGES: Record<string, { title: string; help: string }> = {
  CONFIG_ERROR: {
    title: "Configuration Error",
    help: "Check your tickwork.config.json file for issues.",
  },
  SCHEDULE_PARSE_ERROR: {
    title: "Invalid Schedule",
    help: 'Use "minute hour day-of-month month day-of-week" (e.g. "0 9 * * MON-FRI") or a descriptor such as @daily.',
  },
  VALIDATION_ERROR: {
    title: "Validation Error",
    help: "Check the command arguments and try again.",
  },
  CLI_ERROR: {
    title: "CLI Error",
    help: "Run 'tickwork --help' for usage information.",
  },
};

/**
 * Format an error for display
 */
export function formatError(err: unknown, verbose = false): string {
  const lines: string[] = [];

  if (err instanceof CliError) {
    const meta = ERROR_MESSAGES[err.code] ?? ERROR_MESSAGES.CLI_ERROR;
    lines.push(chalk.red.bold(`${meta.title}: `) + err.message);

    if (err.suggestion) {
      lines.push(chalk.yellow("Suggestion: ") + err.suggestion);
    } else {
      lines.push(chalk.dim(`Hint: ${meta.help}`));
    }

    if (verbose && err.details) {
      lines.push(chalk.dim("\nDetails:"));
      lines.push(chalk.dim(JSON.stringify(err.details, null, 2)));
    }
  } else if (err instanceof ScheduleParseError) {
    const meta = ERROR_MESSAGES.SCHEDULE_PARSE_ERROR;
    lines.push(chalk.red.bold(`${meta.title}: `) + err.message);
    lines.push(chalk.dim(`Spec: ${err.spec}`));
    lines.push(chalk.dim(`Hint: ${meta.help}`));
  } else if (err instanceof ZodError || err instanceof ConfigurationError) {
    const meta = ERROR_MESSAGES.CONFIG_ERROR;
    const message =
      err instanceof ZodError
        ? err.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ")
        : err.message;
    lines.push(chalk.red.bold(`${meta.title}: `) + message);
    lines.push(chalk.dim(`Hint: ${meta.help}`));
  } else if (err instanceof Error) {
    lines.push(chalk.red.bold("Error: ") + err.message);

    if (verbose && err.stack) {
      lines.push(chalk.dim("\nStack trace:"));
      lines.push(chalk.dim(err.stack));
    }
  } else {
    lines.push(chalk.red.bold("Error: ") + String(err));
  }

  return lines.join("\n");
}

/**
 * Wrap an async command handler with error handling
 */
export function withErrorHandling<T extends unknown[], R>(
  fn: (...args: T) => Promise<R>,
  options: { verbose?: boolean } = {},
): (...args: T) => Promise<R | undefined> {
  return async (...args: T): Promise<R | undefined> => {
    try {
      return await fn(...args);
    } catch (err) {
      console.error(formatError(err, options.verbose));
      process.exitCode = 1;
      return undefined;
    }
  };
}
