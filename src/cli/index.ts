/**
 * CLI Module - Exports for the CLI layer
 */

export { createProgram, runCli } from "./cli-app.js";
export { OutputFormatter } from "./output-formatter.js";
export { CliError, ValidationError, formatError, withErrorHandling } from "./error-handler.js";

export { scheduleNext, upcomingActivations } from "./commands/schedule/next.js";
export { scheduleValidate } from "./commands/schedule/validate.js";
export { scheduleRun, waitForShutdownSignal } from "./commands/schedule/run.js";
