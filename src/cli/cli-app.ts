/**
 * CLI App - Commander.js setup for the tickwork commands
 */

import { Command } from "commander";

import { loadConfig } from "../config.js";
import { withErrorHandling, formatError } from "./error-handler.js";
import { scheduleNext, type ScheduleNextOptions } from "./commands/schedule/next.js";
import { scheduleRun } from "./commands/schedule/run.js";
import { scheduleValidate, type ScheduleValidateOptions } from "./commands/schedule/validate.js";

type GlobalOptions = {
  config?: string;
  json?: boolean;
  quiet?: boolean;
};

/**
 * Create and configure the CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name("tickwork")
    .description("Run shell commands on cron schedules")
    .version("0.1.0")
    .option("-c, --config <path>", "Path to tickwork.config.json")
    .option("--json", "Output in JSON format")
    .option("--quiet", "Suppress non-essential output");

  const globals = () => program.opts<GlobalOptions>();

  program
    .command("next <spec>")
    .description("Show the upcoming activations of a schedule")
    .option("-n, --count <count>", "Number of activations to show", "5")
    .option("--from <time>", "Start from this ISO-8601 time instead of now")
    .option("--tz <zone>", "Evaluate in this time zone")
    .option("--seconds", "Spec has a leading seconds field")
    .action(withErrorHandling(async (spec: string, options: ScheduleNextOptions) => {
      await scheduleNext(spec, { ...options, ...globals() });
    }));

  program
    .command("validate <spec>")
    .description("Check that a schedule parses")
    .option("--seconds", "Spec has a leading seconds field")
    .action(withErrorHandling(async (spec: string, options: ScheduleValidateOptions) => {
      await scheduleValidate(spec, { ...options, ...globals() });
    }));

  program
    .command("run")
    .description("Run the configured jobs until interrupted")
    .action(withErrorHandling(async () => {
      const { config, quiet } = globals();
      const cfg = await loadConfig(config);
      await scheduleRun(cfg, { quiet });
    }));

  return program;
}

/**
 * Run the CLI
 */
export async function runCli(args: string[] = process.argv): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(args);
  } catch (err) {
    console.error(formatError(err));
    process.exitCode = 1;
  }
}

export default createProgram;
