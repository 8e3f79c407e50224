import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { z } from "zod";

import type { CronLogger } from "./log.js";
import { Chain, delayIfStillRunning, recover, skipIfStillRunning } from "./scheduler/chain.js";
import { ParseOption, Parser } from "./scheduler/parser.js";
import { Scheduler } from "./scheduler/scheduler.js";
import type { JobWrapper } from "./scheduler/types.js";
import { isValidTimezone } from "./utils/zoned-time.js";

const DEFAULT_CONFIG_PATH = "tickwork.config.json";

const WrapperNameSchema = z.enum(["recover", "skip", "delay"]);

export type WrapperName = z.infer<typeof WrapperNameSchema>;

const JobSchema = z.object({
  name: z.string().min(1),
  schedule: z.string().min(1),
  command: z.string().min(1),
  cwd: z.string().optional(),
  timeoutMs: z.number().int().positive().default(60_000),
  enabled: z.boolean().default(true),
});

export type JobConfig = z.infer<typeof JobSchema>;

const LoggingSchema = z
  .object({
    level: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).default("info"),
    filePath: z.string().optional(),
  })
  .default({});

const ConfigSchema = z.object({
  timezone: z
    .string()
    .optional()
    .refine((value) => value === undefined || isValidTimezone(value), {
      message: "timezone must be an IANA zone name such as Europe/Berlin",
    }),
  seconds: z.boolean().default(false),
  descriptors: z.boolean().default(true),
  chain: z.array(WrapperNameSchema).default(["recover"]),
  logging: LoggingSchema,
  jobs: z.array(JobSchema).default([]),
});

export type TickworkConfig = z.infer<typeof ConfigSchema> & {
  resolved: {
    configDir: string;
    logFilePath?: string;
  };
};

export async function loadConfig(explicitPath?: string): Promise<TickworkConfig> {
  const configPath = resolveConfigPath(explicitPath);
  const raw = await fs.readFile(configPath, "utf-8");
  const parsed: unknown = JSON.parse(raw);
  return parseConfig(parsed, path.dirname(configPath));
}

export function resolveConfigPath(explicitPath?: string): string {
  const envPath = process.env.TICKWORK_CONFIG?.trim();
  const pathToUse = explicitPath?.trim() || envPath || DEFAULT_CONFIG_PATH;
  return path.resolve(pathToUse);
}

/**
 * Validate a raw config object; relative paths resolve against `configDir`.
 */
export function parseConfig(raw: unknown, configDir: string): TickworkConfig {
  const base = ConfigSchema.parse(raw);
  const filePath = base.logging.filePath?.trim();

  return {
    ...base,
    jobs: base.jobs.map((job) => ({
      ...job,
      cwd: job.cwd ? resolveUserPath(job.cwd, configDir) : configDir,
    })),
    resolved: {
      configDir,
      logFilePath: filePath ? resolveUserPath(filePath, configDir) : undefined,
    },
  };
}

/**
 * Parser for the configured field layout: five fields, or six with a leading
 * seconds field, with descriptors unless disabled.
 */
export function parserFromConfig(cfg: Pick<TickworkConfig, "seconds" | "descriptors">): Parser {
  let options = ParseOption.Minute | ParseOption.Hour | ParseOption.Dom | ParseOption.Month | ParseOption.Dow;
  if (cfg.seconds) options |= ParseOption.Second;
  if (cfg.descriptors) options |= ParseOption.Descriptor;
  return new Parser(options);
}

export function chainFromConfig(names: readonly WrapperName[], logger: CronLogger): Chain {
  const wrappers = names.map((name): JobWrapper => {
    switch (name) {
      case "recover":
        return recover(logger);
      case "skip":
        return skipIfStillRunning(logger);
      case "delay":
        return delayIfStillRunning(logger);
    }
  });
  return new Chain(...wrappers);
}

export function schedulerFromConfig(cfg: TickworkConfig, logger: CronLogger): Scheduler {
  return new Scheduler({
    timezone: cfg.timezone,
    parser: parserFromConfig(cfg),
    chain: chainFromConfig(cfg.chain, logger),
    logger,
  });
}

function resolveUserPath(value: string, baseDir: string): string {
  const trimmed = value.trim();
  if (trimmed.startsWith("~")) {
    return path.join(os.homedir(), trimmed.slice(1));
  }
  return path.resolve(baseDir, trimmed);
}
