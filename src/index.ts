export * from "./scheduler/index.js";
export { createLogger, pinoCronLogger, createDefaultCronLogger, discardLogger } from "./log.js";
export type { CronLogger, Logger } from "./log.js";
export { loadConfig, resolveConfigPath, parseConfig, parserFromConfig, chainFromConfig, schedulerFromConfig } from "./config.js";
export type { TickworkConfig, JobConfig } from "./config.js";
