/**
 * azdo-config - Azure DevOps CLI configuration
 *
 * YAML-backed general and per-organization settings with comment-preserving
 * round trips, token resolution and aliases.
 */

export * from "./lib/config/index.js";

export { createCommandContext } from "./lib/context.js";
export type { CommandContext, CommandContextOptions } from "./lib/context.js";

export { createLogger, nullLogger } from "./lib/logger.js";
export type { Logger, LoggerOptions, LogLevel } from "./lib/logger.js";
