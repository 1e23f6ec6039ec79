/**
 * Command context
 *
 * Built once by the CLI entry point and handed to every command. The config
 * store is loaded on first use and cached for the rest of the process: the
 * first caller pays the load and sees any load error, later callers get the
 * same store or the same rejection.
 */

import { AliasConfig } from "./config/aliases.js";
import { AuthResolver } from "./config/auth.js";
import { configPaths, type ConfigPaths } from "./config/paths.js";
import {
  createKeyringBackend,
  type SecretBackend,
} from "./config/secret-backend.js";
import { ConfigStore } from "./config/store.js";
import { createLogger, type Logger } from "./logger.js";

export interface CommandContextOptions {
  env?: NodeJS.ProcessEnv;
  platform?: NodeJS.Platform;
  /** Config file locations (default: resolved from the environment) */
  paths?: ConfigPaths;
  logger?: Logger;
  /** Secret store factory (default: the OS keyring) */
  secrets?: () => Promise<SecretBackend | null>;
}

export interface CommandContext {
  readonly logger: Logger;
  readonly env: NodeJS.ProcessEnv;
  config(): Promise<ConfigStore>;
  auth(): Promise<AuthResolver>;
  aliases(): Promise<AliasConfig>;
}

function once<T>(load: () => Promise<T>): () => Promise<T> {
  let cached: Promise<T> | null = null;
  return () => {
    if (!cached) {
      cached = load();
    }
    return cached;
  };
}

export function createCommandContext(
  options: CommandContextOptions = {},
): CommandContext {
  const env = options.env ?? process.env;
  const platform = options.platform ?? process.platform;
  const logger = options.logger ?? createLogger();
  const paths = options.paths ?? configPaths({ env, platform });
  const secretsFactory =
    options.secrets ?? (() => createKeyringBackend(logger.child("keyring")));

  const config = once(() => ConfigStore.load(paths));
  const secrets = once(secretsFactory);

  const auth = once(async () => {
    const [store, backend] = await Promise.all([config(), secrets()]);
    return new AuthResolver(store, {
      secrets: backend,
      env,
      platform,
      logger: logger.child("auth"),
    });
  });

  const aliases = once(async () => new AliasConfig(await config()));

  return { logger, env, config, auth, aliases };
}
