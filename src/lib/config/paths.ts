/**
 * Config directory resolution
 *
 * Precedence: AZDO_CONFIG_DIR, XDG_CONFIG_HOME, AppData (Windows only), HOME.
 */

import { homedir } from "os";
import { join } from "path";

export const CONFIG_DIR_ENV = "AZDO_CONFIG_DIR";
export const XDG_CONFIG_HOME_ENV = "XDG_CONFIG_HOME";
export const APP_DATA_ENV = "AppData";

export const GENERAL_CONFIG_FILE = "config.yml";
export const ORGANIZATIONS_CONFIG_FILE = "organizations.yml";

export interface ConfigPaths {
  /** File holding the general settings tree */
  general: string;
  /** File holding one entry per organization */
  organizations: string;
}

export interface ConfigDirOptions {
  env?: NodeJS.ProcessEnv;
  platform?: NodeJS.Platform;
  homeDir?: string;
}

export function configDir(options: ConfigDirOptions = {}): string {
  const env = options.env ?? process.env;
  const platform = options.platform ?? process.platform;

  const override = env[CONFIG_DIR_ENV];
  if (override) {
    return override;
  }
  const xdgConfigHome = env[XDG_CONFIG_HOME_ENV];
  if (xdgConfigHome) {
    return join(xdgConfigHome, "azdo");
  }
  const appData = env[APP_DATA_ENV];
  if (platform === "win32" && appData) {
    return join(appData, "AzDO CLI");
  }
  return join(options.homeDir ?? homedir(), ".config", "azdo");
}

export function configPaths(options: ConfigDirOptions = {}): ConfigPaths {
  const dir = configDir(options);
  return {
    general: join(dir, GENERAL_CONFIG_FILE),
    organizations: join(dir, ORGANIZATIONS_CONFIG_FILE),
  };
}
