/**
 * azdo config - Read and update configuration values
 *
 * - get:  print a value, optionally scoped to an organization
 * - set:  update a value, or with --remove drop an organization override
 * - list: print every known key with its effective value
 */

import { colors } from "../lib/cli-ui.js";
import type { CommandContext } from "../lib/context.js";
import { isConfigError } from "../lib/config/errors.js";
import {
  CONFIG_OPTIONS,
  isKnownConfigKey,
  validateConfigValue,
} from "../lib/config/options.js";
import { ORGANIZATIONS, PAT } from "../lib/config/store.js";
import { reportError, requireOrganization } from "./shared.js";

export interface ConfigGetOptions {
  /** Read the per-organization value */
  organization?: string;
}

export interface ConfigSetOptions {
  /** Write the per-organization value */
  organization?: string;
  /** Remove the per-organization value so the default applies again */
  remove?: boolean;
}

export interface ConfigListOptions {
  organization?: string;
  /** Include keys that have no value */
  all?: boolean;
}

function keyPath(key: string, organization?: string): string[] {
  return organization
    ? [ORGANIZATIONS, organization.toLowerCase(), key]
    : [key];
}

export async function configGetCommand(
  ctx: CommandContext,
  key: string,
  options: ConfigGetOptions = {},
): Promise<void> {
  const store = await ctx.config();
  const { organization } = options;

  if (organization) {
    const auth = await ctx.auth();
    if (!requireOrganization(auth, organization)) {
      return;
    }
    // Tokens may live in the secret store rather than the file
    if (key === PAT) {
      try {
        console.log(await auth.getToken(organization));
      } catch (error) {
        reportError(error);
      }
      return;
    }
  }

  const value = store.getOrDefault(keyPath(key, organization));
  if (value !== "") {
    console.log(value);
  }
}

export async function configSetCommand(
  ctx: CommandContext,
  key: string,
  value: string | undefined,
  options: ConfigSetOptions = {},
): Promise<void> {
  const store = await ctx.config();
  const { organization, remove = false } = options;

  if (remove && !organization) {
    reportError(
      "configuration values can only be removed for organizations. Please specify the organization via -o",
    );
    return;
  }

  if (!isKnownConfigKey(key)) {
    console.error(colors.warning(`⚠ "${key}" is not a known configuration key`));
  }

  if (organization) {
    const auth = await ctx.auth();
    if (!requireOrganization(auth, organization)) {
      return;
    }
  }

  if (remove) {
    try {
      store.remove(keyPath(key, organization));
    } catch (error) {
      if (!isConfigError(error, "key-not-found")) throw error;
      // Nothing changed, nothing to write
      return;
    }
  } else {
    if (value === undefined) {
      reportError(`a value is required to set "${key}"`);
      return;
    }
    try {
      validateConfigValue(key, value);
    } catch (error) {
      reportError(error);
      return;
    }
    store.set(keyPath(key, organization), value);
  }

  await store.write();
}

export async function configListCommand(
  ctx: CommandContext,
  options: ConfigListOptions = {},
): Promise<void> {
  const store = await ctx.config();
  const { organization, all = false } = options;

  if (organization) {
    const auth = await ctx.auth();
    if (!requireOrganization(auth, organization)) {
      return;
    }
  }

  for (const option of CONFIG_OPTIONS) {
    const value = store.getOrDefault(keyPath(option.key, organization));
    if (value !== "" || all) {
      console.log(`${option.key}=${value}`);
    }
  }
}
