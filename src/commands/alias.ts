/**
 * azdo alias - Manage command shortcuts
 */

import { colors } from "../lib/cli-ui.js";
import type { CommandContext } from "../lib/context.js";
import { isConfigError } from "../lib/config/errors.js";
import { reportError } from "./shared.js";

export async function aliasListCommand(ctx: CommandContext): Promise<void> {
  const aliases = await ctx.aliases();
  const entries = Object.entries(aliases.all());

  if (entries.length === 0) {
    console.error(colors.muted("no aliases configured"));
    return;
  }
  for (const [name, expansion] of entries) {
    console.log(`${name}: ${expansion}`);
  }
}

export async function aliasSetCommand(
  ctx: CommandContext,
  name: string,
  expansion: string,
): Promise<void> {
  const store = await ctx.config();
  const aliases = await ctx.aliases();

  aliases.add(name, expansion);
  await store.write();
  console.log(colors.success(`✓ Added alias ${name}: ${expansion}`));
}

export async function aliasDeleteCommand(
  ctx: CommandContext,
  name: string,
): Promise<void> {
  const store = await ctx.config();
  const aliases = await ctx.aliases();

  try {
    aliases.delete(name);
  } catch (error) {
    if (!isConfigError(error, "key-not-found")) throw error;
    reportError(`no such alias ${name}`);
    return;
  }
  await store.write();
  console.log(colors.success(`✓ Deleted alias ${name}`));
}
