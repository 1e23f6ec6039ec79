#!/usr/bin/env node
/**
 * azdo CLI - Azure DevOps configuration and credentials
 *
 * Manages the general config file, per-organization overrides, stored tokens
 * and command aliases.
 */

import { Command } from "commander";
import { fileURLToPath } from "url";
import { dirname, resolve } from "path";
import { readFileSync } from "fs";
import { configureUI } from "../src/lib/cli-ui.js";
import { createCommandContext } from "../src/lib/context.js";
import { createLogger } from "../src/lib/logger.js";
import {
  configGetCommand,
  configListCommand,
  configSetCommand,
} from "../src/commands/config.js";
import {
  authLoginCommand,
  authLogoutCommand,
  authStatusCommand,
  authTokenCommand,
} from "../src/commands/auth.js";
import {
  aliasDeleteCommand,
  aliasListCommand,
  aliasSetCommand,
} from "../src/commands/alias.js";
import { reportError } from "../src/commands/shared.js";

// Works from both source (bin/) and compiled (dist/bin/) locations
function getVersion(): string {
  let dir = dirname(fileURLToPath(import.meta.url));
  while (dir !== dirname(dir)) {
    const candidate = resolve(dir, "package.json");
    try {
      const pkg: { name?: unknown; version?: unknown } = JSON.parse(
        readFileSync(candidate, "utf-8"),
      );
      if (pkg.name === "azdo-config" && typeof pkg.version === "string") {
        return pkg.version;
      }
    } catch {
      // Not found, continue searching
    }
    dir = dirname(dir);
  }
  return "0.0.0";
}

/**
 * Wrap a command so failures print a message and set the exit code
 */
function run<A extends unknown[]>(
  command: (...args: A) => Promise<void>,
): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await command(...args);
    } catch (error) {
      reportError(error);
    }
  };
}

configureUI({ noColor: process.argv.includes("--no-color") });

const ctx = createCommandContext({
  logger: createLogger({
    verbose: process.argv.includes("--verbose") || process.argv.includes("-v"),
  }),
});

const program = new Command();

program
  .name("azdo")
  .description("Work with Azure DevOps configuration and credentials")
  .version(getVersion())
  .option("--no-color", "Disable colored output")
  .option("-v, --verbose", "Print debug diagnostics to stderr");

const configCmd = program
  .command("config")
  .description("Manage configuration for azdo");

configCmd
  .command("get")
  .description("Print the value of a configuration key")
  .argument("<key>", "Configuration key")
  .option("-o, --organization <name>", "Get the per-organization value")
  .action(
    run((key: string, options: { organization?: string }) =>
      configGetCommand(ctx, key, options),
    ),
  );

configCmd
  .command("set")
  .description("Update a configuration key")
  .argument("<key>", "Configuration key")
  .argument("[value]", "New value")
  .option("-o, --organization <name>", "Set the per-organization value")
  .option("-r, --remove", "Remove the per-organization value")
  .action(
    run(
      (
        key: string,
        value: string | undefined,
        options: { organization?: string; remove?: boolean },
      ) => configSetCommand(ctx, key, value, options),
    ),
  );

configCmd
  .command("list")
  .description("Print every configuration key and its value")
  .option("-o, --organization <name>", "List per-organization values")
  .option("--all", "Include keys without a value")
  .action(
    run((options: { organization?: string; all?: boolean }) =>
      configListCommand(ctx, options),
    ),
  );

const authCmd = program
  .command("auth")
  .description("Authenticate azdo with Azure DevOps organizations");

authCmd
  .command("login")
  .description("Store credentials for an organization")
  .option("-o, --organization <name>", "Organization name")
  .option("--url <url>", "Organization URL")
  .option("--token <token>", "Personal access token")
  .option("--with-token", "Read the token from standard input")
  .option("-p, --git-protocol <protocol>", "Git protocol (https, ssh)")
  .option(
    "--insecure-storage",
    "Save the token in plaintext instead of the system keyring",
  )
  .action(
    run(
      (options: {
        organization?: string;
        url?: string;
        token?: string;
        withToken?: boolean;
        gitProtocol?: string;
        insecureStorage?: boolean;
      }) => authLoginCommand(ctx, options),
    ),
  );

authCmd
  .command("logout")
  .description("Remove stored credentials for an organization")
  .option("-o, --organization <name>", "Organization name")
  .action(
    run((options: { organization?: string }) =>
      authLogoutCommand(ctx, options),
    ),
  );

authCmd
  .command("status")
  .description("Show configured organizations and their tokens")
  .option("-o, --organization <name>", "Only show this organization")
  .option("-t, --show-token", "Display tokens instead of masking them")
  .action(
    run((options: { organization?: string; showToken?: boolean }) =>
      authStatusCommand(ctx, options),
    ),
  );

authCmd
  .command("token")
  .description("Print the token for an organization")
  .option("-o, --organization <name>", "Organization name")
  .action(
    run((options: { organization?: string }) => authTokenCommand(ctx, options)),
  );

const aliasCmd = program
  .command("alias")
  .description("Create command shortcuts");

aliasCmd
  .command("list")
  .description("List configured aliases")
  .action(run(() => aliasListCommand(ctx)));

aliasCmd
  .command("set")
  .description("Create or replace an alias")
  .argument("<name>", "Alias name")
  .argument("<expansion>", "Command the alias expands to")
  .action(
    run((name: string, expansion: string) =>
      aliasSetCommand(ctx, name, expansion),
    ),
  );

aliasCmd
  .command("delete")
  .description("Delete an alias")
  .argument("<name>", "Alias name")
  .action(run((name: string) => aliasDeleteCommand(ctx, name)));

await program.parseAsync();
