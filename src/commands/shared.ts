/**
 * Helpers shared by the config, auth and alias commands
 */

import { colors } from "../lib/cli-ui.js";
import type { AuthResolver } from "../lib/config/auth.js";
import { errorMessage } from "../lib/config/errors.js";
import type { ConfigStore } from "../lib/config/store.js";
import { shouldUseInteractiveMode } from "../lib/tty.js";

/**
 * Print a failure and mark the process as failed
 */
export function reportError(error: unknown): void {
  console.error(colors.error(errorMessage(error)));
  process.exitCode = 1;
}

/**
 * Prompts are allowed on an interactive terminal unless `prompt` is disabled
 */
export function canPrompt(
  store: ConfigStore,
  env: NodeJS.ProcessEnv = process.env,
): boolean {
  if (store.getOrDefault(["prompt"]) === "disabled") {
    return false;
  }
  return shouldUseInteractiveMode(env);
}

/**
 * Check that an organization is configured, reporting it when not
 */
export function requireOrganization(
  auth: AuthResolver,
  organizationName: string,
): boolean {
  if (auth.getOrganizations().includes(organizationName.toLowerCase())) {
    return true;
  }
  console.error(
    `You are not logged in to the Azure DevOps organization "${organizationName}". ` +
      `Run ${colors.bold("azdo auth login")} to authenticate.`,
  );
  process.exitCode = 1;
  return false;
}

export async function readStdin(
  stream: NodeJS.ReadableStream = process.stdin,
): Promise<string> {
  const chunks: string[] = [];
  stream.setEncoding("utf-8");
  for await (const chunk of stream) {
    chunks.push(String(chunk));
  }
  return chunks.join("");
}
