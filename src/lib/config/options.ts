/**
 * Known configuration keys
 *
 * Each option carries its default and, where the value is constrained, a zod
 * schema listing the accepted values.
 */

import { z } from "zod";
import { ConfigError } from "./errors.js";

export interface ConfigOption {
  key: string;
  description: string;
  defaultValue: string;
  allowedValues?: readonly string[];
}

export const GIT_PROTOCOLS = ["https", "ssh"] as const;
export const PROMPT_MODES = ["enabled", "disabled"] as const;

export const GitProtocolSchema = z.enum(GIT_PROTOCOLS);
export const PromptModeSchema = z.enum(PROMPT_MODES);

export type GitProtocol = z.infer<typeof GitProtocolSchema>;

export const CONFIG_OPTIONS: readonly ConfigOption[] = [
  {
    key: "git_protocol",
    description: "the protocol to use for git clone and push operations",
    defaultValue: "https",
    allowedValues: GIT_PROTOCOLS,
  },
  {
    key: "editor",
    description: "the text editor program to use for authoring text",
    defaultValue: "",
  },
  {
    key: "prompt",
    description: "toggle interactive prompting in the terminal",
    defaultValue: "enabled",
    allowedValues: PROMPT_MODES,
  },
  {
    key: "pager",
    description: "the terminal pager program to send standard output to",
    defaultValue: "",
  },
  {
    key: "http_unix_socket",
    description: "the path to a Unix socket through which to make an HTTP connection",
    defaultValue: "",
  },
  {
    key: "browser",
    description: "the web browser to use for opening URLs",
    defaultValue: "",
  },
];

const VALUE_SCHEMAS: Record<string, z.ZodType<string>> = {
  git_protocol: GitProtocolSchema,
  prompt: PromptModeSchema,
};

export function findConfigOption(key: string): ConfigOption | undefined {
  return CONFIG_OPTIONS.find((option) => option.key === key);
}

export function isKnownConfigKey(key: string): boolean {
  return findConfigOption(key) !== undefined;
}

/**
 * Hard-coded default for a leaf key, "" when the key has none
 */
export function defaultFor(key: string): string {
  return findConfigOption(key)?.defaultValue ?? "";
}

/**
 * Reject values outside an option's allowed set. Keys without a constraint
 * accept anything.
 */
export function validateConfigValue(key: string, value: string): void {
  const schema = VALUE_SCHEMAS[key];
  if (!schema || schema.safeParse(value).success) {
    return;
  }
  const allowed = (findConfigOption(key)?.allowedValues ?? [])
    .map((v) => `'${v}'`)
    .join(", ");
  throw new ConfigError(
    "invalid-value",
    `failed to set "${key}" to "${value}": valid values are ${allowed}`,
  );
}
