/**
 * azdo auth - Manage organization credentials
 *
 * - login:  store url, git protocol and token for an organization
 * - logout: forget an organization and its stored token
 * - status: show configured organizations and where their tokens come from
 * - token:  print the token for an organization
 */

import inquirer from "inquirer";
import { z } from "zod";
import { colors, table } from "../lib/cli-ui.js";
import type { CommandContext } from "../lib/context.js";
import type { AuthResolver, TokenSource } from "../lib/config/auth.js";
import { isConfigError } from "../lib/config/errors.js";
import { GitProtocolSchema } from "../lib/config/options.js";
import { ORGANIZATIONS, PAT } from "../lib/config/store.js";
import {
  canPrompt,
  readStdin,
  reportError,
  requireOrganization,
} from "./shared.js";

export interface AuthLoginOptions {
  organization?: string;
  /** Organization URL (default: https://dev.azure.com/<organization>) */
  url?: string;
  token?: string;
  /** Read the token from standard input */
  withToken?: boolean;
  gitProtocol?: string;
  /** Store the token in plaintext even when secure storage is available */
  insecureStorage?: boolean;
}

export interface AuthLogoutOptions {
  organization?: string;
}

export interface AuthStatusOptions {
  organization?: string;
  /** Print tokens instead of masking them */
  showToken?: boolean;
}

export interface AuthTokenOptions {
  organization?: string;
}

const OrganizationUrlSchema = z.string().url();

export function defaultOrganizationURL(organizationName: string): string {
  return `https://dev.azure.com/${organizationName}`;
}

export function maskToken(token: string): string {
  if (token.length <= 4) {
    return "*".repeat(token.length);
  }
  return token.slice(0, 4) + "*".repeat(token.length - 4);
}

const TOKEN_SOURCE_LABELS: Record<TokenSource, string> = {
  environment: "environment (AZDO_TOKEN)",
  config: "config file",
  "secret-store": "secure storage",
};

async function promptOrganizationName(): Promise<string> {
  const { organization } = await inquirer.prompt<{ organization: string }>([
    {
      type: "input",
      name: "organization",
      message: "Azure DevOps organization name:",
    },
  ]);
  return organization.trim();
}

async function promptToken(): Promise<string> {
  const { token } = await inquirer.prompt<{ token: string }>([
    {
      type: "password",
      name: "token",
      message: "Paste your personal access token:",
      mask: "*",
    },
  ]);
  return token.trim();
}

export async function authLoginCommand(
  ctx: CommandContext,
  options: AuthLoginOptions = {},
): Promise<void> {
  const store = await ctx.config();
  const interactive = canPrompt(store, ctx.env);

  let organization = options.organization?.trim() ?? "";
  if (!organization) {
    if (!interactive) {
      reportError("--organization required when not running interactively");
      return;
    }
    organization = await promptOrganizationName();
  }
  organization = organization.toLowerCase();

  const url = options.url ?? defaultOrganizationURL(organization);
  if (!OrganizationUrlSchema.safeParse(url).success) {
    reportError(`invalid organization URL "${url}"`);
    return;
  }

  let gitProtocol = "";
  if (options.gitProtocol) {
    const parsed = GitProtocolSchema.safeParse(options.gitProtocol);
    if (!parsed.success) {
      reportError(
        `invalid git protocol "${options.gitProtocol}": valid values are 'https', 'ssh'`,
      );
      return;
    }
    gitProtocol = parsed.data;
  }

  let token = options.token?.trim() ?? "";
  if (!token && options.withToken) {
    token = (await readStdin()).trim();
  }
  if (!token) {
    if (!interactive) {
      reportError("a token is required: pass --token or --with-token");
      return;
    }
    token = await promptToken();
  }
  if (!token) {
    reportError("a token is required");
    return;
  }

  const auth = await ctx.auth();
  await auth.login(
    organization,
    url,
    token,
    gitProtocol,
    !options.insecureStorage,
  );

  console.log(colors.success(`✓ Logged in to organization ${organization}`));
  if (store.getOrDefault([ORGANIZATIONS, organization, PAT]) !== "") {
    console.log(
      colors.warning(
        `⚠ Token stored in plaintext in ${store.getPaths().organizations}`,
      ),
    );
  }
}

function isDefaultOrganization(
  auth: AuthResolver,
  organization: string,
): boolean {
  try {
    return auth.getDefaultOrganization() === organization;
  } catch (error) {
    if (!isConfigError(error, "no-default-organization")) throw error;
    return false;
  }
}

export async function authLogoutCommand(
  ctx: CommandContext,
  options: AuthLogoutOptions = {},
): Promise<void> {
  const store = await ctx.config();
  const auth = await ctx.auth();
  const interactive = canPrompt(store, ctx.env);

  const organizations = auth.getOrganizations();
  if (organizations.length === 0) {
    reportError("You are not logged into any Azure DevOps organizations.");
    return;
  }

  let organization = options.organization?.toLowerCase() ?? "";
  if (organization) {
    if (!requireOrganization(auth, organization)) {
      return;
    }
  } else if (organizations.length === 1) {
    organization = organizations[0];
  } else if (interactive) {
    const answer = await inquirer.prompt<{ organization: string }>([
      {
        type: "list",
        name: "organization",
        message: "What organization do you want to log out of?",
        choices: organizations,
      },
    ]);
    organization = answer.organization;
  } else {
    reportError("--organization required when not running interactively");
    return;
  }

  if (isDefaultOrganization(auth, organization)) {
    // Logging out of the last organization leaves no default to lose
    if (!interactive && organizations.length > 1) {
      reportError(
        `"${organization}" is the current default organization. Run azdo auth logout interactively to confirm.`,
      );
      return;
    }
    if (interactive) {
      const { proceed } = await inquirer.prompt<{ proceed: boolean }>([
        {
          type: "confirm",
          name: "proceed",
          message: `"${organization}" is the current default organization. Perform logout?`,
          default: false,
        },
      ]);
      if (!proceed) {
        return;
      }
    }
    auth.setDefaultOrganization("");
  }

  await auth.logout(organization);
  console.log(colors.success(`✓ Logged out of organization ${organization}`));
}

export async function authStatusCommand(
  ctx: CommandContext,
  options: AuthStatusOptions = {},
): Promise<void> {
  const auth = await ctx.auth();

  let organizations = auth.getOrganizations();
  if (options.organization) {
    if (!requireOrganization(auth, options.organization)) {
      return;
    }
    organizations = [options.organization.toLowerCase()];
  }
  if (organizations.length === 0) {
    reportError(
      `You are not logged into any Azure DevOps organizations. Run ${colors.bold("azdo auth login")} to authenticate.`,
    );
    return;
  }

  let defaultOrganization = "";
  try {
    defaultOrganization = auth.getDefaultOrganization();
  } catch (error) {
    if (!isConfigError(error, "no-default-organization")) throw error;
  }

  const rows: string[][] = [];
  for (const organization of organizations) {
    let url = "-";
    try {
      url = auth.getURL(organization);
    } catch (error) {
      if (!isConfigError(error, "key-not-found")) throw error;
    }

    const source = await auth.getTokenSource(organization);
    let token = "-";
    if (source) {
      const value = await auth.getToken(organization);
      token = options.showToken ? value : maskToken(value);
    }

    rows.push([
      organization === defaultOrganization ? `${organization} *` : organization,
      url,
      auth.getGitProtocol(organization),
      source ? TOKEN_SOURCE_LABELS[source] : colors.error("missing"),
      token,
    ]);
  }

  console.log(
    table(["Organization", "URL", "Git protocol", "Token source", "Token"], rows),
  );
  if (defaultOrganization) {
    console.log(colors.muted("* default organization"));
  }
}

export async function authTokenCommand(
  ctx: CommandContext,
  options: AuthTokenOptions = {},
): Promise<void> {
  const auth = await ctx.auth();
  try {
    const organization =
      options.organization ?? auth.getDefaultOrganization();
    console.log(await auth.getToken(organization));
  } catch (error) {
    reportError(error);
  }
}
