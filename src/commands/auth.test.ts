import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as path from "path";
import * as os from "os";

vi.mock("../lib/tty.js", () => ({
  shouldUseInteractiveMode: vi.fn(() => false),
}));

vi.mock("inquirer", () => ({
  default: {
    prompt: vi.fn(),
  },
}));

import {
  authLoginCommand,
  authLogoutCommand,
  authStatusCommand,
  authTokenCommand,
  defaultOrganizationURL,
  maskToken,
} from "./auth.js";
import { configureUI } from "../lib/cli-ui.js";
import { createCommandContext, type CommandContext } from "../lib/context.js";
import { nullLogger } from "../lib/logger.js";
import type { ConfigPaths } from "../lib/config/paths.js";
import type { SecretBackend } from "../lib/config/secret-backend.js";
import { ConfigStore } from "../lib/config/store.js";
import { shouldUseInteractiveMode } from "../lib/tty.js";
import inquirer from "inquirer";

const mockShouldUseInteractiveMode = vi.mocked(shouldUseInteractiveMode);
const mockInquirerPrompt = vi.mocked(inquirer.prompt);

class InMemorySecretBackend implements SecretBackend {
  readonly entries = new Map<string, string>();

  async get(service: string, account: string): Promise<string | null> {
    return this.entries.get(`${service}/${account}`) ?? null;
  }

  async set(service: string, account: string, secret: string): Promise<void> {
    this.entries.set(`${service}/${account}`, secret);
  }

  async delete(service: string, account: string): Promise<void> {
    this.entries.delete(`${service}/${account}`);
  }
}

const TWO_ORGANIZATIONS = `fabrikam:
  url: https://dev.azure.com/fabrikam
  pat: test-secret
contoso:
  url: https://dev.azure.com/contoso
  git_protocol: ssh
`;

describe("auth commands", () => {
  let tempDir: string;
  let paths: ConfigPaths;
  let secrets: SecretBackend | null;
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;
  let consoleErrorSpy: ReturnType<typeof vi.spyOn>;

  function makeContext(env: NodeJS.ProcessEnv = {}): CommandContext {
    return createCommandContext({
      env,
      paths,
      logger: nullLogger,
      secrets: async () => secrets,
    });
  }

  function stdout(): string[] {
    return consoleLogSpy.mock.calls.map((c) => String(c[0]));
  }

  function stderr(): string[] {
    return consoleErrorSpy.mock.calls.map((c) => String(c[0]));
  }

  async function reload(): Promise<ConfigStore> {
    return ConfigStore.load(paths);
  }

  beforeEach(() => {
    vi.resetAllMocks();
    mockShouldUseInteractiveMode.mockReturnValue(false);
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "azdo-auth-cmd-"));
    paths = {
      general: path.join(tempDir, "config.yml"),
      organizations: path.join(tempDir, "organizations.yml"),
    };
    secrets = null;
    configureUI({ noColor: true });
    consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
    consoleErrorSpy.mockRestore();
    process.exitCode = undefined;
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe("helpers", () => {
    it("builds the default organization URL", () => {
      expect(defaultOrganizationURL("fabrikam")).toBe(
        "https://dev.azure.com/fabrikam",
      );
    });

    it("masks all but the first four characters", () => {
      expect(maskToken("test-secret")).toBe("test*******");
      expect(maskToken("abc")).toBe("***");
    });
  });

  describe("auth login", () => {
    it("stores a plaintext token without secure storage", async () => {
      await authLoginCommand(makeContext(), {
        organization: "Fabrikam",
        token: "test-secret",
      });

      expect(fs.readFileSync(paths.organizations, "utf-8")).toBe(
        "fabrikam:\n  url: https://dev.azure.com/fabrikam\n  pat: test-secret\n",
      );
      expect(stdout()).toEqual([
        "✓ Logged in to organization fabrikam",
        `⚠ Token stored in plaintext in ${paths.organizations}`,
      ]);
    });

    it("stores the token in secure storage when available", async () => {
      const backend = new InMemorySecretBackend();
      secrets = backend;

      await authLoginCommand(makeContext(), {
        organization: "fabrikam",
        token: "test-secret",
        gitProtocol: "ssh",
      });

      expect(backend.entries.get("azdo:fabrikam/")).toBe("test-secret");
      expect(fs.readFileSync(paths.organizations, "utf-8")).toBe(
        "fabrikam:\n  url: https://dev.azure.com/fabrikam\n  git_protocol: ssh\n",
      );
      expect(stdout()).toEqual(["✓ Logged in to organization fabrikam"]);
    });

    it("stores in plaintext with --insecure-storage", async () => {
      secrets = new InMemorySecretBackend();

      await authLoginCommand(makeContext(), {
        organization: "fabrikam",
        url: "https://example.test/fabrikam",
        token: "test-secret",
        insecureStorage: true,
      });

      const store = await reload();
      expect(store.get(["organizations", "fabrikam", "url"])).toBe(
        "https://example.test/fabrikam",
      );
      expect(store.get(["organizations", "fabrikam", "pat"])).toBe(
        "test-secret",
      );
    });

    it("requires an organization when not interactive", async () => {
      await authLoginCommand(makeContext(), { token: "test-secret" });

      expect(stderr()).toEqual([
        "--organization required when not running interactively",
      ]);
      expect(process.exitCode).toBe(1);
      expect(fs.existsSync(paths.organizations)).toBe(false);
    });

    it("rejects an invalid git protocol", async () => {
      await authLoginCommand(makeContext(), {
        organization: "fabrikam",
        token: "test-secret",
        gitProtocol: "ftp",
      });

      expect(stderr()).toEqual([
        `invalid git protocol "ftp": valid values are 'https', 'ssh'`,
      ]);
      expect(process.exitCode).toBe(1);
    });

    it("rejects an invalid URL", async () => {
      await authLoginCommand(makeContext(), {
        organization: "fabrikam",
        url: "not a url",
        token: "test-secret",
      });

      expect(stderr()).toEqual(['invalid organization URL "not a url"']);
      expect(process.exitCode).toBe(1);
    });

    it("requires a token when not interactive", async () => {
      await authLoginCommand(makeContext(), { organization: "fabrikam" });

      expect(stderr()).toEqual([
        "a token is required: pass --token or --with-token",
      ]);
      expect(process.exitCode).toBe(1);
    });

    it("prompts for organization and token when interactive", async () => {
      mockShouldUseInteractiveMode.mockReturnValue(true);
      mockInquirerPrompt
        .mockResolvedValueOnce({ organization: " Fabrikam " })
        .mockResolvedValueOnce({ token: "test-secret" });

      await authLoginCommand(makeContext());

      expect(mockInquirerPrompt).toHaveBeenCalledTimes(2);
      const store = await reload();
      expect(store.get(["organizations", "fabrikam", "pat"])).toBe(
        "test-secret",
      );
    });

    it("does not prompt when prompts are disabled", async () => {
      mockShouldUseInteractiveMode.mockReturnValue(true);
      fs.writeFileSync(paths.general, "prompt: disabled\n");

      await authLoginCommand(makeContext(), { organization: "fabrikam" });

      expect(mockInquirerPrompt).not.toHaveBeenCalled();
      expect(process.exitCode).toBe(1);
    });
  });

  describe("auth logout", () => {
    it("fails when no organization is configured", async () => {
      await authLogoutCommand(makeContext());

      expect(stderr()).toEqual([
        "You are not logged into any Azure DevOps organizations.",
      ]);
      expect(process.exitCode).toBe(1);
    });

    it("logs out of the only organization", async () => {
      fs.writeFileSync(
        paths.organizations,
        "fabrikam:\n  url: https://dev.azure.com/fabrikam\n",
      );
      const backend = new InMemorySecretBackend();
      await backend.set("azdo:fabrikam", "", "test-secret");
      secrets = backend;

      await authLogoutCommand(makeContext());

      expect(stdout()).toEqual(["✓ Logged out of organization fabrikam"]);
      expect(backend.entries.size).toBe(0);
      expect(fs.readFileSync(paths.organizations, "utf-8")).not.toContain(
        "fabrikam",
      );
    });

    it("requires an organization among several when not interactive", async () => {
      fs.writeFileSync(paths.organizations, TWO_ORGANIZATIONS);

      await authLogoutCommand(makeContext());

      expect(stderr()).toEqual([
        "--organization required when not running interactively",
      ]);
      expect(process.exitCode).toBe(1);
    });

    it("asks which organization to log out of", async () => {
      fs.writeFileSync(paths.organizations, TWO_ORGANIZATIONS);
      mockShouldUseInteractiveMode.mockReturnValue(true);
      mockInquirerPrompt.mockResolvedValueOnce({ organization: "contoso" });

      await authLogoutCommand(makeContext());

      expect(mockInquirerPrompt).toHaveBeenCalledTimes(1);
      const store = await reload();
      expect(store.keys(["organizations"])).toEqual(["fabrikam"]);
    });

    it("keeps the default organization when the user declines", async () => {
      fs.writeFileSync(paths.organizations, TWO_ORGANIZATIONS);
      fs.writeFileSync(paths.general, "default_organization: fabrikam\n");
      mockShouldUseInteractiveMode.mockReturnValue(true);
      mockInquirerPrompt.mockResolvedValueOnce({ proceed: false });

      await authLogoutCommand(makeContext(), { organization: "fabrikam" });

      expect(stdout()).toEqual([]);
      expect(fs.readFileSync(paths.organizations, "utf-8")).toBe(
        TWO_ORGANIZATIONS,
      );
    });

    it("refuses to log out of the default organization when not interactive", async () => {
      fs.writeFileSync(paths.organizations, TWO_ORGANIZATIONS);
      fs.writeFileSync(
        paths.general,
        "git_protocol: https\ndefault_organization: fabrikam\n",
      );

      await authLogoutCommand(makeContext(), { organization: "fabrikam" });

      expect(stderr()).toEqual([
        '"fabrikam" is the current default organization. Run azdo auth logout interactively to confirm.',
      ]);
      expect(process.exitCode).toBe(1);
      expect(stdout()).toEqual([]);
      expect(fs.existsSync(paths.organizations)).toBe(true);
      expect(fs.readFileSync(paths.organizations, "utf-8")).toBe(
        TWO_ORGANIZATIONS,
      );
      expect(fs.readFileSync(paths.general, "utf-8")).toBe(
        "git_protocol: https\ndefault_organization: fabrikam\n",
      );
    });

    it("clears the stored default when logging out of it", async () => {
      fs.writeFileSync(paths.organizations, TWO_ORGANIZATIONS);
      fs.writeFileSync(
        paths.general,
        "git_protocol: https\ndefault_organization: fabrikam\n",
      );
      mockShouldUseInteractiveMode.mockReturnValue(true);
      mockInquirerPrompt.mockResolvedValueOnce({ proceed: true });

      await authLogoutCommand(makeContext(), { organization: "fabrikam" });

      expect(fs.readFileSync(paths.general, "utf-8")).toBe(
        "git_protocol: https\n",
      );
      const store = await reload();
      expect(store.keys(["organizations"])).toEqual(["contoso"]);
    });

    it("fails for an organization that is not configured", async () => {
      fs.writeFileSync(paths.organizations, TWO_ORGANIZATIONS);

      await authLogoutCommand(makeContext(), { organization: "nope" });

      expect(stderr()).toEqual([
        'You are not logged in to the Azure DevOps organization "nope". Run azdo auth login to authenticate.',
      ]);
      expect(process.exitCode).toBe(1);
    });
  });

  describe("auth status", () => {
    it("fails when no organization is configured", async () => {
      await authStatusCommand(makeContext());

      expect(stderr()).toEqual([
        "You are not logged into any Azure DevOps organizations. Run azdo auth login to authenticate.",
      ]);
      expect(process.exitCode).toBe(1);
    });

    it("shows organizations with masked tokens and their sources", async () => {
      fs.writeFileSync(paths.organizations, TWO_ORGANIZATIONS);
      fs.writeFileSync(paths.general, "default_organization: fabrikam\n");
      const backend = new InMemorySecretBackend();
      await backend.set("azdo:contoso", "", "test-secret-keyring");
      secrets = backend;

      await authStatusCommand(makeContext());

      const [output, footer] = stdout();
      expect(output).toContain("fabrikam *");
      expect(output).toContain("https://dev.azure.com/contoso");
      expect(output).toContain("config file");
      expect(output).toContain("secure storage");
      expect(output).toContain("test*******");
      expect(output).toContain(`test${"*".repeat(15)}`);
      expect(output).not.toContain("test-secret");
      expect(footer).toBe("* default organization");
    });

    it("shows tokens in full with --show-token", async () => {
      fs.writeFileSync(paths.organizations, TWO_ORGANIZATIONS);

      await authStatusCommand(makeContext(), {
        organization: "fabrikam",
        showToken: true,
      });

      const [output] = stdout();
      expect(output).toContain("test-secret");
      expect(output).not.toContain("contoso");
    });

    it("marks organizations without a token", async () => {
      fs.writeFileSync(paths.organizations, TWO_ORGANIZATIONS);

      await authStatusCommand(makeContext(), { organization: "contoso" });

      expect(stdout()[0]).toContain("missing");
    });
  });

  describe("auth token", () => {
    it("prints the token for the named organization", async () => {
      fs.writeFileSync(paths.organizations, TWO_ORGANIZATIONS);

      await authTokenCommand(makeContext(), { organization: "fabrikam" });

      expect(stdout()).toEqual(["test-secret"]);
    });

    it("uses AZDO_TOKEN when set", async () => {
      fs.writeFileSync(paths.organizations, TWO_ORGANIZATIONS);

      await authTokenCommand(makeContext({ AZDO_TOKEN: "test-secret-env" }), {
        organization: "contoso",
      });

      expect(stdout()).toEqual(["test-secret-env"]);
    });

    it("fails without a default organization", async () => {
      fs.writeFileSync(paths.organizations, TWO_ORGANIZATIONS);

      await authTokenCommand(makeContext());

      expect(stderr()).toEqual(["no default organization defined"]);
      expect(process.exitCode).toBe(1);
    });
  });
});
