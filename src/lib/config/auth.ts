/**
 * Organization-scoped credential resolution
 *
 * Reads and writes organization entries in the config store and consults the
 * OS secret store when one is available. Organization names are lower-cased
 * before every lookup, so "Fabrikam" and "fabrikam" are the same entry.
 *
 * Token precedence:
 * 1. AZDO_TOKEN (global, applies to every organization)
 * 2. plaintext `organizations.<org>.pat`
 * 3. secret store entry `azdo:<org>`
 */

import { nullLogger, type Logger } from "../logger.js";
import { ConfigError, isConfigError } from "./errors.js";
import { defaultFor } from "./options.js";
import {
  decodeSecret,
  secretServiceName,
  type SecretBackend,
} from "./secret-backend.js";
import {
  DEFAULT_ORGANIZATION,
  ORGANIZATIONS,
  PAT,
  type ConfigStore,
} from "./store.js";

export const ORGANIZATION_ENV = "AZDO_ORGANIZATION";
export const TOKEN_ENV = "AZDO_TOKEN";

const SECRET_ACCOUNT = "";

export type TokenSource = "environment" | "config" | "secret-store";

export interface AuthResolverOptions {
  /** OS secret store; null or omitted when unavailable */
  secrets?: SecretBackend | null;
  env?: NodeJS.ProcessEnv;
  platform?: NodeJS.Platform;
  logger?: Logger;
}

function normalize(organizationName: string): string {
  return organizationName.trim().toLowerCase();
}

export class AuthResolver {
  private readonly store: ConfigStore;
  private readonly secrets: SecretBackend | null;
  private readonly env: NodeJS.ProcessEnv;
  private readonly platform: NodeJS.Platform;
  private readonly logger: Logger;

  constructor(store: ConfigStore, options: AuthResolverOptions = {}) {
    this.store = store;
    this.secrets = options.secrets ?? null;
    this.env = options.env ?? process.env;
    this.platform = options.platform ?? process.platform;
    this.logger = options.logger ?? nullLogger;
  }

  hasSecureStorage(): boolean {
    return this.secrets !== null;
  }

  /**
   * Resolve the token for an organization from environment, config or the
   * secret store, in that order
   */
  async getToken(organizationName: string): Promise<string> {
    const org = normalize(organizationName);
    this.logger.debug(`getting token for organization ${org}`);

    const token = this.getTokenFromEnvOrConfig(org);
    if (token !== null) {
      return token;
    }

    this.logger.debug("no token in environment or config, trying secret store");
    let secret: string | null = null;
    let cause: unknown;
    try {
      secret = await this.getTokenFromSecretStore(org);
    } catch (error) {
      cause = error;
    }
    if (secret) {
      return secret;
    }
    throw new ConfigError(
      "secret-backend",
      `no token found for organization "${org}"`,
      { cause },
    );
  }

  /**
   * Token from AZDO_TOKEN or the plaintext config, null when neither has one
   */
  getTokenFromEnvOrConfig(organizationName: string): string | null {
    const envToken = this.env[TOKEN_ENV];
    if (envToken) {
      return envToken;
    }
    const pat = this.store.getOrDefault([
      ORGANIZATIONS,
      normalize(organizationName),
      PAT,
    ]);
    return pat === "" ? null : pat;
  }

  /**
   * Token from the secret store only, null when there is no entry or no store
   */
  async getTokenFromSecretStore(
    organizationName: string,
  ): Promise<string | null> {
    if (!this.secrets) {
      return null;
    }
    const secret = await this.secrets.get(
      secretServiceName(normalize(organizationName)),
      SECRET_ACCOUNT,
    );
    return secret ? decodeSecret(secret, this.platform) : null;
  }

  /**
   * Where the token for an organization would come from
   */
  async getTokenSource(organizationName: string): Promise<TokenSource | null> {
    if (this.env[TOKEN_ENV]) {
      return "environment";
    }
    if (this.getTokenFromEnvOrConfig(organizationName) !== null) {
      return "config";
    }
    try {
      const secret = await this.getTokenFromSecretStore(organizationName);
      return secret ? "secret-store" : null;
    } catch (error) {
      this.logger.debug("secret store lookup failed", error);
      return null;
    }
  }

  getURL(organizationName: string): string {
    return this.store.get([ORGANIZATIONS, normalize(organizationName), "url"]);
  }

  /**
   * Git protocol for an organization, falling back to the global default
   */
  getGitProtocol(organizationName: string): string {
    const key = "git_protocol";
    try {
      return this.store.get([ORGANIZATIONS, normalize(organizationName), key]);
    } catch (error) {
      if (!isConfigError(error, "key-not-found")) throw error;
      return defaultFor(key);
    }
  }

  /**
   * The organization used when a command names none
   *
   * AZDO_ORGANIZATION wins; otherwise a single configured organization is
   * selected; otherwise the stored `default_organization`.
   */
  getDefaultOrganization(): string {
    let organizationName = this.env[ORGANIZATION_ENV];
    if (organizationName === undefined) {
      const organizations = this.getOrganizations();
      organizationName =
        organizations.length === 1
          ? organizations[0]
          : this.store.getOrDefault([DEFAULT_ORGANIZATION]);
    }

    const org = normalize(organizationName);
    if (org === "") {
      throw new ConfigError(
        "no-default-organization",
        "no default organization defined",
      );
    }
    return org;
  }

  /**
   * Set or, with "", clear the stored default organization. The organization
   * must already be configured. Callers persist with `store.write()`.
   */
  setDefaultOrganization(organizationName: string): void {
    if (organizationName === "") {
      try {
        this.store.remove([DEFAULT_ORGANIZATION]);
      } catch (error) {
        if (!isConfigError(error, "key-not-found")) throw error;
      }
      return;
    }

    const org = normalize(organizationName);
    if (!this.getOrganizations().includes(org)) {
      throw new ConfigError(
        "organization-not-found",
        `organization not found ${org}`,
      );
    }
    this.store.set([DEFAULT_ORGANIZATION], org);
  }

  /**
   * All configured organizations; [] when there are none
   */
  getOrganizations(): string[] {
    try {
      return [...new Set(this.store.keys([ORGANIZATIONS]))];
    } catch (error) {
      if (!isConfigError(error)) throw error;
      return [];
    }
  }

  /**
   * Store url, git protocol and token for an organization, then persist
   *
   * With `preferSecure` the token goes to the secret store and any stale
   * plaintext token is dropped; if that fails, or without `preferSecure`, it
   * is written to the plaintext config. An empty `gitProtocol` leaves the
   * existing value untouched.
   */
  async login(
    organizationName: string,
    organizationURL: string,
    token: string,
    gitProtocol: string,
    preferSecure: boolean,
  ): Promise<void> {
    const org = normalize(organizationName);

    let storedSecurely = false;
    if (preferSecure) {
      storedSecurely = await this.storeSecret(org, token);
      if (storedSecurely) {
        try {
          this.store.remove([ORGANIZATIONS, org, PAT]);
        } catch (error) {
          if (!isConfigError(error, "key-not-found")) throw error;
        }
      }
    }

    this.store.set([ORGANIZATIONS, org, "url"], organizationURL);
    if (!storedSecurely) {
      this.store.set([ORGANIZATIONS, org, PAT], token);
    }
    if (gitProtocol !== "") {
      this.store.set([ORGANIZATIONS, org, "git_protocol"], gitProtocol);
    }
    await this.store.write();
  }

  /**
   * Remove an organization's entry and its stored secret, then persist.
   * Logging out of an unknown organization succeeds without writing.
   */
  async logout(organizationName: string): Promise<void> {
    if (organizationName === "") {
      return;
    }
    const org = normalize(organizationName);

    let removed = true;
    try {
      this.store.remove([ORGANIZATIONS, org]);
    } catch (error) {
      if (!isConfigError(error, "key-not-found")) throw error;
      removed = false;
    }

    if (this.secrets) {
      try {
        await this.secrets.delete(secretServiceName(org), SECRET_ACCOUNT);
      } catch (error) {
        this.logger.debug(`no secret removed for ${org}`, error);
      }
    }

    if (removed) {
      await this.store.write();
    }
  }

  private async storeSecret(org: string, token: string): Promise<boolean> {
    if (!this.secrets) {
      this.logger.debug("secure storage unavailable, storing token in config");
      return false;
    }
    try {
      await this.secrets.set(secretServiceName(org), SECRET_ACCOUNT, token);
      return true;
    } catch (error) {
      this.logger.debug("failed to store token securely", error);
      return false;
    }
  }
}
