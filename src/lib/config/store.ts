/**
 * Layered configuration store
 *
 * Composes two YAML documents into one logical key space:
 * - general settings, persisted to `config.yml`
 * - one entry per organization, persisted to `organizations.yml` and grafted
 *   into the general tree under the reserved `organizations` key
 *
 * Writes are selective: a file is only rewritten when its part of the tree
 * changed since load.
 *
 * @example
 * ```typescript
 * const store = await ConfigStore.load(configPaths());
 *
 * store.set(["organizations", "fabrikam", "git_protocol"], "ssh");
 * store.get(["prompt"]); // "enabled"
 *
 * await store.write(); // rewrites organizations.yml only
 * ```
 */

import { readFileIfExists, writeFileAtomicSync } from "../fs.js";
import { invalidConfigFile, keyNotFound } from "./errors.js";
import { defaultFor } from "./options.js";
import type { ConfigPaths } from "./paths.js";
import { YamlMap, YamlMapError } from "./yaml-map.js";

export const ORGANIZATIONS = "organizations";
export const ALIASES = "aliases";
export const PAT = "pat";
export const DEFAULT_ORGANIZATION = "default_organization";

export const DEFAULT_GENERAL_CONFIG = `# What protocol to use when performing git operations. Supported values: ssh, https
git_protocol: https
# What editor azdo should run when authoring text, e.g. pull request descriptions. If blank, will refer to environment.
editor:
# When to interactively prompt. This is a global setting that cannot be overridden per organization. Supported values: enabled, disabled
prompt: enabled
# A pager program to send command output to, e.g. "less". Set the value to "cat" to disable the pager.
pager:
# Aliases allow you to create nicknames for azdo commands
aliases:
  co: pr checkout
# The path to a unix socket through which to send HTTP connections. If blank, HTTP traffic goes over the default transport.
http_unix_socket:
# What web browser azdo should use when opening URLs. If blank, will refer to environment.
browser:
`;

function parseConfigFile(path: string, text: string): YamlMap {
  try {
    return YamlMap.parse(text);
  } catch (error) {
    if (error instanceof YamlMapError) {
      throw invalidConfigFile(path, error);
    }
    throw error;
  }
}

export class ConfigStore {
  private readonly paths: ConfigPaths;
  private readonly root: YamlMap;
  /** Organizations root as loaded, keeping its own document and comments */
  private organizations: YamlMap | null;

  private constructor(
    paths: ConfigPaths,
    root: YamlMap,
    organizations: YamlMap | null,
  ) {
    this.paths = paths;
    this.root = root;
    this.organizations = organizations;
    if (organizations) {
      root.attachEntry(ORGANIZATIONS, organizations);
    }
  }

  /**
   * Read both config files
   *
   * A missing or empty general file is replaced by the built-in defaults.
   * A file that exists but cannot be parsed is fatal.
   */
  static async load(paths: ConfigPaths): Promise<ConfigStore> {
    const generalText = await readFileIfExists(paths.general);
    let general =
      generalText === null ? null : parseConfigFile(paths.general, generalText);
    if (general === null || general.empty()) {
      general = YamlMap.parse(DEFAULT_GENERAL_CONFIG);
    }

    const organizationsText = await readFileIfExists(paths.organizations);
    const organizations =
      organizationsText === null
        ? null
        : parseConfigFile(paths.organizations, organizationsText);

    return new ConfigStore(
      paths,
      general,
      organizations && !organizations.empty() ? organizations : null,
    );
  }

  /**
   * Build a store from YAML text. Nothing is read from disk; `write()` still
   * targets `paths`.
   */
  static fromString(
    general: string,
    organizations = "",
    paths: ConfigPaths = { general: "config.yml", organizations: "organizations.yml" },
  ): ConfigStore {
    const orgs = parseConfigFile(paths.organizations, organizations);
    return new ConfigStore(
      paths,
      parseConfigFile(paths.general, general),
      orgs.empty() ? null : orgs,
    );
  }

  getPaths(): ConfigPaths {
    return { ...this.paths };
  }

  /**
   * Get the string value at a key path. Map nodes read as "".
   * Throws a key-not-found ConfigError naming the first missing segment.
   */
  get(keys: readonly string[]): string {
    return this.descend(keys).value;
  }

  /**
   * Like get(), but any miss returns the default for the last key
   */
  getOrDefault(keys: readonly string[]): string {
    let entry: YamlMap | undefined = this.root;
    for (const key of keys) {
      entry = entry.lookup(key);
      if (!entry) {
        return defaultFor(keys[keys.length - 1] ?? "");
      }
    }
    return entry.value;
  }

  /**
   * Child keys of the map at a key path
   */
  keys(keys: readonly string[]): string[] {
    return this.descend(keys).keys();
  }

  /**
   * Set a string value, creating intermediate maps as needed
   */
  set(keys: readonly string[], value: string): void {
    if (keys.length === 0) {
      throw new Error("cannot set a value without a key");
    }

    let entry = this.root;
    for (let i = 0; i < keys.length - 1; i++) {
      const key = keys[i];
      let next = entry.lookup(key);
      if (!next || !next.isMap()) {
        next = YamlMap.mapValue();
        if (entry === this.root && key === ORGANIZATIONS) {
          // Grafted without touching the general tree, which is unchanged
          this.root.attachEntry(key, next);
          next.setModified();
        } else {
          entry.setEntry(key, next);
        }
      }
      entry = next;
    }
    entry.setEntry(keys[keys.length - 1], YamlMap.stringValue(value));
  }

  /**
   * Remove a leaf or a whole subtree
   */
  remove(keys: readonly string[]): void {
    if (keys.length === 0) {
      throw new Error("cannot remove without a key");
    }
    const parent = this.descend(keys.slice(0, -1));
    const last = keys[keys.length - 1];
    if (!parent.lookup(last)) {
      throw keyNotFound(last);
    }
    parent.removeEntry(last);
  }

  /**
   * Persist modified parts of the tree
   *
   * `organizations.yml` is written first when its subtree changed, then
   * `config.yml` is serialized with the organizations subtree detached when
   * anything else changed. Serialization and writes run synchronously, so no
   * other operation ever observes the detached tree, and the subtree is put
   * back even when a write fails.
   */
  async write(): Promise<void> {
    const organizations = this.currentOrganizations();

    if (organizations === null && this.organizations !== null) {
      // The whole subtree was removed
      writeFileAtomicSync(this.paths.organizations, "");
      this.organizations = null;
    } else if (organizations?.isModified()) {
      writeFileAtomicSync(this.paths.organizations, organizations.toString());
      organizations.setUnmodified();
    }

    this.root.withoutEntry(ORGANIZATIONS, () => {
      if (!this.root.isModified()) {
        return;
      }
      writeFileAtomicSync(this.paths.general, this.root.toString());
      this.root.setUnmodified();
    });
  }

  /**
   * Resolve the organizations subtree as currently attached, reusing the
   * loaded document when the subtree is still the same node
   */
  private currentOrganizations(): YamlMap | null {
    const entry = this.root.lookup(ORGANIZATIONS);
    if (!entry || !entry.isMap()) {
      return null;
    }
    if (this.organizations && this.organizations.node === entry.node) {
      return this.organizations;
    }
    this.organizations = entry;
    return entry;
  }

  private descend(keys: readonly string[]): YamlMap {
    let entry = this.root;
    for (const key of keys) {
      const next = entry.lookup(key);
      if (!next) {
        throw keyNotFound(key);
      }
      entry = next;
    }
    return entry;
  }
}
