/**
 * Command aliases stored under the `aliases` key of the general config
 */

import { ConfigError, isConfigError } from "./errors.js";
import { ALIASES, type ConfigStore } from "./store.js";

export class AliasConfig {
  private readonly store: ConfigStore;

  constructor(store: ConfigStore) {
    this.store = store;
  }

  get(alias: string): string {
    try {
      return this.store.get([ALIASES, alias]);
    } catch (error) {
      if (!isConfigError(error)) throw error;
      throw new ConfigError(
        error.kind,
        `unable to get alias "${alias}": ${error.message}`,
        { cause: error },
      );
    }
  }

  add(alias: string, expansion: string): void {
    this.store.set([ALIASES, alias], expansion);
  }

  delete(alias: string): void {
    try {
      this.store.remove([ALIASES, alias]);
    } catch (error) {
      if (!isConfigError(error)) throw error;
      throw new ConfigError(
        error.kind,
        `failed to remove alias: ${error.message}`,
        { cause: error },
      );
    }
  }

  /** Every alias and its expansion; {} when none are configured */
  all(): Record<string, string> {
    const out: Record<string, string> = {};
    let keys: string[];
    try {
      keys = this.store.keys([ALIASES]);
    } catch (error) {
      if (!isConfigError(error, "key-not-found")) throw error;
      return out;
    }
    for (const key of keys) {
      out[key] = this.store.getOrDefault([ALIASES, key]);
    }
    return out;
  }
}
