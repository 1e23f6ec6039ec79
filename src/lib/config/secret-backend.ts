/**
 * OS secret store access
 *
 * The secret store is an optional capability: when the native keyring binding
 * cannot be loaded, `createKeyringBackend()` resolves to null and callers fall
 * back to the plaintext organizations file.
 */

import { endianness } from "os";
import type { Entry } from "@napi-rs/keyring";
import type { Logger } from "../logger.js";

/** Text, or the raw credential blob where the store hands back bytes */
export type SecretValue = string | Uint8Array;

export interface SecretBackend {
  /** Read a secret, null when no entry exists */
  get(service: string, account: string): Promise<SecretValue | null>;
  set(service: string, account: string, secret: string): Promise<void>;
  delete(service: string, account: string): Promise<void>;
}

/**
 * Service name under which an organization's token is stored
 */
export function secretServiceName(organizationName: string): string {
  return `azdo:${organizationName.toLowerCase()}`;
}

/**
 * Turn a secret read back from the store into text
 *
 * Windows credential blobs are UTF-16 in native byte order; elsewhere raw
 * bytes are UTF-8.
 */
export function decodeSecret(
  secret: SecretValue,
  platform: NodeJS.Platform = process.platform,
  byteOrder: "BE" | "LE" = endianness(),
): string {
  if (typeof secret === "string") {
    return secret;
  }
  const bytes = Buffer.from(secret);
  if (platform !== "win32" || bytes.length % 2 !== 0) {
    return bytes.toString("utf-8");
  }
  if (byteOrder === "BE") {
    bytes.swap16();
  }
  return bytes.toString("utf16le");
}

type EntryConstructor = typeof Entry;

class KeyringSecretBackend implements SecretBackend {
  private readonly EntryClass: EntryConstructor;
  private readonly platform: NodeJS.Platform;

  constructor(EntryClass: EntryConstructor, platform: NodeJS.Platform) {
    this.EntryClass = EntryClass;
    this.platform = platform;
  }

  async get(service: string, account: string): Promise<SecretValue | null> {
    const entry = new this.EntryClass(service, account);
    if (this.platform === "win32") {
      // getPassword would decode the UTF-16 blob as UTF-8
      const bytes = entry.getSecret();
      return bytes ? Uint8Array.from(bytes) : null;
    }
    return entry.getPassword() ?? null;
  }

  async set(service: string, account: string, secret: string): Promise<void> {
    new this.EntryClass(service, account).setPassword(secret);
  }

  async delete(service: string, account: string): Promise<void> {
    new this.EntryClass(service, account).deletePassword();
  }
}

/**
 * Load the OS keyring binding, resolving to null when it is unavailable
 */
export async function createKeyringBackend(
  logger?: Logger,
  platform: NodeJS.Platform = process.platform,
): Promise<SecretBackend | null> {
  try {
    const { Entry: EntryClass } = await import("@napi-rs/keyring");
    return new KeyringSecretBackend(EntryClass, platform);
  } catch (error) {
    logger?.debug("secure storage unavailable", error);
    return null;
  }
}
