/**
 * Error taxonomy for the configuration layer
 *
 * Every failure raised by the store, the alias table or the auth resolver is a
 * `ConfigError` tagged with a `kind`, so callers test for a category with a
 * plain comparison instead of inspecting messages or class identity.
 *
 * @example
 * ```typescript
 * try {
 *   store.get(["organizations", "fabrikam", "url"]);
 * } catch (error) {
 *   if (isConfigError(error, "key-not-found")) {
 *     // fall back
 *   }
 * }
 * ```
 */

/**
 * Error categories
 */
export type ConfigErrorKind =
  | "key-not-found"
  | "invalid-config-file"
  | "no-default-organization"
  | "organization-not-found"
  | "secret-backend"
  | "invalid-value";

export class ConfigError extends Error {
  readonly kind: ConfigErrorKind;

  constructor(
    kind: ConfigErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ConfigError";
    this.kind = kind;
  }
}

/**
 * Check whether a value is a ConfigError, optionally of a given kind
 */
export function isConfigError(
  error: unknown,
  kind?: ConfigErrorKind,
): error is ConfigError {
  if (!(error instanceof ConfigError)) {
    return false;
  }
  return kind === undefined || error.kind === kind;
}

export function keyNotFound(key: string): ConfigError {
  return new ConfigError("key-not-found", `could not find key "${key}"`);
}

export function invalidConfigFile(path: string, cause: unknown): ConfigError {
  const reason = cause instanceof Error ? cause.message : String(cause);
  return new ConfigError(
    "invalid-config-file",
    `invalid config file ${path}: ${reason}`,
    { cause },
  );
}

/**
 * Render any thrown value as a one-line message
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
