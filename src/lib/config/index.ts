export { AliasConfig } from "./aliases.js";
export {
  AuthResolver,
  ORGANIZATION_ENV,
  TOKEN_ENV,
  type AuthResolverOptions,
  type TokenSource,
} from "./auth.js";
export { determineEditor, EDITOR_ENV } from "./editor.js";
export {
  ConfigError,
  errorMessage,
  isConfigError,
  type ConfigErrorKind,
} from "./errors.js";
export {
  CONFIG_OPTIONS,
  defaultFor,
  findConfigOption,
  isKnownConfigKey,
  validateConfigValue,
  type ConfigOption,
} from "./options.js";
export {
  configDir,
  configPaths,
  CONFIG_DIR_ENV,
  type ConfigDirOptions,
  type ConfigPaths,
} from "./paths.js";
export {
  createKeyringBackend,
  decodeSecret,
  secretServiceName,
  type SecretBackend,
  type SecretValue,
} from "./secret-backend.js";
export {
  ALIASES,
  ConfigStore,
  DEFAULT_ORGANIZATION,
  ORGANIZATIONS,
  PAT,
} from "./store.js";
export { YamlMap, YamlMapError, type YamlMapErrorKind } from "./yaml-map.js";
