import type { ConfigStore } from "./store.js";

export const EDITOR_ENV = "AZDO_EDITOR";

/**
 * Editor command: AZDO_EDITOR, then the configured `editor`, else ""
 */
export function determineEditor(
  store: ConfigStore,
  env: NodeJS.ProcessEnv = process.env,
): string {
  const fromEnv = env[EDITOR_ENV];
  if (fromEnv) {
    return fromEnv;
  }
  return store.getOrDefault(["editor"]);
}
