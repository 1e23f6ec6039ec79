/**
 * TTY and CI detection for deciding whether prompts may be shown
 */

/**
 * Common CI environment variables that indicate non-interactive mode
 */
const CI_ENV_VARS = [
  "CI",
  "CONTINUOUS_INTEGRATION",
  "GITHUB_ACTIONS",
  "GITLAB_CI",
  "CIRCLECI",
  "TRAVIS",
  "JENKINS_URL",
  "BUILDKITE",
  "TEAMCITY_VERSION",
  "TF_BUILD", // Azure Pipelines
];

export function isStdinTTY(): boolean {
  return Boolean(process.stdin.isTTY);
}

export function isStdoutTTY(): boolean {
  return Boolean(process.stdout.isTTY);
}

export function isCI(env: NodeJS.ProcessEnv = process.env): boolean {
  return CI_ENV_VARS.some((envVar) => Boolean(env[envVar]));
}

/**
 * Prompts need a terminal on both ends and no CI runner
 */
export function shouldUseInteractiveMode(
  env: NodeJS.ProcessEnv = process.env,
): boolean {
  return isStdinTTY() && isStdoutTTY() && !isCI(env);
}
