/**
 * Structured logger
 *
 * Log levels with emoji prefixes for visual scanning in terminal output.
 * Diagnostics go to stderr so command output on stdout (tokens, config
 * values) stays pipeable.
 *
 * @example
 * ```typescript
 * const log = createLogger({ verbose: options.verbose });
 *
 * log.debug("getting token for organization", "fabrikam"); // verbose only
 * log.warn("secure storage unavailable");
 *
 * const authLog = log.child("auth");
 * authLog.info("logged in"); // ℹ️ [auth] logged in
 * ```
 */

export type LogLevel = "debug" | "info" | "success" | "warn" | "error";

export interface LoggerOptions {
  /** Enable debug level logging (default: false) */
  verbose?: boolean;
  /** Suppress all output (default: false) */
  silent?: boolean;
  /** Output function for non-error levels (default: console.error) */
  output?: (message: string) => void;
  /** Output function for errors (default: console.error) */
  errorOutput?: (message: string) => void;
}

export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  success(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
  log(level: LogLevel, message: string, data?: unknown): void;
  /** Create a child logger with a prefix */
  child(prefix: string): Logger;
  isVerbose(): boolean;
}

const LOG_PREFIXES: Record<LogLevel, string> = {
  debug: "🔍",
  info: "ℹ️",
  success: "✅",
  warn: "⚠️",
  error: "❌",
};

function formatMessage(
  level: LogLevel,
  message: string,
  data?: unknown,
  prefix?: string,
): string {
  const parts: string[] = [LOG_PREFIXES[level]];

  if (prefix) {
    parts.push(`[${prefix}]`);
  }

  parts.push(message);

  if (data !== undefined) {
    if (data instanceof Error) {
      parts.push(`- ${data.message}`);
    } else if (typeof data === "object") {
      parts.push(`- ${JSON.stringify(data)}`);
    } else {
      parts.push(`- ${String(data)}`);
    }
  }

  return parts.join(" ");
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const {
    verbose = false,
    silent = false,
    output = console.error,
    errorOutput = console.error,
  } = options;

  const createLogFunction = (prefix?: string): Logger => {
    const logger: Logger = {
      debug(message: string, data?: unknown): void {
        logger.log("debug", message, data);
      },

      info(message: string, data?: unknown): void {
        logger.log("info", message, data);
      },

      success(message: string, data?: unknown): void {
        logger.log("success", message, data);
      },

      warn(message: string, data?: unknown): void {
        logger.log("warn", message, data);
      },

      error(message: string, data?: unknown): void {
        logger.log("error", message, data);
      },

      log(level: LogLevel, message: string, data?: unknown): void {
        if (silent) return;
        if (level === "debug" && !verbose) return;
        const logFn = level === "error" ? errorOutput : output;
        logFn(formatMessage(level, message, data, prefix));
      },

      child(childPrefix: string): Logger {
        const newPrefix = prefix ? `${prefix}:${childPrefix}` : childPrefix;
        return createLogFunction(newPrefix);
      },

      isVerbose(): boolean {
        return verbose;
      },
    };
    return logger;
  };

  return createLogFunction();
}

/**
 * A logger that discards everything
 */
export const nullLogger: Logger = createLogger({ silent: true });
