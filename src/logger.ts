/**
 * Logging
 *
 * Everything goes to stderr: stdout belongs to the MCP stdio transport.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
}

export interface LoggerOptions {
  debug?: boolean;
}

const LEVEL_TAGS: Record<LogLevel, string> = {
  debug: "[DEBUG]",
  info: "",
  warn: "Warning:",
  error: "Error:",
};

function write(scope: string, level: LogLevel, message: string, error?: unknown): void {
  const tag = LEVEL_TAGS[level];
  const line = tag ? `[${scope}] ${tag} ${message}` : `[${scope}] ${message}`;
  if (error === undefined) {
    console.error(line);
  } else {
    console.error(line, error);
  }
}

/**
 * Create a scoped logger. Debug lines are dropped unless debug mode is on.
 */
export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const debugEnabled = options.debug ?? false;
  return {
    debug: (message) => {
      if (debugEnabled) write(scope, "debug", message);
    },
    info: (message) => write(scope, "info", message),
    warn: (message) => write(scope, "warn", message),
    error: (message, error) => write(scope, "error", message, error),
  };
}

/**
 * Format a duration the way the status output shows cache ages.
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  const seconds = Math.round(ms / 1000);
  if (seconds < 60) return `${seconds}s`;
  const minutes = Math.floor(seconds / 60);
  const rest = seconds % 60;
  return rest ? `${minutes}m${rest}s` : `${minutes}m`;
}
