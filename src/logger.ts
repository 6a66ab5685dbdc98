/**
 * Structured logger
 *
 * Log levels DEBUG, INFO, WARN, ERROR with an ISO timestamp and a component
 * name on every line. Text by default, JSON lines when requested.
 *
 * Environment:
 *   PEPTIDE_HARVEST_LOG_LEVEL = debug|info|warn|error (default: info)
 *   PEPTIDE_HARVEST_LOG_JSON  = 1 (default: text)
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

function minimumLevel(): number {
  const configured = (process.env.PEPTIDE_HARVEST_LOG_LEVEL ?? "info").toLowerCase();
  return isLogLevel(configured) ? LEVEL_ORDER[configured] : LEVEL_ORDER.info;
}

function jsonMode(): boolean {
  return process.env.PEPTIDE_HARVEST_LOG_JSON === "1";
}

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

function emit(
  level: LogLevel,
  component: string,
  message: string,
  data?: Record<string, unknown>
): void {
  if (LEVEL_ORDER[level] < minimumLevel()) return;

  const ts = new Date().toISOString();
  let line: string;

  if (jsonMode()) {
    line = JSON.stringify({ ts, level, component, msg: message, ...(data && { data }) });
  } else {
    const prefix = `[${ts}] [${level.toUpperCase().padEnd(5)}] [${component}]`;
    line = data ? `${prefix} ${message} ${JSON.stringify(data)}` : `${prefix} ${message}`;
  }

  // stdout stays free for data written by the CLI
  if (level === "error") {
    console.error(line);
  } else {
    console.warn(line);
  }
}

/**
 * Create a logger bound to a component name
 *
 * @example
 * ```typescript
 * const log = createLogger("extract");
 * log.info("Found reads assigned to target IDs", { sample: "S1", reads: 3 });
 * ```
 */
export function createLogger(component: string): Logger {
  return {
    debug: (message, data) => emit("debug", component, message, data),
    info: (message, data) => emit("info", component, message, data),
    warn: (message, data) => emit("warn", component, message, data),
    error: (message, data) => emit("error", component, message, data),
  };
}
