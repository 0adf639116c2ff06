// Seat Posture Server - Logging
//
// Components take a Logger by injection. The console implementation writes
// `[LEVEL] [Component] message` lines and drops anything below the configured level.

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export type LogLevel = "DEBUG" | "INFO" | "WARNING" | "ERROR";

const LEVEL_ORDER: Record<LogLevel, number> = {
  DEBUG: 10,
  INFO: 20,
  WARNING: 30,
  ERROR: 40,
};

export function parseLogLevel(value: string | undefined): LogLevel | null {
  if (value === undefined) return null;
  const upper = value.trim().toUpperCase();
  if (upper === "WARN") return "WARNING";
  if (upper === "DEBUG" || upper === "INFO" || upper === "WARNING" || upper === "ERROR") {
    return upper;
  }
  return null;
}

export function createConsoleLogger(component: string, level: LogLevel = "INFO"): Logger {
  const threshold = LEVEL_ORDER[level];
  const ts = () => new Date().toISOString();
  return {
    debug: (msg, ...args) => {
      if (threshold <= LEVEL_ORDER.DEBUG) console.debug(`[DEBUG] [${ts()}] [${component}] ${msg}`, ...args);
    },
    info: (msg, ...args) => {
      if (threshold <= LEVEL_ORDER.INFO) console.log(`[INFO] [${ts()}] [${component}] ${msg}`, ...args);
    },
    warn: (msg, ...args) => {
      if (threshold <= LEVEL_ORDER.WARNING) console.warn(`[WARN] [${ts()}] [${component}] ${msg}`, ...args);
    },
    error: (msg, ...args) => {
      if (threshold <= LEVEL_ORDER.ERROR) console.error(`[ERROR] [${ts()}] [${component}] ${msg}`, ...args);
    },
  };
}

/** Logger that discards everything. Used when a component is built without one. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
