// Console logging in the host-function style: one line per message with a
// bracketed level prefix. Output can be silenced or captured by injecting a
// different Logger.

export type LogLevel = "silent" | "info" | "debug";

export const LOG_LEVELS: readonly LogLevel[] = ["silent", "info", "debug"];

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  debug(message: string): void;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function createLogger(level: LogLevel = "info"): Logger {
  const enabled = (wanted: LogLevel) => LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(wanted);
  return {
    info(message: string): void {
      if (enabled("info")) console.log(`[INFO] ${message}`);
    },
    warn(message: string): void {
      if (enabled("info")) console.warn(`[WARN] ${message}`);
    },
    debug(message: string): void {
      if (enabled("debug")) console.log(`[DEBUG] ${message}`);
    },
  };
}

export const silentLogger: Logger = {
  info() {},
  warn() {},
  debug() {},
};

export interface MemoryLogger extends Logger {
  readonly lines: string[];
}

/** Collects formatted lines instead of writing them. */
export function createMemoryLogger(): MemoryLogger {
  const lines: string[] = [];
  return {
    lines,
    info(message: string) { lines.push(`[INFO] ${message}`); },
    warn(message: string) { lines.push(`[WARN] ${message}`); },
    debug(message: string) { lines.push(`[DEBUG] ${message}`); },
  };
}
