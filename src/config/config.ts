import { DEFAULT_INITIAL_PAGES, DEFAULT_MAXIMUM_PAGES, MAX_MEMORY_PAGES } from "../foreign/module-builder.js";
import { createLogger, isLogLevel, LOG_LEVELS, type Logger, type LogLevel } from "../logging/logger.js";

export interface MemoryConfig {
  /** 64 KiB pages the foreign memory starts with. */
  initialPages: number;
  /** Upper bound the heap may grow to. */
  maximumPages: number;
}

export interface BridgeConfig {
  logLevel?: LogLevel;
  /** Overrides logLevel. Receives the greeting emitted by greet_person. */
  logger?: Logger;
  memory?: Partial<MemoryConfig>;
}

export interface ResolvedConfig {
  logger: Logger;
  memory: MemoryConfig;
}

// Configured via environment variables:
//   BRIDGE_LOG_LEVEL         silent | info | debug (default info)
//   BRIDGE_MEMORY_PAGES      initial foreign memory in 64 KiB pages (default 1)
//   BRIDGE_MAX_MEMORY_PAGES  maximum foreign memory in pages (default 256)
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): BridgeConfig {
  const config: BridgeConfig = {};

  const level = env.BRIDGE_LOG_LEVEL?.trim();
  if (level) {
    if (!isLogLevel(level)) {
      throw new Error(`BRIDGE_LOG_LEVEL must be one of ${LOG_LEVELS.join(", ")}, got '${level}'`);
    }
    config.logLevel = level;
  }

  const memory: Partial<MemoryConfig> = {};
  const initial = parsePages(env, "BRIDGE_MEMORY_PAGES");
  if (initial !== undefined) memory.initialPages = initial;
  const maximum = parsePages(env, "BRIDGE_MAX_MEMORY_PAGES");
  if (maximum !== undefined) memory.maximumPages = maximum;
  if (Object.keys(memory).length > 0) config.memory = memory;

  return config;
}

function parsePages(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name]?.trim();
  if (!raw) return undefined;
  const pages = Number(raw);
  if (!Number.isInteger(pages) || pages < 1 || pages > MAX_MEMORY_PAGES) {
    throw new Error(`${name} must be an integer between 1 and ${MAX_MEMORY_PAGES}, got '${raw}'`);
  }
  return pages;
}

export function resolveConfig(config: BridgeConfig = {}): ResolvedConfig {
  const memory: MemoryConfig = {
    initialPages: config.memory?.initialPages ?? DEFAULT_INITIAL_PAGES,
    maximumPages: config.memory?.maximumPages ?? DEFAULT_MAXIMUM_PAGES,
  };
  if (memory.initialPages > memory.maximumPages) {
    throw new Error(
      `Initial memory (${memory.initialPages} pages) exceeds maximum (${memory.maximumPages} pages)`,
    );
  }
  if (memory.maximumPages > MAX_MEMORY_PAGES) {
    throw new Error(
      `Maximum memory (${memory.maximumPages} pages) exceeds the ${MAX_MEMORY_PAGES}-page limit`,
    );
  }
  return {
    logger: config.logger ?? createLogger(config.logLevel ?? "info"),
    memory,
  };
}
