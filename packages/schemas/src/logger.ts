import type { Logger, LogLevel } from "./types.js";

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export function parseLogLevel(value: string | undefined, fallback: LogLevel = "info"): LogLevel {
  switch (value?.trim().toLowerCase()) {
    case "debug": return "debug";
    case "info": return "info";
    case "warn": return "warn";
    case "error": return "error";
    default: return fallback;
  }
}

export class ConsoleLogger implements Logger {
  private prefix: string;
  private minLevel: number;

  constructor(scope: string, level: LogLevel = parseLogLevel(process.env.WAYFINDER_LOG_LEVEL)) {
    // Scopes can carry area names from the game; keep them on one line
    // biome-ignore lint/suspicious/noControlCharactersInRegex: intentional sanitization of control chars
    const safeScope = scope.replace(/[\x00-\x1f\x7f]/g, "_").slice(0, 128);
    this.prefix = `[wayfinder:${safeScope}]`;
    this.minLevel = LEVEL_ORDER[level];
  }

  child(scope: string): ConsoleLogger {
    const child = new ConsoleLogger(scope);
    child.prefix = `${this.prefix.slice(0, -1)}/${scope.replace(/[\x00-\x1f\x7f]/g, "_")}]`;
    child.minLevel = this.minLevel;
    return child;
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (this.minLevel > LEVEL_ORDER.debug) return;
    console.debug(`${this.prefix} ${message}`, data !== undefined ? data : "");
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (this.minLevel > LEVEL_ORDER.info) return;
    console.log(`${this.prefix} ${message}`, data !== undefined ? data : "");
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (this.minLevel > LEVEL_ORDER.warn) return;
    console.warn(`${this.prefix} ${message}`, data !== undefined ? data : "");
  }

  error(message: string, data?: Record<string, unknown>): void {
    console.error(`${this.prefix} ${message}`, data !== undefined ? data : "");
  }
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

export function createLogger(scope: string, level?: LogLevel): Logger {
  return new ConsoleLogger(scope, level);
}
