import type { LogLevel } from "./config/types.js";

export type SubsystemLogger = {
  debug: (message: string, details?: Record<string, unknown>) => void;
  info: (message: string, details?: Record<string, unknown>) => void;
  warn: (message: string, details?: Record<string, unknown>) => void;
  error: (message: string, details?: Record<string, unknown>) => void;
};

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let minimumLevel: LogLevel = "info";

export function setLogLevel(level: LogLevel): void {
  minimumLevel = level;
}

export function getLogLevel(): LogLevel {
  return minimumLevel;
}

function formatDetails(details: Record<string, unknown> | undefined): string {
  if (!details) {
    return "";
  }
  const parts: string[] = [];
  for (const [key, value] of Object.entries(details)) {
    if (value === undefined) {
      continue;
    }
    if (value instanceof Error) {
      parts.push(`${key}=${JSON.stringify(value.message)}`);
      continue;
    }
    parts.push(`${key}=${typeof value === "string" ? value : JSON.stringify(value)}`);
  }
  return parts.length > 0 ? ` ${parts.join(" ")}` : "";
}

export function createSubsystemLogger(subsystem: string): SubsystemLogger {
  function write(level: LogLevel, message: string, details?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[minimumLevel]) {
      return;
    }
    const line = `${new Date().toISOString()} [${subsystem}] ${message}${formatDetails(details)}`;
    if (level === "error") {
      console.error(line);
    } else if (level === "warn") {
      console.warn(line);
    } else {
      console.log(line);
    }
  }
  return {
    debug: (message, details) => write("debug", message, details),
    info: (message, details) => write("info", message, details),
    warn: (message, details) => write("warn", message, details),
    error: (message, details) => write("error", message, details),
  };
}
