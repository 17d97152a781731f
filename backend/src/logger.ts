/**
 * Logger utility for the Study Brief backend
 *
 * Structured console logging with a module prefix on every line.
 * Debug lines are printed only when DEBUG is set.
 */

type LogLevel = "debug" | "info" | "warn" | "error";

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  module: string;
  message: string;
  data?: unknown;
}

export interface Logger {
  debug: (message: string, data?: unknown) => void;
  info: (message: string, data?: unknown) => void;
  warn: (message: string, data?: unknown) => void;
  error: (message: string, data?: unknown) => void;
}

/**
 * Formats a log entry for console output.
 */
function formatLog(entry: LogEntry): string {
  const time = entry.timestamp.split("T")[1]?.slice(0, 12) ?? entry.timestamp;
  const prefix = `[${time}] [${entry.level.toUpperCase().padEnd(5)}] [${entry.module}]`;
  return `${prefix} ${entry.message}`;
}

/**
 * Creates a logger for a specific module.
 */
export function createLogger(module: string): Logger {
  const log = (level: LogLevel, message: string, data?: unknown) => {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      module,
      message,
      data,
    };

    const formatted = formatLog(entry);
    const extra = data !== undefined ? data : "";

    switch (level) {
      case "debug":
        if (process.env.DEBUG) {
          console.log(formatted, extra);
        }
        break;
      case "info":
        console.log(formatted, extra);
        break;
      case "warn":
        console.warn(formatted, extra);
        break;
      case "error":
        console.error(formatted, extra);
        break;
    }
  };

  return {
    debug: (message, data) => log("debug", message, data),
    info: (message, data) => log("info", message, data),
    warn: (message, data) => log("warn", message, data),
    error: (message, data) => log("error", message, data),
  };
}

export const serverLog = createLogger("Server");
export const jobLog = createLogger("Jobs");
