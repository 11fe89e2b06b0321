/**
 * Structured logging utility with log levels
 * Debug messages only appear in development or with VINE_SYNC_DEBUG set
 */

type LogLevel = "debug" | "info" | "warn" | "error";

function isDebugEnabled(): boolean {
  const flag = process.env.VINE_SYNC_DEBUG;
  if (flag !== undefined && flag !== "" && flag !== "0") return true;
  return process.env.NODE_ENV === "development";
}

export class Logger {
  private context: string;

  constructor(context: string) {
    this.context = context;
  }

  private log(level: LogLevel, message: string, data?: unknown) {
    const prefix = `[${this.context}]`;
    const logMessage =
      data !== undefined ? [prefix, message, data] : [prefix, message];

    switch (level) {
      case "debug":
        if (isDebugEnabled()) {
          console.log(...logMessage);
        }
        break;
      case "info":
        console.log(...logMessage);
        break;
      case "warn":
        console.warn(...logMessage);
        break;
      case "error":
        console.error(...logMessage);
        break;
    }
  }

  debug(message: string, data?: unknown) {
    this.log("debug", message, data);
  }

  info(message: string, data?: unknown) {
    this.log("info", message, data);
  }

  warn(message: string, data?: unknown) {
    this.log("warn", message, data);
  }

  error(message: string, error?: unknown) {
    this.log("error", message, error);
  }
}

/**
 * Create a logger for a specific context
 */
export function createLogger(context: string): Logger {
  return new Logger(context);
}
