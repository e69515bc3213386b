import { AsyncLocalStorage } from "async_hooks";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVELS: LogLevel[] = ["debug", "info", "warn", "error"];

export type LogContext = Record<string, unknown>;

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  correlationId?: string;
  context?: LogContext;
  error?: Error;
}

interface CorrelationContext {
  correlationId: string;
}

/**
 * Holds the request's correlation ID so every log line written while handling
 * that request carries it, without threading it through call signatures.
 */
const asyncLocalStorage = new AsyncLocalStorage<CorrelationContext>();

export function setCorrelationId(correlationId: string): void {
  asyncLocalStorage.enterWith({ correlationId });
}

export function getCorrelationId(): string | undefined {
  return asyncLocalStorage.getStore()?.correlationId;
}

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as string[]).includes(value);
}

export class Logger {
  private logLevel: LogLevel;

  constructor(level: string = process.env.LOG_LEVEL || "info") {
    const normalized = level.toLowerCase();
    this.logLevel = isLogLevel(normalized) ? normalized : "info";
  }

  setLevel(level: LogLevel): void {
    this.logLevel = level;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.logLevel);
  }

  private formatLog(entry: LogEntry): string {
    const { timestamp, level, message, correlationId, context, error } = entry;
    let log = `[${timestamp}] [${level.toUpperCase()}]`;

    if (correlationId) {
      log += ` [${correlationId}]`;
    }

    log += ` ${message}`;

    if (context) {
      log += ` ${JSON.stringify(context)}`;
    }

    if (error) {
      log += `\n${error.stack}`;
    }

    return log;
  }

  private log(level: LogLevel, message: string, context?: LogContext, error?: Error) {
    if (!this.shouldLog(level)) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      correlationId: getCorrelationId(),
      context,
      error,
    };

    const formatted = this.formatLog(entry);

    switch (level) {
      case "debug":
        console.debug(formatted);
        break;
      case "info":
        console.info(formatted);
        break;
      case "warn":
        console.warn(formatted);
        break;
      case "error":
        console.error(formatted);
        break;
    }
  }

  debug(message: string, context?: LogContext) {
    this.log("debug", message, context);
  }

  info(message: string, context?: LogContext) {
    this.log("info", message, context);
  }

  warn(message: string, context?: LogContext) {
    this.log("warn", message, context);
  }

  error(message: string, context?: LogContext, error?: Error) {
    this.log("error", message, context, error);
  }
}

export const logger = new Logger();

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
