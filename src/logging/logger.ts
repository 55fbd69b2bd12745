export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

const LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

class ConsoleLogger implements Logger {
  constructor(
    private readonly prefix: string,
    private readonly level: LogLevel,
  ) {}

  debug(message: string, data?: Record<string, unknown>): void {
    this.write("debug", message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.write("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.write("warn", message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.write("error", message, data);
  }

  private write(
    level: Exclude<LogLevel, "silent">,
    message: string,
    data?: Record<string, unknown>,
  ): void {
    if (!this.shouldLog(level)) {
      return;
    }
    const line = `${this.prefix}${message}`;
    // stdout carries command output, so every level goes to stderr
    if (data && Object.keys(data).length > 0) {
      console.error(line, data);
      return;
    }
    console.error(line);
  }

  private shouldLog(level: LogLevel): boolean {
    if (this.level === "silent") {
      return false;
    }
    return LEVELS.indexOf(this.level) <= LEVELS.indexOf(level);
  }
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && LEVELS.some((level) => level === value);
}

export function createLogger(prefix = "", level?: LogLevel): Logger {
  return new ConsoleLogger(prefix, level ?? defaultLevel());
}

function defaultLevel(): LogLevel {
  const fromEnv = process.env["LOG_LEVEL"];
  if (isLogLevel(fromEnv)) {
    return fromEnv;
  }
  return process.env["NODE_ENV"] === "test" ? "silent" : "info";
}

export const noopLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
