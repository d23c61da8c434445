export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const rank = (level: LogLevel) => LOG_LEVELS.indexOf(level);

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export class ConsoleLogger implements Logger {
  private scope: string;
  private level: LogLevel;

  constructor(scope: string, level: LogLevel = "info") {
    this.scope = scope;
    this.level = level;
  }

  child(scope: string): ConsoleLogger {
    return new ConsoleLogger(scope, this.level);
  }

  debug(message: string): void {
    if (this.enabled("debug")) {
      console.log(this.format(message));
    }
  }

  info(message: string): void {
    if (this.enabled("info")) {
      console.log(this.format(message));
    }
  }

  warn(message: string): void {
    if (this.enabled("warn")) {
      console.warn(this.format(message));
    }
  }

  error(message: string): void {
    if (this.enabled("error")) {
      console.error(this.format(message));
    }
  }

  private enabled(level: LogLevel): boolean {
    return this.level !== "silent" && rank(level) >= rank(this.level);
  }

  private format(message: string): string {
    return `[${this.scope}] ${message}`;
  }
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
