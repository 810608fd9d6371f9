export type LogLevel = "debug" | "info" | "warn" | "error" | "fatal";

type LogThreshold = LogLevel | "silent";

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
  fatal(message: string, ...details: unknown[]): void;
  child(scope: string): Logger;
}

const LEVEL_ORDER: Record<LogThreshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  fatal: 50,
  silent: 100
};

export function parseLogLevel(value: string | undefined, fallback: LogThreshold = "info"): LogThreshold {
  const normalized = value?.trim().toLowerCase();
  switch (normalized) {
    case "debug":
    case "info":
    case "warn":
    case "error":
    case "fatal":
    case "silent":
      return normalized;
    default:
      return fallback;
  }
}

export type ConsoleSink = Pick<Console, "debug" | "info" | "warn" | "error">;

export class ConsoleLogger implements Logger {
  private readonly threshold: LogThreshold;
  private readonly scope: string | null;
  private readonly sink: ConsoleSink;

  public constructor(options: { level?: LogThreshold; scope?: string; sink?: ConsoleSink } = {}) {
    this.threshold = options.level ?? parseLogLevel(process.env.TONEARM_LOG_LEVEL);
    this.scope = options.scope ?? null;
    this.sink = options.sink ?? console;
  }

  public debug(message: string, ...details: unknown[]): void {
    this.write("debug", message, details);
  }

  public info(message: string, ...details: unknown[]): void {
    this.write("info", message, details);
  }

  public warn(message: string, ...details: unknown[]): void {
    this.write("warn", message, details);
  }

  public error(message: string, ...details: unknown[]): void {
    this.write("error", message, details);
  }

  public fatal(message: string, ...details: unknown[]): void {
    this.write("fatal", message, details);
  }

  public child(scope: string): Logger {
    return new ConsoleLogger({
      level: this.threshold,
      scope: this.scope ? `${this.scope}:${scope}` : scope,
      sink: this.sink
    });
  }

  private write(level: LogLevel, message: string, details: unknown[]): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.threshold]) {
      return;
    }

    const prefix = `${new Date().toISOString()} ${level.toUpperCase()}${this.scope ? ` [${this.scope}]` : ""}`;
    const line = `${prefix} ${message}`;

    switch (level) {
      case "debug":
        this.sink.debug(line, ...details);
        return;
      case "info":
        this.sink.info(line, ...details);
        return;
      case "warn":
        this.sink.warn(line, ...details);
        return;
      default:
        this.sink.error(line, ...details);
    }
  }
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
  fatal() {},
  child() {
    return silentLogger;
  }
};
