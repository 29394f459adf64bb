// ---------------------------------------------------------------------------
// MMPay SDK – Logger
// ---------------------------------------------------------------------------

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

/** Minimal logging surface the SDK writes to. Any structured logger fits. */
export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

export interface ConsoleLoggerOptions {
  level?: LogLevel;
  prefix?: string;
  timestamps?: boolean;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

/**
 * Wrap a logger so that an exception thrown while logging never reaches the
 * SDK call that emitted the entry.
 */
export function guardLogger(logger: Logger): Logger {
  const call =
    (method: keyof Logger) =>
    (message: string, data?: Record<string, unknown>): void => {
      try {
        logger[method](message, data);
      } catch {
        // Logging failures are dropped.
      }
    };
  return {
    debug: call("debug"),
    info: call("info"),
    warn: call("warn"),
    error: call("error"),
  };
}

/**
 * Leveled logger writing to the console.
 */
export class ConsoleLogger implements Logger {
  private level: LogLevel;
  private readonly prefix: string;
  private readonly timestamps: boolean;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.level = options.level ?? "warn";
    this.prefix = options.prefix ?? "[MMPay]";
    this.timestamps = options.timestamps ?? true;
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (this.enabled("debug")) {
      console.debug(this.format("DEBUG", message, data));
    }
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (this.enabled("info")) {
      console.info(this.format("INFO", message, data));
    }
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (this.enabled("warn")) {
      console.warn(this.format("WARN", message, data));
    }
  }

  error(message: string, data?: Record<string, unknown>): void {
    if (this.enabled("error")) {
      console.error(this.format("ERROR", message, data));
    }
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  private enabled(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  private format(
    level: string,
    message: string,
    data?: Record<string, unknown>,
  ): string {
    const parts: string[] = [];
    if (this.timestamps) parts.push(`[${new Date().toISOString()}]`);
    parts.push(this.prefix, `${level}: ${message}`);
    if (data) parts.push(JSON.stringify(data));
    return parts.join(" ");
  }
}
