/**
 * Structured logging for discovery, indexing and selection
 *
 * Everything is written to stderr; stdout belongs to the quotation.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  event: string;
  path?: string;
  message?: string;
  details?: Record<string, unknown>;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_RANK;
}

/**
 * Resolve the threshold from FORTUNE_DEBUG / FORTUNE_LOG_LEVEL (default "warn")
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  if (env.FORTUNE_DEBUG) {
    return "debug";
  }
  const configured = env.FORTUNE_LOG_LEVEL?.trim().toLowerCase();
  if (configured && isLogLevel(configured)) {
    return configured;
  }
  return "warn";
}

class Logger {
  #enabled = true;
  #level: LogLevel = resolveLogLevel();

  /**
   * Log an event
   */
  log(level: LogLevel, event: string, data?: Partial<LogEntry>): void {
    if (!this.#enabled || LEVEL_RANK[level] < LEVEL_RANK[this.#level]) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      event,
      ...data,
    };

    const parts = [`[${entry.timestamp}] [${level.toUpperCase()}] [${event}]`];

    if (entry.path) {
      parts.push(entry.path);
    }

    if (entry.message) {
      parts.push(entry.message);
    }

    if (entry.details) {
      parts.push(JSON.stringify(entry.details));
    }

    if (level === "warn") {
      console.warn(parts.join(" "));
    } else {
      console.error(parts.join(" "));
    }
  }

  debug(event: string, data?: Partial<LogEntry>): void {
    this.log("debug", event, data);
  }

  info(event: string, data?: Partial<LogEntry>): void {
    this.log("info", event, data);
  }

  warn(event: string, data?: Partial<LogEntry>): void {
    this.log("warn", event, data);
  }

  error(event: string, data?: Partial<LogEntry>): void {
    this.log("error", event, data);
  }

  /**
   * Enable/disable logging
   */
  setEnabled(enabled: boolean): void {
    this.#enabled = enabled;
  }

  setLevel(level: LogLevel): void {
    this.#level = level;
  }

  get level(): LogLevel {
    return this.#level;
  }
}

/**
 * Global logger instance
 */
export const logger = new Logger();
