/**
 * Structured logging for trail and journal operations
 *
 * Lines go to stderr so a CLI's stdout stays machine-readable:
 * `[timestamp] [LEVEL] [event] path messageId message {details}`
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  event: string;
  path?: string;
  messageId?: string;
  message?: string;
  details?: Record<string, unknown>;
}

/**
 * Fields a caller may attach to an event
 */
export type LogData = Partial<Omit<LogEntry, "timestamp" | "level" | "event">>;

const SEVERITY: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

/**
 * Render an entry as a single line
 */
export function formatLogLine(entry: LogEntry): string {
  const fields = [entry.path, entry.messageId, entry.message].filter(
    (field): field is string => Boolean(field)
  );
  const details = entry.details ? [JSON.stringify(entry.details)] : [];

  return [
    `[${entry.timestamp}] [${entry.level.toUpperCase()}] [${entry.event}]`,
    ...fields,
    ...details,
  ].join(" ");
}

/**
 * Debug output is opt-in through MSGTRAIL_DEBUG
 */
function thresholdFromEnv(): LogLevel {
  return process.env.MSGTRAIL_DEBUG ? "debug" : "info";
}

class Logger {
  #enabled = true;
  #threshold: LogLevel | undefined;

  log(level: LogLevel, event: string, data?: LogData): void {
    if (!this.#enabled || SEVERITY[level] < SEVERITY[this.level]) {
      return;
    }

    const line = formatLogLine({ ...data, timestamp: new Date().toISOString(), level, event });

    if (level === "warn") {
      console.warn(line);
    } else {
      console.error(line);
    }
  }

  debug(event: string, data?: LogData): void {
    this.log("debug", event, data);
  }

  info(event: string, data?: LogData): void {
    this.log("info", event, data);
  }

  warn(event: string, data?: LogData): void {
    this.log("warn", event, data);
  }

  error(event: string, data?: LogData): void {
    this.log("error", event, data);
  }

  /**
   * Lowest level written; follows MSGTRAIL_DEBUG until set explicitly
   */
  get level(): LogLevel {
    return this.#threshold ?? thresholdFromEnv();
  }

  setLevel(level: LogLevel | undefined): void {
    this.#threshold = level;
  }

  setEnabled(enabled: boolean): void {
    this.#enabled = enabled;
  }

  get enabled(): boolean {
    return this.#enabled;
  }
}

/**
 * Shared logger instance
 */
export const logger = new Logger();
