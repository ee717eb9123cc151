/**
 * Structured logging for index builds and loads
 *
 * Entries go to the console as one line each. Debug entries are dropped
 * unless BLOCKSPLIT_DEBUG is set when the entry is logged.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  event: string;
  /** Source or index file the entry concerns */
  path?: string;
  message?: string;
  details?: Record<string, unknown>;
}

type LogFields = Pick<LogEntry, "path" | "message" | "details">;

const WRITERS: Record<LogLevel, (line: string) => void> = {
  debug: (line) => console.debug(line),
  info: (line) => console.log(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

/**
 * `[time] [LEVEL] [event] path message {details}`
 */
export function formatEntry(entry: LogEntry): string {
  const parts = [`[${entry.timestamp}] [${entry.level.toUpperCase()}] [${entry.event}]`];
  if (entry.path) parts.push(entry.path);
  if (entry.message) parts.push(entry.message);
  if (entry.details) parts.push(JSON.stringify(entry.details));
  return parts.join(" ");
}

class Logger {
  #enabled = true;

  log(level: LogLevel, event: string, fields: LogFields = {}): void {
    if (!this.#enabled) return;
    if (level === "debug" && !process.env.BLOCKSPLIT_DEBUG) return;

    WRITERS[level](formatEntry({ timestamp: new Date().toISOString(), level, event, ...fields }));
  }

  debug(event: string, fields?: LogFields): void {
    this.log("debug", event, fields);
  }

  info(event: string, fields?: LogFields): void {
    this.log("info", event, fields);
  }

  warn(event: string, fields?: LogFields): void {
    this.log("warn", event, fields);
  }

  error(event: string, fields?: LogFields): void {
    this.log("error", event, fields);
  }

  setEnabled(enabled: boolean): void {
    this.#enabled = enabled;
  }
}

export const logger = new Logger();
