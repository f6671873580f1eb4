/**
 * Structured logging for table operations
 */

import { isDebugEnabled } from "../config.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  event: string;
  table?: string;
  column?: string;
  message?: string;
  details?: Record<string, unknown>;
}

class Logger {
  #enabled = true;

  /**
   * Log an event
   */
  log(level: LogLevel, event: string, data?: Partial<LogEntry>): void {
    if (!this.#enabled) return;
    if (level === "debug" && !isDebugEnabled()) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      event,
      ...data,
    };

    console[level === "info" ? "log" : level](formatLogEntry(entry));
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
}

/**
 * Format an entry as a single console line:
 * `[timestamp] [LEVEL] [event] table/column message {details}`
 */
export function formatLogEntry(entry: LogEntry): string {
  const parts = [`[${entry.timestamp}] [${entry.level.toUpperCase()}] [${entry.event}]`];

  if (entry.table || entry.column) {
    parts.push(`${entry.table ?? ""}/${entry.column ?? ""}`);
  }

  if (entry.message) {
    parts.push(entry.message);
  }

  if (entry.details) {
    parts.push(JSON.stringify(entry.details));
  }

  return parts.join(" ");
}

/**
 * Global logger instance
 */
export const logger = new Logger();
