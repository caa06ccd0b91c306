/**
 * Logger utility for Twinpane
 *
 * Provides structured logging with prefixes for different modules.
 * All logs include timestamps for debugging timing issues.
 *
 * The terminal belongs to the UI while it runs, so log lines are routed
 * through a sink: the console by default, a file when one is configured,
 * or nowhere while the screen is active without a log file.
 */

import { appendFileSync } from "node:fs";

type LogLevel = "debug" | "info" | "warn" | "error";

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  module: string;
  message: string;
  data?: unknown;
}

/**
 * Destination for formatted log lines.
 */
export type LogSink = (level: LogLevel, line: string, data?: unknown) => void;

/**
 * Formats a log entry for output.
 */
export function formatLog(entry: LogEntry): string {
  const time = entry.timestamp.split("T")[1]?.slice(0, 12) ?? entry.timestamp;
  const prefix = `[${time}] [${entry.level.toUpperCase().padEnd(5)}] [${entry.module}]`;
  return `${prefix} ${entry.message}`;
}

export const consoleSink: LogSink = (level, line, data) => {
  const extra = data !== undefined ? data : "";
  switch (level) {
    case "debug":
    case "info":
      console.log(line, extra);
      break;
    case "warn":
      console.warn(line, extra);
      break;
    case "error":
      console.error(line, extra);
      break;
  }
};

export const silentSink: LogSink = () => {};

/**
 * Creates a sink that appends each line to a file.
 * Data payloads are serialized as JSON on the same line.
 */
export function createFileSink(filePath: string): LogSink {
  return (_level, line, data) => {
    const suffix = data === undefined ? "" : ` ${serializeData(data)}`;
    appendFileSync(filePath, `${line}${suffix}\n`, "utf-8");
  };
}

function serializeData(data: unknown): string {
  if (data instanceof Error) {
    return JSON.stringify({ name: data.name, message: data.message });
  }
  try {
    return JSON.stringify(data);
  } catch {
    return String(data);
  }
}

let activeSink: LogSink = consoleSink;

/**
 * Replaces the sink used by every logger. Returns the previous sink.
 */
export function setLogSink(sink: LogSink): LogSink {
  const previous = activeSink;
  activeSink = sink;
  return previous;
}

/**
 * Creates a logger for a specific module.
 */
export function createLogger(module: string) {
  const log = (level: LogLevel, message: string, data?: unknown) => {
    if (level === "debug" && !process.env.DEBUG) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      module,
      message,
      data,
    };

    activeSink(level, formatLog(entry), data);
  };

  return {
    debug: (message: string, data?: unknown) => log("debug", message, data),
    info: (message: string, data?: unknown) => log("info", message, data),
    warn: (message: string, data?: unknown) => log("warn", message, data),
    error: (message: string, data?: unknown) => log("error", message, data),
  };
}

// Pre-created loggers for each module
export const appLog = createLogger("App");
export const fsLog = createLogger("FileOps");
export const uiLog = createLogger("UI");
