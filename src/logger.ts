import { createWriteStream, mkdirSync, type WriteStream } from "node:fs";
import { dirname } from "node:path";
import { finished } from "node:stream/promises";
import { inspect } from "node:util";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  level: LogLevel;
  message: string;
  component?: string;
  requestId?: string;
  meta?: unknown;
  timestamp?: string;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function parseLogLevel(value: string | undefined, fallback: LogLevel = "info"): LogLevel {
  const normalized = value?.trim().toLowerCase();
  if (normalized === "debug" || normalized === "info" || normalized === "warn" || normalized === "error") {
    return normalized;
  }
  return fallback;
}

function normalizeMeta(meta: unknown): unknown {
  if (meta === undefined) {
    return undefined;
  }

  if (meta instanceof Error) {
    return { name: meta.name, message: meta.message };
  }

  try {
    JSON.stringify(meta);
    return meta;
  } catch {
    return inspect(meta, { depth: 3, breakLength: 80 });
  }
}

export function formatEntry(entry: LogEntry): string {
  const payload: Record<string, unknown> = {
    level: entry.level,
    message: entry.message,
    timestamp: entry.timestamp ?? new Date().toISOString(),
  };

  if (entry.component) {
    payload.component = entry.component;
  }

  if (entry.requestId) {
    payload.requestId = entry.requestId;
  }

  const normalizedMeta = normalizeMeta(entry.meta);
  if (normalizedMeta !== undefined) {
    payload.meta = normalizedMeta;
  }

  return JSON.stringify(payload);
}

// stdout carries MCP protocol frames, so log lines always go to stderr.
export function log(entry: LogEntry): void {
  if (LEVEL_RANK[entry.level] < LEVEL_RANK[parseLogLevel(process.env.TAGCASE_LOG_LEVEL)]) {
    return;
  }
  console.error(formatEntry(entry));
}

export interface ComponentLogger {
  debug: (message: string, meta?: unknown) => void;
  info: (message: string, meta?: unknown) => void;
  warn: (message: string, meta?: unknown) => void;
  error: (message: string, meta?: unknown) => void;
}

export interface CreateLoggerOptions {
  component: string;
  requestId?: string;
  minLevel?: LogLevel;
  /** Every entry is also appended to this file as a JSON line until `close`. */
  filePath?: string;
  /** Replaces the stderr writer. */
  write?: (line: string) => void;
}

export interface ClosableLogger extends ComponentLogger {
  /** Flushes and closes the log file, if any. Resolves once its lines are on disk. */
  close: () => Promise<void>;
}

export function createLogger(options: CreateLoggerOptions): ClosableLogger {
  const minLevel = options.minLevel ?? parseLogLevel(process.env.TAGCASE_LOG_LEVEL);
  const write = options.write ?? ((line: string) => console.error(line));

  let file: WriteStream | undefined;
  if (options.filePath) {
    mkdirSync(dirname(options.filePath), { recursive: true });
    file = createWriteStream(options.filePath, { flags: "a", encoding: "utf8" });
    // Reported here; close() rejects with the same error.
    file.on("error", (error) => {
      write(formatEntry({ level: "error", message: "Log file write failed", component: options.component, meta: error }));
    });
  }

  const emit = (level: LogLevel, message: string, meta?: unknown) => {
    if (LEVEL_RANK[level] < LEVEL_RANK[minLevel]) {
      return;
    }
    const line = formatEntry({
      level,
      message,
      component: options.component,
      requestId: options.requestId,
      meta,
    });
    write(line);
    if (file && !file.writableEnded) {
      file.write(`${line}\n`);
    }
  };

  return {
    debug: (message, meta) => emit("debug", message, meta),
    info: (message, meta) => emit("info", message, meta),
    warn: (message, meta) => emit("warn", message, meta),
    error: (message, meta) => emit("error", message, meta),
    close: async () => {
      if (!file) {
        return;
      }
      if (!file.writableEnded) {
        file.end();
      }
      await finished(file);
    },
  };
}

export const logger = {
  debug(message: string, component?: string, meta?: unknown): void {
    log({ level: "debug", message, component, meta });
  },
  info(message: string, component?: string, meta?: unknown): void {
    log({ level: "info", message, component, meta });
  },
  warn(message: string, component?: string, meta?: unknown): void {
    log({ level: "warn", message, component, meta });
  },
  error(message: string, component?: string, meta?: unknown): void {
    log({ level: "error", message, component, meta });
  },
};
