/**
 * Logging. Console output in the "[Scope] message" style, plus an optional
 * JSONL sink that appends one JSON line per event.
 *
 * There is no process-wide logger: callers create a RunLogger and pass it
 * (or a child of it) into every component that logs.
 */

import { mkdir, appendFile } from "fs/promises";
import { dirname } from "path";

/**
 * Ensures directory exists (mkdir -p), then appends one JSON line.
 */
export async function appendJsonl(
  path: string,
  event: unknown
): Promise<void> {
  const dir = dirname(path);
  await mkdir(dir, { recursive: true });
  const line = JSON.stringify(event) + "\n";
  await appendFile(path, line);
}

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export type LogFields = Record<string, unknown>;

export interface RunLogger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
  /** Same sinks, nested scope ("runExperiment" → "runExperiment:batch-3") */
  child(scope: string): RunLogger;
  /** Resolves once every queued JSONL line is written */
  flush(): Promise<void>;
}

export interface RunLoggerOptions {
  /** Minimum console level; default from LOG_LEVEL, else info */
  level?: LogLevel;
  scope?: string;
  /** When set, every event (debug included) is appended here */
  jsonlPath?: string;
  now?: () => Date;
}

export function parseLogLevel(raw: string | undefined): LogLevel {
  const v = raw?.toLowerCase();
  if (v === "debug" || v === "info" || v === "warn" || v === "error") return v;
  return "info";
}

interface Sink {
  level: LogLevel;
  jsonlPath?: string;
  now: () => Date;
  pending: Promise<void>;
}

function formatFields(fields?: LogFields): string {
  if (!fields || Object.keys(fields).length === 0) return "";
  try {
    return " " + JSON.stringify(fields);
  } catch {
    return " [unserializable fields]";
  }
}

function createScopedLogger(sink: Sink, scope: string): RunLogger {
  function emit(level: LogLevel, message: string, fields?: LogFields): void {
    if (LEVEL_ORDER[level] >= LEVEL_ORDER[sink.level]) {
      const line = `[${scope}] ${message}${formatFields(fields)}`;
      if (level === "error") console.error(line);
      else if (level === "warn") console.warn(line);
      else console.log(line);
    }
    const jsonlPath = sink.jsonlPath;
    if (jsonlPath) {
      const event = { ts: sink.now().toISOString(), level, scope, message, ...fields };
      sink.pending = sink.pending
        .then(() => appendJsonl(jsonlPath, event))
        .catch((err) => console.warn("[logger] JSONL write failed:", err instanceof Error ? err.message : err));
    }
  }

  return {
    debug: (message, fields) => emit("debug", message, fields),
    info: (message, fields) => emit("info", message, fields),
    warn: (message, fields) => emit("warn", message, fields),
    error: (message, fields) => emit("error", message, fields),
    child: (childScope) => createScopedLogger(sink, `${scope}:${childScope}`),
    flush: () => sink.pending,
  };
}

export function createRunLogger(options: RunLoggerOptions = {}): RunLogger {
  const sink: Sink = {
    level: options.level ?? parseLogLevel(process.env.LOG_LEVEL),
    jsonlPath: options.jsonlPath,
    now: options.now ?? (() => new Date()),
    pending: Promise.resolve(),
  };
  return createScopedLogger(sink, options.scope ?? "rater");
}
