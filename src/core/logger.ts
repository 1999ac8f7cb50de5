/**
 * Structured event logging for index builds.
 * Purpose: give the build one sink for progress and warnings, rendered for humans or as JSONL.
 * Assumptions: events are small JSON objects; the JSONL file is append-only.
 * Usage: logIndexEvent(logger, "catalog.fetch.fail", { error }, "warn").
 */

import fs from "node:fs";
import path from "node:path";

// =============================================================================
// TYPES
// =============================================================================

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export type LogLevel = "debug" | "info" | "warn";

export type LogEvent = {
  ts: string;
  type: string;
  level: LogLevel;
  payload?: JsonObject;
};

export interface IndexLogger {
  log(event: LogEvent): void;
}

type WritableLike = { write(chunk: string): unknown };

// =============================================================================
// LOGGERS
// =============================================================================

const LEVEL_RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2 };

export class StreamLogger implements IndexLogger {
  private readonly minLevel: LogLevel;

  constructor(
    private readonly stream: WritableLike = process.stderr,
    opts: { minLevel?: LogLevel } = {},
  ) {
    this.minLevel = opts.minLevel ?? "warn";
  }

  log(event: LogEvent): void {
    if (LEVEL_RANK[event.level] < LEVEL_RANK[this.minLevel]) return;
    this.stream.write(`${formatEventLine(event)}\n`);
  }
}

export class JsonlLogger implements IndexLogger {
  constructor(
    private readonly filePath: string,
    private readonly defaults: JsonObject = {},
  ) {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
  }

  log(event: LogEvent): void {
    const record = { ...this.defaults, ...event };
    fs.appendFileSync(this.filePath, `${JSON.stringify(record)}\n`, "utf8");
  }
}

export function createTeeLogger(loggers: IndexLogger[]): IndexLogger {
  return {
    log(event) {
      for (const logger of loggers) {
        logger.log(event);
      }
    },
  };
}

export const silentLogger: IndexLogger = { log: () => undefined };

export function logIndexEvent(
  logger: IndexLogger,
  type: string,
  payload?: JsonObject,
  level: LogLevel = "info",
): void {
  logger.log({ ts: new Date().toISOString(), type, level, ...(payload ? { payload } : {}) });
}

// =============================================================================
// FORMATTING
// =============================================================================

export function formatEventLine(event: Pick<LogEvent, "type" | "level" | "payload">): string {
  const prefix = event.level === "warn" ? "warning" : event.level;
  const fields = Object.entries(event.payload ?? {}).map(
    ([key, value]) => `${key}=${formatFieldValue(value)}`,
  );

  return [`${prefix}: ${event.type}`, ...fields].join(" ");
}

function formatFieldValue(value: JsonValue): string {
  if (typeof value === "string") {
    return /\s/.test(value) ? JSON.stringify(value) : value;
  }

  return JSON.stringify(value);
}
