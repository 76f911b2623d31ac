import fs from "node:fs";
import path from "node:path";

import { isoNow } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type JsonValue = string | number | boolean | null | JsonValue[] | JsonObject;
export type JsonObject = { [key: string]: JsonValue };

export type LogEvent = {
  type: string;
  payload?: JsonObject;
};

export type JsonlLoggerOptions = {
  runId: string;
  now?: () => string;
};

// =============================================================================
// JSONL LOGGER
// =============================================================================

/**
 * Append-only event log, one JSON object per line.
 * Writes are synchronous so a crash never loses the event that preceded it.
 * The log directory is created on the first write, so read-only commands never touch it.
 */
export class JsonlLogger {
  readonly filePath: string;
  private readonly runId: string;
  private readonly now: () => string;
  private dirReady = false;

  constructor(filePath: string, opts: JsonlLoggerOptions) {
    this.filePath = filePath;
    this.runId = opts.runId;
    this.now = opts.now ?? isoNow;
  }

  log(event: LogEvent): void {
    const record: JsonObject = { ts: this.now(), type: event.type, run_id: this.runId };
    if (event.payload) {
      record.payload = event.payload;
    }

    if (!this.dirReady) {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      this.dirReady = true;
    }
    fs.appendFileSync(this.filePath, `${JSON.stringify(record)}\n`, "utf8");
  }
}

export function logEvent(logger: JsonlLogger, type: string, payload?: JsonObject): void {
  logger.log(payload ? { type, payload } : { type });
}

/** Reads the events back; lines that are not JSON objects (e.g. a torn last write) are skipped. */
export function readJsonlEvents(filePath: string): Array<JsonObject> {
  if (!fs.existsSync(filePath)) return [];

  return fs
    .readFileSync(filePath, "utf8")
    .split("\n")
    .filter((line) => line.trim().length > 0)
    .flatMap((line) => {
      const parsed = parseJsonObject(line);
      return parsed ? [parsed] : [];
    });
}

function parseJsonObject(line: string): JsonObject | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return null;
  }
  return isJsonObject(parsed) ? parsed : null;
}

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
