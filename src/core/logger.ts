/*
Purpose: append structured events to a JSONL file under the inventory root.
Assumptions: one process writes at a time (the sync lock serializes writers); writes are synchronous.
Usage: const log = new JsonlLogger(eventLogPath(paths)); log.log({ type: "sync.state", payload: { state } });
*/

import fs from "node:fs";
import path from "node:path";

import { isoNow } from "./utils.js";

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export type LogEvent = {
  type: string;
  level?: "info" | "warn" | "error";
  payload?: JsonObject;
};

export type EventLogger = {
  log(event: LogEvent): void;
};

export class JsonlLogger implements EventLogger {
  private ensured = false;

  constructor(
    public readonly filePath: string,
    private readonly base: JsonObject = {},
  ) {}

  log(event: LogEvent): void {
    if (!this.ensured) {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      this.ensured = true;
    }

    const line: JsonObject = {
      ts: isoNow(),
      level: event.level ?? "info",
      type: event.type,
      ...this.base,
    };
    if (event.payload) {
      line.payload = event.payload;
    }

    fs.appendFileSync(this.filePath, `${JSON.stringify(line)}\n`, "utf8");
  }
}

/** Collects events in memory. Used where no log file is configured and by tests. */
export class MemoryLogger implements EventLogger {
  readonly events: LogEvent[] = [];

  log(event: LogEvent): void {
    this.events.push(event);
  }

  ofType(type: string): LogEvent[] {
    return this.events.filter((event) => event.type === type);
  }
}

export function logWarning(logger: EventLogger, type: string, payload?: JsonObject): void {
  logger.log({ type, level: "warn", payload });
}
