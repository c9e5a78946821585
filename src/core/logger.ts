/*
Purpose: structured JSONL event logging for pipeline runs.
Assumptions: one logger per run; events are appended synchronously so ordering matches emission.
Usage: const log = new JsonlLogger(runLogPath(outputDir, runId), { runId }); log.log({ type: "extract.start", zone });
*/

import fs from "node:fs";
import path from "node:path";

// =============================================================================
// TYPES
// =============================================================================

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export type LogEvent = {
  type: string;
  zone?: string;
  language?: string;
  payload?: JsonObject;
};

export type LogRecord = LogEvent & {
  ts: string;
  run_id: string;
};

export interface EventLogger {
  log(event: LogEvent): void;
}

// =============================================================================
// JSONL LOGGER
// =============================================================================

export class JsonlLogger implements EventLogger {
  private readonly runId: string;
  private readonly now: () => Date;
  private closed = false;

  constructor(
    public readonly filePath: string,
    opts: { runId: string; now?: () => Date },
  ) {
    this.runId = opts.runId;
    this.now = opts.now ?? (() => new Date());
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
  }

  log(event: LogEvent): void {
    if (this.closed) return;

    const record: LogRecord = {
      ts: this.now().toISOString(),
      run_id: this.runId,
      ...event,
    };
    fs.appendFileSync(this.filePath, `${JSON.stringify(record)}\n`, "utf8");
  }

  close(): void {
    this.closed = true;
  }
}

// =============================================================================
// COMPOSITION
// =============================================================================

export const NULL_LOGGER: EventLogger = {
  log: () => undefined,
};

export function createTeeLogger(...loggers: EventLogger[]): EventLogger {
  return {
    log: (event) => {
      for (const logger of loggers) {
        logger.log(event);
      }
    },
  };
}

export function readJsonlRecords(filePath: string): LogRecord[] {
  if (!fs.existsSync(filePath)) return [];

  return fs
    .readFileSync(filePath, "utf8")
    .split("\n")
    .filter((line) => line.trim().length > 0)
    .map((line): LogRecord => JSON.parse(line));
}
