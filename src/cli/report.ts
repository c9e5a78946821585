/*
Purpose: render pipeline progress and the end-of-run summary for the terminal.
Assumptions: callers pass an AnsiFormatter resolved for the target stream; lines carry no trailing spaces.
Usage: const reporter = createConsoleReporter({ format }); printOutcome(outcome, format);
*/

import type { AnsiFormatter, AnsiStyle } from "../core/error-format.js";
import type { EventLogger, JsonObject, LogEvent } from "../core/logger.js";
import type { PipelineOutcome, StageFailure } from "../pipeline/pipeline.js";

// =============================================================================
// PROGRESS
// =============================================================================

export type ConsoleReporterOptions = {
  format: AnsiFormatter;
  write?: (line: string) => void;
};

export function createConsoleReporter(opts: ConsoleReporterOptions): EventLogger {
  const write = opts.write ?? ((line: string) => console.log(line));
  return {
    log(event: LogEvent): void {
      const line = formatProgressEvent(event, opts.format);
      if (line) write(line);
    },
  };
}

export function formatProgressEvent(event: LogEvent, format: AnsiFormatter): string | null {
  const payload = event.payload ?? {};
  const target = event.language ? `${event.zone}/${event.language}` : `${event.zone}`;

  switch (event.type) {
    case "extract.complete":
      return `${format("[schema]", ["dim"])} ${target}: ${plural(numberField(payload, "operations"), "operation")}`;
    case "extract.fail":
      return `${format("[schema]", ["dim"])} ${target}: ${format("failed", ["red"])} ${stringField(payload, "message")}`;
    case "generate.complete":
      return `${format("[generate]", ["dim"])} ${target}: ${plural(numberField(payload, "files"), "file")}`;
    case "generate.fail":
      return `${format("[generate]", ["dim"])} ${target}: ${format("failed", ["red"])} ${stringField(payload, "message")}`;
    case "deps.missing":
      return `${format("[deps]", ["dim"])} ${event.language ?? ""}: ${stringField(payload, "tool")} not available`;
    case "deps.install.start":
      return `${format("[deps]", ["dim"])} ${event.language ?? ""}: installing with ${stringField(payload, "command")}`;
    case "run.cancelled":
      return format(`Run cancelled (${stringField(payload, "reason")}).`, ["yellow"]);
    default:
      return null;
  }
}

// =============================================================================
// SUMMARY
// =============================================================================

export function formatOutcomeLines(outcome: PipelineOutcome, format: AnsiFormatter): string[] {
  const rows: string[][] = [];
  const styles: Array<AnsiStyle | undefined> = [];

  for (const zone of outcome.zones) {
    const extraction = outcome.extractions.find((entry) => entry.zone === zone);
    if (extraction?.status === "failed") {
      rows.push([zone, "(schema)", "failed", "-", extraction.message]);
      styles.push("red");
      continue;
    }

    for (const result of outcome.results.filter((entry) => entry.zone === zone)) {
      rows.push([
        result.zone,
        result.language,
        result.status,
        `${result.files.length}`,
        result.error?.message ?? "",
      ]);
      styles.push(result.status === "succeeded" ? "green" : "red");
    }
  }

  const lines = [`Run: ${outcome.runId}`, `Output: ${outcome.outputDir}`, `Log: ${outcome.logPath}`, ""];
  const table = formatTable(["Zone", "Language", "Status", "Files", "Detail"], rows);
  lines.push(table[0]);
  table.slice(1).forEach((line, index) => {
    const style = styles[index];
    lines.push(style ? format(line, [style]) : line);
  });
  lines.push("");

  const succeeded = outcome.results.filter((result) => result.status === "succeeded").length;
  const failed = outcome.results.length - succeeded;
  lines.push(`Clients: ${succeeded} succeeded, ${failed} failed`);

  for (const indexPath of outcome.clientIndexes) {
    lines.push(`Index: ${indexPath}`);
  }

  lines.push(formatArchiveLine(outcome));
  if (outcome.archive.status === "archived" && outcome.archive.pruned && outcome.archive.pruned.removed.length > 0) {
    lines.push(`Pruned: ${plural(outcome.archive.pruned.removed.length, "old archive")}`);
  }

  if (outcome.monorepo) {
    lines.push(
      outcome.monorepo.status === "synced"
        ? `Monorepo: synced ${plural(outcome.monorepo.synced.length, "client")} to ${outcome.monorepo.packageRoot}`
        : `Monorepo: not found (${outcome.monorepo.packageRoot})`,
    );
  }

  for (const failure of outcome.stageFailures) {
    lines.push(format(formatStageFailure(failure), ["red"]));
  }

  return lines;
}

export function printOutcome(outcome: PipelineOutcome, format: AnsiFormatter): void {
  for (const line of formatOutcomeLines(outcome, format)) {
    console.log(line);
  }
}

function formatArchiveLine(outcome: PipelineOutcome): string {
  const stage = outcome.archive;
  if (stage.status === "archived") {
    return `Archive: ${stage.record.id} (${plural(stage.record.entries.length, "client")}, ${stage.record.totalBytes} bytes)`;
  }
  if (stage.status === "failed") {
    return `Archive: failed (${stage.message})`;
  }
  return `Archive: skipped (${stage.reason})`;
}

const STAGE_LABELS: Record<StageFailure["stage"], string> = {
  index: "Index",
  prune: "Prune",
  monorepo: "Monorepo",
};

function formatStageFailure(failure: StageFailure): string {
  const scope = failure.language ? ` for ${failure.language}` : "";
  return `${STAGE_LABELS[failure.stage]}: failed${scope} (${failure.message})`;
}

// =============================================================================
// TABLES
// =============================================================================

// Left-aligned columns separated by two spaces, indented by two.
export function formatTable(headers: string[], rows: string[][]): string[] {
  const widths = headers.map((header, column) =>
    Math.max(header.length, ...rows.map((row) => (row[column] ?? "").length)),
  );
  const render = (cells: string[]): string =>
    `  ${cells.map((cell, column) => pad(cell, widths[column])).join("  ")}`.trimEnd();

  return [render(headers), ...rows.map(render)];
}

export function pad(value: string, width: number): string {
  return value.padEnd(width, " ");
}

export function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? "" : "s"}`;
}

function stringField(payload: JsonObject, key: string): string {
  const value = payload[key];
  return typeof value === "string" ? value : "";
}

function numberField(payload: JsonObject, key: string): number {
  const value = payload[key];
  return typeof value === "number" ? value : 0;
}
