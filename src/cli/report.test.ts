import { describe, expect, it } from "vitest";

import { createAnsiFormatter } from "../core/error-format.js";
import type { PipelineOutcome } from "../pipeline/pipeline.js";

import { createConsoleReporter, formatOutcomeLines, formatProgressEvent, formatTable } from "./report.js";

const plain = createAnsiFormatter(false);

function baseOutcome(overrides: Partial<PipelineOutcome> = {}): PipelineOutcome {
  return {
    runId: "run-1",
    logPath: "/out/logs/run-1.jsonl",
    outputDir: "/out",
    zones: ["public", "admin"],
    languages: ["typescript"],
    extractions: [
      {
        zone: "public",
        status: "succeeded",
        schema: { zone: "public", path: "/out/schemas/public.yaml", format: "yaml", operationCount: 3, sha256: "abc" },
      },
      { zone: "admin", status: "failed", message: 'Schema tool failed for zone "admin": Exited with code 3.' },
    ],
    results: [
      {
        zone: "public",
        language: "typescript",
        status: "succeeded",
        files: ["index.ts"],
        outputDir: "/out/clients/typescript/public",
        durationMs: 12,
        bytes: 11,
      },
    ],
    clientIndexes: [],
    archive: { status: "skipped", reason: "Archiving is disabled." },
    stageFailures: [],
    cancelled: false,
    ok: false,
    ...overrides,
  };
}

describe("formatOutcomeLines", () => {
  it("renders one row per client and one per failed schema extraction", () => {
    expect(formatOutcomeLines(baseOutcome(), plain)).toEqual([
      "Run: run-1",
      "Output: /out",
      "Log: /out/logs/run-1.jsonl",
      "",
      "  Zone    Language    Status     Files  Detail",
      "  public  typescript  succeeded  1",
      '  admin   (schema)    failed     -      Schema tool failed for zone "admin": Exited with code 3.',
      "",
      "Clients: 1 succeeded, 0 failed",
      "Archive: skipped (Archiving is disabled.)",
    ]);
  });

  it("summarizes the archive, pruning, the client index and the monorepo sync", () => {
    const lines = formatOutcomeLines(
      baseOutcome({
        clientIndexes: ["/out/clients/typescript/index.ts"],
        archive: {
          status: "archived",
          record: {
            id: "20260401T100000000Z",
            createdAt: "2026-04-01T10:00:00.000Z",
            path: "/out/archive/20260401T100000000Z",
            entries: [{ zone: "public", language: "typescript", files: ["index.ts"], bytes: 11 }],
            skipped: [],
            totalBytes: 11,
            isLatest: true,
          },
          pruned: { removed: ["20260301T100000000Z"], kept: ["20260401T100000000Z"] },
        },
        monorepo: {
          status: "synced",
          packageRoot: "/mono/packages/api",
          synced: [{ zone: "public", language: "typescript", target: "/mono/packages/api/typescript/public" }],
          indexFiles: [],
        },
      }),
      plain,
    );

    expect(lines.slice(-5)).toEqual([
      "Clients: 1 succeeded, 0 failed",
      "Index: /out/clients/typescript/index.ts",
      "Archive: 20260401T100000000Z (1 client, 11 bytes)",
      "Pruned: 1 old archive",
      "Monorepo: synced 1 client to /mono/packages/api",
    ]);
  });

  it("lists post-generation steps that failed", () => {
    const lines = formatOutcomeLines(
      baseOutcome({
        stageFailures: [
          { stage: "index", language: "typescript", message: "EACCES: permission denied" },
          { stage: "monorepo", message: "ENOSPC: no space left on device" },
        ],
      }),
      plain,
    );

    expect(lines.slice(-3)).toEqual([
      "Archive: skipped (Archiving is disabled.)",
      "Index: failed for typescript (EACCES: permission denied)",
      "Monorepo: failed (ENOSPC: no space left on device)",
    ]);
  });

  it("colors rows by status when color is enabled", () => {
    const lines = formatOutcomeLines(baseOutcome(), createAnsiFormatter(true));
    expect(lines[5]).toBe("\x1b[32m  public  typescript  succeeded  1\x1b[0m");
  });
});

describe("formatProgressEvent", () => {
  it("describes schema and generator events", () => {
    expect(
      formatProgressEvent({ type: "extract.complete", zone: "public", payload: { operations: 3 } }, plain),
    ).toBe("[schema] public: 3 operations");
    expect(
      formatProgressEvent(
        {
          type: "generate.fail",
          zone: "admin",
          language: "python",
          payload: { kind: "exit_code", message: "gen-py: Exited with code 1." },
        },
        plain,
      ),
    ).toBe("[generate] admin/python: failed gen-py: Exited with code 1.");
    expect(
      formatProgressEvent({ type: "generate.complete", zone: "admin", language: "python", payload: { files: 1 } }, plain),
    ).toBe("[generate] admin/python: 1 file");
  });

  it("ignores events without a progress line", () => {
    expect(formatProgressEvent({ type: "generate.queued", zone: "public", language: "python" }, plain)).toBeNull();
  });

  it("writes progress lines through the console reporter", () => {
    const lines: string[] = [];
    const reporter = createConsoleReporter({ format: plain, write: (line) => lines.push(line) });

    reporter.log({ type: "run.start" });
    reporter.log({ type: "run.cancelled", payload: { reason: "SIGINT" } });

    expect(lines).toEqual(["Run cancelled (SIGINT)."]);
  });
});

describe("formatTable", () => {
  it("pads columns to the widest cell and trims trailing spaces", () => {
    expect(formatTable(["A", "Long header"], [["wide cell", ""]])).toEqual([
      "  A          Long header",
      "  wide cell",
    ]);
  });
});
