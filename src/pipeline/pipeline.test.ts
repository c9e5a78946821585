import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { ProjectConfigSchema, type ProjectConfig } from "../core/config.js";
import { ConfigError, MissingDependencyError, ValidationError } from "../core/errors.js";
import { buildHostRegistry } from "../routes/route-table.js";

import {
  FakeProcessRunner,
  MemoryLogger,
  argAfter,
  exitWith,
  hangUntilAborted,
  writeClient,
  writeSchema,
} from "./__tests__/fakes.js";
import { runPipeline, selectTargets } from "./pipeline.js";
import { buildRunContext, type PipelineOptions } from "./run-context.js";

const host = buildHostRegistry({
  apps: [
    {
      id: "blog",
      routes: [
        { path: "/posts", handler: "blog.list", methods: ["GET", "POST"], metadata: {} },
        { path: "/posts/{id}", handler: "blog.get", methods: ["GET"], metadata: {} },
      ],
    },
    { id: "billing", routes: [{ path: "/invoices", handler: "billing.list", methods: ["GET"], metadata: {} }] },
  ],
});

describe("runPipeline", () => {
  let root: string;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), "zoneforge-pipeline-"));
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  function makeConfig(overrides: Record<string, unknown> = {}): ProjectConfig {
    return ProjectConfigSchema.parse({
      output_dir: path.join(root, "openapi"),
      routes_manifest: path.join(root, "routes.json"),
      max_workers: 2,
      schema_tool: {
        command: "schema-tool",
        args: ["--zone", "{zone}", "--routes", "{routes}", "--out", "{output}"],
      },
      targets: {
        typescript: {
          command: "gen-ts",
          args: ["--input", "{schema}", "--out", "{output}"],
          check: { command: "probe", args: ["typescript"] },
          index: true,
        },
        python: {
          command: "gen-py",
          args: ["--input", "{schema}", "--out", "{output}"],
          check: { command: "probe", args: ["python"] },
        },
      },
      zones: {
        public: { apps: ["blog"] },
        admin: { apps: ["billing"], public: false },
      },
      ...overrides,
    });
  }

  function defaultRunner(): FakeProcessRunner {
    return new FakeProcessRunner()
      .on("probe", () => ({ stdout: "ok" }))
      .on("schema-tool", writeSchema())
      .on("gen-ts", writeClient({ "index.ts": "export {};\n" }))
      .on("gen-py", writeClient({ "client.py": "pass\n", "models.py": "" }));
  }

  function run(config: ProjectConfig, runner: FakeProcessRunner, options: PipelineOptions = {}) {
    const logger = new MemoryLogger();
    const ctx = buildRunContext({
      config,
      cwd: root,
      options: { runId: "run-1", ...options },
      ports: {
        processRunner: runner,
        clock: { now: () => new Date("2026-04-01T10:00:00.000Z") },
        logSink: { createRunLogger: () => logger },
        hostRegistry: { load: async () => host },
      },
    });
    return { logger, outcome: runPipeline(ctx) };
  }

  it("generates every (zone, language) pair and archives all four clients", async () => {
    const { logger, outcome } = run(makeConfig(), defaultRunner());
    const result = await outcome;

    expect(result.ok).toBe(true);
    expect(result.stageFailures).toEqual([]);
    expect(result.zones).toEqual(["public", "admin"]);
    expect(result.languages).toEqual(["typescript", "python"]);
    expect(result.results.map((r) => [r.zone, r.language, r.status])).toEqual([
      ["public", "typescript", "succeeded"],
      ["public", "python", "succeeded"],
      ["admin", "typescript", "succeeded"],
      ["admin", "python", "succeeded"],
    ]);
    expect(result.extractions.map((e) => (e.status === "succeeded" ? e.schema.operationCount : -1))).toEqual([3, 1]);

    expect(result.archive.status).toBe("archived");
    if (result.archive.status !== "archived") return;
    expect(result.archive.record.id).toBe("20260401T100000000Z");
    expect(result.archive.record.entries).toHaveLength(4);
    expect(fs.readlinkSync(path.join(root, "openapi", "archive", "latest"))).toBe("20260401T100000000Z");

    expect(result.clientIndexes).toEqual([path.join(root, "openapi", "clients", "typescript", "index.ts")]);
    expect(result.logPath).toBe(path.join(root, "openapi", "logs", "run-1.jsonl"));
    expect(logger.types()[0]).toBe("run.start");
    expect(logger.types().at(-1)).toBe("run.complete");
    expect(logger.closed).toBe(true);
  });

  it("hands each zone's schema tool only that zone's routes", async () => {
    const runner = defaultRunner();
    await run(makeConfig(), runner).outcome;

    const adminRoutes = JSON.parse(
      fs.readFileSync(path.join(root, "openapi", ".work", "admin", "routes.json"), "utf8"),
    );
    expect(adminRoutes.routes.map((route: { path: string }) => route.path)).toEqual(["/apix/admin/v1/invoices"]);

    const schemaCalls = runner.callsFor("schema-tool").map((call) => argAfter(call.args, "--zone")).sort();
    expect(schemaCalls).toEqual(["admin", "public"]);
  });

  it("rejects an unknown app before scheduling any work", async () => {
    const runner = defaultRunner();
    const config = makeConfig({ zones: { public: { apps: ["blog", "ghost"] }, admin: { apps: ["billing"] } } });

    const { outcome } = run(config, runner);
    const error = await outcome.catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ValidationError);
    if (!(error instanceof ValidationError)) return;
    expect(error.issues).toEqual([
      { kind: "missing_app", zone: "public", app: "ghost", message: 'Zone "public" references unknown app "ghost".' },
    ]);
    expect(runner.calls).toHaveLength(0);
    expect(fs.existsSync(path.join(root, "openapi", "archive"))).toBe(false);
  });

  it("archives partial successes and reports the failed target", async () => {
    const runner = defaultRunner().on("gen-py", exitWith(1, "python generator broke"));

    const result = await run(makeConfig(), runner).outcome;

    expect(result.ok).toBe(false);
    expect(result.results.filter((r) => r.status === "failed").map((r) => [r.zone, r.language])).toEqual([
      ["public", "python"],
      ["admin", "python"],
    ]);
    expect(result.archive.status === "archived" && result.archive.record.entries.length).toBe(2);
    expect(result.archive.status === "archived" && result.archive.record.skipped.length).toBe(2);
  });

  it("keeps every result when the archive directory cannot be written", async () => {
    fs.mkdirSync(path.join(root, "openapi"), { recursive: true });
    fs.writeFileSync(path.join(root, "openapi", "archive"), "not a directory");

    const { logger, outcome } = run(makeConfig(), defaultRunner());
    const result = await outcome;

    expect(result.ok).toBe(false);
    expect(result.results).toHaveLength(4);
    expect(result.results.every((r) => r.status === "succeeded")).toBe(true);
    expect(result.archive.status).toBe("failed");
    expect(result.clientIndexes).toHaveLength(1);
    expect(logger.types()).toContain("archive.fail");
    expect(logger.types().at(-1)).toBe("run.complete");
  });

  it("reports client index and monorepo failures as stage failures", async () => {
    fs.mkdirSync(path.join(root, "openapi", "clients", "typescript", "index.ts"), { recursive: true });
    fs.mkdirSync(path.join(root, "mono"), { recursive: true });
    fs.writeFileSync(path.join(root, "mono", "packages"), "not a directory");
    const config = makeConfig({ monorepo: { enabled: true, path: path.join(root, "mono") } });

    const result = await run(config, defaultRunner()).outcome;

    expect(result.ok).toBe(false);
    expect(result.results).toHaveLength(4);
    expect(result.archive.status).toBe("archived");
    expect(result.clientIndexes).toEqual([]);
    expect(result.monorepo).toBeUndefined();
    expect(result.stageFailures.map((failure) => [failure.stage, failure.language])).toEqual([
      ["index", "typescript"],
      ["monorepo", undefined],
    ]);
  });

  it("schedules no generators for a zone whose extraction failed", async () => {
    const schema = writeSchema();
    const runner = defaultRunner().on("schema-tool", (request) =>
      argAfter(request.args, "--zone") === "admin" ? { exitCode: 3, stderr: "bad serializer" } : schema(request),
    );

    const result = await run(makeConfig(), runner).outcome;

    expect(result.ok).toBe(false);
    expect(result.extractions[1]).toEqual({
      zone: "admin",
      status: "failed",
      message: 'Schema tool failed for zone "admin": Exited with code 3.',
      diagnostic: "bad serializer",
    });
    expect(result.results.map((r) => r.zone)).toEqual(["public", "public"]);
    expect(runner.callsFor("gen-ts").map((call) => argAfter(call.args, "--out"))).toEqual([
      path.join(root, "openapi", "clients", "typescript", "public"),
    ]);
  });

  it("limits the run to the selected zones and languages", async () => {
    const runner = defaultRunner();

    const result = await run(makeConfig(), runner, { zones: ["adm*"], languages: ["python"], archive: false })
      .outcome;

    expect(result.results.map((r) => [r.zone, r.language])).toEqual([["admin", "python"]]);
    expect(result.archive).toEqual({ status: "skipped", reason: "Archiving is disabled." });
    expect(result.clientIndexes).toEqual([]);
  });

  it("stops before extraction when a generator tool is missing", async () => {
    const runner = defaultRunner().on("probe", (request) =>
      request.args[0] === "python" ? { exitCode: 127, stderr: "datamodel-codegen: not found" } : { stdout: "ok" },
    );

    const error = await run(makeConfig(), runner).outcome.catch((err: unknown) => err);

    expect(error).toBeInstanceOf(MissingDependencyError);
    expect(runner.callsFor("schema-tool")).toHaveLength(0);
  });

  it("cancels outstanding generators when the run timeout elapses", async () => {
    const runner = defaultRunner().on("gen-ts", hangUntilAborted()).on("gen-py", hangUntilAborted());

    const result = await run(makeConfig(), runner, { timeoutSeconds: 0.05 }).outcome;

    expect(result.cancelled).toBe(true);
    expect(result.ok).toBe(false);
    expect(result.results).toHaveLength(4);
    expect(result.results.every((r) => r.error?.kind === "cancelled")).toBe(true);
    expect(result.archive).toEqual({ status: "skipped", reason: "Run was cancelled." });
  });
});

describe("selectTargets", () => {
  const config = ProjectConfigSchema.parse({
    routes_manifest: "routes.json",
    schema_tool: { command: "schema-tool" },
    targets: {
      typescript: { command: "gen-ts" },
      python: { command: "gen-py", enabled: false },
    },
  });

  it("defaults to every enabled target", () => {
    const selected = selectTargets(config);
    expect(selected.ok && selected.value.map(([language]) => language)).toEqual(["typescript"]);
  });

  it("rejects disabled or unknown languages", () => {
    const selected = selectTargets(config, ["python", "go"]);
    expect(selected.ok).toBe(false);
    if (selected.ok) return;
    expect(selected.error).toBeInstanceOf(ConfigError);
    expect(selected.error.message).toBe("Unknown or disabled language(s): python, go.");
  });
});
