import fs from "node:fs";
import path from "node:path";

import type { Command } from "commander";

import { ArchiveManager } from "../archive/archive-manager.js";
import { enabledTargets, type ProjectConfig } from "../core/config.js";
import { readJsonlRecords, type LogRecord } from "../core/logger.js";
import { createOutputLayout } from "../core/paths.js";
import { monorepoStatus } from "../monorepo/sync.js";
import { ZoneRegistry } from "../zones/registry.js";

import { loadCommandConfig, type CliContext } from "./context.js";
import { plural } from "./report.js";

export type RunSummary = {
  runId: string;
  startedAt?: string;
  finishedAt?: string;
  result: "ok" | "failed" | "incomplete";
  succeeded?: number;
  failed?: number;
};

export function registerStatusCommand(program: Command, ctx: CliContext): void {
  program
    .command("status")
    .description("Show the config, zones, targets, latest archive and last run")
    .action(async (_opts: unknown, command: Command) => {
      await statusCommand(ctx, command);
    });
}

export async function statusCommand(ctx: CliContext, command: Command): Promise<void> {
  const { config, configPath, source } = loadCommandConfig(ctx, command);
  const layout = createOutputLayout(config.output_dir);

  console.log(`Config: ${configPath} (${source})`);
  console.log(`Output: ${layout.root}`);
  console.log(`Zones: ${describeZones(config)}`);
  console.log(`Targets: ${enabledTargets(config).map(([language]) => language).join(", ") || "(none enabled)"}`);

  const latest = await new ArchiveManager({ archiveDir: layout.archiveDir }).latest();
  console.log(
    latest
      ? `Latest archive: ${latest.id} (${plural(latest.entries.length, "client")})`
      : "Latest archive: (none)",
  );

  if (config.monorepo.enabled) {
    const repo = await monorepoStatus(config.monorepo.path, config.monorepo.package_dir);
    console.log(
      repo.exists
        ? `Monorepo: ${repo.packageRoot}${repo.hasPackageJson ? "" : " (no package.json)"}`
        : `Monorepo: not found (${repo.monorepoPath})`,
    );
  }

  const lastRun = findLastRun(layout.logsDir);
  if (!lastRun) {
    console.log("Last run: (none)");
    return;
  }
  const counts =
    lastRun.succeeded !== undefined ? `, ${lastRun.succeeded} succeeded, ${lastRun.failed ?? 0} failed` : "";
  console.log(`Last run: ${lastRun.runId} (${lastRun.result}${counts})`);
}

function describeZones(config: ProjectConfig): string {
  const loaded = ZoneRegistry.load(config.zones);
  if (!loaded.ok) {
    return `invalid (${loaded.error.message})`;
  }
  const names = loaded.value.names();
  return names.length > 0 ? names.join(", ") : "(none)";
}

// Most recently modified run log.
export function findLastRun(logsDir: string): RunSummary | null {
  if (!fs.existsSync(logsDir)) return null;

  const logs = fs
    .readdirSync(logsDir)
    .filter((name) => name.endsWith(".jsonl"))
    .map((name) => path.join(logsDir, name))
    .sort((a, b) => fs.statSync(b).mtimeMs - fs.statSync(a).mtimeMs);
  if (logs.length === 0) return null;

  return summarizeRun(path.basename(logs[0], ".jsonl"), readJsonlRecords(logs[0]));
}

export function summarizeRun(runId: string, records: LogRecord[]): RunSummary {
  const start = records.find((record) => record.type === "run.start");
  const end = records.find((record) => record.type === "run.complete" || record.type === "run.fail");

  if (!end) {
    return { runId, startedAt: start?.ts, result: "incomplete" };
  }

  const payload = end.payload ?? {};
  const succeeded = payload.succeeded;
  const failed = payload.failed;
  return {
    runId,
    startedAt: start?.ts,
    finishedAt: end.ts,
    result: end.type === "run.complete" && payload.ok === true ? "ok" : "failed",
    ...(typeof succeeded === "number" ? { succeeded } : {}),
    ...(typeof failed === "number" ? { failed } : {}),
  };
}
