import { InvalidArgumentError, type Command } from "commander";

import { ArchiveManager, type ArchiveRecord } from "../archive/archive-manager.js";
import type { ProjectConfig } from "../core/config.js";
import { createOutputLayout } from "../core/paths.js";

import { loadCommandConfig, resolvePorts, type CliContext } from "./context.js";
import { formatTable, plural } from "./report.js";

type PruneFlags = {
  keepDays?: number;
  keepLast?: number;
};

// =============================================================================
// COMMAND REGISTRATION
// =============================================================================

export function registerArchiveCommand(program: Command, ctx: CliContext): void {
  const archive = program.command("archive").description("Inspect and prune archived client sets");

  archive
    .command("list")
    .description("List archives, oldest first")
    .action(async (_opts: unknown, command: Command) => {
      await archiveListCommand(ctx, command);
    });

  archive
    .command("latest")
    .description("Show the archive the latest pointer resolves to")
    .action(async (_opts: unknown, command: Command) => {
      await archiveLatestCommand(ctx, command);
    });

  archive
    .command("prune")
    .description("Remove old archives; the latest archive is always kept")
    .option("--keep-days <days>", "Remove archives older than this many days", parseCount)
    .option("--keep-last <n>", "Keep only the newest n archives", parseCount)
    .action(async (opts: PruneFlags, command: Command) => {
      await archivePruneCommand(ctx, opts, command);
    });
}

// =============================================================================
// COMMANDS
// =============================================================================

export async function archiveListCommand(ctx: CliContext, command: Command): Promise<void> {
  const records = await createManager(ctx, command).list();
  if (records.length === 0) {
    console.log("No archives yet.");
    return;
  }

  const rows = records.map((record) => [
    record.isLatest ? `${record.id} *` : record.id,
    record.createdAt,
    `${record.entries.length}`,
    `${record.skipped.length}`,
    `${record.totalBytes}`,
  ]);
  for (const line of formatTable(["Id", "Created", "Clients", "Skipped", "Bytes"], rows)) {
    console.log(line);
  }
}

export async function archiveLatestCommand(ctx: CliContext, command: Command): Promise<void> {
  const record = await createManager(ctx, command).latest();
  if (!record) {
    console.log("No latest archive.");
    process.exitCode = 1;
    return;
  }

  printRecord(record);
}

export async function archivePruneCommand(
  ctx: CliContext,
  opts: PruneFlags,
  command: Command,
): Promise<void> {
  const { config } = loadCommandConfig(ctx, command);
  const keepDays = opts.keepDays ?? (opts.keepLast === undefined ? config.archive.keep_days : undefined);
  if (keepDays === undefined && opts.keepLast === undefined) {
    console.log("Nothing to prune: pass --keep-days or --keep-last, or set archive.keep_days.");
    return;
  }

  const outcome = await createManager(ctx, command, config).prune({ keepDays, keepLast: opts.keepLast });
  console.log(`Removed ${plural(outcome.removed.length, "archive")}; kept ${outcome.kept.length}.`);
  for (const id of outcome.removed) {
    console.log(`  - ${id}`);
  }
}

// =============================================================================
// HELPERS
// =============================================================================

function createManager(
  ctx: CliContext,
  command: Command,
  config: ProjectConfig = loadCommandConfig(ctx, command).config,
): ArchiveManager {
  const layout = createOutputLayout(config.output_dir);
  return new ArchiveManager({ archiveDir: layout.archiveDir, now: resolvePorts(ctx).clock.now });
}

function printRecord(record: ArchiveRecord): void {
  console.log(`Archive: ${record.id}`);
  console.log(`Created: ${record.createdAt}`);
  console.log(`Path: ${record.path}`);
  console.log(`Bytes: ${record.totalBytes}`);
  console.log("");

  const rows = record.entries.map((entry) => [entry.zone, entry.language, `${entry.files.length}`, `${entry.bytes}`]);
  for (const line of formatTable(["Zone", "Language", "Files", "Bytes"], rows)) {
    console.log(line);
  }

  if (record.skipped.length > 0) {
    console.log("");
    console.log("Skipped:");
    for (const skipped of record.skipped) {
      console.log(`  ${skipped.zone}/${skipped.language}: ${skipped.kind} (${skipped.reason})`);
    }
  }
}

function parseCount(value: string): number {
  const count = Number(value);
  if (!Number.isInteger(count) || count < 0) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return count;
}
