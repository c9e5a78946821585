import type { Command } from "commander";

import type { ProjectConfig, TargetConfig } from "../core/config.js";
import {
  checkDependencies,
  installDependencies,
  probeDependencies,
  type DependencyOptions,
  type DependencyStatus,
} from "../deps/dependencies.js";
import { selectTargets } from "../pipeline/pipeline.js";

import { splitList } from "./config.js";
import { loadCommandConfig, resolvePorts, type CliContext } from "./context.js";
import { formatTable } from "./report.js";

type DepsOptions = {
  languages?: string;
};

// =============================================================================
// COMMAND REGISTRATION
// =============================================================================

export function registerDepsCommand(program: Command, ctx: CliContext): void {
  const deps = program.command("deps").description("Check or install the generator tools");

  deps
    .command("check")
    .description("Probe every enabled generator tool")
    .option("--languages <names>", "Comma-separated target languages (default: all enabled)")
    .action(async (opts: DepsOptions, command: Command) => {
      await depsCheckCommand(ctx, opts, command);
    });

  deps
    .command("install")
    .description("Run the install command of every generator tool that is missing")
    .option("--languages <names>", "Comma-separated target languages (default: all enabled)")
    .action(async (opts: DepsOptions, command: Command) => {
      await depsInstallCommand(ctx, opts, command);
    });
}

// =============================================================================
// COMMANDS
// =============================================================================

export async function depsCheckCommand(ctx: CliContext, opts: DepsOptions, command: Command): Promise<void> {
  const { config } = loadCommandConfig(ctx, command);
  const statuses = await probeDependencies(resolveTargets(config, opts), dependencyOptions(ctx));

  printStatuses(statuses);
  if (statuses.some((status) => !status.available)) {
    process.exitCode = 1;
  }
}

export async function depsInstallCommand(
  ctx: CliContext,
  opts: DepsOptions,
  command: Command,
): Promise<void> {
  const { config } = loadCommandConfig(ctx, command);
  const targets = resolveTargets(config, opts);
  const statuses = await probeDependencies(targets, dependencyOptions(ctx));

  const missing = new Set(statuses.filter((status) => !status.available).map((status) => status.language));
  if (missing.size === 0) {
    console.log("All generator tools are available.");
    return;
  }

  const outcomes = await installDependencies(
    targets.filter(([language]) => missing.has(language)),
    dependencyOptions(ctx),
  );
  const rows = outcomes.map((outcome) => [outcome.language, outcome.tool, outcome.status, outcome.detail]);
  for (const line of formatTable(["Language", "Tool", "Install", "Detail"], rows)) {
    console.log(line);
  }

  const after = await checkDependencies(targets, dependencyOptions(ctx));
  if (!after.ok) {
    throw after.error;
  }
  console.log("All generator tools are available.");
}

// =============================================================================
// HELPERS
// =============================================================================

function resolveTargets(config: ProjectConfig, opts: DepsOptions): Array<[string, TargetConfig]> {
  const selected = selectTargets(config, splitList(opts.languages));
  if (!selected.ok) throw selected.error;
  return selected.value;
}

function dependencyOptions(ctx: CliContext): DependencyOptions {
  return { runner: resolvePorts(ctx).processRunner, cwd: ctx.cwd };
}

function printStatuses(statuses: DependencyStatus[]): void {
  const rows = statuses.map((status) => [
    status.language,
    status.tool,
    status.available ? "available" : "missing",
    status.detail,
  ]);
  for (const line of formatTable(["Language", "Tool", "Status", "Detail"], rows)) {
    console.log(line);
  }
}
