import type { Command } from "commander";

import { initProjectConfig } from "../core/config-discovery.js";

import type { CliContext } from "./context.js";

export function registerInitCommand(program: Command, ctx: CliContext): void {
  program
    .command("init")
    .description("Write a starter zoneforge.yaml in the current directory")
    .option("--force", "Overwrite an existing config", false)
    .action((opts: { force: boolean }) => {
      initCommand(ctx, opts);
    });
}

export function initCommand(ctx: CliContext, opts: { force?: boolean }): void {
  try {
    const result = initProjectConfig({ cwd: ctx.cwd, force: opts.force });

    if (result.status === "created") {
      console.log(`Created zoneforge config at ${result.configPath}`);
      console.log(`Edit ${result.configPath} to set routes_manifest, schema_tool, targets, and zones.`);
      return;
    }

    if (result.status === "overwritten") {
      console.log(`Overwrote zoneforge config at ${result.configPath}`);
      console.log(`Review ${result.configPath} for your project settings.`);
      return;
    }

    console.log(`Config already exists at ${result.configPath}`);
    console.log("Pass --force to overwrite it.");
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    console.error(`Init failed: ${detail}`);
    process.exitCode = 1;
  }
}
