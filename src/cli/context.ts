import type { Command } from "commander";

import type { ConfigEnv } from "../core/config-loader.js";
import { createAnsiFormatter, resolveColorEnabled, type AnsiFormatter } from "../core/error-format.js";
import type { PipelinePorts } from "../pipeline/ports.js";
import { createDefaultPorts } from "../pipeline/run-context.js";

import { loadConfigForCli, type CliConfigFlags, type LoadedCliConfig } from "./config.js";

// Shared by every command; tests swap in a temp cwd, a fixed env and fake ports.
export type CliContext = {
  cwd: string;
  env: ConfigEnv;
  ports: Partial<PipelinePorts>;
  color?: boolean;
};

export type GlobalFlags = {
  config?: string;
  debug?: boolean;
};

export function readGlobalFlags(command: Command): GlobalFlags {
  return command.optsWithGlobals<GlobalFlags>();
}

export function loadCommandConfig(
  ctx: CliContext,
  command: Command,
  flags: Omit<CliConfigFlags, "config"> = {},
): LoadedCliConfig {
  const { config } = readGlobalFlags(command);
  return loadConfigForCli({ flags: { ...flags, config }, cwd: ctx.cwd, env: ctx.env });
}

export function resolveFormatter(ctx: CliContext): AnsiFormatter {
  return createAnsiFormatter(ctx.color ?? resolveColorEnabled({ stream: process.stdout, env: ctx.env }));
}

export function resolvePorts(ctx: CliContext): PipelinePorts {
  return { ...createDefaultPorts(), ...ctx.ports };
}
