import { Command } from "commander";

import { registerArchiveCommand } from "./archive.js";
import type { CliContext } from "./context.js";
import { registerDepsCommand } from "./deps.js";
import { registerGenerateCommand } from "./generate.js";
import { registerInitCommand } from "./init.js";
import { registerStatusCommand } from "./status.js";
import { registerZonesCommand } from "./zones.js";

export const CLI_VERSION = "0.1.0";

export function buildCli(overrides: Partial<CliContext> = {}): Command {
  const ctx: CliContext = {
    cwd: overrides.cwd ?? process.cwd(),
    env: overrides.env ?? process.env,
    ports: overrides.ports ?? {},
    ...(overrides.color !== undefined ? { color: overrides.color } : {}),
  };

  const program = new Command();
  program
    .name("zoneforge")
    .description("Zone-isolated OpenAPI schema extraction and client generation")
    .version(CLI_VERSION)
    .option("-c, --config <path>", "Path to zoneforge.yaml (default: discovered from the working directory)")
    .option("--debug", "Print error codes, causes and stack traces", false);

  registerInitCommand(program, ctx);
  registerGenerateCommand(program, ctx);
  registerZonesCommand(program, ctx);
  registerArchiveCommand(program, ctx);
  registerDepsCommand(program, ctx);
  registerStatusCommand(program, ctx);

  return program;
}
