import path from "node:path";

import type { ProjectConfig } from "../core/config.js";
import { parseWorkerCount, loadProjectConfig, type ConfigEnv } from "../core/config-loader.js";
import { resolveConfigPath, type ConfigSource } from "../core/config-discovery.js";

export type CliConfigFlags = {
  config?: string;
  output?: string;
  workers?: string;
};

export type LoadedCliConfig = {
  config: ProjectConfig;
  configPath: string;
  source: ConfigSource;
};

// Precedence: flags over environment over file.
export function loadConfigForCli(args: {
  flags?: CliConfigFlags;
  cwd?: string;
  env?: ConfigEnv;
}): LoadedCliConfig {
  const cwd = args.cwd ?? process.cwd();
  const env = args.env ?? process.env;
  const flags = args.flags ?? {};

  const resolved = resolveConfigPath({ explicitPath: flags.config, cwd, env });
  const loaded = loadProjectConfig(resolved.configPath, { env });

  const config: ProjectConfig = { ...loaded };
  if (flags.output) {
    config.output_dir = path.resolve(cwd, flags.output);
  }
  if (flags.workers) {
    config.max_workers = parseWorkerCount(flags.workers, "--workers");
  }

  return { config, configPath: resolved.configPath, source: resolved.source };
}

export function splitList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}
