import fs from "node:fs";
import path from "node:path";

import { parse as parseYaml } from "yaml";
import type { ZodIssue } from "zod";

import { ENV_VARS, ProjectConfigSchema, type ProjectConfig } from "./config.js";
import { ConfigError, UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type ConfigEnv = Partial<Record<string, string | undefined>>;

export type LoadConfigOptions = {
  env?: ConfigEnv;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function loadProjectConfig(configPath: string, opts: LoadConfigOptions = {}): ProjectConfig {
  const resolvedPath = path.resolve(configPath);
  if (!fs.existsSync(resolvedPath)) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Project config missing.",
      message: `No config file found at ${resolvedPath}.`,
      hint: "Run `zoneforge init` to create zoneforge.yaml, or pass --config <path>.",
    });
  }

  const raw = fs.readFileSync(resolvedPath, "utf8");
  return parseProjectConfig(raw, {
    baseDir: path.dirname(resolvedPath),
    env: opts.env ?? process.env,
    source: resolvedPath,
  });
}

export function parseProjectConfig(
  raw: string,
  opts: { baseDir: string; env?: ConfigEnv; source?: string },
): ProjectConfig {
  const source = opts.source ?? "config";
  let document: unknown;
  try {
    document = parseYaml(raw);
  } catch (err) {
    throw new ConfigError(`Failed to parse ${source} as YAML.`, [], err);
  }

  const parsed = ProjectConfigSchema.safeParse(document ?? {});
  if (!parsed.success) {
    throw new ConfigError(`Invalid config in ${source}.`, formatConfigIssues(parsed.error.issues));
  }

  const withEnv = applyEnvOverrides(parsed.data, opts.env ?? {});
  return resolveConfigPaths(withEnv, opts.baseDir);
}

export function formatConfigIssues(issues: ZodIssue[]): string[] {
  return issues.map((issue) => {
    const location = issue.path.length > 0 ? issue.path.join(".") : "<root>";

    if (issue.code === "invalid_type") {
      return `${location}: Expected ${issue.expected}, received ${issue.received}`;
    }
    if (issue.code === "invalid_enum_value") {
      const options = issue.options.map((o) => JSON.stringify(o)).join(", ");
      return `${location}: Expected one of ${options}, received ${JSON.stringify(issue.received)}`;
    }
    if (issue.code === "unrecognized_keys") {
      return `${location}: Unrecognized keys: ${issue.keys.join(", ")}`;
    }

    return `${location}: ${issue.message}`;
  });
}

// =============================================================================
// OVERRIDES
// =============================================================================

export function applyEnvOverrides(config: ProjectConfig, env: ConfigEnv): ProjectConfig {
  const next: ProjectConfig = { ...config };

  const outputDir = env[ENV_VARS.outputDir]?.trim();
  if (outputDir) {
    next.output_dir = outputDir;
  }

  const maxWorkersRaw = env[ENV_VARS.maxWorkers]?.trim();
  if (maxWorkersRaw) {
    next.max_workers = parseWorkerCount(maxWorkersRaw, ENV_VARS.maxWorkers);
  }

  if (isTruthyFlag(env[ENV_VARS.noAutoInstall])) {
    next.auto_install_deps = false;
  }

  return next;
}

export function parseWorkerCount(raw: string, source: string): number {
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigError(`${source} must be a positive integer (received "${raw}").`);
  }
  return value;
}

function isTruthyFlag(value: string | undefined): boolean {
  if (!value) return false;
  return ["1", "true", "yes", "on"].includes(value.trim().toLowerCase());
}

function resolveConfigPaths(config: ProjectConfig, baseDir: string): ProjectConfig {
  return {
    ...config,
    output_dir: path.resolve(baseDir, config.output_dir),
    routes_manifest: path.resolve(baseDir, config.routes_manifest),
    monorepo: {
      ...config.monorepo,
      path: path.resolve(baseDir, config.monorepo.path),
    },
  };
}
