import fs from "node:fs";
import path from "node:path";

import { DEFAULT_CONFIG_FILE, ENV_VARS } from "./config.js";
import type { ConfigEnv } from "./config-loader.js";

export type ConfigSource = "explicit" | "env" | "discovered" | "default";

export type ConfigResolution = {
  configPath: string;
  source: ConfigSource;
};

export type InitResult = {
  configPath: string;
  status: "created" | "exists" | "overwritten";
};

export function resolveConfigPath(args: {
  explicitPath?: string;
  cwd?: string;
  env?: ConfigEnv;
}): ConfigResolution {
  const cwd = args.cwd ?? process.cwd();

  if (args.explicitPath) {
    return { configPath: path.resolve(cwd, args.explicitPath), source: "explicit" };
  }

  const fromEnv = args.env?.[ENV_VARS.config]?.trim();
  if (fromEnv) {
    return { configPath: path.resolve(cwd, fromEnv), source: "env" };
  }

  const discovered = findUp(cwd, (dir) => fs.existsSync(path.join(dir, DEFAULT_CONFIG_FILE)));
  if (discovered) {
    return { configPath: path.join(discovered, DEFAULT_CONFIG_FILE), source: "discovered" };
  }

  return { configPath: path.join(cwd, DEFAULT_CONFIG_FILE), source: "default" };
}

export function initProjectConfig(args: { cwd?: string; force?: boolean }): InitResult {
  const cwd = args.cwd ?? process.cwd();
  const configPath = path.join(cwd, DEFAULT_CONFIG_FILE);
  const hasConfig = fs.existsSync(configPath);
  const force = args.force ?? false;

  if (hasConfig && !force) {
    return { configPath, status: "exists" };
  }

  fs.writeFileSync(configPath, buildDefaultConfig(), "utf8");
  return { configPath, status: hasConfig ? "overwritten" : "created" };
}

export function buildDefaultConfig(): string {
  return [
    "# Auto-generated zoneforge config. Update as needed.",
    "output_dir: openapi",
    "api_prefix: apix",
    "# JSON export of the host application registry: { apps: [{ id, routes: [...] }] }",
    "routes_manifest: routes.json",
    "max_workers: 4",
    "auto_install_deps: false",
    "",
    "timeouts:",
    "  schema_seconds: 60",
    "  generator_seconds: 120",
    "",
    "schema_tool:",
    "  command: python",
    '  args: ["manage.py", "spectacular", "--routes", "{routes}", "--file", "{output}", "--api-version", "{version}"]',
    "  format: yaml",
    "",
    "targets:",
    "  typescript:",
    "    command: npx",
    '    args: ["@hey-api/openapi-ts", "--input", "{schema}", "--output", "{output}"]',
    "    index: true",
    "    check:",
    "      command: npx",
    '      args: ["@hey-api/openapi-ts", "--version"]',
    "    install:",
    "      command: npm",
    '      args: ["install", "-g", "@hey-api/openapi-ts"]',
    "  python:",
    "    command: datamodel-codegen",
    '    args: ["--input", "{schema}", "--input-file-type", "openapi", "--output", "{output}/models.py"]',
    "    check:",
    "      command: datamodel-codegen",
    '      args: ["--version"]',
    "    install:",
    "      command: pip",
    '      args: ["install", "datamodel-code-generator"]',
    "",
    "archive:",
    "  enabled: true",
    "  keep_days: 30",
    "",
    "monorepo:",
    "  enabled: false",
    "  path: ../monorepo",
    "  package_dir: packages/api",
    "",
    "zones:",
    "  public:",
    "    apps: [blog]",
    "    title: Public API",
    "    public: true",
    "  admin:",
    "    apps: [billing]",
    "    public: false",
    "    auth_required: true",
    "",
  ].join("\n");
}

export function findUp(start: string, predicate: (dir: string) => boolean): string | null {
  let current = path.resolve(start);
  while (true) {
    if (predicate(current)) return current;

    const parent = path.dirname(current);
    if (parent === current) return null;
    current = parent;
  }
}
