import { z } from "zod";

// =============================================================================
// TOOL COMMANDS
// =============================================================================

export const ToolCommandSchema = z
  .object({
    command: z.string().min(1),
    args: z.array(z.string()).default([]),
  })
  .strict();

export type ToolCommand = z.infer<typeof ToolCommandSchema>;

// Zone names and target languages become directory names under schemas/, clients/ and archive/.
export const PATH_SEGMENT_PATTERN = /^[a-z0-9][a-z0-9_-]*$/;
export const PATH_SEGMENT_RULE = 'must start with a lowercase letter or digit and use only a-z, 0-9, "_" or "-"';

export const PathSegmentSchema = z.string().regex(PATH_SEGMENT_PATTERN, `Name ${PATH_SEGMENT_RULE}`);

export const SchemaToolSchema = ToolCommandSchema.extend({
  format: z.enum(["yaml", "json"]).default("yaml"),
}).strict();

export type SchemaToolConfig = z.infer<typeof SchemaToolSchema>;

export const TargetSchema = ToolCommandSchema.extend({
  enabled: z.boolean().default(true),
  timeout_seconds: z.number().int().positive().optional(),
  check: ToolCommandSchema.optional(),
  install: ToolCommandSchema.optional(),
  // Render a consolidated index.ts re-exporting every zone client.
  index: z.boolean().default(false),
}).strict();

export type TargetConfig = z.infer<typeof TargetSchema>;

// =============================================================================
// PROJECT CONFIG
// =============================================================================

export const TimeoutsSchema = z
  .object({
    schema_seconds: z.number().int().positive().default(60),
    generator_seconds: z.number().int().positive().default(120),
    run_seconds: z.number().int().positive().optional(),
  })
  .strict();

export const ArchiveSettingsSchema = z
  .object({
    enabled: z.boolean().default(true),
    keep_days: z.number().int().positive().optional(),
  })
  .strict();

export const MonorepoSettingsSchema = z
  .object({
    enabled: z.boolean().default(false),
    path: z.string().min(1).default("../monorepo"),
    package_dir: z.string().min(1).default("packages/api"),
  })
  .strict();

export const ProjectConfigSchema = z
  .object({
    output_dir: z.string().min(1).default("openapi"),
    api_prefix: z.string().default("apix"),
    routes_manifest: z.string().min(1),
    max_workers: z.number().int().positive().default(4),
    auto_install_deps: z.boolean().default(false),
    timeouts: TimeoutsSchema.default({}),
    schema_tool: SchemaToolSchema,
    targets: z.record(PathSegmentSchema, TargetSchema).default({}),
    archive: ArchiveSettingsSchema.default({}),
    monorepo: MonorepoSettingsSchema.default({}),
    zones: z.record(z.string(), z.unknown()).default({}),
  })
  .strict();

export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;

export const DEFAULT_CONFIG_FILE = "zoneforge.yaml";

export const ENV_VARS = {
  config: "ZONEFORGE_CONFIG",
  outputDir: "ZONEFORGE_OUTPUT_DIR",
  maxWorkers: "ZONEFORGE_MAX_WORKERS",
  noAutoInstall: "ZONEFORGE_NO_AUTO_INSTALL",
} as const;

export function enabledTargets(config: ProjectConfig): Array<[string, TargetConfig]> {
  return Object.entries(config.targets).filter(([, target]) => target.enabled);
}
