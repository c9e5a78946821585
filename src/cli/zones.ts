import type { Command } from "commander";

import { loadZonePartition } from "../pipeline/pipeline.js";
import { isolate, zoneBasePath } from "../routes/isolator.js";
import { ZoneRegistry } from "../zones/registry.js";

import { splitList } from "./config.js";
import { loadCommandConfig, resolvePorts, type CliContext } from "./context.js";
import { formatTable, plural } from "./report.js";

// =============================================================================
// COMMAND REGISTRATION
// =============================================================================

export function registerZonesCommand(program: Command, ctx: CliContext): void {
  const zones = program.command("zones").description("Inspect the configured zones");

  zones
    .command("list")
    .description("List zones with their apps and base paths")
    .action((_opts: unknown, command: Command) => {
      zonesListCommand(ctx, command);
    });

  zones
    .command("validate")
    .description("Check every zone against the host route manifest")
    .action(async (_opts: unknown, command: Command) => {
      await zonesValidateCommand(ctx, command);
    });

  zones
    .command("urls")
    .description("Print the public route paths each zone exposes")
    .option("--zones <names>", "Comma-separated zone names or glob patterns (default: all)")
    .action(async (opts: { zones?: string }, command: Command) => {
      await zonesUrlsCommand(ctx, opts, command);
    });
}

// =============================================================================
// COMMANDS
// =============================================================================

export function zonesListCommand(ctx: CliContext, command: Command): void {
  const { config } = loadCommandConfig(ctx, command);
  const loaded = ZoneRegistry.load(config.zones);
  if (!loaded.ok) throw loaded.error;

  const zones = loaded.value.all();
  if (zones.length === 0) {
    console.log("No zones configured.");
    return;
  }

  const rows = zones.map((zone) => [
    zone.name,
    zone.title,
    zone.isPublic ? "public" : "private",
    zoneBasePath(zone, config.api_prefix),
    zone.memberApps.join(", "),
  ]);
  for (const line of formatTable(["Zone", "Title", "Access", "Base path", "Apps"], rows)) {
    console.log(line);
  }
}

export async function zonesValidateCommand(ctx: CliContext, command: Command): Promise<void> {
  const { config } = loadCommandConfig(ctx, command);
  const { registry, host } = await loadZonePartition(config, resolvePorts(ctx).hostRegistry);

  const zoneCount = registry.all().length;
  console.log(`${plural(zoneCount, "zone")} valid against ${plural(host.snapshot.appIds.size, "app")}.`);
}

export async function zonesUrlsCommand(
  ctx: CliContext,
  opts: { zones?: string },
  command: Command,
): Promise<void> {
  const { config } = loadCommandConfig(ctx, command);
  const { registry, host } = await loadZonePartition(config, resolvePorts(ctx).hostRegistry);
  const selected = registry.select(splitList(opts.zones));
  if (!selected.ok) throw selected.error;

  selected.value.forEach((zone, index) => {
    const isolated = isolate(zone, host.table, { apiPrefix: config.api_prefix });
    if (index > 0) console.log("");
    console.log(`${zone.name} (${isolated.basePath})`);

    if (isolated.routes.length === 0) {
      console.log("  (no routes)");
      return;
    }
    const rows = isolated.routes.map((route) => [route.methods.join(","), route.publicPath, route.handler]);
    for (const line of formatTable(["Methods", "Path", "Handler"], rows)) {
      console.log(line);
    }
  });
}
