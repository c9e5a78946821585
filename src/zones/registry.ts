/**
 * ZoneRegistry: the validated, immutable zone partition.
 * Purpose: parse zone definitions once, then check them against the host app registry.
 * Assumptions: a registry is never mutated after load; callers thread it through the pipeline.
 * Usage: const loaded = ZoneRegistry.load(config.zones); loaded.value.validate(snapshot).
 */

import { minimatch } from "minimatch";

import { PATH_SEGMENT_PATTERN, PATH_SEGMENT_RULE } from "../core/config.js";
import { formatConfigIssues } from "../core/config-loader.js";
import { ConfigError, type ValidationIssue } from "../core/errors.js";
import { fail, succeed, type Result } from "../core/result.js";
import type { AppRegistrySnapshot } from "../routes/route-table.js";

import { ZoneDefinitionSchema, buildZone, normalizeZoneName, type Zone } from "./zone.js";

export class ZoneRegistry {
  private readonly zones: readonly Zone[];
  private readonly byName: ReadonlyMap<string, Zone>;

  private constructor(zones: Zone[]) {
    this.zones = Object.freeze([...zones]);
    const byName = new Map<string, Zone>();
    for (const zone of zones) {
      if (!byName.has(zone.name)) byName.set(zone.name, zone);
    }
    this.byName = byName;
  }

  // ===========================================================================
  // CONSTRUCTION
  // ===========================================================================

  static load(raw: unknown): Result<ZoneRegistry, ConfigError> {
    if (!isPlainRecord(raw)) {
      return fail(new ConfigError("Zone configuration must be a mapping of zone names.", ["zones: Expected object"]));
    }

    const issues: string[] = [];
    const zones: Zone[] = [];
    const seen = new Set<string>();

    for (const [rawName, rawDef] of Object.entries(raw)) {
      const name = normalizeZoneName(rawName);
      if (name.length === 0) {
        issues.push("zones: Zone name cannot be empty");
        continue;
      }
      if (!PATH_SEGMENT_PATTERN.test(name)) {
        issues.push(`zones.${rawName}: Zone name "${name}" ${PATH_SEGMENT_RULE}`);
        continue;
      }

      const parsed = ZoneDefinitionSchema.safeParse(rawDef);
      if (!parsed.success) {
        issues.push(...formatConfigIssues(parsed.error.issues).map((issue) => scopeIssue(rawName, issue)));
        continue;
      }

      if (seen.has(name)) {
        issues.push(`zones.${rawName}: Zone name "${name}" is defined more than once`);
        continue;
      }
      seen.add(name);
      zones.push(buildZone(name, parsed.data));
    }

    if (issues.length > 0) {
      return fail(new ConfigError("Invalid zone configuration.", issues));
    }

    return succeed(new ZoneRegistry(zones));
  }

  // Builds a registry from already-constructed zones without structural checks.
  static fromZones(zones: Zone[]): ZoneRegistry {
    return new ZoneRegistry(zones);
  }

  // ===========================================================================
  // VALIDATION
  // ===========================================================================

  validate(snapshot: AppRegistrySnapshot): Result<void, ValidationIssue[]> {
    const issues: ValidationIssue[] = [];
    const nameOwners = new Set<string>();
    const prefixOwners = new Map<string, string>();
    const appOwners = new Map<string, string>();

    for (const zone of this.zones) {
      if (nameOwners.has(zone.name)) {
        issues.push({
          kind: "duplicate_name",
          zone: zone.name,
          message: `Zone name "${zone.name}" is defined more than once.`,
        });
      }
      nameOwners.add(zone.name);

      if (zone.memberApps.length === 0) {
        issues.push({
          kind: "empty_apps",
          zone: zone.name,
          message: `Zone "${zone.name}" has no member apps.`,
        });
      }

      const prefixOwner = prefixOwners.get(zone.pathPrefix);
      if (prefixOwner !== undefined && prefixOwner !== zone.name) {
        issues.push({
          kind: "duplicate_prefix",
          zone: zone.name,
          conflictsWith: prefixOwner,
          message: `Zone "${zone.name}" reuses path prefix "${zone.pathPrefix}" already claimed by zone "${prefixOwner}".`,
        });
      } else if (prefixOwner === undefined) {
        prefixOwners.set(zone.pathPrefix, zone.name);
      }

      for (const app of zone.memberApps) {
        if (!snapshot.appIds.has(app)) {
          issues.push({
            kind: "missing_app",
            zone: zone.name,
            app,
            message: `Zone "${zone.name}" references unknown app "${app}".`,
          });
        }

        const appOwner = appOwners.get(app);
        if (appOwner !== undefined && appOwner !== zone.name) {
          issues.push({
            kind: "duplicate_app",
            zone: zone.name,
            app,
            conflictsWith: appOwner,
            message: `App "${app}" is assigned to both zone "${appOwner}" and zone "${zone.name}".`,
          });
        } else if (appOwner === undefined) {
          appOwners.set(app, zone.name);
        }
      }
    }

    return issues.length > 0 ? fail(issues) : succeed(undefined);
  }

  // ===========================================================================
  // QUERIES
  // ===========================================================================

  get(name: string): Zone | undefined {
    return this.byName.get(normalizeZoneName(name));
  }

  all(): readonly Zone[] {
    return this.zones;
  }

  names(): string[] {
    return this.zones.map((zone) => zone.name);
  }

  // Exact names or glob patterns; an empty selection means every zone.
  select(patterns: string[]): Result<Zone[], ConfigError> {
    const wanted = patterns.map((pattern) => normalizeZoneName(pattern)).filter((p) => p.length > 0);
    if (wanted.length === 0) {
      return succeed([...this.zones]);
    }

    const unmatched: string[] = [];
    const selected = new Set<string>();
    for (const pattern of wanted) {
      const matches = this.zones.filter(
        (zone) => zone.name === pattern || minimatch(zone.name, pattern),
      );
      if (matches.length === 0) unmatched.push(pattern);
      for (const zone of matches) selected.add(zone.name);
    }

    if (unmatched.length > 0) {
      return fail(
        new ConfigError(
          `Unknown zone(s): ${unmatched.join(", ")}.`,
          [`Known zones: ${this.names().join(", ") || "(none)"}`],
        ),
      );
    }

    return succeed(this.zones.filter((zone) => selected.has(zone.name)));
  }
}

function scopeIssue(zoneKey: string, issue: string): string {
  const root = "<root>";
  return issue.startsWith(root)
    ? `zones.${zoneKey}${issue.slice(root.length)}`
    : `zones.${zoneKey}.${issue}`;
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
