import { describe, expect, it } from "vitest";

import { ConfigError } from "../core/errors.js";
import type { AppRegistrySnapshot } from "../routes/route-table.js";

import { ZoneRegistry } from "./registry.js";
import { buildZone } from "./zone.js";

function snapshotOf(...appIds: string[]): AppRegistrySnapshot {
  return { appIds: new Set(appIds) };
}

function loadOrThrow(raw: unknown): ZoneRegistry {
  const loaded = ZoneRegistry.load(raw);
  if (!loaded.ok) throw loaded.error;
  return loaded.value;
}

describe("ZoneRegistry.load", () => {
  it("applies zone defaults and keeps configuration order", () => {
    const registry = loadOrThrow({
      Public_API: { apps: ["blog", "blog", "shop"] },
      admin: { apps: ["billing"], path_prefix: "/ops/", version: "v2", public: false },
    });

    expect(registry.names()).toEqual(["public_api", "admin"]);

    const publicZone = registry.get("PUBLIC_API");
    expect(publicZone).toMatchObject({
      name: "public_api",
      memberApps: ["blog", "shop"],
      title: "Public Api",
      description: "",
      isPublic: true,
      authRequired: false,
      version: "v1",
      pathPrefix: "public_api",
      corsEnabled: false,
      extraMiddleware: [],
    });
    expect(Object.isFrozen(publicZone)).toBe(true);

    expect(registry.get("admin")).toMatchObject({ pathPrefix: "ops", version: "v2", isPublic: false });
  });

  it("collects every structural issue instead of returning a partial registry", () => {
    const loaded = ZoneRegistry.load({
      public: { apps: [] },
      admin: { apps: ["billing"], colour: "red" },
      ADMIN: { apps: ["other"] },
      "  ": { apps: ["x"] },
    });

    expect(loaded.ok).toBe(false);
    if (loaded.ok) return;

    expect(loaded.error).toBeInstanceOf(ConfigError);
    expect(loaded.error.issues).toEqual([
      "zones.public.apps: Apps list cannot be empty",
      "zones.admin: Unrecognized keys: colour",
      "zones: Zone name cannot be empty",
    ]);
  });

  it("rejects zone names that would escape or nest output directories", () => {
    const loaded = ZoneRegistry.load({
      "../../escape": { apps: ["blog"] },
      a: { apps: ["shop"] },
      "a/b": { apps: ["billing"] },
      "-admin": { apps: ["ops"] },
    });

    expect(loaded.ok).toBe(false);
    if (loaded.ok) return;
    const rule = 'must start with a lowercase letter or digit and use only a-z, 0-9, "_" or "-"';
    expect(loaded.error.issues).toEqual([
      `zones.../../escape: Zone name "../../escape" ${rule}`,
      `zones.a/b: Zone name "a/b" ${rule}`,
      `zones.-admin: Zone name "-admin" ${rule}`,
    ]);
  });

  it("reports duplicate names after normalisation", () => {
    const loaded = ZoneRegistry.load({
      admin: { apps: ["billing"] },
      ADMIN: { apps: ["other"] },
    });

    expect(loaded.ok).toBe(false);
    if (loaded.ok) return;
    expect(loaded.error.issues).toEqual(['zones.ADMIN: Zone name "admin" is defined more than once']);
  });

  it("rejects a non-mapping zones value", () => {
    const loaded = ZoneRegistry.load(["public"]);
    expect(loaded.ok).toBe(false);
  });
});

describe("ZoneRegistry.validate", () => {
  it("accepts a partition whose apps all exist", () => {
    const registry = loadOrThrow({
      public: { apps: ["blog"] },
      admin: { apps: ["billing"] },
    });

    expect(registry.validate(snapshotOf("blog", "billing", "unused")).ok).toBe(true);
  });

  it("names the zone and the app for a missing app", () => {
    const registry = loadOrThrow({
      public: { apps: ["blog", "ghost"] },
    });

    const result = registry.validate(snapshotOf("blog"));
    expect(result.ok).toBe(false);
    if (result.ok) return;

    expect(result.error).toEqual([
      {
        kind: "missing_app",
        zone: "public",
        app: "ghost",
        message: 'Zone "public" references unknown app "ghost".',
      },
    ]);
  });

  it("collects prefix, app and emptiness conflicts in one pass", () => {
    const registry = ZoneRegistry.fromZones([
      buildZone("public", { ...baseDefinition(), apps: ["blog"] }),
      buildZone("partners", { ...baseDefinition(), apps: ["blog"], path_prefix: "public" }),
      buildZone("public", { ...baseDefinition(), apps: ["shop"], path_prefix: "shop" }),
      { ...buildZone("empty", { ...baseDefinition(), apps: ["x"] }), memberApps: [] },
    ]);

    const result = registry.validate(snapshotOf("blog", "shop"));
    expect(result.ok).toBe(false);
    if (result.ok) return;

    expect(result.error.map((issue) => issue.kind)).toEqual([
      "duplicate_prefix",
      "duplicate_app",
      "duplicate_name",
      "empty_apps",
    ]);
    expect(result.error[0].message).toBe(
      'Zone "partners" reuses path prefix "public" already claimed by zone "public".',
    );
    expect(result.error[1].message).toBe('App "blog" is assigned to both zone "public" and zone "partners".');
  });
});

describe("ZoneRegistry.select", () => {
  const registry = loadOrThrow({
    public: { apps: ["blog"] },
    partner_v1: { apps: ["shop"] },
    partner_v2: { apps: ["crm"] },
    admin: { apps: ["billing"] },
  });

  it("returns every zone for an empty selection", () => {
    const selected = registry.select([]);
    expect(selected.ok && selected.value.map((zone) => zone.name)).toEqual([
      "public",
      "partner_v1",
      "partner_v2",
      "admin",
    ]);
  });

  it("matches exact names and globs in configuration order", () => {
    const selected = registry.select(["admin", "partner_*"]);
    expect(selected.ok && selected.value.map((zone) => zone.name)).toEqual([
      "partner_v1",
      "partner_v2",
      "admin",
    ]);
  });

  it("lists the known zones when a name does not match", () => {
    const selected = registry.select(["internal"]);
    expect(selected.ok).toBe(false);
    if (selected.ok) return;

    expect(selected.error.message).toBe("Unknown zone(s): internal.");
    expect(selected.error.issues).toEqual(["Known zones: public, partner_v1, partner_v2, admin"]);
  });
});

function baseDefinition() {
  return {
    apps: ["placeholder"],
    public: true,
    auth_required: false,
    version: "v1",
    cors_enabled: false,
    middleware: [],
  };
}
