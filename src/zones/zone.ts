import { z } from "zod";

import { titleCase } from "../core/utils.js";

// =============================================================================
// RAW SCHEMA
// =============================================================================

// One entry of the `zones` map in zoneforge.yaml. The map key is the zone name.
export const ZoneDefinitionSchema = z
  .object({
    apps: z.array(z.string().trim().min(1)).min(1, "Apps list cannot be empty"),
    title: z.string().optional(),
    description: z.string().optional(),
    public: z.boolean().default(true),
    auth_required: z.boolean().default(false),
    version: z.string().trim().min(1).default("v1"),
    path_prefix: z.string().trim().min(1).optional(),
    rate_limit: z.string().optional(),
    permissions: z.array(z.string()).optional(),
    cors_enabled: z.boolean().default(false),
    middleware: z.array(z.string()).default([]),
  })
  .strict();

export type ZoneDefinition = z.infer<typeof ZoneDefinitionSchema>;

// =============================================================================
// ZONE
// =============================================================================

export type Zone = {
  readonly name: string;
  readonly memberApps: readonly string[];
  readonly title: string;
  readonly description: string;
  readonly isPublic: boolean;
  readonly authRequired: boolean;
  readonly version: string;
  readonly pathPrefix: string;
  readonly rateLimit?: string;
  readonly permissions?: readonly string[];
  readonly corsEnabled: boolean;
  readonly extraMiddleware: readonly string[];
};

export function normalizeZoneName(name: string): string {
  return name.trim().toLowerCase();
}

export function buildZone(name: string, def: ZoneDefinition): Zone {
  const normalized = normalizeZoneName(name);
  const memberApps = Object.freeze(Array.from(new Set(def.apps)));
  const pathPrefix = trimSlashes(def.path_prefix ?? normalized);

  const zone: Zone = {
    name: normalized,
    memberApps,
    title: def.title?.trim() || titleCase(normalized),
    description: def.description?.trim() ?? "",
    isPublic: def.public,
    authRequired: def.auth_required,
    version: def.version,
    pathPrefix: pathPrefix.length > 0 ? pathPrefix : normalized,
    corsEnabled: def.cors_enabled,
    extraMiddleware: Object.freeze([...def.middleware]),
  };

  return Object.freeze({
    ...zone,
    ...(def.rate_limit !== undefined ? { rateLimit: def.rate_limit } : {}),
    ...(def.permissions !== undefined
      ? { permissions: Object.freeze(Array.from(new Set(def.permissions))) }
      : {}),
  });
}

function trimSlashes(value: string): string {
  return value.replace(/^\/+|\/+$/g, "");
}
