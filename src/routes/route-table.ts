import path from "node:path";

import fse from "fs-extra";
import { z } from "zod";

import { formatConfigIssues } from "../core/config-loader.js";
import { ConfigError, UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";
import type { JsonObject, JsonValue } from "../core/logger.js";

// =============================================================================
// MANIFEST SCHEMA
// =============================================================================

// JSON export of the host application registry.
const JsonObjectSchema: z.ZodType<JsonObject> = z.record(z.string(), z.lazy(() => JsonValueSchema));
const JsonValueSchema: z.ZodType<JsonValue> = z.union([
  z.string(),
  z.number(),
  z.boolean(),
  z.null(),
  z.array(z.lazy(() => JsonValueSchema)),
  z.lazy(() => JsonObjectSchema),
]);

export const RouteManifestEntrySchema = z
  .object({
    path: z.string().min(1),
    handler: z.string().min(1),
    methods: z.array(z.string().min(1)).default(["GET"]),
    name: z.string().optional(),
    tags: z.array(z.string()).optional(),
    metadata: JsonObjectSchema.default({}),
  })
  .strict();

export const RouteManifestSchema = z
  .object({
    apps: z.array(
      z
        .object({
          id: z.string().trim().min(1),
          routes: z.array(RouteManifestEntrySchema).default([]),
        })
        .strict(),
    ),
  })
  .strict();

export type RouteManifest = z.infer<typeof RouteManifestSchema>;

// =============================================================================
// ROUTE TABLE
// =============================================================================

export type RouteEntry = {
  readonly app: string;
  readonly path: string;
  readonly handler: string;
  readonly methods: readonly string[];
  readonly name?: string;
  readonly tags?: readonly string[];
  readonly metadata: Readonly<JsonObject>;
};

export type RouteTable = {
  readonly routes: readonly RouteEntry[];
};

export type AppRegistrySnapshot = {
  readonly appIds: ReadonlySet<string>;
};

export type HostRegistry = {
  table: RouteTable;
  snapshot: AppRegistrySnapshot;
};

export function buildHostRegistry(manifest: RouteManifest): HostRegistry {
  const appIds = new Set<string>();
  const routes: RouteEntry[] = [];

  for (const app of manifest.apps) {
    appIds.add(app.id);
    for (const route of app.routes) {
      routes.push(
        Object.freeze({
          app: app.id,
          path: normalizeRoutePath(route.path),
          handler: route.handler,
          methods: Object.freeze(route.methods.map((method) => method.toUpperCase())),
          ...(route.name !== undefined ? { name: route.name } : {}),
          ...(route.tags !== undefined ? { tags: Object.freeze([...route.tags]) } : {}),
          metadata: Object.freeze({ ...route.metadata }),
        }),
      );
    }
  }

  return {
    table: Object.freeze({ routes: Object.freeze(routes) }),
    snapshot: Object.freeze({ appIds }),
  };
}

export function parseRouteManifest(document: unknown, source = "route manifest"): RouteManifest {
  const parsed = RouteManifestSchema.safeParse(document);
  if (!parsed.success) {
    throw new ConfigError(`Invalid ${source}.`, formatConfigIssues(parsed.error.issues));
  }
  return parsed.data;
}

export async function loadHostRegistry(manifestPath: string): Promise<HostRegistry> {
  const resolved = path.resolve(manifestPath);
  if (!(await fse.pathExists(resolved))) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Route manifest missing.",
      message: `No route manifest found at ${resolved}.`,
      hint: "Export the host application's routes to JSON and point routes_manifest at it.",
    });
  }

  let document: unknown;
  try {
    document = await fse.readJson(resolved);
  } catch (err) {
    throw new ConfigError(`Failed to read route manifest ${resolved}.`, [], err);
  }

  return buildHostRegistry(parseRouteManifest(document, resolved));
}

export function normalizeRoutePath(routePath: string): string {
  const trimmed = routePath.trim();
  const withLeading = trimmed.startsWith("/") ? trimmed : `/${trimmed}`;
  return withLeading.replace(/\/{2,}/g, "/");
}
