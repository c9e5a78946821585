/**
 * RouteIsolator: per-zone projection of the global route table.
 * Purpose: filter routes to a zone's member apps and namespace their public paths.
 * Assumptions: inputs are frozen values; nothing here registers routes or touches global state.
 * Usage: const isolated = isolate(zone, host.table, { apiPrefix: config.api_prefix });
 */

import type { JsonObject } from "../core/logger.js";
import type { Zone } from "../zones/zone.js";

import type { RouteEntry, RouteTable } from "./route-table.js";

// =============================================================================
// TYPES
// =============================================================================

export type IsolatedRoute = RouteEntry & {
  // Externally visible path; `path` and `handler` keep the internal dispatch target.
  readonly publicPath: string;
};

export type IsolatedRouteTable = {
  readonly zone: string;
  readonly basePath: string;
  readonly routes: readonly IsolatedRoute[];
};

export type IsolateOptions = {
  apiPrefix: string;
};

// =============================================================================
// ISOLATION
// =============================================================================

export function isolate(zone: Zone, table: RouteTable, opts: IsolateOptions): IsolatedRouteTable {
  const members = new Set(zone.memberApps);
  const basePath = zoneBasePath(zone, opts.apiPrefix);

  const routes = table.routes
    .filter((route) => members.has(route.app))
    .map((route) => Object.freeze({ ...route, publicPath: joinUrlPath(basePath, route.path) }));

  return Object.freeze({
    zone: zone.name,
    basePath,
    routes: Object.freeze(routes),
  });
}

export function zoneBasePath(zone: Zone, apiPrefix: string): string {
  return joinUrlPath(apiPrefix, zone.pathPrefix, zone.version);
}

export function joinUrlPath(...segments: string[]): string {
  const parts = segments
    .flatMap((segment) => segment.split("/"))
    .filter((part) => part.length > 0);
  const trailing = segments.length > 0 && segments[segments.length - 1].endsWith("/") ? "/" : "";
  const joined = `/${parts.join("/")}`;
  return joined === "/" ? joined : `${joined}${trailing}`;
}

// =============================================================================
// SCHEMA TOOL ADAPTER
// =============================================================================

// Plain JSON handed to the schema tool; it describes exactly one zone.
export function toSchemaToolInput(zone: Zone, isolated: IsolatedRouteTable): JsonObject {
  return {
    zone: {
      name: zone.name,
      title: zone.title,
      description: zone.description,
      version: zone.version,
      base_path: isolated.basePath,
      public: zone.isPublic,
      auth_required: zone.authRequired,
      permissions: zone.permissions ? [...zone.permissions] : null,
      rate_limit: zone.rateLimit ?? null,
      cors_enabled: zone.corsEnabled,
      middleware: [...zone.extraMiddleware],
      apps: [...zone.memberApps],
    },
    routes: isolated.routes.map((route) => ({
      app: route.app,
      path: route.publicPath,
      internal_path: route.path,
      handler: route.handler,
      methods: [...route.methods],
      name: route.name ?? null,
      tags: route.tags ? [...route.tags] : [],
      metadata: { ...route.metadata },
    })),
  };
}
