import { describe, expect, it } from "vitest";

import { buildZone } from "../zones/zone.js";

import { isolate, joinUrlPath, toSchemaToolInput } from "./isolator.js";
import { buildHostRegistry } from "./route-table.js";

const host = buildHostRegistry({
  apps: [
    {
      id: "blog",
      routes: [
        { path: "posts/", handler: "blog.views.list_posts", methods: ["get"], metadata: {} },
        { path: "/posts/{id}", handler: "blog.views.get_post", methods: ["GET", "delete"], metadata: {} },
      ],
    },
    {
      id: "billing",
      routes: [
        {
          path: "/invoices",
          handler: "billing.views.invoices",
          methods: ["GET"],
          name: "invoices",
          tags: ["billing"],
          metadata: { owner: "finance" },
        },
      ],
    },
    {
      id: "search",
      routes: [{ path: "/search", handler: "search.views.query", methods: ["GET"], metadata: {} }],
    },
  ],
});

function zone(name: string, apps: string[], extra: { path_prefix?: string; version?: string } = {}) {
  return buildZone(name, {
    apps,
    public: true,
    auth_required: false,
    version: extra.version ?? "v1",
    cors_enabled: false,
    middleware: [],
    ...(extra.path_prefix !== undefined ? { path_prefix: extra.path_prefix } : {}),
  });
}

describe("isolate", () => {
  it("keeps only member-app routes in global order and prefixes public paths", () => {
    const isolated = isolate(zone("public", ["search", "blog"]), host.table, { apiPrefix: "apix" });

    expect(isolated.zone).toBe("public");
    expect(isolated.basePath).toBe("/apix/public/v1");
    expect(isolated.routes.map((route) => [route.app, route.publicPath, route.path])).toEqual([
      ["blog", "/apix/public/v1/posts/", "/posts/"],
      ["blog", "/apix/public/v1/posts/{id}", "/posts/{id}"],
      ["search", "/apix/public/v1/search", "/search"],
    ]);
    expect(isolated.routes[1].methods).toEqual(["GET", "DELETE"]);
  });

  it("omits an empty api prefix and honours custom prefix and version", () => {
    const isolated = isolate(zone("admin", ["billing"], { path_prefix: "internal/admin", version: "v2" }), host.table, {
      apiPrefix: "",
    });

    expect(isolated.basePath).toBe("/internal/admin/v2");
    expect(isolated.routes.map((route) => route.publicPath)).toEqual(["/internal/admin/v2/invoices"]);
  });

  it("leaves the global table untouched and returns frozen values", () => {
    const before = JSON.stringify(host.table);
    const isolated = isolate(zone("admin", ["billing"]), host.table, { apiPrefix: "/apix/" });

    expect(JSON.stringify(host.table)).toBe(before);
    expect(Object.isFrozen(isolated)).toBe(true);
    expect(Object.isFrozen(isolated.routes)).toBe(true);
    expect(Object.isFrozen(isolated.routes[0])).toBe(true);
    expect(isolated.routes[0].handler).toBe("billing.views.invoices");
  });

  it("never lets two zones see each other's routes", () => {
    const publicTable = isolate(zone("public", ["blog"]), host.table, { apiPrefix: "apix" });
    const adminTable = isolate(zone("admin", ["billing"]), host.table, { apiPrefix: "apix" });

    expect(publicTable.routes.every((route) => route.app === "blog")).toBe(true);
    expect(adminTable.routes.every((route) => route.app === "billing")).toBe(true);
  });

  it("produces identical output for identical input", () => {
    const first = isolate(zone("public", ["blog"]), host.table, { apiPrefix: "apix" });
    const second = isolate(zone("public", ["blog"]), host.table, { apiPrefix: "apix" });
    expect(second).toEqual(first);
  });
});

describe("joinUrlPath", () => {
  it("collapses duplicate slashes and skips empty segments", () => {
    expect(joinUrlPath("/apix/", "", "//public", "v1", "/posts")).toBe("/apix/public/v1/posts");
    expect(joinUrlPath("", "")).toBe("/");
    expect(joinUrlPath("apix", "items/")).toBe("/apix/items/");
  });
});

describe("toSchemaToolInput", () => {
  it("describes one zone with its public routes", () => {
    const admin = zone("admin", ["billing"]);
    const input = toSchemaToolInput(admin, isolate(admin, host.table, { apiPrefix: "apix" }));

    expect(input).toEqual({
      zone: {
        name: "admin",
        title: "Admin",
        description: "",
        version: "v1",
        base_path: "/apix/admin/v1",
        public: true,
        auth_required: false,
        permissions: null,
        rate_limit: null,
        cors_enabled: false,
        middleware: [],
        apps: ["billing"],
      },
      routes: [
        {
          app: "billing",
          path: "/apix/admin/v1/invoices",
          internal_path: "/invoices",
          handler: "billing.views.invoices",
          methods: ["GET"],
          name: "invoices",
          tags: ["billing"],
          metadata: { owner: "finance" },
        },
      ],
    });
  });
});
