import { describe, it, expect } from "vitest";
import {
  formatCacheStatus,
  formatNamespaceResources,
  formatNamespaces,
  formatObjects,
  formatTopResources,
} from "./formatters.js";
import type { CountedResourceType, NamespaceResources } from "./types.js";

const pods: CountedResourceType = {
  name: "pods",
  fullName: "pods",
  displayName: "pods",
  kind: "Pod",
  shortName: "po",
  apiGroup: "",
  apiVersion: "v1",
  namespaced: true,
  count: 3,
};

const deployments: CountedResourceType = {
  name: "deployments",
  fullName: "deployments.apps",
  displayName: "deployments (apps)",
  kind: "Deployment",
  apiGroup: "apps",
  apiVersion: "v1",
  namespaced: true,
  count: 1,
};

describe("formatNamespaces", () => {
  it("lists namespaces", () => {
    expect(formatNamespaces(["default", "kube-system"])).toBe(
      "# Namespaces (2 total)\n\n- default\n- kube-system"
    );
    expect(formatNamespaces([])).toBe("No namespaces found.");
  });
});

describe("formatNamespaceResources", () => {
  const result: NamespaceResources = {
    namespace: "default",
    resources: [pods],
    count: 1,
    totalObjects: 3,
    totalDiscovered: 4,
    cache: { hit: false, fetchedAt: 0, ageMs: 0 },
  };

  it("renders a table of counted resource types", () => {
    expect(formatNamespaceResources(result, { populatedOnly: true })).toBe(
      [
        "# Resources in default\n",
        "- **Resource types:** 1 shown of 4 discovered",
        "- **Total objects:** 3",
        "- **Cache:** fresh data - object counts calculated",
        "- **Filters:** populated only",
        "",
        "| Resource | Kind | API Group | Version | Count |",
        "|----------|------|-----------|---------|-------|",
        "| pods | Pod | core | v1 | 3 |",
      ].join("\n")
    );
  });

  it("shows the cache age on a hit", () => {
    const text = formatNamespaceResources({ ...result, resources: [], count: 0, cache: { hit: true, fetchedAt: 0, ageMs: 90_000 } });
    expect(text.split("\n")[4]).toBe("- **Cache:** hit (cached 1m30s ago)");
    expect(text.endsWith("No resource types match.")).toBe(true);
  });
});

describe("formatTopResources", () => {
  it("numbers resource types by rank", () => {
    expect(formatTopResources("default", [pods, deployments])).toBe(
      [
        "# Top resources in default\n",
        "1. **pods** (core/v1) - 3 objects",
        "2. **deployments** (apps/v1) - 1 objects",
      ].join("\n")
    );
    expect(formatTopResources("empty", [])).toBe("No objects found in empty.");
  });
});

describe("formatObjects", () => {
  it("shows labels and a placeholder for missing timestamps", () => {
    const text = formatObjects("default", "pods", [
      { name: "api-0", namespace: "default", kind: "Pod", apiVersion: "v1", labels: { app: "api", tier: "web" }, annotations: {} },
    ]);
    expect(text).toBe(
      [
        "# pods in default (1 total)\n",
        "## api-0",
        "- **Kind:** Pod",
        "- **API Version:** v1",
        "- **Created:** unknown",
        "- **Labels:** app=api, tier=web",
        "",
      ].join("\n")
    );
  });
});

describe("formatCacheStatus", () => {
  it("marks expired namespace entries", () => {
    const text = formatCacheStatus({
      catalog: { cached: true, resourceCount: 40, ageMs: 5000, ttlMs: 300_000 },
      namespaces: [
        { namespace: "default", resourceCount: 40, ageMs: 2000 },
        { namespace: "old", resourceCount: 38, ageMs: 400_000 },
      ],
      namespaceTtlMs: 300_000,
      debug: false,
    });

    expect(text).toBe(
      [
        "# Cache Status\n",
        "## API Resource Catalog",
        "- **Resource types:** 40",
        "- **Age:** 5s",
        "- **TTL:** 5m",
        "",
        "## Namespaces (TTL 5m)",
        "- default: 40 resource types, cached 2s ago",
        "- old: 38 resource types, cached 6m40s ago [expired]",
        "",
        "Debug mode: off",
      ].join("\n")
    );
  });
});
