import { describe, it, expect } from "vitest";
import { loadConfig } from "./config.js";
import { ClusterUnavailableError, KubeApiError, ResourceNotFoundError } from "./errors.js";
import { ResourceExplorer, filterResources, toCsv, topResources } from "./explorer.js";
import type { ProgressEvent } from "./discovery/progress.js";
import { FakeCluster, FakeClock, RecordingLogger, discoveryOf, forbidden } from "./testing/fakeCluster.js";
import type { CountedResourceType } from "./types.js";

function counted(name: string, apiGroup: string, kind: string, count: number): CountedResourceType {
  return {
    name,
    fullName: apiGroup ? `${name}.${apiGroup}` : name,
    displayName: apiGroup ? `${name} (${apiGroup})` : name,
    kind,
    apiGroup,
    apiVersion: "v1",
    namespaced: true,
    count,
  };
}

const sample: CountedResourceType[] = [
  counted("pods", "", "Pod", 3),
  counted("services", "", "Service", 0),
  counted("deployments", "apps", "Deployment", 3),
  counted("replicasets", "apps", "ReplicaSet", 5),
  counted("events", "events.k8s.io", "Event", 0),
];

function setup(env: Record<string, string> = {}) {
  const cluster = new FakeCluster(
    discoveryOf([
      { groupVersion: "v1", name: "pods", kind: "Pod" },
      { groupVersion: "v1", name: "events", kind: "Event" },
      { groupVersion: "apps/v1", name: "deployments", kind: "Deployment" },
      { groupVersion: "events.k8s.io/v1", name: "events", kind: "Event" },
    ])
  );
  const clock = new FakeClock();
  const logger = new RecordingLogger();
  const { config } = loadConfig(env);
  const explorer = new ResourceExplorer(cluster, { config, logger, now: clock.now });
  return { cluster, clock, logger, explorer };
}

describe("filterResources", () => {
  it("removes exactly the empty types when populatedOnly is set", () => {
    const result = filterResources(sample, { populatedOnly: true });
    expect(result.map((resource) => resource.fullName)).toEqual(["pods", "deployments.apps", "replicasets.apps"]);
  });

  it("matches search against name and kind, ignoring case", () => {
    expect(filterResources(sample, { search: "SET" }).map((resource) => resource.name)).toEqual(["replicasets"]);
    expect(filterResources(sample, { search: "deployment" }).map((resource) => resource.name)).toEqual([
      "deployments",
    ]);
  });

  it("filters by API group with core for the empty group", () => {
    expect(filterResources(sample, { apiGroup: "core" }).map((resource) => resource.name)).toEqual([
      "pods",
      "services",
    ]);
    expect(filterResources(sample, { apiGroup: "apps" }).map((resource) => resource.name)).toEqual([
      "deployments",
      "replicasets",
    ]);
  });

  it("returns everything without filters", () => {
    expect(filterResources(sample, {})).toHaveLength(5);
  });
});

describe("topResources", () => {
  it("sorts by count and keeps discovery order on ties", () => {
    expect(topResources(sample, 15).map((resource) => resource.fullName)).toEqual([
      "replicasets.apps",
      "pods",
      "deployments.apps",
    ]);
  });

  it("honours the limit", () => {
    expect(topResources(sample, 1).map((resource) => resource.name)).toEqual(["replicasets"]);
  });
});

describe("toCsv", () => {
  it("writes one quoted row per resource type with core for the empty group", () => {
    expect(toCsv(sample.slice(0, 3))).toBe(
      [
        "Resource Name,Kind,API Group,API Version,Namespaced,Count",
        '"pods","Pod","core","v1",true,3',
        '"services","Service","core","v1",true,0',
        '"deployments","Deployment","apps","v1",true,3',
        "",
      ].join("\n")
    );
  });
});

describe("ResourceExplorer", () => {
  it("reports every operation as unavailable without a cluster", async () => {
    const { config } = loadConfig({});
    const explorer = new ResourceExplorer(undefined, { config, logger: new RecordingLogger() });

    expect(explorer.connected).toBe(false);
    await expect(explorer.listNamespaces()).rejects.toBeInstanceOf(ClusterUnavailableError);
    await expect(explorer.getNamespaceResources("default")).rejects.toMatchObject({ unavailable: true });
    await expect(explorer.getResourceObjects("default", "pods")).rejects.toBeInstanceOf(ClusterUnavailableError);
    expect(() => explorer.streamProgress("default")).toThrow(ClusterUnavailableError);
    expect(explorer.clearCache()).toEqual({ status: "cache cleared" });
  });

  it("returns filtered resources with the total over all types", async () => {
    const { cluster, explorer } = setup();
    cluster.setCount("default", "pods", 2).setCount("default", "deployments.apps", 4);

    const result = await explorer.getNamespaceResources("default", { populatedOnly: true });

    expect(result.resources.map((resource) => resource.fullName)).toEqual(["pods", "deployments.apps"]);
    expect(result.count).toBe(2);
    expect(result.totalObjects).toBe(6);
    expect(result.totalDiscovered).toBe(4);
    expect(result.cache.hit).toBe(false);
  });

  it("serves identical results from cache within the TTL", async () => {
    const { cluster, clock, explorer } = setup();
    cluster.setCount("default", "pods", 2);

    const first = await explorer.getNamespaceResources("default");
    const calls = cluster.listCalls.length;
    clock.advance(2000);
    const second = await explorer.getNamespaceResources("default");

    expect(second.resources).toEqual(first.resources);
    expect(second.cache).toEqual({ hit: true, fetchedAt: first.cache.fetchedAt, ageMs: 2000 });
    expect(cluster.listCalls).toHaveLength(calls);
  });

  it("forces a fresh scan after clearCache", async () => {
    const { cluster, explorer } = setup();

    await explorer.getNamespaceResources("default");
    explorer.clearCache();
    const again = await explorer.getNamespaceResources("default");

    expect(again.cache.hit).toBe(false);
    expect(cluster.discoveryCalls).toBe(2);
    expect(explorer.getCacheStatus().namespaces).toHaveLength(1);
  });

  it("honours a custom skip list", async () => {
    const { cluster, explorer } = setup({ SKIP_RESOURCES: "events" });

    const result = await explorer.getNamespaceResources("default");

    expect(result.resources.map((resource) => resource.fullName)).toEqual(["pods", "deployments.apps"]);
    expect(result.totalDiscovered).toBe(2);
    expect(cluster.countedKeys()).toEqual(["default/pods", "default/deployments.apps"]);
  });

  it("keeps the default skip list when SKIP_RESOURCES is blank", async () => {
    const cluster = new FakeCluster(
      discoveryOf([
        { groupVersion: "v1", name: "pods", kind: "Pod" },
        { groupVersion: "v1", name: "bindings", kind: "Binding" },
        { groupVersion: "authentication.k8s.io/v1", name: "tokenrequests", kind: "TokenRequest" },
      ])
    );
    const explorer = new ResourceExplorer(cluster, {
      config: loadConfig({ SKIP_RESOURCES: "" }).config,
      logger: new RecordingLogger(),
      now: new FakeClock().now,
    });

    const result = await explorer.getNamespaceResources("default");

    expect(result.resources.map((resource) => resource.fullName)).toEqual(["pods"]);
    expect(result.count).toBe(1);
    expect(result.totalDiscovered).toBe(1);
    expect(cluster.countedKeys()).toEqual(["default/pods"]);
  });

  it("returns count-sorted top resources", async () => {
    const { cluster, explorer } = setup();
    cluster.setCount("default", "pods", 1).setCount("default", "deployments.apps", 7);

    const top = await explorer.getTopResources("default");

    expect(top.map((resource) => [resource.fullName, resource.count])).toEqual([
      ["deployments.apps", 7],
      ["pods", 1],
    ]);
  });

  it("resolves resources by full name before plain name", async () => {
    const { cluster, explorer } = setup();
    cluster.setObjects("default", "events", [{ metadata: { name: "core-event" } }]);
    cluster.setObjects("default", "events.events.k8s.io", [{ metadata: { name: "group-event" } }]);

    const byName = await explorer.getResourceObjects("default", "events");
    const byFullName = await explorer.getResourceObjects("default", "events.events.k8s.io");

    expect(byName.map((object) => object.name)).toEqual(["core-event"]);
    expect(byFullName.map((object) => object.name)).toEqual(["group-event"]);
  });

  it("summarizes listed objects", async () => {
    const { cluster, explorer } = setup();
    cluster.setObjects("default", "deployments.apps", [
      {
        apiVersion: "apps/v1",
        kind: "Deployment",
        metadata: {
          name: "web",
          namespace: "default",
          creationTimestamp: "2024-05-01T10:00:00Z",
          labels: { app: "web" },
        },
        spec: { replicas: 2 },
      },
    ]);

    const objects = await explorer.getResourceObjects("default", "deployments");

    expect(objects).toEqual([
      {
        name: "web",
        namespace: "default",
        kind: "Deployment",
        apiVersion: "apps/v1",
        creationTimestamp: "2024-05-01T10:00:00Z",
        labels: { app: "web" },
        annotations: {},
      },
    ]);
  });

  it("rejects unknown resource identifiers", async () => {
    const { explorer } = setup();
    await expect(explorer.getResourceObjects("default", "widgets")).rejects.toBeInstanceOf(ResourceNotFoundError);
    await expect(explorer.getObject("default", "widgets", "a")).rejects.toThrow(
      "resource widgets not found or not namespaced"
    );
  });

  it("returns object detail and the raw document", async () => {
    const { cluster, explorer } = setup();
    const pod = {
      apiVersion: "v1",
      kind: "Pod",
      metadata: { name: "api-0", namespace: "default", annotations: { note: "x" } },
      spec: { nodeName: "node-a" },
      status: { phase: "Running" },
    };
    cluster.setObjects("default", "pods", [pod]);

    const detail = await explorer.getObject("default", "pods", "api-0");
    const raw = await explorer.getRawObject("default", "pods", "api-0");

    expect(detail).toEqual({
      name: "api-0",
      namespace: "default",
      kind: "Pod",
      apiVersion: "v1",
      creationTimestamp: undefined,
      labels: {},
      annotations: { note: "x" },
      spec: { nodeName: "node-a" },
      status: { phase: "Running" },
    });
    expect(raw).toBe(pod);
  });

  it("passes API errors for object reads through", async () => {
    const { explorer } = setup();
    await expect(explorer.getObject("default", "pods", "missing")).rejects.toBeInstanceOf(KubeApiError);
  });

  it("streams a scan's progress and ends on completion", async () => {
    const { cluster, explorer } = setup();
    cluster.setCount("default", "pods", 1);
    cluster.setObjects("default", "events", forbidden("events"));

    const events: ProgressEvent[] = [];
    for await (const event of explorer.streamProgress("default")) {
      events.push(event);
    }

    expect(events.map((event) => event.type)).toEqual(["start", "catalog", "progress", "complete"]);
    expect(events[3]).toEqual({ type: "complete", namespace: "default", resourceCount: 4, totalObjects: 1 });
  });

  it("streams a single cached event on a hit", async () => {
    const { explorer } = setup();
    await explorer.getNamespaceResources("default");

    const events: ProgressEvent[] = [];
    for await (const event of explorer.streamProgress("default")) {
      events.push(event);
    }

    expect(events).toEqual([{ type: "cached", namespace: "default", resourceCount: 4, ageMs: 0 }]);
  });

  it("streams the failure when discovery is unreachable", async () => {
    const { cluster, explorer } = setup();
    cluster.discovery = new Error("connect ECONNREFUSED");

    const events: ProgressEvent[] = [];
    for await (const event of explorer.streamProgress("default")) {
      events.push(event);
    }

    expect(events[events.length - 1]).toEqual({
      type: "error",
      namespace: "default",
      message: "Failed to scan namespace default: failed to discover API resources: connect ECONNREFUSED",
      unavailable: true,
    });
  });

  it("describes the cache", async () => {
    const { clock, explorer } = setup();
    await explorer.getNamespaceResources("default");
    clock.advance(1500);

    expect(explorer.getCacheStatus()).toEqual({
      catalog: { cached: true, resourceCount: 4, ageMs: 1500, ttlMs: 300000 },
      namespaces: [{ namespace: "default", resourceCount: 4, ageMs: 1500 }],
      namespaceTtlMs: 300000,
      debug: false,
    });
  });
});
