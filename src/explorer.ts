/**
 * Resource Explorer
 *
 * Operations consumed by the presentation layer. Owns the catalog, the
 * counter and the namespace cache for the lifetime of the process.
 */
import type { ExplorerConfig } from "./config.js";
import {
  ClusterUnavailableError,
  ResourceNotFoundError,
  ScanAbortedError,
  ScanError,
  getErrorMessage,
  isUnavailable,
} from "./errors.js";
import type { Logger } from "./logger.js";
import { ResourceCatalog } from "./discovery/catalog.js";
import { ObjectCounter, targetOf } from "./discovery/counter.js";
import { NamespaceCache, type ScanOptions } from "./discovery/namespaceCache.js";
import { ProgressChannel, type ProgressEvent } from "./discovery/progress.js";
import type {
  CacheStatus,
  ClusterApi,
  CountedResourceType,
  KubeObject,
  NamespaceResources,
  ObjectDetail,
  ObjectSummary,
  ResourceFilters,
  ResourceType,
} from "./types.js";

export interface ExplorerOptions {
  config: ExplorerConfig;
  logger: Logger;
  now?: () => number;
}

interface Components {
  cluster: ClusterApi;
  catalog: ResourceCatalog;
  cache: NamespaceCache;
}

/**
 * Apply search/populated/apiGroup filters. "core" selects the empty group.
 */
export function filterResources(
  resources: readonly CountedResourceType[],
  filters: ResourceFilters
): CountedResourceType[] {
  const search = filters.search?.trim().toLowerCase() ?? "";
  const apiGroup = filters.apiGroup?.trim() ?? "";

  return resources.filter((resource) => {
    if (filters.populatedOnly && resource.count === 0) return false;
    if (apiGroup && resource.apiGroup !== (apiGroup === "core" ? "" : apiGroup)) return false;
    if (
      search &&
      !resource.name.toLowerCase().includes(search) &&
      !resource.kind.toLowerCase().includes(search)
    ) {
      return false;
    }
    return true;
  });
}

/**
 * Highest counts first; ties keep discovery order. Empty types are left out.
 */
export function topResources(resources: readonly CountedResourceType[], limit: number): CountedResourceType[] {
  return resources
    .filter((resource) => resource.count > 0)
    .map((resource, index) => ({ resource, index }))
    .sort((a, b) => b.resource.count - a.resource.count || a.index - b.index)
    .slice(0, Math.max(0, limit))
    .map(({ resource }) => resource);
}

function csvField(value: string): string {
  return `"${value.replace(/"/g, '""')}"`;
}

export function toCsv(resources: readonly CountedResourceType[]): string {
  const lines = ["Resource Name,Kind,API Group,API Version,Namespaced,Count"];
  for (const resource of resources) {
    lines.push(
      [
        csvField(resource.name),
        csvField(resource.kind),
        csvField(resource.apiGroup || "core"),
        csvField(resource.apiVersion),
        String(resource.namespaced),
        String(resource.count),
      ].join(",")
    );
  }
  return lines.join("\n") + "\n";
}

export function summarizeObject(object: KubeObject, resource: ResourceType, namespace: string): ObjectSummary {
  const metadata = object.metadata ?? {};
  return {
    name: metadata.name ?? "",
    namespace: metadata.namespace ?? namespace,
    kind: object.kind ?? resource.kind,
    apiVersion: object.apiVersion ?? (resource.apiGroup ? `${resource.apiGroup}/${resource.apiVersion}` : resource.apiVersion),
    creationTimestamp: metadata.creationTimestamp,
    labels: metadata.labels ?? {},
    annotations: metadata.annotations ?? {},
  };
}

export class ResourceExplorer {
  private readonly config: ExplorerConfig;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly components: Components | null;

  constructor(cluster: ClusterApi | undefined, options: ExplorerOptions) {
    this.config = options.config;
    this.logger = options.logger;
    this.now = options.now ?? Date.now;

    if (!cluster) {
      this.components = null;
      return;
    }

    const catalog = new ResourceCatalog(cluster, {
      ttlMs: this.config.catalogTtlMs,
      logger: this.logger,
      now: options.now,
    });
    const counter = new ObjectCounter(cluster, {
      timeoutMs: this.config.countTimeoutMs,
      pageSize: this.config.countPageSize,
      expectedDenialStatuses: this.config.expectedDenialStatuses,
    });
    const cache = new NamespaceCache(catalog, counter, {
      ttlMs: this.config.namespaceTtlMs,
      skipResources: this.config.skipResources,
      concurrency: this.config.countConcurrency,
      verboseProgress: this.config.verboseProgress,
      progressEvery: this.config.progressEvery,
      logger: this.logger,
      now: options.now,
    });
    this.components = { cluster, catalog, cache };
  }

  get connected(): boolean {
    return this.components !== null;
  }

  // ============================================================================
  // Namespaces
  // ============================================================================

  async listNamespaces(): Promise<string[]> {
    const { cluster } = this.require();
    return cluster.listNamespaces(this.config.objectTimeoutMs);
  }

  async getNamespaceResources(
    namespace: string,
    filters: ResourceFilters = {},
    options: ScanOptions = {}
  ): Promise<NamespaceResources> {
    const { cache } = this.require();
    const { entry, hit } = await cache.lookup(namespace, options);

    const resources = filterResources(entry.resources, filters);
    const totalObjects = entry.resources.reduce((sum, resource) => sum + resource.count, 0);
    this.logger.debug(
      `Namespace=${namespace} filtered resources: ${resources.length} (populatedOnly=${filters.populatedOnly ?? false} search="${filters.search ?? ""}" apiGroup="${filters.apiGroup ?? ""}")`
    );

    return {
      namespace,
      resources,
      count: resources.length,
      totalObjects,
      totalDiscovered: entry.totalDiscovered,
      cache: { hit, fetchedAt: entry.fetchedAt, ageMs: Math.max(0, this.now() - entry.fetchedAt) },
    };
  }

  async getTopResources(namespace: string, limit = 15): Promise<CountedResourceType[]> {
    const { cache } = this.require();
    const resources = await cache.getResources(namespace);
    return topResources(resources, limit);
  }

  async exportNamespaceCsv(namespace: string): Promise<string> {
    const { cache } = this.require();
    const resources = await cache.getResources(namespace);
    this.logger.info(`Exported ${resources.length} resources for namespace ${namespace}`);
    return toCsv(resources);
  }

  /**
   * Progress of the namespace's scan, or a single "cached" event when the
   * cache is fresh. Ends with the terminal event or when `signal` aborts;
   * aborting does not stop the scan.
   */
  streamProgress(namespace: string, signal?: AbortSignal): AsyncIterable<ProgressEvent> {
    const { cache } = this.require();
    const channel = new ProgressChannel(this.config.progressBufferSize, signal);

    void cache.lookup(namespace, { onProgress: channel.push, signal }).then(
      () => channel.close(),
      (error: unknown) => {
        // A ScanError already reached the channel as an error event.
        if (!(error instanceof ScanAbortedError) && !(error instanceof ScanError)) {
          channel.push({
            type: "error",
            namespace,
            message: getErrorMessage(error),
            unavailable: isUnavailable(error),
          });
        }
        channel.close();
      }
    );

    return channel;
  }

  // ============================================================================
  // Objects
  // ============================================================================

  async getResourceObjects(namespace: string, identifier: string): Promise<ObjectSummary[]> {
    const { cluster } = this.require();
    const resource = await this.resolve(identifier);
    const list = await cluster.list(targetOf(resource), namespace, { timeoutMs: this.config.objectTimeoutMs });
    return list.items.map((item) => summarizeObject(item, resource, namespace));
  }

  async getObject(namespace: string, identifier: string, name: string): Promise<ObjectDetail> {
    const { cluster } = this.require();
    const resource = await this.resolve(identifier);
    const object = await cluster.get(targetOf(resource), namespace, name, this.config.objectTimeoutMs);

    const detail: ObjectDetail = summarizeObject(object, resource, namespace);
    if (object.spec && typeof object.spec === "object") detail.spec = object.spec;
    if (object.status && typeof object.status === "object") detail.status = object.status;
    return detail;
  }

  async getRawObject(namespace: string, identifier: string, name: string): Promise<KubeObject> {
    const { cluster } = this.require();
    const resource = await this.resolve(identifier);
    return cluster.get(targetOf(resource), namespace, name, this.config.objectTimeoutMs);
  }

  // ============================================================================
  // Cache
  // ============================================================================

  clearCache(): { status: string } {
    if (this.components) {
      this.components.catalog.clear();
      this.components.cache.clear();
      this.logger.info("Cache cleared by user request");
    }
    return { status: "cache cleared" };
  }

  getCacheStatus(): CacheStatus {
    const now = this.now();
    const snapshot = this.components?.catalog.peek() ?? null;
    return {
      catalog: {
        cached: snapshot !== null,
        resourceCount: snapshot?.resources.length ?? 0,
        ageMs: snapshot ? now - snapshot.fetchedAt : undefined,
        ttlMs: this.config.catalogTtlMs,
      },
      namespaces: (this.components?.cache.list() ?? []).map((entry) => ({
        namespace: entry.namespace,
        resourceCount: entry.resources.length,
        ageMs: now - entry.fetchedAt,
      })),
      namespaceTtlMs: this.config.namespaceTtlMs,
      debug: this.config.debug,
    };
  }

  /**
   * Exact fullName first ("deployments.apps"), then plain name ("pods").
   */
  private async resolve(identifier: string): Promise<ResourceType> {
    const { catalog } = this.require();
    const resources = (await catalog.discover()).filter((resource) => resource.namespaced);
    const match =
      resources.find((resource) => resource.fullName === identifier) ??
      resources.find((resource) => resource.name === identifier);
    if (!match) throw new ResourceNotFoundError(identifier);
    return match;
  }

  private require(): Components {
    if (!this.components) throw new ClusterUnavailableError();
    return this.components;
  }
}
