/**
 * Resource Catalog
 *
 * Discovers the namespaced resource types of the cluster and keeps one
 * process-wide snapshot for `ttlMs`.
 */
import { DiscoveryError, PartialDiscoveryWarning, getErrorMessage } from "../errors.js";
import type { Logger } from "../logger.js";
import { formatDuration } from "../logger.js";
import type { ClusterApi, DiscoveryResult, GroupVersionResources, ResourceType } from "../types.js";

/**
 * Core resources that every cluster serves. Used when discovery answers
 * but no group/version list could be read.
 */
export const FALLBACK_RESOURCES: readonly ResourceType[] = Object.freeze([
  { name: "pods", fullName: "pods", displayName: "pods", kind: "Pod", shortName: "po", apiGroup: "", apiVersion: "v1", namespaced: true },
  { name: "services", fullName: "services", displayName: "services", kind: "Service", shortName: "svc", apiGroup: "", apiVersion: "v1", namespaced: true },
  { name: "configmaps", fullName: "configmaps", displayName: "configmaps", kind: "ConfigMap", shortName: "cm", apiGroup: "", apiVersion: "v1", namespaced: true },
  { name: "secrets", fullName: "secrets", displayName: "secrets", kind: "Secret", apiGroup: "", apiVersion: "v1", namespaced: true },
  { name: "deployments", fullName: "deployments.apps", displayName: "deployments (apps)", kind: "Deployment", shortName: "deploy", apiGroup: "apps", apiVersion: "v1", namespaced: true },
]);

export interface CatalogSnapshot {
  readonly resources: readonly ResourceType[];
  readonly fetchedAt: number;
  readonly warning?: PartialDiscoveryWarning;
  /** True when the built-in fallback set stands in for discovery */
  readonly fallback: boolean;
}

export interface CatalogOptions {
  ttlMs: number;
  logger: Logger;
  now?: () => number;
}

/**
 * Split "apps/v1" into group and version; "v1" is the core group.
 */
export function parseGroupVersion(groupVersion: string): { group: string; version: string } | null {
  const parts = groupVersion.split("/");
  if (parts.length === 1 && parts[0]) return { group: "", version: parts[0] };
  if (parts.length === 2 && parts[0] && parts[1]) return { group: parts[0], version: parts[1] };
  return null;
}

export function qualifiedNames(name: string, group: string): { fullName: string; displayName: string } {
  if (!group) return { fullName: name, displayName: name };
  return { fullName: `${name}.${group}`, displayName: `${name} (${group})` };
}

/**
 * Flatten discovery lists into resource types, in group/version order.
 * Subresources ("pods/log") are not listable on their own and are skipped.
 */
export function toResourceTypes(lists: readonly GroupVersionResources[]): ResourceType[] {
  const resources: ResourceType[] = [];
  for (const list of lists) {
    const gv = parseGroupVersion(list.groupVersion);
    if (!gv) continue;

    for (const resource of list.resources) {
      if (resource.name.includes("/")) continue;
      const shortName = resource.shortNames?.[0];
      resources.push({
        name: resource.name,
        ...qualifiedNames(resource.name, gv.group),
        kind: resource.kind,
        ...(shortName ? { shortName } : {}),
        apiGroup: gv.group,
        apiVersion: gv.version,
        namespaced: resource.namespaced,
      });
    }
  }
  return resources;
}

export class ResourceCatalog {
  private readonly cluster: ClusterApi;
  private readonly ttlMs: number;
  private readonly logger: Logger;
  private readonly now: () => number;

  private snapshot: CatalogSnapshot | null = null;
  private inflight: Promise<CatalogSnapshot> | null = null;
  private generation = 0;

  constructor(cluster: ClusterApi, options: CatalogOptions) {
    this.cluster = cluster;
    this.ttlMs = options.ttlMs;
    this.logger = options.logger;
    this.now = options.now ?? Date.now;
  }

  /**
   * Namespaced resource types, from the snapshot while it is fresh.
   */
  async discover(): Promise<readonly ResourceType[]> {
    const snapshot = await this.refresh();
    return snapshot.resources;
  }

  /**
   * The current snapshot, refreshed when missing or expired. Concurrent
   * callers share one discovery.
   */
  async refresh(): Promise<CatalogSnapshot> {
    const cached = this.fresh();
    if (cached) {
      this.logger.debug(
        `Using cached API resources (${cached.resources.length} resources, cached ${formatDuration(this.now() - cached.fetchedAt)} ago)`
      );
      return cached;
    }

    if (!this.inflight) {
      const generation = this.generation;
      const pending = this.load(generation);
      this.inflight = pending;
      void pending.then(
        () => this.settle(pending),
        () => this.settle(pending)
      );
    }
    return this.inflight;
  }

  peek(): CatalogSnapshot | null {
    return this.snapshot;
  }

  ttl(): number {
    return this.ttlMs;
  }

  clear(): void {
    this.generation++;
    this.snapshot = null;
    this.inflight = null;
  }

  private fresh(): CatalogSnapshot | null {
    const snapshot = this.snapshot;
    if (snapshot && this.now() - snapshot.fetchedAt < this.ttlMs) return snapshot;
    return null;
  }

  private settle(pending: Promise<CatalogSnapshot>): void {
    if (this.inflight === pending) this.inflight = null;
  }

  private async load(generation: number): Promise<CatalogSnapshot> {
    this.logger.debug("Cache miss or expired, discovering API resources...");
    const start = this.now();

    let result: DiscoveryResult;
    try {
      result = await this.cluster.discoverPreferredResources();
    } catch (error) {
      if (error instanceof DiscoveryError) throw error;
      throw new DiscoveryError(`failed to discover API resources: ${getErrorMessage(error)}`, error);
    }

    const warning = result.failedGroups.length > 0 ? new PartialDiscoveryWarning(result.failedGroups) : undefined;
    if (warning) {
      this.logger.warn(warning.message);
      for (const failed of warning.failedGroups) {
        this.logger.debug(`  ${failed.groupVersion}: ${failed.message}`);
      }
    }

    let snapshot: CatalogSnapshot;
    if (result.resourceLists.length === 0) {
      this.logger.warn(`Using core resources fallback: ${FALLBACK_RESOURCES.length} resources`);
      snapshot = { resources: FALLBACK_RESOURCES, fetchedAt: this.now(), warning, fallback: true };
    } else {
      const resources = Object.freeze(toResourceTypes(result.resourceLists).filter((resource) => resource.namespaced));
      snapshot = { resources, fetchedAt: this.now(), warning, fallback: false };
      this.logger.debug(
        `API resource discovery completed in ${formatDuration(this.now() - start)}, cached ${resources.length} resources`
      );
    }

    // The fallback set is not cached so the next call retries discovery.
    // A clear() during discovery also keeps the result out of the cache.
    if (!snapshot.fallback && generation === this.generation) {
      this.snapshot = snapshot;
    }
    return snapshot;
  }
}
