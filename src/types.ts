/**
 * Shared types for the cluster explorer.
 *
 * Resource types come out of discovery, counted resource types live inside
 * namespace cache entries, and object shapes mirror what the API server
 * returns for a dynamic list/get.
 */

/**
 * One discoverable API resource kind.
 */
export interface ResourceType {
  /** Plural lowercase name, e.g. "pods" */
  readonly name: string;
  /** name + "." + apiGroup, or name alone for the core group */
  readonly fullName: string;
  /** name + " (" + apiGroup + ")", or name alone for the core group */
  readonly displayName: string;
  readonly kind: string;
  readonly shortName?: string;
  /** Empty string for the core group */
  readonly apiGroup: string;
  readonly apiVersion: string;
  readonly namespaced: boolean;
}

export interface CountedResourceType extends ResourceType {
  readonly count: number;
}

/**
 * Group/version/resource triple addressing a listable resource.
 */
export interface ResourceTarget {
  group: string;
  version: string;
  resource: string;
}

// ============================================================================
// Discovery documents
// ============================================================================

export interface DiscoveredResource {
  name: string;
  kind: string;
  namespaced: boolean;
  shortNames?: string[];
}

export interface GroupVersionResources {
  /** "v1" for the core group, "apps/v1" otherwise */
  groupVersion: string;
  resources: DiscoveredResource[];
}

export interface FailedGroup {
  groupVersion: string;
  message: string;
}

export interface DiscoveryResult {
  resourceLists: GroupVersionResources[];
  failedGroups: FailedGroup[];
}

// ============================================================================
// Objects
// ============================================================================

export interface ObjectMeta {
  name?: string;
  namespace?: string;
  creationTimestamp?: string;
  labels?: Record<string, string>;
  annotations?: Record<string, string>;
  [key: string]: unknown;
}

export interface KubeObject {
  apiVersion?: string;
  kind?: string;
  metadata?: ObjectMeta;
  spec?: Record<string, unknown>;
  status?: Record<string, unknown>;
  [key: string]: unknown;
}

export interface ObjectList {
  items: KubeObject[];
  continueToken?: string;
  /** Items after this page, when the server can estimate it */
  remainingItemCount?: number;
}

export interface ListOptions {
  limit?: number;
  continueToken?: string;
  timeoutMs: number;
  metadataOnly?: boolean;
}

export interface ObjectSummary {
  name: string;
  namespace: string;
  kind: string;
  apiVersion: string;
  creationTimestamp?: string;
  labels: Record<string, string>;
  annotations: Record<string, string>;
}

export interface ObjectDetail extends ObjectSummary {
  spec?: Record<string, unknown>;
  status?: Record<string, unknown>;
}

// ============================================================================
// Cluster API
// ============================================================================

/**
 * The slice of the Kubernetes API the explorer consumes.
 */
export interface ClusterApi {
  listNamespaces(timeoutMs: number): Promise<string[]>;
  discoverPreferredResources(): Promise<DiscoveryResult>;
  list(target: ResourceTarget, namespace: string, options: ListOptions): Promise<ObjectList>;
  get(target: ResourceTarget, namespace: string, name: string, timeoutMs: number): Promise<KubeObject>;
}

// ============================================================================
// Explorer results
// ============================================================================

export interface ResourceFilters {
  search?: string;
  populatedOnly?: boolean;
  apiGroup?: string;
}

export interface CacheInfo {
  hit: boolean;
  fetchedAt: number;
  ageMs: number;
}

export interface NamespaceResources {
  namespace: string;
  resources: CountedResourceType[];
  count: number;
  totalObjects: number;
  totalDiscovered: number;
  cache: CacheInfo;
}

export interface CacheStatus {
  catalog: {
    cached: boolean;
    resourceCount: number;
    ageMs?: number;
    ttlMs: number;
  };
  namespaces: Array<{ namespace: string; resourceCount: number; ageMs: number }>;
  namespaceTtlMs: number;
  debug: boolean;
}
