/**
 * Kubernetes API Client
 *
 * HTTP client for the API server's discovery and dynamic list/get endpoints.
 * Credentials come from the kubeconfig; the explorer only sees ClusterApi.
 */
import https from "node:https";
import axios, { AxiosError, type AxiosInstance } from "axios";
import { KubeConfig, type V1APIGroupList, type V1APIResourceList, type V1APIVersions } from "@kubernetes/client-node";
import type { ExplorerConfig } from "./config.js";
import {
  ClusterUnavailableError,
  DiscoveryError,
  KubeApiError,
  getErrorMessage,
  kubeApiErrorFromResponse,
} from "./errors.js";
import type { Logger } from "./logger.js";
import type {
  ClusterApi,
  DiscoveredResource,
  DiscoveryResult,
  FailedGroup,
  GroupVersionResources,
  KubeObject,
  ListOptions,
  ObjectList,
  ResourceTarget,
} from "./types.js";

export const METADATA_ACCEPT =
  "application/json;as=PartialObjectMetadataList;g=meta.k8s.io;v=v1,application/json";

interface RawList {
  items?: KubeObject[];
  metadata?: {
    continue?: string;
    remainingItemCount?: number;
  };
}

function groupVersionPath(groupVersion: string): string {
  return groupVersion.includes("/") ? `/apis/${groupVersion}` : `/api/${groupVersion}`;
}

export function resourcePath(target: ResourceTarget, namespace: string, name?: string): string {
  const prefix = target.group ? `/apis/${target.group}/${target.version}` : `/api/${target.version}`;
  const path = `${prefix}/namespaces/${encodeURIComponent(namespace)}/${target.resource}`;
  return name === undefined ? path : `${path}/${encodeURIComponent(name)}`;
}

/**
 * Convert axios failures into KubeApiError so callers can classify them by
 * status instead of by message text.
 */
export function toKubeApiError(error: unknown): unknown {
  if (!axios.isAxiosError(error)) return error;

  if (error.response) {
    return kubeApiErrorFromResponse(error.response.status, error.response.statusText, error.response.data);
  }
  if (error.code === AxiosError.ECONNABORTED || error.code === AxiosError.ETIMEDOUT) {
    return new KubeApiError(`Request timed out: ${error.message}`, undefined, "Timeout");
  }
  if (error.code === AxiosError.ERR_CANCELED) {
    return new KubeApiError("Request canceled", undefined, "Canceled");
  }
  return new KubeApiError(error.message, undefined, "NetworkError");
}

function toDiscoveredResource(resource: V1APIResourceList["resources"][number]): DiscoveredResource {
  return {
    name: resource.name,
    kind: resource.kind,
    namespaced: resource.namespaced,
    shortNames: resource.shortNames,
  };
}

export class KubeClient implements ClusterApi {
  private client: AxiosInstance;

  constructor(client: AxiosInstance) {
    this.client = client;
    this.client.interceptors.response.use(
      (response) => response,
      (error: unknown) => Promise.reject(toKubeApiError(error))
    );
  }

  // ============================================================================
  // Namespaces
  // ============================================================================

  async listNamespaces(timeoutMs: number): Promise<string[]> {
    const response = await this.client.get<RawList>("/api/v1/namespaces", { timeout: timeoutMs });
    const names: string[] = [];
    for (const item of response.data.items ?? []) {
      if (item.metadata?.name) names.push(item.metadata.name);
    }
    return names;
  }

  // ============================================================================
  // Discovery
  // ============================================================================

  /**
   * Preferred version of every API group, namespaced resources only.
   * Groups whose resource list cannot be read are reported in failedGroups;
   * only losing both the core versions and the group list is fatal.
   */
  async discoverPreferredResources(): Promise<DiscoveryResult> {
    const [core, groups] = await Promise.allSettled([
      this.client.get<V1APIVersions>("/api"),
      this.client.get<V1APIGroupList>("/apis"),
    ]);

    if (core.status === "rejected" && groups.status === "rejected") {
      throw new DiscoveryError(
        `failed to discover API resources: ${getErrorMessage(core.reason)}`,
        core.reason
      );
    }

    const failedGroups: FailedGroup[] = [];
    const groupVersions: string[] = [];

    if (core.status === "fulfilled") {
      const version = core.value.data.versions?.[0];
      if (version) groupVersions.push(version);
    } else {
      failedGroups.push({ groupVersion: "v1", message: getErrorMessage(core.reason) });
    }

    if (groups.status === "fulfilled") {
      for (const group of groups.value.data.groups ?? []) {
        const groupVersion = group.preferredVersion?.groupVersion ?? group.versions?.[0]?.groupVersion;
        if (groupVersion) groupVersions.push(groupVersion);
      }
    } else {
      failedGroups.push({ groupVersion: "apis", message: getErrorMessage(groups.reason) });
    }

    const lists = await Promise.allSettled(
      groupVersions.map((groupVersion) =>
        this.client.get<V1APIResourceList>(groupVersionPath(groupVersion))
      )
    );

    const resourceLists: GroupVersionResources[] = [];
    lists.forEach((result, index) => {
      const groupVersion = groupVersions[index];
      if (result.status === "rejected") {
        failedGroups.push({ groupVersion, message: getErrorMessage(result.reason) });
        return;
      }
      const resources = (result.value.data.resources ?? [])
        .filter((resource) => resource.namespaced)
        .map(toDiscoveredResource);
      resourceLists.push({ groupVersion: result.value.data.groupVersion || groupVersion, resources });
    });

    return { resourceLists, failedGroups };
  }

  // ============================================================================
  // Objects
  // ============================================================================

  async list(target: ResourceTarget, namespace: string, options: ListOptions): Promise<ObjectList> {
    const params: Record<string, string | number> = {
      timeoutSeconds: Math.max(1, Math.ceil(options.timeoutMs / 1000)),
    };
    if (options.limit !== undefined) params.limit = options.limit;
    if (options.continueToken) params.continue = options.continueToken;

    const response = await this.client.get<RawList>(resourcePath(target, namespace), {
      params,
      timeout: options.timeoutMs,
      headers: options.metadataOnly ? { Accept: METADATA_ACCEPT } : undefined,
    });

    return {
      items: response.data.items ?? [],
      continueToken: response.data.metadata?.continue || undefined,
      remainingItemCount: response.data.metadata?.remainingItemCount,
    };
  }

  async get(target: ResourceTarget, namespace: string, name: string, timeoutMs: number): Promise<KubeObject> {
    const response = await this.client.get<KubeObject>(resourcePath(target, namespace, name), {
      timeout: timeoutMs,
    });
    return response.data;
  }
}

/**
 * Current auth headers from the kubeconfig. Evaluated per request so that
 * exec and token-file credentials are refreshed.
 */
async function authHeaders(kubeConfig: KubeConfig): Promise<Record<string, string>> {
  const options: https.RequestOptions = {};
  await kubeConfig.applyToHTTPSOptions(options);
  const headers: Record<string, string> = {};
  for (const [name, value] of Object.entries(options.headers ?? {})) {
    if (typeof value === "string" && !/^\d+$/.test(name)) headers[name] = value;
  }
  return headers;
}

/**
 * Build a client from the default kubeconfig chain: KUBECONFIG,
 * ~/.kube/config, then the in-cluster service account.
 */
export async function createKubeClient(config: ExplorerConfig, logger: Logger): Promise<KubeClient> {
  const kubeConfig = new KubeConfig();
  try {
    kubeConfig.loadFromDefault();
    if (config.kubeContext) kubeConfig.setCurrentContext(config.kubeContext);
  } catch (error) {
    throw new ClusterUnavailableError(`failed to create kubernetes config: ${getErrorMessage(error)}`);
  }

  const cluster = kubeConfig.getCurrentCluster();
  if (!cluster) {
    throw new ClusterUnavailableError("failed to create kubernetes config: no current cluster");
  }

  const tlsOptions: https.RequestOptions = {};
  await kubeConfig.applyToHTTPSOptions(tlsOptions);

  const client = axios.create({
    baseURL: cluster.server,
    timeout: config.objectTimeoutMs,
    headers: { Accept: "application/json" },
    httpsAgent: new https.Agent({
      ca: tlsOptions.ca,
      cert: tlsOptions.cert,
      key: tlsOptions.key,
      rejectUnauthorized: !cluster.skipTLSVerify,
    }),
  });

  client.interceptors.request.use(async (request) => {
    const headers = await authHeaders(kubeConfig);
    for (const [name, value] of Object.entries(headers)) {
      request.headers.set(name, value);
    }
    return request;
  });

  logger.info(`Using cluster ${cluster.server} (context ${kubeConfig.getCurrentContext()})`);
  return new KubeClient(client);
}
