/**
 * Object Counter
 *
 * Counts the live objects of one resource type in one namespace.
 */
import { CountError, KubeApiError } from "../errors.js";
import type { ClusterApi, ResourceTarget, ResourceType } from "../types.js";

export interface CounterOptions {
  timeoutMs: number;
  pageSize: number;
  /** Statuses that mean "not listable for this identity", e.g. 403 and 405 */
  expectedDenialStatuses: readonly number[];
}

export function targetOf(resource: ResourceType): ResourceTarget {
  return { group: resource.apiGroup, version: resource.apiVersion, resource: resource.name };
}

export class ObjectCounter {
  private readonly cluster: ClusterApi;
  private readonly options: CounterOptions;
  private readonly expected: ReadonlySet<number>;

  constructor(cluster: ClusterApi, options: CounterOptions) {
    this.cluster = cluster;
    this.options = options;
    this.expected = new Set(options.expectedDenialStatuses);
  }

  /**
   * Metadata-only first page. A truncated page is completed from the
   * server's remainingItemCount, or else by one unbounded list.
   *
   * @throws CountError with `expected` set for permission denials
   */
  async count(namespace: string, resource: ResourceType): Promise<number> {
    const target = targetOf(resource);
    try {
      const page = await this.cluster.list(target, namespace, {
        limit: this.options.pageSize,
        timeoutMs: this.options.timeoutMs,
        metadataOnly: true,
      });
      if (!page.continueToken) {
        return page.items.length;
      }
      if (page.remainingItemCount !== undefined) {
        return page.items.length + page.remainingItemCount;
      }

      const full = await this.cluster.list(target, namespace, {
        timeoutMs: this.options.timeoutMs,
        metadataOnly: true,
      });
      return full.items.length;
    } catch (error) {
      throw new CountError(resource.fullName, namespace, error, this.isExpectedDenial(error));
    }
  }

  isExpectedDenial(error: unknown): boolean {
    return error instanceof KubeApiError && error.status !== undefined && this.expected.has(error.status);
  }
}
