/**
 * Namespace Cache
 *
 * Per-namespace list of resource types annotated with live object counts.
 * Entries are immutable and replaced whole; concurrent requests for the
 * same namespace share one scan.
 */
import { CountError, ScanAbortedError, ScanError, getErrorMessage } from "../errors.js";
import type { Logger } from "../logger.js";
import { formatDuration } from "../logger.js";
import type { CountedResourceType, ResourceType } from "../types.js";
import type { ResourceCatalog } from "./catalog.js";
import type { ObjectCounter } from "./counter.js";
import { ProgressBroadcaster, type ProgressEvent, type ProgressListener } from "./progress.js";

export interface NamespaceCacheEntry {
  readonly namespace: string;
  /** Discovery order, not count order */
  readonly resources: readonly CountedResourceType[];
  readonly fetchedAt: number;
  /** Namespaced resource types left after the skip list */
  readonly totalDiscovered: number;
}

export interface NamespaceCacheOptions {
  ttlMs: number;
  skipResources: readonly string[];
  concurrency: number;
  verboseProgress: boolean;
  progressEvery: number;
  logger: Logger;
  now?: () => number;
}

export interface ScanOptions {
  onProgress?: ProgressListener;
  /** Stops this caller from waiting; the scan itself runs to completion */
  signal?: AbortSignal;
}

export interface CacheLookup {
  entry: NamespaceCacheEntry;
  hit: boolean;
}

interface Scan {
  readonly promise: Promise<NamespaceCacheEntry>;
  readonly progress: ProgressBroadcaster;
}

/**
 * Run `work` for every index in [0, total) with at most `concurrency`
 * calls in flight.
 */
export async function runPool(
  total: number,
  concurrency: number,
  work: (index: number) => Promise<void>
): Promise<void> {
  let next = 0;
  const workers = Array.from({ length: Math.min(Math.max(1, concurrency), total) }, async () => {
    while (next < total) {
      const index = next++;
      await work(index);
    }
  });
  await Promise.all(workers);
}

export class NamespaceCache {
  private readonly catalog: ResourceCatalog;
  private readonly counter: ObjectCounter;
  private readonly options: NamespaceCacheOptions;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly skip: ReadonlySet<string>;

  private readonly entries = new Map<string, NamespaceCacheEntry>();
  private readonly scans = new Map<string, Scan>();
  private generation = 0;

  constructor(catalog: ResourceCatalog, counter: ObjectCounter, options: NamespaceCacheOptions) {
    this.catalog = catalog;
    this.counter = counter;
    this.options = options;
    this.logger = options.logger;
    this.now = options.now ?? Date.now;
    this.skip = new Set(options.skipResources);
  }

  /**
   * Counted resource types of a namespace, in discovery order.
   *
   * @throws ScanError when the catalog cannot be read
   * @throws ScanAbortedError when `options.signal` fires first
   */
  async getResources(namespace: string, options: ScanOptions = {}): Promise<readonly CountedResourceType[]> {
    const { entry } = await this.lookup(namespace, options);
    return entry.resources;
  }

  async lookup(namespace: string, options: ScanOptions = {}): Promise<CacheLookup> {
    const cached = this.fresh(namespace);
    if (cached) {
      const ageMs = this.now() - cached.fetchedAt;
      this.logger.debug(
        `Using cached namespace data for '${namespace}' (${cached.resources.length} resources, cached ${formatDuration(ageMs)} ago)`
      );
      if (options.onProgress) {
        this.notify(options.onProgress, {
          type: "cached",
          namespace,
          resourceCount: cached.resources.length,
          ageMs,
        });
      }
      return { entry: cached, hit: true };
    }

    if (options.signal?.aborted) {
      throw new ScanAbortedError(namespace);
    }

    let scan = this.scans.get(namespace);
    let detach: (() => void) | undefined;
    if (scan) {
      this.logger.debug(`Joining in-flight scan of namespace '${namespace}'`);
      if (options.onProgress) detach = scan.progress.add(options.onProgress);
    } else {
      const progress = new ProgressBroadcaster(this.logger);
      // Attach before starting so the first listener sees the start event.
      if (options.onProgress) detach = progress.add(options.onProgress);
      scan = this.start(namespace, progress);
    }

    try {
      const entry = await this.wait(scan.promise, namespace, options.signal);
      return { entry, hit: false };
    } finally {
      detach?.();
    }
  }

  peek(namespace: string): NamespaceCacheEntry | undefined {
    return this.entries.get(namespace);
  }

  list(): NamespaceCacheEntry[] {
    return [...this.entries.values()];
  }

  ttl(): number {
    return this.options.ttlMs;
  }

  /**
   * Drop every entry. Scans still running finish for their callers but
   * do not store their result.
   */
  clear(): void {
    this.generation++;
    this.entries.clear();
    this.scans.clear();
  }

  private fresh(namespace: string): NamespaceCacheEntry | null {
    const entry = this.entries.get(namespace);
    if (!entry) {
      this.logger.debug(`No cache found for namespace '${namespace}', counting objects...`);
      return null;
    }
    if (this.now() - entry.fetchedAt >= this.options.ttlMs) {
      this.logger.debug(`Cache expired for namespace '${namespace}', refreshing...`);
      return null;
    }
    return entry;
  }

  private start(namespace: string, progress: ProgressBroadcaster): Scan {
    const promise = this.scan(namespace, progress, this.generation);
    const scan: Scan = { promise, progress };
    this.scans.set(namespace, scan);

    const settle = () => {
      if (this.scans.get(namespace) === scan) this.scans.delete(namespace);
    };
    void promise.then(settle, settle);
    return scan;
  }

  private wait(
    promise: Promise<NamespaceCacheEntry>,
    namespace: string,
    signal: AbortSignal | undefined
  ): Promise<NamespaceCacheEntry> {
    if (!signal) return promise;

    return new Promise((resolve, reject) => {
      const onAbort = () => reject(new ScanAbortedError(namespace));
      signal.addEventListener("abort", onAbort, { once: true });
      promise.then(
        (entry) => {
          signal.removeEventListener("abort", onAbort);
          resolve(entry);
        },
        (error: unknown) => {
          signal.removeEventListener("abort", onAbort);
          reject(error);
        }
      );
    });
  }

  private async scan(
    namespace: string,
    progress: ProgressBroadcaster,
    generation: number
  ): Promise<NamespaceCacheEntry> {
    progress.emit({ type: "start", namespace });

    let discovered: readonly ResourceType[];
    try {
      discovered = await this.catalog.discover();
    } catch (error) {
      const failure = new ScanError(namespace, error);
      progress.emit({ type: "error", namespace, message: failure.message, unavailable: failure.unavailable });
      throw failure;
    }

    const targets = discovered.filter((resource) => resource.namespaced && !this.skip.has(resource.name));
    progress.emit({ type: "catalog", namespace, discovered: discovered.length, namespaced: targets.length });
    this.logger.info(`Counting objects for ${targets.length} namespaced resources in namespace '${namespace}'`);

    const counts: number[] = new Array<number>(targets.length).fill(0);
    const every = Math.max(1, this.options.progressEvery);
    let processed = 0;

    await runPool(targets.length, this.options.concurrency, async (index) => {
      const resource = targets[index];
      const count = await this.countOne(namespace, resource);
      counts[index] = count;
      processed++;

      if (this.options.verboseProgress && count > 0) {
        progress.emit({ type: "counted", namespace, resource: resource.displayName, count });
      }
      if (processed % every === 0 || processed === targets.length) {
        progress.emit({
          type: "progress",
          namespace,
          processed,
          total: targets.length,
          percent: Math.floor((processed / targets.length) * 100),
        });
      }
      if (processed % 20 === 0) {
        this.logger.info(`Processed ${processed}/${targets.length} resources`);
      }
    });

    const resources = Object.freeze(
      targets.map((resource, index): CountedResourceType => Object.freeze({ ...resource, count: counts[index] }))
    );
    const entry: NamespaceCacheEntry = Object.freeze({
      namespace,
      resources,
      fetchedAt: this.now(),
      totalDiscovered: targets.length,
    });
    const totalObjects = counts.reduce((sum, count) => sum + count, 0);
    this.logger.info(`Completed: Found ${resources.length} namespaced resources in '${namespace}'`);

    if (generation === this.generation) {
      this.entries.set(namespace, entry);
      this.logger.debug(`Cached ${resources.length} resources for namespace '${namespace}'`);
    } else {
      this.logger.debug(`Cache cleared during scan of '${namespace}', result not stored`);
    }

    progress.emit({ type: "complete", namespace, resourceCount: resources.length, totalObjects });
    return entry;
  }

  private async countOne(namespace: string, resource: ResourceType): Promise<number> {
    try {
      return await this.counter.count(namespace, resource);
    } catch (error) {
      if (error instanceof CountError && error.expected) {
        this.logger.debug(`  ${resource.displayName}: permission denied (expected)`);
      } else {
        const cause = error instanceof CountError ? error.cause : error;
        this.logger.warn(`Failed to count objects for resource ${resource.fullName}: ${getErrorMessage(cause)}`);
      }
      return 0;
    }
  }

  private notify(listener: ProgressListener, event: ProgressEvent): void {
    try {
      listener(event);
    } catch (error) {
      this.logger.warn(`Progress listener failed: ${getErrorMessage(error)}`);
    }
  }
}
