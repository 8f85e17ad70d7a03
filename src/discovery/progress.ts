/**
 * Progress Reporting
 *
 * Scan milestones are pushed synchronously to listeners. A listener must
 * never slow the scan, so consumers that iterate asynchronously read
 * through a bounded ProgressChannel that drops instead of waiting.
 */
import { getErrorMessage } from "../errors.js";
import type { Logger } from "../logger.js";

export type ProgressEvent =
  | { type: "start"; namespace: string }
  | { type: "catalog"; namespace: string; discovered: number; namespaced: number }
  | { type: "counted"; namespace: string; resource: string; count: number }
  | { type: "progress"; namespace: string; processed: number; total: number; percent: number }
  | { type: "complete"; namespace: string; resourceCount: number; totalObjects: number }
  | { type: "cached"; namespace: string; resourceCount: number; ageMs: number }
  | { type: "error"; namespace: string; message: string; unavailable: boolean };

export type ProgressListener = (event: ProgressEvent) => void;

export function isTerminal(event: ProgressEvent): boolean {
  return event.type === "complete" || event.type === "cached" || event.type === "error";
}

/**
 * Fan-out of one scan's events. Listeners can join mid-scan (callers
 * that share an in-flight scan) and leave at any time.
 */
export class ProgressBroadcaster {
  private readonly listeners = new Set<ProgressListener>();
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  add(listener: ProgressListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  get size(): number {
    return this.listeners.size;
  }

  emit(event: ProgressEvent): void {
    for (const listener of [...this.listeners]) {
      try {
        listener(event);
      } catch (error) {
        this.listeners.delete(listener);
        this.logger.warn(`Progress listener failed and was detached: ${getErrorMessage(error)}`);
      }
    }
  }
}

/**
 * Bounded queue between the scan and one async consumer.
 *
 * When full, a non-terminal event is dropped; a terminal event evicts the
 * oldest buffered one so the consumer always learns how the scan ended.
 */
export class ProgressChannel implements AsyncIterable<ProgressEvent> {
  private readonly capacity: number;
  private readonly buffer: ProgressEvent[] = [];
  private waiter: ((result: IteratorResult<ProgressEvent>) => void) | null = null;
  private closed = false;
  private droppedEvents = 0;
  private readonly signal?: AbortSignal;
  private readonly onAbort = (): void => this.abort();

  constructor(capacity: number, signal?: AbortSignal) {
    this.capacity = Math.max(1, capacity);
    this.signal = signal;
    if (signal) {
      if (signal.aborted) {
        this.abort();
      } else {
        signal.addEventListener("abort", this.onAbort, { once: true });
      }
    }
  }

  get dropped(): number {
    return this.droppedEvents;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Never blocks. Returns false when the event was not queued.
   */
  readonly push = (event: ProgressEvent): boolean => {
    if (this.closed) return false;

    const terminal = isTerminal(event);
    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve({ value: event, done: false });
    } else if (this.buffer.length < this.capacity) {
      this.buffer.push(event);
    } else if (terminal) {
      this.buffer.shift();
      this.buffer.push(event);
      this.droppedEvents++;
    } else {
      this.droppedEvents++;
      return false;
    }

    if (terminal) this.finish();
    return true;
  };

  close(): void {
    this.finish();
    this.release();
  }

  private finish(): void {
    this.closed = true;
    this.signal?.removeEventListener("abort", this.onAbort);
  }

  private abort(): void {
    this.buffer.length = 0;
    this.close();
  }

  private release(): void {
    if (this.waiter && this.buffer.length === 0) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve({ value: undefined, done: true });
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<ProgressEvent> {
    return {
      next: () => {
        const event = this.buffer.shift();
        if (event) return Promise.resolve({ value: event, done: false });
        if (this.closed) return Promise.resolve({ value: undefined, done: true });
        return new Promise((resolve) => {
          this.waiter = resolve;
        });
      },
      return: () => {
        this.abort();
        return Promise.resolve({ value: undefined, done: true });
      },
    };
  }
}

/**
 * Human-readable line for one event
 */
export function describeProgress(event: ProgressEvent): string {
  switch (event.type) {
    case "start":
      return `No cache found for namespace '${event.namespace}', discovering resources...`;
    case "catalog":
      return `Found ${event.discovered} API resource types, counting objects for ${event.namespaced} in '${event.namespace}'`;
    case "counted":
      return `${event.resource}: ${event.count} objects found`;
    case "progress":
      return `Progress: ${event.percent}% (${event.processed}/${event.total} resources)`;
    case "complete":
      return `Resource discovery complete! Found ${event.resourceCount} namespaced resources (${event.totalObjects} objects)`;
    case "cached":
      return `Using cached data for '${event.namespace}' (${event.resourceCount} resources, cached ${Math.round(event.ageMs / 1000)}s ago)`;
    case "error":
      return `Error: ${event.message}`;
  }
}
